import path from "node:path"
import cors from "cors"
import express from "express"
import multer from "multer"
import { z } from "zod"
import type { AppConfig } from "./config"
import { AppError, ValidationError, clientErrorStatus, describeError } from "./lib/errors"
import { createLogger } from "./lib/logger"
import { createImageStore, type ImageStore } from "./services/images"
import { basemapStyle, reportMarkers } from "./services/map"
import { createReportService, type ReportService } from "./services/reports"
import { createReportStore, type ReportStore } from "./services/store"
import { createTranslator, type Translator } from "./services/translate"
import type { ErrorBody, UploadedImage } from "./types"
import { renderPage } from "./views/page"

const log = createLogger("server")

export const EXPORT_FILENAME = "reports_export.xlsx"

const translateSchema = z.object({
  text: z.string(),
})

export interface AppServices {
  store: ReportStore
  images: ImageStore
  reports: ReportService
  translator: Translator
}

export function createServices(config: AppConfig): AppServices {
  const store = createReportStore({
    reportsFile: path.join(config.dataDir, "reports.json"),
    workbookFile: path.join(config.dataDir, "reports.xlsx"),
  })
  const images = createImageStore(path.join(config.dataDir, "report_images"))
  return {
    store,
    images,
    reports: createReportService({ store, images }),
    translator: createTranslator({ endpoint: config.translateApiUrl, timeoutMs: config.translateTimeoutMs }),
  }
}

function errorResponse(error: unknown, scope: string, fallbackMessage: string): { status: number; body: ErrorBody } {
  if (error instanceof multer.MulterError) {
    return { status: 400, body: new ValidationError(`Upload rejected: ${error.message}`).toBody() }
  }
  const clientStatus = clientErrorStatus(error)
  if (clientStatus !== null && !(error instanceof AppError)) {
    return { status: 400, body: new ValidationError(`Invalid request: ${describeError(error)}`).toBody() }
  }
  if (error instanceof AppError) {
    if (error.status >= 500) {
      log.error(`${scope} failed`, { message: error.message, cause: String(error.cause ?? "") })
    }
    return { status: error.status, body: error.toBody() }
  }
  log.error(`${scope} unexpected error`, { error: error instanceof Error ? (error.stack ?? error.message) : String(error) })
  return { status: 500, body: { status: "error", message: fallbackMessage, code: "INTERNAL_ERROR" } }
}

function uploadedImages(files: express.Request["files"]): UploadedImage[] {
  if (!files) return []
  return Array.isArray(files) ? files : Object.values(files).flat()
}

export function createApp(config: AppConfig, services: AppServices = createServices(config)) {
  const app = express()
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: config.maxUploadBytes, files: config.maxUploadFiles },
  })

  app.use(
    cors({
      origin: config.frontendOrigins ?? true,
    })
  )
  app.use(express.json({ limit: "1mb" }))

  app.get("/", async (_req, res) => {
    try {
      const reports = await services.reports.listReports()
      res.type("html").send(
        renderPage({
          markers: reportMarkers(reports),
          style: basemapStyle(),
          center: config.mapCenter,
          zoom: config.mapZoom,
        })
      )
    } catch (error) {
      const { status, body } = errorResponse(error, "index", "Could not render map.")
      res.status(status).json(body)
    }
  })

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" })
  })

  app.post("/submit_report", upload.array("images"), async (req, res) => {
    try {
      const report = await services.reports.submitReport(req.body ?? {}, uploadedImages(req.files))
      return res.status(201).json({ status: "success", report })
    } catch (error) {
      const { status, body } = errorResponse(error, "submit_report", "Server error while saving report.")
      if (status === 400) log.warn("submission rejected", { message: body.message })
      return res.status(status).json(body)
    }
  })

  app.get("/uploads/:category/:filename", (req, res) => {
    const notFound = () => res.status(404).json({ status: "error", message: "File not found.", code: "NOT_FOUND" })
    const folder = services.images.folderFor(req.params.category)
    if (!folder) return notFound()

    res.sendFile(req.params.filename, { root: folder, dotfiles: "deny" }, (error) => {
      if (error && !res.headersSent) notFound()
    })
  })

  app.get("/get_reports", async (_req, res) => {
    try {
      return res.json(await services.reports.listReports())
    } catch (error) {
      const { status, body } = errorResponse(error, "get_reports", "Could not load reports.")
      return res.status(status).json(body)
    }
  })

  app.get("/recent_reports", (_req, res) => {
    res.json([])
  })

  app.post("/translate", async (req, res) => {
    const parsed = translateSchema.safeParse(req.body ?? {})
    const text = parsed.success ? parsed.data.text : undefined
    const translated_text = await services.translator.translateToUrdu(text)
    res.json({ translated_text })
  })

  app.get("/export_reports_excel", async (_req, res) => {
    try {
      const workbook = await services.reports.exportWorkbook()
      res.attachment(EXPORT_FILENAME)
      res.type("application/vnd.openxmlformats-officedocument.spreadsheetml.sheet")
      return res.send(Buffer.from(workbook))
    } catch (error) {
      const { status, body } = errorResponse(error, "export_reports_excel", "Failed to export reports.")
      return res.status(status).json(body)
    }
  })

  app.use((error: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const { status, body } = errorResponse(error, "server", "Internal server error")
    res.status(status).json(body)
  })

  return app
}
