import type * as ExcelJS from "exceljs"
import { z } from "zod"
import { resolveCategory } from "../lib/category"
import { NotFoundError, StorageError, ValidationError, describeError } from "../lib/errors"
import { reportTimestamp } from "../lib/filename"
import { parseCoordinate, parseLocationLabel } from "../lib/geo"
import { createLogger } from "../lib/logger"
import type { Report, SubmissionFields, UploadedImage } from "../types"
import { hasFilename, type ImageStore } from "./images"
import type { ReportStore } from "./store"
import { buildExportWorkbook } from "./workbook"

const log = createLogger("reports")

export const MAX_DESCRIPTION_LENGTH = 1000

const MISSING_FIELDS = "Missing required fields"

const requiredText = z
  .string({ required_error: MISSING_FIELDS, invalid_type_error: MISSING_FIELDS })
  .min(1, MISSING_FIELDS)

const submissionSchema = z.object({
  type: requiredText,
  location: requiredText,
  description: requiredText.refine(
    (value) => Array.from(value).length <= MAX_DESCRIPTION_LENGTH,
    "Description too long."
  ),
  coordX: z.string().optional(),
  coordY: z.string().optional(),
})

type Submission = z.infer<typeof submissionSchema>

/** First non-empty string among the given form field aliases. */
function formField(fields: SubmissionFields, ...names: string[]): string | undefined {
  for (const name of names) {
    const raw = fields[name]
    const value: unknown = Array.isArray(raw) ? raw[0] : raw
    if (typeof value === "string" && value.length > 0) return value
  }
  return undefined
}

export function parseSubmission(fields: SubmissionFields): Submission {
  const parsed = submissionSchema.safeParse({
    type: formField(fields, "type", "reportType"),
    location: formField(fields, "reportLocation", "location"),
    description: formField(fields, "description", "reportDescription"),
    coordX: formField(fields, "coordX"),
    coordY: formField(fields, "coordY"),
  })
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues[0]?.message ?? MISSING_FIELDS)
  }
  return parsed.data
}

/** Explicit coordinates win when both are given; otherwise the `Lat: x, Lon: y` label is parsed. */
export function resolveCoordinates(submission: Submission): [number, number] {
  if (submission.coordX && submission.coordY) {
    const x = parseCoordinate(submission.coordX)
    const y = parseCoordinate(submission.coordY)
    if (x === null || y === null) throw new ValidationError("Invalid location format")
    return [x, y]
  }
  const parsed = parseLocationLabel(submission.location)
  if (!parsed) throw new ValidationError("Invalid location format")
  return parsed
}

export interface ReportService {
  submitReport(fields: SubmissionFields, files: UploadedImage[]): Promise<Report>
  listReports(): Promise<Report[]>
  exportWorkbook(): Promise<ExcelJS.Buffer>
}

export interface ReportServiceDeps {
  store: ReportStore
  images: ImageStore
  now?: () => Date
}

export function createReportService({ store, images, now = () => new Date() }: ReportServiceDeps): ReportService {
  return {
    async submitReport(fields, files) {
      const submission = parseSubmission(fields)
      const [coordX, coordY] = resolveCoordinates(submission)
      const category = resolveCategory(submission.type)

      if (!files.some(hasFilename)) {
        throw new ValidationError("At least one image is required.")
      }

      const createdAt = now()
      await images.ensureFolders()
      const filenames = await images.saveImages(category, files, createdAt)
      if (filenames.length === 0) {
        throw new StorageError("Failed to save images.")
      }

      const report: Report = {
        type: submission.type,
        location: submission.location,
        description: submission.description,
        coord_x: coordX,
        coord_y: coordY,
        datetime: reportTimestamp(createdAt),
        images: filenames,
      }

      try {
        const total = await store.append(report)
        log.info("report added", { category, images: filenames.length, total })
      } catch (error) {
        log.error("report append failed, removing saved images", { category, error: describeError(error) })
        await images.discard(category, filenames)
        throw error
      }
      return report
    },

    listReports: () => store.load(),

    async exportWorkbook() {
      const reports = await store.load()
      if (reports.length === 0) {
        throw new NotFoundError("No reports to export.")
      }
      return buildExportWorkbook(reports).xlsx.writeBuffer()
    },
  }
}
