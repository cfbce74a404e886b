import { randomUUID } from "node:crypto"
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises"
import path from "node:path"
import { z } from "zod"
import { StorageError, describeError, errorCode } from "../lib/errors"
import { withLock } from "../lib/lock"
import { createLogger } from "../lib/logger"
import type { Report } from "../types"
import { buildMirrorWorkbook } from "./workbook"

const log = createLogger("store")

// Fields added to the file by hand are kept through load and append.
export const storedReportSchema = z
  .object({
    type: z.string(),
    location: z.string(),
    description: z.string(),
    coord_x: z.number(),
    coord_y: z.number(),
    datetime: z.string(),
    images: z.array(z.string()),
  })
  .passthrough() satisfies z.ZodType<Report>

const storedReportsSchema = z.array(storedReportSchema)

export interface ReportStorePaths {
  reportsFile: string
  workbookFile: string
}

export interface ReportStore {
  /** Current reports, or `[]` when the file is missing or unreadable. */
  load(): Promise<Report[]>
  /** Replaces the whole file. */
  save(reports: Report[]): Promise<void>
  /** Appends one report under the store lock and returns the new report count. */
  append(report: Report): Promise<number>
  rebuildMirror(): Promise<void>
}

type ReadResult = { ok: true; reports: Report[] } | { ok: false; reason: string }

function isMissingFile(error: unknown) {
  return errorCode(error) === "ENOENT"
}

async function readReports(file: string): Promise<ReadResult> {
  let raw: string
  try {
    raw = await readFile(file, "utf8")
  } catch (error) {
    if (isMissingFile(error)) return { ok: true, reports: [] }
    return { ok: false, reason: describeError(error) }
  }
  if (!raw.trim()) return { ok: true, reports: [] }

  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch (error) {
    return { ok: false, reason: describeError(error) }
  }

  const parsed = storedReportsSchema.safeParse(json)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    return { ok: false, reason: `${issue?.path.join(".") || "root"}: ${issue?.message ?? "invalid report list"}` }
  }
  return { ok: true, reports: parsed.data }
}

async function replaceFile(target: string, write: (tempPath: string) => Promise<void>) {
  await mkdir(path.dirname(target), { recursive: true })
  const tempPath = `${target}.${process.pid}.${randomUUID()}.tmp`
  try {
    await write(tempPath)
    await rename(tempPath, target)
  } catch (error) {
    await rm(tempPath, { force: true })
    throw error
  }
}

export function createReportStore(paths: ReportStorePaths): ReportStore {
  const lockKey = path.resolve(paths.reportsFile)

  async function writeJson(reports: Report[]) {
    try {
      await replaceFile(paths.reportsFile, (tempPath) =>
        writeFile(tempPath, `${JSON.stringify(reports, null, 2)}\n`, "utf8")
      )
    } catch (error) {
      throw new StorageError("Failed to write reports file.", { cause: error })
    }
  }

  // The workbook is derived from the JSON file, so a failed rebuild is logged and the
  // JSON write still counts as committed.
  async function writeMirror(reports: Report[]) {
    try {
      const workbook = buildMirrorWorkbook(reports)
      await replaceFile(paths.workbookFile, (tempPath) => workbook.xlsx.writeFile(tempPath))
    } catch (error) {
      log.error("mirror workbook rebuild failed", { file: paths.workbookFile, error: describeError(error) })
    }
  }

  return {
    load: () =>
      withLock(lockKey, async () => {
        const result = await readReports(paths.reportsFile)
        if (!result.ok) {
          log.error("error loading reports", { file: paths.reportsFile, reason: result.reason })
          return []
        }
        return result.reports
      }),

    save: (reports) =>
      withLock(lockKey, async () => {
        await writeJson(reports)
        await writeMirror(reports)
      }),

    append: (report) =>
      withLock(lockKey, async () => {
        const result = await readReports(paths.reportsFile)
        if (!result.ok) {
          throw new StorageError(`Reports file is unreadable, refusing to overwrite it (${result.reason}).`)
        }
        const reports = [...result.reports, report]
        await writeJson(reports)
        await writeMirror(reports)
        return reports.length
      }),

    rebuildMirror: () =>
      withLock(lockKey, async () => {
        const result = await readReports(paths.reportsFile)
        if (!result.ok) {
          throw new StorageError(`Reports file is unreadable (${result.reason}).`)
        }
        await writeMirror(result.reports)
      }),
  }
}
