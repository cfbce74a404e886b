import { randomUUID } from "node:crypto"
import { mkdir, rm, writeFile } from "node:fs/promises"
import path from "node:path"
import { isReportCategory, resolveCategory } from "../lib/category"
import { describeError, errorCode } from "../lib/errors"
import { fileTimestamp, imageFilename, withSuffix } from "../lib/filename"
import { createLogger } from "../lib/logger"
import { REPORT_CATEGORIES, type UploadedImage } from "../types"

const log = createLogger("images")

export interface ImageStore {
  readonly root: string
  ensureFolders(): Promise<void>
  saveImages(category: string, files: UploadedImage[], now: Date): Promise<string[]>
  discard(category: string, filenames: string[]): Promise<void>
  /** Absolute folder for a category, or null when the category is unknown. */
  folderFor(category: string): string | null
}

function isExistingFile(error: unknown) {
  return errorCode(error) === "EEXIST"
}

export function hasFilename(file: UploadedImage | undefined): file is UploadedImage {
  return Boolean(file && file.originalname)
}

export function createImageStore(root: string): ImageStore {
  const folder = (category: string) => path.join(root, resolveCategory(category))

  // Exclusive create: a name taken by a concurrent submission gets a random suffix instead
  // of overwriting the other file.
  async function writeExclusive(dir: string, filename: string, data: Buffer): Promise<string> {
    try {
      await writeFile(path.join(dir, filename), data, { flag: "wx" })
      return filename
    } catch (error) {
      if (!isExistingFile(error)) throw error
    }
    const renamed = withSuffix(filename, randomUUID().slice(0, 8))
    await writeFile(path.join(dir, renamed), data, { flag: "wx" })
    return renamed
  }

  return {
    root,

    async ensureFolders() {
      await mkdir(root, { recursive: true })
      await Promise.all(REPORT_CATEGORIES.map((category) => mkdir(path.join(root, category), { recursive: true })))
    },

    async saveImages(category, files, now) {
      const dir = folder(category)
      await mkdir(dir, { recursive: true })
      const timestamp = fileTimestamp(now)
      const saved: string[] = []

      for (const [index, file] of files.entries()) {
        if (!hasFilename(file)) continue
        const filename = imageFilename(timestamp, index + 1, file.originalname)
        try {
          const stored = await writeExclusive(dir, filename, file.buffer)
          log.debug("saved image", { path: path.join(dir, stored) })
          saved.push(stored)
        } catch (error) {
          log.error("failed to save image", { filename, error: describeError(error) })
        }
      }
      return saved
    },

    async discard(category, filenames) {
      const dir = folder(category)
      for (const filename of filenames) {
        try {
          await rm(path.join(dir, filename), { force: true })
        } catch (error) {
          log.warn("failed to remove orphaned image", { filename, error: describeError(error) })
        }
      }
    },

    folderFor(category) {
      return isReportCategory(category) ? path.join(root, category) : null
    },
  }
}
