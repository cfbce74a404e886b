import path from "node:path"

function pad(value: number) {
  return String(value).padStart(2, "0")
}

/** `YYYYMMDD_HHMMSS` in local time. */
export function fileTimestamp(date: Date) {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  )
}

/** `YYYY-MM-DD HH:MM:SS` in local time. */
export function reportTimestamp(date: Date) {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  )
}

/**
 * Reduces a name to ASCII letters, digits, `_`, `.` and `-`, with whitespace and path
 * separators collapsed to `_` and no leading or trailing `.`/`_`.
 */
export function secureFilename(name: string) {
  const ascii = name.normalize("NFKD").replace(/[^\x00-\x7f]/g, "")
  return ascii
    .replace(/[\\/]/g, " ")
    .split(/\s+/)
    .filter(Boolean)
    .join("_")
    .replace(/[^A-Za-z0-9_.-]/g, "")
    .replace(/^[._]+|[._]+$/g, "")
}

export function imageFilename(timestamp: string, index: number, originalName: string) {
  return secureFilename(`${timestamp}_${index}${path.extname(originalName)}`)
}

export function withSuffix(filename: string, suffix: string) {
  const ext = path.extname(filename)
  return `${filename.slice(0, filename.length - ext.length)}_${suffix}${ext}`
}
