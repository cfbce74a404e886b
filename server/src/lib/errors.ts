import type { ErrorBody } from "../types"

export class AppError extends Error {
  readonly status: number
  readonly code: string

  constructor(message: string, status: number, code: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.status = status
    this.code = code
  }

  toBody(): ErrorBody {
    return { status: "error", message: this.message, code: this.code }
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, "BAD_REQUEST")
  }
}

export class StorageError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 500, "STORAGE_FAILED", options)
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, "NOT_FOUND")
  }
}

/** Only raised inside outbound clients; callers turn it into a fallback value. */
export class ExternalServiceError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 502, "EXTERNAL_SERVICE_FAILED", options)
  }
}

export function describeError(error: unknown): string {
  if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
    return error.message
  }
  return String(error)
}

/**
 * `code` of a system error. Checked by shape: errors raised by Node built-ins can come from
 * another realm, where `instanceof Error` is false.
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) return undefined
  return typeof error.code === "string" ? error.code : undefined
}

/** HTTP status of a 4xx error raised by middleware such as body-parser. */
export function clientErrorStatus(error: unknown): number | null {
  if (typeof error !== "object" || error === null || !("status" in error)) return null
  const { status } = error
  return typeof status === "number" && status >= 400 && status < 500 ? status : null
}
