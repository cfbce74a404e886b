import path from "node:path"
import { z } from "zod"
import { LOG_LEVELS, type LogLevel } from "./lib/logger"

export interface AppConfig {
  port: number
  dataDir: string
  frontendOrigins: string[] | null
  logLevel: LogLevel
  maxUploadBytes: number
  maxUploadFiles: number
  translateApiUrl: string
  translateTimeoutMs: number
  mapCenter: [number, number]
  mapZoom: number
}

const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim()
    return trimmed ? trimmed : undefined
  })

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65_535).default(5000),
  DATA_DIR: optionalString,
  FRONTEND_ORIGIN: optionalString,
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
  MAX_UPLOAD_FILES: z.coerce.number().int().positive().default(10),
  TRANSLATE_API_URL: z.string().url().default("https://api.mymemory.translated.net/get"),
  TRANSLATE_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  MAP_CENTER_LAT: z.coerce.number().min(-90).max(90).default(35.9208),
  MAP_CENTER_LON: z.coerce.number().min(-180).max(180).default(74.3088),
  MAP_ZOOM: z.coerce.number().min(0).max(22).default(9),
})

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const field = issue?.path.join(".") ?? "environment"
    throw new Error(`Invalid configuration for ${field}: ${issue?.message ?? "unknown error"}`)
  }

  const vars = parsed.data
  return {
    port: vars.PORT,
    dataDir: path.resolve(vars.DATA_DIR ?? path.join(process.cwd(), "data")),
    frontendOrigins: vars.FRONTEND_ORIGIN
      ? vars.FRONTEND_ORIGIN.split(",").map((item) => item.trim()).filter(Boolean)
      : null,
    logLevel: vars.LOG_LEVEL,
    maxUploadBytes: vars.MAX_UPLOAD_BYTES,
    maxUploadFiles: vars.MAX_UPLOAD_FILES,
    translateApiUrl: vars.TRANSLATE_API_URL,
    translateTimeoutMs: vars.TRANSLATE_TIMEOUT_MS,
    mapCenter: [vars.MAP_CENTER_LAT, vars.MAP_CENTER_LON],
    mapZoom: vars.MAP_ZOOM,
  }
}
