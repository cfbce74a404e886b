import { REPORT_CATEGORIES, type ReportCategory } from "../types"

export function isReportCategory(value: string): value is ReportCategory {
  return (REPORT_CATEGORIES as readonly string[]).includes(value)
}

export function resolveCategory(type: string | undefined): ReportCategory {
  const normalized = type?.toLowerCase() ?? ""
  return isReportCategory(normalized) ? normalized : "other"
}

export function capitalize(value: string) {
  return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase()
}
