import * as ExcelJS from "exceljs"
import { capitalize, resolveCategory } from "../lib/category"
import { REPORT_CATEGORIES, type Report, type ReportCategory } from "../types"

const MAX_COLUMN_WIDTH = 40
const MIRROR_TABLE_STYLE = "TableStyleMedium9"
export const EXPORT_SHEET_NAME = "Reports"

type CellValue = string | number

function cellValue(report: Report, key: string): CellValue {
  const record: Record<string, unknown> = { ...report }
  const value = record[key]
  if (Array.isArray(value)) return value.map(String).join(", ")
  if (typeof value === "number" || typeof value === "string") return value
  if (value === undefined || value === null) return ""
  return String(value)
}

function fitColumns(sheet: ExcelJS.Worksheet, header: string[], rows: CellValue[][]) {
  header.forEach((name, index) => {
    const longest = rows.reduce((max, row) => Math.max(max, String(row[index] ?? "").length), name.length)
    sheet.getColumn(index + 1).width = Math.min(longest + 2, MAX_COLUMN_WIDTH)
  })
}

export function groupByCategory(reports: Report[]): Map<ReportCategory, Report[]> {
  const grouped = new Map<ReportCategory, Report[]>(REPORT_CATEGORIES.map((category) => [category, []]))
  for (const report of reports) {
    grouped.get(resolveCategory(report.type))?.push(report)
  }
  return grouped
}

/**
 * One sheet per non-empty category, each laid out as a styled Excel table whose header
 * is the capitalized field names of the group's first report.
 */
export function buildMirrorWorkbook(reports: Report[]): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook()
  for (const [category, group] of groupByCategory(reports)) {
    if (group.length === 0) continue
    const sheetName = capitalize(category)
    const sheet = workbook.addWorksheet(sheetName)
    const keys = Object.keys(group[0])
    const header = keys.map(capitalize)
    const rows = group.map((report) => keys.map((key) => cellValue(report, key)))

    sheet.addTable({
      name: `${sheetName}Table`,
      ref: "A1",
      headerRow: true,
      totalsRow: false,
      style: {
        theme: MIRROR_TABLE_STYLE,
        showFirstColumn: false,
        showLastColumn: false,
        showRowStripes: true,
        showColumnStripes: false,
      },
      columns: header.map((name) => ({ name, filterButton: true })),
      rows,
    })
    fitColumns(sheet, header, rows)
  }
  return workbook
}

/** Single sheet with every report in stored order; header is the union of stored keys. */
export function buildExportWorkbook(reports: Report[]): ExcelJS.Workbook {
  const keys: string[] = []
  for (const report of reports) {
    for (const key of Object.keys(report)) {
      if (!keys.includes(key)) keys.push(key)
    }
  }

  const workbook = new ExcelJS.Workbook()
  const sheet = workbook.addWorksheet(EXPORT_SHEET_NAME)
  const rows = reports.map((report) => keys.map((key) => cellValue(report, key)))
  sheet.addRow(keys)
  sheet.addRows(rows)
  sheet.getRow(1).font = { bold: true }
  fitColumns(sheet, keys, rows)
  return workbook
}
