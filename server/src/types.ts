import type { Feature, FeatureCollection, Point } from "geojson"

export const REPORT_CATEGORIES = ["pollution", "deforestation", "improvement", "other"] as const

export type ReportCategory = (typeof REPORT_CATEGORIES)[number]

export interface Report {
  type: string
  location: string
  description: string
  coord_x: number
  coord_y: number
  datetime: string
  images: string[]
}

export interface UploadedImage {
  originalname: string
  buffer: Buffer
}

export type SubmissionFields = Record<string, unknown>

export type MarkerColor = "red" | "darkred" | "green" | "orange"

export interface MarkerProperties {
  type: string
  category: ReportCategory
  description: string
  datetime: string
  color: MarkerColor
  images: string[]
}

export type ReportMarker = Feature<Point, MarkerProperties>

export type ReportMarkerCollection = FeatureCollection<Point, MarkerProperties>

export interface ErrorBody {
  status: "error"
  message: string
  code: string
}
