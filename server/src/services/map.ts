import { resolveCategory } from "../lib/category"
import type { MarkerColor, Report, ReportCategory, ReportMarkerCollection } from "../types"

const MARKER_COLORS: Record<ReportCategory, MarkerColor> = {
  pollution: "red",
  deforestation: "darkred",
  improvement: "green",
  other: "orange",
}

export interface RasterStyle {
  version: 8
  name: string
  sources: Record<string, { type: "raster"; tiles: string[]; tileSize: number; attribution: string }>
  layers: Array<{ id: string; type: "raster"; source: string }>
}

function buildRasterStyle(id: string, tileUrls: string[], attribution: string, tileSize = 256): RasterStyle {
  return {
    version: 8,
    name: id,
    sources: {
      basemap: {
        type: "raster",
        tiles: tileUrls,
        tileSize,
        attribution,
      },
    },
    layers: [
      {
        id: `${id}-raster-layer`,
        type: "raster",
        source: "basemap",
      },
    ],
  }
}

export function basemapStyle(): RasterStyle {
  return buildRasterStyle(
    "street",
    ["https://tile.openstreetmap.org/{z}/{x}/{y}.png"],
    "(C) OpenStreetMap contributors"
  )
}

/** GeoJSON positions are `[lon, lat]`, so `coord_y` comes first. */
export function reportMarkers(reports: Report[]): ReportMarkerCollection {
  return {
    type: "FeatureCollection",
    features: reports.map((report) => {
      const category = resolveCategory(report.type)
      return {
        type: "Feature",
        geometry: { type: "Point", coordinates: [report.coord_y, report.coord_x] },
        properties: {
          type: report.type,
          category,
          description: report.description,
          datetime: report.datetime,
          color: MARKER_COLORS[category],
          images: report.images.map((filename) => `/uploads/${category}/${encodeURIComponent(filename)}`),
        },
      }
    }),
  }
}
