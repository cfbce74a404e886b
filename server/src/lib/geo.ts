const LOCATION_PREFIXES = ["Lat: ", "Lon: "]
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

/** Decimal (optionally exponent) notation only; hex, binary and octal literals are rejected. */
export function parseCoordinate(raw: string): number | null {
  const trimmed = raw.trim()
  if (!DECIMAL_PATTERN.test(trimmed)) return null
  const value = Number(trimmed)
  return Number.isFinite(value) ? value : null
}

/** Parses a `Lat: <lat>, Lon: <lon>` label into `[lat, lon]`. */
export function parseLocationLabel(location: string): [number, number] | null {
  let stripped = location
  for (const prefix of LOCATION_PREFIXES) {
    stripped = stripped.replaceAll(prefix, "")
  }
  const parts = stripped.split(", ")
  if (parts.length !== 2) return null
  const lat = parseCoordinate(parts[0])
  const lon = parseCoordinate(parts[1])
  if (lat === null || lon === null) return null
  return [lat, lon]
}
