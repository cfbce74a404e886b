import { parseCoordinate, parseLocationLabel } from "./geo"

describe("parseLocationLabel", () => {
  test("reads the Lat/Lon label", () => {
    expect(parseLocationLabel("Lat: 35.92, Lon: 74.30")).toEqual([35.92, 74.3])
  })

  test("accepts a bare pair", () => {
    expect(parseLocationLabel("-12.5, 130")).toEqual([-12.5, 130])
  })

  test("rejects free text", () => {
    expect(parseLocationLabel("Near the old bridge")).toBeNull()
  })

  test("rejects a missing number", () => {
    expect(parseLocationLabel("Lat: , Lon: 5")).toBeNull()
  })

  test("rejects extra parts", () => {
    expect(parseLocationLabel("Lat: 1, Lon: 2, Alt: 3")).toBeNull()
  })
})

describe("parseCoordinate", () => {
  test("trims whitespace", () => {
    expect(parseCoordinate(" 12.5 ")).toBe(12.5)
  })

  test("rejects trailing garbage", () => {
    expect(parseCoordinate("1.5abc")).toBeNull()
  })

  test("accepts exponent notation", () => {
    expect(parseCoordinate("3.5e1")).toBe(35)
    expect(parseCoordinate("-.5")).toBe(-0.5)
  })

  test("rejects hex, binary and octal literals", () => {
    expect(parseCoordinate("0x10")).toBeNull()
    expect(parseCoordinate("0b11")).toBeNull()
    expect(parseCoordinate("0o7")).toBeNull()
  })

  test("rejects empty input", () => {
    expect(parseCoordinate("")).toBeNull()
  })
})
