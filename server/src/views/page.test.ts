import { basemapStyle } from "../services/map"
import { renderPage, scriptJson } from "./page"

describe("scriptJson", () => {
  test("escapes characters that could close the script element", () => {
    expect(scriptJson({ description: "</script><b>&" })).toBe(
      '{"description":"\\u003c/script\\u003e\\u003cb\\u003e\\u0026"}'
    )
  })
})

describe("renderPage", () => {
  test("centers the map on [lon, lat] and lists every category", () => {
    const html = renderPage({
      markers: { type: "FeatureCollection", features: [] },
      style: basemapStyle(),
      center: [35.9208, 74.3088],
      zoom: 9,
    })

    expect(html).toContain("center: [74.3088, 35.9208], zoom: 9")
    expect(html).toContain('<option value="deforestation">Deforestation</option>')
  })
})
