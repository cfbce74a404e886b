import { capitalize } from "../lib/category"
import type { RasterStyle } from "../services/map"
import { REPORT_CATEGORIES, type ReportMarkerCollection } from "../types"

const MAPLIBRE_VERSION = "4.7.1"

export interface PageOptions {
  markers: ReportMarkerCollection
  style: RasterStyle
  center: [number, number]
  zoom: number
}

/** JSON that is safe to place inside a `<script>` element. */
export function scriptJson(value: unknown) {
  return JSON.stringify(value)
    .replace(/</g, "\\u003c")
    .replace(/>/g, "\\u003e")
    .replace(/&/g, "\\u0026")
    .replace(/\u2028/g, "\\u2028")
    .replace(/\u2029/g, "\\u2029")
}

export function renderPage({ markers, style, center, zoom }: PageOptions) {
  const [lat, lon] = center
  const options = REPORT_CATEGORIES.map(
    (category) => `<option value="${category}">${capitalize(category)}</option>`
  ).join("")

  return `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8" />
<meta name="viewport" content="width=device-width, initial-scale=1" />
<title>Environmental Reports</title>
<link rel="stylesheet" href="https://unpkg.com/maplibre-gl@${MAPLIBRE_VERSION}/dist/maplibre-gl.css" />
<style>
  body { margin: 0; font-family: system-ui, sans-serif; display: grid; grid-template-columns: 360px 1fr; height: 100vh; }
  aside { padding: 16px; overflow-y: auto; border-right: 1px solid #ddd; }
  #map { height: 100%; }
  label { display: block; margin-top: 12px; font-size: 14px; }
  input, select, textarea { width: 100%; box-sizing: border-box; margin-top: 4px; }
  .marker { width: 14px; height: 14px; border-radius: 50%; border: 2px solid #fff; box-shadow: 0 0 2px #000; }
  #status { margin-top: 12px; font-size: 14px; }
</style>
</head>
<body>
<aside>
  <h1>Report an issue</h1>
  <form id="report-form">
    <label>Type <select name="type">${options}</select></label>
    <label>Location <input name="reportLocation" id="location" placeholder="Lat: 35.92, Lon: 74.30" required /></label>
    <label>Description <textarea name="description" maxlength="1000" rows="5" required></textarea></label>
    <label>Photos <input type="file" name="images" accept="image/*" multiple required /></label>
    <button type="submit">Submit report</button>
  </form>
  <div id="status"></div>
  <p><a href="/export_reports_excel">Download all reports (.xlsx)</a></p>
</aside>
<div id="map"></div>
<script src="https://unpkg.com/maplibre-gl@${MAPLIBRE_VERSION}/dist/maplibre-gl.js"></script>
<script>
  const markers = ${scriptJson(markers)};
  const map = new maplibregl.Map({ container: "map", style: ${scriptJson(style)}, center: [${lon}, ${lat}], zoom: ${zoom} });
  for (const feature of markers.features) {
    const el = document.createElement("div");
    el.className = "marker";
    el.style.background = feature.properties.color;
    const popup = document.createElement("div");
    const title = document.createElement("b");
    title.textContent = feature.properties.type;
    const text = document.createElement("p");
    text.textContent = feature.properties.description;
    popup.append(title, text);
    new maplibregl.Marker({ element: el })
      .setLngLat(feature.geometry.coordinates)
      .setPopup(new maplibregl.Popup({ maxWidth: "300px" }).setDOMContent(popup))
      .addTo(map);
  }
  map.on("click", (event) => {
    document.getElementById("location").value =
      "Lat: " + event.lngLat.lat.toFixed(5) + ", Lon: " + event.lngLat.lng.toFixed(5);
  });
  document.getElementById("report-form").addEventListener("submit", async (event) => {
    event.preventDefault();
    const status = document.getElementById("status");
    const response = await fetch("/submit_report", { method: "POST", body: new FormData(event.target) });
    const body = await response.json();
    status.textContent = response.ok ? "Report submitted." : body.message;
    if (response.ok) window.location.reload();
  });
</script>
</body>
</html>
`
}
