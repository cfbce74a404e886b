import { access, mkdtemp, readdir, rm } from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import * as ExcelJS from "exceljs"
import { NotFoundError, StorageError, ValidationError } from "../lib/errors"
import type { UploadedImage } from "../types"
import { createImageStore, type ImageStore } from "./images"
import { EXPORT_SHEET_NAME } from "./workbook"
import { MAX_DESCRIPTION_LENGTH, createReportService, type ReportService } from "./reports"
import { createReportStore, type ReportStore } from "./store"

const NOW = new Date(2024, 0, 5, 9, 3, 7)

const photo = (name = "river.jpg"): UploadedImage => ({ originalname: name, buffer: Buffer.from("image-bytes") })

const validFields = {
  type: "pollution",
  reportLocation: "Lat: 35.92, Lon: 74.30",
  description: "Plastic waste dumped near the river",
}

describe("report service", () => {
  let dir: string
  let store: ReportStore
  let images: ImageStore
  let service: ReportService

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "report-service-"))
    store = createReportStore({
      reportsFile: path.join(dir, "reports.json"),
      workbookFile: path.join(dir, "reports.xlsx"),
    })
    images = createImageStore(path.join(dir, "report_images"))
    service = createReportService({ store, images, now: () => NOW })
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  describe("submitReport", () => {
    test("persists exactly one report with coordinates from the location label", async () => {
      const report = await service.submitReport(validFields, [photo()])

      expect(report).toEqual({
        type: "pollution",
        location: "Lat: 35.92, Lon: 74.30",
        description: "Plastic waste dumped near the river",
        coord_x: 35.92,
        coord_y: 74.3,
        datetime: "2024-01-05 09:03:07",
        images: ["20240105_090307_1.jpg"],
      })
      await expect(service.listReports()).resolves.toEqual([report])
      await expect(access(path.join(images.root, "pollution", "20240105_090307_1.jpg"))).resolves.toBeUndefined()
    })

    test("round-trips fields through the store", async () => {
      const submitted = await service.submitReport(
        { ...validFields, coordX: "36.3", coordY: "74.65" },
        [photo("a.jpg"), photo("b.png")]
      )

      const [stored] = await service.listReports()
      expect(stored.type).toBe(submitted.type)
      expect(stored.description).toBe(submitted.description)
      expect(stored.coord_x).toBe(36.3)
      expect(stored.coord_y).toBe(74.65)
      expect(stored.images).toEqual(["20240105_090307_1.jpg", "20240105_090307_2.png"])
    })

    test("keeps the client's type but files images under the resolved category", async () => {
      const report = await service.submitReport({ ...validFields, type: "Litter" }, [photo()])

      expect(report.type).toBe("Litter")
      await expect(readdir(path.join(images.root, "other"))).resolves.toEqual(["20240105_090307_1.jpg"])
    })

    test("accepts the alternative form field names", async () => {
      const report = await service.submitReport(
        {
          reportType: "Deforestation",
          location: "Lat: 1, Lon: 2",
          reportDescription: "Trees cut along the ridge",
        },
        [photo()]
      )

      expect(report.type).toBe("Deforestation")
      expect(report.description).toBe("Trees cut along the ridge")
      expect([report.coord_x, report.coord_y]).toEqual([1, 2])
    })

    test("missing description is rejected before anything is written", async () => {
      const { description: _omitted, ...fields } = validFields

      await expect(service.submitReport(fields, [photo()])).rejects.toEqual(
        new ValidationError("Missing required fields")
      )
      await expect(service.listReports()).resolves.toEqual([])
      await expect(access(images.root)).rejects.toThrow()
    })

    test("a description over the limit is rejected", async () => {
      const fields = { ...validFields, description: "x".repeat(MAX_DESCRIPTION_LENGTH + 1) }

      await expect(service.submitReport(fields, [photo()])).rejects.toEqual(
        new ValidationError("Description too long.")
      )
    })

    test("a description at the limit is accepted", async () => {
      const fields = { ...validFields, description: "x".repeat(MAX_DESCRIPTION_LENGTH) }

      await expect(service.submitReport(fields, [photo()])).resolves.toMatchObject({ coord_x: 35.92 })
    })

    test("description length counts code points, not UTF-16 units", async () => {
      const description = "🌳".repeat(MAX_DESCRIPTION_LENGTH)
      expect(description.length).toBe(MAX_DESCRIPTION_LENGTH * 2)

      const report = await service.submitReport({ ...validFields, description }, [photo()])
      expect(report.description).toBe(description)
    })

    test("hex and binary coordinates in the location label are rejected", async () => {
      const fields = { ...validFields, reportLocation: "Lat: 0x10, Lon: 0b11" }

      await expect(service.submitReport(fields, [photo()])).rejects.toEqual(
        new ValidationError("Invalid location format")
      )
    })

    test("an unparseable location without coordinates is rejected", async () => {
      const fields = { ...validFields, reportLocation: "Near the old bridge" }

      await expect(service.submitReport(fields, [photo()])).rejects.toEqual(
        new ValidationError("Invalid location format")
      )
    })

    test("a single explicit coordinate falls back to the location label", async () => {
      const report = await service.submitReport({ ...validFields, coordX: "10" }, [photo()])

      expect([report.coord_x, report.coord_y]).toEqual([35.92, 74.3])
    })

    test("non-numeric explicit coordinates are rejected", async () => {
      const fields = { ...validFields, coordX: "north", coordY: "74" }

      await expect(service.submitReport(fields, [photo()])).rejects.toBeInstanceOf(ValidationError)
    })

    test("zero images is rejected without touching the file system", async () => {
      await expect(service.submitReport(validFields, [])).rejects.toEqual(
        new ValidationError("At least one image is required.")
      )
      await expect(service.submitReport(validFields, [photo("")])).rejects.toBeInstanceOf(ValidationError)
      await expect(access(images.root)).rejects.toThrow()
      await expect(access(path.join(dir, "reports.json"))).rejects.toThrow()
    })

    test("fails with a storage error when no image could be saved", async () => {
      const failingImages: ImageStore = { ...images, saveImages: async () => [] }
      const failing = createReportService({ store, images: failingImages, now: () => NOW })

      await expect(failing.submitReport(validFields, [photo()])).rejects.toEqual(
        new StorageError("Failed to save images.")
      )
      await expect(service.listReports()).resolves.toEqual([])
    })

    test("removes saved images when the report cannot be stored", async () => {
      const brokenStore: ReportStore = {
        ...store,
        append: async () => {
          throw new StorageError("Failed to write reports file.")
        },
      }
      const failing = createReportService({ store: brokenStore, images, now: () => NOW })

      await expect(failing.submitReport(validFields, [photo()])).rejects.toBeInstanceOf(StorageError)
      await expect(readdir(path.join(images.root, "pollution"))).resolves.toEqual([])
    })

    test("two concurrent submissions are both kept", async () => {
      const [first, second] = await Promise.all([
        service.submitReport({ ...validFields, description: "first" }, [photo()]),
        service.submitReport({ ...validFields, description: "second" }, [photo()]),
      ])

      const reports = await service.listReports()
      expect(reports.map((report) => report.description).sort()).toEqual(["first", "second"])
      expect(first.images[0]).not.toBe(second.images[0])
    })
  })

  describe("exportWorkbook", () => {
    test("fails with not found when there are no reports", async () => {
      await expect(service.exportWorkbook()).rejects.toEqual(new NotFoundError("No reports to export."))
    })

    test("contains one data row per report", async () => {
      await service.submitReport(validFields, [photo()])

      const workbook = new ExcelJS.Workbook()
      await workbook.xlsx.load(await service.exportWorkbook())

      const sheet = workbook.getWorksheet(EXPORT_SHEET_NAME)
      expect(sheet?.rowCount).toBe(2)
      expect(sheet?.getCell("C2").value).toBe("Plastic waste dumped near the river")
    })
  })
})
