// src/routes/import.ts
// Wearable CSV import: preview the column mapping, then upsert daily metrics

import { Router, Request } from "express";
import multer from "multer";
import { asyncHandler } from "../middleware/asyncHandler";
import { sendSuccess } from "../middleware/responseHelper";
import { ColumnMapping, DEFAULT_COLUMN_MAPPING, mapCsv } from "../services/csvColumnMapper";
import { HealthStore } from "../services/healthStore";
import { importDailyMetrics } from "../services/metricImporter";
import { PayloadTooLargeError, ValidationError } from "../utils/errors";

const PREVIEW_ROWS = 5;

export interface ImportRouterOptions {
  uploadMaxBytes: number;
  columnMapping?: ColumnMapping;
}

/**
 * The file arrives either as multipart field "file" or as a JSON body
 * `{ csv_content: "..." }`. Both are held to the same byte limit; multer
 * enforces it for uploads.
 */
function readCsvContent(req: Request, maxBytes: number): Buffer | string {
  if (req.file?.buffer) return req.file.buffer;

  const body: unknown = req.body;
  if (
    typeof body === "object" &&
    body !== null &&
    "csv_content" in body &&
    typeof body.csv_content === "string" &&
    body.csv_content.length > 0
  ) {
    if (Buffer.byteLength(body.csv_content, "utf8") > maxBytes) {
      throw new PayloadTooLargeError(maxBytes);
    }
    return body.csv_content;
  }

  throw new ValidationError(
    "CSV file is required (multipart field 'file' or JSON field 'csv_content')"
  );
}

export function createImportRouter(store: HealthStore, options: ImportRouterOptions): Router {
  const router = Router();
  const columnMapping = options.columnMapping ?? DEFAULT_COLUMN_MAPPING;

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: options.uploadMaxBytes },
  });

  // ==========================================================================
  // GET /api/v1/import/metrics/columns
  // Expected header for each canonical field
  // ==========================================================================
  router.get("/metrics/columns", (_req, res) => {
    return sendSuccess(res, { mapping: columnMapping });
  });

  // ==========================================================================
  // POST /api/v1/import/metrics/preview
  // Parse + map only; shows which columns were recognized before commit
  // ==========================================================================
  router.post(
    "/metrics/preview",
    upload.single("file"),
    asyncHandler(async (req, res) => {
      const mapped = mapCsv(readCsvContent(req, options.uploadMaxBytes), columnMapping);

      return sendSuccess(res, {
        headers: mapped.headers,
        mapping: mapped.mapping,
        recognizedColumns: mapped.recognizedColumns,
        warnings: mapped.warnings,
        totalRows: mapped.records.length,
        preview: mapped.records.slice(0, PREVIEW_ROWS).map((r) => r.cells),
      });
    })
  );

  // ==========================================================================
  // POST /api/v1/import/metrics
  // Parse + map + upsert by date
  // ==========================================================================
  router.post(
    "/metrics",
    upload.single("file"),
    asyncHandler(async (req, res) => {
      const mapped = mapCsv(readCsvContent(req, options.uploadMaxBytes), columnMapping);
      console.log(`[Import] Columns mapped: ${mapped.recognizedColumns.join(", ")}`);
      mapped.warnings.forEach((w) => console.warn(`[Import] ${w}`));

      const summary = await importDailyMetrics(store, mapped.records, mapped.mapping);

      return sendSuccess(res, {
        recognizedColumns: mapped.recognizedColumns,
        totalRows: mapped.records.length,
        ...summary,
      });
    })
  );

  return router;
}

export default createImportRouter;
