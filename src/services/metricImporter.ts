// src/services/metricImporter.ts
// Upserts normalized CSV rows into daily_metrics, one statement per row

import { errorMessage, StorageError } from "../utils/errors";
import { CsvRecord, ResolvedMapping } from "./csvColumnMapper";
import { HealthStore } from "./healthStore";
import { normalizeMetricRow } from "./normalizers/metricNormalizer";

export interface RejectedRow {
  row: number;
  value: string;
  reason: string;
}

export interface ImportSummary {
  processed: number;
  skipped: number;
  rejected: RejectedRow[];
}

/**
 * Writes every usable record, in file order. Later rows for the same date
 * replace earlier ones. The batch is not atomic: when the store fails, rows
 * already written stay and the error reports how many there were.
 */
export async function importDailyMetrics(
  store: HealthStore,
  records: CsvRecord[],
  mapping: ResolvedMapping
): Promise<ImportSummary> {
  const summary: ImportSummary = { processed: 0, skipped: 0, rejected: [] };

  for (const record of records) {
    const result = normalizeMetricRow(record.cells, mapping);

    if (result.status === "skipped") {
      summary.skipped++;
      continue;
    }

    if (result.status === "rejected") {
      summary.rejected.push({ row: record.row, value: result.value, reason: result.reason });
      continue;
    }

    try {
      await store.upsertDailyMetric(result.metric);
    } catch (err) {
      console.error(`[Import] Upsert failed at row ${record.row}:`, err);
      throw new StorageError(
        `Failed to save row ${record.row}; ${summary.processed} row(s) were saved before the error: ${errorMessage(err)}`,
        { processed: summary.processed, failedRow: record.row }
      );
    }
    summary.processed++;
  }

  console.log(
    `[Import] Daily metrics saved: ${summary.processed} processed, ` +
      `${summary.skipped} skipped, ${summary.rejected.length} rejected`
  );

  return summary;
}
