// src/services/csvColumnMapper.ts
// Maps a wearable export's header row onto the canonical daily-metric fields

import { parse } from "csv-parse/sync";
import { CsvParseError, errorMessage, NoRecognizedColumnsError } from "../utils/errors";

export const CANONICAL_FIELDS = [
  "date",
  "steps",
  "sleep_hours",
  "deep_sleep_min",
  "min_heart_rate",
  "max_heart_rate",
  "body_weight",
] as const;

export type CanonicalField = (typeof CANONICAL_FIELDS)[number];

/** Canonical field → header the vendor export is expected to use. */
export type ColumnMapping = Record<CanonicalField, string>;

/** Only the fields whose header was found in the file. */
export type ResolvedMapping = Partial<Record<CanonicalField, string>>;

// ==========================================================================
// Zepp / Amazfit export headers
// ==========================================================================

export const DEFAULT_COLUMN_MAPPING: ColumnMapping = {
  date: "date",
  steps: "steps",
  sleep_hours: "totalSleep",
  deep_sleep_min: "deepSleep",
  min_heart_rate: "minHeartRate",
  max_heart_rate: "maxHeartRate",
  body_weight: "weight",
};

const DATE_LIKE_HEADER = /date|time/i;

export interface CsvRecord {
  /** 1-based data row number (the header row is not counted). */
  row: number;
  /** Header → cell. Headers past the end of a short row are absent. */
  cells: Record<string, string>;
}

export interface CsvTable {
  headers: string[];
  records: CsvRecord[];
}

export interface MappedCsv extends CsvTable {
  mapping: ResolvedMapping;
  recognizedColumns: string[];
  /** Problems worth showing before the import is committed. */
  warnings: string[];
}

function isStringMatrix(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === "string"))
  );
}

/**
 * Parses CSV text into a header row plus records keyed by header.
 * When a header name repeats, the first column with that name is the one read.
 */
export function parseCsv(content: string | Buffer): CsvTable {
  let rows: unknown;
  try {
    rows = parse(content, {
      bom: true,
      skip_empty_lines: true,
      trim: true,
      relax_column_count: true,
    });
  } catch (err) {
    throw new CsvParseError(`Failed to parse CSV: ${errorMessage(err)}`);
  }

  if (!isStringMatrix(rows)) {
    throw new CsvParseError("Failed to parse CSV: unexpected parser output");
  }

  const [headers, ...dataRows] = rows;
  if (!headers || headers.length === 0) {
    throw new CsvParseError("CSV file is empty");
  }

  const firstIndex = new Map<string, number>();
  headers.forEach((h, i) => {
    if (!firstIndex.has(h)) firstIndex.set(h, i);
  });

  const records = dataRows.map((cellsInRow, i) => {
    const cells: Record<string, string> = {};
    for (const [header, index] of firstIndex) {
      if (index < cellsInRow.length) cells[header] = cellsInRow[index];
    }
    return { row: i + 1, cells };
  });

  return { headers, records };
}

/**
 * Resolves which header backs each canonical field. Expected headers match
 * exactly; only the date column falls back to the first header (in file
 * order) containing "date" or "time", case-insensitively.
 */
export function resolveColumnMapping(
  headers: string[],
  preferred: ColumnMapping = DEFAULT_COLUMN_MAPPING
): ResolvedMapping {
  const present = new Set(headers);
  const mapping: ResolvedMapping = {};

  for (const field of CANONICAL_FIELDS) {
    if (present.has(preferred[field])) {
      mapping[field] = preferred[field];
    }
  }

  if (!present.has(preferred.date)) {
    const fallback = headers.find((h) => DATE_LIKE_HEADER.test(h));
    if (fallback !== undefined) {
      mapping.date = fallback;
    }
  }

  return mapping;
}

export function recognizedColumns(mapping: ResolvedMapping): string[] {
  const columns: string[] = [];
  for (const field of CANONICAL_FIELDS) {
    const header = mapping[field];
    if (header !== undefined && !columns.includes(header)) columns.push(header);
  }
  return columns;
}

export function mappingWarnings(
  mapping: ResolvedMapping,
  preferred: ColumnMapping = DEFAULT_COLUMN_MAPPING
): string[] {
  const warnings: string[] = [];
  if (mapping.date === undefined) {
    warnings.push(
      `No date column found (expected "${preferred.date}" or a header containing "date" or "time"); every row will be skipped`
    );
  }
  return warnings;
}

/**
 * Parse + map in one step. Throws NoRecognizedColumnsError (listing the
 * headers that were found) when not a single field resolves.
 */
export function mapCsv(
  content: string | Buffer,
  preferred: ColumnMapping = DEFAULT_COLUMN_MAPPING
): MappedCsv {
  const table = parseCsv(content);
  const mapping = resolveColumnMapping(table.headers, preferred);
  const recognized = recognizedColumns(mapping);

  if (recognized.length === 0) {
    throw new NoRecognizedColumnsError(table.headers);
  }

  return {
    ...table,
    mapping,
    recognizedColumns: recognized,
    warnings: mappingWarnings(mapping, preferred),
  };
}
