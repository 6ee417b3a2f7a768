import { DailyMetricInput } from "../../domain/types";
import { formatDateOnly, isCalendarDate, isValidCalendarDay } from "../../utils/date";
import { CanonicalField, ResolvedMapping } from "../csvColumnMapper";

export type DateNormalization =
  | { ok: true; date: string }
  | { ok: false; reason: string };

export type RowNormalization =
  | { status: "ok"; metric: DailyMetricInput }
  | { status: "skipped"; reason: string }
  | { status: "rejected"; value: string; reason: string };

// 2024-03-05, 2024/03/05 14:30, 2024-03-05T14:30:00.000+02:00
const YMD_DATETIME =
  /^(\d{4})[-/.](\d{1,2})[-/.](\d{1,2})(?:[T ]\d{1,2}:\d{2}(?::\d{2}(?:\.\d+)?)?\s*(?:Z|[+-]\d{2}:?\d{2})?)?$/i;
// 3/5/2024, 03/05/2024 2:30 PM (month first)
const MDY_DATETIME =
  /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:[T ]\d{1,2}:\d{2}(?::\d{2})?(?:\s?[AP]M)?)?$/i;

/**
 * Reads a calendar day out of a date or date-time string, keeping the day as
 * written (an offset or `Z` suffix does not shift it).
 */
export function parseCalendarDay(value: string): string | null {
  let year: number;
  let month: number;
  let day: number;

  const ymd = YMD_DATETIME.exec(value);
  const mdy = ymd ? null : MDY_DATETIME.exec(value);

  if (ymd) {
    [year, month, day] = [Number(ymd[1]), Number(ymd[2]), Number(ymd[3])];
  } else if (mdy) {
    [year, month, day] = [Number(mdy[3]), Number(mdy[1]), Number(mdy[2])];
  } else {
    return null;
  }

  return isValidCalendarDay(year, month, day) ? formatDateOnly(year, month, day) : null;
}

/**
 * Reduces an imported date cell to `YYYY-MM-DD`.
 *
 * Values longer than 10 characters carry a time of day: they are parsed, and
 * when that fails the first 10 characters are tried instead. Whatever comes
 * out has to be a real calendar day, otherwise the value is rejected.
 */
export function normalizeDate(raw: string): DateNormalization {
  const value = raw.trim();

  if (value.length > 10) {
    const parsed = parseCalendarDay(value);
    if (parsed) return { ok: true, date: parsed };

    const truncated = value.slice(0, 10);
    if (isCalendarDate(truncated)) return { ok: true, date: truncated };

    return { ok: false, reason: `Unrecognized date "${value}"` };
  }

  if (isCalendarDate(value)) return { ok: true, date: value };

  const parsed = parseCalendarDay(value);
  if (parsed) return { ok: true, date: parsed };

  return { ok: false, reason: `Unrecognized date "${value}"` };
}

// Plain decimal only: no hex, binary or octal literals.
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

/** Missing, empty and unparseable cells all read as 0. */
export function coerceNumber(raw: string | undefined): number {
  if (raw === undefined) return 0;
  const value = raw.trim();
  if (!DECIMAL.test(value)) return 0;
  const n = Number(value);
  return Number.isFinite(n) ? n : 0;
}

/** Integer columns are INTEGER in Postgres; values outside int32 read as 0. */
export function coerceInteger(raw: string | undefined): number {
  const n = Math.trunc(coerceNumber(raw));
  return n < INT32_MIN || n > INT32_MAX ? 0 : n;
}

/**
 * Exports mix sleep minutes and sleep hours in the same column. Nobody sleeps
 * more than 24 hours, so anything above that is taken as minutes.
 */
export function sleepUnitHeuristic(value: number): number {
  return value > 24 ? value / 60 : value;
}

function cell(
  cells: Record<string, string>,
  mapping: ResolvedMapping,
  field: CanonicalField
): string | undefined {
  const header = mapping[field];
  return header === undefined ? undefined : cells[header];
}

/**
 * Turns one CSV record into a DailyMetric ready to upsert. Fields whose
 * column is unmapped or missing from the row become 0.
 */
export function normalizeMetricRow(
  cells: Record<string, string>,
  mapping: ResolvedMapping
): RowNormalization {
  const rawDate = cell(cells, mapping, "date");
  if (rawDate === undefined || rawDate.trim() === "") {
    return { status: "skipped", reason: "No date value in row" };
  }

  const date = normalizeDate(rawDate);
  if (!date.ok) {
    return { status: "rejected", value: rawDate, reason: date.reason };
  }

  return {
    status: "ok",
    metric: {
      date: date.date,
      steps: coerceInteger(cell(cells, mapping, "steps")),
      sleepHours: sleepUnitHeuristic(coerceNumber(cell(cells, mapping, "sleep_hours"))),
      deepSleepMinutes: coerceInteger(cell(cells, mapping, "deep_sleep_min")),
      minHeartRate: coerceInteger(cell(cells, mapping, "min_heart_rate")),
      maxHeartRate: coerceInteger(cell(cells, mapping, "max_heart_rate")),
      bodyWeight: coerceNumber(cell(cells, mapping, "body_weight")),
    },
  };
}
