const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export function todayDateOnly(now: Date = new Date()): string {
  return now.toISOString().slice(0, 10);
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

export function formatDateOnly(year: number, month: number, day: number): string {
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

/** True when year/month/day name a real day of the Gregorian calendar. */
export function isValidCalendarDay(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const lastDay = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= lastDay;
}

/** Strict `YYYY-MM-DD` check, rejecting things like 2024-02-30. */
export function isCalendarDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) return false;
  return isValidCalendarDay(Number(match[1]), Number(match[2]), Number(match[3]));
}

export function addDays(dateOnly: string, days: number): string {
  const d = new Date(`${dateOnly}T00:00:00Z`);
  d.setUTCDate(d.getUTCDate() + days);
  return d.toISOString().slice(0, 10);
}

/** Local wall-clock `YYYY-MM-DD HH:MM:SS`, the meal timestamp format. */
export function formatLocalTimestamp(date: Date = new Date()): string {
  return (
    `${formatDateOnly(date.getFullYear(), date.getMonth() + 1, date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
