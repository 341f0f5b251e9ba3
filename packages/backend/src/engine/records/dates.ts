export const DAY_MS = 24 * 60 * 60 * 1000;

// Spreadsheet serial day 0.
const SHEET_EPOCH_MS = Date.UTC(1899, 11, 30);

export function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

/** Whole days from `from` to `to`; negative when `to` is earlier. */
export function diffDays(from: Date, to: Date): number {
  return Math.floor((to.getTime() - from.getTime()) / DAY_MS);
}

export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Parse the date shapes ledgers carry: Date objects, ISO strings,
 * DD-MM-YYYY / DD/MM/YYYY / DD.MM.YYYY, and spreadsheet serial numbers.
 * Returns an invalid Date (NaN time) when nothing matches.
 */
export function parseLedgerDate(value: Date | string | number): Date {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? value : startOfUtcDay(value);
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value <= 0) return new Date(NaN);
    return new Date(SHEET_EPOCH_MS + Math.floor(value) * DAY_MS);
  }

  const text = value.trim();
  const dayFirst = /^(\d{1,2})[-/.](\d{1,2})[-/.](\d{4})$/.exec(text);
  if (dayFirst) {
    const [, d, m, y] = dayFirst;
    return strictUtcDate(Number(y), Number(m), Number(d));
  }

  const isoDate = /^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/.exec(text);
  if (isoDate) {
    const [, y, m, d] = isoDate;
    return strictUtcDate(Number(y), Number(m), Number(d));
  }

  return new Date(NaN);
}

function strictUtcDate(year: number, month: number, day: number): Date {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return new Date(NaN);
  }
  return date;
}
