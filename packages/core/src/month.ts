import type { MonthWindow } from "./types.js";

const MONTH_PATTERN = /^(\d{4})(\d{2})$/;

/** Accepts `YYYYMM` or `YYYY-MM` and returns the digits-only form. */
export function parseMonth(value: string): string {
  const digits = value.trim().replace(/-/g, "");
  const match = digits.match(MONTH_PATTERN);
  const month = Number(match?.[2]);
  if (!match || month < 1 || month > 12) {
    throw new Error(`Invalid month value: ${value}. Expected YYYYMM or YYYY-MM.`);
  }
  return digits;
}

/** UTC window `[start of month, start of next month)`. */
export function monthWindow(month: string): MonthWindow {
  const digits = parseMonth(month);
  const year = Number(digits.slice(0, 4));
  const index = Number(digits.slice(4, 6)) - 1;
  return {
    start: new Date(Date.UTC(year, index, 1)),
    end: new Date(Date.UTC(year, index + 1, 1))
  };
}

export function inWindow(timestamp: string, window: MonthWindow): boolean {
  const ts = new Date(timestamp).getTime();
  return ts >= window.start.getTime() && ts < window.end.getTime();
}
