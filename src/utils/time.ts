import type { DateRange } from "../types.js";

const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

const pad = (value: number) => String(value).padStart(2, "0");

/**
 * Format a date as `YYYY-MM-DD` in local time
 */
export function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * Format a date as `YYYY-MM-DD HH:MM:SS` in local time, the layout stored in
 * every timestamp column
 */
export function formatTimestamp(date: Date): string {
  return `${formatDate(date)} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Parse a stored `YYYY-MM-DD HH:MM:SS` value as local time
 */
export function parseTimestamp(value: string): Date {
  return new Date(value.replace(" ", "T"));
}

/**
 * Check that a string is a real `YYYY-MM-DD` calendar date (rejects 2024-02-30)
 */
export function isCalendarDate(value: string): boolean {
  const match = CALENDAR_DATE.exec(value);
  if (!match) return false;

  const [, year, month, day] = match;
  const date = new Date(Number(year), Number(month) - 1, Number(day));
  return formatDate(date) === value;
}

/**
 * Expand two calendar dates to inclusive timestamp bounds
 */
export function dayRange(startDate: string, endDate: string): DateRange {
  return {
    start: `${startDate} 00:00:00`,
    end: `${endDate} 23:59:59`,
  };
}
