// Date and time cell parsing for CGR-30P logs (local time)

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

export interface CalendarDate {
  year: number;
  month: number; // 1-12
  day: number;
}

export interface ClockTime {
  hour: number;
  minute: number;
  second: number;
}

function expandYear(year: number): number {
  if (year >= 100) return year;
  return year < 50 ? 2000 + year : 1900 + year;
}

function daysInMonth(year: number, month: number): number {
  return new Date(year, month, 0).getDate();
}

function validDate(year: number, month: number, day: number): CalendarDate | null {
  const fullYear = expandYear(year);
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(fullYear, month)) return null;
  return { year: fullYear, month, day };
}

/**
 * Accepts MM/DD/YYYY, YYYY-MM-DD and DD-Mon-YYYY.
 */
export function parseDate(cell: string): CalendarDate | null {
  const text = cell.trim();

  let m = /^(\d{1,2})\/(\d{1,2})\/(\d{2}|\d{4})$/.exec(text);
  if (m) return validDate(parseInt(m[3], 10), parseInt(m[1], 10), parseInt(m[2], 10));

  m = /^(\d{4})-(\d{1,2})-(\d{1,2})$/.exec(text);
  if (m) return validDate(parseInt(m[1], 10), parseInt(m[2], 10), parseInt(m[3], 10));

  m = /^(\d{1,2})-([A-Za-z]{3})-(\d{2}|\d{4})$/.exec(text);
  if (m) {
    const month = MONTHS.indexOf(m[2].toLowerCase()) + 1;
    return validDate(parseInt(m[3], 10), month, parseInt(m[1], 10));
  }

  return null;
}

/** HH:MM or HH:MM:SS, 24-hour. */
export function parseTime(cell: string): ClockTime | null {
  const m = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/.exec(cell.trim());
  if (!m) return null;

  const hour = parseInt(m[1], 10);
  const minute = parseInt(m[2], 10);
  const second = m[3] ? parseInt(m[3], 10) : 0;
  if (hour > 23 || minute > 59 || second > 59) return null;
  return { hour, minute, second };
}

/** A date and a time separated by whitespace or `T`. */
export function parseDateTime(cell: string): Date | null {
  const text = cell.trim();
  const parts = /^\d{4}-\d{1,2}-\d{1,2}T/.test(text) ? text.split('T') : text.split(/\s+/);
  if (parts.length !== 2) return null;
  const date = parseDate(parts[0]);
  const time = parseTime(parts[1]);
  return date && time ? combine(date, time) : null;
}

export function combine(date: CalendarDate, time: ClockTime): Date {
  return new Date(date.year, date.month - 1, date.day, time.hour, time.minute, time.second);
}
