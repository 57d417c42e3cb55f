/**
 * xsd:dateTime lexical check (RFC 7643 §2.3.5).
 *
 * Accepts `YYYY-MM-DDTHH:mm:ss`, an optional fraction of a second and an
 * optional `Z` / `±hh:mm` offset. Calendar fields are range checked, so
 * `2024-02-30T00:00:00Z` is rejected.
 */

const DATE_TIME_PATTERN =
  /^(-?\d{4,})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(\.\d+)?(Z|[+-](\d{2}):(\d{2}))?$/;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  return month === 2 && isLeapYear(year) ? 29 : DAYS_IN_MONTH[month - 1];
}

export function isXsdDateTime(value: string): boolean {
  const match = DATE_TIME_PATTERN.exec(value);
  if (!match) {
    return false;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const hour = Number(match[4]);
  const minute = Number(match[5]);
  const second = Number(match[6]);
  const fraction = match[7];

  // xsd:dateTime has no year zero
  if (year === 0 || month < 1 || month > 12) {
    return false;
  }
  if (day < 1 || day > daysInMonth(year, month)) {
    return false;
  }

  // 24:00:00 is the end-of-day form; nothing else past 23:59:59
  if (hour === 24) {
    if (minute !== 0 || second !== 0 || (fraction !== undefined && /[1-9]/.test(fraction))) {
      return false;
    }
  } else if (hour > 23 || minute > 59 || second > 59) {
    return false;
  }

  if (match[9] !== undefined) {
    const offsetHours = Number(match[9]);
    const offsetMinutes = Number(match[10]);
    if (offsetMinutes > 59 || offsetHours > 14 || (offsetHours === 14 && offsetMinutes !== 0)) {
      return false;
    }
  }

  return true;
}
