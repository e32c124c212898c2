// ======================================
//	DateTime.ts - Epoch seconds to calendar and DOS date/time
// ======================================

/**
 * Calendar date and time in UTC, whole seconds
 */
export interface CalendarDateTime {
  readonly year: number;
  readonly month: number;   // 1-12
  readonly day: number;     // 1-31
  readonly hour: number;    // 0-23
  readonly minute: number;  // 0-59
  readonly second: number;  // 0-59
}

// Gregorian cycle lengths in days
const DAYS_IN_400_YEARS = 146097;
const DAYS_IN_100_YEARS = 36524;
const DAYS_IN_4_YEARS = 1461;
const DAYS_IN_YEAR = 365;

// 2001-01-01 opens a 400-year cycle; it lies 11323 days after 1970-01-01
const CYCLE_ANCHOR_YEAR = 2001;
const CYCLE_ANCHOR_DAYS = 11323;

// Day count of 2000-01-01, the last day handled by the 1960-anchored branch
const MILLENNIUM_DAYS = 10957;
const LEGACY_ANCHOR_YEAR = 1960;
const DAYS_1960_TO_1970 = 3653;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];
const DAYS_IN_MONTH_LEAP = [31, 29, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

// DOS dates start at 1980 and keep the year in 7 bits
const DOS_MIN_YEAR = 1980;
const DOS_MAX_YEAR = DOS_MIN_YEAR + 127;

interface YearDay {
  year: number;
  dayOfYear: number;
}

export function isLeapYear(year: number): boolean {
  return year % 4 === 0 && (year % 100 !== 0 || year % 400 === 0);
}

/**
 * Splits a day count after 2000-01-01 into a year and a zero-based day of that year
 */
function gregorianYearFromDays(days: number): YearDay {
  let rest = days - CYCLE_ANCHOR_DAYS;

  const n400 = Math.floor(rest / DAYS_IN_400_YEARS);
  rest -= n400 * DAYS_IN_400_YEARS;
  const n100 = Math.floor(rest / DAYS_IN_100_YEARS);
  rest -= n100 * DAYS_IN_100_YEARS;
  const n4 = Math.floor(rest / DAYS_IN_4_YEARS);
  rest -= n4 * DAYS_IN_4_YEARS;
  const n1 = Math.floor(rest / DAYS_IN_YEAR);
  rest -= n1 * DAYS_IN_YEAR;

  const year = CYCLE_ANCHOR_YEAR + n400 * 400 + n100 * 100 + n4 * 4 + n1;

  // Last day of a leap year (or of the leap century): the quotient overflows by one
  if (n1 === 4 || n100 === 4) {
    return { year: year - 1, dayOfYear: 365 };
  }
  return { year, dayOfYear: rest };
}

function gregorianMonthFromDays(dayOfYear: number, leap: boolean): { month: number; day: number } {
  const table = leap ? DAYS_IN_MONTH_LEAP : DAYS_IN_MONTH;
  let rest = dayOfYear;
  for (let i = 0; i < table.length; i++) {
    if (rest < table[i]) {
      return { month: i + 1, day: rest + 1 };
    }
    rest -= table[i];
  }
  return { month: 12, day: 31 };
}

/*
 * Days up to 2000-01-01 count in 4-year cycles from 1960-01-01 with every
 * year taken as 365 days. The day of year comes out one-based and the month
 * table is picked against the leap rule to absorb the cycle's leap day, so
 * January and February of the years after a leap year land one day late
 * (886273502 is 1998-02-01 19:05:02 here). Every day still maps to a real
 * calendar date; a few dates repeat.
 */
function legacyYearFromDays(days: number): YearDay {
  let rest = days + DAYS_1960_TO_1970;
  const n4 = Math.floor(rest / DAYS_IN_4_YEARS);
  rest -= n4 * DAYS_IN_4_YEARS;
  const n1 = Math.floor(rest / DAYS_IN_YEAR);
  rest -= n1 * DAYS_IN_YEAR;
  return { year: LEGACY_ANCHOR_YEAR + n4 * 4 + n1, dayOfYear: rest + 1 };
}

function legacyMonthFromDays(dayOfYear: number, leap: boolean): { month: number; day: number } {
  const table = leap ? DAYS_IN_MONTH : DAYS_IN_MONTH_LEAP;
  const calendar = leap ? DAYS_IN_MONTH_LEAP : DAYS_IN_MONTH;
  let rest = dayOfYear;
  for (let i = 0; i < table.length; i++) {
    if (rest <= table[i]) {
      // A remainder equal to the month length is that month's last day,
      // never past the last day the month really has (February 29)
      return { month: i + 1, day: Math.min(rest, calendar[i]) };
    }
    rest -= table[i];
  }
  return { month: 12, day: 31 };
}

/**
 * Converts seconds since 1970-01-01T00:00:00Z to a calendar date.
 * Fractions are truncated; negative and non-finite input map to the epoch.
 */
export function fromEpochSeconds(seconds: number): CalendarDateTime {
  const total = Number.isFinite(seconds) && seconds > 0 ? Math.floor(seconds) : 0;

  const second = total % 60;
  let rest = Math.floor(total / 60);
  const minute = rest % 60;
  rest = Math.floor(rest / 60);
  const hour = rest % 24;
  const days = Math.floor(rest / 24);

  let year: number;
  let month: number;
  let day: number;
  if (days > MILLENNIUM_DAYS) {
    const yd = gregorianYearFromDays(days);
    year = yd.year;
    ({ month, day } = gregorianMonthFromDays(yd.dayOfYear, isLeapYear(year)));
  } else {
    const yd = legacyYearFromDays(days);
    year = yd.year;
    ({ month, day } = legacyMonthFromDays(yd.dayOfYear, isLeapYear(year)));
  }

  return { year, month, day, hour, minute, second };
}

/**
 * Packs a calendar date into the 32-bit MS-DOS date/time used by ZIP headers.
 * Years DOS cannot hold (before 1980, after 2107) pack to 0.
 */
export function toDosTimestamp(dt: CalendarDateTime): number {
  if (dt.year < DOS_MIN_YEAR || dt.year > DOS_MAX_YEAR) {
    return 0;
  }
  return (
    (((dt.year - DOS_MIN_YEAR) << 25) |
      (dt.month << 21) |
      (dt.day << 16) |
      (dt.hour << 11) |
      (dt.minute << 5) |
      (dt.second >> 1)) >>>
    0
  );
}

/**
 * Unpacks a DOS date/time. Returns null for the zero sentinel.
 * Seconds come back even, the format keeps 2-second resolution.
 */
export function fromDosTimestamp(timeStamp: number): CalendarDateTime | null {
  if (timeStamp === 0) return null;

  const datePart = (timeStamp >>> 16) & 0xffff;
  const timePart = timeStamp & 0xffff;

  return {
    year: ((datePart >> 9) & 0x7f) + DOS_MIN_YEAR,
    month: (datePart >> 5) & 0x0f,
    day: datePart & 0x1f,
    hour: (timePart >> 11) & 0x1f,
    minute: (timePart >> 5) & 0x3f,
    second: (timePart & 0x1f) << 1,
  };
}

/**
 * Epoch seconds for a Date, or the number itself
 */
export function toEpochSeconds(time: Date | number): number {
  return time instanceof Date ? Math.floor(time.getTime() / 1000) : time;
}

export function nowEpochSeconds(): number {
  return Math.floor(Date.now() / 1000);
}
