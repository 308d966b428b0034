/**
 * Calendar Utilities
 *
 * Pure functions over concrete proleptic Gregorian dates.
 * Uses Julian Day Number for all day arithmetic to avoid month-length edge cases.
 * Zero external dependencies.
 */

// ============================================================================
// Types
// ============================================================================

/** A fully specified calendar date. Months and days are 1-based. */
export type CalendarDate = {
  readonly year: number
  readonly month: number
  readonly day: number
}

export type Weekday = 'mon' | 'tue' | 'wed' | 'thu' | 'fri' | 'sat' | 'sun'

// ============================================================================
// Helpers
// ============================================================================

const DAYS_IN_MONTH = [0, 31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29
  return DAYS_IN_MONTH[month] ?? 0
}

/** Longest a month can be in any year (February counts 29). */
export function maxDaysInMonth(month: number): number {
  if (month === 2) return 29
  return DAYS_IN_MONTH[month] ?? 0
}

export function daysInYear(year: number): number {
  return isLeapYear(year) ? 366 : 365
}

export function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

export function pad4(n: number): string {
  if (n < 0) return '-' + pad4(-n)
  if (n < 10) return '000' + n
  if (n < 100) return '00' + n
  if (n < 1000) return '0' + n
  return '' + n
}

// ============================================================================
// Julian Day Number
// ============================================================================

function dateToJDN(year: number, month: number, day: number): number {
  const a = Math.floor((14 - month) / 12)
  const y = year + 4800 - a
  const m = month + 12 * a - 3
  return (
    day +
    Math.floor((153 * m + 2) / 5) +
    365 * y +
    Math.floor(y / 4) -
    Math.floor(y / 100) +
    Math.floor(y / 400) -
    32045
  )
}

function jdnToDate(jdn: number): CalendarDate {
  const a = jdn + 32044
  const b = Math.floor((4 * a + 3) / 146097)
  const c = a - Math.floor(146097 * b / 4)
  const d = Math.floor((4 * c + 3) / 1461)
  const e = c - Math.floor(1461 * d / 4)
  const m = Math.floor((5 * e + 2) / 153)
  const day = e - Math.floor((153 * m + 2) / 5) + 1
  const month = m + 3 - 12 * Math.floor(m / 10)
  const year = 100 * b + d - 4800 + Math.floor(m / 10)
  return { year, month, day }
}

// ============================================================================
// Construction
// ============================================================================

export function makeCalendarDate(year: number, month: number, day: number): CalendarDate {
  return { year, month, day }
}

/** Local calendar components of a JS Date. */
export function fromJsDate(date: Date): CalendarDate {
  return { year: date.getFullYear(), month: date.getMonth() + 1, day: date.getDate() }
}

export function today(): CalendarDate {
  return fromJsDate(new Date())
}

// ============================================================================
// Arithmetic
// ============================================================================

export function addDays(date: CalendarDate, n: number): CalendarDate {
  return jdnToDate(dateToJDN(date.year, date.month, date.day) + n)
}

/**
 * Adds calendar months. The day is clamped to the length of the resulting
 * month, so Jan 31 + 1 month is Feb 28 (or 29).
 */
export function addMonths(date: CalendarDate, n: number): CalendarDate {
  const total = date.year * 12 + (date.month - 1) + n
  const year = Math.floor(total / 12)
  const month = total - year * 12 + 1
  const day = Math.min(date.day, daysInMonth(year, month))
  return { year, month, day }
}

export function daysBetween(a: CalendarDate, b: CalendarDate): number {
  return dateToJDN(b.year, b.month, b.day) - dateToJDN(a.year, a.month, a.day)
}

// ============================================================================
// Day-of-Week
// ============================================================================

const WEEKDAYS: Weekday[] = ['mon', 'tue', 'wed', 'thu', 'fri', 'sat', 'sun']

export function dayOfWeek(date: CalendarDate): Weekday {
  const jdn = dateToJDN(date.year, date.month, date.day)
  // JDN 0 is a Monday; 1970-01-01 (JDN 2440588) → index 3 → thu
  const idx = ((jdn % 7) + 7) % 7
  return WEEKDAYS[idx] ?? 'mon'
}

// ============================================================================
// Comparison
// ============================================================================

export function compareCalendarDates(a: CalendarDate, b: CalendarDate): -1 | 0 | 1 {
  const diff = daysBetween(b, a)
  if (diff < 0) return -1
  if (diff > 0) return 1
  return 0
}

// ============================================================================
// Diagnostic Names
// ============================================================================

const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
]

const WEEKDAY_NAMES: Record<Weekday, string> = {
  mon: 'Monday',
  tue: 'Tuesday',
  wed: 'Wednesday',
  thu: 'Thursday',
  fri: 'Friday',
  sat: 'Saturday',
  sun: 'Sunday',
}

export function monthName(month: number): string {
  return MONTH_NAMES[month - 1] ?? `Month ${month}`
}

/** "March 2019" */
export function formatMonthYear(year: number, month: number): string {
  return `${monthName(month)} ${year}`
}

/** "Friday, March 15, 2019" */
export function formatLongDate(date: CalendarDate): string {
  return `${WEEKDAY_NAMES[dayOfWeek(date)]}, ${monthName(date.month)} ${date.day}, ${date.year}`
}
