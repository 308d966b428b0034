/**
 * Core Branded Types
 */

export type { CalendarDate, Weekday } from './calendar'

declare const __duration: unique symbol

/** Signed whole-day span between two materialized dates */
export type Duration = number & { readonly [__duration]: true }

export function makeDuration(days: number): Duration {
  return days as Duration
}
