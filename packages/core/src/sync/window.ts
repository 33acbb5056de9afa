/**
 * Sync Window
 *
 * The rolling UTC range within which events are fetched and within which
 * new events may be written. Both ends are inclusive.
 */

import { DateTime } from 'luxon'

export interface TimeWindow {
  /** Start of the first UTC day */
  floor: DateTime
  /** Last representable instant of the final UTC day */
  ceiling: DateTime
}

/**
 * Derive the window from the current instant and two day offsets.
 * pastDays = futureDays = 0 yields the current UTC day.
 */
export function computeWindow(now: Date | DateTime, pastDays: number, futureDays: number): TimeWindow {
  assertDayCount('pastDays', pastDays)
  assertDayCount('futureDays', futureDays)

  const today = toUtc(now).startOf('day')

  return {
    floor: today.minus({ days: pastDays }),
    ceiling: today.plus({ days: futureDays }).endOf('day'),
  }
}

export function isWithinWindow(instant: DateTime, window: TimeWindow): boolean {
  const ms = instant.toMillis()
  return ms >= window.floor.toMillis() && ms <= window.ceiling.toMillis()
}

/**
 * Human-readable form for logs and the CLI
 */
export function formatWindow(window: TimeWindow): string {
  const pattern = "yyyy-MM-dd'T'HH:mm:ss.SSS'Z'"
  return `${window.floor.toFormat(pattern)} .. ${window.ceiling.toFormat(pattern)}`
}

function toUtc(now: Date | DateTime): DateTime {
  return (now instanceof Date ? DateTime.fromJSDate(now) : now).toUTC()
}

function assertDayCount(label: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${label} must be a non-negative integer, got ${value}`)
  }
}
