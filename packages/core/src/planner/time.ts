// Day arithmetic happens in the planner's IANA zone through luxon; instants are carried as JS Dates.

import { DateTime, IANAZone } from 'luxon'
import type { ClockTime, DayOfWeek } from '../domain/schedule'
import { PlanInputError } from '../errors'

const DAY_KEY = /^\d{4}-\d{2}-\d{2}$/

export function minutesBetween(start: Date, end: Date): number {
  return Math.max(0, Math.floor((end.getTime() - start.getTime()) / 60000))
}

export function addMinutes(date: Date, minutes: number): Date {
  return new Date(date.getTime() + minutes * 60000)
}

export function compareAsc(a: Date, b: Date): number {
  return a.getTime() - b.getTime()
}

export function minuteBucket(date: Date): number {
  return Math.floor(date.getTime() / 60000)
}

export function assertValidDate(date: Date, label: string): void {
  if (Number.isNaN(date.getTime())) {
    throw new PlanInputError('invalid_date', `${label} is not a valid date`)
  }
}

export function assertTimeZone(zone: string): void {
  if (!IANAZone.isValidZone(zone)) {
    throw new PlanInputError('invalid_time_zone', `Unknown time zone "${zone}"`)
  }
}

function startOfDayKey(day: string, zone: string): DateTime {
  if (!DAY_KEY.test(day)) {
    throw new PlanInputError('invalid_day', `Expected a YYYY-MM-DD day, got "${day}"`)
  }
  assertTimeZone(zone)
  const start = DateTime.fromISO(day, { zone }).startOf('day')
  if (!start.isValid) {
    throw new PlanInputError('invalid_day', `"${day}" is not a calendar day`)
  }
  return start
}

// Half-open: [start, end)
export function dayBounds(day: string, zone: string): { start: Date; end: Date } {
  const start = startOfDayKey(day, zone)
  return { start: start.toJSDate(), end: start.plus({ days: 1 }).toJSDate() }
}

export function atClockTime(day: string, time: ClockTime, zone: string): Date {
  return startOfDayKey(day, zone).set({ hour: time.hour, minute: time.minute, second: 0, millisecond: 0 }).toJSDate()
}

export function toDayKey(date: Date, zone: string): string {
  assertValidDate(date, 'date')
  assertTimeZone(zone)
  return DateTime.fromJSDate(date, { zone }).toFormat('yyyy-MM-dd')
}

export function weekdayOf(day: string, zone: string): DayOfWeek {
  // luxon: Monday = 1 ... Sunday = 7
  const weekday = startOfDayKey(day, zone).weekday % 7
  return toDayOfWeek(weekday)
}

const DAYS_OF_WEEK: readonly DayOfWeek[] = [0, 1, 2, 3, 4, 5, 6]

export function toDayOfWeek(value: number): DayOfWeek {
  const day = DAYS_OF_WEEK.find((d) => d === value)
  if (day === undefined) {
    throw new PlanInputError('invalid_day', `Day of week out of range: ${value}`)
  }
  return day
}

export function dayKeysFrom(day: string, count: number, zone: string): string[] {
  const start = startOfDayKey(day, zone)
  return Array.from({ length: count }, (_, i) => start.plus({ days: i }).toFormat('yyyy-MM-dd'))
}

export function formatClock(date: Date, zone: string): string {
  return DateTime.fromJSDate(date, { zone }).toFormat('HH:mm')
}
