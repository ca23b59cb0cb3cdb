import { DateTime } from 'luxon'
import { Frequency, RRule, type Options } from 'rrule'
import type { RoutineInstance, RoutineTemplate } from '../domain/schedule'
import { DEFAULT_PLANNER_CONFIG, type PlannerConfig } from '../config'
import { issue, type PlanIssue } from '../errors'
import { logger } from '../logger'
import { addMinutes, dayBounds } from './time'

// Start hour when a rule carries no BYHOUR
const DEFAULT_HOUR: Partial<Record<Frequency, number>> = {
  [Frequency.DAILY]: 9,
  [Frequency.WEEKLY]: 10,
  [Frequency.MONTHLY]: 11,
}

const DEFAULT_DURATION_MINUTES: Partial<Record<Frequency, number>> = {
  [Frequency.DAILY]: 60,
  [Frequency.WEEKLY]: 120,
  [Frequency.MONTHLY]: 180,
}

// rrule evaluates in "floating" time: UTC fields stand for local wall-clock fields
function floating(day: string): Date {
  return DateTime.fromISO(day, { zone: 'utc' }).startOf('day').toJSDate()
}

function fromFloating(occurrence: Date, zone: string): Date {
  return DateTime.fromObject(
    {
      year: occurrence.getUTCFullYear(),
      month: occurrence.getUTCMonth() + 1,
      day: occurrence.getUTCDate(),
      hour: occurrence.getUTCHours(),
      minute: occurrence.getUTCMinutes(),
    },
    { zone },
  ).toJSDate()
}

function parseRule(template: RoutineTemplate): Partial<Options> | null {
  try {
    const parsed = RRule.parseString(template.rrule)
    return parsed.freq === undefined ? null : parsed
  } catch (err) {
    logger.warn('merge', `Unreadable recurrence rule on routine ${template.id}`, { error: String(err) })
    return null
  }
}

export interface CompiledRoutine {
  template: RoutineTemplate
  rule: RRule
  durationMinutes: number
}

/**
 * Parses a template's rule once so it can be expanded across many days.
 * `day` only labels the issue raised for an unusable rule.
 */
export function compileRoutineTemplate(
  template: RoutineTemplate,
  day: string,
  config: PlannerConfig = DEFAULT_PLANNER_CONFIG,
): { routine: CompiledRoutine | null; issues: PlanIssue[] } {
  dayBounds(template.anchorDay, config.timeZone)

  const parsed = parseRule(template)
  if (!parsed || parsed.freq === undefined) {
    return {
      routine: null,
      issues: [issue('MissingData', `Routine ${template.id} has no usable recurrence rule`, { day, entryId: template.id })],
    }
  }
  const freq = parsed.freq
  const rule = new RRule({
    ...parsed,
    dtstart: floating(template.anchorDay),
    tzid: null,
    byhour: parsed.byhour ?? DEFAULT_HOUR[freq] ?? config.defaultStartHour,
    byminute: parsed.byminute ?? 0,
    bysecond: 0,
  })
  const durationMinutes = template.durationMinutes ?? DEFAULT_DURATION_MINUTES[freq] ?? config.defaultDurationMinutes
  return { routine: { template, rule, durationMinutes }, issues: [] }
}

export function compileRoutineTemplates(
  templates: RoutineTemplate[],
  day: string,
  config: PlannerConfig = DEFAULT_PLANNER_CONFIG,
): { routines: CompiledRoutine[]; issues: PlanIssue[] } {
  const routines: CompiledRoutine[] = []
  const issues: PlanIssue[] = []
  for (const template of templates) {
    const compiled = compileRoutineTemplate(template, day, config)
    if (compiled.routine) routines.push(compiled.routine)
    issues.push(...compiled.issues)
  }
  return { routines, issues }
}

export function occurrencesOn(
  routine: CompiledRoutine,
  day: string,
  config: PlannerConfig = DEFAULT_PLANNER_CONFIG,
): RoutineInstance[] {
  dayBounds(day, config.timeZone)
  const { template, rule, durationMinutes } = routine
  const dayStart = floating(day)
  const dayEnd = new Date(dayStart.getTime() + 86400000 - 1)

  return rule.between(dayStart, dayEnd, true).map((occurrence): RoutineInstance => {
    const startTime = fromFloating(occurrence, config.timeZone)
    const hhmm = `${occurrence.getUTCHours()}`.padStart(2, '0') + `${occurrence.getUTCMinutes()}`.padStart(2, '0')
    return {
      id: `${template.id}:${day}T${hhmm}`,
      routineId: template.id,
      buildingId: template.buildingId,
      title: template.title,
      startTime,
      endTime: addMinutes(startTime, durationMinutes),
      category: template.category,
    }
  })
}

export function expandRoutineTemplate(
  template: RoutineTemplate,
  day: string,
  config: PlannerConfig = DEFAULT_PLANNER_CONFIG,
): { instances: RoutineInstance[]; issues: PlanIssue[] } {
  const { routine, issues } = compileRoutineTemplate(template, day, config)
  return { instances: routine ? occurrencesOn(routine, day, config) : [], issues }
}

export function expandRoutineTemplates(
  templates: RoutineTemplate[],
  day: string,
  config: PlannerConfig = DEFAULT_PLANNER_CONFIG,
): { instances: RoutineInstance[]; issues: PlanIssue[] } {
  const { routines, issues } = compileRoutineTemplates(templates, day, config)
  return { instances: routines.flatMap((routine) => occurrencesOn(routine, day, config)), issues }
}
