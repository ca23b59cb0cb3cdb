import type { CalendarRule, ScheduleEntry } from '../domain/schedule'
import { DEFAULT_PLANNER_CONFIG, type PlannerConfig } from '../config'
import { issue, type PlanIssue } from '../errors'
import { logger } from '../logger'
import { dedupeKey } from './merger'
import { atClockTime, weekdayOf } from './time'

export interface InjectArgs {
  day: string
  workerId: string
  rules: CalendarRule[]
  existingEntries: ScheduleEntry[]
  config?: PlannerConfig
}

export function circuitIdFor(rule: CalendarRule): string {
  return rule.circuitId ?? `circuit:${rule.id}`
}

export function ruleAppliesToWorker(rule: CalendarRule, workerId: string): boolean {
  const target = rule.appliesToWorker
  if (Array.isArray(target)) return target.includes(workerId)
  return target === '*' || target === workerId
}

export function ruleFiresOn(rule: CalendarRule, day: string, workerId: string, config: PlannerConfig = DEFAULT_PLANNER_CONFIG): boolean {
  return ruleAppliesToWorker(rule, workerId) && rule.collectionDays.includes(weekdayOf(day, config.timeZone))
}

/**
 * Synthetic entries for the conditional rules that fire on `day`. Returned
 * entries are meant to be appended; anything whose dedupe key is already in
 * `existingEntries` is left out.
 */
export function injectCalendarTasks(args: InjectArgs): { entries: ScheduleEntry[]; issues: PlanIssue[] } {
  const config = args.config ?? DEFAULT_PLANNER_CONFIG
  const { day, workerId } = args
  const seen = new Set(args.existingEntries.map(dedupeKey))
  const entries: ScheduleEntry[] = []
  const issues: PlanIssue[] = []

  for (const rule of args.rules) {
    if (!ruleFiresOn(rule, day, workerId, config)) continue
    const circuitId = circuitIdFor(rule)
    const start = atClockTime(day, rule.windowStart, config.timeZone)
    let end = atClockTime(day, rule.windowEnd, config.timeZone)
    if (end < start) {
      issues.push(issue('InvalidTimeWindow', `Rule ${rule.id} window ends before it starts; end clamped to start`, { day, entryId: rule.id }))
      end = new Date(start)
    }

    for (const buildingId of rule.buildingGroup) {
      const entry: ScheduleEntry = {
        id: `${circuitId}:${buildingId}:${day}`,
        buildingId,
        title: rule.title,
        startTime: start,
        endTime: end,
        taskCount: 1,
        sources: ['calendar'],
        circuitId,
        category: rule.category,
        isCompleted: false,
      }
      const key = dedupeKey(entry)
      if (seen.has(key)) continue
      seen.add(key)
      entries.push(entry)
    }
  }

  if (entries.length > 0) {
    logger.debug('calendar', `Injected ${entries.length} calendar entries on ${day}`, { workerId })
  }
  for (const found of issues) logger.warn('calendar', found.message, { day })
  return { entries, issues }
}
