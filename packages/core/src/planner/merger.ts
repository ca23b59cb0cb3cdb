import type { EntrySource, RoutineInstance, RouteSequence, ScheduleEntry } from '../domain/schedule'
import type { Task } from '../domain/task'
import { maxUrgency } from '../domain/task'
import { DEFAULT_PLANNER_CONFIG, type PlannerConfig } from '../config'
import { issue, type PlanIssue } from '../errors'
import { logger } from '../logger'
import { addMinutes, assertValidDate, atClockTime, compareAsc, dayBounds, formatClock, minuteBucket } from './time'
import type { MergeDayArgs, MergeDayResult } from './types'

export type RouteWindow = { sequence: RouteSequence; start: Date; end: Date }

const SOURCE_RANK: Record<EntrySource, number> = { routine: 0, task: 1, route: 2, calendar: 3 }

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

export function normalizeTitle(title: string): string {
  return title.trim().toLowerCase()
}

// Injected circuit entries live in their own scope so they never fold into organic ones
export function dedupeKey(entry: ScheduleEntry): string {
  const scope = entry.circuitId ? `${entry.circuitId}:${entry.buildingId}` : entry.buildingId
  return `${scope}|${normalizeTitle(entry.title)}|${minuteBucket(entry.startTime)}`
}

export function compareEntries(a: ScheduleEntry, b: ScheduleEntry): number {
  return (
    compareAsc(a.startTime, b.startTime) ||
    compareText(a.title, b.title) ||
    compareText(a.buildingId, b.buildingId) ||
    compareText(a.id, b.id)
  )
}

function sourceRank(entry: ScheduleEntry): number {
  return Math.min(...entry.sources.map((s) => SOURCE_RANK[s]))
}

function compareRepresentative(a: ScheduleEntry, b: ScheduleEntry): number {
  return sourceRank(a) - sourceRank(b) || compareText(a.id, b.id) || compareEntries(a, b)
}

function clampWindow(
  id: string,
  start: Date,
  end: Date,
  day: string,
  issues: PlanIssue[],
): Date {
  if (end.getTime() >= start.getTime()) return end
  issues.push(issue('InvalidTimeWindow', `Entry ${id} ends before it starts; end clamped to start`, { day, entryId: id }))
  return new Date(start)
}

function routineEntry(instance: RoutineInstance, day: string, config: PlannerConfig, issues: PlanIssue[]): ScheduleEntry {
  assertValidDate(instance.startTime, `Routine instance ${instance.id} start`)
  if (instance.endTime) assertValidDate(instance.endTime, `Routine instance ${instance.id} end`)
  const start = instance.startTime
  const end = instance.endTime ?? addMinutes(start, config.defaultDurationMinutes)
  if (!instance.buildingId) {
    issues.push(issue('AmbiguousBuilding', `Routine instance ${instance.id} has no building`, { day, entryId: instance.id }))
  }
  return {
    id: instance.id,
    buildingId: instance.buildingId,
    title: instance.title,
    startTime: start,
    endTime: clampWindow(instance.id, start, end, day, issues),
    taskCount: 1,
    sources: ['routine'],
    category: instance.category,
    isCompleted: false,
  }
}

function routeWindows(day: string, sequences: RouteSequence[], config: PlannerConfig, issues: PlanIssue[]): RouteWindow[] {
  return sequences.map((sequence) => {
    const start = atClockTime(day, sequence.arrivalTime, config.timeZone)
    const end = clampWindow(
      `route:${sequence.buildingId}@${formatClock(start, config.timeZone)}`,
      start,
      addMinutes(start, sequence.estimatedDuration),
      day,
      issues,
    )
    return { sequence, start, end }
  })
}

function gapMs(at: Date, window: RouteWindow): number {
  const t = at.getTime()
  if (t < window.start.getTime()) return window.start.getTime() - t
  if (t > window.end.getTime()) return t - window.end.getTime()
  return 0
}

/**
 * Route window that contains `at`, or failing that the closest one whose edge
 * lies within the match radius. Ties prefer the earlier arrival.
 */
export function matchRouteWindow(at: Date, windows: RouteWindow[], matchHours: number): RouteSequence | null {
  const limit = matchHours * 3600000
  const ranked = windows
    .map((w) => ({ w, gap: gapMs(at, w) }))
    .filter((c) => c.gap <= limit)
    .sort(
      (a, b) =>
        a.gap - b.gap ||
        compareAsc(a.w.start, b.w.start) ||
        compareText(a.w.sequence.buildingId, b.w.sequence.buildingId),
    )
  return ranked[0]?.w.sequence ?? null
}

function taskEntry(
  task: Task,
  day: string,
  bounds: { start: Date; end: Date },
  windows: RouteWindow[],
  fallbackBuildingId: string | null,
  config: PlannerConfig,
  issues: PlanIssue[],
): ScheduleEntry | null {
  let start: Date
  if (task.dueTime) {
    assertValidDate(task.dueTime, `Task ${task.id} due time`)
    // Belongs to another day's merge
    if (task.dueTime < bounds.start || task.dueTime >= bounds.end) return null
    start = task.dueTime
  } else {
    start = atClockTime(day, { hour: config.defaultStartHour, minute: 0 }, config.timeZone)
  }
  const end = addMinutes(start, task.estimatedMinutes ?? config.defaultDurationMinutes)

  let buildingId = task.buildingId ?? ''
  if (!buildingId) {
    buildingId = matchRouteWindow(start, windows, config.routeMatchHours)?.buildingId ?? fallbackBuildingId ?? ''
    if (!buildingId) {
      issues.push(issue('AmbiguousBuilding', `Task ${task.id} could not be attributed to a building`, { day, entryId: task.id }))
    }
  }

  return {
    id: task.id,
    buildingId,
    title: task.title,
    startTime: start,
    endTime: clampWindow(task.id, start, end, day, issues),
    taskCount: 1,
    sources: ['task'],
    category: task.category,
    urgency: task.urgency,
    isCompleted: task.isCompleted,
  }
}

function routeEntry(window: RouteWindow, day: string, config: PlannerConfig): ScheduleEntry {
  const { sequence } = window
  return {
    id: `route:${day}:${sequence.buildingId}@${formatClock(window.start, config.timeZone)}`,
    buildingId: sequence.buildingId,
    title: sequence.label ?? sequence.buildingName,
    startTime: window.start,
    endTime: window.end,
    taskCount: Math.max(1, sequence.operations.length),
    sources: ['route'],
    category: sequence.operations[0]?.category,
    isCompleted: false,
  }
}

/**
 * Steps 1-2 of a day merge: every source item converted to an entry, not yet
 * deduplicated. Routine instances and tasks outside the day are skipped.
 */
export function collectDayEntries(args: MergeDayArgs): { entries: ScheduleEntry[]; issues: PlanIssue[] } {
  const config = args.config ?? DEFAULT_PLANNER_CONFIG
  const { day } = args
  const bounds = dayBounds(day, config.timeZone)
  const issues: PlanIssue[] = []

  const routines = args.routineInstances
    .filter((r) => {
      assertValidDate(r.startTime, `Routine instance ${r.id} start`)
      return r.startTime >= bounds.start && r.startTime < bounds.end
    })
    .map((r) => routineEntry(r, day, config, issues))

  const windows = routeWindows(day, args.routeSequences, config, issues)
  const fallback = args.fallbackBuildingId ?? null
  const tasks: ScheduleEntry[] = []
  for (const task of args.tasks) {
    const entry = taskEntry(task, day, bounds, windows, fallback, config, issues)
    if (entry) tasks.push(entry)
  }

  // Route plan stands in for the routine source on days it has nothing
  const routes = routines.length === 0 ? windows.map((w) => routeEntry(w, day, config)) : []

  return { entries: [...routines, ...tasks, ...routes], issues }
}

function foldGroup(group: ScheduleEntry[]): ScheduleEntry {
  const [representative, ...rest] = [...group].sort(compareRepresentative)
  if (!representative) throw new Error('foldGroup called with an empty group')
  return rest.reduce<ScheduleEntry>(
    (acc, e) => ({
      ...acc,
      endTime: e.endTime > acc.endTime ? e.endTime : acc.endTime,
      taskCount: acc.taskCount + e.taskCount,
      memberIds: Array.from(new Set([...(acc.memberIds ?? []), e.id, ...(e.memberIds ?? [])])).sort(compareText),
      sources: Array.from(new Set([...acc.sources, ...e.sources])).sort((a, b) => SOURCE_RANK[a] - SOURCE_RANK[b]),
      category: acc.category ?? e.category,
      urgency: acc.urgency && e.urgency ? maxUrgency(acc.urgency, e.urgency) : acc.urgency ?? e.urgency,
      isCompleted: acc.isCompleted && e.isCompleted,
    }),
    representative,
  )
}

/**
 * Steps 3-4: collapse entries sharing a dedupe key, then order by start time,
 * title, building and id. Output does not depend on input order.
 */
export function consolidateEntries(entries: ScheduleEntry[]): ScheduleEntry[] {
  const groups = new Map<string, ScheduleEntry[]>()
  for (const entry of entries) {
    const key = dedupeKey(entry)
    const group = groups.get(key)
    if (group) group.push(entry)
    else groups.set(key, [entry])
  }
  return [...groups.values()].map(foldGroup).sort(compareEntries)
}

export function totalHours(entries: ScheduleEntry[]): number {
  const ms = entries.reduce((acc, e) => acc + (e.endTime.getTime() - e.startTime.getTime()), 0)
  return ms / 3600000
}

export function mergeDay(args: MergeDayArgs): MergeDayResult {
  const collected = collectDayEntries(args)
  const all = [...collected.entries, ...(args.extraEntries ?? [])]
  const items = consolidateEntries(all)
  if (items.length < all.length) {
    logger.debug('merge', `Collapsed ${all.length - items.length} duplicate entries on ${args.day}`)
  }
  for (const found of collected.issues) {
    logger.warn('merge', found.message, { kind: found.kind, day: found.day })
  }
  return { items, totalHours: totalHours(items), issues: collected.issues }
}
