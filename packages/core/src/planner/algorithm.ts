import type { BuildingSummary } from '../domain/building'
import type { DaySchedule, ScheduleEntry } from '../domain/schedule'
import type { Task } from '../domain/task'
import { DEFAULT_PLANNER_CONFIG, type PlannerConfig } from '../config'
import { issue, type PlanIssue } from '../errors'
import { logger } from '../logger'
import { injectCalendarTasks } from './calendar'
import { collectDayEntries, mergeDay } from './merger'
import { applyTaskPolicies } from './policies'
import { resolveCurrentBuildingWithSource, summarizeBuildings } from './resolver'
import { compileRoutineTemplates, occurrencesOn, type CompiledRoutine } from './routines'
import { scoreAndOrder } from './scoring'
import { collapseSubstitutes, generateSuggestions } from './suggestions'
import { assertValidDate, dayKeysFrom, minutesBetween, toDayKey, weekdayOf } from './time'
import type { BuildPlanArgs, DailyPlan, MergeDayArgs, PlanSources } from './types'

// Building that tasks fall back to before the resolver has a schedule to look at
function fallbackBuildingId(sources: PlanSources, now: Date): string | null {
  const checkIn = sources.checkIn
  if (checkIn && !(checkIn.expiresAt && checkIn.expiresAt.getTime() <= now.getTime())) {
    return checkIn.building.id
  }
  return sources.assignedBuildings[0]?.id ?? null
}

function buildDay(
  day: string,
  today: string,
  args: BuildPlanArgs,
  routines: CompiledRoutine[],
  fallback: string | null,
  config: PlannerConfig,
): { schedule: DaySchedule; issues: PlanIssue[] } {
  const { sources, worker } = args
  const expanded = routines.flatMap((routine) => occurrencesOn(routine, day, config))
  const mergeArgs: MergeDayArgs = {
    day,
    routineInstances: [...sources.routineInstances, ...expanded],
    // Undated tasks only land on today
    tasks: day === today ? sources.tasks : sources.tasks.filter((t) => t.dueTime),
    routeSequences: sources.routesByWeekday[weekdayOf(day, config.timeZone)] ?? [],
    fallbackBuildingId: fallback,
    config,
  }
  const organic = collectDayEntries(mergeArgs)
  const injected = injectCalendarTasks({
    day,
    workerId: worker.id,
    rules: sources.calendarRules ?? [],
    existingEntries: organic.entries,
    config,
  })
  const merged = mergeDay({ ...mergeArgs, extraEntries: injected.entries })
  return {
    schedule: { date: day, items: merged.items, totalHours: merged.totalHours },
    issues: [...merged.issues, ...injected.issues],
  }
}

function entryAsTask(entry: ScheduleEntry, tasksById: Map<string, Task>): Task {
  const members = [entry.id, ...(entry.memberIds ?? [])].flatMap((id) => {
    const task = tasksById.get(id)
    return task ? [task] : []
  })
  const source = members[0]
  return {
    id: entry.id,
    title: entry.title,
    buildingId: entry.buildingId || undefined,
    dueTime: entry.startTime,
    urgency: entry.urgency ?? source?.urgency ?? 'normal',
    isCompleted: entry.isCompleted,
    category: entry.category ?? source?.category ?? 'other',
    requiresPhoto: members.some((t) => t.requiresPhoto),
    estimatedMinutes: minutesBetween(entry.startTime, entry.endTime),
  }
}

// Open work for the rest of today; ad-hoc tasks stay listed once overdue
function openEntries(items: ScheduleEntry[], now: Date): ScheduleEntry[] {
  return items.filter(
    (e) => !e.isCompleted && (e.endTime.getTime() >= now.getTime() || e.sources.includes('task')),
  )
}

function coverageBuildings(sources: PlanSources, items: ScheduleEntry[]): BuildingSummary[] {
  const assigned = new Set(sources.assignedBuildings.map((b) => b.id))
  const referenced = new Set(items.map((e) => e.buildingId))
  return (sources.knownBuildings ?? []).filter((b) => referenced.has(b.id) && !assigned.has(b.id))
}

/**
 * Synthesizes one worker's plan: a week of merged schedules, the building
 * they are at, today's open work in weather-adjusted order and suggestions
 * for the current building. Missing sources degrade into issues on the plan.
 */
export function buildPlan(args: BuildPlanArgs): DailyPlan {
  const config = args.config ?? DEFAULT_PLANNER_CONFIG
  const { now, sources, worker } = args
  assertValidDate(now, 'Plan reference time')

  const today = toDayKey(now, config.timeZone)
  const issues: PlanIssue[] = []
  if (!sources.weather) {
    issues.push(issue('MissingData', 'No weather snapshot; outdoor work is not deferred', { day: today }))
  }
  if (sources.assignedBuildings.length === 0) {
    issues.push(issue('MissingData', `Worker ${worker.id} has no assigned buildings`, { day: today }))
  }

  const fallback = fallbackBuildingId(sources, now)
  const compiled = compileRoutineTemplates(sources.routineTemplates ?? [], today, config)
  issues.push(...compiled.issues)
  const days = dayKeysFrom(today, config.horizonDays, config.timeZone).map((day) => {
    const built = buildDay(day, today, args, compiled.routines, fallback, config)
    issues.push(...built.issues)
    return built.schedule
  })
  const todayItems = days[0]?.items ?? []

  const resolution = resolveCurrentBuildingWithSource(
    {
      now,
      checkIn: sources.checkIn,
      todaySchedule: todayItems,
      livePosition: sources.livePosition,
      assignedBuildings: sources.assignedBuildings,
      knownBuildings: sources.knownBuildings,
    },
    config,
  )
  if (!resolution) {
    issues.push(issue('MissingData', 'No building information to resolve a current building', { day: today }))
  }
  const currentBuilding = resolution?.building ?? null

  const tasksById = new Map(sources.tasks.map((t) => [t.id, t]))
  const candidates = applyTaskPolicies(
    openEntries(todayItems, now).map((e) => entryAsTask(e, tasksById)),
    worker.id,
    sources.taskPolicies ?? [],
  )
  const ordering = scoreAndOrder(candidates, sources.weather, { now, config })

  const upcomingTitles = ordering.ordered.map((s) => s.task.title)
  const suggestions =
    sources.weather && currentBuilding
      ? generateSuggestions({
          building: currentBuilding,
          weather: sources.weather,
          day: today,
          upcomingTitles,
          workerId: worker.id,
          collectionRules: sources.calendarRules,
          config,
        })
      : []

  logger.info('plan', `Built plan for ${worker.id}`, {
    today,
    currentBuildingId: currentBuilding?.id ?? null,
    resolutionSource: resolution?.source ?? null,
    entries: days.reduce((acc, d) => acc + d.items.length, 0),
    issues: issues.length,
  })

  return {
    workerId: worker.id,
    generatedAt: now,
    today,
    weeklyPlan: { days },
    currentBuilding,
    resolutionSource: resolution?.source ?? null,
    buildings: summarizeBuildings(currentBuilding, sources.assignedBuildings, coverageBuildings(sources, todayItems)),
    orderedUpcoming: ordering.ordered,
    deferredOutdoor: ordering.deferred,
    outdoorDeferral: ordering.deferralActive,
    suggestions: [...collapseSubstitutes(ordering.substitutes, upcomingTitles), ...suggestions],
    issues,
  }
}
