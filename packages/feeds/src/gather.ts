import {
  DEFAULT_PLANNER_CONFIG,
  dayBounds,
  dayKeysFrom,
  logger,
  toDayKey,
  weekdayOf,
  type DayOfWeek,
  type PlannerConfig,
  type PlanSources,
  type RouteSequence,
  type Task,
} from '@fieldplan/core'
import type { PlanSourceSet } from './sources'

// Weather and position are advisory: a failed fetch plans without them
async function optional<T>(label: string, fetch: () => Promise<T | null>): Promise<T | null> {
  try {
    return await fetch()
  } catch (err) {
    logger.warn('refresh', `${label} unavailable; planning without it`, {
      error: err instanceof Error ? err.message : String(err),
    })
    return null
  }
}

function uniqueById(tasks: Task[]): Task[] {
  const seen = new Set<string>()
  return tasks.filter((t) => {
    if (seen.has(t.id)) return false
    seen.add(t.id)
    return true
  })
}

/**
 * Fetches everything one plan needs across the planning horizon, in parallel.
 * Required sources reject the whole gather; weather and position degrade to null.
 */
export async function gatherPlanSources(
  sourceSet: PlanSourceSet,
  workerId: string,
  now: Date,
  config: PlannerConfig = DEFAULT_PLANNER_CONFIG,
): Promise<PlanSources> {
  const today = toDayKey(now, config.timeZone)
  const days = dayKeysFrom(today, config.horizonDays, config.timeZone)
  const lastDay = days[days.length - 1] ?? today
  const range = { start: dayBounds(today, config.timeZone).start, end: dayBounds(lastDay, config.timeZone).end }
  const weekdays = Array.from(new Set(days.map((d) => weekdayOf(d, config.timeZone))))

  const [
    routineInstances,
    routineTemplates,
    taskLists,
    routeLists,
    weather,
    livePosition,
    assignedBuildings,
    knownBuildings,
    checkIn,
    calendarRules,
    taskPolicies,
  ] = await Promise.all([
    sourceSet.getRoutineInstances(workerId, range),
    sourceSet.getRoutineTemplates?.(workerId) ?? Promise.resolve([]),
    Promise.all(days.map((day) => sourceSet.getTasks(workerId, day))),
    Promise.all(
      weekdays.map(async (weekday): Promise<[DayOfWeek, RouteSequence[]]> => [
        weekday,
        await sourceSet.getRouteSequences(workerId, weekday),
      ]),
    ),
    optional('Forecast', () => sourceSet.getForecast()),
    optional('Live position', () => sourceSet.getCurrentPosition()),
    sourceSet.getAssignedBuildings(workerId),
    sourceSet.getKnownBuildings?.() ?? Promise.resolve([]),
    sourceSet.getCheckIn?.(workerId) ?? Promise.resolve(null),
    sourceSet.getCalendarRules?.(workerId) ?? Promise.resolve([]),
    sourceSet.getTaskPolicies?.() ?? Promise.resolve([]),
  ])

  const routesByWeekday: Partial<Record<DayOfWeek, RouteSequence[]>> = {}
  for (const [weekday, sequences] of routeLists) routesByWeekday[weekday] = sequences

  logger.debug('refresh', `Gathered sources for ${workerId}`, { today, days: days.length })
  return {
    routineInstances,
    routineTemplates,
    tasks: uniqueById(taskLists.flat()),
    routesByWeekday,
    weather,
    livePosition,
    assignedBuildings,
    knownBuildings,
    checkIn,
    calendarRules,
    taskPolicies,
  }
}
