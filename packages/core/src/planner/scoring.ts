import type { Task, TaskCategory, Urgency } from '../domain/task'
import type { WeatherChip, WeatherSnapshot, WeatherSuggestion } from '../domain/weather'
import { DEFAULT_PLANNER_CONFIG, type PlannerConfig } from '../config'
import { PlanInputError } from '../errors'
import { logger } from '../logger'
import { indoorSubstitute } from './suggestions'
import type { ScoredTask, WeatherOrdering } from './types'
import { WEATHER_PROFILES, isOutdoorTitle, lookahead, shouldDeferOutdoorWork, summarizeWindow, type WeatherWindow } from './weather'

// Score of a task without a due time: a full day of half-hour steps out
const NO_DUE_SCORE = 48

const CATEGORY_BONUS: Partial<Record<TaskCategory, number>> = {
  sanitation: -2,
  maintenance: -1,
  repair: -1,
  inspection: 1,
}

const URGENCY_BONUS: Record<Urgency, number> = {
  low: 1,
  normal: 0,
  high: -1,
  urgent: -2,
  critical: -3,
  emergency: -4,
}

// Lower is more urgent: whole half-hours until due, shifted by category and urgency
export function basePriority(task: Task, reference: Date): number {
  const timeScore = task.dueTime
    ? Math.max(0, Math.floor((task.dueTime.getTime() - reference.getTime()) / 1800000))
    : NO_DUE_SCORE
  return timeScore + (CATEGORY_BONUS[task.category] ?? 0) + URGENCY_BONUS[task.urgency]
}

function weatherAdjustment(task: Task, window: WeatherWindow): { penalty: number; chip?: WeatherChip; advice?: string } {
  const profile = WEATHER_PROFILES[task.category]
  let penalty = 0
  let chip: WeatherChip | undefined
  let advice: string | undefined

  if (profile.sensitiveToPrecip && profile.idealPrecipProbMax !== undefined) {
    if (window.maxPrecipProb >= 0.6) {
      penalty += 3
      chip = 'heavyRain'
      advice = 'Do indoor tasks; rain likely.'
    } else if (window.maxPrecipProb >= profile.idealPrecipProbMax) {
      penalty += 1
      chip = 'wet'
      advice = 'Wet window likely, consider reslotting.'
    }
  }
  if (profile.sensitiveToWind && profile.idealWindMax !== undefined && window.maxWindMph > profile.idealWindMax) {
    penalty += 1
    chip = chip ?? 'windy'
    advice = advice ?? 'High wind; bag and tie securely.'
  }
  if (window.minTempF <= 25) {
    penalty += 1
    chip = chip ?? 'cold'
    advice = advice ?? 'Very cold, reduce outdoor exposure.'
  } else if (window.maxTempF >= 95) {
    penalty += 1
    chip = chip ?? 'hot'
    advice = advice ?? 'Heat: hydrate and pace work.'
  }
  if (!chip && window.maxPrecipProb < 0.2 && window.maxWindMph < 20) {
    chip = 'goodWindow'
    penalty -= 1
  }
  return { penalty, chip, advice }
}

function scoreAgainst(task: Task, reference: Date, window: WeatherWindow | null): ScoredTask {
  const isOutdoor = isOutdoorTitle(task.title)
  const base = basePriority(task, reference)
  if (!isOutdoor || !window) return { task, score: base, isOutdoor }
  const { penalty, chip, advice } = weatherAdjustment(task, window)
  return { task, score: base + penalty, chip, advice, isOutdoor }
}

/**
 * Weather-adjusted score for one task. Pure in (task, weather): time until due
 * is measured from the snapshot's own timestamp.
 */
export function scoreTask(
  task: Task,
  weather: WeatherSnapshot,
  config: PlannerConfig = DEFAULT_PLANNER_CONFIG,
): ScoredTask {
  const window = summarizeWindow(lookahead(weather, config.weather.lookaheadHours))
  return scoreAgainst(task, weather.current.timestamp, window)
}

function compareScored(a: { s: ScoredTask; index: number }, b: { s: ScoredTask; index: number }): number {
  if (a.s.score !== b.s.score) return a.s.score - b.s.score
  const aDue = a.s.task.dueTime?.getTime() ?? Number.POSITIVE_INFINITY
  const bDue = b.s.task.dueTime?.getTime() ?? Number.POSITIVE_INFINITY
  if (aDue !== bDue) return aDue < bDue ? -1 : 1
  return a.index - b.index
}

export interface ScoreAndOrderOptions {
  // Reference time when no weather snapshot is available
  now?: Date
  config?: PlannerConfig
}

/**
 * Orders open tasks by weather-adjusted score, then due time, then input
 * order. While outdoor work is deferred, outdoor tasks leave the ordering for
 * `deferred` and each gets an indoor substitute suggestion.
 */
export function scoreAndOrder(
  tasks: Task[],
  weather: WeatherSnapshot | null,
  options: ScoreAndOrderOptions = {},
): WeatherOrdering {
  const config = options.config ?? DEFAULT_PLANNER_CONFIG
  const reference = weather?.current.timestamp ?? options.now
  if (!reference) {
    throw new PlanInputError('invalid_payload', 'scoreAndOrder needs a weather snapshot or a reference time')
  }
  const window = weather ? summarizeWindow(lookahead(weather, config.weather.lookaheadHours)) : null
  const deferralActive = weather ? shouldDeferOutdoorWork(weather, config.weather) : false

  const ranked = tasks
    .filter((t) => !t.isCompleted)
    .map((task, index) => ({ s: scoreAgainst(task, reference, window), index }))
    .sort(compareScored)
    .map((r) => r.s)

  const ordered = ranked.filter((s) => !(deferralActive && s.isOutdoor))
  const deferred = ranked.filter((s) => deferralActive && s.isOutdoor)
  const substitutes: WeatherSuggestion[] = weather ? deferred.map((s) => indoorSubstitute(s.task, weather)) : []

  if (deferred.length > 0) {
    logger.info('weather', `Deferred ${deferred.length} outdoor task(s)`, {
      condition: weather?.current.condition,
      taskIds: deferred.map((s) => s.task.id),
    })
  }
  return { ordered, deferred, substitutes, deferralActive }
}
