import type { BuildingSummary } from '../domain/building'
import type { CalendarRule } from '../domain/schedule'
import type { Task } from '../domain/task'
import type { SuggestionKind, WeatherSnapshot, WeatherSuggestion } from '../domain/weather'
import { DEFAULT_PLANNER_CONFIG, type PlannerConfig } from '../config'
import { normalizeTitle } from './merger'
import { ruleFiresOn } from './calendar'
import { addMinutes, atClockTime, weekdayOf } from './time'

type Template =
  | 'collectionSetOut'
  | 'skipHosing'
  | 'clearDrains'
  | 'rainMats'
  | 'secureTrash'
  | 'saltEntrances'
  | 'hoseSidewalks'
  | 'exteriorSweep'
  | 'indoorRound'

const CHECKLISTS: Record<Template, string[]> = {
  collectionSetOut: ['Bag and tie loose trash', 'Stage bins at the curb', 'Sweep the set-out area'],
  skipHosing: ['Spot clean instead of hosing', 'Check walkways for pooling'],
  clearDrains: ['Clear roof drains and scuppers', 'Clear curb drains', 'Photo any blockage'],
  rainMats: ['Lay mats at the lobby entrance', 'Place wet-floor signs'],
  secureTrash: ['Secure bin lids', 'Tie bags', 'Pick up loose litter'],
  saltEntrances: ['Salt entrances and steps', 'Shovel walkways', 'Refill salt bins'],
  hoseSidewalks: ['Hose sidewalks', 'Squeegee standing water', 'Rinse tree pits'],
  exteriorSweep: ['Sweep sidewalk and curb', 'Empty corner baskets', 'Check entrance glass'],
  indoorRound: ['Mop lobby floor', 'Wipe down stairwell rails', 'Check hallway lighting'],
}

const KIND_RANK: Record<SuggestionKind, number> = {
  collection: 0,
  rain: 1,
  wind: 1,
  snow: 1,
  indoor: 2,
  heat: 3,
  generic: 4,
}

function build(
  template: Template,
  kind: SuggestionKind,
  title: string,
  weather: WeatherSnapshot,
  building: BuildingSummary,
  day: string,
  dueBy?: Date,
): WeatherSuggestion {
  return {
    id: `${template}-${building.id}-${day}`,
    kind,
    title,
    rationale: weather.current.condition,
    checklist: [...CHECKLISTS[template]],
    buildingId: building.id,
    dueBy,
  }
}

export function indoorSubstitute(task: Task, weather: WeatherSnapshot): WeatherSuggestion {
  return {
    id: `indoorRound-${task.id}`,
    kind: 'indoor',
    title: 'Indoor round while weather clears',
    rationale: weather.current.condition,
    checklist: [...CHECKLISTS.indoorRound],
    buildingId: task.buildingId,
    replacesTaskIds: [task.id],
  }
}

/**
 * One indoor substitute per building, listing every deferred task it stands
 * in for. Substitutes matching one of the top two upcoming titles are dropped.
 */
export function collapseSubstitutes(substitutes: WeatherSuggestion[], upcomingTitles: string[]): WeatherSuggestion[] {
  const byBuilding = new Map<string, WeatherSuggestion>()
  for (const substitute of substitutes) {
    const key = substitute.buildingId ?? ''
    const existing = byBuilding.get(key)
    byBuilding.set(
      key,
      existing
        ? { ...existing, replacesTaskIds: [...(existing.replacesTaskIds ?? []), ...(substitute.replacesTaskIds ?? [])] }
        : { ...substitute, id: `indoorRound-${key || 'unassigned'}` },
    )
  }
  const shown = new Set(upcomingTitles.slice(0, 2).map(normalizeTitle))
  return [...byBuilding.values()].filter((s) => !shown.has(normalizeTitle(s.title)))
}

export interface SuggestionArgs {
  building: BuildingSummary
  weather: WeatherSnapshot
  day: string
  // Titles already shown in the upcoming list, most urgent first
  upcomingTitles: string[]
  workerId?: string
  collectionRules?: CalendarRule[]
  config?: PlannerConfig
}

export const MAX_SUGGESTIONS = 3

/**
 * Up to three ranked suggestions for one building. Anything matching one of
 * the top two upcoming titles (case-insensitive) is dropped.
 */
export function generateSuggestions(args: SuggestionArgs): WeatherSuggestion[] {
  const config = args.config ?? DEFAULT_PLANNER_CONFIG
  const { building, weather, day } = args
  const out: WeatherSuggestion[] = []

  for (const rule of args.collectionRules ?? []) {
    if (!rule.buildingGroup.includes(building.id)) continue
    const firesToday =
      args.workerId === undefined
        ? rule.collectionDays.includes(weekdayOf(day, config.timeZone))
        : ruleFiresOn(rule, day, args.workerId, config)
    if (!firesToday) continue
    const setOut = atClockTime(day, rule.windowStart, config.timeZone)
    out.push({
      ...build('collectionSetOut', 'collection', rule.title, weather, building, day, addMinutes(setOut, -10)),
      id: `collectionSetOut-${rule.id}-${building.id}-${day}`,
    })
  }

  const next24 = weather.hourly.slice(0, 24)
  const next12 = weather.hourly.slice(0, 12)
  const maxPrecip = Math.max(weather.current.precipProb, ...next24.map((h) => h.precipProb))
  const maxTemp = Math.max(weather.current.tempF, ...next12.map((h) => h.tempF))
  const maxWind = Math.max(weather.current.windMph, ...next12.map((h) => h.windMph))

  if (maxPrecip >= 0.25) out.push(build('skipHosing', 'rain', 'Skip sidewalk hosing', weather, building, day))
  if (maxPrecip >= 0.4) out.push(build('clearDrains', 'rain', 'Clear roof & curb drains', weather, building, day))
  if (maxPrecip >= 0.3) out.push(build('rainMats', 'rain', 'Deploy rain mats', weather, building, day))
  if (maxWind >= 15) out.push(build('secureTrash', 'wind', 'Secure trash lids & bags', weather, building, day))
  const snowLikely =
    weather.current.condition.toLowerCase().includes('snow') && next12.some((h) => h.precipProb >= 0.5)
  if (snowLikely) out.push(build('saltEntrances', 'snow', 'Salt entrances', weather, building, day))
  if (maxTemp >= 78 && maxPrecip < 0.3) {
    out.push(build('hoseSidewalks', 'heat', 'Hose & squeegee sidewalks', weather, building, day))
  }
  if (out.length === 0) out.push(build('exteriorSweep', 'generic', 'Routine exterior sweep', weather, building, day))

  const shown = new Set(args.upcomingTitles.slice(0, 2).map(normalizeTitle))
  return out
    .filter((s) => !shown.has(normalizeTitle(s.title)))
    .sort((a, b) => KIND_RANK[a.kind] - KIND_RANK[b.kind] || (a.title < b.title ? -1 : a.title > b.title ? 1 : 0))
    .slice(0, MAX_SUGGESTIONS)
}
