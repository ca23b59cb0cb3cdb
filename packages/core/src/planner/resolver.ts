import type { BuildingStatus, BuildingSummary } from '../domain/building'
import type { ScheduleEntry } from '../domain/schedule'
import { DEFAULT_PLANNER_CONFIG, type PlannerConfig } from '../config'
import { logger } from '../logger'
import { distanceMeters } from './geo'
import { addMinutes, compareAsc } from './time'
import type { BuildingResolution, ResolutionSource, WorkerState } from './types'

export interface ResolverStrategy {
  source: ResolutionSource
  resolve(state: WorkerState, config: PlannerConfig): BuildingSummary | null
}

function lookupBuilding(state: WorkerState, buildingId: string): BuildingSummary | null {
  if (!buildingId) return null
  return (
    state.assignedBuildings.find((b) => b.id === buildingId) ??
    state.knownBuildings?.find((b) => b.id === buildingId) ??
    null
  )
}

function firstResolvable(state: WorkerState, entries: ScheduleEntry[]): BuildingSummary | null {
  for (const entry of entries) {
    const building = lookupBuilding(state, entry.buildingId)
    if (building) return building
  }
  return null
}

const explicitCheckIn: ResolverStrategy = {
  source: 'checkIn',
  resolve(state) {
    const checkIn = state.checkIn
    if (!checkIn) return null
    if (checkIn.expiresAt && checkIn.expiresAt.getTime() <= state.now.getTime()) return null
    return checkIn.building
  },
}

const activeWindow: ResolverStrategy = {
  source: 'activeWindow',
  resolve(state) {
    const now = state.now.getTime()
    const active = state.todaySchedule.filter((e) => e.startTime.getTime() <= now && now <= e.endTime.getTime())
    return firstResolvable(state, active)
  },
}

const upcomingWindow: ResolverStrategy = {
  source: 'upcomingWindow',
  resolve(state, config) {
    const now = state.now.getTime()
    const horizon = addMinutes(state.now, config.upcomingWindowMinutes).getTime()
    const upcoming = state.todaySchedule
      .filter((e) => e.startTime.getTime() > now && e.startTime.getTime() <= horizon)
      .sort((a, b) => compareAsc(a.startTime, b.startTime))
    return firstResolvable(state, upcoming)
  },
}

const gpsProximity: ResolverStrategy = {
  source: 'gpsProximity',
  resolve(state, config) {
    const position = state.livePosition
    if (!position) return null
    const nearby = state.assignedBuildings
      .map((building) => ({ building, distance: distanceMeters(position, building.coordinate) }))
      .filter((c) => c.distance <= config.gpsRadiusMeters)
      .sort((a, b) => a.distance - b.distance || (a.building.id < b.building.id ? -1 : a.building.id > b.building.id ? 1 : 0))
    return nearby[0]?.building ?? null
  },
}

const firstAssigned: ResolverStrategy = {
  source: 'firstAssigned',
  resolve(state) {
    return state.assignedBuildings[0] ?? null
  },
}

// Tried in order; the first strategy that yields a building wins
export const RESOLVER_STRATEGIES: readonly ResolverStrategy[] = [
  explicitCheckIn,
  activeWindow,
  upcomingWindow,
  gpsProximity,
  firstAssigned,
]

export function resolveCurrentBuildingWithSource(
  state: WorkerState,
  config: PlannerConfig = DEFAULT_PLANNER_CONFIG,
): BuildingResolution | null {
  for (const strategy of RESOLVER_STRATEGIES) {
    const building = strategy.resolve(state, config)
    if (building) {
      logger.debug('resolver', `Resolved current building via ${strategy.source}`, { buildingId: building.id })
      return { building: { ...building, status: 'current' }, source: strategy.source }
    }
  }
  logger.debug('resolver', 'No building information available')
  return null
}

export function resolveCurrentBuilding(
  state: WorkerState,
  config: PlannerConfig = DEFAULT_PLANNER_CONFIG,
): BuildingSummary | null {
  return resolveCurrentBuildingWithSource(state, config)?.building ?? null
}

/**
 * Status view for one resolution. The resolved building is `current`; other
 * assigned buildings are `assigned` unless their source marked them
 * `unavailable`; buildings the schedule borrows from outside the assignment
 * are `coverage`.
 */
export function summarizeBuildings(
  current: BuildingSummary | null,
  assigned: BuildingSummary[],
  coverage: BuildingSummary[] = [],
): BuildingSummary[] {
  const isCurrent = (b: BuildingSummary) => current !== null && b.id === current.id
  const assignedStatus = (b: BuildingSummary): BuildingStatus => {
    if (isCurrent(b)) return 'current'
    return b.status === 'unavailable' ? 'unavailable' : 'assigned'
  }
  const view = assigned.map((b) => ({ ...b, status: assignedStatus(b) }))
  const seen = new Set(view.map((b) => b.id))
  for (const b of coverage) {
    if (seen.has(b.id)) continue
    seen.add(b.id)
    view.push({ ...b, status: isCurrent(b) ? 'current' : 'coverage' })
  }
  if (current && !seen.has(current.id)) {
    view.push({ ...current, status: 'current' })
  }
  return view
}
