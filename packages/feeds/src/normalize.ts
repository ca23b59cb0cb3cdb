import type { z } from 'zod'
import {
  PlanInputError,
  TASK_CATEGORIES,
  URGENCY_ORDER,
  toDayOfWeek,
  type BuildingSummary,
  type CalendarRule,
  type CheckIn,
  type ClockTime,
  type Coordinate,
  type DayOfWeek,
  type RoutineInstance,
  type RoutineTemplate,
  type RouteSequence,
  type Task,
  type TaskCategory,
  type TaskPolicyRule,
  type Urgency,
  type WeatherReading,
  type WeatherSnapshot,
} from '@fieldplan/core'
import type {
  RawBuilding,
  RawCalendarRule,
  RawCheckIn,
  RawRoutineInstance,
  RawRoutineTemplate,
  RawRouteSequence,
  RawSourceBundle,
  RawTask,
  RawTaskPolicy,
  RawWeatherSnapshot,
} from './schemas'

/**
 * Validates `value` against `schema`. Failures become a PlanInputError whose
 * details list each zod issue as `path: message`.
 */
export function parsePayload<S extends z.ZodTypeAny>(schema: S, value: unknown, label: string): z.output<S> {
  const parsed = schema.safeParse(value)
  if (!parsed.success) {
    throw new PlanInputError(
      'invalid_payload',
      `Invalid ${label} payload`,
      parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
    )
  }
  return parsed.data
}

export function clampUrgency(urgency?: string): Urgency {
  if (!urgency) return 'normal'
  const value = urgency.toLowerCase().trim()
  const direct = URGENCY_ORDER.find((u) => u === value)
  if (direct) return direct
  // Map common synonyms
  if (['lowest', 'minor', 'trivial'].includes(value)) return 'low'
  if (['medium', 'standard', 'default'].includes(value)) return 'normal'
  if (['important', 'major'].includes(value)) return 'high'
  if (['asap', 'immediate'].includes(value)) return 'urgent'
  if (['blocker', 'severe'].includes(value)) return 'critical'
  return 'normal'
}

const CATEGORY_SYNONYMS: Record<string, TaskCategory> = {
  trash: 'sanitation',
  garbage: 'sanitation',
  recycling: 'sanitation',
  janitorial: 'cleaning',
  custodial: 'cleaning',
  building_check: 'inspection',
  walkthrough: 'inspection',
}

export function clampCategory(category?: string): TaskCategory {
  if (!category) return 'other'
  const value = category.toLowerCase().trim()
  return TASK_CATEGORIES.find((c) => c === value) ?? CATEGORY_SYNONYMS[value] ?? 'other'
}

function optionalCategory(category?: string): TaskCategory | undefined {
  return category === undefined ? undefined : clampCategory(category)
}

export function parseClockTime(value: string): ClockTime {
  const [hour, minute] = value.split(':').map(Number)
  if (hour === undefined || minute === undefined || Number.isNaN(hour) || Number.isNaN(minute)) {
    throw new PlanInputError('invalid_payload', `Expected HH:mm, got "${value}"`)
  }
  return { hour, minute }
}

function toDate(value: string): Date {
  return new Date(value)
}

export function normalizeBuilding(raw: RawBuilding): BuildingSummary {
  return {
    id: raw.id,
    name: raw.name.trim(),
    address: raw.address.trim(),
    coordinate: { ...raw.coordinate },
    status: raw.status ?? 'assigned',
  }
}

export function normalizeTask(raw: RawTask): Task {
  return {
    id: raw.id,
    title: raw.title.trim(),
    buildingId: raw.buildingId || undefined,
    dueTime: raw.dueTime ? toDate(raw.dueTime) : undefined,
    urgency: clampUrgency(raw.urgency),
    isCompleted: raw.isCompleted,
    category: clampCategory(raw.category),
    requiresPhoto: raw.requiresPhoto,
    estimatedMinutes: raw.estimatedMinutes,
  }
}

export function normalizeRoutineInstance(raw: RawRoutineInstance): RoutineInstance {
  return {
    id: raw.id,
    routineId: raw.routineId,
    buildingId: raw.buildingId,
    title: raw.title.trim(),
    startTime: toDate(raw.startTime),
    endTime: raw.endTime ? toDate(raw.endTime) : undefined,
    category: optionalCategory(raw.category),
  }
}

export function normalizeRoutineTemplate(raw: RawRoutineTemplate): RoutineTemplate {
  return {
    id: raw.id,
    buildingId: raw.buildingId,
    title: raw.title.trim(),
    rrule: raw.rrule.trim(),
    anchorDay: raw.anchorDay,
    durationMinutes: raw.durationMinutes,
    category: optionalCategory(raw.category),
  }
}

export function normalizeRouteSequence(raw: RawRouteSequence): RouteSequence {
  return {
    buildingId: raw.buildingId,
    buildingName: raw.buildingName.trim(),
    arrivalTime: parseClockTime(raw.arrivalTime),
    estimatedDuration: raw.estimatedDuration,
    operations: raw.operations.map((op) => ({
      name: op.name,
      category: optionalCategory(op.category),
      requiresPhoto: op.requiresPhoto,
    })),
    label: raw.label,
  }
}

export function normalizeRoutes(raw: Record<string, RawRouteSequence[]>): Partial<Record<DayOfWeek, RouteSequence[]>> {
  const routes: Partial<Record<DayOfWeek, RouteSequence[]>> = {}
  for (const [key, sequences] of Object.entries(raw)) {
    routes[toDayOfWeek(Number(key))] = sequences.map(normalizeRouteSequence)
  }
  return routes
}

function normalizeReading(raw: RawWeatherSnapshot['current']): WeatherReading {
  return { ...raw, condition: raw.condition.trim(), timestamp: toDate(raw.timestamp) }
}

export function normalizeWeather(raw: RawWeatherSnapshot): WeatherSnapshot {
  return { current: normalizeReading(raw.current), hourly: raw.hourly.map(normalizeReading) }
}

export function normalizeCheckIn(raw: RawCheckIn): CheckIn {
  return {
    building: normalizeBuilding(raw.building),
    checkedInAt: toDate(raw.checkedInAt),
    expiresAt: raw.expiresAt ? toDate(raw.expiresAt) : undefined,
  }
}

export function normalizeCalendarRule(raw: RawCalendarRule): CalendarRule {
  return {
    id: raw.id,
    title: raw.title.trim(),
    appliesToWorker: raw.appliesToWorker,
    collectionDays: Array.from(new Set(raw.collectionDays)).map(toDayOfWeek),
    windowStart: parseClockTime(raw.windowStart),
    windowEnd: parseClockTime(raw.windowEnd),
    buildingGroup: raw.buildingGroup,
    circuitId: raw.circuitId,
    category: optionalCategory(raw.category),
  }
}

export function normalizeTaskPolicy(raw: RawTaskPolicy): TaskPolicyRule {
  return {
    id: raw.id,
    when: {
      workerIds: raw.when.workerIds,
      buildingIds: raw.when.buildingIds,
      categories: raw.when.categories?.map(clampCategory),
      titleIncludes: raw.when.titleIncludes,
    },
    then: {
      requiresPhoto: raw.then.requiresPhoto,
      minimumUrgency: raw.then.minimumUrgency === undefined ? undefined : clampUrgency(raw.then.minimumUrgency),
    },
  }
}

export interface SourceBundle {
  workerId: string
  assignedBuildings: BuildingSummary[]
  knownBuildings: BuildingSummary[]
  routineInstances: RoutineInstance[]
  routineTemplates: RoutineTemplate[]
  tasks: Task[]
  routesByWeekday: Partial<Record<DayOfWeek, RouteSequence[]>>
  weather: WeatherSnapshot | null
  position: Coordinate | null
  checkIn: CheckIn | null
  calendarRules: CalendarRule[]
  taskPolicies: TaskPolicyRule[]
}

export function normalizeSourceBundle(raw: RawSourceBundle): SourceBundle {
  return {
    workerId: raw.workerId,
    assignedBuildings: raw.assignedBuildings.map(normalizeBuilding),
    knownBuildings: raw.knownBuildings.map(normalizeBuilding),
    routineInstances: raw.routineInstances.map(normalizeRoutineInstance),
    routineTemplates: raw.routineTemplates.map(normalizeRoutineTemplate),
    tasks: raw.tasks.map(normalizeTask),
    routesByWeekday: normalizeRoutes(raw.routes),
    weather: raw.weather ? normalizeWeather(raw.weather) : null,
    position: raw.position,
    checkIn: raw.checkIn ? normalizeCheckIn(raw.checkIn) : null,
    calendarRules: raw.calendarRules.map(normalizeCalendarRule),
    taskPolicies: raw.taskPolicies.map(normalizeTaskPolicy),
  }
}
