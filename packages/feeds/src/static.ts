import { DEFAULT_PLANNER_CONFIG, dayBounds, type DayOfWeek, type PlannerConfig } from '@fieldplan/core'
import { normalizeSourceBundle, parsePayload, type SourceBundle } from './normalize'
import { sourceBundleSchema } from './schemas'
import type { DateRange, PlanSourceSet } from './sources'

/**
 * A source set served from one in-memory bundle, e.g. a JSON export of a
 * worker's day. Requests for any other worker get empty results.
 */
export class StaticSourceSet implements PlanSourceSet {
  constructor(
    private readonly bundle: SourceBundle,
    private readonly config: PlannerConfig = DEFAULT_PLANNER_CONFIG,
  ) {}

  static fromJson(payload: unknown, config?: PlannerConfig): StaticSourceSet {
    return new StaticSourceSet(normalizeSourceBundle(parsePayload(sourceBundleSchema, payload, 'source bundle')), config)
  }

  private owns(workerId: string): boolean {
    return workerId === this.bundle.workerId
  }

  async getRoutineInstances(workerId: string, range: DateRange) {
    if (!this.owns(workerId)) return []
    return this.bundle.routineInstances.filter((r) => r.startTime >= range.start && r.startTime < range.end)
  }

  async getRoutineTemplates(workerId: string) {
    return this.owns(workerId) ? this.bundle.routineTemplates : []
  }

  // Undated tasks are open on every day
  async getTasks(workerId: string, day: string) {
    if (!this.owns(workerId)) return []
    const { start, end } = dayBounds(day, this.config.timeZone)
    return this.bundle.tasks.filter((t) => !t.dueTime || (t.dueTime >= start && t.dueTime < end))
  }

  async getRouteSequences(workerId: string, weekday: DayOfWeek) {
    if (!this.owns(workerId)) return []
    return this.bundle.routesByWeekday[weekday] ?? []
  }

  async getForecast() {
    return this.bundle.weather
  }

  async getCurrentPosition() {
    return this.bundle.position
  }

  async getAssignedBuildings(workerId: string) {
    return this.owns(workerId) ? this.bundle.assignedBuildings : []
  }

  async getKnownBuildings() {
    return this.bundle.knownBuildings
  }

  async getCheckIn(workerId: string) {
    return this.owns(workerId) ? this.bundle.checkIn : null
  }

  async getCalendarRules(workerId: string) {
    return this.owns(workerId) ? this.bundle.calendarRules : []
  }

  async getTaskPolicies() {
    return this.bundle.taskPolicies
  }
}
