import type {
  BuildingSummary,
  CalendarRule,
  CheckIn,
  Coordinate,
  DayOfWeek,
  RoutineInstance,
  RoutineTemplate,
  RouteSequence,
  Task,
  TaskPolicyRule,
  WeatherSnapshot,
} from '@fieldplan/core'

export interface DateRange {
  start: Date
  end: Date // exclusive
}

/**
 * The upstream services a plan is built from. Optional members are sources a
 * deployment may not have; the planner treats them as empty.
 */
export interface PlanSourceSet {
  getRoutineInstances(workerId: string, range: DateRange): Promise<RoutineInstance[]>
  getRoutineTemplates?(workerId: string): Promise<RoutineTemplate[]>
  getTasks(workerId: string, day: string): Promise<Task[]>
  getRouteSequences(workerId: string, weekday: DayOfWeek): Promise<RouteSequence[]>
  getForecast(): Promise<WeatherSnapshot | null>
  getCurrentPosition(): Promise<Coordinate | null>
  getAssignedBuildings(workerId: string): Promise<BuildingSummary[]>
  getKnownBuildings?(): Promise<BuildingSummary[]>
  getCheckIn?(workerId: string): Promise<CheckIn | null>
  getCalendarRules?(workerId: string): Promise<CalendarRule[]>
  getTaskPolicies?(): Promise<TaskPolicyRule[]>
}
