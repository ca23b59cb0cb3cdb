import type { BuildingSummary, CheckIn, Coordinate } from '../domain/building'
import type {
  CalendarRule,
  DayOfWeek,
  RoutineInstance,
  RoutineTemplate,
  RouteSequence,
  ScheduleEntry,
  WeeklyPlan,
} from '../domain/schedule'
import type { Task, TaskCategory, Urgency } from '../domain/task'
import type { WeatherChip, WeatherSnapshot, WeatherSuggestion } from '../domain/weather'
import type { PlanIssue } from '../errors'
import type { PlannerConfig } from '../config'

export type ResolutionSource = 'checkIn' | 'activeWindow' | 'upcomingWindow' | 'gpsProximity' | 'firstAssigned'

export interface WorkerState {
  now: Date
  checkIn?: CheckIn | null
  todaySchedule: ScheduleEntry[]
  livePosition?: Coordinate | null
  assignedBuildings: BuildingSummary[]
  // Buildings outside the assignment that schedule entries may still point at
  knownBuildings?: BuildingSummary[]
}

export interface BuildingResolution {
  building: BuildingSummary
  source: ResolutionSource
}

export interface MergeDayArgs {
  day: string // YYYY-MM-DD
  routineInstances: RoutineInstance[]
  tasks: Task[]
  routeSequences: RouteSequence[]
  // Building used for tasks no route window can attribute
  fallbackBuildingId?: string | null
  extraEntries?: ScheduleEntry[]
  config?: PlannerConfig
}

export interface MergeDayResult {
  items: ScheduleEntry[]
  totalHours: number
  issues: PlanIssue[]
}

export interface TaskPolicyRule {
  id: string
  when: {
    workerIds?: string[]
    buildingIds?: string[]
    categories?: TaskCategory[]
    titleIncludes?: string[]
  }
  then: {
    requiresPhoto?: boolean
    minimumUrgency?: Urgency
  }
}

export interface ScoredTask {
  task: Task
  score: number
  chip?: WeatherChip
  advice?: string
  isOutdoor: boolean
}

export interface WeatherOrdering {
  ordered: ScoredTask[]
  deferred: ScoredTask[]
  substitutes: WeatherSuggestion[]
  deferralActive: boolean
}

export interface WorkerRef {
  id: string
  name?: string
}

// Everything a plan is synthesized from, already fetched by the caller
export interface PlanSources {
  routineInstances: RoutineInstance[]
  routineTemplates?: RoutineTemplate[]
  tasks: Task[]
  routesByWeekday: Partial<Record<DayOfWeek, RouteSequence[]>>
  weather: WeatherSnapshot | null
  livePosition: Coordinate | null
  assignedBuildings: BuildingSummary[]
  knownBuildings?: BuildingSummary[]
  checkIn?: CheckIn | null
  calendarRules?: CalendarRule[]
  taskPolicies?: TaskPolicyRule[]
}

export interface BuildPlanArgs {
  worker: WorkerRef
  now: Date
  sources: PlanSources
  config?: PlannerConfig
}

export interface DailyPlan {
  workerId: string
  generatedAt: Date
  today: string
  weeklyPlan: WeeklyPlan
  currentBuilding: BuildingSummary | null
  resolutionSource: ResolutionSource | null
  buildings: BuildingSummary[]
  orderedUpcoming: ScoredTask[]
  deferredOutdoor: ScoredTask[]
  outdoorDeferral: boolean
  suggestions: WeatherSuggestion[]
  issues: PlanIssue[]
}
