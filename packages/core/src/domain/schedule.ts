import type { TaskCategory, Urgency } from './task'

export type DayOfWeek = 0 | 1 | 2 | 3 | 4 | 5 | 6 // 0 = Sunday

// Local wall-clock time in the planner's time zone
export interface ClockTime {
  hour: number
  minute: number
}

export type EntrySource = 'routine' | 'task' | 'route' | 'calendar'

export interface ScheduleEntry {
  id: string
  buildingId: string // '' when the entry could not be attributed
  title: string
  startTime: Date
  endTime: Date
  taskCount: number
  sources: EntrySource[]
  // Ids of the entries folded into this one, besides its own
  memberIds?: string[]
  circuitId?: string
  category?: TaskCategory
  urgency?: Urgency
  isCompleted: boolean
}

export interface RoutineInstance {
  id: string
  routineId?: string
  buildingId: string
  title: string
  startTime: Date
  endTime?: Date
  category?: TaskCategory
}

export interface RoutineTemplate {
  id: string
  buildingId: string
  title: string
  rrule: string // e.g. "FREQ=WEEKLY;BYDAY=MO,WE;BYHOUR=7"
  anchorDay: string // YYYY-MM-DD the recurrence starts from
  durationMinutes?: number
  category?: TaskCategory
}

export interface RouteOperation {
  name: string
  category?: TaskCategory
  requiresPhoto?: boolean
}

export interface RouteSequence {
  buildingId: string
  buildingName: string
  arrivalTime: ClockTime
  estimatedDuration: number // minutes
  operations: RouteOperation[]
  label?: string
}

export interface DaySchedule {
  date: string // YYYY-MM-DD
  items: ScheduleEntry[]
  totalHours: number
}

export interface WeeklyPlan {
  days: DaySchedule[]
}

export interface CalendarRule {
  id: string
  title: string
  // '*' for every worker
  appliesToWorker: string | string[]
  collectionDays: DayOfWeek[]
  windowStart: ClockTime
  windowEnd: ClockTime
  buildingGroup: string[]
  circuitId?: string
  category?: TaskCategory
}
