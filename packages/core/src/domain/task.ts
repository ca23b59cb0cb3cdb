export const URGENCY_ORDER = ['low', 'normal', 'high', 'urgent', 'critical', 'emergency'] as const
export type Urgency = typeof URGENCY_ORDER[number]

export const TASK_CATEGORIES = [
  'cleaning',
  'sanitation',
  'maintenance',
  'repair',
  'inspection',
  'operations',
  'security',
  'administrative',
  'other',
] as const
export type TaskCategory = typeof TASK_CATEGORIES[number]

export interface Task {
  id: string
  title: string
  // Absent until the task is attributed to a location
  buildingId?: string
  dueTime?: Date
  urgency: Urgency
  isCompleted: boolean
  category: TaskCategory
  requiresPhoto: boolean
  estimatedMinutes?: number
}

export function urgencyRank(urgency: Urgency): number {
  return URGENCY_ORDER.indexOf(urgency)
}

export function compareUrgency(a: Urgency, b: Urgency): number {
  return urgencyRank(a) - urgencyRank(b)
}

export function maxUrgency(a: Urgency, b: Urgency): Urgency {
  return compareUrgency(a, b) >= 0 ? a : b
}
