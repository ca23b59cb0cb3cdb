import { z } from 'zod'

// Raw payloads as the source services hand them over: ISO strings, loose enums

const isoDateTime = z.string().datetime({ offset: true })
const dayKey = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD')
const clockTime = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'expected HH:mm')

export const coordinateSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
})

export const buildingSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  address: z.string().default(''),
  coordinate: coordinateSchema,
  status: z.enum(['current', 'assigned', 'available', 'coverage', 'unavailable']).optional(),
})

export type RawBuilding = z.infer<typeof buildingSchema>

export const taskSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  buildingId: z.string().nullish(),
  dueTime: isoDateTime.nullish(),
  urgency: z.string().optional(),
  isCompleted: z.boolean().default(false),
  category: z.string().optional(),
  requiresPhoto: z.boolean().default(false),
  estimatedMinutes: z.number().int().positive().optional(),
})

export type RawTask = z.infer<typeof taskSchema>

export const routineInstanceSchema = z.object({
  id: z.string().min(1),
  routineId: z.string().optional(),
  buildingId: z.string(),
  title: z.string(),
  startTime: isoDateTime,
  endTime: isoDateTime.nullish(),
  category: z.string().optional(),
})

export type RawRoutineInstance = z.infer<typeof routineInstanceSchema>

export const routineTemplateSchema = z.object({
  id: z.string().min(1),
  buildingId: z.string(),
  title: z.string(),
  rrule: z.string().min(1),
  anchorDay: dayKey,
  durationMinutes: z.number().int().positive().optional(),
  category: z.string().optional(),
})

export type RawRoutineTemplate = z.infer<typeof routineTemplateSchema>

export const routeSequenceSchema = z.object({
  buildingId: z.string().min(1),
  buildingName: z.string(),
  arrivalTime: clockTime,
  estimatedDuration: z.number().nonnegative(),
  operations: z
    .array(
      z.object({
        name: z.string(),
        category: z.string().optional(),
        requiresPhoto: z.boolean().optional(),
      }),
    )
    .default([]),
  label: z.string().optional(),
})

export type RawRouteSequence = z.infer<typeof routeSequenceSchema>

export const weatherReadingSchema = z.object({
  tempF: z.number(),
  condition: z.string(),
  precipProb: z.number().min(0).max(1),
  windMph: z.number().nonnegative(),
  timestamp: isoDateTime,
})

export const weatherSnapshotSchema = z.object({
  current: weatherReadingSchema,
  hourly: z.array(weatherReadingSchema).default([]),
})

export type RawWeatherSnapshot = z.infer<typeof weatherSnapshotSchema>

export const checkInSchema = z.object({
  building: buildingSchema,
  checkedInAt: isoDateTime,
  expiresAt: isoDateTime.nullish(),
})

export type RawCheckIn = z.infer<typeof checkInSchema>

export const calendarRuleSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  appliesToWorker: z.union([z.string(), z.array(z.string())]),
  collectionDays: z.array(z.number().int().min(0).max(6)),
  windowStart: clockTime,
  windowEnd: clockTime,
  buildingGroup: z.array(z.string().min(1)),
  circuitId: z.string().optional(),
  category: z.string().optional(),
})

export type RawCalendarRule = z.infer<typeof calendarRuleSchema>

export const taskPolicySchema = z.object({
  id: z.string().min(1),
  when: z.object({
    workerIds: z.array(z.string()).optional(),
    buildingIds: z.array(z.string()).optional(),
    categories: z.array(z.string()).optional(),
    titleIncludes: z.array(z.string()).optional(),
  }),
  then: z.object({
    requiresPhoto: z.boolean().optional(),
    minimumUrgency: z.string().optional(),
  }),
})

export type RawTaskPolicy = z.infer<typeof taskPolicySchema>

// Everything one worker's plan needs, as a single document
export const sourceBundleSchema = z.object({
  workerId: z.string().min(1),
  assignedBuildings: z.array(buildingSchema),
  knownBuildings: z.array(buildingSchema).default([]),
  routineInstances: z.array(routineInstanceSchema).default([]),
  routineTemplates: z.array(routineTemplateSchema).default([]),
  tasks: z.array(taskSchema).default([]),
  routes: z.record(z.string().regex(/^[0-6]$/, 'expected a weekday 0-6'), z.array(routeSequenceSchema)).default({}),
  weather: weatherSnapshotSchema.nullable().default(null),
  position: coordinateSchema.nullable().default(null),
  checkIn: checkInSchema.nullable().default(null),
  calendarRules: z.array(calendarRuleSchema).default([]),
  taskPolicies: z.array(taskPolicySchema).default([]),
})

export type RawSourceBundle = z.infer<typeof sourceBundleSchema>
