import { z } from 'zod'
import { IANAZone } from 'luxon'
import { PlanInputError } from './errors'

const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const

const configSchema = z.object({
  PLAN_TIME_ZONE: z
    .string()
    .default('America/New_York')
    .refine((zone) => IANAZone.isValidZone(zone), { message: 'must be an IANA time zone' }),
  PLAN_GPS_RADIUS_METERS: z.coerce.number().positive().default(500),
  PLAN_UPCOMING_WINDOW_MINUTES: z.coerce.number().int().nonnegative().default(60),
  PLAN_ROUTE_MATCH_HOURS: z.coerce.number().nonnegative().default(2),
  PLAN_DEFAULT_START_HOUR: z.coerce.number().int().min(0).max(23).default(9),
  PLAN_DEFAULT_DURATION_MINUTES: z.coerce.number().int().positive().default(60),
  PLAN_HORIZON_DAYS: z.coerce.number().int().min(1).max(31).default(7),
  WEATHER_DEFER_PRECIP: z.coerce.number().min(0).max(1).default(0.4),
  WEATHER_DEFER_TEMP_F: z.coerce.number().default(45),
  WEATHER_DEFER_WIND_MPH: z.coerce.number().nonnegative().default(25),
  WEATHER_LOOKAHEAD_HOURS: z.coerce.number().int().min(1).default(2),
  PLAN_LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
  PLAN_REFRESH_DEBOUNCE_MS: z.coerce.number().int().nonnegative().default(750),
})

export type LogLevelSetting = typeof LOG_LEVELS[number]

export interface WeatherThresholds {
  precipProb: number
  tempF: number
  windMph: number
  lookaheadHours: number
}

export interface PlannerConfig {
  timeZone: string
  gpsRadiusMeters: number
  upcomingWindowMinutes: number
  routeMatchHours: number
  defaultStartHour: number
  defaultDurationMinutes: number
  horizonDays: number
  weather: WeatherThresholds
  logLevel: LogLevelSetting
  refreshDebounceMs: number
}

export function loadPlannerConfig(env: Record<string, string | undefined> = process.env): PlannerConfig {
  const parsed = configSchema.safeParse(env)
  if (!parsed.success) {
    throw new PlanInputError(
      'invalid_payload',
      'Invalid planner configuration',
      parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    )
  }
  const c = parsed.data
  return {
    timeZone: c.PLAN_TIME_ZONE,
    gpsRadiusMeters: c.PLAN_GPS_RADIUS_METERS,
    upcomingWindowMinutes: c.PLAN_UPCOMING_WINDOW_MINUTES,
    routeMatchHours: c.PLAN_ROUTE_MATCH_HOURS,
    defaultStartHour: c.PLAN_DEFAULT_START_HOUR,
    defaultDurationMinutes: c.PLAN_DEFAULT_DURATION_MINUTES,
    horizonDays: c.PLAN_HORIZON_DAYS,
    weather: {
      precipProb: c.WEATHER_DEFER_PRECIP,
      tempF: c.WEATHER_DEFER_TEMP_F,
      windMph: c.WEATHER_DEFER_WIND_MPH,
      lookaheadHours: c.WEATHER_LOOKAHEAD_HOURS,
    },
    logLevel: c.PLAN_LOG_LEVEL,
    refreshDebounceMs: c.PLAN_REFRESH_DEBOUNCE_MS,
  }
}

export const DEFAULT_PLANNER_CONFIG: PlannerConfig = loadPlannerConfig({})

// Level the logger starts at; unreadable values fall back to the default
export function logLevelFromEnv(env: Record<string, string | undefined> = process.env): LogLevelSetting {
  const parsed = configSchema.shape.PLAN_LOG_LEVEL.safeParse(env.PLAN_LOG_LEVEL)
  return parsed.success ? parsed.data : DEFAULT_PLANNER_CONFIG.logLevel
}
