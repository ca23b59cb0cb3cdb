import { DEFAULT_PLANNER_CONFIG, loadPlannerConfig, logLevelFromEnv } from '../config'
import { PlanInputError } from '../errors'

describe('loadPlannerConfig', () => {
  test('an empty environment gives the defaults', () => {
    expect(DEFAULT_PLANNER_CONFIG).toEqual({
      timeZone: 'America/New_York',
      gpsRadiusMeters: 500,
      upcomingWindowMinutes: 60,
      routeMatchHours: 2,
      defaultStartHour: 9,
      defaultDurationMinutes: 60,
      horizonDays: 7,
      weather: { precipProb: 0.4, tempF: 45, windMph: 25, lookaheadHours: 2 },
      logLevel: 'warn',
      refreshDebounceMs: 750,
    })
  })

  test('coerces numeric variables', () => {
    const config = loadPlannerConfig({ PLAN_GPS_RADIUS_METERS: '250', WEATHER_DEFER_PRECIP: '0.6', PLAN_TIME_ZONE: 'America/Chicago' })
    expect(config.gpsRadiusMeters).toBe(250)
    expect(config.weather.precipProb).toBe(0.6)
    expect(config.timeZone).toBe('America/Chicago')
  })

  test('rejects unknown time zones with the offending variable', () => {
    let caught: unknown
    try {
      loadPlannerConfig({ PLAN_TIME_ZONE: 'Mars/Olympus_Mons' })
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(PlanInputError)
    if (caught instanceof PlanInputError) {
      expect(caught.code).toBe('invalid_payload')
      expect(caught.details).toEqual(['PLAN_TIME_ZONE: must be an IANA time zone'])
    }
  })

  test('rejects out-of-range values', () => {
    expect(() => loadPlannerConfig({ PLAN_HORIZON_DAYS: '0' })).toThrow(PlanInputError)
    expect(() => loadPlannerConfig({ PLAN_LOG_LEVEL: 'loud' })).toThrow(PlanInputError)
  })
})

describe('logLevelFromEnv', () => {
  test('reads PLAN_LOG_LEVEL and falls back to warn', () => {
    expect(logLevelFromEnv({ PLAN_LOG_LEVEL: 'debug' })).toBe('debug')
    expect(logLevelFromEnv({})).toBe('warn')
    expect(logLevelFromEnv({ PLAN_LOG_LEVEL: 'loud' })).toBe('warn')
  })
})
