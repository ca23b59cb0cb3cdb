import type { TaskCategory } from '../domain/task'
import type { WeatherReading, WeatherSnapshot } from '../domain/weather'
import { DEFAULT_PLANNER_CONFIG, type WeatherThresholds } from '../config'

// Title terms that mark work as happening outside
export const OUTDOOR_TERMS = [
  'hose',
  'hosing',
  'sidewalk',
  'exterior',
  'outdoor',
  'curb',
  'facade',
  'awning',
  'gutter',
  'roof',
  'treepit',
  'tree pit',
  'courtyard',
  'set-out',
  'set out',
] as const

export function isOutdoorTitle(title: string): boolean {
  const t = title.toLowerCase()
  return OUTDOOR_TERMS.some((term) => t.includes(term))
}

export interface WeatherProfile {
  sensitiveToPrecip: boolean
  sensitiveToWind: boolean
  idealPrecipProbMax?: number
  idealWindMax?: number
}

const INSENSITIVE: WeatherProfile = { sensitiveToPrecip: false, sensitiveToWind: false }

export const WEATHER_PROFILES: Record<TaskCategory, WeatherProfile> = {
  cleaning: { sensitiveToPrecip: true, sensitiveToWind: false, idealPrecipProbMax: 0.3, idealWindMax: 25 },
  sanitation: { sensitiveToPrecip: true, sensitiveToWind: true, idealPrecipProbMax: 0.4, idealWindMax: 30 },
  operations: { sensitiveToPrecip: false, sensitiveToWind: true, idealPrecipProbMax: 0.6, idealWindMax: 35 },
  maintenance: { sensitiveToPrecip: true, sensitiveToWind: false, idealPrecipProbMax: 0.2, idealWindMax: 20 },
  repair: { sensitiveToPrecip: true, sensitiveToWind: false, idealPrecipProbMax: 0.2, idealWindMax: 20 },
  inspection: INSENSITIVE,
  security: INSENSITIVE,
  administrative: INSENSITIVE,
  other: INSENSITIVE,
}

export interface WeatherWindow {
  maxPrecipProb: number
  maxWindMph: number
  minTempF: number
  maxTempF: number
}

// The next `hours` hourly readings, or the current reading when there is no forecast
export function lookahead(weather: WeatherSnapshot, hours: number): WeatherReading[] {
  const next = weather.hourly.slice(0, hours)
  return next.length > 0 ? next : [weather.current]
}

export function summarizeWindow(readings: WeatherReading[]): WeatherWindow {
  return {
    maxPrecipProb: Math.max(...readings.map((r) => r.precipProb)),
    maxWindMph: Math.max(...readings.map((r) => r.windMph)),
    minTempF: Math.min(...readings.map((r) => r.tempF)),
    maxTempF: Math.max(...readings.map((r) => r.tempF)),
  }
}

export function shouldDeferOutdoorWork(
  weather: WeatherSnapshot,
  thresholds: WeatherThresholds = DEFAULT_PLANNER_CONFIG.weather,
): boolean {
  return lookahead(weather, thresholds.lookaheadHours).some(
    (r) => r.precipProb >= thresholds.precipProb || r.tempF <= thresholds.tempF || r.windMph >= thresholds.windMph,
  )
}
