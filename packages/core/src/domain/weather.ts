export interface WeatherReading {
  tempF: number
  condition: string // "Light rain", "Cloudy", ...
  precipProb: number // 0..1
  windMph: number
  timestamp: Date
}

export interface WeatherSnapshot {
  current: WeatherReading
  // hourly[i] is the forecast for hour offset i from now
  hourly: WeatherReading[]
}

export type WeatherChip = 'goodWindow' | 'wet' | 'heavyRain' | 'windy' | 'hot' | 'cold'

export type SuggestionKind = 'collection' | 'rain' | 'wind' | 'snow' | 'heat' | 'indoor' | 'generic'

export interface WeatherSuggestion {
  id: string
  kind: SuggestionKind
  title: string
  rationale: string
  checklist: string[]
  buildingId?: string
  dueBy?: Date
  // Set when the suggestion stands in for a deferred outdoor task
  // Deferred tasks this suggestion stands in for
  replacesTaskIds?: string[]
}
