export type BuildingStatus = 'current' | 'assigned' | 'available' | 'coverage' | 'unavailable'

export interface Coordinate {
  latitude: number
  longitude: number
}

export interface BuildingSummary {
  id: string
  name: string
  address: string
  coordinate: Coordinate
  status: BuildingStatus
}

export interface CheckIn {
  building: BuildingSummary
  checkedInAt: Date
  // Open-ended when absent
  expiresAt?: Date
}
