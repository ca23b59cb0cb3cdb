import { setLogLevel } from '../logger'
import {
  resolveCurrentBuilding,
  resolveCurrentBuildingWithSource,
  summarizeBuildings,
} from '../planner/resolver'
import type { WorkerState } from '../planner/types'
import { building, entry, local, metersNorth } from './builders'

beforeAll(() => setLogLevel('silent'))

const origin = { latitude: 0, longitude: 0 }

function state(partial: Partial<WorkerState> = {}): WorkerState {
  return {
    now: local('09:30'),
    checkIn: null,
    todaySchedule: [],
    livePosition: null,
    assignedBuildings: [building('B1'), building('B2')],
    ...partial,
  }
}

describe('resolveCurrentBuilding', () => {
  test('explicit check-in wins over schedule and GPS', () => {
    const b3 = building('B3', origin)
    const result = resolveCurrentBuildingWithSource(
      state({
        checkIn: { building: b3, checkedInAt: local('08:00') },
        todaySchedule: [entry({ id: 'e1', buildingId: 'B1', startTime: local('09:00'), endTime: local('10:00') })],
        livePosition: metersNorth(origin, 10),
        assignedBuildings: [building('B1'), building('B2', metersNorth(origin, 10))],
      }),
    )
    expect(result?.building.id).toBe('B3')
    expect(result?.source).toBe('checkIn')
    expect(result?.building.status).toBe('current')
  })

  test('expired check-in falls through to the active window', () => {
    const result = resolveCurrentBuildingWithSource(
      state({
        checkIn: { building: building('B3'), checkedInAt: local('07:00'), expiresAt: local('09:30') },
        todaySchedule: [entry({ id: 'e1', buildingId: 'B2', startTime: local('09:00'), endTime: local('10:00') })],
      }),
    )
    expect(result?.building.id).toBe('B2')
    expect(result?.source).toBe('activeWindow')
  })

  test('active window skips entries without a resolvable building', () => {
    const result = resolveCurrentBuildingWithSource(
      state({
        todaySchedule: [
          entry({ id: 'e1', buildingId: '', startTime: local('09:00'), endTime: local('10:00') }),
          entry({ id: 'e2', buildingId: 'ZZ', startTime: local('09:10'), endTime: local('10:00') }),
          entry({ id: 'e3', buildingId: 'B2', startTime: local('09:20'), endTime: local('10:00') }),
        ],
      }),
    )
    expect(result?.building.id).toBe('B2')
    expect(result?.source).toBe('activeWindow')
  })

  test('active window boundaries are inclusive', () => {
    const result = resolveCurrentBuilding(
      state({ todaySchedule: [entry({ id: 'e1', buildingId: 'B2', startTime: local('09:00'), endTime: local('09:30') })] }),
    )
    expect(result?.id).toBe('B2')
  })

  test('schedule entries may point at known buildings outside the assignment', () => {
    const result = resolveCurrentBuilding(
      state({
        todaySchedule: [entry({ id: 'e1', buildingId: 'K1', startTime: local('09:00'), endTime: local('10:00') })],
        knownBuildings: [building('K1')],
      }),
    )
    expect(result?.id).toBe('K1')
  })

  test('upcoming window picks the earliest entry starting within the hour', () => {
    const result = resolveCurrentBuildingWithSource(
      state({
        todaySchedule: [
          entry({ id: 'late', buildingId: 'B1', startTime: local('10:15'), endTime: local('11:00') }),
          entry({ id: 'soon', buildingId: 'B2', startTime: local('10:00'), endTime: local('11:00') }),
        ],
      }),
    )
    expect(result?.building.id).toBe('B2')
    expect(result?.source).toBe('upcomingWindow')
  })

  test('entries more than an hour out are not upcoming', () => {
    const result = resolveCurrentBuildingWithSource(
      state({
        todaySchedule: [entry({ id: 'e1', buildingId: 'B2', startTime: local('10:31'), endTime: local('11:00') })],
      }),
    )
    expect(result?.source).toBe('firstAssigned')
    expect(result?.building.id).toBe('B1')
  })

  test('GPS picks the building within range', () => {
    const far = building('B600', metersNorth(origin, 600))
    const near = building('B400', metersNorth(origin, -400))
    const result = resolveCurrentBuildingWithSource(state({ livePosition: origin, assignedBuildings: [far, near] }))
    expect(result?.building.id).toBe('B400')
    expect(result?.source).toBe('gpsProximity')
  })

  test('GPS ties go to the lowest building id', () => {
    const spot = metersNorth(origin, 100)
    const result = resolveCurrentBuilding(
      state({ livePosition: origin, assignedBuildings: [building('B9', spot), building('B2', spot)] }),
    )
    expect(result?.id).toBe('B2')
  })

  test('GPS with nothing in range falls back to the first assigned building', () => {
    const result = resolveCurrentBuildingWithSource(
      state({
        livePosition: origin,
        assignedBuildings: [building('B600', metersNorth(origin, 600)), building('B700', metersNorth(origin, 700))],
      }),
    )
    expect(result?.building.id).toBe('B600')
    expect(result?.source).toBe('firstAssigned')
  })

  test('returns the first assigned building when there are no other signals', () => {
    expect(resolveCurrentBuilding(state())?.id).toBe('B1')
  })

  test('returns null with no buildings at all', () => {
    expect(resolveCurrentBuilding(state({ assignedBuildings: [] }))).toBeNull()
  })
})

describe('summarizeBuildings', () => {
  test('marks exactly one building current', () => {
    const unavailable = { ...building('B3'), status: 'unavailable' as const }
    const view = summarizeBuildings(building('B2'), [building('B1'), building('B2'), unavailable], [building('K1')])
    expect(view.map((b) => [b.id, b.status])).toEqual([
      ['B1', 'assigned'],
      ['B2', 'current'],
      ['B3', 'unavailable'],
      ['K1', 'coverage'],
    ])
  })

  test('a current building outside every list is appended', () => {
    const view = summarizeBuildings(building('X1'), [building('B1')])
    expect(view.map((b) => [b.id, b.status])).toEqual([
      ['B1', 'assigned'],
      ['X1', 'current'],
    ])
  })
})
