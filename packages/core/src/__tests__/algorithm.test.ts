import { setLogLevel } from '../logger'
import { buildPlan } from '../planner/algorithm'
import type { PlanSources } from '../planner/types'
import { building, local, routine, snapshot, task, trashRule } from './builders'

beforeAll(() => setLogLevel('silent'))

const now = local('09:30')

function sources(partial: Partial<PlanSources> = {}): PlanSources {
  return {
    routineInstances: [routine({ id: 'r1', buildingId: 'B1', title: 'Sweep lobby', startTime: local('09:00'), endTime: local('10:00') })],
    tasks: [
      task({ id: 't1', title: 'Hose sidewalks', buildingId: 'B1', dueTime: local('10:00'), category: 'cleaning' }),
      task({ id: 't2', title: 'Lobby check', buildingId: 'B2', dueTime: local('10:30'), category: 'inspection' }),
    ],
    routesByWeekday: {},
    weather: snapshot({ timestamp: now, precipProb: 0.2 }, [{ precipProb: 0.5 }, { precipProb: 0.3 }]),
    livePosition: null,
    assignedBuildings: [building('B1'), building('B2')],
    calendarRules: [trashRule({ buildingGroup: ['B1', 'B2'] })],
    ...partial,
  }
}

describe('buildPlan', () => {
  test('builds a seven day plan starting today', () => {
    const plan = buildPlan({ worker: { id: 'w1' }, now, sources: sources() })
    expect(plan.today).toBe('2026-10-20')
    expect(plan.weeklyPlan.days.map((d) => d.date)).toEqual([
      '2026-10-20',
      '2026-10-21',
      '2026-10-22',
      '2026-10-23',
      '2026-10-24',
      '2026-10-25',
      '2026-10-26',
    ])
    const [today, tomorrow] = plan.weeklyPlan.days
    expect(today?.items.map((e) => e.id)).toEqual([
      'r1',
      't1',
      't2',
      'circuit:trash:B1:2026-10-20',
      'circuit:trash:B2:2026-10-20',
    ])
    expect(today?.totalHours).toBe(5)
    expect(tomorrow?.items).toEqual([])
    expect(plan.issues).toEqual([])
  })

  test('resolves the current building and orders open work around the weather', () => {
    const plan = buildPlan({ worker: { id: 'w1' }, now, sources: sources() })
    expect(plan.currentBuilding?.id).toBe('B1')
    expect(plan.resolutionSource).toBe('activeWindow')
    expect(plan.buildings.map((b) => [b.id, b.status])).toEqual([
      ['B1', 'current'],
      ['B2', 'assigned'],
    ])
    expect(plan.outdoorDeferral).toBe(true)
    expect(plan.orderedUpcoming.map((s) => [s.task.id, s.score])).toEqual([
      ['r1', 0],
      ['t2', 3],
    ])
    expect(plan.deferredOutdoor.map((s) => [s.task.id, s.score])).toEqual([
      ['t1', 2],
      ['circuit:trash:B1:2026-10-20', 21],
      ['circuit:trash:B2:2026-10-20', 21],
    ])
  })

  test('suggestions lead with one indoor substitute per building, then the current building', () => {
    const plan = buildPlan({ worker: { id: 'w1' }, now, sources: sources() })
    expect(plan.suggestions.map((s) => s.title)).toEqual([
      'Indoor round while weather clears',
      'Indoor round while weather clears',
      'Trash set-out',
      'Clear roof & curb drains',
      'Deploy rain mats',
    ])
    expect(plan.suggestions.slice(0, 2).map((s) => [s.id, s.replacesTaskIds])).toEqual([
      ['indoorRound-B1', ['t1', 'circuit:trash:B1:2026-10-20']],
      ['indoorRound-B2', ['circuit:trash:B2:2026-10-20']],
    ])
  })

  test('without weather nothing is deferred and the gap is reported', () => {
    const plan = buildPlan({ worker: { id: 'w1' }, now, sources: sources({ weather: null }) })
    expect(plan.outdoorDeferral).toBe(false)
    expect(plan.deferredOutdoor).toEqual([])
    expect(plan.orderedUpcoming.map((s) => s.task.id)).toEqual([
      'r1',
      't1',
      't2',
      'circuit:trash:B1:2026-10-20',
      'circuit:trash:B2:2026-10-20',
    ])
    expect(plan.suggestions).toEqual([])
    expect(plan.issues.map((i) => i.kind)).toEqual(['MissingData'])
  })

  test('a worker with nothing assigned gets an empty plan and issues, not an error', () => {
    const plan = buildPlan({
      worker: { id: 'w1' },
      now,
      sources: sources({ routineInstances: [], tasks: [], calendarRules: [], assignedBuildings: [] }),
    })
    expect(plan.currentBuilding).toBeNull()
    expect(plan.resolutionSource).toBeNull()
    expect(plan.buildings).toEqual([])
    expect(plan.weeklyPlan.days.every((d) => d.items.length === 0)).toBe(true)
    expect(plan.issues.map((i) => i.message)).toEqual([
      'Worker w1 has no assigned buildings',
      'No building information to resolve a current building',
    ])
  })

  test('undated tasks land on today at the fallback building only', () => {
    const plan = buildPlan({
      worker: { id: 'w1' },
      now,
      sources: sources({ tasks: [task({ id: 't3', title: 'Check mailroom' })], calendarRules: [] }),
    })
    const [today, ...rest] = plan.weeklyPlan.days
    expect(today?.items.find((e) => e.id === 't3')).toMatchObject({ buildingId: 'B1', startTime: local('09:00') })
    expect(rest.every((d) => d.items.length === 0)).toBe(true)
  })

  test('routine templates expand on every day of the week', () => {
    const plan = buildPlan({
      worker: { id: 'w1' },
      now,
      sources: sources({
        routineInstances: [],
        tasks: [],
        calendarRules: [],
        routineTemplates: [{ id: 'boiler', buildingId: 'B2', title: 'Boiler check', rrule: 'FREQ=DAILY;BYHOUR=7', anchorDay: '2026-10-01' }],
      }),
    })
    expect(plan.weeklyPlan.days.map((d) => d.items.map((e) => e.id))).toEqual(
      plan.weeklyPlan.days.map((d) => [`boiler:${d.date}T0700`]),
    )
  })

  test('an unreadable routine template is reported once per plan', () => {
    const plan = buildPlan({
      worker: { id: 'w1' },
      now,
      sources: sources({
        calendarRules: [],
        routineTemplates: [{ id: 'bad', buildingId: 'B1', title: 'Roof check', rrule: 'INTERVAL=2', anchorDay: '2026-10-01' }],
      }),
    })
    expect(plan.issues).toEqual([
      { kind: 'MissingData', message: 'Routine bad has no usable recurrence rule', day: '2026-10-20', entryId: 'bad' },
    ])
  })

  test('a task folded into a routine keeps its photo requirement', () => {
    const plan = buildPlan({
      worker: { id: 'w1' },
      now,
      sources: sources({
        tasks: [task({ id: 'tp', title: 'Sweep lobby', buildingId: 'B1', dueTime: local('09:00'), requiresPhoto: true })],
        calendarRules: [],
      }),
    })
    expect(plan.weeklyPlan.days[0]?.items.map((e) => [e.id, e.memberIds, e.taskCount])).toEqual([['r1', ['tp'], 2]])
    expect(plan.orderedUpcoming.map((s) => [s.task.id, s.task.requiresPhoto])).toEqual([['r1', true]])
  })

  test('completed work stays on the schedule but leaves the upcoming list', () => {
    const plan = buildPlan({
      worker: { id: 'w1' },
      now,
      sources: sources({
        tasks: [task({ id: 't2', title: 'Lobby check', buildingId: 'B2', dueTime: local('10:30'), isCompleted: true })],
        calendarRules: [],
      }),
    })
    expect(plan.weeklyPlan.days[0]?.items.map((e) => [e.id, e.isCompleted])).toEqual([
      ['r1', false],
      ['t2', true],
    ])
    expect(plan.orderedUpcoming.map((s) => s.task.id)).toEqual(['r1'])
  })

  test('task policies apply to schedule-derived work', () => {
    const plan = buildPlan({
      worker: { id: 'w1' },
      now,
      sources: sources({
        taskPolicies: [{ id: 'lobby', when: { titleIncludes: ['lobby'] }, then: { minimumUrgency: 'urgent', requiresPhoto: true } }],
      }),
    })
    expect(plan.orderedUpcoming.map((s) => [s.task.id, s.task.urgency, s.task.requiresPhoto, s.score])).toEqual([
      ['r1', 'urgent', true, -2],
      ['t2', 'urgent', true, 1],
    ])
  })

  test('non-assigned buildings on today\'s schedule show as coverage', () => {
    const plan = buildPlan({
      worker: { id: 'w1' },
      now,
      sources: sources({
        routineInstances: [routine({ id: 'k', buildingId: 'K1', title: 'Cover shift', startTime: local('13:00') })],
        knownBuildings: [building('K1'), building('K2')],
        calendarRules: [],
      }),
    })
    expect(plan.buildings.map((b) => [b.id, b.status])).toEqual([
      ['B1', 'current'],
      ['B2', 'assigned'],
      ['K1', 'coverage'],
    ])
  })
})
