import { setLogLevel } from '../logger'
import { circuitIdFor, injectCalendarTasks, ruleAppliesToWorker } from '../planner/calendar'
import { mergeDay } from '../planner/merger'
import { DAY, entry, local, routine, trashRule } from './builders'

beforeAll(() => setLogLevel('silent'))

describe('injectCalendarTasks', () => {
  test('a Tuesday evening rule adds one entry per building on Tuesday only', () => {
    const rules = [trashRule()]
    const tuesday = injectCalendarTasks({ day: DAY, workerId: 'w1', rules, existingEntries: [] })
    const merged = mergeDay({ day: DAY, routineInstances: [], tasks: [], routeSequences: [], extraEntries: tuesday.entries })
    expect(merged.items.map((e) => [e.id, e.buildingId, e.circuitId, e.sources])).toEqual([
      ['circuit:trash:B1:2026-10-20', 'B1', 'circuit:trash', ['calendar']],
      ['circuit:trash:B2:2026-10-20', 'B2', 'circuit:trash', ['calendar']],
      ['circuit:trash:B3:2026-10-20', 'B3', 'circuit:trash', ['calendar']],
    ])
    expect(merged.items.every((e) => e.startTime.getTime() === local('20:00').getTime())).toBe(true)
    expect(merged.items.every((e) => e.endTime.getTime() === local('21:00').getTime())).toBe(true)

    const monday = injectCalendarTasks({ day: '2026-10-19', workerId: 'w1', rules, existingEntries: [] })
    expect(monday.entries).toEqual([])
  })

  test('rules apply only to the workers they name', () => {
    const rules = [trashRule({ appliesToWorker: ['w2', 'w3'] })]
    expect(injectCalendarTasks({ day: DAY, workerId: 'w1', rules, existingEntries: [] }).entries).toEqual([])
    expect(injectCalendarTasks({ day: DAY, workerId: 'w3', rules, existingEntries: [] }).entries).toHaveLength(3)
  })

  test('entries already present by key are not emitted again', () => {
    const existing = entry({
      id: 'earlier-pass',
      buildingId: 'B2',
      title: 'trash set-out',
      startTime: local('20:00'),
      endTime: local('21:00'),
      sources: ['calendar'],
      circuitId: 'circuit:trash',
    })
    const result = injectCalendarTasks({ day: DAY, workerId: 'w1', rules: [trashRule()], existingEntries: [existing] })
    expect(result.entries.map((e) => e.buildingId)).toEqual(['B1', 'B3'])
  })

  test('injected entries do not fold into organic work with the same title', () => {
    const tuesday = injectCalendarTasks({ day: DAY, workerId: 'w1', rules: [trashRule({ buildingGroup: ['B1'] })], existingEntries: [] })
    const merged = mergeDay({
      day: DAY,
      routineInstances: [routine({ id: 'r1', title: 'Trash set-out', startTime: local('20:00'), endTime: local('21:00') })],
      tasks: [],
      routeSequences: [],
      extraEntries: tuesday.entries,
    })
    expect(merged.items.map((e) => e.id)).toEqual(['circuit:trash:B1:2026-10-20', 'r1'])
  })

  test('an explicit circuit id replaces the default', () => {
    const rule = trashRule({ circuitId: 'north-recycling', buildingGroup: ['B1'] })
    expect(circuitIdFor(rule)).toBe('north-recycling')
    const result = injectCalendarTasks({ day: DAY, workerId: 'w1', rules: [rule], existingEntries: [] })
    expect(result.entries.map((e) => e.id)).toEqual(['north-recycling:B1:2026-10-20'])
  })

  test('inverted windows are clamped and reported', () => {
    const rule = trashRule({ windowStart: { hour: 21, minute: 0 }, windowEnd: { hour: 20, minute: 0 }, buildingGroup: ['B1'] })
    const result = injectCalendarTasks({ day: DAY, workerId: 'w1', rules: [rule], existingEntries: [] })
    expect(result.entries[0]?.endTime).toEqual(local('21:00'))
    expect(result.issues.map((i) => [i.kind, i.entryId])).toEqual([['InvalidTimeWindow', 'trash']])
  })
})

describe('ruleAppliesToWorker', () => {
  test('matches the wildcard, a single id or a list', () => {
    expect(ruleAppliesToWorker(trashRule({ appliesToWorker: '*' }), 'w1')).toBe(true)
    expect(ruleAppliesToWorker(trashRule({ appliesToWorker: 'w1' }), 'w1')).toBe(true)
    expect(ruleAppliesToWorker(trashRule({ appliesToWorker: 'w2' }), 'w1')).toBe(false)
    expect(ruleAppliesToWorker(trashRule({ appliesToWorker: ['w1'] }), 'w1')).toBe(true)
  })
})
