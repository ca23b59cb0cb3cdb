export * from './domain/building'
export * from './domain/schedule'
export * from './domain/task'
export * from './domain/weather'
export * from './config'
export * from './errors'
export * from './logger'
export * from './planner/types'
export * from './planner/time'
export * from './planner/geo'
export * from './planner/resolver'
export * from './planner/merger'
export * from './planner/routines'
export * from './planner/calendar'
export * from './planner/policies'
export * from './planner/weather'
export * from './planner/scoring'
export * from './planner/suggestions'
export { buildPlan } from './planner/algorithm'
