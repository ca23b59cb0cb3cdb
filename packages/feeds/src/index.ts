export * from './schemas'
export * from './normalize'
export * from './sources'
export * from './gather'
export * from './static'
export * from './refresher'
