export * from './types'
export * from './constants'
export * from './ports'
export * from './utils'
export * from './permit'
