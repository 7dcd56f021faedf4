export * from './types'
export * from './metadata'
export * from './scanner'
export * from './decoder'
export * from './info'
export * from './export'
