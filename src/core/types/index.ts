export * from './device'
export * from './model'
export * from './run'
export * from './bench-config'
export * from './invocation'
export * from './execution'
export * from './metrics'
export * from './reporting'
