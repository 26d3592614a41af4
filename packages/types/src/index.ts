export * from './health'
export * from './inference'
export * from './validation'
