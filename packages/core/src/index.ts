export * from './utils/error'
export * from './utils/logger'
export * from './utils/request'
