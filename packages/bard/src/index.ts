export * from './auth'
export * from './client'
export * from './config'
export * from './conversation'
export * from './decoder'
export * from './encoder'
export * from './payload'
export * from './requester'
export * from './session'
export * from './translation'
export * from './types'
export * from './upload'
export * from './utils'
