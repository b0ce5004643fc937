export * from './provide'
export * from './providers/google_cloud'
export * from './providers/google_web'
export * from './providers/noop'
