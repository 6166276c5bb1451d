// Core exports
export type { Ref, DetailRecord, OutputMode, RetryPolicy } from './types'
export { DEFAULT_RETRY_POLICIES } from './types'
export * from './errors'

// Coordination primitives
export * from './storage'
export * from './runtime'
export * from './task/fetch-task'

// Remote client
export * from './client'

// Pipeline
export * from './pipelines'

// Configuration and observability
export * from './config'
export * from './observability'
