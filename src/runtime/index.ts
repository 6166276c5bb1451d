export * from './concurrency-limiter'
export * from './retry-handler'
