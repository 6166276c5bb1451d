/**
 * Configuration module
 * YAML config with Zod validation, defaults, and FANOUT_* environment overrides
 */

export * from './schema'
export * from './loader'
export * from './environment'
