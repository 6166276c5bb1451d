/**
 * YAML configuration loader with type-safe parsing
 */

import { readFileSync, existsSync } from 'fs'
import { resolve } from 'path'
import * as yaml from 'js-yaml'
import { validateConfig, validateConfigSafe, type FanoutConfig } from './schema'
import { ConfigurationError } from './environment'

export const DEFAULT_CONFIG_PATHS = [
  'fanout.config.yaml',
  'fanout.config.yml',
  '.fanout.yaml',
  '.fanout.yml',
  'config/fanout.yaml',
  'config/fanout.yml',
]

/**
 * Load and validate config from YAML file
 * @throws ConfigurationError if file doesn't exist or validation fails
 */
export function loadConfig(filePath: string): FanoutConfig {
  const absolutePath = resolve(filePath)

  if (!existsSync(absolutePath)) {
    throw new ConfigurationError(`Config file not found: ${absolutePath}`, { searchedPaths: [absolutePath] })
  }

  try {
    const fileContent = readFileSync(absolutePath, 'utf-8')
    const rawConfig = yaml.load(fileContent)

    return validateConfig(rawConfig)
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigurationError(`Failed to load config from ${filePath}: ${error.message}`)
    }
    throw error
  }
}

/**
 * Load config with detailed error reporting
 * Returns success/failure with error messages
 */
export function loadConfigSafe(filePath: string): { success: true; data: FanoutConfig } | { success: false; errors: string[] } {
  const absolutePath = resolve(filePath)

  if (!existsSync(absolutePath)) {
    return {
      success: false,
      errors: [`Config file not found: ${absolutePath}`]
    }
  }

  try {
    const fileContent = readFileSync(absolutePath, 'utf-8')
    return validateConfigSafe(yaml.load(fileContent))
  } catch (error) {
    return {
      success: false,
      errors: [`Failed to parse YAML: ${error instanceof Error ? error.message : String(error)}`]
    }
  }
}

/**
 * Try to load config from default locations, relative to `cwd`.
 * A file that exists but fails validation is an error, not a fallthrough.
 */
export function loadConfigFromDefaults(cwd: string = process.cwd()): FanoutConfig | undefined {
  for (const path of DEFAULT_CONFIG_PATHS) {
    const candidate = resolve(cwd, path)
    if (existsSync(candidate)) {
      return loadConfig(candidate)
    }
  }

  return undefined
}

/**
 * Load config from FANOUT_CONFIG_PATH, then default paths, then built-in defaults
 */
export function loadConfigAuto(env: NodeJS.ProcessEnv = process.env, cwd?: string): FanoutConfig {
  const configPath = env.FANOUT_CONFIG_PATH

  if (configPath) {
    return loadConfig(configPath)
  }

  return loadConfigFromDefaults(cwd) ?? validateConfig({})
}
