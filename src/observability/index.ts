import pino from 'pino'
import type { Logger } from 'pino'
import type { LogLevel } from '../config/schema'

/**
 * Observability - structured logging and metrics
 *
 * - Structured JSON logging via Pino, written to stderr so stdout stays free for results
 * - Run correlation through child loggers
 * - Basic metrics (counters, gauges, timings)
 */

export type { Logger }

export type Labels = Record<string, string>

/**
 * Metrics interface - simple counters and gauges
 */
export interface Metrics {
  increment(name: string, value?: number, labels?: Labels): void
  gauge(name: string, value: number, labels?: Labels): void
  timing(name: string, durationMs: number, labels?: Labels): void
}

/**
 * Simple in-memory metrics (can swap for Prometheus/Datadog later)
 */
export class InMemoryMetrics implements Metrics {
  private counters = new Map<string, number>()
  private gauges = new Map<string, number>()

  increment(name: string, value: number = 1, labels?: Labels): void {
    const key = this.makeKey(name, labels)
    this.counters.set(key, (this.counters.get(key) || 0) + value)
  }

  gauge(name: string, value: number, labels?: Labels): void {
    const key = this.makeKey(name, labels)
    this.gauges.set(key, value)
  }

  timing(name: string, durationMs: number, labels?: Labels): void {
    const key = this.makeKey(name, labels)
    this.counters.set(key, (this.counters.get(key) || 0) + durationMs)
  }

  private makeKey(name: string, labels?: Labels): string {
    if (!labels) return name
    const labelStr = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}=${v}`)
      .join(',')
    return `${name}{${labelStr}}`
  }

  getCounter(name: string, labels?: Labels): number {
    return this.counters.get(this.makeKey(name, labels)) || 0
  }

  getGauge(name: string, labels?: Labels): number {
    return this.gauges.get(this.makeKey(name, labels)) || 0
  }

  reset(): void {
    this.counters.clear()
    this.gauges.clear()
  }
}

export interface LoggerOptions {
  level?: LogLevel
  pretty?: boolean
  /** File descriptor or path; defaults to stderr */
  destination?: number | string
}

/**
 * Create a pino logger with optional pretty printing for dev
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const destination = options.destination ?? 2

  if (options.pretty) {
    return pino({
      level: options.level || 'info',
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
          destination,
        },
      },
    })
  }

  return pino({ level: options.level || 'info' }, pino.destination(destination))
}

/**
 * Measure duration of an async operation
 */
export async function measureAsync<T>(
  metrics: Metrics,
  name: string,
  operation: () => Promise<T>,
  labels?: Labels
): Promise<T> {
  const start = Date.now()
  try {
    const result = await operation()
    metrics.timing(name, Date.now() - start, labels)
    return result
  } catch (error) {
    metrics.timing(name, Date.now() - start, { ...labels, status: 'error' })
    throw error
  }
}

/**
 * Default logger and metrics, used by components that aren't handed their own
 */
export const logger: Logger = createLogger({
  level: process.env.NODE_ENV === 'test' ? 'silent' : 'info',
})
export const metrics = new InMemoryMetrics()
