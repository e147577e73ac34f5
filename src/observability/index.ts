import pino from 'pino'
import type { Logger } from 'pino'

/**
 * Observability
 *
 * One pino root logger (components take children bound to `component`),
 * in-memory counters and timings, and the decision log.
 */

export interface ObservabilityOptions {
  pretty?: boolean
  level?: string
}

/**
 * Counters and timings keyed by name plus sorted labels
 */
export interface Metrics {
  increment(name: string, value?: number, labels?: Record<string, string>): void
  timing(name: string, durationMs: number, labels?: Record<string, string>): void
}

export interface TimingSummary {
  count: number
  totalMs: number
  maxMs: number
}

export function metricKey(name: string, labels?: Record<string, string>): string {
  if (!labels) return name
  const rendered = Object.keys(labels)
    .sort()
    .map(key => `${key}=${labels[key]}`)
    .join(',')
  return `${name}{${rendered}}`
}

/**
 * Process-local metrics, read back by tests and health endpoints
 */
export class InMemoryMetrics implements Metrics {
  private counters = new Map<string, number>()
  private timings = new Map<string, TimingSummary>()

  increment(name: string, value = 1, labels?: Record<string, string>): void {
    const key = metricKey(name, labels)
    this.counters.set(key, (this.counters.get(key) ?? 0) + value)
  }

  timing(name: string, durationMs: number, labels?: Record<string, string>): void {
    const key = metricKey(name, labels)
    const summary = this.timings.get(key) ?? { count: 0, totalMs: 0, maxMs: 0 }
    this.timings.set(key, {
      count: summary.count + 1,
      totalMs: summary.totalMs + durationMs,
      maxMs: Math.max(summary.maxMs, durationMs),
    })
  }

  getCounter(name: string, labels?: Record<string, string>): number {
    return this.counters.get(metricKey(name, labels)) ?? 0
  }

  getTiming(name: string, labels?: Record<string, string>): TimingSummary | undefined {
    return this.timings.get(metricKey(name, labels))
  }

  reset(): void {
    this.counters.clear()
    this.timings.clear()
  }
}

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL
  return process.env.VITEST ? 'silent' : 'info'
}

/**
 * Pino logger, pretty-printed in development
 */
export function createLogger(options?: ObservabilityOptions): Logger {
  return pino({
    name: 'catalog-concierge',
    level: options?.level || defaultLevel(),
    ...(options?.pretty && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      },
    }),
  })
}

/**
 * Process-wide logger and metrics, created on first use
 */
export class Observability {
  private static instance: Observability | undefined

  public logger: Logger
  public metrics: InMemoryMetrics

  private constructor(options?: ObservabilityOptions) {
    this.logger = createLogger(options)
    this.metrics = new InMemoryMetrics()
  }

  static getInstance(options?: ObservabilityOptions): Observability {
    if (!Observability.instance) {
      Observability.instance = new Observability({
        pretty: options?.pretty ?? process.env.LOG_PRETTY === 'true',
        level: options?.level,
      })
    }
    return Observability.instance
  }
}

/**
 * Defaults used when the host passes no logger or metrics
 */
export const obs = Observability.getInstance()
export const logger = obs.logger
export const metrics = obs.metrics

export * from './decision-log'
