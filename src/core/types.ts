// src/core/types.ts

export const SINKS = ['console', 'otlp-logs', 'otlp-traces', 'otlp-metrics'] as const
export type Sink = (typeof SINKS)[number]

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

export type LogFormat = 'pretty' | 'json'

export type Signal = 'traces' | 'logs' | 'metrics'

export interface TelemetryConfig {
  readonly serviceName: string
  readonly serviceVersion: string
  readonly environment: string
  readonly endpoint: string          // base OTLP/HTTP URL, no per-signal suffix
  readonly sinks: readonly Sink[]
  readonly logLevel: LogLevel
  readonly logFormat: LogFormat
  readonly logFile: string | undefined
  readonly shutdownTimeoutMs: number
  readonly metricsIntervalMs: number
}

export interface ShutdownFailure {
  component: string
  error: string
}

export interface ShutdownReport {
  timedOut: boolean
  failures: ShutdownFailure[]
  elapsed_ms: number
}

export function hasSink(config: Pick<TelemetryConfig, 'sinks'>, sink: Sink): boolean {
  return config.sinks.includes(sink)
}

export function isSink(value: string): value is Sink {
  return SINKS.some((s) => s === value)
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
