// src/core/config.ts
import { existsSync, readFileSync } from 'node:fs'
import { resolve } from 'node:path'
import { z } from 'zod'
import { ConfigError } from './errors.js'
import { LOG_LEVELS, SINKS, isSink } from './types.js'
import type { Sink, Signal, TelemetryConfig } from './types.js'

export const DEFAULT_ENDPOINT = 'http://localhost:4318'
export const DEFAULT_SERVICE_NAME = 'otel-service-starter'
export const DEFAULT_SERVICE_VERSION = '0.1.0'

// Load a .env file into process.env (does not override existing vars)
export function loadEnvFile(path = resolve(process.cwd(), '.env')): void {
  if (!existsSync(path)) return
  const content = readFileSync(path, 'utf8')
  for (const line of content.split('\n')) {
    const trimmed = line.trim()
    if (!trimmed || trimmed.startsWith('#')) continue
    const eq = trimmed.indexOf('=')
    if (eq === -1) continue
    const key = trimmed.slice(0, eq).trim()
    const val = trimmed.slice(eq + 1).trim().replace(/^["']|["']$/g, '')
    if (key && process.env[key] === undefined) process.env[key] = val
  }
}

const ConfigSchema = z.object({
  serviceName: z.string().min(1),
  serviceVersion: z.string().min(1),
  environment: z.string().min(1),
  endpoint: z
    .string()
    .url()
    .refine((u) => /^https?:\/\//.test(u), 'must be an http(s) URL')
    .transform((u) => u.replace(/\/+$/, '')),
  sinks: z.array(z.enum(SINKS)),
  logLevel: z.enum(LOG_LEVELS),
  logFormat: z.enum(['pretty', 'json']),
  logFile: z.string().min(1).optional(),
  shutdownTimeoutMs: z.number().int().positive(),
  metricsIntervalMs: z.number().int().positive(),
})

export interface ConfigOverrides {
  serviceName?: string
  endpoint?: string
  logLevel?: string
  logFormat?: string
  shutdownTimeoutMs?: number
  enable?: Sink[]
  disable?: Sink[]
}

export function loadConfig(overrides: ConfigOverrides = {}): TelemetryConfig {
  const env = process.env
  const { sinks, issues: sinkIssues } = parseSinks(env['TELEMETRY_SINKS'] ?? 'otlp-traces')
  for (const s of overrides.enable ?? []) sinks.add(s)
  for (const s of overrides.disable ?? []) sinks.delete(s)

  const raw = {
    serviceName: overrides.serviceName ?? env['OTEL_SERVICE_NAME'] ?? DEFAULT_SERVICE_NAME,
    serviceVersion: env['SERVICE_VERSION'] ?? env['npm_package_version'] ?? DEFAULT_SERVICE_VERSION,
    environment: env['DEPLOYMENT_ENV'] ?? 'dev',
    endpoint: overrides.endpoint ?? (env['OTEL_EXPORTER_OTLP_ENDPOINT'] || DEFAULT_ENDPOINT),
    sinks: [...sinks],
    logLevel: overrides.logLevel ?? env['LOG_LEVEL'] ?? 'info',
    logFormat: overrides.logFormat ?? env['LOG_FORMAT'] ?? 'pretty',
    logFile: env['LOG_FILE'] || undefined,
    shutdownTimeoutMs: overrides.shutdownTimeoutMs ?? Number(env['TELEMETRY_SHUTDOWN_TIMEOUT_MS'] ?? 5000),
    metricsIntervalMs: Number(env['OTEL_METRIC_EXPORT_INTERVAL'] ?? 60000),
  }

  const parsed = ConfigSchema.safeParse(raw)
  const issues = [
    ...sinkIssues,
    ...(parsed.success ? [] : parsed.error.issues.map((i) => `${i.path.join('.') || 'config'}: ${i.message}`)),
  ]
  if (!parsed.success || issues.length > 0) {
    throw new ConfigError(`invalid telemetry configuration: ${issues.join('; ')}`, issues)
  }

  const cfg = parsed.data
  return Object.freeze({
    ...cfg,
    logFile: cfg.logFile,
    sinks: Object.freeze([...cfg.sinks]),
  })
}

function parseSinks(value: string): { sinks: Set<Sink>; issues: string[] } {
  const names = value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean)
  const issues = names
    .filter((n) => !isSink(n))
    .map((n) => `sinks: unknown sink "${n}" (expected one of ${SINKS.join(', ')})`)
  return { sinks: new Set(names.filter(isSink)), issues }
}

export function signalUrl(endpoint: string, signal: Signal): string {
  return `${endpoint.replace(/\/+$/, '')}/v1/${signal}`
}
