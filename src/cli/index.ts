#!/usr/bin/env node
// src/cli/index.ts
import { realpathSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { Command } from 'commander'
import { z } from 'zod'
import { loadConfig, loadEnvFile, signalUrl } from '../core/config.js'
import { ConfigError } from '../core/errors.js'
import { initTelemetry } from '../core/telemetry.js'
import type { TelemetryDeps } from '../core/telemetry.js'
import { registerShutdownHooks } from '../core/shutdown.js'
import type { SignalSource } from '../core/shutdown.js'
import { simulatedWork } from '../workload/simulated.js'
import type { ConfigOverrides } from '../core/config.js'
import type { Sink } from '../core/types.js'

interface CliDeps {
  telemetry?: TelemetryDeps
  signals?: SignalSource
  exit?: (code: number) => void
  write?: (s: string) => void
}

interface RunOptions {
  console?: boolean
  otlpLogs?: boolean
  otlpTraces: boolean
  metrics?: boolean
  logLevel?: string
  logFormat?: string
  duration: string
}

export function buildCli(deps: CliDeps = {}): Command {
  const write = deps.write ?? ((s: string) => process.stdout.write(s + '\n'))
  const program = new Command()
  program
    .name('otel-service-starter')
    .description('Service starter with structured logging, tracing and metrics over OTLP')
    .version('0.1.0')

  // ---- run command ----
  program
    .command('run', { isDefault: true })
    .description('Initialize telemetry, run the simulated workload and shut down')
    .option('--console', 'write logs to the console')
    .option('--otlp-logs', 'export logs over OTLP')
    .option('--no-otlp-traces', 'do not export traces')
    .option('--metrics', 'export metrics over OTLP')
    .option('--log-level <level>', 'minimum log level')
    .option('--log-format <fmt>', 'console format: pretty | json')
    .option('--duration <ms>', 'simulated work duration', '150')
    .action(async (opts: RunOptions) => {
      const durationMs = parseDuration(opts.duration)
      const cfg = loadConfig(toOverrides(opts))
      const telemetry = initTelemetry(cfg, deps.telemetry)
      const disposeHooks = registerShutdownHooks(telemetry, { source: deps.signals, exit: deps.exit })
      const log = telemetry.logger

      log.info('application started')
      try {
        await simulatedWork(telemetry, { durationMs })
      } finally {
        log.info('shutting down')
        disposeHooks()
        const report = await telemetry.shutdown()
        write(JSON.stringify({ service: cfg.serviceName, sinks: cfg.sinks, shutdown: report }, null, 2))
      }
    })

  // ---- config command ----
  program
    .command('config')
    .description('Print the resolved telemetry configuration')
    .action(() => {
      const cfg = loadConfig()
      write(JSON.stringify({
        ...cfg,
        exports: {
          traces: signalUrl(cfg.endpoint, 'traces'),
          logs: signalUrl(cfg.endpoint, 'logs'),
          metrics: signalUrl(cfg.endpoint, 'metrics'),
        },
      }, null, 2))
    })

  return program
}

const Duration = z.coerce.number().int().positive()

function parseDuration(value: string): number {
  const parsed = Duration.safeParse(value)
  if (parsed.success) return parsed.data
  const issues = parsed.error.issues.map((i) => `duration: ${i.message}`)
  throw new ConfigError(`invalid --duration "${value}": ${issues.join('; ')}`, issues)
}

function toOverrides(opts: RunOptions): ConfigOverrides {
  const enable: Sink[] = []
  const disable: Sink[] = []
  if (opts.console) enable.push('console')
  if (opts.otlpLogs) enable.push('otlp-logs')
  if (opts.metrics) enable.push('otlp-metrics')
  if (!opts.otlpTraces) disable.push('otlp-traces')
  return { enable, disable, logLevel: opts.logLevel, logFormat: opts.logFormat }
}

// Direct entrypoint - only runs when file is executed directly
const entry = process.argv[1]
const isMain = entry !== undefined && realpathSync(entry) === fileURLToPath(import.meta.url)
if (isMain) {
  loadEnvFile()
  const program = buildCli()
  program.parseAsync(process.argv).catch((e: unknown) => {
    process.stderr.write(String(e) + '\n')
    process.exit(1)
  })
}
