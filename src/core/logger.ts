// src/core/logger.ts
import { fileURLToPath } from 'node:url'
import pino from 'pino'
import { trace } from '@opentelemetry/api'
import type { DiagLogger } from '@opentelemetry/api'
import { captureCallsite, formatCallsite } from './callsite.js'
import type { LogFormat, LogLevel } from './types.js'

export interface LoggerOptions {
  level?: LogLevel
  /** Every destination receives every line at or above `level`. Empty means silent. */
  destinations?: pino.DestinationStream[]
  base?: Record<string, unknown>
  /** Add `caller: "<file>:<line>"` to each line. */
  callsite?: boolean
}

const SELF = fileURLToPath(import.meta.url)

export function createLogger(opts: LoggerOptions = {}): pino.Logger {
  const level = opts.level ?? 'info'
  // Always log to stderr by default; stdout is reserved for command output
  const [first, ...rest] = opts.destinations ?? [process.stderr]
  if (!first || level === 'silent') return pino({ level: 'silent' })

  const options: pino.LoggerOptions = {
    level,
    mixin: () => contextFields(opts.callsite === true),
  }
  if (opts.base) options.base = opts.base

  if (rest.length === 0) return pino(options, first)
  const streams = [first, ...rest].map((stream) => ({ stream, level }))
  return pino(options, pino.multistream(streams))
}

export interface ConsoleOptions {
  file?: string
  stream?: pino.DestinationStream
}

export function consoleDestination(format: LogFormat, opts: ConsoleOptions = {}): pino.DestinationStream {
  if (opts.stream) return opts.stream
  if (format === 'pretty') {
    return pino.transport({
      target: 'pino-pretty',
      options: {
        destination: opts.file ?? 2,
        mkdir: true,
        colorize: opts.file === undefined,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname,caller',
        messageFormat: '{caller} {msg}',
      },
    })
  }
  return opts.file ? pino.destination({ dest: opts.file, mkdir: true }) : process.stderr
}

function contextFields(callsite: boolean): Record<string, unknown> {
  const fields: Record<string, unknown> = {}
  const span = trace.getActiveSpan()
  if (span) {
    const ctx = span.spanContext()
    fields['trace_id'] = ctx.traceId
    fields['span_id'] = ctx.spanId
  }
  if (callsite) {
    const site = captureCallsite([SELF])
    if (site) fields['caller'] = formatCallsite(site)
  }
  return fields
}

type DiagLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace'

/** Route OpenTelemetry's internal diagnostics into a pino logger. */
export function toDiagLogger(log: pino.Logger): DiagLogger {
  const emit = (level: DiagLevel) => (message: string, ...args: unknown[]): void => {
    if (args.length === 0) {
      log[level](message)
      return
    }
    log[level]({ details: args.map((a) => (a instanceof Error ? a.message : a)) }, message)
  }
  return {
    error: emit('error'),
    warn: emit('warn'),
    info: emit('info'),
    debug: emit('debug'),
    verbose: emit('trace'),
  }
}
