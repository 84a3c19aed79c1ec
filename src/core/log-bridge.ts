// src/core/log-bridge.ts
// Bridges pino's JSON lines into OpenTelemetry log records.
import { SeverityNumber } from '@opentelemetry/api-logs'
import type { AnyValue, AnyValueMap, LogAttributes, Logger as OtelLogger } from '@opentelemetry/api-logs'
import {
  ATTR_EXCEPTION_MESSAGE,
  ATTR_EXCEPTION_STACKTRACE,
  ATTR_EXCEPTION_TYPE,
} from '@opentelemetry/semantic-conventions'
import type pino from 'pino'
import { isRecord } from './types.js'

export const ATTR_CODE_FILEPATH = 'code.filepath'
export const ATTR_CODE_LINENO = 'code.lineno'

interface Severity {
  number: SeverityNumber
  text: string
}

// pino numeric levels
const SEVERITIES: Record<number, Severity> = {
  10: { number: SeverityNumber.TRACE, text: 'TRACE' },
  20: { number: SeverityNumber.DEBUG, text: 'DEBUG' },
  30: { number: SeverityNumber.INFO, text: 'INFO' },
  40: { number: SeverityNumber.WARN, text: 'WARN' },
  50: { number: SeverityNumber.ERROR, text: 'ERROR' },
  60: { number: SeverityNumber.FATAL, text: 'FATAL' },
}

// Carried by the record itself (timestamp, severity, body, span context) or by the resource
const RESERVED = new Set(['level', 'time', 'msg', 'pid', 'hostname', 'trace_id', 'span_id', 'caller', 'err'])

export function severityOf(level: unknown): Severity {
  if (typeof level !== 'number') return { number: SeverityNumber.UNSPECIFIED, text: 'UNSPECIFIED' }
  return SEVERITIES[level] ?? { number: SeverityNumber.UNSPECIFIED, text: String(level) }
}

/**
 * A pino destination that emits each line as an OTel log record. pino writes
 * synchronously, so the record picks up the caller's active span context.
 */
export function createOtlpLogStream(logger: OtelLogger): pino.DestinationStream {
  return {
    write(line: string): void {
      let parsed: unknown
      try {
        parsed = JSON.parse(line)
      } catch {
        logger.emit({ body: line.trimEnd(), severityNumber: SeverityNumber.UNSPECIFIED })
        return
      }
      if (!isRecord(parsed)) {
        logger.emit({ body: line.trimEnd(), severityNumber: SeverityNumber.UNSPECIFIED })
        return
      }
      const severity = severityOf(parsed['level'])
      const time = parsed['time']
      logger.emit({
        timestamp: typeof time === 'number' ? new Date(time) : new Date(),
        severityNumber: severity.number,
        severityText: severity.text,
        body: typeof parsed['msg'] === 'string' ? parsed['msg'] : '',
        attributes: toAttributes(parsed),
      })
    },
  }
}

export function toAttributes(line: Record<string, unknown>): LogAttributes {
  const attributes: LogAttributes = {}
  for (const [key, value] of Object.entries(line)) {
    if (RESERVED.has(key) || value === undefined) continue
    attributes[key] = toAnyValue(value)
  }

  const caller = line['caller']
  if (typeof caller === 'string') {
    const colon = caller.lastIndexOf(':')
    if (colon > 0) {
      attributes[ATTR_CODE_FILEPATH] = caller.slice(0, colon)
      attributes[ATTR_CODE_LINENO] = Number(caller.slice(colon + 1))
    }
  }

  // pino's standard error serializer: { type, message, stack }
  const err = line['err']
  if (isRecord(err)) {
    if (typeof err['type'] === 'string') attributes[ATTR_EXCEPTION_TYPE] = err['type']
    if (typeof err['message'] === 'string') attributes[ATTR_EXCEPTION_MESSAGE] = err['message']
    if (typeof err['stack'] === 'string') attributes[ATTR_EXCEPTION_STACKTRACE] = err['stack']
  }
  return attributes
}

function toAnyValue(value: unknown): AnyValue {
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value
  }
  if (Array.isArray(value)) return value.map(toAnyValue)
  if (isRecord(value)) {
    const map: AnyValueMap = {}
    for (const [k, v] of Object.entries(value)) map[k] = toAnyValue(v)
    return map
  }
  return String(value)
}
