// tests/helpers.ts
import type pino from 'pino'
import { isRecord } from '../src/core/types.js'
import type { TelemetryConfig } from '../src/core/types.js'

/** pino destination that keeps every line in memory. */
export class LineCapture implements pino.DestinationStream {
  readonly lines: string[] = []

  write(msg: string): void {
    this.lines.push(msg)
  }

  json(): Record<string, unknown>[] {
    return this.lines.map((l) => {
      const parsed: unknown = JSON.parse(l)
      if (!isRecord(parsed)) throw new Error(`not a JSON object: ${l}`)
      return parsed
    })
  }

  messages(): unknown[] {
    return this.json().map((l) => l['msg'])
  }
}

export function testConfig(overrides: Partial<TelemetryConfig> = {}): TelemetryConfig {
  return {
    serviceName: 'test-service',
    serviceVersion: '1.2.3',
    environment: 'test',
    endpoint: 'http://collector.test:4318',
    sinks: ['otlp-traces'],
    logLevel: 'info',
    logFormat: 'json',
    logFile: undefined,
    shutdownTimeoutMs: 1000,
    metricsIntervalMs: 60000,
    ...overrides,
  }
}
