// src/core/telemetry.ts
// Telemetry bootstrap: traces always, console logs / OTLP logs / OTLP metrics
// depending on the configured sinks.
import { DiagLogLevel, context, createNoopMeter, diag, metrics, propagation, trace } from '@opentelemetry/api'
import type { Meter, Tracer } from '@opentelemetry/api'
import { OTLPLogExporter } from '@opentelemetry/exporter-logs-otlp-http'
import { OTLPMetricExporter } from '@opentelemetry/exporter-metrics-otlp-http'
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http'
import { resourceFromAttributes } from '@opentelemetry/resources'
import type { Resource } from '@opentelemetry/resources'
import { BatchLogRecordProcessor, LoggerProvider } from '@opentelemetry/sdk-logs'
import type { LogRecordExporter } from '@opentelemetry/sdk-logs'
import { MeterProvider, PeriodicExportingMetricReader } from '@opentelemetry/sdk-metrics'
import type { PushMetricExporter } from '@opentelemetry/sdk-metrics'
import { BatchSpanProcessor } from '@opentelemetry/sdk-trace-base'
import type { SpanExporter, SpanProcessor } from '@opentelemetry/sdk-trace-base'
import { NodeTracerProvider } from '@opentelemetry/sdk-trace-node'
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions'
import type pino from 'pino'
import { signalUrl } from './config.js'
import { TelemetryStateError } from './errors.js'
import { createOtlpLogStream } from './log-bridge.js'
import { consoleDestination, createLogger, toDiagLogger } from './logger.js'
import { shutdownWithin } from './shutdown.js'
import type { ShutdownTarget } from './shutdown.js'
import { hasSink } from './types.js'
import type { ShutdownReport, Signal, TelemetryConfig } from './types.js'

export const ATTR_DEPLOYMENT_ENVIRONMENT = 'deployment.environment'

/** Replaceable collaborators; defaults are the OTLP/HTTP exporters and stderr. */
export interface TelemetryDeps {
  spanExporter?: SpanExporter
  logExporter?: LogRecordExporter
  metricExporter?: PushMetricExporter
  console?: pino.DestinationStream
  diagnostics?: pino.DestinationStream
}

export interface Telemetry {
  readonly config: TelemetryConfig
  readonly logger: pino.Logger
  readonly tracer: Tracer
  readonly meter: Meter
  /** Export URL per enabled OTLP signal. */
  readonly endpoints: Partial<Record<Signal, string>>
  flush(): Promise<void>
  shutdown(): Promise<ShutdownReport>
}

let installed: Telemetry | undefined

export function isTelemetryInstalled(): boolean {
  return installed !== undefined
}

/**
 * Build the providers and the composite log sink, register the tracer
 * provider process-wide and return the handle that owns them.
 *
 * Exporters connect lazily, so an unreachable collector does not fail
 * startup; export errors go to the diagnostics logger.
 *
 * @throws TelemetryStateError when telemetry is already installed
 */
export function initTelemetry(cfg: TelemetryConfig, deps: TelemetryDeps = {}): Telemetry {
  if (installed) {
    throw new TelemetryStateError('telemetry is already initialized; shut it down before initializing again')
  }

  // Separate logger so exporter errors never feed back into the OTLP log sink
  const diagnostics = createLogger({
    level: 'warn',
    destinations: [deps.diagnostics ?? process.stderr],
    base: { component: 'telemetry' },
  })
  diag.setLogger(toDiagLogger(diagnostics), { logLevel: DiagLogLevel.WARN, suppressOverrideMessage: true })

  const resource = resourceFromAttributes({
    [ATTR_SERVICE_NAME]: cfg.serviceName,
    [ATTR_SERVICE_VERSION]: cfg.serviceVersion,
    [ATTR_DEPLOYMENT_ENVIRONMENT]: cfg.environment,
  })
  const buffer = { exportTimeoutMillis: cfg.shutdownTimeoutMs }
  // bounds the HTTP request itself, not just the wait for it
  const request = { timeoutMillis: cfg.shutdownTimeoutMs }
  const endpoints: Partial<Record<Signal, string>> = {}
  const targets: ShutdownTarget[] = []

  // Traces
  const spanProcessors: SpanProcessor[] = []
  if (hasSink(cfg, 'otlp-traces')) {
    endpoints.traces = signalUrl(cfg.endpoint, 'traces')
    const exporter = deps.spanExporter ?? new OTLPTraceExporter({ url: endpoints.traces, ...request })
    spanProcessors.push(new BatchSpanProcessor(exporter, buffer))
  }
  const tracerProvider = new NodeTracerProvider({ resource, spanProcessors })
  tracerProvider.register()
  targets.push({ name: 'tracer', shutdown: () => tracerProvider.shutdown() })

  // Logs
  const destinations: pino.DestinationStream[] = []
  if (hasSink(cfg, 'console')) {
    destinations.push(consoleDestination(cfg.logFormat, { stream: deps.console, file: cfg.logFile }))
  }
  let loggerProvider: LoggerProvider | undefined
  if (hasSink(cfg, 'otlp-logs')) {
    endpoints.logs = signalUrl(cfg.endpoint, 'logs')
    const exporter = deps.logExporter ?? new OTLPLogExporter({ url: endpoints.logs, ...request })
    const provider = new LoggerProvider({ resource, processors: [new BatchLogRecordProcessor(exporter, buffer)] })
    destinations.push(createOtlpLogStream(provider.getLogger(cfg.serviceName, cfg.serviceVersion)))
    targets.push({ name: 'logger', shutdown: () => provider.shutdown() })
    loggerProvider = provider
  }
  const logger = createLogger({
    level: cfg.logLevel,
    destinations,
    callsite: hasSink(cfg, 'console'),
  })

  // Metrics
  let meterProvider: MeterProvider | undefined
  if (hasSink(cfg, 'otlp-metrics')) {
    endpoints.metrics = signalUrl(cfg.endpoint, 'metrics')
    const exporter = deps.metricExporter ?? new OTLPMetricExporter({ url: endpoints.metrics, ...request })
    meterProvider = buildMeterProvider(cfg, resource, exporter)
    metrics.setGlobalMeterProvider(meterProvider)
    const provider = meterProvider
    targets.push({ name: 'meter', shutdown: () => provider.shutdown() })
  }

  let shuttingDown: Promise<ShutdownReport> | undefined

  const handle: Telemetry = {
    config: cfg,
    logger,
    tracer: tracerProvider.getTracer(cfg.serviceName, cfg.serviceVersion),
    meter: meterProvider?.getMeter(cfg.serviceName, cfg.serviceVersion) ?? createNoopMeter(),
    endpoints,

    async flush(): Promise<void> {
      await Promise.all([
        tracerProvider.forceFlush(),
        loggerProvider?.forceFlush(),
        meterProvider?.forceFlush(),
      ])
    },

    shutdown(): Promise<ShutdownReport> {
      shuttingDown ??= shutdownWithin(targets, cfg.shutdownTimeoutMs).then((report) => {
        if (report.timedOut) {
          diagnostics.warn({ timeout_ms: cfg.shutdownTimeoutMs }, 'telemetry shutdown timed out; remaining batches dropped')
        }
        for (const f of report.failures) {
          diagnostics.warn({ component: f.component, error: f.error }, 'telemetry shutdown failed')
        }
        logger.flush()
        release(handle)
        return report
      })
      return shuttingDown
    },
  }

  installed = handle
  return handle
}

function buildMeterProvider(cfg: TelemetryConfig, resource: Resource, exporter: PushMetricExporter): MeterProvider {
  const reader = new PeriodicExportingMetricReader({
    exporter,
    exportIntervalMillis: cfg.metricsIntervalMs,
    // must not exceed the interval
    exportTimeoutMillis: Math.min(cfg.shutdownTimeoutMs, cfg.metricsIntervalMs),
  })
  return new MeterProvider({ resource, readers: [reader] })
}

function release(handle: Telemetry): void {
  if (installed !== handle) return
  trace.disable()
  context.disable()
  propagation.disable()
  metrics.disable()
  diag.disable()
  installed = undefined
}
