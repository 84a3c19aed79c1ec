// Minimal telemetry setup for Node.js services: traces always, console logs,
// OTLP logs and OTLP metrics on demand.
//
//   const telemetry = initTelemetry(loadConfig())
//   telemetry.logger.info('application started')
//   // ... business logic ...
//   await telemetry.shutdown()   // flush remaining batches
export { loadConfig, loadEnvFile, signalUrl, DEFAULT_ENDPOINT } from './core/config.js'
export type { ConfigOverrides } from './core/config.js'
export { initTelemetry, isTelemetryInstalled } from './core/telemetry.js'
export type { Telemetry, TelemetryDeps } from './core/telemetry.js'
export { shutdownWithin, registerShutdownHooks } from './core/shutdown.js'
export type { ShutdownHookOptions, ShutdownTarget } from './core/shutdown.js'
export { createLogger } from './core/logger.js'
export { inSpan } from './core/span.js'
export { WorkloadMetrics } from './core/metrics.js'
export { simulatedWork } from './workload/simulated.js'
export { ConfigError, TelemetryStateError } from './core/errors.js'
export { SINKS, hasSink } from './core/types.js'
export type { Sink, LogLevel, LogFormat, TelemetryConfig, ShutdownReport, ShutdownFailure } from './core/types.js'
