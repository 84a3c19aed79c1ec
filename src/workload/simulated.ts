// src/workload/simulated.ts
import { setTimeout as sleep } from 'node:timers/promises'
import { inSpan } from '../core/span.js'
import { WorkloadMetrics } from '../core/metrics.js'
import type { Telemetry } from '../core/telemetry.js'

export interface WorkloadOptions {
  task?: string
  durationMs?: number
  /** Stand-in for real work; replace with business logic. */
  work?: () => Promise<void>
}

export type WorkloadTelemetry = Pick<Telemetry, 'logger' | 'tracer' | 'meter'>

export async function simulatedWork(t: WorkloadTelemetry, opts: WorkloadOptions = {}): Promise<void> {
  const task = opts.task ?? 'simulated_work'
  const durationMs = opts.durationMs ?? 150
  const work = opts.work ?? (() => sleep(durationMs))
  const metrics = new WorkloadMetrics(t.meter)

  await inSpan(t.tracer, 'simulated_work', async () => {
    const t0 = Date.now()
    t.logger.info({ task }, 'starting task')
    try {
      await work()
    } catch (err) {
      metrics.record({ task, outcome: 'error', elapsedMs: Date.now() - t0 })
      t.logger.error({ task, err }, 'task failed')
      throw err
    }
    metrics.record({ task, outcome: 'ok', elapsedMs: Date.now() - t0 })
    t.logger.info({ task }, 'completed task')
  }, { task })
}
