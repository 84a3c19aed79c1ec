// src/core/metrics.ts
import type { Counter, Histogram, Meter } from '@opentelemetry/api'

export type TaskOutcome = 'ok' | 'error'

export interface TaskRecord {
  task: string
  outcome: TaskOutcome
  elapsedMs: number
}

export class WorkloadMetrics {
  private readonly tasks: Counter
  private readonly duration: Histogram

  constructor(meter: Meter) {
    this.tasks = meter.createCounter('workload.tasks', {
      description: 'Completed simulated tasks',
    })
    this.duration = meter.createHistogram('workload.duration', {
      description: 'Simulated task duration',
      unit: 'ms',
    })
  }

  record(r: TaskRecord): void {
    const attributes = { task: r.task, outcome: r.outcome }
    this.tasks.add(1, attributes)
    this.duration.record(r.elapsedMs, attributes)
  }
}
