// src/core/shutdown.ts
import type { ShutdownFailure, ShutdownReport } from './types.js'

export interface ShutdownTarget {
  name: string
  shutdown(): Promise<void>
}

export interface Shutdownable {
  shutdown(): Promise<ShutdownReport>
}

/**
 * Shut every target down in parallel and wait until all settle or `timeoutMs`
 * elapses, whichever comes first. Never rejects.
 */
export async function shutdownWithin(
  targets: readonly ShutdownTarget[],
  timeoutMs: number,
): Promise<ShutdownReport> {
  const t0 = Date.now()
  const failures: ShutdownFailure[] = []

  const settled = Promise.all(
    targets.map((t) =>
      t.shutdown().catch((err: unknown) => {
        failures.push({ component: t.name, error: describeError(err) })
      }),
    ),
  ).then(() => 'settled' as const)

  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<'timeout'>((resolve) => {
    timer = setTimeout(() => resolve('timeout'), timeoutMs)
  })

  try {
    const outcome = await Promise.race([settled, timeout])
    return {
      timedOut: outcome === 'timeout',
      failures: [...failures],
      elapsed_ms: Date.now() - t0,
    }
  } finally {
    clearTimeout(timer)
  }
}

export interface SignalSource {
  once(event: NodeJS.Signals, listener: () => void): unknown
  removeListener(event: NodeJS.Signals, listener: () => void): unknown
}

export interface ShutdownHookOptions {
  signals?: NodeJS.Signals[]
  source?: SignalSource
  exit?: (code: number) => void
}

/**
 * On the first SIGINT/SIGTERM, shut telemetry down and exit. Returns a function
 * that removes the listeners.
 */
export function registerShutdownHooks(
  telemetry: Shutdownable,
  opts: ShutdownHookOptions = {},
): () => void {
  const signals = opts.signals ?? ['SIGINT', 'SIGTERM']
  const source: SignalSource = opts.source ?? process
  const exit = opts.exit ?? ((code: number) => process.exit(code))

  const onSignal = (): void => {
    dispose()
    void telemetry.shutdown().then(() => exit(0))
  }
  const dispose = (): void => {
    for (const s of signals) source.removeListener(s, onSignal)
  }

  for (const s of signals) source.once(s, onSignal)
  return dispose
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
