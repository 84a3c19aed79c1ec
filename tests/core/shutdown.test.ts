import { describe, it, expect, vi } from 'vitest'
import { EventEmitter } from 'node:events'
import { registerShutdownHooks, shutdownWithin } from '../../src/core/shutdown.js'
import type { ShutdownReport } from '../../src/core/types.js'

const resolved = (name: string) => ({ name, shutdown: () => Promise.resolve() })
const rejected = (name: string, message: string) => ({ name, shutdown: () => Promise.reject(new Error(message)) })
const hanging = (name: string) => ({ name, shutdown: () => new Promise<void>(() => {}) })

describe('shutdownWithin', () => {
  it('reports a clean shutdown', async () => {
    const report = await shutdownWithin([resolved('tracer'), resolved('logger')], 1000)
    expect(report.timedOut).toBe(false)
    expect(report.failures).toEqual([])
  })

  it('collects failures without throwing', async () => {
    const report = await shutdownWithin([resolved('tracer'), rejected('logger', 'collector down')], 1000)
    expect(report.timedOut).toBe(false)
    expect(report.failures).toEqual([{ component: 'logger', error: 'collector down' }])
  })

  it('stops waiting once the timeout elapses', async () => {
    const report = await shutdownWithin([resolved('tracer'), hanging('logger')], 50)
    expect(report.timedOut).toBe(true)
    expect(report.elapsed_ms).toBeGreaterThanOrEqual(45)
    expect(report.elapsed_ms).toBeLessThan(1000)
  })

  it('keeps failures seen before the timeout', async () => {
    const report = await shutdownWithin([rejected('meter', 'boom'), hanging('logger')], 50)
    expect(report.timedOut).toBe(true)
    expect(report.failures).toEqual([{ component: 'meter', error: 'boom' }])
  })

  it('handles an empty target list', async () => {
    const report = await shutdownWithin([], 50)
    expect(report).toMatchObject({ timedOut: false, failures: [] })
  })
})

describe('registerShutdownHooks', () => {
  const report: ShutdownReport = { timedOut: false, failures: [], elapsed_ms: 1 }

  it('shuts down and exits on SIGTERM', async () => {
    const source = new EventEmitter()
    const shutdown = vi.fn(async () => report)
    const exit = vi.fn()
    registerShutdownHooks({ shutdown }, { source, exit })

    source.emit('SIGTERM')

    await vi.waitFor(() => expect(exit).toHaveBeenCalledWith(0))
    expect(shutdown).toHaveBeenCalledOnce()
    expect(source.listenerCount('SIGINT')).toBe(0)
    expect(source.listenerCount('SIGTERM')).toBe(0)
  })

  it('removes its listeners when disposed', () => {
    const source = new EventEmitter()
    const dispose = registerShutdownHooks({ shutdown: async () => report }, { source, exit: vi.fn() })
    expect(source.listenerCount('SIGINT')).toBe(1)
    dispose()
    expect(source.listenerCount('SIGINT')).toBe(0)
    expect(source.listenerCount('SIGTERM')).toBe(0)
  })

  it('honours a custom signal list', () => {
    const source = new EventEmitter()
    registerShutdownHooks({ shutdown: async () => report }, { source, exit: vi.fn(), signals: ['SIGHUP'] })
    expect(source.listenerCount('SIGHUP')).toBe(1)
    expect(source.listenerCount('SIGINT')).toBe(0)
  })
})
