// src/core/callsite.ts
import { isAbsolute, relative, sep } from 'node:path'
import { fileURLToPath } from 'node:url'

export interface Callsite {
  file: string   // relative to cwd, forward slashes
  line: number
}

const SELF = fileURLToPath(import.meta.url)
const NODE_MODULES = `${sep}node_modules${sep}`

// "at fn (/abs/file.ts:12:5)", "at /abs/file.ts:12:5", "at async fn (file:///abs/file.js:12:5)"
const FRAME = /\(?((?:file:\/\/)?[^\s()]+):(\d+):\d+\)?$/

/**
 * First stack frame outside this module, node_modules, node internals and
 * any of the `skip` files.
 */
export function captureCallsite(skip: readonly string[] = []): Callsite | undefined {
  const limit = Error.stackTraceLimit
  Error.stackTraceLimit = 30
  const stack = new Error().stack ?? ''
  Error.stackTraceLimit = limit

  for (const frame of stack.split('\n').slice(1)) {
    const m = FRAME.exec(frame.trim())
    const location = m?.[1]
    const line = m?.[2]
    if (!location || !line) continue
    const file = location.startsWith('file://') ? fileURLToPath(location) : location
    if (!isAbsolute(file) || file === SELF || file.includes(NODE_MODULES) || skip.includes(file)) continue
    return { file: relative(process.cwd(), file).split(sep).join('/'), line: Number(line) }
  }
  return undefined
}

export function formatCallsite(site: Callsite): string {
  return `${site.file}:${site.line}`
}
