import fs from 'node:fs'
import path from 'node:path'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'
export type LogMeta = Record<string, unknown> | undefined

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

let currentLevel: LogLevel = 'info'
let fileStream: fs.WriteStream | null = null

export interface LoggerOptions {
  level: LogLevel
  /** Log file to append to; console only when omitted. */
  filePath?: string
}

export async function configureLogger(options: LoggerOptions): Promise<void> {
  currentLevel = options.level

  if (fileStream) {
    fileStream.end()
    fileStream = null
  }
  if (!options.filePath) return

  await fs.promises.mkdir(path.dirname(options.filePath), { recursive: true })
  const stream = openLogFile(options.filePath)
  fileStream = stream
  await new Promise<void>((resolve) => {
    stream.once('open', () => resolve())
    stream.once('error', () => resolve())
  })
}

function openLogFile(filePath: string): fs.WriteStream {
  const stream = fs.createWriteStream(filePath, { flags: 'a' })
  let reported = false
  // Open and write failures drop the file sink; console output continues.
  stream.on('error', (error) => {
    if (fileStream === stream) fileStream = null
    stream.destroy()
    if (reported) return
    reported = true
    console.error(formatLogLine('error', 'Log file unavailable; logging to console only', { path: filePath, error }))
  })
  return stream
}

function shouldLog(level: LogLevel): boolean {
  return levelOrder[level] >= levelOrder[currentLevel]
}

function serializeError(error: Error): Record<string, unknown> {
  const cause = error.cause
  return {
    name: error.name,
    message: error.message,
    stack: error.stack,
    cause: cause instanceof Error ? serializeError(cause) : cause,
  }
}

function toSerializable(value: unknown): unknown {
  if (value instanceof Error) return serializeError(value)
  if (value instanceof Map) return Object.fromEntries(value.entries())
  if (value instanceof Set) return Array.from(value.values())
  if (typeof value === 'bigint') return value.toString()
  return value
}

function safeJson(value: unknown): string {
  const seen = new WeakSet<object>()
  const replacer = (_key: string, val: unknown) => {
    if (typeof val === 'object' && val !== null) {
      if (seen.has(val)) return '[Circular]'
      seen.add(val)
    }
    return toSerializable(val)
  }
  return JSON.stringify(value, replacer)
}

export function formatLogLine(level: LogLevel, message: string, meta: LogMeta, timestamp = new Date()): string {
  const base = `[${timestamp.toISOString()}] [${level}] ${message}`
  if (!meta || Object.keys(meta).length === 0) return base
  return `${base} | ${safeJson(meta)}`
}

function write(line: string, level: LogLevel): void {
  if (level === 'error') {
    console.error(line)
  }
  else if (level === 'warn') {
    console.warn(line)
  }
  else {
    console.log(line)
  }

  fileStream?.write(`${line}\n`)
}

function log(level: LogLevel, message: string, meta?: LogMeta): void {
  if (!shouldLog(level)) return
  write(formatLogLine(level, message, meta), level)
}

export const logger = {
  debug: (message: string, meta?: LogMeta) => log('debug', message, meta),
  info: (message: string, meta?: LogMeta) => log('info', message, meta),
  warn: (message: string, meta?: LogMeta) => log('warn', message, meta),
  error: (message: string, meta?: LogMeta) => log('error', message, meta),
}

export function asErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}

export function maskSecret(value: string, keepStart = 3, keepEnd = 3): string {
  const trimmed = value.trim()
  if (trimmed.length <= keepStart + keepEnd) return '***'
  return `${trimmed.slice(0, keepStart)}***${trimmed.slice(-keepEnd)}`
}
