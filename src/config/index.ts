import path from 'node:path'
import dotenv from 'dotenv'
import { z } from 'zod'
import { HEARTBEAT_TIME_PATTERN } from '../core/scheduler/heartbeat.js'
import { isValidTimezone } from '../utils/time.js'

dotenv.config()

const DEFAULT_HEARTBEAT_TIMES = '12:00,18:00'
const DEFAULT_SENTINEL_PHRASE = 'Билеты появятся позже'

const optionalString = z.preprocess((value) => {
  if (typeof value === 'string' && value.trim().length === 0) return undefined
  return value
}, z.string().optional())

const boolSchema = (defaultValue: boolean) => z.preprocess((value) => {
  if (typeof value === 'boolean') return value
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase()
    if (normalized === '') return undefined
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false
  }
  return value
}, z.boolean().default(defaultValue))

const integerSchema = (defaultValue: number, minValue: number) => z.preprocess((value) => {
  if (typeof value === 'string') {
    if (value.trim().length === 0) return undefined
    const parsed = Number(value)
    return Number.isFinite(parsed) ? parsed : value
  }
  return value
}, z.number().int().min(minValue).default(defaultValue))

const optionalIntegerSchema = (minValue: number) => z.preprocess((value) => {
  if (typeof value === 'string') {
    if (value.trim().length === 0) return undefined
    const parsed = Number(value)
    return Number.isFinite(parsed) ? parsed : value
  }
  return value
}, z.number().int().min(minValue).optional())

const logLevelSchema = z.preprocess((value) => {
  if (typeof value === 'string') return value.toLowerCase()
  return value
}, z.enum(['debug', 'info', 'warn', 'error']).default('info'))

function isHttpUrl(value: string): boolean {
  try {
    const protocol = new URL(value).protocol
    return protocol === 'http:' || protocol === 'https:'
  }
  catch {
    return false
  }
}

const httpUrlSchema = z.string().refine(isHttpUrl, { message: 'Only absolute http and https URLs can be monitored' })

const urlListSchema = z.preprocess((value) => {
  if (value === undefined) return undefined
  if (typeof value !== 'string') return value
  if (value.trim().length === 0) return undefined
  try {
    return JSON.parse(value)
  }
  catch {
    return value
  }
}, z.array(httpUrlSchema).default([]))

const heartbeatTimesSchema = z.preprocess((value) => {
  if (typeof value !== 'string') return value
  return value
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0)
}, z.array(z.string().regex(HEARTBEAT_TIME_PATTERN, 'Expected HH:MM')))

const envSchema = z.object({
  DATA_PATH: z.string().default('.data'),
  HASH_FILE_PATH: optionalString,
  URLS_TO_MONITOR: urlListSchema,
  CHECK_INTERVAL_SECONDS: integerSchema(300, 1),
  RECOVERY_DELAY_SECONDS: integerSchema(60, 1),
  HEARTBEAT_TIMES: z.preprocess(
    value => (value === undefined ? DEFAULT_HEARTBEAT_TIMES : value),
    heartbeatTimesSchema,
  ),
  TZ: z.preprocess(
    value => (typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined),
    z.string().default('Europe/Moscow'),
  ).refine(isValidTimezone, { message: 'Unknown timezone' }),
  SENTINEL_PHRASE: z.preprocess(
    value => (typeof value === 'string' && value.trim().length === 0 ? undefined : value),
    z.string().min(1).default(DEFAULT_SENTINEL_PHRASE),
  ),
  FETCH_TIMEOUT_MS: integerSchema(30_000, 1000),
  FETCH_CONCURRENCY: integerSchema(3, 1),
  FETCH_USER_AGENT: z.string().default('pagewatch/0.1'),
  LOG_LEVEL: logLevelSchema,
  LOG_PATH: optionalString,
  TELEGRAM_BOT_TOKEN: optionalString,
  TELEGRAM_CHAT_ID: optionalString,
  TELEGRAM_THREAD_ID: optionalIntegerSchema(1),
  TELEGRAM_DISABLE_NOTIFICATION: boolSchema(false),
  DISCORD_WEBHOOK_URL: optionalString.pipe(z.string().url().optional()),
})

export type AppConfig = z.infer<typeof envSchema> & {
  hashFilePath: string
  logPath: string
  urls: string[]
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env)
  const dataPath = parsed.DATA_PATH
  const hashFilePath = parsed.HASH_FILE_PATH
    ? parsed.HASH_FILE_PATH
    : path.join(dataPath, 'page_hashes.json')
  const logPath = parsed.LOG_PATH
    ? parsed.LOG_PATH
    : path.join(dataPath, 'logs', 'pagewatch.log')
  const urls = Array.from(new Set(parsed.URLS_TO_MONITOR))

  return {
    ...parsed,
    hashFilePath,
    logPath,
    urls,
  }
}
