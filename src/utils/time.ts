import { setTimeout as delay } from 'node:timers/promises'

export interface ZonedClock {
  /** Calendar date in the zone, `YYYY-MM-DD`. */
  date: string
  hour: number
  minute: number
}

const formatterCache = new Map<string, Intl.DateTimeFormat>()

function getFormatter(timezone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timezone)
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-CA', {
      timeZone: timezone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      hourCycle: 'h23',
    })
    formatterCache.set(timezone, formatter)
  }
  return formatter
}

export function getZonedClock(date: Date, timezone: string): ZonedClock {
  const parts = getFormatter(timezone).formatToParts(date)
  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find(entry => entry.type === type)?.value ?? ''

  return {
    date: `${part('year')}-${part('month')}-${part('day')}`,
    hour: Number(part('hour')),
    minute: Number(part('minute')),
  }
}

export function isValidTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone })
    return true
  }
  catch {
    return false
  }
}

/** Resolves after `ms`, or early once `signal` aborts. */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal })
  }
  catch (error) {
    if (signal?.aborted) return
    throw error
  }
}
