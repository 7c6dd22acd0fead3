import { getZonedClock } from '../../utils/time.js'

export const HEARTBEAT_TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/

export interface HeartbeatTime {
  hour: number
  minute: number
  /** Normalized `HH:MM`. */
  label: string
}

export function parseHeartbeatTime(value: string): HeartbeatTime {
  const match = HEARTBEAT_TIME_PATTERN.exec(value.trim())
  if (!match) {
    throw new Error(`Invalid heartbeat time "${value}"; expected HH:MM`)
  }
  const hour = Number(match[1])
  const minute = Number(match[2])
  return { hour, minute, label: value.trim() }
}

export function parseHeartbeatTimes(values: string[]): HeartbeatTime[] {
  const byLabel = new Map<string, HeartbeatTime>()
  for (const value of values) {
    const time = parseHeartbeatTime(value)
    if (!byLabel.has(time.label)) byLabel.set(time.label, time)
  }
  return Array.from(byLabel.values())
}

/**
 * Schedule entries whose hour and minute equal the wall clock in `timezone`.
 * Evaluated once per poll, so a slot that no poll lands in is skipped.
 */
export function dueHeartbeats(now: Date, schedule: HeartbeatTime[], timezone: string): HeartbeatTime[] {
  const clock = getZonedClock(now, timezone)
  return schedule.filter(time => time.hour === clock.hour && time.minute === clock.minute)
}
