import { getZonedClock, sleep as defaultSleep } from '../../utils/time.js'
import { logger } from '../../utils/logger.js'
import type { NotificationDispatcher } from '../notifications/dispatcher.js'
import { buildHeartbeatMessage } from '../notifications/messages.js'
import type { BootstrapResult, CycleSummary } from '../monitor/service.js'
import { dueHeartbeats, type HeartbeatTime } from './heartbeat.js'

export type CycleOutcome =
  | { status: 'ok'; summary: CycleSummary; heartbeats: string[] }
  | { status: 'error'; error: unknown }

export interface CycleRunner {
  bootstrap(): Promise<BootstrapResult>
  runCycle(): Promise<CycleSummary>
}

export interface SchedulerOptions {
  monitor: CycleRunner
  dispatcher: NotificationDispatcher
  intervalMs: number
  recoveryDelayMs: number
  heartbeats: HeartbeatTime[]
  timezone: string
  now?: () => Date
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
}

export class SchedulerService {
  private readonly monitor: CycleRunner
  private readonly dispatcher: NotificationDispatcher
  private readonly intervalMs: number
  private readonly recoveryDelayMs: number
  private readonly heartbeats: HeartbeatTime[]
  private readonly timezone: string
  private readonly now: () => Date
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>
  private readonly sentHeartbeats = new Set<string>()
  private readonly stopController = new AbortController()

  constructor(options: SchedulerOptions) {
    this.monitor = options.monitor
    this.dispatcher = options.dispatcher
    this.intervalMs = options.intervalMs
    this.recoveryDelayMs = options.recoveryDelayMs
    this.heartbeats = options.heartbeats
    this.timezone = options.timezone
    this.now = options.now ?? (() => new Date())
    this.sleep = options.sleep ?? defaultSleep
  }

  async start(): Promise<void> {
    logger.info('Scheduler starting', {
      intervalMs: this.intervalMs,
      recoveryDelayMs: this.recoveryDelayMs,
      heartbeats: this.heartbeats.map(time => time.label),
      timezone: this.timezone,
    })

    const bootstrap = await this.monitor.bootstrap()
    logger.info('Monitoring started', { ...bootstrap })

    while (!this.isStopped()) {
      const outcome = await this.runOnce()
      if (this.isStopped()) break
      await this.sleep(
        outcome.status === 'ok' ? this.intervalMs : this.recoveryDelayMs,
        this.stopController.signal,
      )
    }

    logger.info('Scheduler stopped')
  }

  /** Ends the loop once the running cycle finishes; a pending sleep is cut short. */
  stop(): void {
    this.stopController.abort()
  }

  isStopped(): boolean {
    return this.stopController.signal.aborted
  }

  /** One poll cycle followed by the heartbeat check. Never rejects. */
  async runOnce(): Promise<CycleOutcome> {
    try {
      const summary = await this.monitor.runCycle()
      const heartbeats = await this.sendDueHeartbeats()
      return { status: 'ok', summary, heartbeats }
    }
    catch (error) {
      logger.error('Check cycle failed; retrying after recovery delay', {
        recoveryDelayMs: this.recoveryDelayMs,
        error,
      })
      return { status: 'error', error }
    }
  }

  private async sendDueHeartbeats(): Promise<string[]> {
    const now = this.now()
    const due = dueHeartbeats(now, this.heartbeats, this.timezone)
    if (due.length === 0) return []

    const { date } = getZonedClock(now, this.timezone)
    const sent: string[] = []
    for (const time of due) {
      // A poll interval shorter than a minute would otherwise repeat the slot.
      const slot = `${date} ${time.label}`
      if (this.sentHeartbeats.has(slot)) continue
      this.sentHeartbeats.add(slot)
      logger.info('Heartbeat due', { slot })
      await this.dispatcher.send(buildHeartbeatMessage())
      sent.push(time.label)
    }
    this.pruneSentHeartbeats(date)
    return sent
  }

  private pruneSentHeartbeats(today: string): void {
    for (const slot of this.sentHeartbeats) {
      if (!slot.startsWith(today)) this.sentHeartbeats.delete(slot)
    }
  }
}
