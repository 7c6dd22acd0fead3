import pLimit from 'p-limit'
import type { PageChecker } from '../checker/types.js'
import { evaluateChange, type ChangeKind } from '../evaluator/evaluate.js'
import type { FingerprintMap } from '../fingerprints/fingerprint.js'
import type { FingerprintStore } from '../fingerprints/store.js'
import type { NotificationDispatcher } from '../notifications/dispatcher.js'
import { buildAvailableMessage, buildChangedMessage } from '../notifications/messages.js'
import { logger } from '../../utils/logger.js'

export type ResourceOutcome = ChangeKind | 'skipped' | 'failed'

export interface CycleSummary {
  startedAt: string
  finishedAt: string
  outcomes: Record<string, ResourceOutcome>
  counts: Record<ResourceOutcome, number>
}

export interface BootstrapResult {
  mode: 'loaded' | 'collected'
  known: number
}

export interface MonitorServiceOptions {
  urls: string[]
  sentinelPhrase: string
  concurrency: number
  checker: PageChecker
  store: FingerprintStore
  dispatcher: NotificationDispatcher
}

function emptyCounts(): Record<ResourceOutcome, number> {
  return {
    initialized: 0,
    available: 0,
    changed: 0,
    unchanged: 0,
    skipped: 0,
    failed: 0,
  }
}

export class MonitorService {
  private readonly urls: string[]
  private readonly sentinelPhrase: string
  private readonly concurrency: number
  private readonly checker: PageChecker
  private readonly store: FingerprintStore
  private readonly dispatcher: NotificationDispatcher

  constructor(options: MonitorServiceOptions) {
    this.urls = options.urls
    this.sentinelPhrase = options.sentinelPhrase
    this.concurrency = Math.max(1, options.concurrency)
    this.checker = options.checker
    this.store = options.store
    this.dispatcher = options.dispatcher
  }

  /**
   * Loads the fingerprint file, or when there is none yet, fingerprints every
   * page once and writes them in a single save without notifying.
   */
  async bootstrap(): Promise<BootstrapResult> {
    if (await this.store.exists()) {
      const loaded = await this.store.load()
      const known = Object.keys(loaded).length
      logger.info('Fingerprint file loaded', { path: this.store.filePath, known })
      return { mode: 'loaded', known }
    }

    logger.info('Fingerprint file not found; collecting initial fingerprints', {
      path: this.store.filePath,
      urls: this.urls.length,
    })
    const limit = pLimit(this.concurrency)
    const results = await Promise.all(this.urls.map(url => limit(() => this.collectFingerprint(url))))

    const collected: FingerprintMap = {}
    for (const result of results) {
      if (!result) continue
      collected[result.url] = result.fingerprint
      logger.info('Initial fingerprint stored', { url: result.url })
    }
    await this.store.replaceAll(collected)

    return { mode: 'collected', known: Object.keys(collected).length }
  }

  private async collectFingerprint(url: string): Promise<{ url: string; fingerprint: string } | null> {
    try {
      const result = await this.checker.check(url)
      return result.ok ? { url, fingerprint: result.fingerprint } : null
    }
    catch (error) {
      logger.error('Initial fingerprint collection failed', { url, error })
      return null
    }
  }

  async runCycle(): Promise<CycleSummary> {
    const startedAt = new Date().toISOString()
    const limit = pLimit(this.concurrency)
    const outcomes = await Promise.all(
      this.urls.map(url => limit(() => this.processResource(url))),
    )

    const summary: CycleSummary = {
      startedAt,
      finishedAt: new Date().toISOString(),
      outcomes: {},
      counts: emptyCounts(),
    }
    this.urls.forEach((url, index) => {
      const outcome = outcomes[index] ?? 'failed'
      summary.outcomes[url] = outcome
      summary.counts[outcome] += 1
    })

    logger.info('Check cycle completed', { ...summary.counts })
    return summary
  }

  /** Fetch, evaluate, notify, then persist. Never rejects. */
  async processResource(url: string): Promise<ResourceOutcome> {
    try {
      const result = await this.checker.check(url)
      if (!result.ok) return 'skipped'

      const previous = this.store.get(url)
      const evaluation = evaluateChange({
        text: result.text,
        fingerprint: result.fingerprint,
        previous,
        sentinelPhrase: this.sentinelPhrase,
      })

      switch (evaluation.kind) {
        case 'initialized':
          logger.info('First check; fingerprint stored', { url })
          break
        case 'available':
          logger.info('Sentinel phrase missing from page', { url })
          break
        case 'changed':
          logger.info('Page fingerprint changed', { url, previous, current: result.fingerprint })
          break
        case 'unchanged':
          logger.info('No changes detected', { url })
          break
      }

      if (evaluation.notify) {
        const message = evaluation.kind === 'available'
          ? buildAvailableMessage(url)
          : buildChangedMessage(url)
        await this.dispatcher.send(message)
      }
      if (evaluation.record) {
        await this.store.record(url, result.fingerprint)
      }

      return evaluation.kind
    }
    catch (error) {
      logger.error('Unexpected error while processing page', { url, error })
      return 'failed'
    }
  }
}
