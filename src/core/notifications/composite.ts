import { asErrorMessage, logger } from '../../utils/logger.js'
import type { Notifier } from './types.js'

export class CompositeNotifier implements Notifier {
  readonly name = 'composite'
  private readonly notifiers: Notifier[]

  constructor(notifiers: Notifier[]) {
    this.notifiers = notifiers
  }

  /** Resolves when at least one channel delivered the message. */
  async send(message: string): Promise<void> {
    if (this.notifiers.length === 0) return

    const results = await Promise.allSettled(
      this.notifiers.map(notifier => notifier.send(message)),
    )

    const failures: unknown[] = []
    results.forEach((result, index) => {
      if (result.status === 'fulfilled') return
      failures.push(result.reason)
      logger.warn('Notifier delivery failed', {
        notifier: this.notifiers[index]?.name,
        error: asErrorMessage(result.reason),
      })
    })

    if (failures.length === this.notifiers.length) {
      throw new AggregateError(failures, 'All notification channels failed')
    }
  }
}

/** Writes messages to the log when no channel is configured. */
export class LogNotifier implements Notifier {
  readonly name = 'log'

  async send(message: string): Promise<void> {
    logger.info('Notification (no channel configured)', { message })
  }
}

export function combineNotifiers(notifiers: Notifier[]): Notifier {
  if (notifiers.length === 0) return new LogNotifier()
  if (notifiers.length === 1 && notifiers[0]) return notifiers[0]
  return new CompositeNotifier(notifiers)
}
