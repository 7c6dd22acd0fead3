import { asErrorMessage, logger } from '../../utils/logger.js'
import type { Notifier } from './types.js'

/** Delivery failures are logged and reported as `false`; nothing is thrown. */
export class NotificationDispatcher {
  private readonly notifier: Notifier

  constructor(notifier: Notifier) {
    this.notifier = notifier
  }

  async send(message: string): Promise<boolean> {
    try {
      await this.notifier.send(message)
      logger.info('Notification sent', { channel: this.notifier.name, message })
      return true
    }
    catch (error) {
      logger.error('Notification delivery failed', {
        channel: this.notifier.name,
        message,
        error: asErrorMessage(error),
      })
      return false
    }
  }
}
