import type { Notifier } from '../../core/notifications/types.js'
import { asErrorMessage, logger, maskSecret } from '../../utils/logger.js'
import { sleep as defaultSleep } from '../../utils/time.js'
import { TelegramBotApiClient, TelegramRequestError } from './api.js'
import { toTelegramTextMessages } from './format.js'

const MAX_SEND_ATTEMPTS = 4
const MAX_RETRY_AFTER_SECONDS = 120

export type TelegramSender = Pick<TelegramBotApiClient, 'sendMessage'>

export interface TelegramNotifierOptions {
  api: TelegramSender
  chatId: string
  threadId?: number
  maxAttempts?: number
  sleep?: (ms: number) => Promise<void>
}

export interface TelegramNotifierConfig {
  botToken: string
  chatId: string
  threadId?: number
}

export class TelegramNotifier implements Notifier {
  readonly name = 'telegram'
  private readonly api: TelegramSender
  private readonly chatId: string
  private readonly threadId?: number
  private readonly maxAttempts: number
  private readonly sleep: (ms: number) => Promise<void>
  private sendChain: Promise<void> = Promise.resolve()

  constructor(options: TelegramNotifierOptions) {
    this.api = options.api
    this.chatId = options.chatId
    this.threadId = options.threadId
    this.maxAttempts = Math.max(1, options.maxAttempts ?? MAX_SEND_ATTEMPTS)
    this.sleep = options.sleep ?? defaultSleep
  }

  static async create(config: TelegramNotifierConfig): Promise<TelegramNotifier> {
    const api = new TelegramBotApiClient(config.botToken.trim())
    try {
      const me = await api.getMe()
      logger.info('Telegram bot ready', {
        username: me.username ?? '[unknown]',
        id: me.id,
      })
    }
    catch (error) {
      logger.warn('Telegram getMe failed; notifications will still be attempted', {
        error: asErrorMessage(error),
      })
    }

    logger.info('Telegram notifications configured', {
      chatId: maskSecret(config.chatId),
      threadId: config.threadId ?? null,
    })
    return new TelegramNotifier({ api, chatId: config.chatId.trim(), threadId: config.threadId })
  }

  async send(message: string): Promise<void> {
    const chunks = toTelegramTextMessages(message)
    if (chunks.length === 0) return

    const deliver = async () => {
      for (const chunk of chunks) {
        await this.sendWithRetry(chunk)
      }
    }
    const run = this.sendChain.then(deliver, deliver)

    this.sendChain = run.catch(() => undefined)
    await run
  }

  private async sendWithRetry(text: string): Promise<void> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      try {
        await this.api.sendMessage({
          chatId: this.chatId,
          threadId: this.threadId,
          text,
          disableWebPreview: true,
        })
        return
      }
      catch (error) {
        if (attempt >= this.maxAttempts) {
          logger.warn('Telegram send failed', {
            attempts: attempt,
            error: asErrorMessage(error),
          })
          throw error
        }

        const retryAfter = error instanceof TelegramRequestError ? error.retryAfterSeconds : undefined
        if (typeof retryAfter === 'number' && retryAfter > 0 && retryAfter <= MAX_RETRY_AFTER_SECONDS) {
          logger.warn('Telegram send rate-limited; retrying', {
            attempt,
            retryAfterSeconds: retryAfter,
          })
          await this.sleep((retryAfter + 1) * 1000)
          continue
        }

        const backoffMs = Math.min(15_000, attempt * 2_000)
        logger.warn('Telegram send failed; retrying', {
          attempt,
          backoffMs,
          error: asErrorMessage(error),
        })
        await this.sleep(backoffMs)
      }
    }
  }
}
