import { asErrorMessage, logger } from '../../utils/logger.js'
import type {
  TelegramApiResponse,
  TelegramMessage,
  TelegramSendMessageParams,
  TelegramUser,
} from './types.js'

const TELEGRAM_BASE_URL = 'https://api.telegram.org'
const REQUEST_TIMEOUT_MS = 20_000

export class TelegramRequestError extends Error {
  readonly method: string
  readonly status?: number
  readonly errorCode?: number
  readonly retryAfterSeconds?: number

  constructor(
    message: string,
    options: {
      method: string
      status?: number
      errorCode?: number
      retryAfterSeconds?: number
      cause?: unknown
    },
  ) {
    super(message, { cause: options.cause })
    this.name = 'TelegramRequestError'
    this.method = options.method
    this.status = options.status
    this.errorCode = options.errorCode
    this.retryAfterSeconds = options.retryAfterSeconds
  }
}

function isApiResponse(value: unknown): value is TelegramApiResponse<unknown> {
  return typeof value === 'object' && value !== null && 'ok' in value
}

function parsePayload(text: string): TelegramApiResponse<unknown> | null {
  try {
    const json: unknown = JSON.parse(text)
    return isApiResponse(json) ? json : null
  }
  catch {
    return null
  }
}

/** Minimal Bot API client: only the calls a notification channel needs. */
export class TelegramBotApiClient {
  private readonly baseUrl: string

  constructor(token: string, baseUrl = TELEGRAM_BASE_URL) {
    this.baseUrl = `${baseUrl}/bot${token}`
  }

  async getMe(): Promise<TelegramUser> {
    return this.request<TelegramUser>('getMe')
  }

  async sendMessage(params: TelegramSendMessageParams): Promise<TelegramMessage> {
    return this.request<TelegramMessage>('sendMessage', {
      chat_id: params.chatId,
      message_thread_id: params.threadId,
      text: params.text,
      disable_web_page_preview: params.disableWebPreview ?? true,
    })
  }

  private async request<T>(method: string, body?: Record<string, unknown>): Promise<T> {
    let response: Response
    try {
      response = await fetch(`${this.baseUrl}/${method}`, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      })
    }
    catch (error) {
      throw new TelegramRequestError(`Telegram ${method} failed: ${asErrorMessage(error)}`, { method, cause: error })
    }

    const payload = parsePayload(await response.text())
    // Result shape is fixed by the Bot API method.
    if (response.ok && payload?.ok) return payload.result as T

    const failure = payload && !payload.ok ? payload : null
    logger.debug('Telegram API error response', { method, status: response.status, body: failure })
    throw new TelegramRequestError(
      failure?.description ?? (response.ok ? `Telegram ${method} returned an invalid payload` : `Telegram ${method} returned HTTP ${response.status}`),
      {
        method,
        status: response.status,
        errorCode: failure?.error_code,
        retryAfterSeconds: failure?.parameters?.retry_after,
      },
    )
  }
}
