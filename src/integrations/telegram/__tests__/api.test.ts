import { afterEach, describe, expect, it, vi } from 'vitest'
import { TelegramBotApiClient, TelegramRequestError } from '../api.js'

const BASE_URL = 'https://telegram.test'

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } })
}

describe('TelegramBotApiClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('posts sendMessage as plain text without link previews', async () => {
    const message = { message_id: 7, date: 0, chat: { id: 42, type: 'private' } }
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse({ ok: true, result: message }))
    vi.stubGlobal('fetch', fetchMock)

    const result = await new TelegramBotApiClient('test-token', BASE_URL).sendMessage({ chatId: '42', text: 'hello' })

    expect(result).toEqual(message)
    const [url, init] = fetchMock.mock.calls[0] ?? []
    expect(url).toBe('https://telegram.test/bottest-token/sendMessage')
    expect(JSON.parse(String(init?.body))).toEqual({ chat_id: '42', text: 'hello', disable_web_page_preview: true })
  })

  it('carries retry_after from a rate-limit response', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({
      ok: false,
      error_code: 429,
      description: 'Too Many Requests: retry after 5',
      parameters: { retry_after: 5 },
    }, 429)))

    const error = await new TelegramBotApiClient('test-token', BASE_URL).getMe().catch((reason: unknown) => reason)

    expect(error).toBeInstanceOf(TelegramRequestError)
    expect(error).toMatchObject({
      message: 'Too Many Requests: retry after 5',
      method: 'getMe',
      status: 429,
      errorCode: 429,
      retryAfterSeconds: 5,
    })
  })

  it('describes an error status without a JSON body', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('<html>Bad Gateway</html>', { status: 502 })))

    await expect(new TelegramBotApiClient('test-token', BASE_URL).getMe())
      .rejects.toThrow('Telegram getMe returned HTTP 502')
  })

  it('wraps network failures with the cause', async () => {
    const cause = new Error('socket hang up')
    vi.stubGlobal('fetch', vi.fn(async () => {
      throw cause
    }))

    const error = await new TelegramBotApiClient('test-token', BASE_URL).getMe().catch((reason: unknown) => reason)

    expect(error).toBeInstanceOf(TelegramRequestError)
    expect(error).toMatchObject({ message: 'Telegram getMe failed: socket hang up', cause })
  })
})
