import { logger } from '../../utils/logger.js'

const DEFAULT_USER_AGENT = 'pagewatch/0.1'
const HTML_ACCEPT = 'text/html,application/xhtml+xml,application/xml;q=0.9,text/plain;q=0.8,*/*;q=0.7'
const PREVIEW_LENGTH = 180

export class PageFetchError extends Error {
  readonly url: string
  readonly status?: number

  constructor(message: string, options: { url: string; status?: number; cause?: unknown }) {
    super(message, { cause: options.cause })
    this.name = 'PageFetchError'
    this.url = options.url
    this.status = options.status
  }
}

export interface FetchDocumentOptions {
  timeoutMs: number
  userAgent?: string
}

export type DocumentFetcher = (url: string) => Promise<string>

export async function fetchDocument(url: string, options: FetchDocumentOptions): Promise<string> {
  const controller = new AbortController()
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs)

  let response: Response
  let body: string
  try {
    response = await fetch(url, {
      method: 'GET',
      headers: {
        accept: HTML_ACCEPT,
        'user-agent': options.userAgent ?? DEFAULT_USER_AGENT,
      },
      redirect: 'follow',
      signal: controller.signal,
    })
    body = await response.text()
  }
  catch (error) {
    const reason = controller.signal.aborted
      ? `timed out after ${options.timeoutMs}ms`
      : error instanceof Error ? error.message : String(error)
    throw new PageFetchError(`Request failed: ${reason}`, { url, cause: error })
  }
  finally {
    clearTimeout(timeout)
  }

  logger.debug('Page fetch response', { url, status: response.status, bytes: body.length })

  if (!response.ok) {
    const preview = body.length > PREVIEW_LENGTH ? `${body.slice(0, PREVIEW_LENGTH)}...` : body
    throw new PageFetchError(`HTTP ${response.status}: ${preview}`, { url, status: response.status })
  }

  return body
}

export function createDocumentFetcher(options: FetchDocumentOptions): DocumentFetcher {
  return url => fetchDocument(url, options)
}
