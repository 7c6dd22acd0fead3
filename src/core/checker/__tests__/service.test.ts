import { describe, expect, it, vi } from 'vitest'
import { computeFingerprint } from '../../fingerprints/fingerprint.js'
import { PageFetchError } from '../../../integrations/pages/fetcher.js'
import { ResourceChecker } from '../service.js'

const URL_A = 'https://tickets.test/a'

describe('ResourceChecker', () => {
  it('fingerprints the visible text of the fetched page', async () => {
    const fetchDocument = vi.fn(async () => '<html><body><h1>Concert</h1><p>Soon</p></body></html>')
    const checker = new ResourceChecker({ fetchDocument })

    const result = await checker.check(URL_A)

    expect(fetchDocument).toHaveBeenCalledWith(URL_A)
    expect(result).toEqual({
      ok: true,
      url: URL_A,
      text: 'Concert\nSoon',
      fingerprint: computeFingerprint('Concert\nSoon'),
    })
  })

  it('uses a custom extractor when given', async () => {
    const checker = new ResourceChecker({
      fetchDocument: async () => 'RAW',
      extractText: markup => markup.toLowerCase(),
    })

    const result = await checker.check(URL_A)

    expect(result.ok && result.text).toBe('raw')
  })

  it('returns fetch failures as values', async () => {
    const error = new PageFetchError('HTTP 502: bad gateway', { url: URL_A, status: 502 })
    const checker = new ResourceChecker({
      fetchDocument: async () => {
        throw error
      },
    })

    expect(await checker.check(URL_A)).toEqual({ ok: false, url: URL_A, error })
  })

  it('wraps other errors in a PageFetchError', async () => {
    const checker = new ResourceChecker({
      fetchDocument: async () => {
        throw new TypeError('socket hang up')
      },
    })

    const result = await checker.check(URL_A)

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error).toBeInstanceOf(PageFetchError)
    expect(result.error.message).toBe('socket hang up')
    expect(result.error.url).toBe(URL_A)
  })
})
