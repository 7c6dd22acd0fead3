import { computeFingerprint } from '../fingerprints/fingerprint.js'
import { PageFetchError, type DocumentFetcher } from '../../integrations/pages/fetcher.js'
import { extractVisibleText } from '../../integrations/pages/extract.js'
import { logger } from '../../utils/logger.js'
import type { CheckResult, PageChecker } from './types.js'

export interface ResourceCheckerOptions {
  fetchDocument: DocumentFetcher
  extractText?: (markup: string) => string
}

export class ResourceChecker implements PageChecker {
  private readonly fetchDocument: DocumentFetcher
  private readonly extractText: (markup: string) => string

  constructor(options: ResourceCheckerOptions) {
    this.fetchDocument = options.fetchDocument
    this.extractText = options.extractText ?? extractVisibleText
  }

  async check(url: string): Promise<CheckResult> {
    let markup: string
    try {
      markup = await this.fetchDocument(url)
    }
    catch (error) {
      const fetchError = error instanceof PageFetchError
        ? error
        : new PageFetchError(error instanceof Error ? error.message : String(error), { url, cause: error })
      logger.warn('Page check skipped; fetch failed', {
        url,
        status: fetchError.status,
        error: fetchError.message,
      })
      return { ok: false, url, error: fetchError }
    }

    const text = this.extractText(markup)
    const fingerprint = computeFingerprint(text)
    logger.debug('Page checked', { url, chars: text.length, fingerprint })
    return { ok: true, url, text, fingerprint }
  }
}
