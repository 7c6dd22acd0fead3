import type { Fingerprint } from '../fingerprints/fingerprint.js'
import type { PageFetchError } from '../../integrations/pages/fetcher.js'

export type CheckResult =
  | { ok: true; url: string; text: string; fingerprint: Fingerprint }
  | { ok: false; url: string; error: PageFetchError }

export interface PageChecker {
  check(url: string): Promise<CheckResult>
}
