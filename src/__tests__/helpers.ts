import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import type { CheckResult, PageChecker } from '../core/checker/types.js'
import { computeFingerprint } from '../core/fingerprints/fingerprint.js'
import type { Notifier } from '../core/notifications/types.js'
import { PageFetchError } from '../integrations/pages/fetcher.js'

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'pagewatch-test-'))
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true })
}

export class RecordingNotifier implements Notifier {
  readonly name = 'recording'
  readonly messages: string[] = []
  failWith: Error | null = null
  onSend: ((message: string) => void) | null = null

  async send(message: string): Promise<void> {
    this.onSend?.(message)
    if (this.failWith) throw this.failWith
    this.messages.push(message)
  }
}

type PageState = string | { status: number } | Error

/** Serves page text per URL; a status makes the check fail, an Error makes it throw. */
export class FakeChecker implements PageChecker {
  readonly pages = new Map<string, PageState>()
  readonly calls: string[] = []

  set(url: string, state: PageState): this {
    this.pages.set(url, state)
    return this
  }

  async check(url: string): Promise<CheckResult> {
    this.calls.push(url)
    const state = this.pages.get(url)
    if (state === undefined) {
      return { ok: false, url, error: new PageFetchError('HTTP 404: not found', { url, status: 404 }) }
    }
    if (state instanceof Error) throw state
    if (typeof state !== 'string') {
      return { ok: false, url, error: new PageFetchError(`HTTP ${state.status}: `, { url, status: state.status }) }
    }
    return { ok: true, url, text: state, fingerprint: computeFingerprint(state) }
  }
}
