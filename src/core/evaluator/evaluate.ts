import type { Fingerprint } from '../fingerprints/fingerprint.js'

export type ChangeKind = 'initialized' | 'available' | 'changed' | 'unchanged'

export interface ChangeInput {
  text: string
  fingerprint: Fingerprint
  /** Stored fingerprint, undefined when the URL was never observed. */
  previous: Fingerprint | undefined
  sentinelPhrase: string
}

export interface Evaluation {
  kind: ChangeKind
  notify: boolean
  record: boolean
}

const EVALUATIONS: Record<ChangeKind, Evaluation> = {
  initialized: { kind: 'initialized', notify: false, record: true },
  available: { kind: 'available', notify: true, record: true },
  changed: { kind: 'changed', notify: true, record: true },
  unchanged: { kind: 'unchanged', notify: false, record: false },
}

/**
 * First observation wins over everything else. After that, a missing sentinel
 * phrase is reported on every cycle, ahead of plain fingerprint changes.
 */
export function evaluateChange(input: ChangeInput): Evaluation {
  if (input.previous === undefined) return EVALUATIONS.initialized
  if (!input.text.includes(input.sentinelPhrase)) return EVALUATIONS.available
  if (input.previous !== input.fingerprint) return EVALUATIONS.changed
  return EVALUATIONS.unchanged
}
