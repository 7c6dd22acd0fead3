import { createHash } from 'node:crypto'

/** Hex SHA-256 of extracted page text. */
export type Fingerprint = string

export type FingerprintMap = Record<string, Fingerprint>

export function computeFingerprint(text: string): Fingerprint {
  return createHash('sha256').update(text, 'utf8').digest('hex')
}
