import fs from 'node:fs/promises'
import path from 'node:path'
import { z } from 'zod'
import { logger } from '../../utils/logger.js'
import type { Fingerprint, FingerprintMap } from './fingerprint.js'

const fingerprintMapSchema = z.record(z.string())

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error
}

/**
 * Last-known fingerprint per monitored URL, mirrored to a JSON file.
 * Every mutation is written through before the returned promise settles.
 */
export class FingerprintStore {
  readonly filePath: string
  private entries: FingerprintMap = {}
  private writeChain: Promise<unknown> = Promise.resolve()

  constructor(filePath: string) {
    this.filePath = filePath
  }

  async exists(): Promise<boolean> {
    try {
      await fs.access(this.filePath)
      return true
    }
    catch {
      return false
    }
  }

  async load(): Promise<FingerprintMap> {
    let raw: string
    try {
      raw = await fs.readFile(this.filePath, 'utf8')
    }
    catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        logger.info('Fingerprint file not found; starting without history', { path: this.filePath })
      }
      else {
        logger.warn('Fingerprint file unreadable; starting without history', { path: this.filePath, error })
      }
      this.entries = {}
      return {}
    }

    try {
      this.entries = fingerprintMapSchema.parse(JSON.parse(raw))
      logger.debug('Fingerprints loaded', { path: this.filePath, count: Object.keys(this.entries).length })
    }
    catch {
      logger.warn('Fingerprint file is malformed; starting without history', { path: this.filePath })
      this.entries = {}
    }
    return this.snapshot()
  }

  /**
   * Replaces the file with `mapping`. Returns false when the write failed; the
   * in-memory state stays authoritative and the next save reconciles it.
   */
  async save(mapping: FingerprintMap): Promise<boolean> {
    const tempPath = `${this.filePath}.${process.pid}.tmp`
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true })
      await fs.writeFile(tempPath, JSON.stringify(mapping, null, 2), 'utf8')
      await fs.rename(tempPath, this.filePath)
      logger.debug('Fingerprints saved', { path: this.filePath, count: Object.keys(mapping).length })
      return true
    }
    catch (error) {
      logger.error('Fingerprint save failed', { path: this.filePath, error })
      await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        logger.debug('Temporary fingerprint file cleanup failed', { path: tempPath, error: cleanupError })
      })
      return false
    }
  }

  get(url: string): Fingerprint | undefined {
    return this.entries[url]
  }

  has(url: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.entries, url)
  }

  snapshot(): FingerprintMap {
    return { ...this.entries }
  }

  record(url: string, fingerprint: Fingerprint): Promise<boolean> {
    this.entries[url] = fingerprint
    return this.enqueueSave()
  }

  replaceAll(mapping: FingerprintMap): Promise<boolean> {
    this.entries = { ...mapping }
    return this.enqueueSave()
  }

  private enqueueSave(): Promise<boolean> {
    // Snapshot inside the chain so each write carries every earlier mutation.
    const run = this.writeChain.then(() => this.save(this.snapshot()))
    this.writeChain = run
    return run
  }
}
