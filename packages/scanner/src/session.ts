/**
 * Scan Session
 *
 * Owns the scan lifecycle for one consumer:
 * - Starting a scan supersedes the in-flight one, and new filesystem work
 *   only begins once the previous scan has settled
 * - Completed trees are percentage-annotated before they are published
 * - A failed scan leaves the previous result in place
 * - Trash requests are delegated; the tree is never patched in place
 */

import path from 'path'
import { EventEmitter } from 'events'
import { scanTree } from './scanner'
import { annotatePercentages } from './percentages'
import { TrashError } from './types'
import type {
  FileSystemEntry,
  ScanOutcome,
  ScanProgress,
  ScanSessionEvents,
  ScanSessionOptions,
  TrashResult,
} from './types'

export interface ScanSessionEventEmitter {
  on<K extends keyof ScanSessionEvents>(event: K, listener: (data: ScanSessionEvents[K]) => void): this
  off<K extends keyof ScanSessionEvents>(event: K, listener: (data: ScanSessionEvents[K]) => void): this
  emit<K extends keyof ScanSessionEvents>(event: K, data: ScanSessionEvents[K]): boolean
}

interface ActiveScan {
  path: string
  controller: AbortController
  promise: Promise<ScanOutcome>
}

export class ScanSession extends EventEmitter implements ScanSessionEventEmitter {
  private active: ActiveScan | null = null
  private latest: FileSystemEntry | undefined
  private lastProgress: ScanProgress | undefined
  private readonly options: ScanSessionOptions

  constructor(options: ScanSessionOptions = {}) {
    super()
    this.options = options
  }

  /** Last completed, annotated tree */
  get result(): FileSystemEntry | undefined {
    return this.latest
  }

  get isScanning(): boolean {
    return this.active !== null
  }

  get progress(): ScanProgress | undefined {
    return this.lastProgress
  }

  /**
   * Scan `scanPath`, superseding any scan in flight
   */
  async start(scanPath: string): Promise<ScanOutcome> {
    const absolute = path.resolve(scanPath)
    const previous = this.active
    previous?.controller.abort()

    const controller = new AbortController()
    const settled = previous ? Promise.allSettled([previous.promise]) : Promise.resolve()
    const promise = settled.then(() => this.run(absolute, controller))
    const scan: ActiveScan = { path: absolute, controller, promise }
    this.active = scan

    try {
      return await promise
    } finally {
      if (this.active === scan) {
        this.active = null
      }
    }
  }

  /**
   * Request cancellation and wait until the in-flight scan has observed it
   */
  async cancel(): Promise<void> {
    const scan = this.active
    if (!scan) return
    scan.controller.abort()
    await Promise.allSettled([scan.promise])
  }

  /**
   * Scan the current result's root again, e.g. after a successful trash
   */
  async rescan(): Promise<ScanOutcome | undefined> {
    if (!this.latest) return undefined
    return this.start(this.latest.path)
  }

  /**
   * Hand an entry's path to the external trash capability
   */
  async moveToTrash(entry: FileSystemEntry): Promise<TrashResult> {
    const trash = this.options.trash
    if (!trash) {
      return { ok: false, error: new TrashError('unsupported', entry.path) }
    }

    try {
      await trash(entry.path)
      return { ok: true }
    } catch (err) {
      const error = new TrashError('failed', entry.path, err)
      this.options.logger?.warn(error.message)
      return { ok: false, error }
    }
  }

  private async run(scanPath: string, controller: AbortController): Promise<ScanOutcome> {
    if (controller.signal.aborted) {
      this.emit('cancelled', { path: scanPath })
      return { status: 'cancelled' }
    }

    this.lastProgress = { fraction: 0, currentItemName: '' }
    this.emit('started', { path: scanPath })

    const outcome = await scanTree(scanPath, {
      sizeMode: this.options.sizeMode,
      isBundle: this.options.isBundle,
      logger: this.options.logger,
      signal: controller.signal,
      onProgress: (event) => {
        this.lastProgress = event
        this.emit('progress', event)
      },
    })

    switch (outcome.status) {
      case 'completed':
        annotatePercentages(outcome.root)
        this.latest = outcome.root
        this.emit('completed', { root: outcome.root })
        break
      case 'cancelled':
        this.lastProgress = undefined
        this.emit('cancelled', { path: scanPath })
        break
      case 'failed':
        this.lastProgress = undefined
        this.emit('failed', { path: scanPath, error: outcome.error })
        break
    }

    return outcome
  }
}
