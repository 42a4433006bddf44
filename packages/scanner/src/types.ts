/**
 * Scanner types
 */

/**
 * One file or directory of a measured tree.
 *
 * Everything but `percentageOfTotal` is fixed once the scan that produced the
 * entry completes. `children` is present (possibly empty) on directories and
 * absent on files and bundles.
 */
export interface FileSystemEntry {
  /** Absolute path on disk */
  readonly path: string
  /** Unique within one scan result; two scans of the same path get fresh ids */
  readonly id: string
  readonly name: string
  readonly isDirectory: boolean
  /** Directory sized as a single leaf (application bundle and friends) */
  readonly isBundle: boolean
  readonly sizeBytes: number
  /** Sorted descending by size, ties in enumeration order */
  readonly children?: readonly FileSystemEntry[]
  /** 0-100, relative to the scan root; 0 until annotated */
  percentageOfTotal: number
}

export type SizeMode = 'allocated' | 'logical'

export interface ScanProgress {
  /** 0..1, never decreasing within one scan */
  fraction: number
  currentItemName: string
}

/**
 * Sink for per-entry failures that the scan absorbs
 */
export interface ScanLogger {
  warn(message: string): void
  debug?(message: string): void
}

export interface ScanOptions {
  signal?: AbortSignal
  onProgress?: (event: ScanProgress) => void
  sizeMode?: SizeMode
  isBundle?: (entryPath: string, name: string) => boolean
  logger?: ScanLogger
}

export type ScanErrorCode = 'not-found' | 'not-accessible'

export class ScanError extends Error {
  readonly code: ScanErrorCode
  readonly path: string

  constructor(code: ScanErrorCode, scanPath: string, cause?: unknown) {
    const reason = code === 'not-found' ? 'does not exist' : 'is not accessible'
    super(`${scanPath} ${reason}`, { cause })
    this.name = 'ScanError'
    this.code = code
    this.path = scanPath
  }
}

export type ScanOutcome =
  | { status: 'completed'; root: FileSystemEntry }
  | { status: 'cancelled' }
  | { status: 'failed'; error: ScanError }

export type TrashErrorCode = 'failed' | 'unsupported'

export class TrashError extends Error {
  readonly code: TrashErrorCode
  readonly path: string

  constructor(code: TrashErrorCode, entryPath: string, cause?: unknown) {
    const reason = code === 'unsupported' ? 'no trash handler is configured' : 'the trash operation failed'
    super(`Could not move ${entryPath} to the trash: ${reason}`, { cause })
    this.name = 'TrashError'
    this.code = code
    this.path = entryPath
  }
}

/**
 * External "move item to trash" capability. Resolves on success, rejects on failure.
 */
export type TrashHandler = (entryPath: string) => Promise<void>

export type TrashResult = { ok: true } | { ok: false; error: TrashError }

export interface ScanSessionEvents {
  started: { path: string }
  progress: ScanProgress
  completed: { root: FileSystemEntry }
  cancelled: { path: string }
  failed: { path: string; error: ScanError }
}

export interface ScanSessionOptions extends Omit<ScanOptions, 'signal' | 'onProgress'> {
  trash?: TrashHandler
}
