/**
 * @diskrings/scanner
 *
 * Concurrent disk-usage scanning:
 * - `scanTree` walks a directory tree and returns a size-sorted entry tree
 * - `annotatePercentages` stamps each entry with its share of the root
 * - `ScanSession` supersedes, cancels and reports progress for scans
 *
 * ```typescript
 * import { ScanSession } from '@diskrings/scanner'
 *
 * const session = new ScanSession({ sizeMode: 'logical' })
 * session.on('progress', ({ fraction, currentItemName }) => {
 *   console.log(`${Math.round(fraction * 100)}% ${currentItemName}`)
 * })
 * const outcome = await session.start('/var/log')
 * ```
 *
 * @packageDocumentation
 */

export { scanTree } from './scanner'
export { annotatePercentages } from './percentages'
export { ScanSession } from './session'
export type { ScanSessionEventEmitter } from './session'
export {
  BUNDLE_EXTENSIONS,
  createBundleMatcher,
  createDirectoryEntry,
  createFileEntry,
  isKnownBundle,
  measureStats,
} from './entry'
export { countEntries, findEntryById, findEntryByPath } from './tree'
export type { EntryCounts } from './tree'
export { ScanError, TrashError } from './types'
export type {
  FileSystemEntry,
  ScanErrorCode,
  ScanLogger,
  ScanOptions,
  ScanOutcome,
  ScanProgress,
  ScanSessionEvents,
  ScanSessionOptions,
  SizeMode,
  TrashErrorCode,
  TrashHandler,
  TrashResult,
} from './types'
