/**
 * FileSystemEntry construction helpers
 */

import path from 'path'
import { randomUUID } from 'crypto'
import type { Stats } from 'fs'
import type { FileSystemEntry, SizeMode } from './types'

/**
 * Directory extensions the OS presents as a single file
 */
export const BUNDLE_EXTENSIONS: readonly string[] = [
  '.app',
  '.appex',
  '.bundle',
  '.framework',
  '.kext',
  '.mpkg',
  '.musiclibrary',
  '.photoslibrary',
  '.pkg',
  '.playground',
  '.plugin',
  '.prefpane',
  '.qlgenerator',
  '.rtfd',
  '.saver',
  '.xcodeproj',
  '.xcworkspace',
]

/**
 * Build a bundle predicate from a list of directory extensions (case-insensitive)
 */
export function createBundleMatcher(extensions: readonly string[] = BUNDLE_EXTENSIONS): (entryPath: string, name: string) => boolean {
  const known = new Set(extensions.map((ext) => (ext.startsWith('.') ? ext : `.${ext}`).toLowerCase()))
  return (_entryPath, name) => {
    const ext = path.extname(name).toLowerCase()
    return ext !== '' && known.has(ext)
  }
}

export const isKnownBundle = createBundleMatcher()

/**
 * Bytes a stat result accounts for. Allocated size falls back to the logical
 * size on platforms that do not report block counts.
 */
export function measureStats(stats: Stats, mode: SizeMode): number {
  if (mode === 'allocated' && Number.isFinite(stats.blocks)) {
    return stats.blocks * 512
  }
  return stats.size
}

export function displayName(entryPath: string): string {
  return path.basename(entryPath) || entryPath
}

export function createFileEntry(entryPath: string, sizeBytes: number, isBundle = false): FileSystemEntry {
  return {
    path: entryPath,
    id: randomUUID(),
    name: displayName(entryPath),
    isDirectory: isBundle,
    isBundle,
    sizeBytes,
    percentageOfTotal: 0,
  }
}

/**
 * Finalize a directory from its joined children: sum, then stable sort descending
 */
export function createDirectoryEntry(entryPath: string, children: FileSystemEntry[]): FileSystemEntry {
  let sizeBytes = 0
  for (const child of children) {
    sizeBytes += child.sizeBytes
  }
  const sorted = [...children].sort((a, b) => b.sizeBytes - a.sizeBytes)

  return {
    path: entryPath,
    id: randomUUID(),
    name: displayName(entryPath),
    isDirectory: true,
    isBundle: false,
    sizeBytes,
    children: sorted,
    percentageOfTotal: 0,
  }
}
