/**
 * Read-only queries over a scanned tree
 */

import type { FileSystemEntry } from './types'

function find(root: FileSystemEntry, match: (entry: FileSystemEntry) => boolean): FileSystemEntry | undefined {
  const stack: FileSystemEntry[] = [root]
  while (stack.length > 0) {
    const entry = stack.pop()
    if (!entry) break
    if (match(entry)) return entry
    if (entry.children) {
      for (const child of entry.children) stack.push(child)
    }
  }
  return undefined
}

export function findEntryById(root: FileSystemEntry, id: string): FileSystemEntry | undefined {
  return find(root, (entry) => entry.id === id)
}

export function findEntryByPath(root: FileSystemEntry, entryPath: string): FileSystemEntry | undefined {
  return find(root, (entry) => entry.path === entryPath)
}

export interface EntryCounts {
  files: number
  directories: number
}

/**
 * Count entries below `root` (the root itself excluded). Bundles count as files.
 */
export function countEntries(root: FileSystemEntry): EntryCounts {
  const counts: EntryCounts = { files: 0, directories: 0 }
  const stack: FileSystemEntry[] = [...(root.children ?? [])]

  while (stack.length > 0) {
    const entry = stack.pop()
    if (!entry) break
    if (entry.children) {
      counts.directories += 1
      for (const child of entry.children) stack.push(child)
    } else {
      counts.files += 1
    }
  }

  return counts
}
