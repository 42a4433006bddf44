import type { FileSystemEntry } from './types'

/**
 * Stamp every entry with its share of `totalSize` (0-100).
 *
 * Each node is computed independently, so walk order is irrelevant and
 * repeated calls give the same values.
 */
export function annotatePercentages(root: FileSystemEntry, totalSize: number = root.sizeBytes): FileSystemEntry {
  const stack: FileSystemEntry[] = [root]

  while (stack.length > 0) {
    const entry = stack.pop()
    if (!entry) break
    entry.percentageOfTotal = totalSize > 0 ? (entry.sizeBytes / totalSize) * 100 : 0
    if (entry.children) {
      for (const child of entry.children) stack.push(child)
    }
  }

  return root
}
