/**
 * Scan Engine
 *
 * Measures a directory tree concurrently and builds the FileSystemEntry tree
 * bottom-up:
 * - One concurrent unit per child, per directory level (no pool cap)
 * - A directory is finalized only after every child unit has joined
 * - Unreadable entries are sized as zero / empty and logged, never fatal
 * - Cooperative cancellation through an AbortSignal; a cancelled scan
 *   yields no tree at all
 * - Progress counted over the root's immediate children only
 */

import path from 'path'
import * as fsp from 'fs/promises'
import { constants as fsConstants } from 'fs'
import type { Dirent, Stats } from 'fs'
import { createDirectoryEntry, createFileEntry, displayName, isKnownBundle, measureStats } from './entry'
import { ScanError } from './types'
import type { FileSystemEntry, ScanLogger, ScanOptions, ScanOutcome, ScanProgress, SizeMode } from './types'

interface ScanContext {
  signal?: AbortSignal
  sizeMode: SizeMode
  isBundle: (entryPath: string, name: string) => boolean
  logger: ScanLogger
  onProgress?: (event: ScanProgress) => void
}

const consoleLogger: ScanLogger = {
  warn: (message) => console.warn(`[scan] ${message}`),
}

/**
 * Completion counter over the root's immediate children.
 *
 * Increments happen on the event loop thread, so a plain counter cannot lose
 * or double-count. Intermediate events stay below 1; the terminal 1.0 event is
 * emitted by scanTree once the whole tree is built.
 */
class ProgressCounter {
  private completed = 0
  private lastFraction = 0

  constructor(
    private readonly total: number,
    private readonly ctx: ScanContext,
  ) {}

  complete(itemName: string): void {
    this.completed += 1
    if (!this.ctx.onProgress || this.ctx.signal?.aborted) return

    const fraction = this.completed / this.total
    if (fraction > this.lastFraction && fraction < 1) {
      this.lastFraction = fraction
      this.ctx.onProgress({ fraction, currentItemName: itemName })
    }
  }
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code
  }
  return undefined
}

function reasonOf(err: unknown): string {
  return errorCode(err) ?? (err instanceof Error ? err.message : String(err))
}

function isCancelled(ctx: ScanContext): boolean {
  return ctx.signal?.aborted === true
}

/**
 * Sum a bundle's contents one entry at a time, without fan-out.
 * Returns null when cancelled part-way.
 */
async function measureBundle(bundlePath: string, ctx: ScanContext): Promise<number | null> {
  let total = 0
  const pending = [bundlePath]

  while (pending.length > 0) {
    if (isCancelled(ctx)) return null
    const dir = pending.pop()
    if (dir === undefined) break

    let dirents: Dirent[]
    try {
      dirents = await fsp.readdir(dir, { withFileTypes: true })
    } catch (err) {
      ctx.logger.warn(`Cannot read ${dir}: ${reasonOf(err)}`)
      continue
    }

    for (const dirent of dirents) {
      if (isCancelled(ctx)) return null
      const childPath = path.join(dir, dirent.name)
      if (dirent.isDirectory()) {
        pending.push(childPath)
        continue
      }
      try {
        total += measureStats(await fsp.lstat(childPath), ctx.sizeMode)
      } catch (err) {
        ctx.logger.warn(`Cannot stat ${childPath}: ${reasonOf(err)}`)
      }
    }
  }

  return total
}

/**
 * One unit of work: measure a single entry and, for directories, fan out
 * over its children and join them.
 */
async function scanEntry(
  entryPath: string,
  depth: number,
  ctx: ScanContext,
  knownStats?: Stats,
): Promise<FileSystemEntry | null> {
  if (isCancelled(ctx)) return null

  let stats = knownStats
  if (!stats) {
    try {
      stats = await fsp.lstat(entryPath)
    } catch (err) {
      ctx.logger.warn(`Cannot stat ${entryPath}: ${reasonOf(err)}`)
      return createFileEntry(entryPath, 0)
    }
  }

  if (!stats.isDirectory()) {
    return createFileEntry(entryPath, measureStats(stats, ctx.sizeMode))
  }

  if (depth > 0 && ctx.isBundle(entryPath, displayName(entryPath))) {
    const size = await measureBundle(entryPath, ctx)
    return size === null ? null : createFileEntry(entryPath, size, true)
  }

  if (isCancelled(ctx)) return null

  let names: string[]
  try {
    names = await fsp.readdir(entryPath)
  } catch (err) {
    ctx.logger.warn(`Cannot read ${entryPath}: ${reasonOf(err)}`)
    return createDirectoryEntry(entryPath, [])
  }

  if (isCancelled(ctx)) return null

  const counter = depth === 0 ? new ProgressCounter(names.length, ctx) : undefined

  const results = await Promise.all(
    names.map(async (name) => {
      const child = await scanEntry(path.join(entryPath, name), depth + 1, ctx)
      counter?.complete(child?.name ?? name)
      return child
    }),
  )

  if (isCancelled(ctx)) return null

  const children: FileSystemEntry[] = []
  for (const child of results) {
    if (child) children.push(child)
  }
  return createDirectoryEntry(entryPath, children)
}

/**
 * Scan a path into a FileSystemEntry tree (percentages not yet annotated).
 *
 * Only a missing or unreadable root fails the scan. The root itself is
 * resolved through symlinks; entries below it are not.
 */
export async function scanTree(rootPath: string, options: ScanOptions = {}): Promise<ScanOutcome> {
  const ctx: ScanContext = {
    signal: options.signal,
    sizeMode: options.sizeMode ?? 'allocated',
    isBundle: options.isBundle ?? isKnownBundle,
    logger: options.logger ?? consoleLogger,
    onProgress: options.onProgress,
  }
  const absolute = path.resolve(rootPath)

  if (isCancelled(ctx)) return { status: 'cancelled' }

  let stats: Stats
  try {
    stats = await fsp.stat(absolute)
  } catch (err) {
    const code = errorCode(err)
    const kind = code === 'ENOENT' || code === 'ENOTDIR' ? 'not-found' : 'not-accessible'
    return { status: 'failed', error: new ScanError(kind, absolute, err) }
  }

  if (stats.isDirectory()) {
    try {
      await fsp.access(absolute, fsConstants.R_OK | fsConstants.X_OK)
    } catch (err) {
      return { status: 'failed', error: new ScanError('not-accessible', absolute, err) }
    }
  }

  ctx.logger.debug?.(`Scanning ${absolute} (${ctx.sizeMode} sizes)`)
  const root = await scanEntry(absolute, 0, ctx, stats)

  if (!root || isCancelled(ctx)) {
    ctx.logger.debug?.(`Scan of ${absolute} cancelled`)
    return { status: 'cancelled' }
  }

  options.onProgress?.({ fraction: 1, currentItemName: root.name })
  return { status: 'completed', root }
}
