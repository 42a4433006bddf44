/**
 * Tests for per-entry and root failures and for the scan's concurrency, with fs/promises
 * wrapped to fail, hold or count calls on chosen paths
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import * as path from 'path'

const { failures, denied, gate, tracker, observe } = vi.hoisted(() => {
  const failures = {
    readdir: new Set<string>(),
    lstat: new Set<string>(),
    stat: new Set<string>(),
    access: new Set<string>(),
  }
  // Lets a test hold a readdir call open until it decides to release it
  const gate: { readdir?: (target: string) => Promise<void> } = {}
  // Counts calls in flight under `prefix`
  const tracker = { prefix: '', inFlight: 0, maxInFlight: 0 }

  const denied = (target: string): Error =>
    Object.assign(new Error(`EACCES: permission denied, ${target}`), { code: 'EACCES' })

  async function observe<T>(target: string, call: () => Promise<T>): Promise<T> {
    const tracked = tracker.prefix !== '' && target.startsWith(tracker.prefix)
    if (tracked) {
      tracker.inFlight += 1
      tracker.maxInFlight = Math.max(tracker.maxInFlight, tracker.inFlight)
    }
    try {
      return await call()
    } finally {
      if (tracked) tracker.inFlight -= 1
    }
  }

  return { failures, denied, gate, tracker, observe }
})

vi.mock('fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('fs/promises')>()
  return {
    ...actual,
    readdir: async (...args: Parameters<typeof actual.readdir>) => {
      const target = String(args[0])
      if (failures.readdir.has(target)) throw denied(target)
      await gate.readdir?.(target)
      return observe(target, () => actual.readdir(...args))
    },
    lstat: async (...args: Parameters<typeof actual.lstat>) => {
      const target = String(args[0])
      if (failures.lstat.has(target)) throw denied(target)
      return observe(target, () => actual.lstat(...args))
    },
    stat: (...args: Parameters<typeof actual.stat>) =>
      failures.stat.has(String(args[0])) ? Promise.reject(denied(String(args[0]))) : actual.stat(...args),
    access: (...args: Parameters<typeof actual.access>) =>
      failures.access.has(String(args[0])) ? Promise.reject(denied(String(args[0]))) : actual.access(...args),
  }
})

import { scanTree } from '../src/scanner'
import type { FileSystemEntry, ScanOutcome } from '../src/types'
import { createFixture, removeFixture } from './helpers/fixtures'

function completedRoot(outcome: ScanOutcome): FileSystemEntry {
  if (outcome.status !== 'completed') {
    throw new Error(`expected a completed scan, got ${outcome.status}`)
  }
  return outcome.root
}

describe('scanTree failures', () => {
  let root: string
  const warn = vi.fn()

  beforeEach(async () => {
    root = await createFixture({ locked: { 'secret.bin': 900 }, 'ghost.txt': 50, open: { 'a.txt': 40 } })
  })

  afterEach(async () => {
    failures.readdir.clear()
    failures.lstat.clear()
    failures.stat.clear()
    failures.access.clear()
    gate.readdir = undefined
    tracker.prefix = ''
    tracker.inFlight = 0
    tracker.maxInFlight = 0
    warn.mockReset()
    await removeFixture(root)
  })

  it('should record an unreadable directory as empty and keep scanning', async () => {
    const locked = path.join(root, 'locked')
    failures.readdir.add(locked)

    const tree = completedRoot(await scanTree(root, { sizeMode: 'logical', logger: { warn } }))
    const entry = tree.children?.find((child) => child.name === 'locked')

    expect(entry?.isDirectory).toBe(true)
    expect(entry?.children).toEqual([])
    expect(entry?.sizeBytes).toBe(0)
    expect(tree.sizeBytes).toBe(90)
    expect(warn).toHaveBeenCalledWith(`Cannot read ${locked}: EACCES`)
  })

  it('should size an entry that cannot be stat-ed as zero', async () => {
    const ghost = path.join(root, 'ghost.txt')
    failures.lstat.add(ghost)

    const tree = completedRoot(await scanTree(root, { sizeMode: 'logical', logger: { warn } }))
    const entry = tree.children?.find((child) => child.name === 'ghost.txt')

    expect(entry?.sizeBytes).toBe(0)
    expect(entry?.children).toBeUndefined()
    expect(tree.sizeBytes).toBe(940)
    expect(warn).toHaveBeenCalledWith(`Cannot stat ${ghost}: EACCES`)
  })

  it('should skip unreadable parts of a bundle', async () => {
    await removeFixture(root)
    root = await createFixture({ 'Big.app': { Contents: { 'a.bin': 30 }, Private: { 'b.bin': 70 } } })
    const hidden = path.join(root, 'Big.app', 'Private')
    failures.readdir.add(hidden)

    const tree = completedRoot(await scanTree(root, { sizeMode: 'logical', logger: { warn } }))

    expect(tree.children?.[0].sizeBytes).toBe(30)
    expect(warn).toHaveBeenCalledWith(`Cannot read ${hidden}: EACCES`)
  })

  it('should fail with not-accessible when the root cannot be stat-ed', async () => {
    failures.stat.add(root)

    const outcome = await scanTree(root, { logger: { warn } })

    expect(outcome.status).toBe('failed')
    if (outcome.status !== 'failed') return
    expect(outcome.error.code).toBe('not-accessible')
    expect(outcome.error.message).toBe(`${root} is not accessible`)
    expect(outcome.error.cause).toBeInstanceOf(Error)
  })

  it('should fail with not-accessible when the root directory cannot be read', async () => {
    failures.access.add(root)

    const outcome = await scanTree(root, { logger: { warn } })

    expect(outcome.status === 'failed' && outcome.error.code).toBe('not-accessible')
  })

  describe('concurrency', () => {
    it('should list sibling directories concurrently', async () => {
      const siblings = ['locked', 'open']
      const events: string[] = []
      let releaseAll: () => void = () => {}
      const allArrived = new Promise<void>((resolve) => {
        releaseAll = resolve
      })
      const arrived = new Set<string>()
      gate.readdir = async (target) => {
        const name = path.basename(target)
        if (path.dirname(target) !== root || !siblings.includes(name)) return
        events.push(`call ${name}`)
        arrived.add(name)
        if (arrived.size === siblings.length) releaseAll()
        // a sequential walk would never release, so fall back after a while
        await Promise.race([allArrived, new Promise((resolve) => setTimeout(resolve, 500))])
        events.push(`done ${name}`)
      }

      const tree = completedRoot(await scanTree(root, { sizeMode: 'logical', logger: { warn } }))

      expect(tree.sizeBytes).toBe(990)
      expect(events.slice(0, 2).map((event) => event.split(' ')[0])).toEqual(['call', 'call'])
      expect(events.slice(2).map((event) => event.split(' ')[0])).toEqual(['done', 'done'])
    })

    it('should walk a bundle one filesystem call at a time', async () => {
      await removeFixture(root)
      root = await createFixture({
        'Big.app': {
          Contents: { 'a.bin': 1, 'b.bin': 2, 'c.bin': 3, Frameworks: { 'd.bin': 4, 'e.bin': 5 } },
          Resources: { 'f.bin': 6, 'g.bin': 7 },
          'Info.plist': 8,
        },
        'loose.bin': 100,
      })
      tracker.prefix = path.join(root, 'Big.app')

      const tree = completedRoot(await scanTree(root, { sizeMode: 'logical', logger: { warn } }))

      expect(tree.children?.map((child) => [child.name, child.sizeBytes])).toEqual([
        ['loose.bin', 100],
        ['Big.app', 36],
      ])
      expect(tracker.maxInFlight).toBe(1)
      expect(tracker.inFlight).toBe(0)
    })
  })
})
