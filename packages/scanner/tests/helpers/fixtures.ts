/**
 * Fixture trees on disk for scanner tests
 */

import * as fs from 'fs'
import * as fsp from 'fs/promises'
import * as os from 'os'
import * as path from 'path'
import type { FileSystemEntry } from '../../src/types'

/**
 * A number is a file of that many bytes, an object is a directory
 */
export interface FixtureTree {
  [name: string]: number | FixtureTree
}

async function writeTree(dir: string, tree: FixtureTree): Promise<void> {
  await fsp.mkdir(dir, { recursive: true })
  for (const [name, value] of Object.entries(tree)) {
    const target = path.join(dir, name)
    if (typeof value === 'number') {
      await fsp.writeFile(target, Buffer.alloc(value, 0x61))
    } else {
      await writeTree(target, value)
    }
  }
}

/**
 * Create `tree` under a fresh temporary directory and return the root path
 */
export async function createFixture(tree: FixtureTree, rootName = 'root'): Promise<string> {
  const base = await fsp.mkdtemp(path.join(os.tmpdir(), 'diskrings-'))
  const root = path.join(base, rootName)
  await writeTree(root, tree)
  return root
}

export async function removeFixture(root: string): Promise<void> {
  await fsp.rm(path.dirname(root), { recursive: true, force: true })
}

/**
 * Children names of a directory in the order the OS enumerates them
 */
export function enumerationOrder(dir: string): string[] {
  return fs.readdirSync(dir)
}

export function childNames(entry: FileSystemEntry): string[] {
  return (entry.children ?? []).map((child) => child.name)
}

/**
 * Every entry of a tree, root first
 */
export function allEntries(root: FileSystemEntry): FileSystemEntry[] {
  const result: FileSystemEntry[] = []
  const stack = [root]
  while (stack.length > 0) {
    const entry = stack.pop()
    if (!entry) break
    result.push(entry)
    for (const child of entry.children ?? []) stack.push(child)
  }
  return result
}
