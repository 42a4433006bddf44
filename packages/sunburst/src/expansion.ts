/**
 * Expansion set helpers. Sets are never mutated; every change returns a new set.
 */

import type { RadialNode } from './types'

export function canExpand<T extends RadialNode<T>>(node: T): boolean {
  return node.children !== undefined && node.children.length > 0
}

/**
 * Remove `node` and every descendant of it from the expansion set,
 * whether or not the user toggled those descendants individually.
 */
export function collapseNode<T extends RadialNode<T>>(expanded: ReadonlySet<string>, node: T): Set<string> {
  const next = new Set(expanded)
  const stack: T[] = [node]

  while (stack.length > 0 && next.size > 0) {
    const current = stack.pop()
    if (!current) break
    next.delete(current.id)
    if (current.children) {
      for (const child of current.children) stack.push(child)
    }
  }

  return next
}

export function expandNode<T extends RadialNode<T>>(expanded: ReadonlySet<string>, node: T): ReadonlySet<string> {
  if (!canExpand(node) || expanded.has(node.id)) return expanded
  return new Set(expanded).add(node.id)
}

/**
 * Expand a collapsed node, or collapse an expanded one with its descendants.
 * Leaves and empty directories leave the set unchanged.
 */
export function toggleExpansion<T extends RadialNode<T>>(expanded: ReadonlySet<string>, node: T): ReadonlySet<string> {
  if (expanded.has(node.id)) return collapseNode(expanded, node)
  return expandNode(expanded, node)
}
