/**
 * Ring Layout
 *
 * Turns the focused node into concentric rings of angular slices:
 * - Ring 0 holds the focus's children over the full circle
 * - Every further ring subdivides each parent slice's arc among that
 *   parent's children, proportionally to size
 * - Past `baseDepth` rings, only parents whose id is in the expansion set
 *   are subdivided
 *
 * Pure: the same focus, expansion set and options always give identical
 * geometry.
 */

import { childColorOffset, sliceOpacity } from './palette'
import { resolveLayoutOptions } from './options'
import type { LayoutOptions, RadialNode, Ring, SliceGeometry } from './types'

/**
 * Lay siblings out contiguously over `[startAngleDeg, startAngleDeg + arcSpan)`
 */
export function layoutArc<T extends RadialNode<T>>(
  nodes: readonly T[],
  startAngleDeg: number,
  arcSpan: number,
  depth: number,
  parentColorIndex: number | undefined,
  options: LayoutOptions,
): SliceGeometry<T>[] {
  let total = 0
  for (const node of nodes) {
    total += node.sizeBytes
  }
  if (total <= 0) return []

  const offset = childColorOffset(parentColorIndex, options.paletteSize)
  const opacity = sliceOpacity(depth)
  const slices: SliceGeometry<T>[] = []
  let angle = startAngleDeg

  nodes.forEach((node, index) => {
    const endAngle = angle + (arcSpan * node.sizeBytes) / total
    slices.push({
      node,
      ringIndex: depth,
      startAngleDeg: angle,
      endAngleDeg: endAngle,
      depth,
      colorIndex: (index + offset) % options.paletteSize,
      opacity,
    })
    angle = endAngle
  })

  return slices
}

export function buildRings<T extends RadialNode<T>>(
  focus: T,
  expandedIds: ReadonlySet<string>,
  options: Partial<LayoutOptions> = {},
): Ring<T>[] {
  const opts = resolveLayoutOptions(options)
  const rings: Ring<T>[] = []

  const children = focus.children
  if (!children || children.length === 0 || opts.maxRings < 1) return rings

  let parents = layoutArc(children, opts.startAngleDeg, 360, 0, undefined, opts)
  if (parents.length === 0) return rings
  rings.push(parents)

  for (let depth = 1; depth < opts.maxRings; depth++) {
    const ring: SliceGeometry<T>[] = []

    for (const parent of parents) {
      if (depth >= opts.baseDepth && !expandedIds.has(parent.node.id)) continue

      const nodes = parent.node.children
      if (!nodes || nodes.length === 0) continue

      const arc = parent.endAngleDeg - parent.startAngleDeg
      if (arc <= opts.minArcDeg) continue

      for (const slice of layoutArc(nodes, parent.startAngleDeg, arc, depth, parent.colorIndex, opts)) {
        ring.push(slice)
      }
    }

    if (ring.length === 0) break
    rings.push(ring)
    parents = ring
  }

  return rings
}
