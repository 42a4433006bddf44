/**
 * Tests for ChartViewState navigation and interaction
 */

import { describe, it, expect } from 'vitest'
import { ChartViewState } from '../src/view-state'
import { chain, dir, ids, leaf } from './helpers/nodes'

function sample() {
  const a1 = leaf('a1', 40)
  const a2 = leaf('a2', 20)
  const A = dir('A', [a1, a2])
  const B = leaf('B', 30)
  const C = dir('C', [])
  const root = dir('root', [A, B, C])
  return { root, A, B, C, a1 }
}

describe('ChartViewState', () => {
  it('should start focused on the root with nothing expanded', () => {
    const { root } = sample()
    const view = ChartViewState.create(root)

    expect(view.focus).toBe(root)
    expect(view.path).toEqual([root])
    expect(view.canGoBack).toBe(false)
    expect(view.expanded.size).toBe(0)
    expect(view.selected).toBeUndefined()
  })

  describe('drillDown', () => {
    it('should focus a directory and lay out its children', () => {
      const { root, A } = sample()

      const view = ChartViewState.create(root).drillDown(A)

      expect(view.focus).toBe(A)
      expect(view.canGoBack).toBe(true)
      expect(view.rings().map(ids)).toEqual([['a1', 'a2']])
    })

    it('should ignore leaves, empty directories and the current focus', () => {
      const { root, B, C } = sample()
      const view = ChartViewState.create(root)

      expect(view.drillDown(B)).toBe(view)
      expect(view.drillDown(C)).toBe(view)
      expect(view.drillDown(root)).toBe(view)
    })

    it('should reset expansion, selection and hover', () => {
      const root = chain()
      const d1 = root.children?.[0]
      if (!d1) throw new Error('expected d1')

      const view = ChartViewState.create(root).toggleExpansion(d1).select(d1).hover(d1).drillDown(d1)

      expect(view.expanded.size).toBe(0)
      expect(view.selected).toBeUndefined()
      expect(view.hovered).toBeUndefined()
    })
  })

  describe('goBack', () => {
    it('should return to the previous focus', () => {
      const { root, A } = sample()

      const view = ChartViewState.create(root).drillDown(A).goBack()

      expect(view.focus).toBe(root)
      expect(view.canGoBack).toBe(false)
    })

    it('should stay put at the root', () => {
      const view = ChartViewState.create(sample().root)

      expect(view.goBack()).toBe(view)
    })
  })

  describe('toggleExpansion', () => {
    it('should add a ring past the base depth and remove it again', () => {
      const root = chain()
      const d3 = root.children?.[0]?.children?.[0]?.children?.[0]
      if (!d3) throw new Error('expected d3')
      const view = ChartViewState.create(root)

      const expanded = view.toggleExpansion(d3)

      expect(expanded.rings()).toHaveLength(4)
      expect(expanded.toggleExpansion(d3).rings()).toHaveLength(3)
      expect(view.rings()).toHaveLength(3)
    })

    it('should return the same state for a leaf', () => {
      const { root, B } = sample()
      const view = ChartViewState.create(root)

      expect(view.toggleExpansion(B)).toBe(view)
    })
  })

  describe('selection and hover', () => {
    it('should select and clear a node', () => {
      const { root, B } = sample()

      const selected = ChartViewState.create(root).select(B)

      expect(selected.selected).toBe(B)
      expect(selected.select(undefined).selected).toBeUndefined()
    })

    it('should keep the state when hovering the same node again', () => {
      const { root, B } = sample()
      const hovered = ChartViewState.create(root).hover(B)

      expect(hovered.hover(B)).toBe(hovered)
    })

    it('should hover the slice under the pointer', () => {
      const { root, A, B } = sample()
      const view = ChartViewState.create(root)
      const center = { x: 50, y: 50 }

      // straight up from the centre, inside ring 0
      expect(view.hoverAt({ x: 50, y: 35 }, center, 50).hovered).toBe(A)
      // 9 o'clock, inside ring 0
      expect(view.hoverAt({ x: 35, y: 50 }, center, 50).hovered).toBe(B)
      expect(view.hoverAt({ x: 50, y: 50 }, center, 50).hovered).toBeUndefined()
    })
  })
})
