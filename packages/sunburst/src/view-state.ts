/**
 * Chart View State
 *
 * What a chart front end keeps between layout calls: the scanned root, the
 * drill-down path, the expansion set and the selected / hovered nodes.
 * Each change returns a new state; expansion and selection are scoped to
 * the focused node and reset whenever the focus moves.
 */

import { buildRings } from './rings'
import { canExpand, toggleExpansion as toggleInSet } from './expansion'
import { locateAt } from './hit-test'
import type { LayoutOptions, Point, RadialNode, Ring } from './types'

interface ViewFields<T> {
  root: T
  path: readonly T[]
  expanded: ReadonlySet<string>
  selected?: T
  hovered?: T
}

export class ChartViewState<T extends RadialNode<T>> {
  readonly root: T
  /** Drill-down path, starting at the root */
  readonly path: readonly T[]
  readonly expanded: ReadonlySet<string>
  readonly selected?: T
  readonly hovered?: T

  private constructor(fields: ViewFields<T>) {
    this.root = fields.root
    this.path = fields.path
    this.expanded = fields.expanded
    this.selected = fields.selected
    this.hovered = fields.hovered
  }

  static create<N extends RadialNode<N>>(root: N): ChartViewState<N> {
    return new ChartViewState<N>({ root, path: [root], expanded: new Set() })
  }

  get focus(): T {
    return this.path.length > 0 ? this.path[this.path.length - 1] : this.root
  }

  get canGoBack(): boolean {
    return this.path.length > 1
  }

  /**
   * Focus a node with children; anything else leaves the state unchanged
   */
  drillDown(node: T): ChartViewState<T> {
    if (!canExpand(node) || node.id === this.focus.id) return this
    return new ChartViewState({ root: this.root, path: [...this.path, node], expanded: new Set() })
  }

  goBack(): ChartViewState<T> {
    if (!this.canGoBack) return this
    return new ChartViewState({ root: this.root, path: this.path.slice(0, -1), expanded: new Set() })
  }

  toggleExpansion(node: T): ChartViewState<T> {
    const expanded = toggleInSet(this.expanded, node)
    if (expanded === this.expanded) return this
    return this.with({ expanded })
  }

  select(node: T | undefined): ChartViewState<T> {
    return this.with({ selected: node })
  }

  hover(node: T | undefined): ChartViewState<T> {
    if (node?.id === this.hovered?.id) return this
    return this.with({ hovered: node })
  }

  rings(options: Partial<LayoutOptions> = {}): Ring<T>[] {
    return buildRings(this.focus, this.expanded, options)
  }

  /**
   * Hover whatever lies under the pointer (or nothing)
   */
  hoverAt(pointer: Point, center: Point, chartRadius: number, options: Partial<LayoutOptions> = {}): ChartViewState<T> {
    return this.hover(locateAt(pointer, center, chartRadius, this.rings(options), options))
  }

  private with(changes: Partial<Pick<ViewFields<T>, 'expanded' | 'selected' | 'hovered'>>): ChartViewState<T> {
    return new ChartViewState({
      root: this.root,
      path: this.path,
      expanded: changes.expanded ?? this.expanded,
      selected: 'selected' in changes ? changes.selected : this.selected,
      hovered: 'hovered' in changes ? changes.hovered : this.hovered,
    })
  }
}
