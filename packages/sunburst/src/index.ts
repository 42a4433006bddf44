/**
 * @diskrings/sunburst
 *
 * Radial ("sunburst") layout of weighted trees:
 * - `buildRings` lays the focused node's descendants out as rings of slices
 * - `locate` / `locateAt` map a pointer back to the node under it
 * - `ChartViewState` tracks focus, expansion and selection between calls
 *
 * @packageDocumentation
 */

export { buildRings, layoutArc } from './rings'
export { canExpand, collapseNode, expandNode, toggleExpansion } from './expansion'
export { locate, locateAt, toPolar, wrapAngle } from './hit-test'
export { CENTER_RADIUS, OUTER_PADDING, ringBand, ringWidth } from './radii'
export type { RingBand } from './radii'
export { MIN_OPACITY, PALETTE, childColorOffset, sliceOpacity } from './palette'
export { DEFAULT_LAYOUT_OPTIONS, resolveLayoutOptions } from './options'
export { ChartViewState } from './view-state'
export type { LayoutOptions, Point, PolarPoint, RadialNode, Ring, SliceGeometry } from './types'
