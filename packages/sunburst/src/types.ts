/**
 * Sunburst layout types
 */

/**
 * Anything with an id, a weight and optional ordered children can be laid
 * out. Children are expected in the order slices should appear.
 */
export interface RadialNode<T extends RadialNode<T>> {
  readonly id: string
  readonly sizeBytes: number
  readonly children?: readonly T[]
}

export interface SliceGeometry<T> {
  node: T
  ringIndex: number
  startAngleDeg: number
  endAngleDeg: number
  depth: number
  colorIndex: number
  /** Fades with depth, floored at MIN_OPACITY */
  opacity: number
}

export type Ring<T> = readonly SliceGeometry<T>[]

export interface LayoutOptions {
  /** Rings built without any expansion */
  baseDepth: number
  /** Hard cap on ring count */
  maxRings: number
  /** Parent slices this narrow (degrees) are not subdivided */
  minArcDeg: number
  paletteSize: number
  /** Where ring 0 starts; -90 is 12 o'clock in screen coordinates */
  startAngleDeg: number
}

export interface Point {
  x: number
  y: number
}

export interface PolarPoint {
  /** 0 at the centre, 1 at the chart edge */
  distance: number
  /** Degrees, clockwise, within [startAngleDeg, startAngleDeg + 360) */
  angleDeg: number
}
