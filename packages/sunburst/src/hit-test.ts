/**
 * Hit Testing
 *
 * Maps a pointer back to the slice under it, in the same angular frame
 * buildRings lays slices out in.
 */

import { resolveLayoutOptions } from './options'
import { ringBand, ringWidth } from './radii'
import type { LayoutOptions, Point, PolarPoint, Ring } from './types'

const DEGREES_PER_RADIAN = 180 / Math.PI

/**
 * Wrap an angle into [startAngleDeg, startAngleDeg + 360)
 */
export function wrapAngle(angleDeg: number, startAngleDeg: number): number {
  const offset = (((angleDeg - startAngleDeg) % 360) + 360) % 360
  return startAngleDeg + offset
}

/**
 * Pointer position relative to the chart centre, in screen coordinates
 * (y grows downward, so angles increase clockwise)
 */
export function toPolar(
  pointer: Point,
  center: Point,
  chartRadius: number,
  startAngleDeg: number = resolveLayoutOptions().startAngleDeg,
): PolarPoint {
  const dx = pointer.x - center.x
  const dy = pointer.y - center.y
  const distance = chartRadius > 0 ? Math.hypot(dx, dy) / chartRadius : Number.POSITIVE_INFINITY

  return {
    distance,
    angleDeg: wrapAngle(Math.atan2(dy, dx) * DEGREES_PER_RADIAN, startAngleDeg),
  }
}

/**
 * The node whose slice contains `polar`, or undefined.
 *
 * Rings are matched by radius first (inclusive band, inner ring wins on a
 * shared edge); within the matched ring, slices are half-open
 * `[start, end)`. A radius hit with no angular hit does not fall through to
 * another ring.
 */
export function locate<T>(
  polar: PolarPoint,
  rings: readonly Ring<T>[],
  options: Partial<LayoutOptions> = {},
): T | undefined {
  const opts = resolveLayoutOptions(options)
  const width = ringWidth(rings.length, opts.baseDepth)

  for (const [ringIndex, slices] of rings.entries()) {
    const { inner, outer } = ringBand(ringIndex, width)
    if (polar.distance < inner || polar.distance > outer) continue

    for (const slice of slices) {
      if (polar.angleDeg >= slice.startAngleDeg && polar.angleDeg < slice.endAngleDeg) {
        return slice.node
      }
    }
    return undefined
  }

  return undefined
}

export function locateAt<T>(
  pointer: Point,
  center: Point,
  chartRadius: number,
  rings: readonly Ring<T>[],
  options: Partial<LayoutOptions> = {},
): T | undefined {
  const opts = resolveLayoutOptions(options)
  return locate(toPolar(pointer, center, chartRadius, opts.startAngleDeg), rings, opts)
}
