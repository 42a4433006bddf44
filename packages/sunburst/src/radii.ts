/**
 * Ring radii, normalized to the chart radius
 */

export const CENTER_RADIUS = 0.18
export const OUTER_PADDING = 0.02

export interface RingBand {
  inner: number
  outer: number
}

/**
 * Width of one ring. At least `baseDepth` rings share the available band so
 * the chart does not jump in size while only a few rings exist.
 */
export function ringWidth(ringCount: number, baseDepth: number): number {
  const count = Math.max(ringCount, baseDepth, 1)
  return (1 - CENTER_RADIUS - OUTER_PADDING) / count
}

export function ringBand(ringIndex: number, width: number): RingBand {
  return {
    inner: CENTER_RADIUS + width * ringIndex,
    outer: CENTER_RADIUS + width * (ringIndex + 1),
  }
}
