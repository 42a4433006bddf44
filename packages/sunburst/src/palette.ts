/**
 * Hues slices cycle through, by colorIndex
 */
export const PALETTE = [
  'blue',
  'purple',
  'pink',
  'red',
  'orange',
  'yellow',
  'green',
  'mint',
  'teal',
  'cyan',
  'indigo',
  'brown',
] as const

export const MIN_OPACITY = 0.4
const OPACITY_STEP = 0.15

export function sliceOpacity(depth: number): number {
  return Math.max(MIN_OPACITY, 1 - OPACITY_STEP * depth)
}

/**
 * Offset for a parent's children, shifted one hue past the parent so that
 * neighbouring sibling groups do not start on the same colour
 */
export function childColorOffset(parentColorIndex: number | undefined, paletteSize: number): number {
  return parentColorIndex === undefined ? 0 : (parentColorIndex + 1) % paletteSize
}
