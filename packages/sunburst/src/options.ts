import type { LayoutOptions } from './types'
import { PALETTE } from './palette'

export const DEFAULT_LAYOUT_OPTIONS: Readonly<LayoutOptions> = {
  baseDepth: 3,
  maxRings: 10,
  minArcDeg: 0.5,
  paletteSize: PALETTE.length,
  startAngleDeg: -90,
}

export function resolveLayoutOptions(options: Partial<LayoutOptions> = {}): LayoutOptions {
  return { ...DEFAULT_LAYOUT_OPTIONS, ...options }
}
