/**
 * Named size presets and unit conversion. Callers pick a preset and pass the
 * resulting numbers to buildLayout; nothing in the builders reads these.
 */

export type LengthUnit = 'inches' | 'feet' | 'meters' | 'cm' | 'mm'

export type SizePreset = 'small' | 'standard' | 'large'

export interface PanelDimensions {
  width: number
  height: number
  units: LengthUnit
}

export interface RoomPresetDimensions {
  width: number
  height: number
  depth: number
  units: LengthUnit
}

// Conversion factors to inches
const INCHES_PER_UNIT: Record<LengthUnit, number> = {
  inches: 1.0,
  feet: 12.0,
  meters: 39.37,
  cm: 0.3937,
  mm: 0.0394
}

const PANEL_PRESETS: Record<SizePreset, PanelDimensions> = {
  small: { width: 4, height: 4, units: 'inches' },
  standard: { width: 6, height: 6, units: 'inches' },
  large: { width: 8, height: 8, units: 'inches' }
}

const ROOM_PRESETS: Record<SizePreset, RoomPresetDimensions> = {
  small: { width: 8, height: 6, depth: 8, units: 'feet' },
  standard: { width: 12, height: 8, depth: 12, units: 'feet' },
  large: { width: 16, height: 10, depth: 16, units: 'feet' }
}

export function isSizePreset(name: string): name is SizePreset {
  return name === 'small' || name === 'standard' || name === 'large'
}

/**
 * Factor that converts a length in `from` units to `to` units.
 * unitScaleBetween('feet', 'inches') === 12
 */
export function unitScaleBetween(from: LengthUnit, to: LengthUnit): number {
  return INCHES_PER_UNIT[from] / INCHES_PER_UNIT[to]
}

/** Unknown names fall back to the standard preset. */
export function panelPreset(name: string = 'standard'): PanelDimensions {
  return { ...PANEL_PRESETS[isSizePreset(name) ? name : 'standard'] }
}

/** Unknown names fall back to the standard preset. */
export function roomPreset(name: string = 'standard'): RoomPresetDimensions {
  return { ...ROOM_PRESETS[isSizePreset(name) ? name : 'standard'] }
}
