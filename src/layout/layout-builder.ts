/**
 * Room layouts built from planar panels.
 *
 * The room origin is the floor corner where the two walls meet. X runs along
 * the right wall, Z along the left wall (into the room depth) and Y up.
 * Each larger layout calls the next smaller builder and appends panels.
 */

import { PerspectiveGridError } from '../errors'
import { createPanel, sharedEdgeIndices, withPanelOptions } from '../entities/panel'
import type { Panel } from '../entities/panel'

export type LayoutKind = 'three-panel' | 'four-panel' | 'five-panel'

export const LAYOUT_KINDS: readonly LayoutKind[] = ['three-panel', 'four-panel', 'five-panel']

export const PANEL_LABELS = {
  floor: 'Floor',
  wallLeft: 'Wall-Left',
  wallRight: 'Wall-Right',
  ceiling: 'Ceiling',
  wallBack: 'Wall-Back'
} as const

export interface RoomScale {
  /** Room depth along Z before unit scaling. Defaults to the panel width. */
  depth?: number
  /** Multiplier applied to width, height and depth. Defaults to 1. */
  unitScale?: number
}

export interface RoomDimensions {
  width: number
  height: number
  depth: number
}

export interface LayoutOptions {
  /** Per-panel grid density, keyed by panel label. */
  densityOverrides?: Readonly<Record<string, number>>
}

export function isLayoutKind(value: unknown): value is LayoutKind {
  return LAYOUT_KINDS.some(kind => kind === value)
}

function requirePositive(value: number, parameter: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new PerspectiveGridError(
      'InvalidLayoutDimensions',
      `${parameter} must be a positive number`,
      parameter,
      value
    )
  }
}

export function resolveRoomDimensions(
  panelWidth: number,
  panelHeight: number,
  roomScale: RoomScale = {}
): RoomDimensions {
  requirePositive(panelWidth, 'panelWidth')
  requirePositive(panelHeight, 'panelHeight')

  const depth = roomScale.depth ?? panelWidth
  const unitScale = roomScale.unitScale ?? 1
  requirePositive(depth, 'depth')
  requirePositive(unitScale, 'unitScale')

  return {
    width: panelWidth * unitScale,
    height: panelHeight * unitScale,
    depth: depth * unitScale
  }
}

// ============================================================================
// Builders
// ============================================================================

/**
 * Floor plus the two walls meeting at the vertical edge x = 0, z = 0.
 */
export function buildThreePanelLayout(dims: RoomDimensions): Panel[] {
  const { width: w, height: h, depth: d } = dims

  const floor = createPanel(
    PANEL_LABELS.floor,
    'floor',
    [[0, 0, 0], [w, 0, 0], [w, 0, d], [0, 0, d]],
    [0, 1, 0]
  )
  const wallLeft = createPanel(
    PANEL_LABELS.wallLeft,
    'wall',
    [[0, 0, 0], [0, 0, d], [0, h, d], [0, h, 0]],
    [1, 0, 0]
  )
  const wallRight = createPanel(
    PANEL_LABELS.wallRight,
    'wall',
    [[w, 0, 0], [0, 0, 0], [0, h, 0], [w, h, 0]],
    [0, 0, 1]
  )

  return [floor, wallLeft, wallRight]
}

/**
 * Three-panel room with a ceiling at y = height over the floor.
 */
export function buildFourPanelLayout(dims: RoomDimensions): Panel[] {
  const { width: w, height: h, depth: d } = dims
  const ceiling = createPanel(
    PANEL_LABELS.ceiling,
    'ceiling',
    [[0, h, 0], [0, h, d], [w, h, d], [w, h, 0]],
    [0, -1, 0]
  )
  return [...buildThreePanelLayout(dims), ceiling]
}

/**
 * Four-panel room closed by a back wall in the plane z = depth.
 */
export function buildFivePanelLayout(dims: RoomDimensions): Panel[] {
  const { width: w, height: h, depth: d } = dims
  const wallBack = createPanel(
    PANEL_LABELS.wallBack,
    'wall',
    [[0, 0, d], [w, 0, d], [w, h, d], [0, h, d]],
    [0, 0, -1]
  )
  return [...buildFourPanelLayout(dims), wallBack]
}

const BUILDERS: Record<LayoutKind, (dims: RoomDimensions) => Panel[]> = {
  'three-panel': buildThreePanelLayout,
  'four-panel': buildFourPanelLayout,
  'five-panel': buildFivePanelLayout
}

/**
 * Build the ordered panel set for a layout kind.
 *
 * Throws InvalidLayoutDimensions for non-positive width, height, depth or
 * unit scale, and InvalidDensity for a non-positive density override.
 */
export function buildLayout(
  kind: LayoutKind,
  panelWidth: number,
  panelHeight: number,
  roomScale?: RoomScale,
  options: LayoutOptions = {}
): Panel[] {
  const dims = resolveRoomDimensions(panelWidth, panelHeight, roomScale)
  const panels = assignSharedEdges(BUILDERS[kind](dims))
  return applyDensityOverrides(panels, options.densityOverrides ?? {})
}

// ============================================================================
// Post-processing
// ============================================================================

/**
 * Mark each panel edge that coincides with an edge of an earlier panel, in
 * either direction. This is the static ownership used when a panel is sampled
 * on its own; scene assembly reassigns it by visibility.
 */
export function assignSharedEdges(panels: readonly Panel[]): Panel[] {
  const result: Panel[] = []
  for (const panel of panels) {
    result.push(withPanelOptions(panel, { sharedEdges: sharedEdgeIndices(panel, result) }))
  }
  return result
}

function applyDensityOverrides(
  panels: Panel[],
  overrides: Readonly<Record<string, number>>
): Panel[] {
  return panels.map(panel => {
    const density = overrides[panel.label]
    if (density === undefined) {
      return panel
    }
    if (!Number.isFinite(density) || density <= 0) {
      throw new PerspectiveGridError(
        'InvalidDensity',
        `density override for ${panel.label} must be positive`,
        `densityOverrides.${panel.label}`,
        density
      )
    }
    return withPanelOptions(panel, { density })
  })
}
