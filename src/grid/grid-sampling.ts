/**
 * Regular line grids on a panel's surface, in world space.
 *
 * The panel's local axes are u = corner1 - corner0 and v = corner3 - corner0.
 * Horizontal lines run parallel to u and are stepped along v; vertical lines
 * run parallel to v and are stepped along u. Spacing is BASE_GRID_SPACING
 * divided by density, so a higher density gives more lines.
 */

import { PerspectiveGridError } from '../errors'
import type { Panel } from '../entities/panel'
import { panelSize } from '../entities/panel'
import * as vec3 from '../utils/vec3'
import type { Vector3 } from '../utils/vec3'

export type GridAxis = 'horizontal' | 'vertical'

export interface GridLine3D {
  start: Vector3
  end: Vector3
  axis: GridAxis
  boundary: boolean
}

export interface SampleOptions {
  /** Emit the panel's own (unshared) edges as boundary lines. Defaults to true. */
  includeBoundaries?: boolean
  /** Edge indices left to another panel. Defaults to the panel's sharedEdges. */
  skipEdges?: readonly number[]
}

/** Grid spacing in world units at density 1. */
export const BASE_GRID_SPACING = 1

// Slack for lengths that are an exact multiple of the spacing
const COUNT_EPSILON = 1e-9

// Edges 0 and 2 run along u, edges 1 and 3 along v
const EDGE_AXES: readonly GridAxis[] = ['horizontal', 'vertical', 'horizontal', 'vertical']

export function validateDensity(density: number, parameter: string = 'density'): void {
  if (!Number.isFinite(density) || density <= 0) {
    throw new PerspectiveGridError('InvalidDensity', 'density must be a positive number', parameter, density)
  }
}

export function gridSpacing(density: number): number {
  validateDensity(density)
  return BASE_GRID_SPACING / density
}

/**
 * Number of interior lines strictly between two boundaries `length` apart.
 * A length that is an exact multiple of the spacing puts no line on the far
 * boundary.
 */
export function interiorLineCount(length: number, spacing: number): number {
  if (length <= 0) {
    return 0
  }
  return Math.max(0, Math.ceil(length / spacing - COUNT_EPSILON) - 1)
}

/**
 * Boundary lines first (edge order, skipping `skipEdges`), then horizontal
 * interior lines, then vertical interior lines. Throws InvalidDensity for a
 * non-positive density.
 */
export function samplePanel(panel: Panel, density: number, options: SampleOptions = {}): GridLine3D[] {
  const spacing = gridSpacing(density)
  const includeBoundaries = options.includeBoundaries ?? true
  const skipEdges = options.skipEdges ?? panel.sharedEdges
  const [c0, c1, c2, c3] = panel.corners
  const { u: uLength, v: vLength } = panelSize(panel)
  const lines: GridLine3D[] = []

  if (includeBoundaries) {
    panel.corners.forEach((corner, index) => {
      if (skipEdges.includes(index)) {
        return
      }
      const next = panel.corners[(index + 1) % 4]
      lines.push({
        start: [corner[0], corner[1], corner[2]],
        end: [next[0], next[1], next[2]],
        axis: EDGE_AXES[index],
        boundary: true
      })
    })
  }

  const horizontalCount = interiorLineCount(vLength, spacing)
  for (let i = 1; i <= horizontalCount; i++) {
    const t = (i * spacing) / vLength
    lines.push({
      start: vec3.lerp(c0, c3, t),
      end: vec3.lerp(c1, c2, t),
      axis: 'horizontal',
      boundary: false
    })
  }

  const verticalCount = interiorLineCount(uLength, spacing)
  for (let i = 1; i <= verticalCount; i++) {
    const t = (i * spacing) / uLength
    lines.push({
      start: vec3.lerp(c0, c1, t),
      end: vec3.lerp(c3, c2, t),
      axis: 'vertical',
      boundary: false
    })
  }

  return lines
}

/**
 * Closed-form line count for a panel with side lengths u and v and no shared
 * edges: four boundary lines plus the interior lines along each axis.
 */
export function expectedLineCount(uLength: number, vLength: number, density: number): number {
  const spacing = gridSpacing(density)
  return 4 + interiorLineCount(uLength, spacing) + interiorLineCount(vLength, spacing)
}
