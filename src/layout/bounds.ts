import type { Panel, Bounds3D } from '../entities/panel'
import { panelBounds } from '../entities/panel'
import * as vec3 from '../utils/vec3'
import type { Vector3 } from '../utils/vec3'

export interface CameraPlacement {
  position: Vector3
  target: Vector3
}

/**
 * Axis-aligned box around every panel corner. An empty panel set gives a
 * zero box at the origin.
 */
export function layoutBounds(panels: readonly Panel[]): Bounds3D {
  if (panels.length === 0) {
    return { min: [0, 0, 0], max: [0, 0, 0] }
  }
  return panels.map(panelBounds).reduce((acc, b) => ({
    min: vec3.min(acc.min, b.min),
    max: vec3.max(acc.max, b.max)
  }))
}

export function layoutCenter(panels: readonly Panel[]): Vector3 {
  const { min, max } = layoutBounds(panels)
  return vec3.midpoint(min, max)
}

/**
 * A viewpoint for looking into the room's back corner, where the walls meet.
 * The camera stands outside the open x = max side at 40 % of the height and
 * 80 % of the depth, which is in front of every panel of all three layouts
 * (the five-panel back wall closes z = max). The target sits low near the
 * corner.
 */
export function suggestCameraPlacement(panels: readonly Panel[]): CameraPlacement {
  const { max } = layoutBounds(panels)
  return {
    position: [max[0] * 1.5, max[1] * 0.4, max[2] * 0.8],
    target: [max[0] * 0.2, max[1] * 0.3, max[2] * 0.2]
  }
}
