import type { PanelKind } from '../entities/panel'
import type { GridLine2D } from '../grid/grid-projection'
import type { Bounds2D, Point2D } from '../utils/geometry2d'

/**
 * Canvas-space grid of one panel. Coordinates are final: clipped to the panel
 * outline and to the canvas, Y pointing down.
 */
export interface PanelGrid {
  label: string
  kind: PanelKind
  lines: GridLine2D[]
  /** Visible outline of the panel; empty when nothing of it is visible. */
  boundary: Point2D[]
  /** Box around the emitted lines, null when there are none. */
  bounds: Bounds2D | null
}

export interface SceneGrid {
  /** Panel grids keyed by label, in layout order. Every panel has an entry. */
  panels: Map<string, PanelGrid>
  /** The full canvas, [0, width] x [0, height]. */
  canvasBounds: Bounds2D
  /** Box around every emitted line, null when the scene is empty. */
  contentBounds: Bounds2D | null
}

export interface GridOptions {
  /** Drop segments shorter than this many pixels. Defaults to 0. */
  minLineLength?: number
  /** Cap on lines per panel; boundary lines are always kept. Unlimited by default. */
  maxLinesPerPanel?: number
  /** Emit panel edges as boundary lines. Defaults to true. */
  includeBoundaries?: boolean
}
