/**
 * Projection of panel grids to the canvas, with clipping.
 *
 * Per panel: the corner polygon is clipped at the near plane in view space,
 * projected, and intersected with the canvas rectangle. That polygon is the
 * panel's boundary on the canvas. Every grid line is near-clipped, projected
 * and then clipped against the boundary polygon, so no line leaves its panel
 * or the canvas.
 */

import type { Camera } from '../entities/camera'
import type { Panel } from '../entities/panel'
import {
  CLIP_TOLERANCE,
  boundsOf,
  clampToBounds,
  clipPolygonToConvexPolygon,
  clipSegmentToConvexPolygon,
  isDegeneratePolygon,
  rectanglePolygon,
  segmentLength
} from '../utils/geometry2d'
import type { Bounds2D, Point2D } from '../utils/geometry2d'
import {
  clipPolygonToNearPlane,
  clipSegmentToNearPlane,
  createProjectionContext,
  toViewSpace,
  viewToCanvas
} from '../utils/projection'
import type { ProjectionContext } from '../utils/projection'
import type { GridAxis, GridLine3D } from './grid-sampling'

export interface GridLine2D {
  start: Point2D
  end: Point2D
  panelLabel: string
  axis: GridAxis
  boundary: boolean
}

export interface ProjectOptions {
  /** Segments shorter than this many pixels after clipping are dropped. Defaults to 0. */
  minLineLength?: number
}

export interface ProjectedPanel {
  lines: GridLine2D[]
  /** Empty when the panel is behind the camera, off canvas or seen edge-on. */
  boundary: Point2D[]
}

// Shorter segments are points and never emitted
const MIN_SEGMENT_LENGTH = 1e-9

export function canvasBounds(context: ProjectionContext): Bounds2D {
  return { minX: 0, minY: 0, maxX: context.canvas.width, maxY: context.canvas.height }
}

/**
 * The panel's visible outline on the canvas, or an empty polygon when it has
 * no visible area.
 */
export function projectPanelOutline(panel: Panel, context: ProjectionContext): Point2D[] {
  const viewCorners = panel.corners.map(corner => toViewSpace(context, corner))
  const inFront = clipPolygonToNearPlane(viewCorners, context.near)
  if (inFront.length < 3) {
    return []
  }

  const projected = inFront.map(p => viewToCanvas(context, p))
  if (projected.some(p => !Number.isFinite(p.x) || !Number.isFinite(p.y))) {
    return []
  }

  const bounds = canvasBounds(context)
  const onCanvas = clipPolygonToConvexPolygon(projected, rectanglePolygon(bounds))
    .map(p => clampToBounds(p, bounds))

  return isDegeneratePolygon(onCanvas) ? [] : onCanvas
}

/**
 * Project one 3D line and clip it to the panel outline. Returns null when
 * nothing of it remains.
 */
export function projectLine(
  line: GridLine3D,
  outline: readonly Point2D[],
  context: ProjectionContext,
  minLength: number = 0
): [Point2D, Point2D] | null {
  const inFront = clipSegmentToNearPlane(
    toViewSpace(context, line.start),
    toViewSpace(context, line.end),
    context.near
  )
  if (!inFront) {
    return null
  }

  const clipped = clipSegmentToConvexPolygon(
    viewToCanvas(context, inFront[0]),
    viewToCanvas(context, inFront[1]),
    outline,
    CLIP_TOLERANCE
  )
  if (!clipped) {
    return null
  }

  const bounds = canvasBounds(context)
  const start = clampToBounds(clipped[0], bounds)
  const end = clampToBounds(clipped[1], bounds)
  if (segmentLength(start, end) < Math.max(MIN_SEGMENT_LENGTH, minLength)) {
    return null
  }
  return [start, end]
}

/**
 * Project and clip a panel's sampled lines. Line order follows the input.
 */
export function projectPanelLines(
  panel: Panel,
  lines3d: readonly GridLine3D[],
  context: ProjectionContext,
  options: ProjectOptions = {}
): ProjectedPanel {
  return projectLinesInOutline(panel, lines3d, projectPanelOutline(panel, context), context, options)
}

/**
 * Same as projectPanelLines with the panel's outline already computed.
 */
export function projectLinesInOutline(
  panel: Panel,
  lines3d: readonly GridLine3D[],
  boundary: Point2D[],
  context: ProjectionContext,
  options: ProjectOptions = {}
): ProjectedPanel {
  if (boundary.length === 0) {
    return { lines: [], boundary }
  }

  const lines: GridLine2D[] = []
  for (const line of lines3d) {
    const segment = projectLine(line, boundary, context, options.minLineLength ?? 0)
    if (segment) {
      lines.push({
        start: segment[0],
        end: segment[1],
        panelLabel: panel.label,
        axis: line.axis,
        boundary: line.boundary
      })
    }
  }
  return { lines, boundary }
}

/**
 * Convenience entry point that builds the projection context from a camera
 * and canvas size. Throws InvalidCanvasSize for a non-positive canvas.
 */
export function projectPanelGrid(
  panel: Panel,
  lines3d: readonly GridLine3D[],
  camera: Camera,
  canvasWidth: number,
  canvasHeight: number,
  options: ProjectOptions = {}
): ProjectedPanel {
  const context = createProjectionContext(camera, canvasWidth, canvasHeight)
  return projectPanelLines(panel, lines3d, context, options)
}

export function lineBounds(lines: readonly GridLine2D[]): Bounds2D | null {
  return boundsOf(lines.flatMap(line => [line.start, line.end]))
}
