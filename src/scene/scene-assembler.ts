/**
 * One generation pass: layout panels + camera + density → SceneGrid.
 *
 * Panels are sampled and projected independently of each other; the result
 * depends only on the arguments.
 */

import { PerspectiveGridError } from '../errors'
import { Camera } from '../entities/camera'
import type { ProjectionMode } from '../entities/camera'
import { sharedEdgeIndices } from '../entities/panel'
import type { Panel } from '../entities/panel'
import { buildLayout } from '../layout'
import type { LayoutKind, LayoutOptions, RoomScale } from '../layout'
import { samplePanel, validateDensity } from '../grid/grid-sampling'
import { lineBounds, projectLinesInOutline, projectPanelOutline } from '../grid/grid-projection'
import type { GridLine2D } from '../grid/grid-projection'
import { unionBounds } from '../utils/geometry2d'
import type { Bounds2D } from '../utils/geometry2d'
import { createProjectionContext } from '../utils/projection'
import type { Vec3Like } from '../utils/vec3'
import type { GridOptions, PanelGrid, SceneGrid } from './types'

export interface SceneRequest {
  layoutKind: LayoutKind
  panelWidth: number
  panelHeight: number
  roomScale?: RoomScale
  layoutOptions?: LayoutOptions
  cameraPosition: Vec3Like
  cameraTarget: Vec3Like
  cameraUp?: Vec3Like
  fovDegrees: number
  projectionMode: ProjectionMode
  near: number
  far: number
  gridDensity: number
  canvasWidth: number
  canvasHeight: number
  gridOptions?: GridOptions
}

function validateGridOptions(options: GridOptions): void {
  const { minLineLength, maxLinesPerPanel } = options
  if (minLineLength !== undefined && (!Number.isFinite(minLineLength) || minLineLength < 0)) {
    throw new PerspectiveGridError(
      'InvalidConfig',
      'minLineLength must be a non-negative number',
      'minLineLength',
      minLineLength
    )
  }
  if (maxLinesPerPanel !== undefined && (!Number.isInteger(maxLinesPerPanel) || maxLinesPerPanel < 0)) {
    throw new PerspectiveGridError(
      'InvalidConfig',
      'maxLinesPerPanel must be a non-negative integer',
      'maxLinesPerPanel',
      maxLinesPerPanel
    )
  }
}

/**
 * Keep every boundary line and as many interior lines, in order, as fit
 * under the cap.
 */
export function limitLines(lines: readonly GridLine2D[], maxLines: number | undefined): GridLine2D[] {
  if (maxLines === undefined) {
    return [...lines]
  }
  const boundaryCount = lines.filter(line => line.boundary).length
  let interiorBudget = Math.max(0, maxLines - boundaryCount)
  return lines.filter(line => {
    if (line.boundary) {
      return true
    }
    if (interiorBudget > 0) {
      interiorBudget--
      return true
    }
    return false
  })
}

/**
 * Sample, project and clip every panel. Each panel's own density override
 * wins over `density`.
 *
 * An edge shared by several panels is drawn once, by the first panel in
 * layout order whose outline is visible. A panel seen edge-on or hidden
 * leaves its shared edges to the next panel.
 */
export function assembleScene(
  panels: readonly Panel[],
  camera: Camera,
  canvasWidth: number,
  canvasHeight: number,
  density: number,
  options: GridOptions = {}
): SceneGrid {
  validateDensity(density, 'gridDensity')
  validateGridOptions(options)
  const context = createProjectionContext(camera, canvasWidth, canvasHeight)

  const grids = new Map<string, PanelGrid>()
  let contentBounds: Bounds2D | null = null

  const outlines = panels.map(panel => projectPanelOutline(panel, context))
  const visibleEarlier: Panel[] = []

  for (const [index, panel] of panels.entries()) {
    const outline = outlines[index]
    const lines3d = samplePanel(panel, panel.density ?? density, {
      includeBoundaries: options.includeBoundaries,
      skipEdges: sharedEdgeIndices(panel, visibleEarlier)
    })
    const projected = projectLinesInOutline(panel, lines3d, outline, context, {
      minLineLength: options.minLineLength
    })
    const lines = limitLines(projected.lines, options.maxLinesPerPanel)
    const bounds = lineBounds(lines)
    contentBounds = unionBounds(contentBounds, bounds)

    grids.set(panel.label, {
      label: panel.label,
      kind: panel.kind,
      lines,
      boundary: projected.boundary,
      bounds
    })
    if (outline.length > 0) {
      visibleEarlier.push(panel)
    }
  }

  return {
    panels: grids,
    canvasBounds: { minX: 0, minY: 0, maxX: context.canvas.width, maxY: context.canvas.height },
    contentBounds
  }
}

/**
 * Build the layout and camera from an explicit request and assemble the
 * scene. Nothing is defaulted here beyond the optional fields.
 */
export function generateSceneGrid(request: SceneRequest): SceneGrid {
  const panels = buildLayout(
    request.layoutKind,
    request.panelWidth,
    request.panelHeight,
    request.roomScale,
    request.layoutOptions
  )
  const camera = Camera.create({
    position: request.cameraPosition,
    target: request.cameraTarget,
    up: request.cameraUp,
    fovDegrees: request.fovDegrees,
    near: request.near,
    far: request.far,
    mode: request.projectionMode
  })
  return assembleScene(
    panels,
    camera,
    request.canvasWidth,
    request.canvasHeight,
    request.gridDensity,
    request.gridOptions
  )
}
