/**
 * Camera projection from world space to canvas pixels.
 *
 * World → view (camera.viewMatrix) → clip (camera.projectionMatrix)
 * → perspective divide → NDC in [-1, 1] → canvas pixels with Y pointing down.
 */

import { PerspectiveGridError } from '../errors'
import type { Camera } from '../entities/camera/Camera'
import * as mat4 from './matrix4'
import type { Matrix4 } from './matrix4'
import { lerp } from './vec3'
import type { Vec3Like, Vector3 } from './vec3'
import type { Point2D } from './geometry2d'

export interface CanvasSize {
  width: number
  height: number
}

export interface ProjectionResult {
  x: number
  y: number
  /** Distance in front of the camera along the view direction. */
  depth: number
}

/**
 * Everything needed to project many points with one camera onto one canvas.
 */
export interface ProjectionContext {
  view: Matrix4
  projection: Matrix4
  near: number
  canvas: CanvasSize
}

export function validateCanvasSize(width: number, height: number): CanvasSize {
  if (!Number.isFinite(width) || width <= 0) {
    throw new PerspectiveGridError('InvalidCanvasSize', 'canvas width must be positive', 'canvasWidth', width)
  }
  if (!Number.isFinite(height) || height <= 0) {
    throw new PerspectiveGridError('InvalidCanvasSize', 'canvas height must be positive', 'canvasHeight', height)
  }
  return { width, height }
}

export function createProjectionContext(camera: Camera, canvasWidth: number, canvasHeight: number): ProjectionContext {
  const canvas = validateCanvasSize(canvasWidth, canvasHeight)
  return {
    view: camera.viewMatrix(),
    projection: camera.projectionMatrix(canvas.width / canvas.height),
    near: camera.near,
    canvas
  }
}

export function toViewSpace(context: ProjectionContext, worldPoint: Vec3Like): Vector3 {
  return mat4.transformPoint(context.view, worldPoint)
}

/** Depth of a view-space point; positive in front of the camera. */
export function viewDepth(viewPoint: Vec3Like): number {
  return -viewPoint[2]
}

/**
 * Map a view-space point that is already known to lie on or beyond the near
 * plane to canvas pixels.
 */
export function viewToCanvas(context: ProjectionContext, viewPoint: Vec3Like): Point2D {
  const [cx, cy, , cw] = mat4.transformHomogeneous(context.projection, [viewPoint[0], viewPoint[1], viewPoint[2], 1])
  const ndcX = cx / cw
  const ndcY = cy / cw
  return {
    x: (ndcX + 1) * 0.5 * context.canvas.width,
    y: (1 - ndcY) * 0.5 * context.canvas.height
  }
}

/**
 * Project a world point to canvas pixels.
 * Returns null if the point is behind the near plane.
 */
export function projectToCanvas(worldPoint: Vec3Like, context: ProjectionContext): ProjectionResult | null {
  const viewPoint = toViewSpace(context, worldPoint)
  const depth = viewDepth(viewPoint)
  if (depth < context.near) {
    return null
  }
  const { x, y } = viewToCanvas(context, viewPoint)
  if (!Number.isFinite(x) || !Number.isFinite(y)) {
    return null
  }
  return { x, y, depth }
}

/**
 * Keep the part of a view-space segment that lies on or beyond the near plane.
 * Returns null when both endpoints are behind it.
 */
export function clipSegmentToNearPlane(
  a: Vec3Like,
  b: Vec3Like,
  near: number
): [Vector3, Vector3] | null {
  const da = viewDepth(a)
  const db = viewDepth(b)
  const aInside = da >= near
  const bInside = db >= near

  if (!aInside && !bInside) {
    return null
  }
  if (aInside && bInside) {
    return [[a[0], a[1], a[2]], [b[0], b[1], b[2]]]
  }

  const t = (near - da) / (db - da)
  const crossing = lerp(a, b, t)
  crossing[2] = -near
  return aInside ? [[a[0], a[1], a[2]], crossing] : [crossing, [b[0], b[1], b[2]]]
}

/**
 * Clip a view-space polygon to the half-space in front of the near plane
 * (Sutherland-Hodgman against a single plane).
 */
export function clipPolygonToNearPlane(polygon: readonly Vec3Like[], near: number): Vector3[] {
  const output: Vector3[] = []
  for (let i = 0; i < polygon.length; i++) {
    const current = polygon[i]
    const previous = polygon[(i + polygon.length - 1) % polygon.length]
    const dCurrent = viewDepth(current)
    const dPrevious = viewDepth(previous)
    const currentInside = dCurrent >= near
    const previousInside = dPrevious >= near

    if (currentInside !== previousInside) {
      const crossing = lerp(previous, current, (near - dPrevious) / (dCurrent - dPrevious))
      crossing[2] = -near
      output.push(crossing)
    }
    if (currentInside) {
      output.push([current[0], current[1], current[2]])
    }
  }
  return output
}
