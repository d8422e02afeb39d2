import * as vec3 from '../../utils/vec3'
import type { Vec3Like, Vector3 } from '../../utils/vec3'

export type PanelKind = 'floor' | 'wall' | 'ceiling'

export type PanelCorners = readonly [Vec3Like, Vec3Like, Vec3Like, Vec3Like]

export interface PanelEdge {
  index: number
  start: Vec3Like
  end: Vec3Like
}

export interface Bounds3D {
  min: Vector3
  max: Vector3
}

/**
 * One planar quadrilateral surface of a room layout.
 *
 * Corners run clockwise when seen from inside the room, i.e. from the side the
 * normal points to. Edge i joins corner i to corner (i + 1) % 4.
 */
export interface Panel {
  readonly label: string
  readonly kind: PanelKind
  readonly corners: PanelCorners
  /** Unit normal pointing into the room. */
  readonly normal: Vec3Like
  /** Grid density for this panel; the global density applies when absent. */
  readonly density?: number
  /** Edges whose boundary line another panel emits. */
  readonly sharedEdges: readonly number[]
}

export interface PanelOptions {
  density?: number
  sharedEdges?: readonly number[]
}

export function createPanel(
  label: string,
  kind: PanelKind,
  corners: PanelCorners,
  normal: Vec3Like,
  options: PanelOptions = {}
): Panel {
  const frozenCorners = Object.freeze([
    freezePoint(corners[0]),
    freezePoint(corners[1]),
    freezePoint(corners[2]),
    freezePoint(corners[3])
  ] as const)

  const panel: Panel = {
    label,
    kind,
    corners: frozenCorners,
    normal: freezePoint(vec3.normalize(normal)),
    sharedEdges: Object.freeze([...(options.sharedEdges ?? [])]),
    ...(options.density !== undefined ? { density: options.density } : {})
  }
  return Object.freeze(panel)
}

export function withPanelOptions(panel: Panel, options: PanelOptions): Panel {
  return createPanel(panel.label, panel.kind, panel.corners, panel.normal, {
    density: options.density ?? panel.density,
    sharedEdges: options.sharedEdges ?? panel.sharedEdges
  })
}

function freezePoint(p: Vec3Like): Vec3Like {
  return Object.freeze([p[0], p[1], p[2]] as const)
}

export function panelEdges(panel: Panel): PanelEdge[] {
  return panel.corners.map((start, index) => ({
    index,
    start,
    end: panel.corners[(index + 1) % 4]
  }))
}

/** True when two edges join the same corners, in either direction. */
export function isSameEdge(a: PanelEdge, b: PanelEdge): boolean {
  return (vec3.equals(a.start, b.start) && vec3.equals(a.end, b.end)) ||
    (vec3.equals(a.start, b.end) && vec3.equals(a.end, b.start))
}

/**
 * Indices of the panel's edges that coincide with an edge of any of `others`.
 */
export function sharedEdgeIndices(panel: Panel, others: readonly Panel[]): number[] {
  const otherEdges = others.flatMap(panelEdges)
  return panelEdges(panel)
    .filter(edge => otherEdges.some(other => isSameEdge(edge, other)))
    .map(edge => edge.index)
}

export function panelCenter(panel: Panel): Vector3 {
  const sum = panel.corners.reduce<Vector3>((acc, corner) => vec3.add(acc, corner), [0, 0, 0])
  return vec3.scale(sum, 1 / 4)
}

export function panelBounds(panel: Panel): Bounds3D {
  let min: Vector3 = [panel.corners[0][0], panel.corners[0][1], panel.corners[0][2]]
  let max: Vector3 = [...min]
  for (const corner of panel.corners) {
    min = vec3.min(min, corner)
    max = vec3.max(max, corner)
  }
  return { min, max }
}

/**
 * Lengths of the two local grid axes: u along corner 0 → 1, v along corner 0 → 3.
 */
export function panelSize(panel: Panel): { u: number; v: number } {
  const [c0, c1, , c3] = panel.corners
  return {
    u: vec3.distance(c0, c1),
    v: vec3.distance(c0, c3)
  }
}

/**
 * Normals from the two opposite corner pairs agree and the fourth corner lies
 * in the plane of the other three.
 */
export function isPanelPlanar(panel: Panel, tolerance: number = 1e-6): boolean {
  const [c0, c1, c2, c3] = panel.corners
  const n0 = vec3.normalize(vec3.cross(vec3.subtract(c1, c0), vec3.subtract(c3, c0)))
  const n2 = vec3.normalize(vec3.cross(vec3.subtract(c3, c2), vec3.subtract(c1, c2)))
  if (vec3.isZero(n0) || vec3.isZero(n2)) {
    return false
  }
  const offPlane = Math.abs(vec3.dot(vec3.subtract(c2, c0), n0))
  return vec3.equals(n0, n2, tolerance) && offPlane < tolerance
}

/**
 * Every turn between consecutive edges has the same sense about the normal.
 */
export function isPanelConvex(panel: Panel): boolean {
  const turns = panel.corners.map((corner, i) => {
    const next = panel.corners[(i + 1) % 4]
    const afterNext = panel.corners[(i + 2) % 4]
    const turn = vec3.cross(vec3.subtract(next, corner), vec3.subtract(afterNext, next))
    return vec3.dot(turn, panel.normal)
  })
  return turns.every(t => t > vec3.EPSILON) || turns.every(t => t < -vec3.EPSILON)
}

/**
 * True when the corners run clockwise seen from the normal side.
 */
export function isClockwiseFromInside(panel: Panel): boolean {
  const [c0, c1, c2] = panel.corners
  const turn = vec3.cross(vec3.subtract(c1, c0), vec3.subtract(c2, c1))
  return vec3.dot(turn, panel.normal) < 0
}
