/**
 * 3D vector operations on plain number tuples.
 * Every function is pure and returns a new tuple.
 */

export type Vector3 = [number, number, number]
export type Vec3Like = readonly [number, number, number]

/** Values closer to zero than this are treated as zero in degeneracy checks. */
export const EPSILON = 1e-9

export function clone(v: Vec3Like): Vector3 {
  return [v[0], v[1], v[2]]
}

export function add(a: Vec3Like, b: Vec3Like): Vector3 {
  return [a[0] + b[0], a[1] + b[1], a[2] + b[2]]
}

export function subtract(a: Vec3Like, b: Vec3Like): Vector3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]]
}

export function scale(v: Vec3Like, s: number): Vector3 {
  return [v[0] * s, v[1] * s, v[2] * s]
}

export function sqrMagnitude(v: Vec3Like): number {
  return v[0] * v[0] + v[1] * v[1] + v[2] * v[2]
}

export function magnitude(v: Vec3Like): number {
  return Math.sqrt(sqrMagnitude(v))
}

/**
 * Unit vector along v. A vector shorter than epsilon has no direction and
 * comes back as [0, 0, 0]; callers that need a direction check isZero first.
 */
export function normalize(v: Vec3Like, epsilon: number = EPSILON): Vector3 {
  const mag = magnitude(v)
  if (mag < epsilon) {
    return [0, 0, 0]
  }
  return [v[0] / mag, v[1] / mag, v[2] / mag]
}

export function dot(a: Vec3Like, b: Vec3Like): number {
  return a[0] * b[0] + a[1] * b[1] + a[2] * b[2]
}

export function cross(a: Vec3Like, b: Vec3Like): Vector3 {
  return [
    a[1] * b[2] - a[2] * b[1],
    a[2] * b[0] - a[0] * b[2],
    a[0] * b[1] - a[1] * b[0]
  ]
}

export function distance(a: Vec3Like, b: Vec3Like): number {
  return magnitude(subtract(a, b))
}

export function midpoint(a: Vec3Like, b: Vec3Like): Vector3 {
  return [
    (a[0] + b[0]) / 2,
    (a[1] + b[1]) / 2,
    (a[2] + b[2]) / 2
  ]
}

export function lerp(a: Vec3Like, b: Vec3Like, t: number): Vector3 {
  return [
    a[0] + t * (b[0] - a[0]),
    a[1] + t * (b[1] - a[1]),
    a[2] + t * (b[2] - a[2])
  ]
}

export function equals(a: Vec3Like, b: Vec3Like, tolerance: number = 1e-6): boolean {
  return (
    Math.abs(a[0] - b[0]) < tolerance &&
    Math.abs(a[1] - b[1]) < tolerance &&
    Math.abs(a[2] - b[2]) < tolerance
  )
}

export function isZero(v: Vec3Like, tolerance: number = EPSILON): boolean {
  return sqrMagnitude(v) < tolerance * tolerance
}

export function isFiniteVector(v: Vec3Like): boolean {
  return Number.isFinite(v[0]) && Number.isFinite(v[1]) && Number.isFinite(v[2])
}

export function min(a: Vec3Like, b: Vec3Like): Vector3 {
  return [
    Math.min(a[0], b[0]),
    Math.min(a[1], b[1]),
    Math.min(a[2], b[2])
  ]
}

export function max(a: Vec3Like, b: Vec3Like): Vector3 {
  return [
    Math.max(a[0], b[0]),
    Math.max(a[1], b[1]),
    Math.max(a[2], b[2])
  ]
}

export function toString(v: Vec3Like, decimals: number = 3): string {
  return `[${v[0].toFixed(decimals)}, ${v[1].toFixed(decimals)}, ${v[2].toFixed(decimals)}]`
}
