/**
 * 4x4 matrices for transform composition.
 *
 * Matrices are row-major and act on column vectors: p' = M * p.
 * A point is extended with w = 1, a direction with w = 0.
 */

import { PerspectiveGridError } from '../errors'
import { EPSILON } from './vec3'
import type { Vec3Like, Vector3 } from './vec3'

export type Matrix4 = number[][]
export type Vector4 = [number, number, number, number]

export function identity(): Matrix4 {
  return [
    [1, 0, 0, 0],
    [0, 1, 0, 0],
    [0, 0, 1, 0],
    [0, 0, 0, 1]
  ]
}

export function translation(x: number, y: number, z: number): Matrix4 {
  return [
    [1, 0, 0, x],
    [0, 1, 0, y],
    [0, 0, 1, z],
    [0, 0, 0, 1]
  ]
}

/**
 * Multiply two matrices. multiply(a, b) applies b first, then a.
 */
export function multiply(a: Matrix4, b: Matrix4): Matrix4 {
  const result: Matrix4 = [[0, 0, 0, 0], [0, 0, 0, 0], [0, 0, 0, 0], [0, 0, 0, 0]]
  for (let row = 0; row < 4; row++) {
    for (let col = 0; col < 4; col++) {
      let sum = 0
      for (let k = 0; k < 4; k++) {
        sum += a[row][k] * b[k][col]
      }
      result[row][col] = sum
    }
  }
  return result
}

/**
 * Invert a matrix by Gauss-Jordan elimination with partial pivoting.
 * Throws SingularMatrix when a pivot falls below the tolerance.
 */
export function invert(m: Matrix4, tolerance: number = EPSILON): Matrix4 {
  const a = m.map(row => [...row])
  const inv = identity()

  for (let col = 0; col < 4; col++) {
    let pivotRow = col
    for (let row = col + 1; row < 4; row++) {
      if (Math.abs(a[row][col]) > Math.abs(a[pivotRow][col])) {
        pivotRow = row
      }
    }

    const pivot = a[pivotRow][col]
    if (!Number.isFinite(pivot) || Math.abs(pivot) < tolerance) {
      throw new PerspectiveGridError(
        'SingularMatrix',
        `Matrix is not invertible (pivot ${pivot} in column ${col})`,
        'matrix'
      )
    }

    if (pivotRow !== col) {
      [a[col], a[pivotRow]] = [a[pivotRow], a[col]];
      [inv[col], inv[pivotRow]] = [inv[pivotRow], inv[col]]
    }

    for (let k = 0; k < 4; k++) {
      a[col][k] /= pivot
      inv[col][k] /= pivot
    }

    for (let row = 0; row < 4; row++) {
      if (row === col) continue
      const factor = a[row][col]
      if (factor === 0) continue
      for (let k = 0; k < 4; k++) {
        a[row][k] -= factor * a[col][k]
        inv[row][k] -= factor * inv[col][k]
      }
    }
  }

  return inv
}

export function transformHomogeneous(m: Matrix4, v: Readonly<Vector4>): Vector4 {
  return [
    m[0][0] * v[0] + m[0][1] * v[1] + m[0][2] * v[2] + m[0][3] * v[3],
    m[1][0] * v[0] + m[1][1] * v[1] + m[1][2] * v[2] + m[1][3] * v[3],
    m[2][0] * v[0] + m[2][1] * v[1] + m[2][2] * v[2] + m[2][3] * v[3],
    m[3][0] * v[0] + m[3][1] * v[1] + m[3][2] * v[2] + m[3][3] * v[3]
  ]
}

/**
 * Transform a point and divide by the resulting w.
 * When w is zero (a point at infinity) the undivided coordinates are returned.
 */
export function transformPoint(m: Matrix4, p: Vec3Like): Vector3 {
  const [x, y, z, w] = transformHomogeneous(m, [p[0], p[1], p[2], 1])
  if (Math.abs(w) < EPSILON || w === 1) {
    return [x, y, z]
  }
  return [x / w, y / w, z / w]
}

/**
 * Transform a direction, ignoring translation.
 */
export function transformDirection(m: Matrix4, d: Vec3Like): Vector3 {
  const [x, y, z] = transformHomogeneous(m, [d[0], d[1], d[2], 0])
  return [x, y, z]
}

export function approximatelyEqual(a: Matrix4, b: Matrix4, tolerance: number = 1e-9): boolean {
  for (let row = 0; row < 4; row++) {
    for (let col = 0; col < 4; col++) {
      if (Math.abs(a[row][col] - b[row][col]) > tolerance) {
        return false
      }
    }
  }
  return true
}
