import { describe, it, expect } from '@jest/globals'
import * as mat4 from '../matrix4'
import { PerspectiveGridError } from '../../errors'
import { Camera } from '../../entities/camera'
import { captureGridError } from '../../tests/testUtils'

describe('matrix4', () => {
  it('multiplies with identity as a no-op', () => {
    const t = mat4.translation(1, 2, 3)
    expect(mat4.multiply(mat4.identity(), t)).toEqual(t)
    expect(mat4.multiply(t, mat4.identity())).toEqual(t)
  })

  it('composes translations', () => {
    const composed = mat4.multiply(mat4.translation(1, 0, 0), mat4.translation(0, 2, 0))
    expect(mat4.transformPoint(composed, [0, 0, 0])).toEqual([1, 2, 0])
  })

  it('transforms points with translation and directions without', () => {
    const t = mat4.translation(5, -1, 2)
    expect(mat4.transformPoint(t, [1, 1, 1])).toEqual([6, 0, 3])
    expect(mat4.transformDirection(t, [1, 1, 1])).toEqual([1, 1, 1])
  })

  it('divides by w for projective transforms', () => {
    const m = mat4.identity()
    m[3] = [0, 0, 0, 2]
    expect(mat4.transformPoint(m, [2, 4, 6])).toEqual([1, 2, 3])
  })

  it('inverts a translation', () => {
    const inverse = mat4.invert(mat4.translation(1, 2, 3))
    expect(mat4.approximatelyEqual(inverse, mat4.translation(-1, -2, -3))).toBe(true)
  })

  it('gives the identity when a view matrix is composed with its inverse', () => {
    const cameras = [
      Camera.create({ position: [0, 4, 8], target: [0, 0, 0], fovDegrees: 50, near: 0.1, far: 100, mode: 'perspective' }),
      Camera.create({ position: [-3, 2.4, -3], target: [4.8, 1.8, 4.8], fovDegrees: 70, near: 0.5, far: 50, mode: 'perspective' }),
      Camera.create({ position: [10, -2, 1], target: [0, 1, 0], fovDegrees: 30, near: 1, far: 200, mode: 'orthographic' })
    ]

    for (const camera of cameras) {
      const view = camera.viewMatrix()
      expect(mat4.approximatelyEqual(mat4.multiply(view, mat4.invert(view)), mat4.identity())).toBe(true)
      expect(mat4.approximatelyEqual(mat4.multiply(mat4.invert(view), view), mat4.identity())).toBe(true)
    }
  })

  it('throws SingularMatrix for a non-invertible matrix', () => {
    const flattened = mat4.identity()
    flattened[2] = [0, 0, 0, 0]

    const error = captureGridError(() => mat4.invert(flattened))
    expect(error).toBeInstanceOf(PerspectiveGridError)
    expect(error.kind).toBe('SingularMatrix')
    expect(error.parameter).toBe('matrix')
  })

  it('throws SingularMatrix for the zero matrix', () => {
    const zero: mat4.Matrix4 = [[0, 0, 0, 0], [0, 0, 0, 0], [0, 0, 0, 0], [0, 0, 0, 0]]
    expect(captureGridError(() => mat4.invert(zero)).kind).toBe('SingularMatrix')
  })
})
