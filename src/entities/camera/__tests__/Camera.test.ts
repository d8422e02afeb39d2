import { describe, it, expect } from '@jest/globals'
import { Camera, MAX_ORBIT_ELEVATION_DEGREES } from '../Camera'
import type { CameraParams } from '../Camera'
import { createOrthographicCamera, createStandardCamera } from '../camera-factories'
import { createProjectionContext, projectToCanvas } from '../../../utils/projection'
import * as vec3 from '../../../utils/vec3'
import { radiansToDegrees } from '../../../utils/angles'
import { captureGridError } from '../../../tests/testUtils'

const baseParams: CameraParams = {
  position: [0, 4, 8],
  target: [0, 0, 0],
  fovDegrees: 50,
  near: 0.1,
  far: 100,
  mode: 'perspective'
}

describe('Camera', () => {
  describe('create', () => {
    it('stores the configuration and defaults up to +Y', () => {
      const camera = Camera.create(baseParams)
      expect(camera.position).toEqual([0, 4, 8])
      expect(camera.target).toEqual([0, 0, 0])
      expect(camera.up).toEqual([0, 1, 0])
      expect(camera.fovDegrees).toBe(50)
      expect(camera.mode).toBe('perspective')
    })

    it('is frozen', () => {
      const camera = Camera.create(baseParams)
      expect(Object.isFrozen(camera)).toBe(true)
      expect(Object.isFrozen(camera.position)).toBe(true)
    })

    it('rejects a position equal to the target', () => {
      const error = captureGridError(() => Camera.create({ ...baseParams, position: [0, 0, 0], target: [0, 0, 0] }))
      expect(error.kind).toBe('InvalidCameraConfig')
      expect(error.parameter).toBe('target')
    })

    it.each([0, 180, -10, 200, NaN])('rejects fovDegrees %p', fovDegrees => {
      const error = captureGridError(() => Camera.create({ ...baseParams, fovDegrees }))
      expect(error.kind).toBe('InvalidCameraConfig')
      expect(error.parameter).toBe('fovDegrees')
    })

    it('rejects a non-positive near plane', () => {
      expect(captureGridError(() => Camera.create({ ...baseParams, near: 0 })).parameter).toBe('near')
      expect(captureGridError(() => Camera.create({ ...baseParams, near: -1 })).parameter).toBe('near')
    })

    it('rejects far not beyond near', () => {
      const error = captureGridError(() => Camera.create({ ...baseParams, near: 5, far: 5 }))
      expect(error.kind).toBe('InvalidCameraConfig')
      expect(error.parameter).toBe('far')
    })

    it('rejects non-finite coordinates', () => {
      expect(captureGridError(() => Camera.create({ ...baseParams, position: [NaN, 0, 0] })).parameter).toBe('position')
      expect(captureGridError(() => Camera.create({ ...baseParams, up: [0, Infinity, 0] })).parameter).toBe('up')
    })
  })

  describe('view matrix', () => {
    it('throws DegenerateBasis when looking straight along the up vector', () => {
      const camera = Camera.create({ ...baseParams, position: [0, 10, 0] })
      const error = captureGridError(() => camera.viewMatrix())
      expect(error.kind).toBe('DegenerateBasis')
      expect(error.parameter).toBe('up')
    })

    it('accepts an alternate up hint for a top-down view', () => {
      const camera = Camera.create({ ...baseParams, position: [0, 10, 0], up: [0, 0, -1] })
      const { right, up, forward } = camera.basis()
      expect(vec3.magnitude(right)).toBeCloseTo(1, 12)
      expect(vec3.dot(right, up)).toBeCloseTo(0, 12)
      expect(vec3.dot(up, forward)).toBeCloseTo(0, 12)
    })

    it('builds an orthonormal basis', () => {
      const { right, up, forward } = Camera.create(baseParams).basis()
      expect(right[0]).toBeCloseTo(1, 12)
      expect(vec3.magnitude(up)).toBeCloseTo(1, 12)
      expect(vec3.dot(right, forward)).toBeCloseTo(0, 12)
      expect(up[1]).toBeGreaterThan(0)
    })
  })

  describe('projection matrix', () => {
    it('rejects a non-positive aspect ratio', () => {
      const error = captureGridError(() => Camera.create(baseParams).projectionMatrix(0))
      expect(error.kind).toBe('InvalidCanvasSize')
      expect(error.parameter).toBe('aspectRatio')
    })

    it('maps the near and far planes to NDC depth -1 and 1 in perspective mode', () => {
      const m = Camera.create(baseParams).projectionMatrix(16 / 9)
      const depthAt = (distance: number) => (m[2][2] * -distance + m[2][3]) / distance
      expect(depthAt(0.1)).toBeCloseTo(-1, 9)
      expect(depthAt(100)).toBeCloseTo(1, 9)
    })

    it('scales the target plane the same way in both modes', () => {
      const perspective = Camera.create({ ...baseParams, position: [0, 0, 10] })
      const orthographic = perspective.withProjectionMode('orthographic')

      for (const point of [[1, 0, 0], [-2, 1.5, 0], [3, -2, 0]] as const) {
        const a = projectToCanvas(point, createProjectionContext(perspective, 1920, 1080))
        const b = projectToCanvas(point, createProjectionContext(orthographic, 1920, 1080))
        expect(b?.x).toBeCloseTo(a?.x ?? NaN, 9)
        expect(b?.y).toBeCloseTo(a?.y ?? NaN, 9)
      }
    })
  })

  describe('focal length', () => {
    it('is half the canvas width over tan(fov / 2)', () => {
      const camera = Camera.create({ ...baseParams, fovDegrees: 90 })
      expect(camera.focalLength(1920)).toBeCloseTo(960, 9)
      expect(camera.focalLength(800)).toBeCloseTo(400, 9)
    })
  })

  describe('orbit', () => {
    it('rotates about the target at constant distance', () => {
      const camera = Camera.create(baseParams)
      const orbited = camera.orbit(90, 0)

      expect(orbited.position[0]).toBeCloseTo(-8, 9)
      expect(orbited.position[1]).toBeCloseTo(4, 9)
      expect(orbited.position[2]).toBeCloseTo(0, 9)
      expect(orbited.distanceToTarget()).toBeCloseTo(Math.sqrt(80), 9)
      expect(orbited.target).toEqual(camera.target)
    })

    it('leaves the original camera untouched', () => {
      const camera = Camera.create(baseParams)
      camera.orbit(45, 10)
      expect(camera.position).toEqual([0, 4, 8])
    })

    it('clamps elevation short of the pole', () => {
      const camera = Camera.create(baseParams).orbit(0, 200)
      const offset = vec3.subtract(camera.position, camera.target)
      const elevation = radiansToDegrees(Math.asin(offset[1] / vec3.magnitude(offset)))

      expect(elevation).toBeCloseTo(MAX_ORBIT_ELEVATION_DEGREES, 6)
      expect(() => camera.viewMatrix()).not.toThrow()
    })

    it('places the camera at absolute spherical coordinates', () => {
      const camera = Camera.create(baseParams).orbitTo(0, 0, 5)
      expect(camera.position[0]).toBeCloseTo(5, 12)
      expect(camera.position[1]).toBeCloseTo(0, 12)
      expect(camera.position[2]).toBeCloseTo(0, 12)
    })

    it('rejects a non-positive orbit distance', () => {
      const error = captureGridError(() => Camera.create(baseParams).orbitTo(0, 0, 0))
      expect(error.kind).toBe('InvalidCameraConfig')
      expect(error.parameter).toBe('distance')
    })
  })

  describe('repositioning', () => {
    it('moves along the view direction with withDistance', () => {
      const camera = Camera.create(baseParams).withDistance(Math.sqrt(20))
      expect(camera.position[0]).toBeCloseTo(0, 12)
      expect(camera.position[1]).toBeCloseTo(2, 12)
      expect(camera.position[2]).toBeCloseTo(4, 12)
    })

    it('rejects a non-positive distance', () => {
      expect(captureGridError(() => Camera.create(baseParams).withDistance(-1)).parameter).toBe('distance')
    })

    it('revalidates changes made with with()', () => {
      const error = captureGridError(() => Camera.create(baseParams).with({ far: 0.05 }))
      expect(error.parameter).toBe('far')
    })
  })

  describe('DTO', () => {
    it('round-trips through toDto and fromDto', () => {
      const camera = Camera.create({ ...baseParams, up: [0, 0, 1], position: [1, 2, 3], mode: 'orthographic' })
      const dto = camera.toDto()
      expect(dto).toEqual({
        position: [1, 2, 3],
        target: [0, 0, 0],
        up: [0, 0, 1],
        fovDegrees: 50,
        near: 0.1,
        far: 100,
        mode: 'orthographic'
      })
      expect(Camera.fromDto(dto).toDto()).toEqual(dto)
    })

    it('revalidates on fromDto', () => {
      const dto = { ...Camera.create(baseParams).toDto(), fovDegrees: 0 }
      expect(captureGridError(() => Camera.fromDto(dto)).parameter).toBe('fovDegrees')
    })
  })

  describe('factories', () => {
    it('creates the standard perspective camera', () => {
      const camera = createStandardCamera()
      expect(camera.position).toEqual([0, 4, 8])
      expect(camera.fovDegrees).toBe(50)
      expect(camera.mode).toBe('perspective')
    })

    it('creates an orthographic camera whose far plane covers the distance', () => {
      const camera = createOrthographicCamera(80)
      expect(camera.mode).toBe('orthographic')
      expect(camera.far).toBe(160)
    })
  })
})
