import { Camera } from './Camera'

export const DEFAULT_NEAR = 0.1
export const DEFAULT_FAR = 100

/**
 * Camera slightly above the scene, looking at the origin from +Z.
 */
export function createStandardCamera(distance: number = 8, fovDegrees: number = 50): Camera {
  return Camera.create({
    position: [0, 4, distance],
    target: [0, 0, 0],
    fovDegrees,
    near: DEFAULT_NEAR,
    far: DEFAULT_FAR,
    mode: 'perspective'
  })
}

/**
 * Same placement as the standard camera with parallel projection.
 * The far plane follows the distance so the whole scene stays in range.
 */
export function createOrthographicCamera(distance: number = 8): Camera {
  return Camera.create({
    position: [0, 4, distance],
    target: [0, 0, 0],
    fovDegrees: 50,
    near: DEFAULT_NEAR,
    far: Math.max(DEFAULT_FAR, distance * 2),
    mode: 'orthographic'
  })
}
