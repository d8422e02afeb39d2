export { Camera, WORLD_UP, MAX_ORBIT_ELEVATION_DEGREES } from './Camera'
export type { CameraParams, CameraBasis, ProjectionMode } from './Camera'
export type { CameraDto } from './CameraDto'
export { createStandardCamera, createOrthographicCamera, DEFAULT_NEAR, DEFAULT_FAR } from './camera-factories'
