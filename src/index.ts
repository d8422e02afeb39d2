// Perspective grid engine: room panels + camera → canvas-space grid lines

export { PerspectiveGridError, isPerspectiveGridError } from './errors'
export type { PerspectiveGridErrorKind } from './errors'

export * as vec3 from './utils/vec3'
export type { Vector3, Vec3Like } from './utils/vec3'
export * as mat4 from './utils/matrix4'
export type { Matrix4, Vector4 } from './utils/matrix4'
export type { Point2D, Bounds2D } from './utils/geometry2d'
export {
  createProjectionContext,
  projectToCanvas,
  clipSegmentToNearPlane,
  clipPolygonToNearPlane
} from './utils/projection'
export type { CanvasSize, ProjectionContext, ProjectionResult } from './utils/projection'

export * from './entities/camera'
export * from './entities/panel'
export * from './layout'
export * from './grid'
export * from './scene'
export * from './validation'
export * from './services'

export { GridSessionStore } from './store/grid-session-store'
export type { GenerationOutcome } from './store/grid-session-store'
