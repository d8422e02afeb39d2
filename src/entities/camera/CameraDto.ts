import type { ProjectionMode } from './Camera'

export interface CameraDto {
  position: [number, number, number]
  target: [number, number, number]
  up: [number, number, number]
  fovDegrees: number
  near: number
  far: number
  mode: ProjectionMode
}
