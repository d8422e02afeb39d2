import { PerspectiveGridError } from '../../errors'
import * as vec3 from '../../utils/vec3'
import type { Vec3Like, Vector3 } from '../../utils/vec3'
import type { Matrix4 } from '../../utils/matrix4'
import { clamp, degreesToRadians, radiansToDegrees } from '../../utils/angles'
import type { CameraDto } from './CameraDto'

export type ProjectionMode = 'perspective' | 'orthographic'

export const WORLD_UP: Vec3Like = [0, 1, 0]

/** Orbiting never brings the camera closer than this to the poles. */
export const MAX_ORBIT_ELEVATION_DEGREES = 89.9

export interface CameraParams {
    position: Vec3Like
    target: Vec3Like
    /** Up hint; defaults to world up (+Y). */
    up?: Vec3Like
    /** Horizontal field of view, exclusive range (0, 180). */
    fovDegrees: number
    near: number
    far: number
    mode: ProjectionMode
}

export interface CameraBasis {
    right: Vector3
    up: Vector3
    forward: Vector3
}

/**
 * Pinhole camera looking from `position` at `target`.
 *
 * Instances are immutable: orbit and the other reposition helpers return a
 * new Camera. The canvas size only enters at projection time, so one camera
 * serves any number of output resolutions.
 */
export class Camera {
    readonly position: Vec3Like
    readonly target: Vec3Like
    readonly up: Vec3Like
    readonly fovDegrees: number
    readonly near: number
    readonly far: number
    readonly mode: ProjectionMode

    private constructor(
        position: Vec3Like,
        target: Vec3Like,
        up: Vec3Like,
        fovDegrees: number,
        near: number,
        far: number,
        mode: ProjectionMode
    ) {
        this.position = Object.freeze([position[0], position[1], position[2]] as const)
        this.target = Object.freeze([target[0], target[1], target[2]] as const)
        this.up = Object.freeze([up[0], up[1], up[2]] as const)
        this.fovDegrees = fovDegrees
        this.near = near
        this.far = far
        this.mode = mode
        Object.freeze(this)
    }

    // ============================================================================
    // Factory methods
    // ============================================================================

    static create(params: CameraParams): Camera {
        const up = params.up ?? WORLD_UP

        if (!vec3.isFiniteVector(params.position)) {
            throw invalidConfig('position must contain finite numbers', 'position', params.position)
        }
        if (!vec3.isFiniteVector(params.target)) {
            throw invalidConfig('target must contain finite numbers', 'target', params.target)
        }
        if (!vec3.isFiniteVector(up)) {
            throw invalidConfig('up must contain finite numbers', 'up', up)
        }
        if (vec3.distance(params.position, params.target) < vec3.EPSILON) {
            throw invalidConfig('position and target must differ', 'target', params.target)
        }
        if (!Number.isFinite(params.fovDegrees) || params.fovDegrees <= 0 || params.fovDegrees >= 180) {
            throw invalidConfig('fovDegrees must lie strictly between 0 and 180', 'fovDegrees', params.fovDegrees)
        }
        if (!Number.isFinite(params.near) || params.near <= 0) {
            throw invalidConfig('near must be positive', 'near', params.near)
        }
        if (!Number.isFinite(params.far) || params.far <= params.near) {
            throw invalidConfig('far must be greater than near', 'far', params.far)
        }
        if (params.mode !== 'perspective' && params.mode !== 'orthographic') {
            throw invalidConfig(`unknown projection mode '${String(params.mode)}'`, 'mode', params.mode)
        }

        return new Camera(
            params.position,
            params.target,
            up,
            params.fovDegrees,
            params.near,
            params.far,
            params.mode
        )
    }

    static fromDto(dto: CameraDto): Camera {
        return Camera.create(dto)
    }

    toDto(): CameraDto {
        return {
            position: [...this.position],
            target: [...this.target],
            up: [...this.up],
            fovDegrees: this.fovDegrees,
            near: this.near,
            far: this.far,
            mode: this.mode
        }
    }

    // ============================================================================
    // Matrices
    // ============================================================================

    /**
     * Orthonormal camera basis. Throws DegenerateBasis when the view direction
     * is parallel to the up hint; pass a different up vector in that case.
     */
    basis(): CameraBasis {
        const forward = vec3.normalize(vec3.subtract(this.target, this.position))
        const side = vec3.cross(forward, this.up)
        if (vec3.isZero(side)) {
            throw new PerspectiveGridError(
                'DegenerateBasis',
                'view direction is parallel to the up vector; supply a different up hint',
                'up',
                this.up
            )
        }
        const right = vec3.normalize(side)
        const up = vec3.cross(right, forward)
        return { right, up, forward }
    }

    /**
     * World-to-camera transform. The camera looks down -Z in view space.
     */
    viewMatrix(): Matrix4 {
        const { right, up, forward } = this.basis()
        const eye = this.position
        return [
            [right[0], right[1], right[2], -vec3.dot(right, eye)],
            [up[0], up[1], up[2], -vec3.dot(up, eye)],
            [-forward[0], -forward[1], -forward[2], vec3.dot(forward, eye)],
            [0, 0, 0, 1]
        ]
    }

    /**
     * View-to-clip transform for the given canvas aspect ratio (width / height).
     *
     * Orthographic mode sizes its view volume so that the plane through the
     * target, perpendicular to the view direction, appears at the same scale
     * as in perspective mode.
     */
    projectionMatrix(aspectRatio: number): Matrix4 {
        if (!Number.isFinite(aspectRatio) || aspectRatio <= 0) {
            throw new PerspectiveGridError('InvalidCanvasSize', 'aspect ratio must be positive', 'aspectRatio', aspectRatio)
        }
        const n = this.near
        const f = this.far
        const tanHalfFov = Math.tan(degreesToRadians(this.fovDegrees) / 2)

        if (this.mode === 'orthographic') {
            const halfWidth = this.distanceToTarget() * tanHalfFov
            const halfHeight = halfWidth / aspectRatio
            return [
                [1 / halfWidth, 0, 0, 0],
                [0, 1 / halfHeight, 0, 0],
                [0, 0, -2 / (f - n), -(f + n) / (f - n)],
                [0, 0, 0, 1]
            ]
        }

        const sx = 1 / tanHalfFov
        const sy = sx * aspectRatio
        return [
            [sx, 0, 0, 0],
            [0, sy, 0, 0],
            [0, 0, (f + n) / (n - f), (2 * f * n) / (n - f)],
            [0, 0, -1, 0]
        ]
    }

    /**
     * Focal length in pixels for a canvas of the given width.
     */
    focalLength(canvasWidth: number): number {
        return canvasWidth / 2 / Math.tan(degreesToRadians(this.fovDegrees) / 2)
    }

    distanceToTarget(): number {
        return vec3.distance(this.position, this.target)
    }

    // ============================================================================
    // Repositioning (each returns a new Camera)
    // ============================================================================

    /**
     * Rotate the camera about its target at constant distance.
     * Azimuth is measured in the XZ plane from +X toward +Z, elevation from the
     * XZ plane toward +Y, both in degrees.
     */
    orbit(azimuthDeltaDegrees: number, elevationDeltaDegrees: number): Camera {
        const { azimuth, elevation, distance } = this.sphericalPosition()
        return this.orbitTo(azimuth + azimuthDeltaDegrees, elevation + elevationDeltaDegrees, distance)
    }

    /**
     * Place the camera at absolute spherical coordinates around the target.
     */
    orbitTo(azimuthDegrees: number, elevationDegrees: number, distance: number): Camera {
        if (!Number.isFinite(distance) || distance <= 0) {
            throw invalidConfig('distance must be positive', 'distance', distance)
        }
        const elevation = degreesToRadians(
            clamp(elevationDegrees, -MAX_ORBIT_ELEVATION_DEGREES, MAX_ORBIT_ELEVATION_DEGREES)
        )
        const azimuth = degreesToRadians(azimuthDegrees)

        const offset: Vector3 = [
            distance * Math.cos(elevation) * Math.cos(azimuth),
            distance * Math.sin(elevation),
            distance * Math.cos(elevation) * Math.sin(azimuth)
        ]
        return this.with({ position: vec3.add(this.target, offset) })
    }

    /**
     * Move along the current view direction so the target is `distance` away.
     */
    withDistance(distance: number): Camera {
        if (!Number.isFinite(distance) || distance <= 0) {
            throw invalidConfig('distance must be positive', 'distance', distance)
        }
        const direction = vec3.normalize(vec3.subtract(this.position, this.target))
        return this.with({ position: vec3.add(this.target, vec3.scale(direction, distance)) })
    }

    withProjectionMode(mode: ProjectionMode): Camera {
        return this.with({ mode })
    }

    with(changes: Partial<CameraParams>): Camera {
        return Camera.create({
            position: this.position,
            target: this.target,
            up: this.up,
            fovDegrees: this.fovDegrees,
            near: this.near,
            far: this.far,
            mode: this.mode,
            ...changes
        })
    }

    private sphericalPosition(): { azimuth: number; elevation: number; distance: number } {
        const offset = vec3.subtract(this.position, this.target)
        const distance = vec3.magnitude(offset)
        const elevation = radiansToDegrees(Math.asin(clamp(offset[1] / distance, -1, 1)))
        const azimuth = radiansToDegrees(Math.atan2(offset[2], offset[0]))
        return { azimuth, elevation, distance }
    }
}

function invalidConfig(message: string, parameter: string, value: unknown): PerspectiveGridError {
    return new PerspectiveGridError('InvalidCameraConfig', message, parameter, value)
}
