import { makeAutoObservable, reaction } from 'mobx'
import type { IReactionDisposer } from 'mobx'
import { Camera } from '../entities/camera'
import type { ProjectionMode } from '../entities/camera'
import { PerspectiveGridError } from '../errors'
import { buildLayout, panelPreset, suggestCameraPlacement } from '../layout'
import type { LayoutKind } from '../layout'
import type { SceneGrid } from '../scene'
import { reportGeneration, reportGenerationFailure, runGeneration } from '../services/grid-generation'
import type { GenerationResult } from '../services/grid-generation'
import * as vec3 from '../utils/vec3'
import type { Vec3Like } from '../utils/vec3'
import { DEFAULT_GENERATION_CONFIG } from '../validation/generation-config'
import type { GridGenerationConfig } from '../validation/generation-config'

export type GenerationOutcome =
  | { status: 'ok'; result: GenerationResult }
  | { status: 'error'; error: PerspectiveGridError }

/**
 * Observable editing session for a front-end: the current configuration
 * record, and the grid regenerated from it whenever it changes.
 *
 * Invalid settings do not throw out of the derived values; they surface as an
 * error outcome. Each new outcome is written to the generation log as one run
 * until dispose() is called.
 */
export class GridSessionStore {
  config: GridGenerationConfig

  private readonly stopReporting: IReactionDisposer

  constructor(initial: Readonly<GridGenerationConfig> = DEFAULT_GENERATION_CONFIG) {
    this.config = { ...initial }
    makeAutoObservable<GridSessionStore, 'stopReporting'>(this, { stopReporting: false }, { autoBind: true })
    this.stopReporting = reaction(
      () => this.outcome,
      outcome => {
        if (outcome.status === 'ok') {
          reportGeneration(this.config, outcome.result)
        } else {
          reportGenerationFailure(outcome.error)
        }
      },
      { fireImmediately: true }
    )
  }

  get outcome(): GenerationOutcome {
    try {
      return { status: 'ok', result: runGeneration(this.config) }
    } catch (error) {
      if (error instanceof PerspectiveGridError) {
        return { status: 'error', error }
      }
      throw error
    }
  }

  get scene(): SceneGrid | null {
    const outcome = this.outcome
    return outcome.status === 'ok' ? outcome.result.scene : null
  }

  get totalLines(): number {
    const outcome = this.outcome
    return outcome.status === 'ok' ? outcome.result.stats.totalLines : 0
  }

  get errorMessage(): string | null {
    const outcome = this.outcome
    return outcome.status === 'error' ? outcome.error.message : null
  }

  update(changes: Partial<GridGenerationConfig>) {
    this.config = { ...this.config, ...changes }
  }

  setLayoutKind(layoutKind: LayoutKind) {
    this.update({ layoutKind })
  }

  setDensity(gridDensity: number) {
    this.update({ gridDensity })
  }

  setProjectionMode(projectionMode: ProjectionMode) {
    this.update({ projectionMode })
  }

  setCanvasSize(canvasWidth: number, canvasHeight: number) {
    this.update({ canvasWidth, canvasHeight })
  }

  setCamera(position: Vec3Like, target: Vec3Like) {
    this.update({ cameraPosition: vec3.clone(position), cameraTarget: vec3.clone(target) })
  }

  /**
   * Turn the camera about its target. Throws InvalidCameraConfig when the
   * current camera settings are themselves invalid.
   */
  orbit(azimuthDeltaDegrees: number, elevationDeltaDegrees: number) {
    const camera = this.camera().orbit(azimuthDeltaDegrees, elevationDeltaDegrees)
    this.setCamera(camera.position, camera.target)
  }

  applySizePreset(name: string) {
    const { width, height } = panelPreset(name)
    this.update({ panelWidth: width, panelHeight: height })
  }

  /** Move the camera to the suggested viewpoint for the current room. */
  placeCameraAutomatically() {
    const panels = buildLayout(
      this.config.layoutKind,
      this.config.panelWidth,
      this.config.panelHeight,
      this.config.roomScale
    )
    const { position, target } = suggestCameraPlacement(panels)
    this.setCamera(position, target)
  }

  reset() {
    this.config = { ...DEFAULT_GENERATION_CONFIG }
  }

  dispose() {
    this.stopReporting()
  }

  private camera(): Camera {
    return Camera.create({
      position: this.config.cameraPosition,
      target: this.config.cameraTarget,
      up: this.config.cameraUp,
      fovDegrees: this.config.fovDegrees,
      near: this.config.near,
      far: this.config.far,
      mode: this.config.projectionMode
    })
  }
}
