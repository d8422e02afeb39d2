/**
 * The explicit configuration record one generation call consumes, plus its
 * validation from untyped input (a parsed JSON file, a form).
 */

import { PerspectiveGridError } from '../errors'
import type { ProjectionMode } from '../entities/camera'
import { LAYOUT_KINDS } from '../layout'
import type { LayoutKind, RoomScale } from '../layout'
import type { SceneRequest } from '../scene'
import * as vec3 from '../utils/vec3'
import type { Vector3 } from '../utils/vec3'
import { FieldReader, ValidationErrorCodes, ValidationHelpers } from './validator'
import type { ValidationError, ValidationResult } from './validator'

export interface GridGenerationConfig {
  layoutKind: LayoutKind
  panelWidth: number
  panelHeight: number
  roomScale?: RoomScale
  /** Per-panel grid density keyed by panel label. */
  densityOverrides?: Record<string, number>
  cameraPosition: Vector3
  cameraTarget: Vector3
  cameraUp?: Vector3
  fovDegrees: number
  projectionMode: ProjectionMode
  near: number
  far: number
  gridDensity: number
  canvasWidth: number
  canvasHeight: number
  minLineLength?: number
  maxLinesPerPanel?: number
  includeBoundaries?: boolean
}

const PROJECTION_MODES: readonly ProjectionMode[] = ['perspective', 'orthographic']

/** Density range the UI offers; values outside it are valid but unusual. */
export const RECOMMENDED_DENSITY_RANGE = { min: 0.1, max: 2.0 } as const

/** Canvases wider (or taller) than this ratio draw a warning. */
export const MAX_RECOMMENDED_ASPECT_RATIO = 4

/**
 * Starting point for front-ends: a 6 x 6 corner room seen from slightly
 * above.
 */
export const DEFAULT_GENERATION_CONFIG: Readonly<GridGenerationConfig> = Object.freeze<GridGenerationConfig>({
  layoutKind: 'three-panel',
  panelWidth: 6,
  panelHeight: 6,
  cameraPosition: [0, 4, 8],
  cameraTarget: [0, 0, 0],
  fovDegrees: 50,
  projectionMode: 'perspective',
  near: 0.1,
  far: 100,
  gridDensity: 0.5,
  canvasWidth: 1920,
  canvasHeight: 1080
})

/** The typed record, when the input is valid, with its validation result. */
export interface ConfigInspection {
  config: GridGenerationConfig | null
  result: ValidationResult
}

/**
 * Validate and read untyped input in one pass.
 */
export function inspectGenerationConfig(input: unknown): ConfigInspection {
  if (!ValidationHelpers.isRecord(input)) {
    const error = ValidationHelpers.createError(
      ValidationErrorCodes.INVALID_INPUT,
      'Configuration must be an object'
    )
    return { config: null, result: ValidationHelpers.createResult([error], []) }
  }

  const reader = new FieldReader(input)
  const positive = (v: number) => v > 0

  const layoutKind = reader.oneOf('layoutKind', LAYOUT_KINDS, ValidationErrorCodes.UNKNOWN_LAYOUT_KIND)
  const panelWidth = reader.number('panelWidth')
  const panelHeight = reader.number('panelHeight')
  reader.check(panelWidth, positive, 'panelWidth', 'must be positive')
  reader.check(panelHeight, positive, 'panelHeight', 'must be positive')

  const roomScale = readRoomScale(reader)
  const densityOverrides = readDensityOverrides(reader)

  const cameraPosition = reader.vector('cameraPosition')
  const cameraTarget = reader.vector('cameraTarget')
  const cameraUp = reader.optionalVector('cameraUp')
  if (vec3.isFiniteVector(cameraPosition) && vec3.isFiniteVector(cameraTarget) &&
      vec3.distance(cameraPosition, cameraTarget) < vec3.EPSILON) {
    reader.reject('cameraTarget', 'must differ from cameraPosition')
  }

  const fovDegrees = reader.number('fovDegrees')
  reader.check(fovDegrees, v => v > 0 && v < 180, 'fovDegrees', 'must lie strictly between 0 and 180')
  const projectionMode = reader.oneOf('projectionMode', PROJECTION_MODES, ValidationErrorCodes.UNKNOWN_PROJECTION_MODE)
  const near = reader.number('near')
  const far = reader.number('far')
  reader.check(near, positive, 'near', 'must be positive')
  if (!Number.isNaN(near)) {
    reader.check(far, v => v > near, 'far', 'must be greater than near')
  }

  const gridDensity = reader.number('gridDensity')
  reader.check(gridDensity, positive, 'gridDensity', 'must be positive')
  const canvasWidth = reader.number('canvasWidth')
  const canvasHeight = reader.number('canvasHeight')
  reader.check(canvasWidth, positive, 'canvasWidth', 'must be positive')
  reader.check(canvasHeight, positive, 'canvasHeight', 'must be positive')

  const minLineLength = reader.optionalNumber('minLineLength')
  if (minLineLength !== undefined) {
    reader.check(minLineLength, v => v >= 0, 'minLineLength', 'must not be negative')
  }
  const maxLinesPerPanel = reader.optionalNumber('maxLinesPerPanel')
  if (maxLinesPerPanel !== undefined) {
    reader.check(maxLinesPerPanel, v => Number.isInteger(v) && v >= 0, 'maxLinesPerPanel', 'must be a non-negative integer')
  }
  const includeBoundaries = reader.optionalBoolean('includeBoundaries')

  const warnings = collectWarnings(gridDensity, canvasWidth, canvasHeight)

  if (reader.errors.length > 0 || layoutKind === null || projectionMode === null) {
    return { config: null, result: ValidationHelpers.createResult(reader.errors, warnings) }
  }

  const config: GridGenerationConfig = {
    layoutKind,
    panelWidth,
    panelHeight,
    cameraPosition,
    cameraTarget,
    fovDegrees,
    projectionMode,
    near,
    far,
    gridDensity,
    canvasWidth,
    canvasHeight,
    ...(roomScale !== undefined ? { roomScale } : {}),
    ...(densityOverrides !== undefined ? { densityOverrides } : {}),
    ...(cameraUp !== undefined ? { cameraUp } : {}),
    ...(minLineLength !== undefined ? { minLineLength } : {}),
    ...(maxLinesPerPanel !== undefined ? { maxLinesPerPanel } : {}),
    ...(includeBoundaries !== undefined ? { includeBoundaries } : {})
  }
  return { config, result: ValidationHelpers.createResult([], warnings) }
}

function readRoomScale(reader: FieldReader): RoomScale | undefined {
  const record = reader.optionalRecord('roomScale')
  if (record === undefined) {
    return undefined
  }
  const nested = reader.nested('roomScale', record)
  const depth = nested.optionalNumber('depth')
  const unitScale = nested.optionalNumber('unitScale')
  if (depth !== undefined) {
    nested.check(depth, v => v > 0, 'depth', 'must be positive')
  }
  if (unitScale !== undefined) {
    nested.check(unitScale, v => v > 0, 'unitScale', 'must be positive')
  }
  reader.errors.push(...nested.errors)
  return {
    ...(depth !== undefined ? { depth } : {}),
    ...(unitScale !== undefined ? { unitScale } : {})
  }
}

function readDensityOverrides(reader: FieldReader): Record<string, number> | undefined {
  const record = reader.optionalRecord('densityOverrides')
  if (record === undefined) {
    return undefined
  }
  const nested = reader.nested('densityOverrides', record)
  const overrides: Record<string, number> = {}
  for (const label of Object.keys(record)) {
    const density = nested.number(label)
    nested.check(density, v => v > 0, label, 'must be positive')
    overrides[label] = density
  }
  reader.errors.push(...nested.errors)
  return overrides
}

function collectWarnings(gridDensity: number, canvasWidth: number, canvasHeight: number): ValidationError[] {
  const warnings: ValidationError[] = []

  if (gridDensity > 0 &&
      (gridDensity < RECOMMENDED_DENSITY_RANGE.min || gridDensity > RECOMMENDED_DENSITY_RANGE.max)) {
    warnings.push(ValidationHelpers.createWarning(
      ValidationErrorCodes.DENSITY_OUTSIDE_RECOMMENDED_RANGE,
      `Grid density ${gridDensity} is outside the recommended range ` +
        `${RECOMMENDED_DENSITY_RANGE.min}-${RECOMMENDED_DENSITY_RANGE.max}`,
      'gridDensity'
    ))
  }

  if (canvasWidth > 0 && canvasHeight > 0) {
    const aspect = canvasWidth / canvasHeight
    if (aspect > MAX_RECOMMENDED_ASPECT_RATIO || aspect < 1 / MAX_RECOMMENDED_ASPECT_RATIO) {
      warnings.push(ValidationHelpers.createWarning(
        ValidationErrorCodes.EXTREME_ASPECT_RATIO,
        `Canvas aspect ratio ${aspect.toFixed(2)} is extreme`,
        'canvasWidth'
      ))
    }
  }

  return warnings
}

export function validateGenerationConfig(input: unknown): ValidationResult {
  return inspectGenerationConfig(input).result
}

/**
 * The InvalidConfig error for a failed validation: every error in the
 * message, the first error's field as the parameter.
 */
export function invalidConfigError(result: ValidationResult, input: unknown): PerspectiveGridError {
  const messages = result.errors.map(e => `[${e.code}] ${e.message}`).join('; ')
  return new PerspectiveGridError('InvalidConfig', messages, result.errors[0]?.field, input)
}

/**
 * Validate untyped input and return the typed record.
 * Throws InvalidConfig listing every error when the input is not valid.
 */
export function parseGenerationConfig(input: unknown): GridGenerationConfig {
  const { config, result } = inspectGenerationConfig(input)
  if (config === null) {
    throw invalidConfigError(result, input)
  }
  return config
}

export function toSceneRequest(config: GridGenerationConfig): SceneRequest {
  return {
    layoutKind: config.layoutKind,
    panelWidth: config.panelWidth,
    panelHeight: config.panelHeight,
    roomScale: config.roomScale,
    layoutOptions: { densityOverrides: config.densityOverrides },
    cameraPosition: config.cameraPosition,
    cameraTarget: config.cameraTarget,
    cameraUp: config.cameraUp,
    fovDegrees: config.fovDegrees,
    projectionMode: config.projectionMode,
    near: config.near,
    far: config.far,
    gridDensity: config.gridDensity,
    canvasWidth: config.canvasWidth,
    canvasHeight: config.canvasHeight,
    gridOptions: {
      minLineLength: config.minLineLength,
      maxLinesPerPanel: config.maxLinesPerPanel,
      includeBoundaries: config.includeBoundaries
    }
  }
}
