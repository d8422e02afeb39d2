// Grid generation service: configuration record in, scene and summary out

import { PerspectiveGridError } from '../errors'
import { gridStats } from '../grid/grid-stats'
import type { GridStats } from '../grid/grid-stats'
import { describeLayout, resolveRoomDimensions } from '../layout'
import { generateSceneGrid } from '../scene'
import type { SceneGrid } from '../scene'
import {
  inspectGenerationConfig,
  invalidConfigError,
  toSceneRequest
} from '../validation/generation-config'
import type { GridGenerationConfig } from '../validation/generation-config'
import { beginGenerationRun, log, logDebug, logOnce, logWarning } from './generation-logger'

export interface GenerationResult {
  scene: SceneGrid
  stats: GridStats
  description: string
  /** Advisory messages from validation, e.g. a density outside the UI range. */
  warnings: string[]
}

/**
 * Generate without writing to the log. Throws PerspectiveGridError for
 * settings the geometry core rejects.
 */
export function runGeneration(config: GridGenerationConfig, warnings: string[] = []): GenerationResult {
  const scene = generateSceneGrid(toSceneRequest(config))
  const dims = resolveRoomDimensions(config.panelWidth, config.panelHeight, config.roomScale)
  return {
    scene,
    stats: gridStats(scene),
    description: describeLayout(config.layoutKind, [...scene.panels.values()], dims),
    warnings
  }
}

/**
 * Write one generation run to the log: validation warnings, a summary line,
 * a debug line per panel and a note for every panel the camera cannot see.
 * Returns the run number.
 */
export function reportGeneration(config: GridGenerationConfig, result: GenerationResult): number {
  const run = beginGenerationRun()
  for (const warning of result.warnings) {
    logOnce(`[Grid] Warning: ${warning}`, 'warning')
  }

  const { scene, stats } = result
  log(`[Grid] ${result.description}: ${scene.panels.size} panels, ${stats.totalLines} lines (${config.projectionMode})`)
  for (const [label, grid] of scene.panels) {
    logDebug(`[Grid]   ${label}: ${grid.lines.length} lines, ${grid.boundary.length}-vertex outline`)
    if (grid.boundary.length === 0) {
      logOnce(`[Grid] ${label} is not visible from the camera`)
    }
  }
  return run
}

export function reportGenerationFailure(error: PerspectiveGridError): number {
  const run = beginGenerationRun()
  logWarning(`[Grid] Generation failed: ${error.message}`)
  return run
}

function generateAndReport(config: GridGenerationConfig, warnings: string[]): GenerationResult {
  let result: GenerationResult
  try {
    result = runGeneration(config, warnings)
  } catch (error) {
    if (error instanceof PerspectiveGridError) {
      reportGenerationFailure(error)
    }
    throw error
  }
  reportGeneration(config, result)
  return result
}

/**
 * Generate from a typed configuration record and log the run.
 */
export function generateGrid(config: GridGenerationConfig): GenerationResult {
  return generateAndReport(config, [])
}

/**
 * Validate untyped input (a parsed JSON document, form values) and generate.
 * Throws InvalidConfig listing every problem when the input is not valid.
 */
export function generateFromConfig(input: unknown): GenerationResult {
  const { config, result } = inspectGenerationConfig(input)
  if (config === null) {
    throw invalidConfigError(result, input)
  }
  return generateAndReport(config, result.warnings.map(w => w.message))
}
