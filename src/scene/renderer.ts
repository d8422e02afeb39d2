import type { SceneGrid } from './types'

/**
 * Output format capability. Each format implements this on its own; the grid
 * engine only produces SceneGrid values and never depends on a renderer.
 */
export interface SceneRenderer<TOptions, TArtifact> {
  readonly format: string
  render(scene: SceneGrid, options: TOptions): TArtifact
}

/**
 * Render with every renderer in turn, keyed by format. A format name used
 * twice keeps the last artifact.
 */
export function renderAll<TOptions, TArtifact>(
  scene: SceneGrid,
  renderers: readonly SceneRenderer<TOptions, TArtifact>[],
  options: TOptions
): Map<string, TArtifact> {
  const artifacts = new Map<string, TArtifact>()
  for (const renderer of renderers) {
    artifacts.set(renderer.format, renderer.render(scene, options))
  }
  return artifacts
}
