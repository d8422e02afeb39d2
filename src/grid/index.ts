export {
  samplePanel,
  gridSpacing,
  interiorLineCount,
  expectedLineCount,
  validateDensity,
  BASE_GRID_SPACING
} from './grid-sampling'
export type { GridAxis, GridLine3D, SampleOptions } from './grid-sampling'
export {
  projectPanelGrid,
  projectPanelLines,
  projectLinesInOutline,
  projectPanelOutline,
  projectLine,
  lineBounds,
  canvasBounds
} from './grid-projection'
export type { GridLine2D, ProjectOptions, ProjectedPanel } from './grid-projection'
export { gridStats } from './grid-stats'
export type { GridStats } from './grid-stats'
