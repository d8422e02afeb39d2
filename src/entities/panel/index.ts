export {
  createPanel,
  withPanelOptions,
  panelEdges,
  isSameEdge,
  sharedEdgeIndices,
  panelCenter,
  panelBounds,
  panelSize,
  isPanelPlanar,
  isPanelConvex,
  isClockwiseFromInside
} from './Panel'
export type { Panel, PanelKind, PanelCorners, PanelEdge, PanelOptions, Bounds3D } from './Panel'
