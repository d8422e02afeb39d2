export {
  buildLayout,
  buildThreePanelLayout,
  buildFourPanelLayout,
  buildFivePanelLayout,
  resolveRoomDimensions,
  assignSharedEdges,
  isLayoutKind,
  LAYOUT_KINDS,
  PANEL_LABELS
} from './layout-builder'
export type { LayoutKind, RoomScale, RoomDimensions, LayoutOptions } from './layout-builder'
export { layoutName, panelCount, describeLayout } from './layout-info'
export { unitScaleBetween, panelPreset, roomPreset, isSizePreset } from './presets'
export type { LengthUnit, SizePreset, PanelDimensions, RoomPresetDimensions } from './presets'
export { layoutBounds, layoutCenter, suggestCameraPlacement } from './bounds'
export type { CameraPlacement } from './bounds'
