export { assembleScene, generateSceneGrid, limitLines } from './scene-assembler'
export type { SceneRequest } from './scene-assembler'
export { renderAll } from './renderer'
export type { SceneRenderer } from './renderer'
export type { SceneGrid, PanelGrid, GridOptions } from './types'
