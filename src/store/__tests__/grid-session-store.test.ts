import { describe, it, expect, beforeEach, afterEach } from '@jest/globals'
import { reaction } from 'mobx'
import { GridSessionStore } from '../grid-session-store'
import { DEFAULT_GENERATION_CONFIG } from '../../validation/generation-config'
import { clearGenerationLogs, generationLogs, logMessages } from '../../services/generation-logger'
import * as vec3 from '../../utils/vec3'
import { buildLayout } from '../../layout'
import { captureGridError } from '../../tests/testUtils'

describe('GridSessionStore', () => {
  let store: GridSessionStore

  beforeEach(() => {
    clearGenerationLogs()
    store = new GridSessionStore()
  })

  afterEach(() => {
    store.dispose()
  })

  it('derives the scene from the default configuration', () => {
    expect(store.totalLines).toBe(9)
    expect([...(store.scene?.panels.keys() ?? [])]).toEqual(['Floor', 'Wall-Left', 'Wall-Right'])
    expect(store.errorMessage).toBeNull()
  })

  it('regenerates when the configuration changes', () => {
    const seen: number[] = []
    const dispose = reaction(() => store.totalLines, total => seen.push(total))

    store.setDensity(1)
    dispose()

    expect(seen).toHaveLength(1)
    expect(seen[0]).toBeGreaterThan(9)
  })

  it('logs every regeneration as its own run', () => {
    expect(logMessages(1)[0]).toBe(
      '[Grid] 3-Panel Corner Room: Floor, Wall-Left, Wall-Right (6 × 6): 3 panels, 9 lines (perspective)'
    )

    store.setCanvasSize(1280, 720)
    expect(logMessages(2)).toContain('[Grid] Wall-Left is not visible from the camera')
    expect(logMessages().filter(m => m === '[Grid] Wall-Left is not visible from the camera')).toHaveLength(2)
  })

  it('reading derived values does not write to the log', () => {
    const before = generationLogs.length
    void store.scene
    void store.totalLines
    void store.errorMessage
    expect(generationLogs).toHaveLength(before)
  })

  it('stops logging once disposed', () => {
    store.dispose()
    const before = generationLogs.length
    store.setDensity(1)
    expect(store.totalLines).toBeGreaterThan(9)
    expect(generationLogs).toHaveLength(before)
  })

  it('reports invalid settings as an error outcome', () => {
    store.setCamera([1, 1, 1], [1, 1, 1])

    expect(store.outcome.status).toBe('error')
    expect(store.scene).toBeNull()
    expect(store.totalLines).toBe(0)
    expect(store.errorMessage).toMatch(/^InvalidCameraConfig/)
    expect(generationLogs[generationLogs.length - 1]).toEqual({
      run: 2,
      level: 'warning',
      message: `[Grid] Generation failed: ${store.errorMessage ?? ''}`
    })
  })

  it('orbits the camera about its target', () => {
    store.orbit(90, 0)

    const [x, y, z] = store.config.cameraPosition
    expect(x).toBeCloseTo(-8, 9)
    expect(y).toBeCloseTo(4, 9)
    expect(z).toBeCloseTo(0, 9)
    expect(store.config.cameraTarget).toEqual([0, 0, 0])
  })

  it('refuses to orbit an invalid camera', () => {
    store.update({ fovDegrees: 0 })
    expect(captureGridError(() => store.orbit(10, 0)).kind).toBe('InvalidCameraConfig')
  })

  it('applies size presets and the suggested camera placement', () => {
    store.applySizePreset('large')
    expect(store.config.panelWidth).toBe(8)
    expect(store.config.panelHeight).toBe(8)

    store.placeCameraAutomatically()
    const position = store.config.cameraPosition
    for (const panel of buildLayout('three-panel', 8, 8)) {
      expect(vec3.dot(vec3.subtract(position, panel.corners[0]), panel.normal)).toBeGreaterThan(0)
    }
    expect(store.config.cameraTarget.map(v => Math.round(v * 100) / 100)).toEqual([1.6, 2.4, 1.6])
    expect(store.outcome.status).toBe('ok')
  })

  it('switches layout and projection mode', () => {
    store.setLayoutKind('four-panel')
    store.setProjectionMode('orthographic')
    store.setCanvasSize(800, 600)

    expect([...(store.scene?.panels.keys() ?? [])]).toEqual(['Floor', 'Wall-Left', 'Wall-Right', 'Ceiling'])
    expect(store.scene?.canvasBounds).toEqual({ minX: 0, minY: 0, maxX: 800, maxY: 600 })
  })

  it('resets to the default configuration', () => {
    store.setDensity(2)
    store.reset()
    expect(store.config).toEqual(DEFAULT_GENERATION_CONFIG)
  })
})
