import { describe, it, expect } from '@jest/globals'
import { LAYOUT_KINDS, buildLayout } from '../layout-builder'
import * as vec3 from '../../utils/vec3'
import { describeLayout, layoutName, panelCount } from '../layout-info'
import { panelPreset, roomPreset, unitScaleBetween } from '../presets'
import { layoutBounds, layoutCenter, suggestCameraPlacement } from '../bounds'

describe('layout info', () => {
  it('names each layout kind', () => {
    expect(layoutName('three-panel')).toBe('3-Panel Corner Room')
    expect(layoutName('four-panel')).toBe('4-Panel Room with Ceiling')
    expect(layoutName('five-panel')).toBe('5-Panel Enclosed Room')
  })

  it('counts panels to match the builder', () => {
    for (const kind of ['three-panel', 'four-panel', 'five-panel'] as const) {
      expect(buildLayout(kind, 6, 6)).toHaveLength(panelCount(kind))
    }
  })

  it('describes a layout in one line', () => {
    const panels = buildLayout('three-panel', 6, 6)
    expect(describeLayout('three-panel', panels, { width: 6, height: 6 }))
      .toBe('3-Panel Corner Room: Floor, Wall-Left, Wall-Right (6 × 6)')
  })
})

describe('layout bounds', () => {
  it('boxes every panel corner', () => {
    const panels = buildLayout('three-panel', 6, 6)
    expect(layoutBounds(panels)).toEqual({ min: [0, 0, 0], max: [6, 6, 6] })
    expect(layoutCenter(panels)).toEqual([3, 3, 3])
  })

  it('follows the room depth and height', () => {
    const panels = buildLayout('five-panel', 8, 5, { depth: 12 })
    expect(layoutBounds(panels)).toEqual({ min: [0, 0, 0], max: [8, 5, 12] })
  })

  it('gives a zero box for no panels', () => {
    expect(layoutBounds([])).toEqual({ min: [0, 0, 0], max: [0, 0, 0] })
  })

  it('suggests a camera placement in front of every panel', () => {
    for (const kind of LAYOUT_KINDS) {
      const panels = buildLayout(kind, 6, 6, { depth: 9 })
      const { position } = suggestCameraPlacement(panels)
      for (const panel of panels) {
        const side = vec3.dot(vec3.subtract(position, panel.corners[0]), panel.normal)
        expect(side).toBeGreaterThan(0)
      }
    }
  })

  it('aims the suggested camera at the corner where the walls meet', () => {
    const placement = suggestCameraPlacement(buildLayout('three-panel', 6, 6))
    expect(placement.position[0]).toBeCloseTo(9, 12)
    expect(placement.position[1]).toBeCloseTo(2.4, 12)
    expect(placement.position[2]).toBeCloseTo(4.8, 12)
    expect(placement.target[0]).toBeCloseTo(1.2, 12)
    expect(placement.target[1]).toBeCloseTo(1.8, 12)
    expect(placement.target[2]).toBeCloseTo(1.2, 12)
  })
})

describe('presets', () => {
  it('converts between length units', () => {
    expect(unitScaleBetween('feet', 'inches')).toBe(12)
    expect(unitScaleBetween('inches', 'feet')).toBeCloseTo(1 / 12, 12)
    expect(unitScaleBetween('meters', 'meters')).toBe(1)
  })

  it('looks up panel presets by name', () => {
    expect(panelPreset('small')).toEqual({ width: 4, height: 4, units: 'inches' })
    expect(panelPreset('large')).toEqual({ width: 8, height: 8, units: 'inches' })
    expect(panelPreset()).toEqual({ width: 6, height: 6, units: 'inches' })
  })

  it('looks up room presets by name', () => {
    expect(roomPreset('small')).toEqual({ width: 8, height: 6, depth: 8, units: 'feet' })
    expect(roomPreset('large')).toEqual({ width: 16, height: 10, depth: 16, units: 'feet' })
  })

  it('falls back to the standard preset for unknown names', () => {
    expect(panelPreset('huge')).toEqual(panelPreset('standard'))
    expect(roomPreset('huge')).toEqual({ width: 12, height: 8, depth: 12, units: 'feet' })
  })

  it('returns copies that callers may change', () => {
    const preset = panelPreset('standard')
    preset.width = 100
    expect(panelPreset('standard').width).toBe(6)
  })
})
