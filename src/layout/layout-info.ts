import type { Panel } from '../entities/panel'
import type { LayoutKind } from './layout-builder'

const LAYOUT_NAMES: Record<LayoutKind, string> = {
  'three-panel': '3-Panel Corner Room',
  'four-panel': '4-Panel Room with Ceiling',
  'five-panel': '5-Panel Enclosed Room'
}

const PANEL_COUNTS: Record<LayoutKind, number> = {
  'three-panel': 3,
  'four-panel': 4,
  'five-panel': 5
}

export function layoutName(kind: LayoutKind): string {
  return LAYOUT_NAMES[kind]
}

export function panelCount(kind: LayoutKind): number {
  return PANEL_COUNTS[kind]
}

/**
 * One-line summary, e.g. "3-Panel Corner Room: Floor, Wall-Left, Wall-Right (6 × 6)"
 */
export function describeLayout(
  kind: LayoutKind,
  panels: readonly Pick<Panel, 'label'>[],
  dims: { width: number; height: number }
): string {
  const labels = panels.map(p => p.label).join(', ')
  return `${layoutName(kind)}: ${labels} (${dims.width} × ${dims.height})`
}
