import type { SceneGrid } from '../scene/types'

export interface GridStats {
  totalLines: number
  /** Line count per panel label. */
  panels: Record<string, number>
  /** Boundary lines are counted as boundary, not by axis. */
  lineTypes: {
    horizontal: number
    vertical: number
    boundary: number
  }
}

export function gridStats(scene: SceneGrid): GridStats {
  const stats: GridStats = {
    totalLines: 0,
    panels: {},
    lineTypes: { horizontal: 0, vertical: 0, boundary: 0 }
  }

  for (const [label, grid] of scene.panels) {
    stats.panels[label] = grid.lines.length
    stats.totalLines += grid.lines.length
    for (const line of grid.lines) {
      if (line.boundary) {
        stats.lineTypes.boundary++
      } else {
        stats.lineTypes[line.axis]++
      }
    }
  }

  return stats
}
