import type { MazeLayout } from './types'

export interface MazeConfig {
  rows: number
  cols: number
  layout: MazeLayout
  seed?: number
  // Animation only: steps pulled per p5 frame
  stepsPerFrame: number
}

export interface MazeConfigOverrides {
  rows?: number
  cols?: number
  layout?: Partial<MazeLayout>
  seed?: number
  stepsPerFrame?: number
}

export const DEFAULT_MAZE_CONFIG: MazeConfig = {
  rows: 10,
  cols: 14,
  layout: { x1: 50, y1: 50, cellWidth: 50, cellHeight: 50 },
  stepsPerFrame: 1,
}

export function resolveMazeConfig(overrides: MazeConfigOverrides = {}): MazeConfig {
  return {
    rows: overrides.rows ?? DEFAULT_MAZE_CONFIG.rows,
    cols: overrides.cols ?? DEFAULT_MAZE_CONFIG.cols,
    layout: {
      x1: overrides.layout?.x1 ?? DEFAULT_MAZE_CONFIG.layout.x1,
      y1: overrides.layout?.y1 ?? DEFAULT_MAZE_CONFIG.layout.y1,
      cellWidth: overrides.layout?.cellWidth ?? DEFAULT_MAZE_CONFIG.layout.cellWidth,
      cellHeight: overrides.layout?.cellHeight ?? DEFAULT_MAZE_CONFIG.layout.cellHeight,
    },
    seed: overrides.seed ?? DEFAULT_MAZE_CONFIG.seed,
    stepsPerFrame: Math.max(1, overrides.stepsPerFrame ?? DEFAULT_MAZE_CONFIG.stepsPerFrame),
  }
}
