export type Direction = 'top' | 'bottom' | 'left' | 'right'

export interface Walls {
  top: boolean
  bottom: boolean
  left: boolean
  right: boolean
}

export interface Cell {
  readonly row: number
  readonly col: number
  walls: Walls
  visitedGeneration: boolean
  visitedSolve: boolean
}

// Pixel placement of the grid. Only renderers read it.
export interface MazeLayout {
  x1: number
  y1: number
  cellWidth: number
  cellHeight: number
}

export interface RandomSource {
  // Uniform in [0, 1)
  next(): number
}

export interface Renderer {
  onWallBroken(a: Cell, b: Cell): void
  onMove(from: Cell, to: Cell, isBacktrack: boolean): void
}

export interface WallBreak {
  from: Cell
  to: Cell
  direction: Direction
}

export interface Move {
  from: Cell
  to: Cell
  isBacktrack: boolean
}

export interface SolveResult {
  solved: boolean
  aborted: boolean
  path: Cell[]
}

export interface SolveOptions {
  signal?: AbortSignal
}

export interface Point {
  x: number
  y: number
}

export interface Rect {
  x1: number
  y1: number
  x2: number
  y2: number
}
