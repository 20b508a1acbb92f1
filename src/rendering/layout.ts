import type { Cell, MazeLayout, Point, Rect } from '../types'
import type { Grid } from '../maze/Grid'

export function cellRect(layout: MazeLayout, row: number, col: number): Rect {
  const x1 = layout.x1 + layout.cellWidth * col
  const y1 = layout.y1 + layout.cellHeight * row
  return { x1, y1, x2: x1 + layout.cellWidth, y2: y1 + layout.cellHeight }
}

export function cellCenter(layout: MazeLayout, cell: Cell): Point {
  const rect = cellRect(layout, cell.row, cell.col)
  return { x: (rect.x1 + rect.x2) / 2, y: (rect.y1 + rect.y2) / 2 }
}

// Grid plus the offset as a margin on every side
export function canvasSize(grid: Grid): { width: number; height: number } {
  const { layout } = grid
  return {
    width: layout.x1 * 2 + layout.cellWidth * grid.cols,
    height: layout.y1 * 2 + layout.cellHeight * grid.rows,
  }
}
