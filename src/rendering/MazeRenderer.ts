import type p5 from 'p5'
import type { Move } from '../types'
import type { Grid } from '../maze/Grid'
import { cellCenter, cellRect } from './layout'

export type MazeCanvas = Pick<p5, 'stroke' | 'strokeWeight' | 'line'>

export function renderMaze(p: MazeCanvas, grid: Grid): void {
  p.stroke(0)
  p.strokeWeight(2)

  for (let row = 0; row < grid.rows; row++) {
    for (let col = 0; col < grid.cols; col++) {
      const cell = grid.cells[row][col]
      const { x1, y1, x2, y2 } = cellRect(grid.layout, row, col)

      if (cell.walls.top) {
        p.line(x1, y1, x2, y1)
      }
      if (cell.walls.left) {
        p.line(x1, y1, x1, y2)
      }
      // Right wall only on rightmost column
      if (col === grid.cols - 1 && cell.walls.right) {
        p.line(x2, y1, x2, y2)
      }
      // Bottom wall only on bottom row
      if (row === grid.rows - 1 && cell.walls.bottom) {
        p.line(x1, y2, x2, y2)
      }
    }
  }
}

// Forward moves in red, backtracks in gray
export function renderMoves(p: MazeCanvas, grid: Grid, moves: readonly Move[]): void {
  p.strokeWeight(2)
  for (const move of moves) {
    if (move.isBacktrack) {
      p.stroke(150)
    } else {
      p.stroke(220, 0, 0)
    }
    const a = cellCenter(grid.layout, move.from)
    const b = cellCenter(grid.layout, move.to)
    p.line(a.x, a.y, b.x, b.y)
  }
}
