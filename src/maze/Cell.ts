import type { Cell, Direction } from '../types'

// Fixed order: up, down, left, right. Solver output depends on it.
export const DIRECTIONS: readonly Direction[] = ['top', 'bottom', 'left', 'right']

export const DROW: Record<Direction, number> = { top: -1, bottom: 1, left: 0, right: 0 }
export const DCOL: Record<Direction, number> = { top: 0, bottom: 0, left: -1, right: 1 }

export const OPPOSITE: Record<Direction, Direction> = {
  top: 'bottom',
  bottom: 'top',
  left: 'right',
  right: 'left',
}

export function createCell(row: number, col: number): Cell {
  return {
    row,
    col,
    walls: { top: true, bottom: true, left: true, right: true },
    visitedGeneration: false,
    visitedSolve: false,
  }
}

// Walls are mutual: clear the flag on both sides
export function removeWall(cell: Cell, neighbor: Cell, dir: Direction): void {
  cell.walls[dir] = false
  neighbor.walls[OPPOSITE[dir]] = false
}

export function isPassage(cell: Cell, neighbor: Cell, dir: Direction): boolean {
  return !cell.walls[dir] && !neighbor.walls[OPPOSITE[dir]]
}
