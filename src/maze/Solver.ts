import type { Cell, Move, Renderer, SolveOptions, SolveResult } from '../types'
import { DIRECTIONS, isPassage } from './Cell'
import type { Grid } from './Grid'
import { nullRenderer } from '../rendering/Renderer'
import { drain } from '../utils/drain'

interface Frame {
  cell: Cell
  // Index into DIRECTIONS of the next direction to try
  next: number
}

/**
 * Depth-first search from the entrance to the exit. Directions are tried
 * up, down, left, right. Returns solved=false when the exit is unreachable.
 *
 * Solve-visited flags are not cleared first; call grid.resetSolveState()
 * before solving the same grid again.
 */
export function solve(grid: Grid, renderer: Renderer = nullRenderer, options: SolveOptions = {}): SolveResult {
  return drain(solveSteps(grid, options), (move) => renderer.onMove(move.from, move.to, move.isBacktrack))
}

export function* solveSteps(grid: Grid, options: SolveOptions = {}): Generator<Move, SolveResult, undefined> {
  const { signal } = options
  const exit = grid.exit
  const entrance = grid.entrance
  entrance.visitedSolve = true
  const stack: Frame[] = [{ cell: entrance, next: 0 }]

  while (stack.length > 0) {
    if (signal?.aborted) {
      return { solved: false, aborted: true, path: stack.map((f) => f.cell) }
    }

    const frame = stack[stack.length - 1]
    const current = frame.cell
    if (current === exit) {
      return { solved: true, aborted: false, path: stack.map((f) => f.cell) }
    }

    let advanced = false
    while (frame.next < DIRECTIONS.length) {
      const dir = DIRECTIONS[frame.next]
      frame.next++
      const neighbor = grid.neighbor(current, dir)
      if (!neighbor || neighbor.visitedSolve || !isPassage(current, neighbor, dir)) continue

      neighbor.visitedSolve = true
      yield { from: current, to: neighbor, isBacktrack: false }
      stack.push({ cell: neighbor, next: 0 })
      advanced = true
      break
    }
    if (advanced) continue

    // Dead end: undo the move that led here
    stack.pop()
    if (stack.length > 0) {
      yield { from: stack[stack.length - 1].cell, to: current, isBacktrack: true }
    }
  }

  return { solved: false, aborted: false, path: [] }
}
