import type p5 from 'p5'
import type { MazeConfig } from '../config'
import type { Move, SolveResult } from '../types'
import { Grid } from '../maze/Grid'
import { solveSteps } from '../maze/Solver'
import { MoveRecorder } from './Renderer'
import { canvasSize } from './layout'
import { renderMaze, renderMoves, type MazeCanvas } from './MazeRenderer'

export type SketchHost = MazeCanvas &
  Pick<p5, 'createCanvas' | 'background' | 'noLoop'> & {
    setup: () => void
    draw: () => void
  }

/**
 * Instance-mode sketch that animates generation, then the solve, pulling
 * `stepsPerFrame` steps from the step iterators on every frame.
 */
export function createMazeSketch(
  config: MazeConfig,
  onSolved?: (result: SolveResult, grid: Grid) => void
): (p: SketchHost) => void {
  return (p: SketchHost) => {
    const grid = new Grid({ rows: config.rows, cols: config.cols, layout: config.layout, seed: config.seed })
    const recorder = new MoveRecorder()
    const generation = grid.generationSteps()
    let solving: Generator<Move, SolveResult, undefined> | null = null
    let finished = false

    // Returns false once there is nothing left to animate
    const advance = (): boolean => {
      if (finished) return false

      if (!solving) {
        const step = generation.next()
        if (!step.done) {
          recorder.onWallBroken(step.value.from, step.value.to)
          return true
        }
        grid.resetSolveState()
        solving = solveSteps(grid)
      }

      const step = solving.next()
      if (step.done) {
        finished = true
        onSolved?.(step.value, grid)
        return false
      }
      recorder.onMove(step.value.from, step.value.to, step.value.isBacktrack)
      return true
    }

    p.setup = () => {
      const { width, height } = canvasSize(grid)
      p.createCanvas(width, height)
    }

    p.draw = () => {
      for (let i = 0; i < config.stepsPerFrame; i++) {
        if (!advance()) {
          p.noLoop()
          break
        }
      }

      p.background(255)
      renderMaze(p, grid)
      renderMoves(p, grid, recorder.moves)
    }
  }
}
