import type { Cell, Direction, MazeLayout, RandomSource, Renderer, WallBreak } from '../types'
import { SeededRandom, randomSeed, shuffle } from '../utils/seedRandom'
import { drain } from '../utils/drain'
import { DCOL, DIRECTIONS, DROW, createCell, removeWall } from './Cell'
import { InvalidStateError, ValidationError } from './errors'
import { nullRenderer } from '../rendering/Renderer'

export interface GridOptions {
  rows: number
  cols: number
  layout?: Partial<MazeLayout>
  seed?: number
  // Takes precedence over seed
  random?: RandomSource
}

type GridPhase = 'fresh' | 'generating' | 'generated'

const DEFAULT_LAYOUT: MazeLayout = { x1: 0, y1: 0, cellWidth: 1, cellHeight: 1 }

export class Grid {
  readonly rows: number
  readonly cols: number
  readonly cells: Cell[][]
  readonly layout: MazeLayout
  readonly seed: number | undefined
  private readonly random: RandomSource
  private phase: GridPhase = 'fresh'

  constructor(options: GridOptions) {
    const { rows, cols } = options
    if (!Number.isInteger(rows) || rows <= 0) {
      throw new ValidationError(`rows must be a positive integer, got ${rows}`)
    }
    if (!Number.isInteger(cols) || cols <= 0) {
      throw new ValidationError(`cols must be a positive integer, got ${cols}`)
    }
    if (options.seed !== undefined && !Number.isInteger(options.seed)) {
      throw new ValidationError(`seed must be an integer, got ${options.seed}`)
    }

    const layout: MazeLayout = {
      x1: options.layout?.x1 ?? DEFAULT_LAYOUT.x1,
      y1: options.layout?.y1 ?? DEFAULT_LAYOUT.y1,
      cellWidth: options.layout?.cellWidth ?? DEFAULT_LAYOUT.cellWidth,
      cellHeight: options.layout?.cellHeight ?? DEFAULT_LAYOUT.cellHeight,
    }
    if (!Number.isFinite(layout.cellWidth) || layout.cellWidth <= 0) {
      throw new ValidationError(`cellWidth must be a positive number, got ${layout.cellWidth}`)
    }
    if (!Number.isFinite(layout.cellHeight) || layout.cellHeight <= 0) {
      throw new ValidationError(`cellHeight must be a positive number, got ${layout.cellHeight}`)
    }
    if (!Number.isFinite(layout.x1) || !Number.isFinite(layout.y1)) {
      throw new ValidationError(`offset must be finite, got (${layout.x1}, ${layout.y1})`)
    }

    this.rows = rows
    this.cols = cols
    this.layout = layout

    if (options.random) {
      this.seed = undefined
      this.random = options.random
    } else {
      // The PRNG only sees 32 bits; store the seed it actually uses
      this.seed = (options.seed ?? randomSeed()) >>> 0
      this.random = new SeededRandom(this.seed)
    }

    this.cells = []
    for (let row = 0; row < rows; row++) {
      this.cells[row] = []
      for (let col = 0; col < cols; col++) {
        this.cells[row][col] = createCell(row, col)
      }
    }
  }

  get entrance(): Cell {
    return this.cells[0][0]
  }

  get exit(): Cell {
    return this.cells[this.rows - 1][this.cols - 1]
  }

  get isGenerated(): boolean {
    return this.phase === 'generated'
  }

  cellAt(row: number, col: number): Cell | undefined {
    if (row < 0 || row >= this.rows || col < 0 || col >= this.cols) return undefined
    return this.cells[row][col]
  }

  neighbor(cell: Cell, dir: Direction): Cell | undefined {
    return this.cellAt(cell.row + DROW[dir], cell.col + DCOL[dir])
  }

  /**
   * Build a perfect maze in place, reporting every wall break to the
   * renderer. Throws InvalidStateError if this grid was already generated.
   */
  generate(renderer: Renderer = nullRenderer): void {
    drain(this.generationSteps(), (step) => renderer.onWallBroken(step.from, step.to))
  }

  /**
   * Randomized depth-first backtracking, one wall break per iteration.
   * The phase check runs eagerly so a second call fails before any
   * iteration starts.
   */
  generationSteps(): Generator<WallBreak, void, undefined> {
    if (this.phase !== 'fresh') {
      throw new InvalidStateError('maze has already been generated; construct a new Grid')
    }
    this.phase = 'generating'
    return this.carve()
  }

  private *carve(): Generator<WallBreak, void, undefined> {
    const start = this.entrance
    start.visitedGeneration = true
    const stack: Cell[] = [start]

    while (stack.length > 0) {
      const current = stack[stack.length - 1]

      const candidates: { cell: Cell; dir: Direction }[] = []
      for (const dir of DIRECTIONS) {
        const next = this.neighbor(current, dir)
        if (next && !next.visitedGeneration) {
          candidates.push({ cell: next, dir })
        }
      }

      if (candidates.length === 0) {
        stack.pop()
        continue
      }

      const chosen = shuffle(candidates, this.random)[0]
      removeWall(current, chosen.cell, chosen.dir)
      chosen.cell.visitedGeneration = true
      stack.push(chosen.cell)

      yield { from: current, to: chosen.cell, direction: chosen.dir }
    }

    // Border stays closed apart from the two openings
    this.entrance.walls.top = false
    this.exit.walls.bottom = false

    for (const row of this.cells) {
      for (const cell of row) {
        cell.visitedGeneration = false
      }
    }
    this.phase = 'generated'
  }

  // Walls and generation state are left alone
  resetSolveState(): void {
    for (const row of this.cells) {
      for (const cell of row) {
        cell.visitedSolve = false
      }
    }
  }
}
