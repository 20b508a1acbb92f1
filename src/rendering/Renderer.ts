import type { Cell, Move, Renderer, WallBreak } from '../types'
import { DCOL, DIRECTIONS, DROW } from '../maze/Cell'

export const nullRenderer: Renderer = {
  onWallBroken() {},
  onMove() {},
}

/**
 * Keeps every event it observes so a drawing surface can replay them.
 */
export class MoveRecorder implements Renderer {
  readonly wallBreaks: WallBreak[] = []
  readonly moves: Move[] = []

  onWallBroken(a: Cell, b: Cell): void {
    const direction = DIRECTIONS.find(
      (dir) => a.row + DROW[dir] === b.row && a.col + DCOL[dir] === b.col
    )
    if (!direction) {
      throw new Error(`cells (${a.row},${a.col}) and (${b.row},${b.col}) are not adjacent`)
    }
    this.wallBreaks.push({ from: a, to: b, direction })
  }

  onMove(from: Cell, to: Cell, isBacktrack: boolean): void {
    this.moves.push({ from, to, isBacktrack })
  }

  clear(): void {
    this.wallBreaks.length = 0
    this.moves.length = 0
  }
}
