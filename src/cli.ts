import { parseArgs } from 'node:util'
import { outputFile } from 'fs-extra/esm'
import { resolveMazeConfig } from './config'
import { Grid } from './maze/Grid'
import { solve } from './maze/Solver'
import { ValidationError } from './maze/errors'
import { MoveRecorder } from './rendering/Renderer'
import { exportSvg } from './rendering/SvgExporter'

const USAGE = `Usage: maze [--rows N] [--cols N] [--seed N] [--cell-width PX] [--cell-height PX]
            [--offset-x PX] [--offset-y PX] [--out FILE.svg]`

function parseNumber(name: string, value: string | undefined, integer: boolean): number | undefined {
  if (value === undefined) return undefined
  const n = Number(value)
  if (value.trim() === '' || !Number.isFinite(n) || (integer && !Number.isInteger(n))) {
    throw new ValidationError(`--${name} must be ${integer ? 'an integer' : 'a number'}, got "${value}"`)
  }
  return n
}

function parseCliArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        rows: { type: 'string' },
        cols: { type: 'string' },
        seed: { type: 'string' },
        'cell-width': { type: 'string' },
        'cell-height': { type: 'string' },
        'offset-x': { type: 'string' },
        'offset-y': { type: 'string' },
        out: { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
    }).values
  } catch (err) {
    throw new ValidationError(err instanceof Error ? err.message : String(err))
  }
}

/**
 * Generate, solve and optionally export one maze. Resolves to the process
 * exit code: 0 on success, 1 on invalid arguments.
 */
export async function runCli(argv: string[]): Promise<number> {
  let grid: Grid
  let out: string | undefined
  try {
    const values = parseCliArgs(argv)
    if (values.help) {
      console.log(USAGE)
      return 0
    }
    out = values.out
    const config = resolveMazeConfig({
      rows: parseNumber('rows', values.rows, true),
      cols: parseNumber('cols', values.cols, true),
      seed: parseNumber('seed', values.seed, true),
      layout: {
        cellWidth: parseNumber('cell-width', values['cell-width'], false),
        cellHeight: parseNumber('cell-height', values['cell-height'], false),
        x1: parseNumber('offset-x', values['offset-x'], false),
        y1: parseNumber('offset-y', values['offset-y'], false),
      },
    })
    grid = new Grid({ rows: config.rows, cols: config.cols, layout: config.layout, seed: config.seed })
  } catch (err) {
    if (err instanceof ValidationError) {
      console.error(`Error: ${err.message}`)
      console.error(USAGE)
      return 1
    }
    throw err
  }

  grid.generate()
  console.log(`Generated ${grid.rows}x${grid.cols} maze (seed ${grid.seed})`)

  grid.resetSolveState()
  const recorder = new MoveRecorder()
  const result = solve(grid, recorder)
  if (result.solved) {
    const backtracks = recorder.moves.filter((m) => m.isBacktrack).length
    console.log(
      `Solved: path of ${result.path.length} cells, ${recorder.moves.length - backtracks} moves, ${backtracks} backtracks`
    )
  } else {
    console.warn('No path from entrance to exit')
  }

  if (out) {
    await outputFile(out, exportSvg(grid, { path: result.path }))
    console.log(`Wrote ${out}`)
  }
  return 0
}
