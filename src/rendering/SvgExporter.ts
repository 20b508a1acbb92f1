import type { Cell, Rect } from '../types'
import type { Grid } from '../maze/Grid'

export interface SvgExportOptions {
  // Pen width in millimetres
  strokeWidth?: number
  // Size of the longer side in millimetres
  outputSizeMm?: number
  path?: readonly Cell[]
}

const PRECISION = 4

function fmt(n: number): string {
  return Number(n.toFixed(PRECISION)).toString()
}

// Present walls as maximal horizontal and vertical runs, in cell units
function extractWallRuns(grid: Grid): Rect[] {
  const runs: Rect[] = []

  for (let y = 0; y <= grid.rows; y++) {
    let start = -1
    for (let x = 0; x <= grid.cols; x++) {
      const present =
        x < grid.cols &&
        (y < grid.rows ? grid.cells[y][x].walls.top : grid.cells[grid.rows - 1][x].walls.bottom)
      if (present && start < 0) {
        start = x
      } else if (!present && start >= 0) {
        runs.push({ x1: start, y1: y, x2: x, y2: y })
        start = -1
      }
    }
  }

  for (let x = 0; x <= grid.cols; x++) {
    let start = -1
    for (let y = 0; y <= grid.rows; y++) {
      const present =
        y < grid.rows &&
        (x < grid.cols ? grid.cells[y][x].walls.left : grid.cells[y][grid.cols - 1].walls.right)
      if (present && start < 0) {
        start = y
      } else if (!present && start >= 0) {
        runs.push({ x1: x, y1: start, x2: x, y2: y })
        start = -1
      }
    }
  }

  return runs
}

export function exportSvg(grid: Grid, options: SvgExportOptions = {}): string {
  const strokeWidth = options.strokeWidth ?? 0.5
  const outputSizeMm = options.outputSizeMm ?? 100

  const mmPerCell = outputSizeMm / Math.max(grid.cols, grid.rows)
  const scaledStroke = strokeWidth / mmPerCell

  let svg = `<?xml version="1.0" encoding="UTF-8"?>
<svg xmlns="http://www.w3.org/2000/svg" width="${fmt(grid.cols * mmPerCell)}mm" height="${fmt(grid.rows * mmPerCell)}mm" viewBox="0 0 ${grid.cols} ${grid.rows}">
  <g fill="none" stroke="black" stroke-width="${fmt(scaledStroke)}" stroke-linecap="round">
`
  for (const run of extractWallRuns(grid)) {
    svg += `    <line x1="${fmt(run.x1)}" y1="${fmt(run.y1)}" x2="${fmt(run.x2)}" y2="${fmt(run.y2)}"/>\n`
  }
  svg += '  </g>\n'

  if (options.path && options.path.length > 0) {
    const points = options.path.map((cell) => `${fmt(cell.col + 0.5)},${fmt(cell.row + 0.5)}`).join(' ')
    svg += `  <polyline points="${points}" fill="none" stroke="red" stroke-width="${fmt(scaledStroke)}" stroke-linecap="round" stroke-linejoin="round"/>\n`
  }

  svg += '</svg>\n'
  return svg
}
