import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest'
import os from 'node:os'
import path from 'node:path'
import { mkdtemp, readFile } from 'node:fs/promises'
import { remove } from 'fs-extra/esm'
import { runCli } from './cli'
import { DEFAULT_MAZE_CONFIG, resolveMazeConfig } from './config'

describe('resolveMazeConfig', () => {
  it('falls back to the defaults', () => {
    expect(resolveMazeConfig()).toEqual({ ...DEFAULT_MAZE_CONFIG, seed: undefined })
  })

  it('merges partial overrides', () => {
    const config = resolveMazeConfig({ rows: 3, layout: { cellWidth: 20 }, seed: 9 })
    expect(config.rows).toBe(3)
    expect(config.cols).toBe(14)
    expect(config.seed).toBe(9)
    expect(config.layout).toEqual({ x1: 50, y1: 50, cellWidth: 20, cellHeight: 50 })
  })

  it('animates at least one step per frame', () => {
    expect(resolveMazeConfig({ stepsPerFrame: 0 }).stepsPerFrame).toBe(1)
  })
})

describe('runCli', () => {
  let log: MockInstance<typeof console.log>
  let error: MockInstance<typeof console.error>

  beforeEach(() => {
    log = vi.spyOn(console, 'log').mockImplementation(() => {})
    error = vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('generates and solves a maze', async () => {
    await expect(runCli(['--rows', '3', '--cols', '4', '--seed', '7'])).resolves.toBe(0)
    expect(log).toHaveBeenNthCalledWith(1, 'Generated 3x4 maze (seed 7)')
    expect(String(log.mock.calls[1][0])).toMatch(/^Solved: path of \d+ cells, \d+ moves, \d+ backtracks$/)
    expect(error).not.toHaveBeenCalled()
  })

  it('exits with 1 on invalid dimensions', async () => {
    await expect(runCli(['--rows', '0'])).resolves.toBe(1)
    expect(error).toHaveBeenNthCalledWith(1, 'Error: rows must be a positive integer, got 0')
    expect(log).not.toHaveBeenCalled()
  })

  it('exits with 1 on a non-numeric option', async () => {
    await expect(runCli(['--cols', 'wide'])).resolves.toBe(1)
    expect(error).toHaveBeenNthCalledWith(1, 'Error: --cols must be an integer, got "wide"')
  })

  it('exits with 1 on a non-positive cell size', async () => {
    await expect(runCli(['--cell-width', '0'])).resolves.toBe(1)
    expect(error).toHaveBeenNthCalledWith(1, 'Error: cellWidth must be a positive number, got 0')
    expect(log).not.toHaveBeenCalled()
  })

  it('exits with 1 on an unknown option', async () => {
    await expect(runCli(['--depth', '3'])).resolves.toBe(1)
    expect(error).toHaveBeenCalled()
  })

  it('prints usage for --help', async () => {
    await expect(runCli(['--help'])).resolves.toBe(0)
    expect(String(log.mock.calls[0][0])).toMatch(/^Usage: maze/)
  })

  it('writes the maze as SVG', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'maze-'))
    const out = path.join(dir, 'nested', 'maze.svg')
    try {
      await expect(runCli(['--rows', '1', '--cols', '4', '--seed', '2', '--out', out])).resolves.toBe(0)
      const svg = await readFile(out, 'utf8')
      expect(svg).toContain('viewBox="0 0 4 1"')
      expect(svg).toContain('<polyline points="0.5,0.5 1.5,0.5 2.5,0.5 3.5,0.5"')
      expect(log).toHaveBeenLastCalledWith(`Wrote ${out}`)
    } finally {
      await remove(dir)
    }
  })
})
