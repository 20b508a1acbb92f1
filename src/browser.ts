import p5 from 'p5'
import { resolveMazeConfig } from './config'
import { createMazeSketch } from './rendering/sketch'

const config = resolveMazeConfig({ stepsPerFrame: 2 })

document.addEventListener('DOMContentLoaded', () => {
  const container = document.getElementById('maze-container') ?? undefined
  const sketch = createMazeSketch(config, (result, grid) => {
    if (result.solved) {
      console.log(`Solved (seed ${grid.seed}): path of ${result.path.length} cells`)
    } else {
      console.warn('No path from entrance to exit')
    }
  })
  new p5(sketch, container)
})
