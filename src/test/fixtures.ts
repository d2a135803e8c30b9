import { createDataset } from '../dataset/dataset'
import type { LineRequest, PanelSurface, ScatterRequest } from '../collaborators/types'
import type { VelocityDataset } from '../dataset/types'

export const FIXTURE_GENES = ['Sox9', 'Pdx1', 'Neurog3', 'Ins1']
export const FIXTURE_CELLS = ['c1', 'c2', 'c3', 'c4', 'c5', 'c6']

const grid = (fn: (cell: number, gene: number) => number) =>
  FIXTURE_CELLS.map((_, cell) => FIXTURE_GENES.map((_, gene) => fn(cell, gene)))

/**
 * Six cells in three clusters, four genes, raw and smoothed layers, one
 * steady-state fit (`velocity`) with parameters for every gene.
 */
export function makeFixtureDataset(): VelocityDataset {
  return createDataset({
    obsNames: FIXTURE_CELLS,
    varNames: FIXTURE_GENES,
    X: grid((cell, gene) => cell + gene),
    layers: {
      spliced: grid((cell, gene) => cell + gene),
      unspliced: grid((cell, gene) => cell * 2 + gene),
      Ms: grid((cell, gene) => cell + gene + 0.5),
      Mu: grid((cell, gene) => cell * 2 + gene + 0.5),
      velocity: grid((cell, gene) => (cell % 2 === 0 ? 1 : -1) * (gene + 1)),
    },
    var: {
      velocity_gamma: [0.5, 1, 1.5, 2],
      velocity_offset: [0, 0.1, 0.2, 0.3],
      velocity_beta: [1, 1, 2, 2],
    },
    obs: {
      clusters: { categories: ['Ductal', 'Alpha', 'Beta'], codes: [0, 0, 1, 1, 2, 2] },
    },
    obsm: {
      X_umap: FIXTURE_CELLS.map((_, cell) => [cell, 5 - cell]),
    },
  })
}

export type RecordingSurface = PanelSurface & {
  scatters: ScatterRequest[]
  lines: LineRequest[]
  /** Slot index of every request in call order. */
  order: number[]
}

export function createRecordingSurface(): RecordingSurface {
  const scatters: ScatterRequest[] = []
  const lines: LineRequest[] = []
  const order: number[] = []
  return {
    scatters,
    lines,
    order,
    scatter: (_dataset, request) => {
      scatters.push(request)
      order.push(request.slot.index)
    },
    line: (request) => {
      lines.push(request)
      order.push(request.slot.index)
    },
  }
}
