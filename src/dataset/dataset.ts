import { denseColumn } from './matrix'
import { PRIMARY_MATRIX } from './types'
import type { CategoricalAnnotation, LayerMatrix, VelocityDataset } from './types'

export type DatasetInit = {
  obsNames: string[]
  varNames: string[]
  X?: LayerMatrix
  layers?: Record<string, LayerMatrix>
  var?: Record<string, number[]>
  obs?: Record<string, CategoricalAnnotation>
  obsm?: Record<string, number[][]>
  connectivities?: LayerMatrix
}

export function createDataset(init: DatasetInit): VelocityDataset {
  const X = init.X ?? init.obsNames.map(() => init.varNames.map(() => 0))
  return {
    obsNames: [...init.obsNames],
    varNames: [...init.varNames],
    X,
    layers: { ...(init.layers ?? {}) },
    var: { ...(init.var ?? {}) },
    obs: { ...(init.obs ?? {}) },
    obsm: { ...(init.obsm ?? {}) },
    connectivities: init.connectivities,
    uns: {},
  }
}

export function hasGene(dataset: VelocityDataset, gene: string): boolean {
  return dataset.varNames.includes(gene)
}

export function hasLayer(dataset: VelocityDataset, layer: string): boolean {
  return Object.prototype.hasOwnProperty.call(dataset.layers, layer)
}

export function layerNames(dataset: VelocityDataset): string[] {
  return Object.keys(dataset.layers)
}

export function hasVarKey(dataset: VelocityDataset, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(dataset.var, key)
}

export function hasObsKey(dataset: VelocityDataset, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(dataset.obs, key)
}

function geneIndex(dataset: VelocityDataset, gene: string): number {
  const idx = dataset.varNames.indexOf(gene)
  if (idx < 0) {
    throw new Error(`Gene "${gene}" is not in the dataset.`)
  }
  return idx
}

function layerMatrix(dataset: VelocityDataset, layer: string): LayerMatrix {
  if (layer === PRIMARY_MATRIX) return dataset.X
  const matrix = dataset.layers[layer]
  if (!matrix) {
    throw new Error(`Layer "${layer}" is not in the dataset.`)
  }
  return matrix
}

/** One value per cell for `gene` in `layer` (`X` reads the primary matrix). */
export function geneValues(dataset: VelocityDataset, layer: string, gene: string): number[] {
  return denseColumn(layerMatrix(dataset, layer), geneIndex(dataset, gene))
}

/** Per-gene scalar annotation, or undefined when absent or not finite. */
export function varValue(
  dataset: VelocityDataset,
  key: string,
  gene: string
): number | undefined {
  if (!hasVarKey(dataset, key)) return undefined
  const value = dataset.var[key][geneIndex(dataset, gene)]
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined
}

export function cellCount(dataset: VelocityDataset): number {
  return dataset.obsNames.length
}
