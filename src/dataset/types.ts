import type { Matrix } from 'mathjs'

/** Cells × genes. Dense rows, or a mathjs sparse matrix. */
export type LayerMatrix = number[][] | Matrix

export type CategoricalAnnotation = {
  categories: string[]
  /** One category index per cell. */
  codes: number[]
  colors?: string[]
}

export type RankingResult = {
  params: { groupby: string; vkey: string }
  /** Ordered candidate gene names, one list per category of `groupby`. */
  names: string[][]
}

export type DatasetCache = {
  rankVelocityGenes?: RankingResult
}

export type VelocityDataset = {
  obsNames: string[]
  varNames: string[]
  X: LayerMatrix
  layers: Record<string, LayerMatrix>
  /** Per-gene scalars such as `velocity_gamma`, one entry per gene. */
  var: Record<string, number[]>
  obs: Record<string, CategoricalAnnotation>
  /** Per-cell embeddings keyed like `X_umap`, cells × 2. */
  obsm: Record<string, number[][]>
  /** Cell neighbor weights, cells × cells. */
  connectivities?: LayerMatrix
  uns: DatasetCache
}

export const PRIMARY_MATRIX = 'X'
