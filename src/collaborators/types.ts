import type { LayerMatrix, RankingResult, VelocityDataset } from '../dataset/types'
import type { LayoutPlan, PanelSlot } from '../layout/layoutPlanner'

/** Per-group ordered candidate genes for `groupby`, ranked on `vkey`. */
export type RankGenes = (dataset: VelocityDataset, vkey: string, groupby: string) => RankingResult

/** Single-gene slice handed to the moment estimator. */
export type GeneSlice = {
  gene: string
  spliced: number[]
  unspliced: number[]
  connectivities?: LayerMatrix
}

export type SecondOrderMoments = (slice: GeneSlice) => { ss: number[]; us: number[] }

export type ScatterSource =
  /** Phase portrait of one gene; the surface overlays a line per fit. */
  | { kind: 'phase'; gene: string; x: number[]; y: number[]; fits: string[] }
  | { kind: 'embedding'; basis: string }
  | { kind: 'coordinates'; x: number[]; y: number[] }

export type ColorSource =
  | { kind: 'none' }
  | { kind: 'annotation'; key: string }
  | { kind: 'values'; label: string; values: number[] }

export type LegendLoc = 'none' | 'right margin' | 'on data' | 'upper right' | 'upper left' | 'lower right' | 'lower left' | 'best'

export type ScatterRequest = {
  slot: PanelSlot
  source: ScatterSource
  color: ColorSource
  colorMap: string
  perc: [number, number]
  title: string
  xlabel?: string
  ylabel?: string
  fontSize: number
  size: number
  alpha: number
  frameOn: boolean
  colorbar: boolean
  legendLoc: LegendLoc
  legendFontSize: number
}

export type LineRequest = {
  slot: PanelSlot
  x: number[]
  y: number[]
  dash: 'dash' | 'solid'
  color: string
}

/** The shared, positionally addressed drawing target for one invocation. */
export interface PanelSurface {
  scatter: (dataset: VelocityDataset, request: ScatterRequest) => void
  line: (request: LineRequest) => void
}

export type SurfaceFactory<S extends PanelSurface> = (plan: LayoutPlan) => S
