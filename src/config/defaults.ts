import { cellCount } from '../dataset/dataset'
import type { VelocityDataset } from '../dataset/types'
import type { ColorMapInput } from '../render/colorMap'

export const DEFAULT_FIGSIZE = [7, 5] as const satisfies readonly [number, number]
export const DEFAULT_DPI = 80
export const DEFAULT_FONT_SIZE = 12
export const DEFAULT_COLOR_MAP = ['RdYlGn', 'gnuplot_r'] as const satisfies readonly [string, string]
export const BASIS_PREFERENCE = ['umap', 'tsne', 'pca'] as const

/** Defaults that depend on the dataset or on house style, injected at the call boundary. */
export type PlotDefaults = {
  basis: (dataset: VelocityDataset, requested?: string) => string | undefined
  size: (dataset: VelocityDataset) => number
  fontSize: number
  figsize: [number, number]
  dpi: number
  colorMap: ColorMapInput
}

export function embeddingKey(basis: string): string {
  return basis.startsWith('X_') ? basis : `X_${basis}`
}

export function defaultBasis(dataset: VelocityDataset, requested?: string): string | undefined {
  if (requested !== undefined) {
    const key = embeddingKey(requested)
    if (key in dataset.obsm) return key
    return requested in dataset.obsm ? requested : undefined
  }
  return BASIS_PREFERENCE.map(embeddingKey).find((key) => key in dataset.obsm)
}

/** Marker diameter in pixels, shrinking with the number of cells. */
export function defaultSize(dataset: VelocityDataset): number {
  const n = Math.max(1, cellCount(dataset))
  const area = 120000 / n / 2
  return Math.min(10, Math.max(1, Math.sqrt(area)))
}

export function createPlotDefaults(overrides?: Partial<PlotDefaults>): PlotDefaults {
  return {
    basis: defaultBasis,
    size: defaultSize,
    fontSize: DEFAULT_FONT_SIZE * 0.8,
    figsize: [DEFAULT_FIGSIZE[0], DEFAULT_FIGSIZE[1]],
    dpi: DEFAULT_DPI,
    colorMap: [DEFAULT_COLOR_MAP[0], DEFAULT_COLOR_MAP[1]],
    ...overrides,
  }
}
