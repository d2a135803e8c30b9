import { geneValues, hasGene, hasLayer, hasObsKey } from '../dataset/dataset'
import { PRIMARY_MATRIX } from '../dataset/types'
import { isPrimaryLayer } from '../selection/layerResolver'
import { pickColorMap } from './colorMap'
import type { ColorSource, LegendLoc } from '../collaborators/types'
import type { VelocityDataset } from '../dataset/types'
import type { PhaseLayerPair } from '../selection/layerResolver'
import type { ColorMapSpec } from './colorMap'

export type PanelStyle = {
  /** Per-cell annotation key, layer name, `X` or a gene name. */
  color?: string
  colorMap: ColorMapSpec
  colorbar: boolean
  perc: [number, number]
  alpha: number
  size: number
  fontSize: number
  legendLoc: LegendLoc
  legendFontSize: number
}

/**
 * Annotation keys color by category; layer names (and `X`) color by the
 * gene's values in that layer; a gene name colors by that gene's `X` values.
 * Anything else leaves the points uncolored.
 */
export function resolveColorSource(
  dataset: VelocityDataset,
  color: string | undefined,
  gene: string
): ColorSource {
  if (color === undefined) return { kind: 'none' }
  if (hasObsKey(dataset, color)) return { kind: 'annotation', key: color }
  if (color === PRIMARY_MATRIX || hasLayer(dataset, color)) {
    return { kind: 'values', label: color, values: geneValues(dataset, color, gene) }
  }
  if (hasGene(dataset, color)) {
    return { kind: 'values', label: color, values: geneValues(dataset, PRIMARY_MATRIX, color) }
  }
  return { kind: 'none' }
}

export function isColorKey(dataset: VelocityDataset, color: string): boolean {
  return (
    hasObsKey(dataset, color) ||
    color === PRIMARY_MATRIX ||
    hasLayer(dataset, color) ||
    hasGene(dataset, color)
  )
}

export function phaseColorMap(style: PanelStyle, phase: PhaseLayerPair): string {
  const primary = style.color !== undefined && isPrimaryLayer(style.color, phase)
  return pickColorMap(style.colorMap, primary)
}
