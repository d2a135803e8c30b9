import { geneValues } from '../dataset/dataset'
import { geneSlots, slotAt } from '../layout/layoutPlanner'
import { isPrimaryLayer } from '../selection/layerResolver'
import { pickColorMap } from './colorMap'
import { phaseColorMap, resolveColorSource } from './panelStyle'
import { renderStochasticPanel } from './stochasticOverlay'
import type { PanelSurface, SecondOrderMoments } from '../collaborators/types'
import type { VelocityDataset } from '../dataset/types'
import type { LayoutPlan } from '../layout/layoutPlanner'
import type { ResolvedLayers } from '../selection/layerResolver'
import type { PanelStyle } from './panelStyle'

export const PHASE_X_LABEL = 'spliced'
export const PHASE_Y_LABEL = 'unspliced'
export const EXPRESSION_TITLE = 'expression'

export type PanelRenderInput = {
  dataset: VelocityDataset
  plan: LayoutPlan
  layers: ResolvedLayers
  /** Embedding key for layer panels; required when there are any. */
  basis?: string
  stochastic: boolean
  style: PanelStyle
  surface: PanelSurface
  moments: SecondOrderMoments
}

export type RenderSummary = {
  panelsDrawn: number
  stochasticLines: number
}

export function layerPanelTitle(layer: string, layers: ResolvedLayers): string {
  return isPrimaryLayer(layer, layers.phase) ? EXPRESSION_TITLE : layer
}

function renderGene(input: PanelRenderInput, geneIndex: number): RenderSummary {
  const { dataset, plan, layers, style, surface } = input
  const gene = plan.genes[geneIndex]
  const s = geneValues(dataset, layers.phase.spliced, gene)
  const u = geneValues(dataset, layers.phase.unspliced, gene)
  const isLast = geneIndex === plan.genes.length - 1
  let panelsDrawn = 0

  surface.scatter(dataset, {
    slot: slotAt(plan, geneIndex, 0),
    source: { kind: 'phase', gene, x: s, y: u, fits: layers.fits },
    color: resolveColorSource(dataset, style.color, gene),
    colorMap: phaseColorMap(style, layers.phase),
    perc: style.perc,
    title: gene,
    xlabel: PHASE_X_LABEL,
    ylabel: PHASE_Y_LABEL,
    fontSize: style.fontSize,
    size: style.size,
    alpha: style.alpha,
    frameOn: true,
    colorbar: style.colorbar,
    legendLoc: isLast ? style.legendLoc : 'none',
    legendFontSize: style.legendFontSize,
  })
  panelsDrawn += 1

  for (const slot of geneSlots(plan, geneIndex)) {
    if (slot.role.kind !== 'layer') continue
    if (input.basis === undefined) {
      throw new Error(`Layer panel "${slot.role.layer}" needs an embedding basis.`)
    }
    const { layer } = slot.role
    surface.scatter(dataset, {
      slot,
      source: { kind: 'embedding', basis: input.basis },
      color: { kind: 'values', label: layer, values: geneValues(dataset, layer, gene) },
      colorMap: pickColorMap(style.colorMap, isPrimaryLayer(layer, layers.phase)),
      perc: style.perc,
      title: layerPanelTitle(layer, layers),
      fontSize: style.fontSize,
      size: style.size,
      alpha: style.alpha,
      frameOn: false,
      colorbar: style.colorbar,
      legendLoc: 'none',
      legendFontSize: style.legendFontSize,
    })
    panelsDrawn += 1
  }

  let stochasticLines = 0
  if (input.stochastic) {
    stochasticLines = renderStochasticPanel({
      dataset,
      plan,
      surface,
      moments: input.moments,
      phase: layers.phase,
      extraLayerCount: layers.extraLayers.length,
      stochasticFits: layers.stochasticFits,
      style,
      geneIndex,
      s,
      u,
    })
    panelsDrawn += 1
  }
  return { panelsDrawn, stochasticLines }
}

/**
 * Draws every gene's panels in plan order: gene-major, panel-minor. Each
 * request targets a slot of the gene being drawn and nothing else.
 */
export function renderPanels(input: PanelRenderInput): RenderSummary {
  const total: RenderSummary = { panelsDrawn: 0, stochasticLines: 0 }
  input.plan.genes.forEach((_, geneIndex) => {
    const summary = renderGene(input, geneIndex)
    total.panelsDrawn += summary.panelsDrawn
    total.stochasticLines += summary.stochasticLines
  })
  return total
}
