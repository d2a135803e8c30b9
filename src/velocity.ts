import { ConfigurationError } from './errors'
import { secondOrderMoments } from './collaborators/moments'
import { rankVelocityGenes } from './collaborators/rankVelocityGenes'
import { createPlotDefaults } from './config/defaults'
import { resolveVelocityPlotOptions } from './config/options'
import { planLayout } from './layout/layoutPlanner'
import { renderPanels } from './render/panelRenderer'
import { isColorKey } from './render/panelStyle'
import { selectGenes } from './selection/geneSelector'
import { resolveLayers } from './selection/layerResolver'
import { silentLogger } from './utils/logger'
import { createPlotlySurface } from './viewports/plotly/plotlyFigure'
import { finalizeFigure } from './viewports/plotly/finalize'
import type { PanelSurface, RankGenes, SecondOrderMoments, SurfaceFactory } from './collaborators/types'
import type { PlotDefaults } from './config/defaults'
import type { VelocityPlotOptions } from './config/options'
import type { VelocityDataset } from './dataset/types'
import type { LayoutPlan } from './layout/layoutPlanner'
import type { RenderSummary } from './render/panelRenderer'
import type { ResolvedLayers } from './selection/layerResolver'
import type { Logger } from './utils/logger'
import type { FinalizeOptions, FinalizeResult } from './viewports/plotly/finalize'
import type { PlotlyFigure, PlotlySurface } from './viewports/plotly/plotlyFigure'

export type VelocityCollaborators<S extends PanelSurface> = {
  rank: RankGenes
  moments: SecondOrderMoments
  createSurface: SurfaceFactory<S>
  finalize: (surface: S, options: FinalizeOptions) => FinalizeResult
  defaults: PlotDefaults
  logger: Logger
}

export type VelocityPlotResult<S extends PanelSurface> = {
  genes: string[]
  layers: ResolvedLayers
  plan: LayoutPlan
  surface: S
  summary: RenderSummary
  /** Present when the figure was not shown. */
  figure?: PlotlyFigure
  savedTo?: string
}

export function createPlotlyCollaborators(
  overrides?: Partial<VelocityCollaborators<PlotlySurface>>
): VelocityCollaborators<PlotlySurface> {
  return {
    rank: rankVelocityGenes,
    moments: secondOrderMoments,
    createSurface: (plan) => createPlotlySurface(plan),
    finalize: (surface, options) => finalizeFigure(surface.toFigure(), options),
    defaults: createPlotDefaults(),
    logger: silentLogger,
    ...overrides,
  }
}

/**
 * Phase portraits plus embedding panels for a set of genes.
 *
 * Every option is checked and every default resolved before the surface is
 * created, so a ConfigurationError leaves nothing half drawn.
 */
export function renderVelocityPanels<S extends PanelSurface>(
  dataset: VelocityDataset,
  options: VelocityPlotOptions,
  collaborators: VelocityCollaborators<S>
): VelocityPlotResult<S> {
  const { logger } = collaborators
  const resolved = resolveVelocityPlotOptions(options, dataset, collaborators.defaults)
  const genes = selectGenes(dataset, resolved.selection, collaborators.rank)
  logger.debug(`Selected genes: ${genes.join(', ')}`)

  const layers = resolveLayers(dataset, resolved.layerRequest)
  if (layers.dropped.layers.length > 0) {
    logger.debug(`Skipping missing layers: ${layers.dropped.layers.join(', ')}`)
  }
  if (layers.dropped.fits.length > 0) {
    logger.debug(`Skipping fits without parameters: ${layers.dropped.fits.join(', ')}`)
  }
  const { color } = resolved.style
  if (color !== undefined && !isColorKey(dataset, color)) {
    logger.warn(`Color key "${color}" matches no annotation, layer or gene; points stay uncolored.`)
  }
  if (layers.extraLayers.length > 0 && resolved.basis === undefined) {
    throw new ConfigurationError(
      `No embedding found for layer panels${options.basis ? ` (basis "${options.basis}")` : ''}.`
    )
  }

  const plan = planLayout({
    genes,
    extraLayers: layers.extraLayers,
    stochastic: resolved.layerRequest.stochastic,
    ncols: resolved.ncols,
    figsize: resolved.figsize,
    pixelsPerInch: collaborators.defaults.dpi,
  })
  logger.debug(
    `Layout: ${plan.rows}×${plan.totalColumns} grid, ${plan.panelsPerGene} panels per gene`
  )

  const surface = collaborators.createSurface(plan)
  const summary = renderPanels({
    dataset,
    plan,
    layers,
    basis: resolved.basis,
    stochastic: resolved.layerRequest.stochastic,
    style: resolved.style,
    surface,
    moments: collaborators.moments,
  })

  const output = collaborators.finalize(surface, {
    show: resolved.show,
    save: resolved.save,
    dpi: resolved.dpi,
    saveDir: resolved.saveDir,
    logger,
  })
  return { genes, layers, plan, surface, summary, ...output }
}
