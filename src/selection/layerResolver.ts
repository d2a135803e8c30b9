import { hasLayer, layerNames } from '../dataset/dataset'
import { hasFitParameter } from '../dataset/fitParameters'
import { PRIMARY_MATRIX } from '../dataset/types'
import type { VelocityDataset } from '../dataset/types'

export const DYNAMICS_FIT = 'dynamics'

export type PhaseLayerPair = {
  /** x axis of the phase portrait. */
  spliced: string
  /** y axis of the phase portrait. */
  unspliced: string
  smoothed: boolean
}

export type LayerRequest = {
  vkey: string
  useRaw: boolean
  layers: 'all' | string[]
  fits: 'all' | string[]
  stochastic: boolean
}

export type ResolvedLayers = {
  phase: PhaseLayerPair
  /** Layers rendered as embedding panels, in request order. */
  extraLayers: string[]
  fits: string[]
  /** Fits that carry a `variance_<fit>` layer, in `fits` order. */
  stochasticFits: string[]
  dropped: { layers: string[]; fits: string[] }
}

export function resolvePhaseLayers(dataset: VelocityDataset, useRaw: boolean): PhaseLayerPair {
  if (useRaw || !hasLayer(dataset, 'Ms')) {
    return { spliced: 'spliced', unspliced: 'unspliced', smoothed: false }
  }
  return { spliced: 'Ms', unspliced: 'Mu', smoothed: true }
}

export function isPrimaryLayer(layer: string, phase: PhaseLayerPair): boolean {
  return layer === PRIMARY_MATRIX || layer === phase.spliced
}

export function resolveExtraLayers(
  dataset: VelocityDataset,
  requested: 'all' | string[],
  vkey: string,
  phase: PhaseLayerPair
): string[] {
  const layers = requested === 'all' ? [vkey, phase.spliced] : requested
  return layers.filter((layer) => hasLayer(dataset, layer) || layer === PRIMARY_MATRIX)
}

/**
 * Fits worth an overlay line: `dynamics` always, others only with a
 * `<fit>_gamma` annotation. `dynamics` ends up last and exactly once.
 */
export function resolveFits(dataset: VelocityDataset, requested: 'all' | string[]): string[] {
  const candidates = requested === 'all' ? layerNames(dataset) : requested
  const fits = candidates.filter(
    (fit) => fit !== DYNAMICS_FIT && hasFitParameter(dataset, fit, 'gamma')
  )
  return [...new Set(fits), DYNAMICS_FIT]
}

export function resolveStochasticFits(dataset: VelocityDataset, fits: string[]): string[] {
  return fits.filter((fit) => hasLayer(dataset, `variance_${fit}`))
}

export function resolveLayers(dataset: VelocityDataset, request: LayerRequest): ResolvedLayers {
  const phase = resolvePhaseLayers(dataset, request.useRaw)
  const extraLayers = resolveExtraLayers(dataset, request.layers, request.vkey, phase)
  const fits = resolveFits(dataset, request.fits)
  const stochasticFits = request.stochastic ? resolveStochasticFits(dataset, fits) : []

  const requestedLayers = request.layers === 'all' ? [request.vkey, phase.spliced] : request.layers
  const requestedFits = request.fits === 'all' ? [] : request.fits
  return {
    phase,
    extraLayers,
    fits,
    stochasticFits,
    dropped: {
      layers: requestedLayers.filter((layer) => !extraLayers.includes(layer)),
      fits: requestedFits.filter((fit) => !fits.includes(fit)),
    },
  }
}
