import { max, min } from 'mathjs'
import { geneValues, hasLayer } from '../dataset/dataset'
import { resolveFitParameters } from '../dataset/fitParameters'
import { slotAt } from '../layout/layoutPlanner'
import { phaseColorMap, resolveColorSource } from './panelStyle'
import type { GeneSlice, LineRequest, PanelSurface, SecondOrderMoments } from '../collaborators/types'
import type { VelocityDataset } from '../dataset/types'
import type { LayoutPlan } from '../layout/layoutPlanner'
import type { PanelStyle } from './panelStyle'
import type { PhaseLayerPair } from '../selection/layerResolver'

export const STOCHASTIC_X_LABEL = '2 Σ<sub>s</sub> − ⟨s⟩'
export const STOCHASTIC_Y_LABEL = '2 Σ<sub>us</sub> + ⟨u⟩'
export const FIT_LINE_SAMPLES = 50
export const FIT_LINE_COLOR = '#000000'

export type CorrectedCoordinates = { x: number[]; y: number[] }

/**
 * x = 2(ss − s²) − s
 * y = 2(us − u·s) + u + 2·s·offset/beta
 */
export function correctedCoordinates(
  s: number[],
  u: number[],
  ss: number[],
  us: number[],
  params: { offset: number; beta: number }
): CorrectedCoordinates {
  const x = s.map((si, i) => 2 * (ss[i] - si * si) - si)
  const y = s.map((si, i) => 2 * (us[i] - u[i] * si) + u[i] + (2 * si * params.offset) / params.beta)
  return { x, y }
}

/** `count` evenly spaced samples over [start, stop], both ends included. */
export function sampleRange(start: number, stop: number, count = FIT_LINE_SAMPLES): number[] {
  if (count <= 1) return [start]
  const step = (stop - start) / (count - 1)
  return Array.from({ length: count }, (_, i) => (i === count - 1 ? stop : start + i * step))
}

export type StochasticLine = { fit: string; x: number[]; y: number[] }

/** One dashed line `y = (gamma/beta)·x + offset2/beta` per stochastic fit. */
export function stochasticLines(
  dataset: VelocityDataset,
  gene: string,
  fits: string[],
  x: number[]
): StochasticLine[] {
  if (fits.length === 0 || x.length === 0) return []
  const xs = sampleRange(Number(min(x)), Number(max(x)) * 1.02)
  return fits.map((fit) => {
    const { gamma, beta, offset2 } = resolveFitParameters(dataset, fit, gene)
    return { fit, x: xs, y: xs.map((value) => (gamma / beta) * value + offset2 / beta) }
  })
}

export function momentSlice(
  dataset: VelocityDataset,
  gene: string,
  s: number[],
  u: number[]
): GeneSlice {
  const raw = hasLayer(dataset, 'spliced') && hasLayer(dataset, 'unspliced')
  return {
    gene,
    spliced: raw ? geneValues(dataset, 'spliced', gene) : s,
    unspliced: raw ? geneValues(dataset, 'unspliced', gene) : u,
    connectivities: dataset.connectivities,
  }
}

export type StochasticPanelInput = {
  dataset: VelocityDataset
  plan: LayoutPlan
  surface: PanelSurface
  moments: SecondOrderMoments
  phase: PhaseLayerPair
  extraLayerCount: number
  stochasticFits: string[]
  style: PanelStyle
  geneIndex: number
  s: number[]
  u: number[]
}

/**
 * Draws the corrected scatter in the gene's stochastic slot and one line per
 * stochastic fit. The auxiliary slot after it stays empty.
 * Returns the number of lines drawn.
 */
export function renderStochasticPanel(input: StochasticPanelInput): number {
  const { dataset, plan, surface, style, geneIndex, s, u } = input
  const gene = plan.genes[geneIndex]
  const { ss, us } = input.moments(momentSlice(dataset, gene, s, u))

  const [firstFit] = input.stochasticFits
  const params = firstFit
    ? resolveFitParameters(dataset, firstFit, gene)
    : { offset: 0, beta: 1 }
  const { x, y } = correctedCoordinates(s, u, ss, us, params)

  const slot = slotAt(plan, geneIndex, input.extraLayerCount + 1)
  surface.scatter(dataset, {
    slot,
    source: { kind: 'coordinates', x, y },
    color: resolveColorSource(dataset, style.color, gene),
    colorMap: phaseColorMap(style, input.phase),
    perc: style.perc,
    title: gene,
    xlabel: STOCHASTIC_X_LABEL,
    ylabel: STOCHASTIC_Y_LABEL,
    fontSize: style.fontSize,
    size: style.size,
    alpha: style.alpha,
    frameOn: true,
    colorbar: style.colorbar,
    legendLoc: 'none',
    legendFontSize: style.legendFontSize,
  })

  const lines = stochasticLines(dataset, gene, input.stochasticFits, x)
  for (const line of lines) {
    const request: LineRequest = { slot, x: line.x, y: line.y, dash: 'dash', color: FIT_LINE_COLOR }
    surface.line(request)
  }
  return lines.length
}
