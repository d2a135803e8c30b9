import { max, quantileSeq } from 'mathjs'
import { varValue } from '../../dataset/dataset'
import { fitParameterKey, resolveFitParameters } from '../../dataset/fitParameters'
import { slotDomain } from '../../layout/layoutPlanner'
import { sampleRange } from '../../render/stochasticOverlay'
import { resolveColorScale } from './colorscales'
import { resolvePlotlyThemeTokens } from './plotlyTheme'
import type { Annotations, Config, Layout, PlotData, PlotMarker } from 'plotly.js'
import type {
  ColorSource,
  LegendLoc,
  LineRequest,
  PanelSurface,
  ScatterRequest,
  ScatterSource,
} from '../../collaborators/types'
import type { VelocityDataset } from '../../dataset/types'
import type { LayoutPlan, PanelSlot } from '../../layout/layoutPlanner'
import type { PlotlyThemeMode } from './plotlyTheme'

export const CATEGORY_PALETTE = [
  '#1f77b4',
  '#ff7f0e',
  '#279e68',
  '#d62728',
  '#aa40fc',
  '#8c564b',
  '#e377c2',
  '#b5bd61',
  '#17becf',
  '#aec7e8',
  '#ffbb78',
  '#98df8a',
  '#ff9896',
  '#c5b0d5',
  '#c49c94',
  '#f7b6d2',
  '#dbdb8d',
  '#9edae5',
  '#ad494a',
  '#8c6d31',
]

export const FIT_LINE_COLORS = ['#800080', '#000000', '#1f77b4', '#d62728', '#279e68']

export type PlotlyLayout = Partial<Layout> & Record<string, unknown>

export type PlotlyFigure = {
  data: Array<Partial<PlotData>>
  layout: PlotlyLayout
  config: Partial<Config>
}

export type PlotlySurfaceOptions = {
  theme?: PlotlyThemeMode
}

export type PlotlySurface = PanelSurface & {
  toFigure: () => PlotlyFigure
  /** Flat indices of slots that received at least one trace. */
  drawnSlots: () => number[]
}

type AxisSpec = {
  domain: [number, number]
  anchor: string
  title: { text: string; font: { size: number } }
  showline: boolean
  mirror: boolean
  showticklabels: boolean
  ticks: '' | 'outside'
  showgrid: boolean
  zeroline: boolean
  tickfont: { size: number }
}

export function axisIds(slot: PanelSlot) {
  const suffix = slot.index === 0 ? '' : String(slot.index + 1)
  return {
    x: `x${suffix}`,
    y: `y${suffix}`,
    xLayoutKey: `xaxis${suffix}`,
    yLayoutKey: `yaxis${suffix}`,
  }
}

/** Lower and upper color limits at the requested percentiles of the finite values. */
export function percentileLimits(values: number[], perc: [number, number]): [number, number] | null {
  const finite = values.filter((value) => Number.isFinite(value))
  if (finite.length === 0) return null
  return [Number(quantileSeq(finite, perc[0] / 100)), Number(quantileSeq(finite, perc[1] / 100))]
}

function sourcePoints(dataset: VelocityDataset, source: ScatterSource): { x: number[]; y: number[] } {
  if (source.kind !== 'embedding') return { x: source.x, y: source.y }
  const coords = dataset.obsm[source.basis]
  if (!coords) {
    throw new Error(`Embedding "${source.basis}" is not in the dataset.`)
  }
  return { x: coords.map((row) => row[0]), y: coords.map((row) => row[1]) }
}

function legendPosition(loc: LegendLoc, domain: { x: [number, number]; y: [number, number] }): Partial<Layout['legend']> {
  switch (loc) {
    case 'right margin':
      return { x: 1.02, y: 1, xanchor: 'left', yanchor: 'top' }
    case 'upper left':
    case 'on data':
      return { x: domain.x[0], y: domain.y[1], xanchor: 'left', yanchor: 'top' }
    case 'lower left':
      return { x: domain.x[0], y: domain.y[0], xanchor: 'left', yanchor: 'bottom' }
    case 'lower right':
      return { x: domain.x[1], y: domain.y[0], xanchor: 'right', yanchor: 'bottom' }
    case 'upper right':
    case 'best':
    case 'none':
      return { x: domain.x[1], y: domain.y[1], xanchor: 'right', yanchor: 'top' }
  }
}

/**
 * Builds one Plotly figure for a layout plan. Each slot owns the axis pair
 * named after its flat index; slots that are never drawn get no axes.
 */
export function createPlotlySurface(plan: LayoutPlan, options: PlotlySurfaceOptions = {}): PlotlySurface {
  const theme = resolvePlotlyThemeTokens(options.theme)
  const traces: Array<Partial<PlotData>> = []
  const annotations: Array<Partial<Annotations>> = []
  const axes = new Map<number, { x: AxisSpec; y: AxisSpec }>()
  const legendFits = new Set<string>()
  let legend: Partial<Layout['legend']> | null = null

  const ensureAxes = (
    slot: PanelSlot,
    setup?: { xlabel?: string; ylabel?: string; frameOn: boolean; fontSize: number; title: string }
  ) => {
    const existing = axes.get(slot.index)
    if (existing) return axisIds(slot)
    const ids = axisIds(slot)
    const domain = slotDomain(plan, slot)
    const frameOn = setup?.frameOn ?? true
    const fontSize = setup?.fontSize ?? 10
    const axis = (side: 'x' | 'y'): AxisSpec => ({
      domain: domain[side],
      anchor: side === 'x' ? ids.y : ids.x,
      title: { text: (side === 'x' ? setup?.xlabel : setup?.ylabel) ?? '', font: { size: fontSize } },
      showline: frameOn,
      mirror: frameOn,
      showticklabels: frameOn,
      ticks: frameOn ? 'outside' : '',
      showgrid: false,
      zeroline: false,
      tickfont: { size: fontSize },
    })
    axes.set(slot.index, { x: axis('x'), y: axis('y') })
    if (setup && setup.title.length > 0) {
      annotations.push({
        xref: 'paper',
        yref: 'paper',
        x: (domain.x[0] + domain.x[1]) / 2,
        y: domain.y[1],
        xanchor: 'center',
        yanchor: 'bottom',
        text: setup.title,
        showarrow: false,
        font: { size: fontSize, color: theme.text },
      })
    }
    return ids
  }

  const markerFor = (
    dataset: VelocityDataset,
    color: ColorSource,
    request: ScatterRequest
  ): Partial<PlotMarker> => {
    const base: Partial<PlotMarker> = { size: request.size, opacity: request.alpha }
    if (color.kind === 'none') {
      return { ...base, color: theme.neutral }
    }
    if (color.kind === 'annotation') {
      const annotation = dataset.obs[color.key]
      const palette = annotation.colors ?? CATEGORY_PALETTE
      return {
        ...base,
        color: annotation.codes.map((code) =>
          code >= 0 && code < annotation.categories.length ? palette[code % palette.length] : theme.neutral
        ),
      }
    }
    const scale = resolveColorScale(request.colorMap)
    const limits = percentileLimits(color.values, request.perc)
    const domain = slotDomain(plan, request.slot)
    return {
      ...base,
      color: color.values,
      colorscale: scale.colorscale,
      reversescale: scale.reversescale,
      ...(limits ? { cmin: limits[0], cmax: limits[1] } : {}),
      showscale: request.colorbar,
      colorbar: {
        x: domain.x[1] + 0.005,
        xanchor: 'left',
        y: (domain.y[0] + domain.y[1]) / 2,
        yanchor: 'middle',
        len: domain.y[1] - domain.y[0],
        thickness: 8,
        tickfont: { size: request.fontSize * 0.8 },
      },
    }
  }

  const fitLines = (
    dataset: VelocityDataset,
    request: ScatterRequest,
    source: Extract<ScatterSource, { kind: 'phase' }>,
    ids: ReturnType<typeof axisIds>
  ) => {
    if (source.x.length === 0) return
    const xs = sampleRange(0, Number(max(source.x)))
    source.fits.forEach((fit, idx) => {
      if (varValue(dataset, fitParameterKey(fit, 'gamma'), source.gene) === undefined) return
      const { gamma, beta, offset } = resolveFitParameters(dataset, fit, source.gene)
      const showlegend = request.legendLoc !== 'none' && !legendFits.has(fit)
      if (showlegend) {
        legendFits.add(fit)
        legend = {
          ...legendPosition(request.legendLoc, slotDomain(plan, request.slot)),
          font: { size: request.legendFontSize, color: theme.text },
        }
      }
      traces.push({
        type: 'scatter',
        mode: 'lines',
        name: fit,
        legendgroup: fit,
        showlegend,
        x: xs,
        y: xs.map((value) => (gamma / beta) * value + offset / beta),
        xaxis: ids.x,
        yaxis: ids.y,
        line: { color: FIT_LINE_COLORS[idx % FIT_LINE_COLORS.length], width: 2 },
        hoverinfo: 'name',
      })
    })
  }

  return {
    scatter: (dataset, request) => {
      const ids = ensureAxes(request.slot, request)
      const points = sourcePoints(dataset, request.source)
      traces.push({
        type: 'scatter',
        mode: 'markers',
        name: request.title,
        showlegend: false,
        x: points.x,
        y: points.y,
        xaxis: ids.x,
        yaxis: ids.y,
        marker: markerFor(dataset, request.color, request),
        hoverinfo: 'x+y',
      })
      if (request.source.kind === 'phase') {
        fitLines(dataset, request, request.source, ids)
      }
    },
    line: (request: LineRequest) => {
      const ids = ensureAxes(request.slot)
      traces.push({
        type: 'scatter',
        mode: 'lines',
        showlegend: false,
        x: request.x,
        y: request.y,
        xaxis: ids.x,
        yaxis: ids.y,
        line: { color: request.color, dash: request.dash, width: 1.5 },
        hoverinfo: 'skip',
      })
    },
    toFigure: () => {
      const layout: PlotlyLayout = {
        width: plan.figure.pixels[0],
        height: plan.figure.pixels[1],
        paper_bgcolor: theme.background,
        plot_bgcolor: theme.background,
        font: { color: theme.text },
        margin: { l: 50, r: 50, t: 40, b: 50 },
        showlegend: legend !== null,
        annotations: annotations.map((annotation) => ({ ...annotation })),
      }
      if (legend !== null) layout.legend = legend
      const slots = [...axes.keys()].sort((a, b) => a - b)
      for (const index of slots) {
        const spec = axes.get(index)
        const slot = plan.slots[index]
        if (!spec || !slot) continue
        const ids = axisIds(slot)
        layout[ids.xLayoutKey] = structuredClone(spec.x)
        layout[ids.yLayoutKey] = structuredClone(spec.y)
      }
      return {
        data: traces.map((trace) => ({ ...trace })),
        layout,
        config: { displaylogo: false, responsive: true },
      }
    },
    drawnSlots: () => [...axes.keys()].sort((a, b) => a - b),
  }
}
