import { describe, expect, it, vi } from 'vitest'
import { planLayout } from '../layout/layoutPlanner'
import { makeFixtureDataset, createRecordingSurface } from '../test/fixtures'
import { toColorMapSpec } from './colorMap'
import {
  FIT_LINE_SAMPLES,
  correctedCoordinates,
  momentSlice,
  renderStochasticPanel,
  sampleRange,
  stochasticLines,
} from './stochasticOverlay'
import type { SecondOrderMoments } from '../collaborators/types'
import type { PanelStyle } from './panelStyle'

const style: PanelStyle = {
  color: 'clusters',
  colorMap: toColorMapSpec(['RdYlGn', 'gnuplot_r']),
  colorbar: true,
  perc: [2, 98],
  alpha: 0.5,
  size: 4,
  fontSize: 9.6,
  legendLoc: 'none',
  legendFontSize: 8,
}

describe('corrected coordinates', () => {
  it('maps unit inputs to (-1, 1)', () => {
    expect(correctedCoordinates([1], [1], [1], [1], { offset: 0, beta: 1 })).toEqual({ x: [-1], y: [1] })
  })

  it('adds the offset term scaled by beta', () => {
    const { x, y } = correctedCoordinates([2], [3], [5], [7], { offset: 1, beta: 2 })
    // x = 2(5 - 4) - 2, y = 2(7 - 6) + 3 + 2*2*1/2
    expect(x).toEqual([0])
    expect(y).toEqual([7])
  })
})

describe('sampleRange', () => {
  it('includes both ends', () => {
    expect(sampleRange(0, 1, 5)).toEqual([0, 0.25, 0.5, 0.75, 1])
    expect(sampleRange(-1, 2)).toHaveLength(FIT_LINE_SAMPLES)
  })
})

describe('stochastic lines', () => {
  it('draws one line per fit over the stretched x range', () => {
    const dataset = makeFixtureDataset()
    const lines = stochasticLines(dataset, 'Neurog3', ['velocity', 'dynamics'], [-2, 0, 5])
    expect(lines.map((line) => line.fit)).toEqual(['velocity', 'dynamics'])
    const [velocity, dynamics] = lines
    expect(velocity.x[0]).toBe(-2)
    expect(velocity.x[velocity.x.length - 1]).toBeCloseTo(5.1)
    // gamma 1.5, beta 2, offset2 fallback 0
    expect(velocity.y[0]).toBeCloseTo(-1.5)
    // all fallbacks: y = x
    expect(dynamics.y).toEqual(dynamics.x)
  })

  it('draws nothing without stochastic fits', () => {
    expect(stochasticLines(makeFixtureDataset(), 'Sox9', [], [1, 2])).toEqual([])
  })
})

describe('momentSlice', () => {
  it('hands raw counts to the estimator', () => {
    const dataset = makeFixtureDataset()
    const slice = momentSlice(dataset, 'Pdx1', [9, 9, 9, 9, 9, 9], [8, 8, 8, 8, 8, 8])
    expect(slice.spliced).toEqual([1, 2, 3, 4, 5, 6])
    expect(slice.unspliced).toEqual([1, 3, 5, 7, 9, 11])
  })
})

describe('renderStochasticPanel', () => {
  const unitMoments: SecondOrderMoments = (slice) => ({
    ss: slice.spliced.map(() => 1),
    us: slice.spliced.map(() => 1),
  })

  function setup(stochasticFits: string[]) {
    const dataset = makeFixtureDataset()
    const plan = planLayout({
      genes: ['Sox9', 'Pdx1'],
      extraLayers: ['velocity'],
      stochastic: true,
      figsize: [7, 5],
      pixelsPerInch: 80,
    })
    const surface = createRecordingSurface()
    const moments = vi.fn(unitMoments)
    const lines = renderStochasticPanel({
      dataset,
      plan,
      surface,
      moments,
      phase: { spliced: 'Ms', unspliced: 'Mu', smoothed: true },
      extraLayerCount: 1,
      stochasticFits,
      style,
      geneIndex: 1,
      s: [1, 1, 1, 1, 1, 1],
      u: [1, 1, 1, 1, 1, 1],
    })
    return { surface, moments, lines, plan }
  }

  it('draws the corrected scatter in the stochastic slot with one line per fit', () => {
    const { surface, lines, moments } = setup(['velocity', 'dynamics'])
    expect(moments).toHaveBeenCalledTimes(1)
    expect(lines).toBe(2)
    expect(surface.scatters).toHaveLength(1)
    const [scatter] = surface.scatters
    expect(scatter.slot.index).toBe(6)
    expect(scatter.slot.role.kind).toBe('stochastic')
    // Pdx1 velocity fit: offset 0.1, beta 1
    expect(scatter.source).toEqual({
      kind: 'coordinates',
      x: [-1, -1, -1, -1, -1, -1],
      y: [1.2, 1.2, 1.2, 1.2, 1.2, 1.2],
    })
    expect(scatter.color).toEqual({ kind: 'annotation', key: 'clusters' })
    expect(surface.lines.map((line) => line.slot.index)).toEqual([6, 6])
    expect(surface.lines.every((line) => line.dash === 'dash')).toBe(true)
  })

  it('keeps the slot but draws no line without stochastic fits', () => {
    const { surface, lines, plan } = setup([])
    expect(plan.panelsPerGene).toBe(4)
    expect(lines).toBe(0)
    expect(surface.lines).toHaveLength(0)
    expect(surface.scatters[0].source).toEqual({
      kind: 'coordinates',
      x: [-1, -1, -1, -1, -1, -1],
      y: [1, 1, 1, 1, 1, 1],
    })
  })
})
