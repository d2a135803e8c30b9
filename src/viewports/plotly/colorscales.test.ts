import { describe, expect, it } from 'vitest'
import { FALLBACK_COLORSCALE, resolveColorScale } from './colorscales'

describe('resolveColorScale', () => {
  it('loads custom scales and reverses on _r', () => {
    const scale = resolveColorScale('gnuplot_r')
    expect(scale.reversescale).toBe(true)
    expect(Array.isArray(scale.colorscale)).toBe(true)
    const stops = Array.isArray(scale.colorscale) ? scale.colorscale : []
    expect(stops[0]).toEqual([0, '#000000'])
    expect(stops[stops.length - 1]?.[0]).toBe(1)
  })

  it('matches Plotly built-ins regardless of case', () => {
    expect(resolveColorScale('viridis')).toEqual({ colorscale: 'Viridis', reversescale: false })
    expect(resolveColorScale('RdBu_r')).toEqual({ colorscale: 'RdBu', reversescale: true })
  })

  it('falls back for unknown names', () => {
    expect(resolveColorScale('not-a-map')).toEqual({ colorscale: FALLBACK_COLORSCALE, reversescale: false })
  })
})
