import { describe, expect, it } from 'vitest'
import { makeFixtureDataset } from '../test/fixtures'
import { FIT_PARAMETER_FALLBACKS, hasFitParameter, resolveFitParameters } from './fitParameters'

describe('fit parameters', () => {
  it('reads per-gene values', () => {
    const dataset = makeFixtureDataset()
    expect(resolveFitParameters(dataset, 'velocity', 'Neurog3')).toEqual({
      offset: 0.2,
      beta: 2,
      gamma: 1.5,
      offset2: 0,
    })
  })

  it('falls back to offset 0, beta 1, gamma 1, offset2 0', () => {
    const dataset = makeFixtureDataset()
    expect(resolveFitParameters(dataset, 'dynamics', 'Sox9')).toEqual({
      offset: 0,
      beta: 1,
      gamma: 1,
      offset2: 0,
    })
    expect(FIT_PARAMETER_FALLBACKS).toEqual({ offset: 0, beta: 1, gamma: 1, offset2: 0 })
  })

  it('treats non-finite entries as absent', () => {
    const dataset = makeFixtureDataset()
    dataset.var.velocity_gamma = [Number.NaN, 1, 1, 1]
    expect(resolveFitParameters(dataset, 'velocity', 'Sox9').gamma).toBe(1)
    expect(hasFitParameter(dataset, 'velocity', 'gamma')).toBe(true)
    expect(hasFitParameter(dataset, 'velocity', 'offset2')).toBe(false)
  })
})
