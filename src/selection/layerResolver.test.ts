import { describe, expect, it } from 'vitest'
import { makeFixtureDataset } from '../test/fixtures'
import {
  DYNAMICS_FIT,
  resolveExtraLayers,
  resolveFits,
  resolveLayers,
  resolvePhaseLayers,
  resolveStochasticFits,
} from './layerResolver'

describe('phase layer pair', () => {
  it('prefers smoothed moments when present', () => {
    expect(resolvePhaseLayers(makeFixtureDataset(), false)).toEqual({
      spliced: 'Ms',
      unspliced: 'Mu',
      smoothed: true,
    })
  })

  it('uses raw layers when forced or when moments are missing', () => {
    const dataset = makeFixtureDataset()
    expect(resolvePhaseLayers(dataset, true).spliced).toBe('spliced')
    delete dataset.layers.Ms
    expect(resolvePhaseLayers(dataset, false)).toEqual({
      spliced: 'spliced',
      unspliced: 'unspliced',
      smoothed: false,
    })
  })
})

describe('extra layers', () => {
  it('defaults to velocity and the primary layer', () => {
    const dataset = makeFixtureDataset()
    const phase = resolvePhaseLayers(dataset, false)
    expect(resolveExtraLayers(dataset, 'all', 'velocity', phase)).toEqual(['velocity', 'Ms'])
  })

  it('drops layers the dataset does not have but keeps X', () => {
    const dataset = makeFixtureDataset()
    const phase = resolvePhaseLayers(dataset, false)
    expect(resolveExtraLayers(dataset, ['X', 'acceleration', 'velocity'], 'velocity', phase)).toEqual([
      'X',
      'velocity',
    ])
  })
})

describe('fit names', () => {
  it('keeps fits with a gamma annotation and appends dynamics once', () => {
    const dataset = makeFixtureDataset()
    expect(resolveFits(dataset, ['velocity', 'dynamics', 'other'])).toEqual(['velocity', DYNAMICS_FIT])
    expect(resolveFits(dataset, ['dynamics', 'velocity', 'dynamics'])).toEqual(['velocity', 'dynamics'])
  })

  it('always returns dynamics, even with no candidates', () => {
    expect(resolveFits(makeFixtureDataset(), [])).toEqual(['dynamics'])
  })

  it('treats "all" as every layer name', () => {
    const dataset = makeFixtureDataset()
    dataset.var.Ms_gamma = [1, 1, 1, 1]
    expect(resolveFits(dataset, 'all')).toEqual(['Ms', 'velocity', 'dynamics'])
  })

  it('narrows to fits with a variance layer in stochastic mode', () => {
    const dataset = makeFixtureDataset()
    dataset.layers.variance_velocity = dataset.layers.velocity
    expect(resolveStochasticFits(dataset, ['velocity', 'dynamics'])).toEqual(['velocity'])
  })
})

describe('resolveLayers', () => {
  it('reports dropped layers and fits', () => {
    const dataset = makeFixtureDataset()
    const resolved = resolveLayers(dataset, {
      vkey: 'velocity',
      useRaw: false,
      layers: ['velocity', 'missing'],
      fits: ['velocity', 'steady'],
      stochastic: true,
    })
    expect(resolved.extraLayers).toEqual(['velocity'])
    expect(resolved.fits).toEqual(['velocity', 'dynamics'])
    expect(resolved.stochasticFits).toEqual([])
    expect(resolved.dropped).toEqual({ layers: ['missing'], fits: ['steady'] })
  })

  it('skips the stochastic filter outside stochastic mode', () => {
    const dataset = makeFixtureDataset()
    dataset.layers.variance_velocity = dataset.layers.velocity
    const resolved = resolveLayers(dataset, {
      vkey: 'velocity',
      useRaw: false,
      layers: 'all',
      fits: ['velocity'],
      stochastic: false,
    })
    expect(resolved.stochasticFits).toEqual([])
  })
})
