import { describe, expect, it } from 'vitest'
import { ConfigurationError } from '../errors'
import { makeFixtureDataset } from '../test/fixtures'
import { createPlotDefaults, defaultBasis, defaultSize } from './defaults'
import { parseVelocityPlotOptions, resolveVelocityPlotOptions, validateVelocityPlotOptions } from './options'

describe('parseVelocityPlotOptions', () => {
  it('rejects unknown keys and ill-typed values', () => {
    const { validation } = parseVelocityPlotOptions({ ncols: 0, colour: 'clusters', alpha: 2 })
    expect(validation.valid).toBe(false)
    expect(validation.errors).toEqual([
      'alpha must be between 0 and 1.',
      'Unknown option "colour".',
      'ncols must be a positive integer.',
    ])
  })

  it('treats null values as unset', () => {
    const { options, validation } = parseVelocityPlotOptions({ basis: null, vkey: 'velocity' })
    expect(validation.valid).toBe(true)
    expect(options).toEqual({ vkey: 'velocity' })
  })

  it('rejects non-object input', () => {
    expect(validateVelocityPlotOptions(['Pdx1'])).toEqual({
      valid: false,
      errors: ['Options must be an object.'],
      warnings: [],
    })
  })

  it('requires positive figure sizes', () => {
    expect(validateVelocityPlotOptions({ figsize: [0, 5] }).errors).toEqual(['figsize must be two positive sizes.'])
    expect(validateVelocityPlotOptions({ figsize: [7, -5] }).errors).toEqual(['figsize must be two positive sizes.'])
    expect(validateVelocityPlotOptions({ figsize: [7, 5] }).valid).toBe(true)
  })

  it('checks percentile bounds', () => {
    expect(validateVelocityPlotOptions({ perc: [98, 2] }).errors).toEqual([
      'perc must be two percentiles with 0 <= low < high <= 100.',
    ])
  })

  it('warns about options that do not combine', () => {
    expect(validateVelocityPlotOptions({ varNames: 'Pdx1', groupby: 'clusters' }).warnings).toEqual([
      'Both varNames and groupby are set; groupby takes precedence when it names a cell annotation.',
    ])
    expect(validateVelocityPlotOptions({ groups: 'Beta' }).warnings).toEqual(['groups has no effect without groupby.'])
  })
})

describe('resolveVelocityPlotOptions', () => {
  it('fills every gap from the defaults', () => {
    const dataset = makeFixtureDataset()
    const resolved = resolveVelocityPlotOptions({ varNames: 'Pdx1' }, dataset, createPlotDefaults())
    expect(resolved).toEqual({
      selection: { varNames: 'Pdx1', groupby: undefined, groups: undefined, vkey: 'velocity' },
      layerRequest: {
        vkey: 'velocity',
        useRaw: false,
        layers: 'all',
        fits: ['velocity', 'dynamics'],
        stochastic: false,
      },
      basis: 'X_umap',
      style: {
        color: undefined,
        colorMap: { kind: 'paired', velocity: 'RdYlGn', expression: 'gnuplot_r' },
        colorbar: true,
        perc: [2, 98],
        alpha: 0.5,
        size: 10,
        fontSize: 9.600000000000001,
        legendLoc: 'none',
        legendFontSize: 8,
      },
      ncols: 1,
      figsize: [7, 5],
      dpi: 80,
      show: true,
      save: false,
      saveDir: './figures',
    })
  })

  it('throws a ConfigurationError listing every problem', () => {
    const dataset = makeFixtureDataset()
    const call = () => resolveVelocityPlotOptions({ ncols: 1.5, dpi: -1 }, dataset, createPlotDefaults())
    expect(call).toThrow(ConfigurationError)
    try {
      call()
    } catch (error) {
      expect(error instanceof ConfigurationError && error.problems).toEqual([
        'dpi must be a positive number.',
        'ncols must be a positive integer.',
      ])
    }
  })
})

describe('plot defaults', () => {
  it('prefers umap, accepts keys with or without the X_ prefix', () => {
    const dataset = makeFixtureDataset()
    expect(defaultBasis(dataset)).toBe('X_umap')
    expect(defaultBasis(dataset, 'umap')).toBe('X_umap')
    expect(defaultBasis(dataset, 'X_umap')).toBe('X_umap')
    expect(defaultBasis(dataset, 'tsne')).toBeUndefined()
  })

  it('shrinks markers as cells grow', () => {
    expect(defaultSize(makeFixtureDataset())).toBe(10)
  })
})
