import { describe, expect, it } from 'vitest'
import { createDataset } from '../dataset/dataset'
import { rankVelocityGenes, welchScore } from './rankVelocityGenes'

function makeDataset() {
  return createDataset({
    obsNames: ['c1', 'c2', 'c3', 'c4'],
    varNames: ['g1', 'g2'],
    layers: {
      velocity: [
        [4, 0],
        [6, 0],
        [0, 3],
        [0, 3],
      ],
    },
    obs: { stage: { categories: ['early', 'late'], codes: [0, 0, 1, 1] } },
  })
}

describe('welchScore', () => {
  it('divides the mean difference by the pooled standard error', () => {
    expect(welchScore([4, 6], [0, 0])).toBe(5)
  })

  it('falls back to the mean difference without spread', () => {
    expect(welchScore([3, 3], [0, 0])).toBe(3)
  })

  it('scores empty groups as zero', () => {
    expect(welchScore([], [1, 2])).toBe(0)
  })
})

describe('rankVelocityGenes', () => {
  it('orders genes per category by score', () => {
    expect(rankVelocityGenes(makeDataset(), 'velocity', 'stage')).toEqual({
      params: { groupby: 'stage', vkey: 'velocity' },
      names: [
        ['g1', 'g2'],
        ['g2', 'g1'],
      ],
    })
  })

  it('requires a cell annotation', () => {
    expect(() => rankVelocityGenes(makeDataset(), 'velocity', 'batch')).toThrow(
      'Grouping "batch" is not a cell annotation.'
    )
  })
})
