import { mean, variance } from 'mathjs'
import { geneValues, hasObsKey } from '../dataset/dataset'
import type { RankingResult, VelocityDataset } from '../dataset/types'
import type { RankGenes } from './types'

export const RANKING_GENES_PER_GROUP = 10

function sampleStats(values: number[]) {
  if (values.length === 0) return { mean: 0, variance: 0, n: 0 }
  return {
    mean: Number(mean(values)),
    variance: values.length > 1 ? Number(variance(values)) : 0,
    n: values.length,
  }
}

/**
 * Welch t statistic of `inside` against `outside`. Groups with no spread on
 * either side fall back to the plain mean difference.
 */
export function welchScore(inside: number[], outside: number[]): number {
  const a = sampleStats(inside)
  const b = sampleStats(outside)
  if (a.n === 0 || b.n === 0) return 0
  const diff = a.mean - b.mean
  const spread = Math.sqrt(a.variance / a.n + b.variance / b.n)
  return spread > 0 ? diff / spread : diff
}

/**
 * Ranks genes per category of `groupby` by how much higher their `vkey`
 * values are inside the category than outside it.
 */
export const rankVelocityGenes: RankGenes = (
  dataset: VelocityDataset,
  vkey: string,
  groupby: string
): RankingResult => {
  if (!hasObsKey(dataset, groupby)) {
    throw new Error(`Grouping "${groupby}" is not a cell annotation.`)
  }
  const { categories, codes } = dataset.obs[groupby]
  const columns = dataset.varNames.map((gene) => geneValues(dataset, vkey, gene))

  const names = categories.map((_, category) => {
    const scored = dataset.varNames.map((gene, g) => {
      const inside: number[] = []
      const outside: number[] = []
      columns[g].forEach((value, cell) => {
        if (codes[cell] === category) inside.push(value)
        else outside.push(value)
      })
      return { gene, score: welchScore(inside, outside) }
    })
    scored.sort((a, b) => b.score - a.score)
    return scored.slice(0, RANKING_GENES_PER_GROUP).map((entry) => entry.gene)
  })

  return { params: { groupby, vkey }, names }
}
