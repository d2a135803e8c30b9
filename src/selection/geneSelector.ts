import { ConfigurationError } from '../errors'
import { hasGene, hasObsKey } from '../dataset/dataset'
import type { RankGenes } from '../collaborators/types'
import type { RankingResult, VelocityDataset } from '../dataset/types'

export const RANKED_GENES_BUDGET = 10

export type GeneSelection = {
  varNames?: string | string[]
  groupby?: string
  groups?: string | string[]
  vkey: string
}

function toList(value: string | string[]): string[] {
  return typeof value === 'string' ? [value] : [...value]
}

/** Stable unique: keeps the first occurrence of every name. */
export function uniqueStable(names: string[]): string[] {
  const seen = new Set<string>()
  const out: string[] = []
  for (const name of names) {
    if (seen.has(name)) continue
    seen.add(name)
    out.push(name)
  }
  return out
}

/**
 * Cached ranking for `groupby`, recomputed only when the cache was built for
 * another grouping. This is the one write the selector makes on the dataset.
 */
export function ensureRanking(
  dataset: VelocityDataset,
  vkey: string,
  groupby: string,
  rank: RankGenes
): RankingResult {
  const cached = dataset.uns.rankVelocityGenes
  if (cached && cached.params.groupby === groupby) return cached
  const result = rank(dataset, vkey, groupby)
  dataset.uns.rankVelocityGenes = result
  return result
}

/**
 * Groups whose label contains any requested token. Matching is substring
 * containment: `"beta"` selects both `"beta"` and `"beta-2"`.
 */
export function matchGroups(categories: string[], groups: string[]): boolean[] {
  return categories.map((category) => groups.some((token) => category.includes(token)))
}

function fromRanking(ranking: RankingResult, categories: string[], groups?: string | string[]) {
  if (groups === undefined) {
    return ranking.names.map((names) => names[0]).filter((name): name is string => !!name)
  }
  const matches = matchGroups(categories, toList(groups))
  const matchCount = matches.filter(Boolean).length
  if (matchCount === 0) return []
  const perGroup = Math.floor(RANKED_GENES_BUDGET / matchCount)
  return ranking.names.flatMap((names, idx) => (matches[idx] ? names.slice(0, perGroup) : []))
}

export function selectGenes(
  dataset: VelocityDataset,
  selection: GeneSelection,
  rank: RankGenes
): string[] {
  let candidates: string[]
  const { groupby } = selection
  if (groupby !== undefined && hasObsKey(dataset, groupby)) {
    const ranking = ensureRanking(dataset, selection.vkey, groupby, rank)
    candidates = fromRanking(ranking, dataset.obs[groupby].categories, selection.groups)
  } else if (selection.varNames !== undefined) {
    candidates = toList(selection.varNames).filter((gene) => hasGene(dataset, gene))
  } else {
    throw new ConfigurationError('No varNames or groups specified.')
  }

  const genes = uniqueStable(candidates)
  if (genes.length === 0) {
    throw new ConfigurationError('None of the requested genes are in the dataset.')
  }
  return genes
}
