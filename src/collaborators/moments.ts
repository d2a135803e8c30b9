import { forEachEntry, matrixShape } from '../dataset/matrix'
import type { LayerMatrix } from '../dataset/types'
import type { SecondOrderMoments } from './types'

/**
 * Row-normalized neighbor average of a per-cell vector. Cells without
 * neighbors keep their own value.
 */
export function neighborAverage(connectivities: LayerMatrix, values: number[]): number[] {
  const [rows] = matrixShape(connectivities)
  const sums = new Array<number>(rows).fill(0)
  const weights = new Array<number>(rows).fill(0)
  forEachEntry(connectivities, (row, column, weight) => {
    if (weight === 0) return
    sums[row] += weight * values[column]
    weights[row] += weight
  })
  return sums.map((sum, row) => (weights[row] > 0 ? sum / weights[row] : values[row]))
}

/**
 * Second-order moments of one gene: neighbor averages of s·s and s·u.
 * Without connectivities every cell is its own neighborhood.
 */
export const secondOrderMoments: SecondOrderMoments = (slice) => {
  const { spliced: s, unspliced: u, connectivities } = slice
  const ssRaw = s.map((value) => value * value)
  const usRaw = s.map((value, i) => value * u[i])
  if (!connectivities) {
    return { ss: ssRaw, us: usRaw }
  }
  return {
    ss: neighborAverage(connectivities, ssRaw),
    us: neighborAverage(connectivities, usRaw),
  }
}
