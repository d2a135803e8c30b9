import { index, range } from 'mathjs'
import type { Matrix } from 'mathjs'
import type { LayerMatrix } from './types'

function isDense(matrix: LayerMatrix): matrix is number[][] {
  return Array.isArray(matrix)
}

function toNumber(value: unknown): number {
  return typeof value === 'number' ? value : Number(value)
}

export function matrixShape(matrix: LayerMatrix): [number, number] {
  if (isDense(matrix)) {
    return [matrix.length, matrix[0]?.length ?? 0]
  }
  const [rows = 0, cols = 0] = matrix.size()
  return [rows, cols]
}

export function isSparseLayer(matrix: LayerMatrix): matrix is Matrix {
  return !isDense(matrix)
}

/**
 * Dense copy of one column. Sparse storage is expanded here, so callers
 * always see one value per cell.
 */
export function denseColumn(matrix: LayerMatrix, column: number): number[] {
  if (isDense(matrix)) {
    return matrix.map((row) => row[column] ?? 0)
  }
  const [rows] = matrixShape(matrix)
  const out = new Array<number>(rows).fill(0)
  if (rows === 0) return out
  const slice = matrix.subset(index(range(0, rows), column))
  slice.forEach((value: unknown, position: number[]) => {
    out[position[0]] = toNumber(value)
  })
  return out
}

/**
 * Visit every stored entry. Dense matrices report zeros too; sparse ones
 * report what mathjs iterates.
 */
export function forEachEntry(
  matrix: LayerMatrix,
  visit: (row: number, column: number, value: number) => void
) {
  if (isDense(matrix)) {
    matrix.forEach((values, row) => {
      values.forEach((value, column) => visit(row, column, value))
    })
    return
  }
  matrix.forEach((value: unknown, position: number[]) => {
    visit(position[0], position[1], toNumber(value))
  })
}
