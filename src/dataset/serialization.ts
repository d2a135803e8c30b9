import { sparse } from 'mathjs'
import { ConfigurationError } from '../errors'
import { createDataset } from './dataset'
import { forEachEntry, isSparseLayer, matrixShape } from './matrix'
import type { CategoricalAnnotation, LayerMatrix, VelocityDataset } from './types'

export const DATASET_SCHEMA_VERSION = 1

export type CsrMatrixJson = {
  format: 'csr'
  shape: [number, number]
  data: number[]
  indices: number[]
  indptr: number[]
}

export type MatrixJson = number[][] | CsrMatrixJson

export type DatasetJson = {
  obsNames: string[]
  varNames: string[]
  X?: MatrixJson
  layers?: Record<string, MatrixJson>
  var?: Record<string, number[]>
  obs?: Record<string, CategoricalAnnotation>
  obsm?: Record<string, number[][]>
  connectivities?: MatrixJson
}

export type DatasetBundle = {
  schemaVersion: number
  dataset: DatasetJson
}

export function isDatasetBundle(value: unknown): value is DatasetBundle {
  if (typeof value !== 'object' || value === null) return false
  if (!('schemaVersion' in value) || typeof value.schemaVersion !== 'number') return false
  if (!('dataset' in value) || typeof value.dataset !== 'object' || value.dataset === null) return false
  const dataset = value.dataset
  return (
    'obsNames' in dataset &&
    Array.isArray(dataset.obsNames) &&
    'varNames' in dataset &&
    Array.isArray(dataset.varNames)
  )
}

function isCsr(value: MatrixJson): value is CsrMatrixJson {
  return !Array.isArray(value) && value.format === 'csr'
}

function csrToSparse(csr: CsrMatrixJson): LayerMatrix {
  const [rows, cols] = csr.shape
  const matrix = sparse()
  matrix.resize([rows, cols])
  for (let row = 0; row < rows; row += 1) {
    for (let k = csr.indptr[row]; k < csr.indptr[row + 1]; k += 1) {
      matrix.set([row, csr.indices[k]], csr.data[k])
    }
  }
  return matrix
}

function sparseToCsr(matrix: LayerMatrix): CsrMatrixJson {
  const [rows, cols] = matrixShape(matrix)
  const entries: Array<[number, number, number]> = []
  forEachEntry(matrix, (row, column, value) => {
    if (value !== 0) entries.push([row, column, value])
  })
  entries.sort((a, b) => a[0] - b[0] || a[1] - b[1])
  const indptr = new Array<number>(rows + 1).fill(0)
  for (const [row] of entries) indptr[row + 1] += 1
  for (let row = 0; row < rows; row += 1) indptr[row + 1] += indptr[row]
  return {
    format: 'csr',
    shape: [rows, cols],
    data: entries.map((entry) => entry[2]),
    indices: entries.map((entry) => entry[1]),
    indptr,
  }
}

function toMatrix(value: MatrixJson): LayerMatrix {
  return isCsr(value) ? csrToSparse(value) : value.map((row) => [...row])
}

function toMatrixJson(matrix: LayerMatrix): MatrixJson {
  if (isSparseLayer(matrix)) return sparseToCsr(matrix)
  return matrix.map((row) => [...row])
}

function checkShape(
  problems: string[],
  label: string,
  matrix: MatrixJson,
  expected: [number, number]
) {
  const shape = isCsr(matrix) ? matrix.shape : [matrix.length, matrix[0]?.length ?? 0]
  if (isCsr(matrix) && matrix.indptr.length !== shape[0] + 1) {
    problems.push(`${label}: indptr must have ${shape[0] + 1} entries.`)
  }
  if (shape[0] !== expected[0] || (expected[0] > 0 && shape[1] !== expected[1])) {
    problems.push(
      `${label}: expected shape ${expected[0]}×${expected[1]}, got ${shape[0]}×${shape[1]}.`
    )
  }
}

export function validateDatasetJson(json: DatasetJson): string[] {
  const problems: string[] = []
  if (!Array.isArray(json.obsNames)) problems.push('obsNames must be an array of strings.')
  if (!Array.isArray(json.varNames)) problems.push('varNames must be an array of strings.')
  if (problems.length > 0) return problems

  const nObs = json.obsNames.length
  const nVars = json.varNames.length
  const duplicates = json.varNames.filter((name, idx) => json.varNames.indexOf(name) !== idx)
  if (duplicates.length > 0) {
    problems.push(`Duplicate gene names: ${[...new Set(duplicates)].join(', ')}.`)
  }
  if (json.X) checkShape(problems, 'X', json.X, [nObs, nVars])
  for (const [name, layer] of Object.entries(json.layers ?? {})) {
    checkShape(problems, `layers.${name}`, layer, [nObs, nVars])
  }
  if (json.connectivities) {
    checkShape(problems, 'connectivities', json.connectivities, [nObs, nObs])
  }
  for (const [key, values] of Object.entries(json.var ?? {})) {
    if (values.length !== nVars) {
      problems.push(`var.${key}: expected ${nVars} values, got ${values.length}.`)
    }
  }
  for (const [key, annotation] of Object.entries(json.obs ?? {})) {
    if (annotation.codes.length !== nObs) {
      problems.push(`obs.${key}: expected ${nObs} codes, got ${annotation.codes.length}.`)
    }
    const outOfRange = annotation.codes.some(
      (code) => code < 0 || code >= annotation.categories.length
    )
    if (outOfRange) {
      problems.push(`obs.${key}: codes must index into ${annotation.categories.length} categories.`)
    }
  }
  for (const [key, coords] of Object.entries(json.obsm ?? {})) {
    if (coords.length !== nObs) {
      problems.push(`obsm.${key}: expected ${nObs} rows, got ${coords.length}.`)
    }
  }
  return problems
}

export function deserializeDataset(bundle: DatasetBundle): VelocityDataset {
  if (bundle.schemaVersion !== DATASET_SCHEMA_VERSION) {
    throw new ConfigurationError(`Unsupported dataset schema version: ${bundle.schemaVersion}.`)
  }
  const json = bundle.dataset
  const problems = validateDatasetJson(json)
  if (problems.length > 0) {
    throw new ConfigurationError('Dataset bundle does not match its declared shape.', problems)
  }
  const layers: Record<string, LayerMatrix> = {}
  for (const [name, layer] of Object.entries(json.layers ?? {})) {
    layers[name] = toMatrix(layer)
  }
  return createDataset({
    obsNames: json.obsNames,
    varNames: json.varNames,
    X: json.X ? toMatrix(json.X) : undefined,
    layers,
    var: json.var,
    obs: json.obs,
    obsm: json.obsm,
    connectivities: json.connectivities ? toMatrix(json.connectivities) : undefined,
  })
}

export function serializeDataset(dataset: VelocityDataset): DatasetBundle {
  const layers: Record<string, MatrixJson> = {}
  for (const [name, layer] of Object.entries(dataset.layers)) {
    layers[name] = toMatrixJson(layer)
  }
  return {
    schemaVersion: DATASET_SCHEMA_VERSION,
    dataset: {
      obsNames: [...dataset.obsNames],
      varNames: [...dataset.varNames],
      X: toMatrixJson(dataset.X),
      layers,
      var: structuredClone(dataset.var),
      obs: structuredClone(dataset.obs),
      obsm: structuredClone(dataset.obsm),
      connectivities: dataset.connectivities ? toMatrixJson(dataset.connectivities) : undefined,
    },
  }
}
