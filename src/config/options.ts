import { ConfigurationError } from '../errors'
import { toColorMapSpec } from '../render/colorMap'
import type { LegendLoc } from '../collaborators/types'
import type { VelocityDataset } from '../dataset/types'
import type { ColorMapInput } from '../render/colorMap'
import type { PanelStyle } from '../render/panelStyle'
import type { GeneSelection } from '../selection/geneSelector'
import type { LayerRequest } from '../selection/layerResolver'
import type { PlotDefaults } from './defaults'

export const LEGEND_LOCATIONS: readonly LegendLoc[] = [
  'none',
  'right margin',
  'on data',
  'upper right',
  'upper left',
  'lower right',
  'lower left',
  'best',
]

/** Every option the velocity panel plot accepts. */
export type VelocityPlotOptions = {
  /** Gene or genes to show; ignored when `groupby` names a cell annotation. */
  varNames?: string | string[]
  /** Cell annotation whose per-group velocity ranking picks the genes. */
  groupby?: string
  /** Restrict `groupby` to groups whose label contains one of these tokens. */
  groups?: string | string[]
  vkey?: string
  /** Embedding for layer panels, e.g. `umap` or `X_umap`. */
  basis?: string
  /** Adds the two covariance panels per gene. */
  mode?: 'stochastic'
  /** `all` takes every layer name as a candidate fit. */
  fits?: 'all' | string[]
  /** `all` shows the velocity and expression layers. */
  layers?: 'all' | string[]
  color?: string
  /** A single map, or `[velocityMap, expressionMap]`. */
  colorMap?: ColorMapInput
  colorbar?: boolean
  perc?: [number, number]
  alpha?: number
  size?: number
  legendLoc?: LegendLoc
  legendFontSize?: number
  /** Use raw spliced/unspliced counts even when moments are present. */
  useRaw?: boolean
  fontSize?: number
  figsize?: [number, number]
  dpi?: number
  /** Genes per grid row. */
  ncols?: number
  show?: boolean
  /** `true` saves `velocity.html`; a string is appended to that name. */
  save?: boolean | string
  saveDir?: string
}

export type OptionsValidation = {
  valid: boolean
  errors: string[]
  warnings: string[]
}

type Parsed<T> = { ok: true; value: T } | { ok: false; error: string }

const ok = <T>(value: T): Parsed<T> => ({ ok: true, value })
const fail = <T>(error: string): Parsed<T> => ({ ok: false, error })

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((entry) => typeof entry === 'string')

const parseString = (value: unknown): Parsed<string> =>
  typeof value === 'string' && value.length > 0 ? ok(value) : fail('must be a non-empty string')

const parseBoolean = (value: unknown): Parsed<boolean> =>
  typeof value === 'boolean' ? ok(value) : fail('must be a boolean')

const parsePositive = (value: unknown): Parsed<number> =>
  typeof value === 'number' && Number.isFinite(value) && value > 0
    ? ok(value)
    : fail('must be a positive number')

const parseStringOrList = (value: unknown): Parsed<string | string[]> => {
  if (typeof value === 'string') return ok(value)
  return isStringArray(value) ? ok([...value]) : fail('must be a string or a list of strings')
}

const parseAllOrList = (value: unknown): Parsed<'all' | string[]> => {
  if (value === 'all') return ok('all')
  return isStringArray(value) ? ok([...value]) : fail('must be "all" or a list of strings')
}

const parsePair = (value: unknown): Parsed<[number, number]> => {
  if (!Array.isArray(value) || value.length !== 2) return fail('must be a pair of numbers')
  const [a, b] = value
  if (typeof a !== 'number' || typeof b !== 'number' || !Number.isFinite(a) || !Number.isFinite(b)) {
    return fail('must be a pair of numbers')
  }
  return ok([a, b])
}

const parseFigsize = (value: unknown): Parsed<[number, number]> => {
  const pair = parsePair(value)
  if (!pair.ok) return pair
  return pair.value.every((side) => parsePositive(side).ok) ? pair : fail('must be two positive sizes')
}

const parsePerc = (value: unknown): Parsed<[number, number]> => {
  const pair = parsePair(value)
  if (!pair.ok) return pair
  const [lo, hi] = pair.value
  return lo >= 0 && hi <= 100 && lo < hi ? pair : fail('must be two percentiles with 0 <= low < high <= 100')
}

const parseColorMap = (value: unknown): Parsed<ColorMapInput> => {
  if (typeof value === 'string' && value.length > 0) return ok(value)
  if (isStringArray(value) && value.length === 2) return ok([value[0], value[1]])
  return fail('must be a color map name or a [velocity, expression] pair')
}

const parseMode = (value: unknown): Parsed<'stochastic'> =>
  value === 'stochastic' ? ok('stochastic') : fail('must be "stochastic"')

const parseLegendLoc = (value: unknown): Parsed<LegendLoc> => {
  const match = LEGEND_LOCATIONS.find((loc) => loc === value)
  return match ? ok(match) : fail(`must be one of ${LEGEND_LOCATIONS.join(', ')}`)
}

const parseAlpha = (value: unknown): Parsed<number> =>
  typeof value === 'number' && value >= 0 && value <= 1 ? ok(value) : fail('must be between 0 and 1')

const parseColumns = (value: unknown): Parsed<number> =>
  typeof value === 'number' && Number.isInteger(value) && value >= 1
    ? ok(value)
    : fail('must be a positive integer')

const parseSave = (value: unknown): Parsed<boolean | string> =>
  typeof value === 'boolean' || typeof value === 'string' ? ok(value) : fail('must be a boolean or a string')

type OptionParsers = {
  [K in keyof Required<VelocityPlotOptions>]: (value: unknown) => Parsed<Required<VelocityPlotOptions>[K]>
}

const OPTION_PARSERS: OptionParsers = {
  varNames: parseStringOrList,
  groupby: parseString,
  groups: parseStringOrList,
  vkey: parseString,
  basis: parseString,
  mode: parseMode,
  fits: parseAllOrList,
  layers: parseAllOrList,
  color: parseString,
  colorMap: parseColorMap,
  colorbar: parseBoolean,
  perc: parsePerc,
  alpha: parseAlpha,
  size: parsePositive,
  legendLoc: parseLegendLoc,
  legendFontSize: parsePositive,
  useRaw: parseBoolean,
  fontSize: parsePositive,
  figsize: parseFigsize,
  dpi: parsePositive,
  ncols: parseColumns,
  show: parseBoolean,
  save: parseSave,
  saveDir: parseString,
}

const OPTION_KEYS = Object.keys(OPTION_PARSERS)

function isOptionKey(key: string): key is keyof VelocityPlotOptions {
  return OPTION_KEYS.includes(key)
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function assign<K extends keyof VelocityPlotOptions>(
  target: VelocityPlotOptions,
  key: K,
  raw: unknown,
  errors: string[]
) {
  const parsed = OPTION_PARSERS[key](raw)
  if (parsed.ok) {
    target[key] = parsed.value
  } else {
    errors.push(`${key} ${parsed.error}.`)
  }
}

/**
 * Checks an untyped option bag (for example a JSON config file). Unknown keys
 * are errors; keys set to `undefined` or `null` count as unset.
 */
export function parseVelocityPlotOptions(input: unknown): {
  options: VelocityPlotOptions
  validation: OptionsValidation
} {
  const options: VelocityPlotOptions = {}
  const errors: string[] = []
  const warnings: string[] = []
  if (!isRecord(input)) {
    errors.push('Options must be an object.')
    return { options, validation: { valid: false, errors, warnings } }
  }
  for (const key of Object.keys(input).sort()) {
    const raw = input[key]
    if (!isOptionKey(key)) {
      errors.push(`Unknown option "${key}".`)
      continue
    }
    if (raw === undefined || raw === null) continue
    assign(options, key, raw, errors)
  }
  if (options.groupby !== undefined && options.varNames !== undefined) {
    warnings.push('Both varNames and groupby are set; groupby takes precedence when it names a cell annotation.')
  }
  if (options.groups !== undefined && options.groupby === undefined) {
    warnings.push('groups has no effect without groupby.')
  }
  return { options, validation: { valid: errors.length === 0, errors, warnings } }
}

export function validateVelocityPlotOptions(input: unknown): OptionsValidation {
  return parseVelocityPlotOptions(input).validation
}

export type ResolvedVelocityPlotOptions = {
  selection: GeneSelection
  layerRequest: LayerRequest
  basis: string | undefined
  style: PanelStyle
  ncols: number
  figsize: [number, number]
  dpi: number
  show: boolean
  save: boolean | string
  saveDir: string
}

export const DEFAULT_SAVE_DIR = './figures'

/**
 * Validates `options` and fills every gap from `defaults`. Invalid options
 * throw a ConfigurationError listing each problem.
 */
export function resolveVelocityPlotOptions(
  options: VelocityPlotOptions,
  dataset: VelocityDataset,
  defaults: PlotDefaults
): ResolvedVelocityPlotOptions {
  const { options: checked, validation } = parseVelocityPlotOptions(options)
  if (!validation.valid) {
    throw new ConfigurationError('Invalid velocity plot options.', validation.errors)
  }
  const vkey = checked.vkey ?? 'velocity'
  return {
    selection: {
      varNames: checked.varNames,
      groupby: checked.groupby,
      groups: checked.groups,
      vkey,
    },
    layerRequest: {
      vkey,
      useRaw: checked.useRaw ?? false,
      layers: checked.layers ?? 'all',
      fits: checked.fits ?? ['velocity', 'dynamics'],
      stochastic: checked.mode === 'stochastic',
    },
    basis: defaults.basis(dataset, checked.basis),
    style: {
      color: checked.color,
      colorMap: toColorMapSpec(checked.colorMap ?? defaults.colorMap),
      colorbar: checked.colorbar ?? true,
      perc: checked.perc ?? [2, 98],
      alpha: checked.alpha ?? 0.5,
      size: checked.size ?? defaults.size(dataset),
      fontSize: checked.fontSize ?? defaults.fontSize,
      legendLoc: checked.legendLoc ?? 'none',
      legendFontSize: checked.legendFontSize ?? 8,
    },
    ncols: checked.ncols ?? 1,
    figsize: checked.figsize ?? defaults.figsize,
    dpi: checked.dpi ?? defaults.dpi,
    show: checked.show ?? true,
    save: checked.save ?? false,
    saveDir: checked.saveDir ?? DEFAULT_SAVE_DIR,
  }
}
