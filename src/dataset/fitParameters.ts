import { hasVarKey, varValue } from './dataset'
import type { VelocityDataset } from './types'

export type FitParameterName = 'offset' | 'beta' | 'gamma' | 'offset2'

export type FitParameters = Record<FitParameterName, number>

export const FIT_PARAMETER_FALLBACKS: Readonly<FitParameters> = {
  offset: 0,
  beta: 1,
  gamma: 1,
  offset2: 0,
}

export function fitParameterKey(fit: string, parameter: FitParameterName): string {
  return `${fit}_${parameter}`
}

export function hasFitParameter(
  dataset: VelocityDataset,
  fit: string,
  parameter: FitParameterName
): boolean {
  return hasVarKey(dataset, fitParameterKey(fit, parameter))
}

/**
 * Fit parameters for one gene. Absent or non-finite entries take the
 * fallback scalars (offset 0, beta 1, gamma 1, offset2 0).
 */
export function resolveFitParameters(
  dataset: VelocityDataset,
  fit: string,
  gene: string
): FitParameters {
  const lookup = (parameter: FitParameterName) =>
    varValue(dataset, fitParameterKey(fit, parameter), gene) ??
    FIT_PARAMETER_FALLBACKS[parameter]
  return {
    offset: lookup('offset'),
    beta: lookup('beta'),
    gamma: lookup('gamma'),
    offset2: lookup('offset2'),
  }
}
