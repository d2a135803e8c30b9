export type ColorMapSpec =
  | { kind: 'single'; name: string }
  | { kind: 'paired'; velocity: string; expression: string }

export type ColorMapInput = string | [string, string]

export function toColorMapSpec(input: ColorMapInput): ColorMapSpec {
  if (typeof input === 'string') return { kind: 'single', name: input }
  return { kind: 'paired', velocity: input[0], expression: input[1] }
}

/** Paired maps pick the expression map for primary-abundance panels. */
export function pickColorMap(spec: ColorMapSpec, primary: boolean): string {
  switch (spec.kind) {
    case 'single':
      return spec.name
    case 'paired':
      return primary ? spec.expression : spec.velocity
  }
}
