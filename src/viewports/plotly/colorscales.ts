import registry from './colorscales.json'

export type ColorScaleStops = Array<[number, string]>

export type ResolvedColorScale = {
  colorscale: string | ColorScaleStops
  reversescale: boolean
}

export const FALLBACK_COLORSCALE = 'Viridis'

function toStops(value: unknown): ColorScaleStops | null {
  if (!Array.isArray(value)) return null
  const stops: ColorScaleStops = []
  for (const entry of value) {
    if (!Array.isArray(entry) || entry.length !== 2) return null
    const [position, color] = entry
    if (typeof position !== 'number' || typeof color !== 'string') return null
    stops.push([position, color])
  }
  return stops
}

const CUSTOM_SCALES = new Map<string, ColorScaleStops>()
for (const [name, stops] of Object.entries(registry.custom)) {
  const parsed = toStops(stops)
  if (parsed) CUSTOM_SCALES.set(name.toLowerCase(), parsed)
}

const BUILTIN_SCALES = new Map(registry.builtin.map((name) => [name.toLowerCase(), name]))

/**
 * Maps a color map name onto a Plotly colorscale. A `_r` suffix reverses
 * the scale; lookups ignore case. Unknown names fall back to Viridis.
 */
export function resolveColorScale(name: string): ResolvedColorScale {
  const reversed = name.endsWith('_r')
  const base = (reversed ? name.slice(0, -2) : name).toLowerCase()
  const custom = CUSTOM_SCALES.get(base)
  if (custom) return { colorscale: custom, reversescale: reversed }
  const builtin = BUILTIN_SCALES.get(base)
  if (builtin) return { colorscale: builtin, reversescale: reversed }
  return { colorscale: FALLBACK_COLORSCALE, reversescale: false }
}
