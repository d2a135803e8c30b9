export type PlotlyThemeMode = 'light' | 'dark'

export type PlotlyThemeTokens = {
  background: string
  text: string
  /** Points drawn without a color source. */
  neutral: string
}

const THEME_TOKENS: Record<PlotlyThemeMode, PlotlyThemeTokens> = {
  dark: {
    background: '#353535',
    text: '#e1e1e1',
    neutral: '#9a9a9a',
  },
  light: {
    background: '#ffffff',
    text: '#1a1a1a',
    neutral: '#7f7f7f',
  },
}

export function resolvePlotlyThemeTokens(theme: PlotlyThemeMode = 'light'): PlotlyThemeTokens {
  return THEME_TOKENS[theme]
}
