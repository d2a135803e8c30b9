import fs from 'node:fs'
import path from 'node:path'
import { createRequire } from 'node:module'
import { DEFAULT_DPI } from '../../config/defaults'
import { silentLogger } from '../../utils/logger'
import type { Logger } from '../../utils/logger'
import type { PlotlyFigure } from './plotlyFigure'

export const DEFAULT_FIGURE_NAME = 'velocity'
const SAVE_EXTENSIONS = ['.html', '.json']

export type FinalizeOptions = {
  show: boolean
  save: boolean | string
  dpi: number
  saveDir: string
  logger?: Logger
}

export type FinalizeResult = {
  figure?: PlotlyFigure
  savedTo?: string
}

/** `true` → velocity.html; a string is appended as `velocity_<save>`. */
export function resolveSavePath(save: boolean | string, saveDir: string): string | null {
  if (save === false || save === '') return null
  if (save === true) return path.join(saveDir, `${DEFAULT_FIGURE_NAME}.html`)
  const hasExtension = SAVE_EXTENSIONS.some((ext) => save.toLowerCase().endsWith(ext))
  const name = `${DEFAULT_FIGURE_NAME}_${save}${hasExtension ? '' : '.html'}`
  return path.join(saveDir, name)
}

export function withExportResolution(figure: PlotlyFigure, dpi: number): PlotlyFigure {
  const width = typeof figure.layout.width === 'number' ? figure.layout.width : 700
  const height = typeof figure.layout.height === 'number' ? figure.layout.height : 500
  return {
    ...figure,
    config: {
      ...figure.config,
      toImageButtonOptions: {
        format: 'png',
        filename: DEFAULT_FIGURE_NAME,
        width,
        height,
        scale: dpi / DEFAULT_DPI,
      },
    },
  }
}

function readPlotlyBundle(): string {
  const require = createRequire(import.meta.url)
  return fs.readFileSync(require.resolve('plotly.js-dist-min'), 'utf-8')
}

function escapeScript(source: string): string {
  return source.replace(/<\/script/gi, '<\\/script')
}

export function renderFigureHtml(figure: PlotlyFigure, plotlyBundle: string): string {
  const payload = escapeScript(JSON.stringify(figure))
  return [
    '<!DOCTYPE html>',
    '<html>',
    '<head>',
    '<meta charset="utf-8" />',
    `<title>${DEFAULT_FIGURE_NAME}</title>`,
    `<script>${escapeScript(plotlyBundle)}</script>`,
    '</head>',
    '<body>',
    '<div id="figure"></div>',
    '<script>',
    `const figure = ${payload};`,
    "Plotly.newPlot('figure', figure.data, figure.layout, figure.config);",
    '</script>',
    '</body>',
    '</html>',
    '',
  ].join('\n')
}

export function writeFigure(figure: PlotlyFigure, target: string, plotlyBundle?: () => string) {
  fs.mkdirSync(path.dirname(target), { recursive: true })
  if (target.toLowerCase().endsWith('.json')) {
    fs.writeFileSync(target, JSON.stringify(figure, null, 2))
    return
  }
  fs.writeFileSync(target, renderFigureHtml(figure, (plotlyBundle ?? readPlotlyBundle)()))
}

/**
 * Saves and/or shows the figure. Showing logs a summary and hands nothing
 * back; otherwise the figure is returned to the caller.
 */
export function finalizeFigure(figure: PlotlyFigure, options: FinalizeOptions): FinalizeResult {
  const logger = options.logger ?? silentLogger
  const resolved = withExportResolution(figure, options.dpi)
  const target = resolveSavePath(options.save, options.saveDir)
  if (target) {
    writeFigure(resolved, target)
    logger.info(`Saved figure to ${target}`)
  }
  if (options.show) {
    const [width, height] = [resolved.layout.width, resolved.layout.height]
    logger.info(`Figure ${width}×${height}px with ${resolved.data.length} traces`)
    return { savedTo: target ?? undefined }
  }
  return { figure: resolved, savedTo: target ?? undefined }
}
