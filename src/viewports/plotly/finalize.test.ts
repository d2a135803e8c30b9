import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { finalizeFigure, renderFigureHtml, resolveSavePath, withExportResolution, writeFigure } from './finalize'
import type { PlotlyFigure } from './plotlyFigure'

function makeFigure(): PlotlyFigure {
  return {
    data: [{ type: 'scatter', x: [1, 2], y: [3, 4] }],
    layout: { width: 840, height: 400 },
    config: { displaylogo: false },
  }
}

describe('resolveSavePath', () => {
  it('skips saving when disabled', () => {
    expect(resolveSavePath(false, 'figures')).toBeNull()
    expect(resolveSavePath('', 'figures')).toBeNull()
  })

  it('uses the default name for true', () => {
    expect(resolveSavePath(true, 'figures')).toBe(path.join('figures', 'velocity.html'))
  })

  it('appends a suffix and keeps known extensions', () => {
    expect(resolveSavePath('pancreas', 'out')).toBe(path.join('out', 'velocity_pancreas.html'))
    expect(resolveSavePath('pancreas.json', 'out')).toBe(path.join('out', 'velocity_pancreas.json'))
    expect(resolveSavePath('pancreas.HTML', 'out')).toBe(path.join('out', 'velocity_pancreas.HTML'))
  })
})

describe('withExportResolution', () => {
  it('scales image export by dpi relative to 80', () => {
    const figure = withExportResolution(makeFigure(), 160)
    expect(figure.config.toImageButtonOptions).toEqual({
      format: 'png',
      filename: 'velocity',
      width: 840,
      height: 400,
      scale: 2,
    })
    expect(figure.config.displaylogo).toBe(false)
  })
})

describe('renderFigureHtml', () => {
  it('embeds the bundle and escapes closing script tags', () => {
    const figure = makeFigure()
    figure.layout.title = { text: '</script>' }
    const html = renderFigureHtml(figure, 'window.Plotly = {}')
    expect(html).toContain('<script>window.Plotly = {}</script>')
    expect(html).toContain('<\\/script>')
    expect(html).toContain("Plotly.newPlot('figure', figure.data, figure.layout, figure.config);")
  })
})

describe('writing figures', () => {
  let dir = ''

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'velocity-figure-'))
  })

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it('writes JSON targets as the raw figure', () => {
    const target = path.join(dir, 'nested', 'figure.json')
    writeFigure(makeFigure(), target)
    const written: unknown = JSON.parse(fs.readFileSync(target, 'utf-8'))
    expect(written).toEqual(makeFigure())
  })

  it('writes HTML with the given bundle', () => {
    const target = path.join(dir, 'figure.html')
    writeFigure(makeFigure(), target, () => '/* plotly */')
    expect(fs.readFileSync(target, 'utf-8')).toContain('<script>/* plotly */</script>')
  })

  it('returns the figure when not shown', () => {
    const result = finalizeFigure(makeFigure(), { show: false, save: 'run.json', dpi: 80, saveDir: dir })
    expect(result.savedTo).toBe(path.join(dir, 'velocity_run.json'))
    expect(result.figure?.config.toImageButtonOptions?.scale).toBe(1)
    expect(fs.existsSync(path.join(dir, 'velocity_run.json'))).toBe(true)
  })

  it('hands nothing back when shown', () => {
    const messages: string[] = []
    const logger = { debug: () => {}, info: (message: string) => messages.push(message), warn: () => {} }
    const result = finalizeFigure(makeFigure(), { show: true, save: false, dpi: 80, saveDir: dir, logger })
    expect(result).toEqual({ savedTo: undefined })
    expect(messages).toEqual(['Figure 840×400px with 1 traces'])
  })
})
