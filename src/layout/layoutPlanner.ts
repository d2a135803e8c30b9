export const PANEL_WSPACE = 0.5
export const PANEL_HSPACE = 0.8

export type PanelRole =
  | { kind: 'phase' }
  | { kind: 'layer'; layer: string }
  | { kind: 'stochastic' }
  | { kind: 'stochastic-aux' }

export type PanelSlot = {
  /** Flat, row-major position in the grid. */
  index: number
  geneIndex: number
  gene: string
  offset: number
  row: number
  column: number
  role: PanelRole
}

export type FigureSize = {
  /** Inches, as requested per panel pair. */
  inches: [number, number]
  pixels: [number, number]
}

export type LayoutPlan = {
  genes: string[]
  panelsPerGene: number
  genesPerRow: number
  rows: number
  totalColumns: number
  slots: PanelSlot[]
  figure: FigureSize
}

export type LayoutRequest = {
  genes: string[]
  extraLayers: string[]
  stochastic: boolean
  ncols?: number
  figsize: [number, number]
  /** Screen pixels per inch. */
  pixelsPerInch: number
}

export function panelsPerGene(extraLayerCount: number, stochastic: boolean): number {
  return 1 + extraLayerCount + (stochastic ? 2 : 0)
}

export function gridShape(geneCount: number, perGene: number, ncols = 1) {
  const genesPerRow = Math.max(1, Math.trunc(ncols))
  return {
    genesPerRow,
    rows: Math.ceil(geneCount / genesPerRow),
    totalColumns: genesPerRow * perGene,
  }
}

/**
 * Figure size grows linearly with the grid: every pair of columns (rows)
 * takes one `figsize` width (height).
 */
export function figureSize(
  rows: number,
  totalColumns: number,
  figsize: [number, number],
  pixelsPerInch: number
): FigureSize {
  const inches: [number, number] = [(figsize[0] * totalColumns) / 2, (figsize[1] * rows) / 2]
  return {
    inches,
    pixels: [Math.round(inches[0] * pixelsPerInch), Math.round(inches[1] * pixelsPerInch)],
  }
}

function roleAt(offset: number, extraLayers: string[]): PanelRole {
  if (offset === 0) return { kind: 'phase' }
  if (offset <= extraLayers.length) return { kind: 'layer', layer: extraLayers[offset - 1] }
  if (offset === extraLayers.length + 1) return { kind: 'stochastic' }
  return { kind: 'stochastic-aux' }
}

export function planLayout(request: LayoutRequest): LayoutPlan {
  const perGene = panelsPerGene(request.extraLayers.length, request.stochastic)
  const { genesPerRow, rows, totalColumns } = gridShape(request.genes.length, perGene, request.ncols)
  const slots: PanelSlot[] = []
  request.genes.forEach((gene, geneIndex) => {
    for (let offset = 0; offset < perGene; offset += 1) {
      const index = geneIndex * perGene + offset
      slots.push({
        index,
        geneIndex,
        gene,
        offset,
        row: Math.floor(index / totalColumns),
        column: index % totalColumns,
        role: roleAt(offset, request.extraLayers),
      })
    }
  })
  return {
    genes: [...request.genes],
    panelsPerGene: perGene,
    genesPerRow,
    rows,
    totalColumns,
    slots,
    figure: figureSize(rows, totalColumns, request.figsize, request.pixelsPerInch),
  }
}

export function slotAt(plan: LayoutPlan, geneIndex: number, offset: number): PanelSlot {
  if (offset < 0 || offset >= plan.panelsPerGene) {
    throw new RangeError(`Panel offset ${offset} is outside 0..${plan.panelsPerGene - 1}.`)
  }
  const slot = plan.slots[geneIndex * plan.panelsPerGene + offset]
  if (!slot) {
    throw new RangeError(`Gene index ${geneIndex} is outside the plan.`)
  }
  return slot
}

export function geneSlots(plan: LayoutPlan, geneIndex: number): PanelSlot[] {
  const start = geneIndex * plan.panelsPerGene
  return plan.slots.slice(start, start + plan.panelsPerGene)
}

function spanDomain(position: number, count: number, spacing: number): [number, number] {
  const size = 1 / (count + (count - 1) * spacing)
  const start = position * size * (1 + spacing)
  return [start, Math.min(1, start + size)]
}

/** Paper-coordinate domains of a slot; rows count from the top. */
export function slotDomain(plan: LayoutPlan, slot: PanelSlot) {
  const x = spanDomain(slot.column, plan.totalColumns, PANEL_WSPACE)
  const fromTop = spanDomain(slot.row, plan.rows, PANEL_HSPACE)
  const y: [number, number] = [Math.max(0, 1 - fromTop[1]), 1 - fromTop[0]]
  return { x, y }
}
