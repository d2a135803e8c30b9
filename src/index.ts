export { ConfigurationError } from './errors'
export { createPlotlyCollaborators, renderVelocityPanels } from './velocity'
export type { VelocityCollaborators, VelocityPlotResult } from './velocity'

export { createDataset, geneValues, varValue } from './dataset/dataset'
export { FIT_PARAMETER_FALLBACKS, resolveFitParameters } from './dataset/fitParameters'
export { deserializeDataset, isDatasetBundle, serializeDataset, DATASET_SCHEMA_VERSION } from './dataset/serialization'
export type { DatasetBundle, DatasetJson, MatrixJson } from './dataset/serialization'
export type { CategoricalAnnotation, LayerMatrix, RankingResult, VelocityDataset } from './dataset/types'

export { selectGenes, uniqueStable } from './selection/geneSelector'
export { resolveLayers } from './selection/layerResolver'
export { planLayout, slotAt } from './layout/layoutPlanner'
export type { LayoutPlan, PanelSlot } from './layout/layoutPlanner'
export { correctedCoordinates, stochasticLines } from './render/stochasticOverlay'

export { rankVelocityGenes } from './collaborators/rankVelocityGenes'
export { secondOrderMoments } from './collaborators/moments'
export type {
  GeneSlice,
  LineRequest,
  PanelSurface,
  RankGenes,
  ScatterRequest,
  SecondOrderMoments,
} from './collaborators/types'

export { createPlotDefaults } from './config/defaults'
export type { PlotDefaults } from './config/defaults'
export { parseVelocityPlotOptions, validateVelocityPlotOptions } from './config/options'
export type { VelocityPlotOptions } from './config/options'

export { createPlotlySurface } from './viewports/plotly/plotlyFigure'
export type { PlotlyFigure, PlotlySurface } from './viewports/plotly/plotlyFigure'
export { finalizeFigure } from './viewports/plotly/finalize'
export { createConsoleLogger, silentLogger } from './utils/logger'
export type { Logger } from './utils/logger'
