export * from './types'
export * from './errors'
export { resolvePlacement, type ResolvedPlacement } from './geometry/placement'
export { buildBowtieGeometry, defaultGaps, validateTriangle, type BowtieBuildInput } from './geometry/bowtie'
export { createSource, emitModel, type EmitOptions, type ModelCommand, type ModelCommandKind } from './commands'
export { formatCommand, translateToGprMax } from './translators'
export { formatNumber, isIdentifier } from './util/format'
export {
  CONFIG_FORMAT,
  centeredFreeSpace,
  groundOffsetWithProbe,
  parseModelConfig,
  validateModelConfig,
  type ModelConfig,
  type SourceConfig,
} from './modelConfig'
export { buildBowtieModel, type BowtieModel } from './model'
export { exportOBJ, exportSTL } from './mesh/meshGen'
