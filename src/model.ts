import { createSource, emitModel, type ModelCommand } from './commands'
import { buildBowtieGeometry } from './geometry/bowtie'
import { validateModelConfig, type ModelConfig } from './modelConfig'
import { translateToGprMax } from './translators'
import type { BowtieGeometry } from './types'
import { logDebug } from './util/log'

export type BowtieModel = {
  readonly geometry: BowtieGeometry
  readonly commands: readonly ModelCommand[]
  readonly text: string
}

export function buildBowtieModel(config: ModelConfig): BowtieModel {
  validateModelConfig(config)
  const geometry = buildBowtieGeometry({
    domain: config.domain,
    spacing: config.spacing,
    bowtie: config.bowtie,
    variant: config.variant,
    orientation: config.orientation,
    gaps: config.gaps,
  })
  const source = createSource(config.source.type, geometry, config.waveform, config.source.impedance)
  const commands = emitModel({
    title: config.title,
    domain: config.domain,
    spacing: config.spacing,
    timeWindow: config.timeWindow,
    waveform: config.waveform,
    source,
    geometry,
    probe: geometry.probePoint ? { position: geometry.probePoint } : undefined,
    includeDomainView: geometry.domainViewRequested,
    snapshots: config.snapshots,
  })
  logDebug(`emitted ${commands.length} commands for "${config.title}"`)
  return { geometry, commands, text: translateToGprMax(commands) }
}
