import { ModelConfigError, UnknownVariantError } from './errors'
import { isAxis } from './geometry/axes'
import { isIdentifier } from './util/format'
import type {
  AntennaOrientation,
  BowtieSpec,
  Domain,
  FeedGap,
  GridSpacing,
  PlacementVariant,
  Snapshot,
  SourceType,
  Vec3,
  Waveform,
  WaveformType,
  WingGaps,
} from './types'

export const CONFIG_FORMAT = 'bowtie.model'

export type SourceConfig = {
  readonly type: SourceType
  readonly impedance?: number
}

export type ModelConfig = {
  readonly title: string
  readonly domain: Domain
  readonly spacing: GridSpacing
  readonly bowtie: BowtieSpec
  readonly variant: PlacementVariant
  readonly orientation?: AntennaOrientation
  readonly gaps?: WingGaps
  readonly timeWindow: number
  readonly waveform: Waveform
  readonly source: SourceConfig
  readonly snapshots?: readonly Snapshot[]
}

export const WAVEFORM_TYPES: readonly WaveformType[] = [
  'gaussian',
  'gaussiandot',
  'gaussiandotnorm',
  'gaussiandotdot',
  'gaussiandotdotnorm',
  'ricker',
  'sine',
  'contsine',
  'impulse',
]

export const SOURCE_TYPES: readonly SourceType[] = ['transmission_line', 'voltage_source', 'hertzian_dipole']

const PULSE: Waveform = { type: 'gaussian', amplitude: 1, frequency: 1e9, id: 'bowtie_pulse' }

export const centeredFreeSpace: ModelConfig = {
  title: 'Bowtie antenna in free space',
  domain: { x: 0.2, y: 0.2, z: 0.1 },
  spacing: { dx: 0.001, dy: 0.001, dz: 0.001 },
  bowtie: { length: 0.05, height: 0.1 },
  variant: { kind: 'centered', domainView: true },
  timeWindow: 3e-9,
  waveform: PULSE,
  source: { type: 'transmission_line', impedance: 73 },
}

export const groundOffsetWithProbe: ModelConfig = {
  title: 'Bowtie antenna above ground',
  domain: { x: 0.2, y: 0.12, z: 0.12 },
  spacing: { dx: 0.001, dy: 0.001, dz: 0.001 },
  bowtie: { length: 0.05, height: 0.1 },
  variant: { kind: 'ground-offset', axis: 'z', position: 0.02, probeDistance: 0.02, domainView: false },
  timeWindow: 3e-9,
  waveform: PULSE,
  source: { type: 'transmission_line', impedance: 73 },
}

type Json = Record<string, unknown>

function isRecord(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readNumber(obj: Json, key: string, path: string): number {
  const value = obj[key]
  if (typeof value !== 'number') {
    throw new ModelConfigError(`${path}.${key} must be a number`, `got ${JSON.stringify(value)}`)
  }
  return value
}

function readString(obj: Json, key: string, path: string): string {
  const value = obj[key]
  if (typeof value !== 'string') {
    throw new ModelConfigError(`${path}.${key} must be a string`, `got ${JSON.stringify(value)}`)
  }
  return value
}

function readSection(obj: Json, key: string): Json | undefined {
  const value = obj[key]
  if (value === undefined) return undefined
  if (!isRecord(value)) throw new ModelConfigError(`${key} must be an object`)
  return value
}

function readVec(value: unknown, path: string): Vec3 {
  if (!Array.isArray(value) || value.length !== 3 || !value.every((v) => typeof v === 'number')) {
    throw new ModelConfigError(`${path} must be an [x, y, z] array of numbers`)
  }
  return [Number(value[0]), Number(value[1]), Number(value[2])]
}

function parseVariant(raw: Json): PlacementVariant {
  const { domainView } = raw
  if (domainView !== undefined && typeof domainView !== 'boolean') {
    throw new ModelConfigError('variant.domainView must be a boolean', `got ${JSON.stringify(domainView)}`)
  }
  if (raw.kind === 'centered') return { kind: 'centered', domainView }
  if (raw.kind === 'ground-offset') {
    const { axis } = raw
    if (!isAxis(axis)) throw new UnknownVariantError(`Unknown ground-offset axis: ${JSON.stringify(axis)}`)
    return {
      kind: 'ground-offset',
      axis,
      position: readNumber(raw, 'position', 'variant'),
      probeDistance: raw.probeDistance === undefined ? undefined : readNumber(raw, 'probeDistance', 'variant'),
      domainView,
    }
  }
  throw new UnknownVariantError(`Unknown placement variant: ${JSON.stringify(raw.kind)}`)
}

function parseOrientation(raw: Json): AntennaOrientation {
  const { longitudinal, transverse } = raw
  if (!isAxis(longitudinal) || !isAxis(transverse)) {
    throw new UnknownVariantError(`Unknown antenna orientation: ${JSON.stringify(raw)}`)
  }
  return { longitudinal, transverse }
}

function parseGaps(value: unknown): WingGaps {
  if (!Array.isArray(value) || value.length !== 2) {
    throw new ModelConfigError('gaps must list exactly two wing gaps')
  }
  const gaps = value.map((raw, i): FeedGap => {
    if (!isRecord(raw)) throw new ModelConfigError(`gaps[${i}] must be an object`)
    const { axis } = raw
    if (!isAxis(axis)) throw new UnknownVariantError(`Unknown feed gap axis: ${JSON.stringify(axis)}`)
    return { axis, cells: readNumber(raw, 'cells', `gaps[${i}]`) }
  })
  return [gaps[0], gaps[1]]
}

function parseWaveform(raw: Json, fallback: Waveform): Waveform {
  const type = raw.type ?? fallback.type
  const known = WAVEFORM_TYPES.find((t) => t === type)
  if (!known) throw new ModelConfigError(`Unknown waveform type: ${JSON.stringify(type)}`)
  return {
    type: known,
    amplitude: raw.amplitude === undefined ? fallback.amplitude : readNumber(raw, 'amplitude', 'waveform'),
    frequency: raw.frequency === undefined ? fallback.frequency : readNumber(raw, 'frequency', 'waveform'),
    id: raw.id === undefined ? fallback.id : readString(raw, 'id', 'waveform'),
  }
}

function parseSource(raw: Json, fallback: SourceConfig): SourceConfig {
  const type = raw.type ?? fallback.type
  const known = SOURCE_TYPES.find((t) => t === type)
  if (!known) throw new ModelConfigError(`Unknown source type: ${JSON.stringify(type)}`)
  return {
    type: known,
    impedance: raw.impedance === undefined ? fallback.impedance : readNumber(raw, 'impedance', 'source'),
  }
}

function parseSnapshots(value: unknown): Snapshot[] {
  if (!Array.isArray(value)) throw new ModelConfigError('snapshots must be an array')
  return value.map((raw, i) => {
    const path = `snapshots[${i}]`
    if (!isRecord(raw)) throw new ModelConfigError(`${path} must be an object`)
    const step = readSection(raw, 'step')
    if (!step) throw new ModelConfigError(`${path}.step is required`)
    return {
      min: readVec(raw.min, `${path}.min`),
      max: readVec(raw.max, `${path}.max`),
      step: {
        dx: readNumber(step, 'dx', `${path}.step`),
        dy: readNumber(step, 'dy', `${path}.step`),
        dz: readNumber(step, 'dz', `${path}.step`),
      },
      time: readNumber(raw, 'time', path),
      id: readString(raw, 'id', path),
    }
  })
}

function requireIdentifier(label: string, value: string) {
  if (!isIdentifier(value)) {
    throw new ModelConfigError(`${label} must be a single non-blank token`, `got ${JSON.stringify(value)}`)
  }
}

// Every id lands unquoted in the line-oriented output
export function validateModelConfig(config: ModelConfig): ModelConfig {
  requireIdentifier('waveform.id', config.waveform.id)
  config.snapshots?.forEach((snapshot, i) => requireIdentifier(`snapshots[${i}].id`, snapshot.id))
  return config
}

/**
 * Validates a `{ format: 'bowtie.model', config }` document. Missing sections fall
 * back to the centered free-space preset; present ones must be complete.
 * Value ranges are left to the geometry builder.
 */
export function parseModelConfig(payload: unknown, defaults: ModelConfig = centeredFreeSpace): ModelConfig {
  if (!isRecord(payload) || payload.format !== CONFIG_FORMAT) {
    throw new ModelConfigError('Invalid config file format.', `expected format "${CONFIG_FORMAT}"`)
  }
  const config = payload.config === undefined ? {} : payload.config
  if (!isRecord(config)) throw new ModelConfigError('config must be an object')

  const domain = readSection(config, 'domain')
  const spacing = readSection(config, 'spacing')
  const bowtie = readSection(config, 'bowtie')
  const variant = readSection(config, 'variant')
  const orientation = readSection(config, 'orientation')
  const waveform = readSection(config, 'waveform')
  const source = readSection(config, 'source')

  return validateModelConfig({
    title: config.title === undefined ? defaults.title : readString(config, 'title', 'config'),
    domain: domain
      ? { x: readNumber(domain, 'x', 'domain'), y: readNumber(domain, 'y', 'domain'), z: readNumber(domain, 'z', 'domain') }
      : defaults.domain,
    spacing: spacing
      ? {
          dx: readNumber(spacing, 'dx', 'spacing'),
          dy: readNumber(spacing, 'dy', 'spacing'),
          dz: readNumber(spacing, 'dz', 'spacing'),
        }
      : defaults.spacing,
    bowtie: bowtie
      ? { length: readNumber(bowtie, 'length', 'bowtie'), height: readNumber(bowtie, 'height', 'bowtie') }
      : defaults.bowtie,
    variant: variant ? parseVariant(variant) : defaults.variant,
    orientation: orientation ? parseOrientation(orientation) : defaults.orientation,
    gaps: config.gaps === undefined ? defaults.gaps : parseGaps(config.gaps),
    timeWindow: config.timeWindow === undefined ? defaults.timeWindow : readNumber(config, 'timeWindow', 'config'),
    waveform: waveform ? parseWaveform(waveform, defaults.waveform) : defaults.waveform,
    source: source ? parseSource(source, defaults.source) : defaults.source,
    snapshots: config.snapshots === undefined ? defaults.snapshots : parseSnapshots(config.snapshots),
  })
}
