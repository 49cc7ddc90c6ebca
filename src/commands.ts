import { DEFAULT_IMPEDANCE } from './config'
import type {
  BowtieGeometry,
  Domain,
  GeometryView,
  GridSpacing,
  ReceiverProbe,
  Snapshot,
  SourceType,
  TransmissionLineSource,
  Triangle,
  Vec3,
  Waveform,
} from './types'

export type ModelCommand =
  | { readonly kind: 'title'; readonly text: string }
  | { readonly kind: 'domain'; readonly size: Vec3 }
  | { readonly kind: 'dx_dy_dz'; readonly step: Vec3 }
  | { readonly kind: 'time_window'; readonly seconds: number }
  | { readonly kind: 'waveform'; readonly waveform: Waveform }
  | { readonly kind: 'source'; readonly source: TransmissionLineSource }
  | { readonly kind: 'rx'; readonly position: Vec3 }
  | { readonly kind: 'triangle'; readonly triangle: Triangle }
  | { readonly kind: 'snapshot'; readonly snapshot: Snapshot }
  | { readonly kind: 'geometry_view'; readonly view: GeometryView }

export type ModelCommandKind = ModelCommand['kind']

export type EmitOptions = {
  readonly title: string
  readonly domain: Domain
  readonly spacing: GridSpacing
  readonly timeWindow: number
  readonly waveform: Waveform
  readonly source: TransmissionLineSource
  readonly geometry: BowtieGeometry
  readonly probe?: ReceiverProbe
  readonly includeDomainView?: boolean
  readonly snapshots?: readonly Snapshot[]
}

// Excitation at the feed point, polarised along the wing axis
export function createSource(
  type: SourceType,
  geometry: BowtieGeometry,
  waveform: Waveform,
  impedance: number = DEFAULT_IMPEDANCE
): TransmissionLineSource {
  return {
    type,
    polarisation: geometry.orientation.longitudinal,
    position: geometry.feedPoint,
    impedance,
    waveformId: waveform.id,
  }
}

// Geometry is expected to come from buildBowtieGeometry, nothing is re-validated here.
export function emitModel(options: EmitOptions): ModelCommand[] {
  const { domain, spacing, geometry } = options
  const commands: ModelCommand[] = [
    { kind: 'title', text: options.title },
    { kind: 'domain', size: [domain.x, domain.y, domain.z] },
    { kind: 'dx_dy_dz', step: [spacing.dx, spacing.dy, spacing.dz] },
    { kind: 'time_window', seconds: options.timeWindow },
    { kind: 'waveform', waveform: options.waveform },
    { kind: 'source', source: options.source },
  ]
  if (options.probe) {
    commands.push({ kind: 'rx', position: options.probe.position })
  }
  for (const triangle of geometry.wings) {
    commands.push({ kind: 'triangle', triangle })
  }
  for (const snapshot of options.snapshots ?? []) {
    commands.push({ kind: 'snapshot', snapshot })
  }
  if (options.includeDomainView) {
    commands.push({ kind: 'geometry_view', view: geometry.views.domain })
  }
  commands.push({ kind: 'geometry_view', view: geometry.views.detail })
  return commands
}
