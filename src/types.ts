export type Axis = 'x' | 'y' | 'z'

export type Vec3 = readonly [number, number, number]

export type Domain = {
  readonly x: number
  readonly y: number
  readonly z: number
}

export type GridSpacing = {
  readonly dx: number
  readonly dy: number
  readonly dz: number
}

export type BowtieSpec = {
  readonly length: number
  readonly height: number
}

export type AntennaOrientation = {
  readonly longitudinal: Axis
  readonly transverse: Axis
}

// Translation of one wing away from the feed, in grid cells along `axis`
export type FeedGap = {
  readonly axis: Axis
  readonly cells: number
}

export type WingGaps = readonly [FeedGap, FeedGap]

export type Triangle = {
  readonly vertices: readonly [Vec3, Vec3, Vec3]
  readonly thickness: number
  readonly material: string
}

export type Bounds = {
  readonly min: Vec3
  readonly max: Vec3
}

export type ViewMode = 'fine' | 'coarse'

export type GeometryView = Bounds & {
  readonly step: GridSpacing
  readonly id: string
  readonly mode: ViewMode
}

export type WaveformType =
  | 'gaussian'
  | 'gaussiandot'
  | 'gaussiandotnorm'
  | 'gaussiandotdot'
  | 'gaussiandotdotnorm'
  | 'ricker'
  | 'sine'
  | 'contsine'
  | 'impulse'

export type Waveform = {
  readonly type: WaveformType
  readonly amplitude: number
  readonly frequency: number
  readonly id: string
}

export type SourceType = 'transmission_line' | 'voltage_source' | 'hertzian_dipole'

export type TransmissionLineSource = {
  readonly type: SourceType
  readonly polarisation: Axis
  readonly position: Vec3
  readonly impedance: number
  readonly waveformId: string
}

export type ReceiverProbe = {
  readonly position: Vec3
}

export type Snapshot = Bounds & {
  readonly step: GridSpacing
  readonly time: number
  readonly id: string
}

export type PlacementVariant =
  | { readonly kind: 'centered'; readonly domainView?: boolean }
  | {
      readonly kind: 'ground-offset'
      readonly axis: Axis
      readonly position: number
      readonly probeDistance?: number
      readonly domainView?: boolean
    }

export type BowtieGeometry = {
  readonly referencePoint: Vec3
  readonly feedPoint: Vec3
  readonly orientation: AntennaOrientation
  readonly wings: readonly [Triangle, Triangle]
  readonly probePoint?: Vec3
  readonly antennaBounds: Bounds
  // Whether the placement asks for the full-domain geometry view
  readonly domainViewRequested: boolean
  readonly views: {
    readonly domain: GeometryView
    readonly detail: GeometryView
  }
}
