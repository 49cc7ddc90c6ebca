import { InvalidGeometryError, UnknownVariantError } from '../errors'
import type { Domain, PlacementVariant, Vec3 } from '../types'
import { axisIndex, domainCenter, isAxis } from './axes'

export type ResolvedPlacement = {
  readonly referencePoint: Vec3
  readonly probePoint?: Vec3
  readonly domainView: boolean
}

/**
 * Anchors the antenna inside the domain.
 *
 * `centered` puts the feed at the domain midpoint. `ground-offset` keeps the
 * midpoint on two axes and pins the third to a fixed coordinate, adding a
 * receiver probe `probeDistance` further along that axis.
 */
export function resolvePlacement(domain: Domain, variant: PlacementVariant): ResolvedPlacement {
  switch (variant.kind) {
    case 'centered':
      return { referencePoint: domainCenter(domain), domainView: variant.domainView ?? true }
    case 'ground-offset': {
      if (!isAxis(variant.axis)) {
        throw new UnknownVariantError(`Unknown ground-offset axis: ${String(variant.axis)}`)
      }
      const extent = domain[variant.axis]
      if (!Number.isFinite(variant.position) || variant.position <= 0 || variant.position >= extent) {
        throw new InvalidGeometryError(
          `Ground offset ${variant.position} must lie strictly inside the domain along ${variant.axis}`,
          `domain ${variant.axis} extent is ${extent}`
        )
      }
      const probeDistance = variant.probeDistance ?? variant.position
      if (!Number.isFinite(probeDistance)) {
        throw new InvalidGeometryError(`Probe distance must be finite, got ${probeDistance}`)
      }
      const i = axisIndex(variant.axis)
      const center = domainCenter(domain)
      const referencePoint = withComponent(center, i, variant.position)
      const probePoint = withComponent(referencePoint, i, variant.position + probeDistance)
      return { referencePoint, probePoint, domainView: variant.domainView ?? false }
    }
    default: {
      const unknown: never = variant
      throw new UnknownVariantError(`Unknown placement variant: ${JSON.stringify(unknown)}`)
    }
  }
}

function withComponent(point: Vec3, index: 0 | 1 | 2, value: number): Vec3 {
  const out: [number, number, number] = [point[0], point[1], point[2]]
  out[index] = value
  return out
}
