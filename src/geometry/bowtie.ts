import { Box3, Triangle as Facet, Vector3 } from 'three'
import {
  DEFAULT_MATERIAL,
  DEFAULT_ORIENTATION,
  DETAIL_PADDING_CELLS,
  DETAIL_VIEW_ID,
  DOMAIN_VIEW_ID,
} from '../config'
import { DegenerateGeometryError, InvalidGeometryError, UnknownVariantError } from '../errors'
import type {
  AntennaOrientation,
  Axis,
  BowtieGeometry,
  BowtieSpec,
  Bounds,
  Domain,
  FeedGap,
  GridSpacing,
  PlacementVariant,
  Triangle,
  Vec3,
  WingGaps,
} from '../types'
import { isIdentifier } from '../util/format'
import { logDebug, logWarn } from '../util/log'
import { axisIndex, isAxis, remainingAxis, spacingAlong } from './axes'
import { resolvePlacement } from './placement'

export type BowtieBuildInput = {
  readonly domain: Domain
  readonly spacing: GridSpacing
  readonly bowtie: BowtieSpec
  readonly variant: PlacementVariant
  readonly orientation?: AntennaOrientation
  // Per-wing translation away from the feed; defaults to one cell along the longitudinal axis
  readonly gaps?: WingGaps
  readonly material?: string
  readonly thickness?: number
}

const TOLERANCE = 1e-12

export function defaultGaps(orientation: AntennaOrientation = DEFAULT_ORIENTATION): WingGaps {
  const gap: FeedGap = { axis: orientation.longitudinal, cells: 1 }
  return [gap, gap]
}

export function buildBowtieGeometry(input: BowtieBuildInput): BowtieGeometry {
  const { domain, spacing, bowtie } = input
  requirePositive('domain.x', domain.x)
  requirePositive('domain.y', domain.y)
  requirePositive('domain.z', domain.z)
  requirePositive('spacing.dx', spacing.dx)
  requirePositive('spacing.dy', spacing.dy)
  requirePositive('spacing.dz', spacing.dz)
  requirePositive('bowtie.length', bowtie.length)
  requirePositive('bowtie.height', bowtie.height)
  const thickness = input.thickness ?? 0
  if (!Number.isFinite(thickness) || thickness < 0) {
    throw new InvalidGeometryError(`thickness must be a non-negative number, got ${thickness}`)
  }

  const orientation = resolveOrientation(input.orientation ?? DEFAULT_ORIENTATION)
  const gaps = input.gaps ?? defaultGaps(orientation)
  gaps.forEach((gap, i) => validateGap(gap, i + 1))

  const placement = resolvePlacement(domain, input.variant)
  const reference = new Vector3(...placement.referencePoint)
  logDebug('reference point', placement.referencePoint)

  const normal = remainingAxis(orientation.longitudinal, orientation.transverse)
  const material = input.material ?? DEFAULT_MATERIAL
  if (!isIdentifier(material)) {
    throw new InvalidGeometryError(`material must be a single non-blank token, got ${JSON.stringify(material)}`)
  }
  const wings: [Triangle, Triangle] = [
    buildWing(reference, 1, bowtie, orientation, gaps[0], spacing, thickness, material),
    buildWing(reference, -1, bowtie, orientation, gaps[1], spacing, thickness, material),
  ]

  const domainBox = new Box3(new Vector3(0, 0, 0), new Vector3(domain.x, domain.y, domain.z))
  assertInside(domainBox, placement.referencePoint, 'reference point')
  const clearance = Math.min(spacing.dx, spacing.dy, spacing.dz)
  wings.forEach((wing, i) => {
    validateTriangle(wing, normal)
    wing.vertices.forEach((v, j) => {
      const gap = reference.distanceTo(new Vector3(...v))
      if (gap < clearance - TOLERANCE) {
        throw new InvalidGeometryError(
          `wing ${i + 1} vertex ${j + 1} is closer to the feed than one grid step`,
          `distance ${gap}, grid step ${clearance}`
        )
      }
    })
    wing.vertices.forEach((v, j) => assertInside(domainBox, v, `wing ${i + 1} vertex ${j + 1}`))
  })
  if (placement.probePoint) assertInside(domainBox, placement.probePoint, 'receiver probe')

  const antennaBox = new Box3().setFromPoints(wings.flatMap((w) => w.vertices.map((v) => new Vector3(...v))))
  const padding = new Vector3(spacing.dx, spacing.dy, spacing.dz).multiplyScalar(DETAIL_PADDING_CELLS)
  const detailBox = antennaBox.clone().expandByVector(padding)
  if (!domainBox.containsBox(detailBox)) {
    logWarn('detail geometry view extends beyond the domain', toBounds(detailBox))
  }

  return {
    referencePoint: placement.referencePoint,
    feedPoint: placement.referencePoint,
    orientation,
    wings,
    probePoint: placement.probePoint,
    antennaBounds: toBounds(antennaBox),
    domainViewRequested: placement.domainView,
    views: {
      domain: { ...toBounds(domainBox), step: spacing, id: DOMAIN_VIEW_ID, mode: 'coarse' },
      detail: { ...toBounds(detailBox), step: spacing, id: DETAIL_VIEW_ID, mode: 'fine' },
    },
  }
}

/**
 * Throws when the wing is not flat along `normal` or its vertices are collinear.
 * Zero area shows up when `height` is too small to pull the base vertices apart.
 */
export function validateTriangle(triangle: Triangle, normal: Axis) {
  const n = axisIndex(normal)
  const [a, b, c] = triangle.vertices
  if (Math.abs(a[n] - b[n]) > TOLERANCE || Math.abs(a[n] - c[n]) > TOLERANCE) {
    throw new DegenerateGeometryError(
      `Triangle is not flat along ${normal}`,
      `${normal} coordinates ${a[n]}, ${b[n]}, ${c[n]}`
    )
  }
  const va = new Vector3(...a)
  const vb = new Vector3(...b)
  const vc = new Vector3(...c)
  const facet = new Facet(va, vb, vc)
  const scale = Math.max(va.distanceTo(vb), vb.distanceTo(vc), vc.distanceTo(va))
  if (!(facet.getArea() > Number.EPSILON * scale * scale)) {
    throw new DegenerateGeometryError('Triangle vertices are collinear', JSON.stringify(triangle.vertices))
  }
}

function buildWing(
  reference: Vector3,
  sign: 1 | -1,
  bowtie: BowtieSpec,
  orientation: AntennaOrientation,
  gap: FeedGap,
  spacing: GridSpacing,
  thickness: number,
  material: string
): Triangle {
  const l = axisIndex(orientation.longitudinal)
  const t = axisIndex(orientation.transverse)
  // Base edge sits across the feed, the apex points outwards along the wing axis
  const apex = reference.clone()
  apex.setComponent(l, reference.getComponent(l) + sign * bowtie.length)
  const baseLow = reference.clone()
  baseLow.setComponent(t, reference.getComponent(t) - bowtie.height / 2)
  const baseHigh = reference.clone()
  baseHigh.setComponent(t, reference.getComponent(t) + bowtie.height / 2)

  // Along the wing axis the gap points away from the feed, elsewhere towards +axis
  const direction = gap.axis === orientation.longitudinal ? sign : 1
  const shift = new Vector3()
  shift.setComponent(axisIndex(gap.axis), direction * gap.cells * spacingAlong(spacing, gap.axis))

  return {
    vertices: [toVec(apex.add(shift)), toVec(baseLow.add(shift)), toVec(baseHigh.add(shift))],
    thickness,
    material,
  }
}

function resolveOrientation(orientation: AntennaOrientation): AntennaOrientation {
  const { longitudinal, transverse } = orientation
  if (!isAxis(longitudinal) || !isAxis(transverse)) {
    throw new UnknownVariantError(`Unknown antenna orientation: ${JSON.stringify(orientation)}`)
  }
  if (longitudinal === transverse) {
    throw new UnknownVariantError(`Longitudinal and transverse axes must differ, both are ${longitudinal}`)
  }
  return { longitudinal, transverse }
}

function validateGap(gap: FeedGap, wing: number) {
  if (!isAxis(gap.axis)) {
    throw new UnknownVariantError(`Unknown feed gap axis for wing ${wing}: ${String(gap.axis)}`)
  }
  if (!Number.isFinite(gap.cells) || gap.cells < 0) {
    throw new InvalidGeometryError(`Feed gap for wing ${wing} must be a non-negative number of cells, got ${gap.cells}`)
  }
}

function requirePositive(label: string, value: number) {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidGeometryError(`${label} must be a positive number, got ${value}`)
  }
}

function assertInside(box: Box3, point: Vec3, label: string) {
  const outside = point.some((v, i) => v < box.min.getComponent(i) - TOLERANCE || v > box.max.getComponent(i) + TOLERANCE)
  if (outside) {
    throw new InvalidGeometryError(
      `${label} lies outside the domain`,
      `point ${JSON.stringify(point)}, domain ${JSON.stringify(toVec(box.max))}`
    )
  }
}

function toVec(v: Vector3): Vec3 {
  return [v.x, v.y, v.z]
}

function toBounds(box: Box3): Bounds {
  return { min: toVec(box.min), max: toVec(box.max) }
}
