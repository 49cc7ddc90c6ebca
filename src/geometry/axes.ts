import type { Axis, Domain, GridSpacing, Vec3 } from '../types'

export const AXES: readonly Axis[] = ['x', 'y', 'z']

export function isAxis(value: unknown): value is Axis {
  return value === 'x' || value === 'y' || value === 'z'
}

export function axisIndex(axis: Axis): 0 | 1 | 2 {
  if (axis === 'x') return 0
  if (axis === 'y') return 1
  return 2
}

export function spacingAlong(spacing: GridSpacing, axis: Axis): number {
  if (axis === 'x') return spacing.dx
  if (axis === 'y') return spacing.dy
  return spacing.dz
}

// The axis orthogonal to both given ones
export function remainingAxis(a: Axis, b: Axis): Axis {
  const rest = AXES.find((axis) => axis !== a && axis !== b)
  if (!rest) throw new RangeError(`Axes ${a} and ${b} must differ`)
  return rest
}

export function domainCenter(domain: Domain): Vec3 {
  return [domain.x / 2, domain.y / 2, domain.z / 2]
}
