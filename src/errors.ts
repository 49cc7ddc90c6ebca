/** Base class for every failure raised while building a bowtie model */
export class BowtieModelError extends Error {
  constructor(
    message: string,
    public readonly details?: string
  ) {
    super(message)
    this.name = 'BowtieModelError'
  }
}

/** Non-positive or non-finite dimensions, spacing or gaps, or geometry outside the domain */
export class InvalidGeometryError extends BowtieModelError {
  constructor(message: string, details?: string) {
    super(message, details)
    this.name = 'InvalidGeometryError'
  }
}

/** Collinear or non-flat wing triangle */
export class DegenerateGeometryError extends BowtieModelError {
  constructor(message: string, details?: string) {
    super(message, details)
    this.name = 'DegenerateGeometryError'
  }
}

/** Unsupported placement, orientation or axis */
export class UnknownVariantError extends BowtieModelError {
  constructor(message: string, details?: string) {
    super(message, details)
    this.name = 'UnknownVariantError'
  }
}

export class ModelConfigError extends BowtieModelError {
  constructor(message: string, details?: string) {
    super(message, details)
    this.name = 'ModelConfigError'
  }
}
