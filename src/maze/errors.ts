/**
 * Thrown when a grid is constructed with unusable parameters.
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ValidationError'
  }
}

/**
 * Thrown when an operation is not allowed in the grid's current phase,
 * such as generating the same grid twice.
 */
export class InvalidStateError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidStateError'
  }
}
