/**
 * Error kinds raised by the statistics functions
 */

/**
 * A rank, confidence level or iteration count outside its accepted bounds
 */
export class OutOfRangeError extends RangeError {
  override readonly name = 'OutOfRangeError'

  constructor(
    readonly parameter: string,
    readonly value: number,
    readonly min: number,
    readonly max: number,
    readonly exclusive = false,
    message?: string
  ) {
    const bounds = exclusive ? `(${min}, ${max})` : `[${min}, ${max}]`
    super(message ?? `${parameter} must be in ${bounds}, got ${value}`)
  }
}

/**
 * Arguments that are individually valid but unusable together
 * (e.g. a criteria sequence whose length differs from the sample)
 */
export class InvalidArgumentError extends Error {
  override readonly name = 'InvalidArgumentError'
}
