/**
 * Raised when caller input cannot be used as given: an over-long prompt,
 * a negative guidance scale, an alpha coefficient outside (0, 1].
 */
export class ValidationError extends Error {
  constructor (message: string) {
    super(message)
    this.name = 'ValidationError'
  }
}

export class AlphaDomainError extends ValidationError {
  readonly value: number

  constructor (label: string, value: number) {
    super(`${label} must be in (0, 1], got ${value}`)
    this.name = 'AlphaDomainError'
    this.value = value
  }
}

/**
 * A tensor reached a component with dims other than the ones it was promised.
 * Usually means a model and the pipeline options disagree (latent size, batch, layout).
 */
export class ShapeMismatchError extends Error {
  readonly call: string
  readonly expected: readonly number[]
  readonly actual: readonly number[]

  constructor (call: string, expected: readonly number[], actual: readonly number[]) {
    super(`${call}: expected dims [${expected.join(', ')}], got [${actual.join(', ')}]`)
    this.name = 'ShapeMismatchError'
    this.call = call
    this.expected = [...expected]
    this.actual = [...actual]
  }
}

export class ConfigurationError extends Error {
  constructor (message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

export class TimestepIndexError extends RangeError {
  readonly timestep: number

  constructor (timestep: number, size: number) {
    super(`Timestep ${timestep} is outside [0, ${size})`)
    this.name = 'TimestepIndexError'
    this.timestep = timestep
  }
}
