import defaultAlphasCumprod from './alphas_cumprod.json'
import { ConfigurationError, TimestepIndexError } from '../errors'
import { range } from '../util/Tensor'
import { alphasCumprodFromConfig, SchedulerConfig } from './common'

export interface ScheduleStep {
  /** Position in the ascending schedule. */
  index: number
  timestep: number
  alphaT: number
  alphaPrev: number
}

/**
 * Timesteps selected for one run, ascending, with their alpha coefficients.
 * `alphasPrev[i]` is the coefficient of the step processed right after step `i`
 * in the reverse walk, and 1.0 for the lowest timestep.
 */
export class StepSchedule {
  readonly timesteps: readonly number[]
  readonly alphas: readonly number[]
  readonly alphasPrev: readonly number[]

  constructor (timesteps: readonly number[], alphas: readonly number[]) {
    if (timesteps.length === 0) {
      throw new ConfigurationError('Timestep schedule is empty')
    }
    if (alphas.length !== timesteps.length) {
      throw new ConfigurationError(`Got ${alphas.length} alphas for ${timesteps.length} timesteps`)
    }
    for (let i = 1; i < timesteps.length; i++) {
      if (timesteps[i] <= timesteps[i - 1]) {
        throw new ConfigurationError(`Timestep schedule is not strictly increasing at index ${i}`)
      }
    }
    this.timesteps = Object.freeze([...timesteps])
    this.alphas = Object.freeze([...alphas])
    this.alphasPrev = Object.freeze([1.0, ...alphas.slice(0, -1)])
  }

  get length () {
    return this.timesteps.length
  }

  /** The reverse-diffusion walk, highest timestep first. */
  steps (): ScheduleStep[] {
    const steps: ScheduleStep[] = []
    for (let index = this.timesteps.length - 1; index >= 0; index--) {
      steps.push({
        index,
        timestep: this.timesteps[index],
        alphaT: this.alphas[index],
        alphaPrev: this.alphasPrev[index],
      })
    }
    return steps
  }
}

/**
 * Read-only table of cumulative alpha products, one per training timestep.
 */
export class AlphaSchedule {
  static readonly default = new AlphaSchedule(defaultAlphasCumprod)

  readonly alphasCumprod: readonly number[]

  constructor (alphasCumprod: readonly number[]) {
    if (alphasCumprod.length === 0) {
      throw new ConfigurationError('Alpha table is empty')
    }
    alphasCumprod.forEach((alpha, i) => {
      if (!(alpha > 0 && alpha <= 1)) {
        throw new ConfigurationError(`Alpha table entry ${i} is ${alpha}, expected a value in (0, 1]`)
      }
      if (i > 0 && alpha > alphasCumprod[i - 1]) {
        throw new ConfigurationError(`Alpha table increases at entry ${i}`)
      }
    })
    this.alphasCumprod = Object.freeze([...alphasCumprod])
  }

  static fromConfig (config: SchedulerConfig) {
    return new AlphaSchedule(alphasCumprodFromConfig(config))
  }

  get numTrainTimesteps () {
    return this.alphasCumprod.length
  }

  alphaCumprod (timestep: number) {
    if (!Number.isInteger(timestep) || timestep < 0 || timestep >= this.numTrainTimesteps) {
      throw new TimestepIndexError(timestep, this.numTrainTimesteps)
    }
    return this.alphasCumprod[timestep]
  }

  /**
   * Every `floor(T / nSteps)`-th timestep starting at 1. The stride never drops below 1,
   * so with `nSteps > T` the schedule is shorter than requested; when `nSteps` does not
   * divide `T` it can be one entry longer.
   */
  buildSchedule (nSteps: number) {
    if (!Number.isInteger(nSteps) || nSteps < 1) {
      throw new ConfigurationError(`Number of inference steps must be a positive integer, got ${nSteps}`)
    }
    const stride = Math.max(1, Math.floor(this.numTrainTimesteps / nSteps))
    const timesteps = range(1, this.numTrainTimesteps, stride)
    return new StepSchedule(timesteps, timesteps.map((t) => this.alphaCumprod(t)))
  }
}
