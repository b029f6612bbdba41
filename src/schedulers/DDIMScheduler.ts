import seedrandom from 'seedrandom'
import { AlphaDomainError, ConfigurationError } from '../errors'
import { add, assertSameDims, div, FloatTensor, mul, randomNormalTensor, sub } from '../util/Tensor'

export type NoiseSource = (dims: readonly number[]) => FloatTensor

export interface DDIMSchedulerOptions {
  /** Scales the stochastic term; 0 is plain deterministic DDIM. */
  eta?: number
  noiseSource?: NoiseSource
  /** Seed for the default noise source. Ignored when `noiseSource` is given. */
  seed?: string
}

function assertAlpha (label: string, value: number) {
  if (!Number.isFinite(value) || value <= 0 || value > 1) {
    throw new AlphaDomainError(label, value)
  }
}

/**
 * Denoising diffusion implicit models (DDIM) update. Given `x_t` and the guided noise
 * estimate it recovers the predicted clean sample and moves it back to the noise level
 * of the previous timestep.
 */
export class DDIMScheduler {
  readonly eta: number
  private readonly noiseSource: NoiseSource

  constructor (options: DDIMSchedulerOptions = {}) {
    const eta = options.eta ?? 0
    if (!(eta >= 0 && eta <= 1)) {
      throw new ConfigurationError(`eta must be in [0, 1], got ${eta}`)
    }
    this.eta = eta

    if (options.noiseSource) {
      this.noiseSource = options.noiseSource
    } else {
      const rng = options.seed ? seedrandom(options.seed) : seedrandom()
      this.noiseSource = (dims) => randomNormalTensor(dims, 0, 1, rng)
    }
  }

  getVariance (alphaProdT: number, alphaProdTPrev: number) {
    const betaProdT = 1 - alphaProdT
    const betaProdTPrev = 1 - alphaProdTPrev
    if (betaProdT === 0) {
      return 0
    }
    return (betaProdTPrev / betaProdT) * (1 - alphaProdT / alphaProdTPrev)
  }

  sigma (alphaProdT: number, alphaProdTPrev: number) {
    if (this.eta === 0) {
      return 0
    }
    return this.eta * Math.sqrt(Math.max(this.getVariance(alphaProdT, alphaProdTPrev), 0))
  }

  /**
   * @returns `[prevSample, predOriginalSample]`
   */
  step (
    sample: FloatTensor,
    modelOutput: FloatTensor,
    alphaProdT: number,
    alphaProdTPrev: number,
    temperature = 1,
  ): [FloatTensor, FloatTensor] {
    assertAlpha('alpha_t', alphaProdT)
    assertAlpha('alpha_prev', alphaProdTPrev)
    assertSameDims('DDIMScheduler.step', sample.dims, modelOutput.dims)

    const sigmaT = this.sigma(alphaProdT, alphaProdTPrev)

    // x_0 = (x_t - sqrt(1 - a_t) * e_t) / sqrt(a_t)
    const predOriginalSample = div(
      sub(sample, mul(modelOutput, Math.sqrt(1 - alphaProdT))),
      Math.sqrt(alphaProdT),
    )

    // direction pointing to x_t
    const dirXt = mul(modelOutput, Math.sqrt(1.0 - alphaProdTPrev - sigmaT ** 2))

    let prevSample = add(mul(predOriginalSample, Math.sqrt(alphaProdTPrev)), dirXt)
    if (sigmaT > 0) {
      const noise = this.noiseSource(sample.dims)
      assertSameDims('DDIMScheduler.noiseSource', sample.dims, noise.dims)
      prevSample = add(prevSample, mul(noise, sigmaT * temperature))
    }

    return [prevSample, predOriginalSample]
  }
}
