import { ConfigurationError } from '../errors'
import { floatTensor } from '../util/Tensor'

export const TIMESTEP_EMBEDDING_DIM = 320

/**
 * Sinusoidal timestep embedding of shape `[1, dim]`: cosines of `t * f_i` for the
 * first half, sines for the second, with `f_i = exp(-ln(maxPeriod) * i / half)`.
 */
export function timestepEmbedding (timestep: number, dim = TIMESTEP_EMBEDDING_DIM, maxPeriod = 10000) {
  if (!Number.isInteger(dim) || dim <= 0 || dim % 2 !== 0) {
    throw new ConfigurationError(`Timestep embedding dim must be a positive even integer, got ${dim}`)
  }
  const half = dim / 2
  const data = new Float32Array(dim)
  for (let i = 0; i < half; i++) {
    const freq = Math.exp(-Math.log(maxPeriod) * i / half)
    const arg = timestep * freq
    data[i] = Math.cos(arg)
    data[half + i] = Math.sin(arg)
  }
  return floatTensor(data, [1, dim])
}
