import { ValidationError } from '../errors'
import { add, FloatTensor, mul, sub } from '../util/Tensor'

/**
 * Classifier-free guidance: `u + scale * (c - u)`. This extrapolates rather than
 * blends, so scales above 1 are the usual case; 1 returns the conditional estimate
 * and 0 the unconditional one.
 */
export function classifierFreeGuidance (
  noisePredUncond: FloatTensor,
  noisePredText: FloatTensor,
  guidanceScale: number,
) {
  if (!Number.isFinite(guidanceScale) || guidanceScale < 0) {
    throw new ValidationError(`guidanceScale must be a finite number >= 0, got ${guidanceScale}`)
  }
  return add(noisePredUncond, mul(sub(noisePredText, noisePredUncond), guidanceScale))
}
