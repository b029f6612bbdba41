import { Tensor } from 'onnxruntime-common'
import { ValidationError } from '../errors'
import { IntTensor } from '../util/Tensor'

export const MAX_TEXT_LENGTH = 77
export const START_TOKEN = 49406
export const END_TOKEN = 49407

/** `<|startoftext|>` followed by `<|endoftext|>` up to the full sequence length. */
export const UNCONDITIONAL_TOKENS: readonly number[] = Object.freeze([
  START_TOKEN,
  ...new Array<number>(MAX_TEXT_LENGTH - 1).fill(END_TOKEN),
])

/**
 * Pads encoded prompt ids with the end token to `MAX_TEXT_LENGTH`. The ids must leave
 * room for at least one padding token.
 */
export function padTokens (inputIds: readonly number[]) {
  if (inputIds.length >= MAX_TEXT_LENGTH) {
    throw new ValidationError(
      `Prompt is too long: ${inputIds.length} tokens, must be fewer than ${MAX_TEXT_LENGTH}`,
    )
  }
  return [...inputIds, ...new Array<number>(MAX_TEXT_LENGTH - inputIds.length).fill(END_TOKEN)]
}

export function positionIds () {
  return Array.from({ length: MAX_TEXT_LENGTH }, (_, i) => i)
}

/** Repeats one id sequence across the batch as an int32 `[batchSize, length]` tensor. */
export function batchIds (ids: readonly number[], batchSize: number): IntTensor {
  const data = new Int32Array(ids.length * batchSize)
  for (let b = 0; b < batchSize; b++) {
    data.set(ids, b * ids.length)
  }
  return new Tensor('int32', data, [batchSize, ids.length])
}
