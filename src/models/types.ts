import { FloatTensor, IntTensor } from '../util/Tensor'

export interface Tokenizer {
  /** Token ids including the start and end tokens, without padding. */
  encode (text: string): number[]
}

export interface TextEncoderModel {
  /** `[B, 77]` token and position ids to a `[B, 77, D]` context. */
  encode (inputIds: IntTensor, positionIds: IntTensor): Promise<FloatTensor>
  release? (): Promise<void>
}

export interface NoisePredictorModel {
  /** Noise estimate with the same dims as `latent` (`[B, H/8, W/8, 4]`). */
  predict (latent: FloatTensor, timestepEmbedding: FloatTensor, context: FloatTensor): Promise<FloatTensor>
  release? (): Promise<void>
}

export interface ImageDecoderModel {
  /** `[B, H/8, W/8, 4]` latent to a `[B, H, W, 3]` image roughly in [-1, 1]. */
  decode (latent: FloatTensor): Promise<FloatTensor>
  release? (): Promise<void>
}
