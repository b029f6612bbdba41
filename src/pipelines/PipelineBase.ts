import { Tensor } from 'onnxruntime-common'
import { ConfigurationError } from '../errors'
import { ImageDecoderModel, NoisePredictorModel, TextEncoderModel, Tokenizer } from '../models/types'
import { AlphaSchedule } from '../schedulers/AlphaSchedule'
import { batchIds, MAX_TEXT_LENGTH, padTokens, positionIds, UNCONDITIONAL_TOKENS } from '../tokenizers/common'
import { add, assertSameDims, clipByValue, div, FloatTensor, ImageTensor, mul, randomNormalTensor } from '../util/Tensor'

export const LATENT_CHANNELS = 4

export interface PipelineOptions {
  height?: number
  width?: number
  batchSize?: number
  /** Width of the text encoder output. */
  contextDim?: number
}

export interface PromptEmbeds {
  context: FloatTensor
  unconditionalContext: FloatTensor
}

function assertPositiveInteger (name: string, value: number) {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${name} must be a positive integer, got ${value}`)
  }
}

export class PipelineBase {
  public noisePredictor: NoisePredictorModel
  public decoder: ImageDecoderModel
  public textEncoder: TextEncoderModel
  public tokenizer: Tokenizer
  public alphaSchedule: AlphaSchedule
  public readonly vaeScaleFactor = 8
  public readonly height: number
  public readonly width: number
  public readonly batchSize: number
  public readonly contextDim: number

  constructor (
    noisePredictor: NoisePredictorModel,
    decoder: ImageDecoderModel,
    textEncoder: TextEncoderModel,
    tokenizer: Tokenizer,
    alphaSchedule: AlphaSchedule,
    options: PipelineOptions = {},
  ) {
    this.noisePredictor = noisePredictor
    this.decoder = decoder
    this.textEncoder = textEncoder
    this.tokenizer = tokenizer
    this.alphaSchedule = alphaSchedule

    this.height = options.height ?? 512
    this.width = options.width ?? 512
    this.batchSize = options.batchSize ?? 1
    this.contextDim = options.contextDim ?? 768
    assertPositiveInteger('height', this.height)
    assertPositiveInteger('width', this.width)
    assertPositiveInteger('batchSize', this.batchSize)
    assertPositiveInteger('contextDim', this.contextDim)
    if (this.height % this.vaeScaleFactor !== 0 || this.width % this.vaeScaleFactor !== 0) {
      throw new ConfigurationError(
        `height and width must be multiples of ${this.vaeScaleFactor}, got ${this.height}x${this.width}`,
      )
    }
  }

  get latentShape () {
    return [
      this.batchSize,
      this.height / this.vaeScaleFactor,
      this.width / this.vaeScaleFactor,
      LATENT_CHANNELS,
    ]
  }

  /**
   * Runs the text encoder on one padded id sequence repeated across the batch.
   */
  async encodeTokens (tokens: readonly number[]) {
    const context = await this.textEncoder.encode(
      batchIds(tokens, this.batchSize),
      batchIds(positionIds(), this.batchSize),
    )
    assertSameDims('textEncoder.encode', [this.batchSize, MAX_TEXT_LENGTH, this.contextDim], context.dims)
    return context
  }

  /**
   * Encodes the prompt and the unconditional sequence, once each. A negative prompt
   * takes the place of the fixed unconditional tokens.
   */
  async getPromptEmbeds (prompt: string, negativePrompt?: string): Promise<PromptEmbeds> {
    const promptTokens = padTokens(this.tokenizer.encode(prompt))
    const unconditionalTokens = negativePrompt !== undefined
      ? padTokens(this.tokenizer.encode(negativePrompt))
      : UNCONDITIONAL_TOKENS

    const context = await this.encodeTokens(promptTokens)
    const unconditionalContext = await this.encodeTokens(unconditionalTokens)

    return { context, unconditionalContext }
  }

  prepareLatents (seed = '') {
    return randomNormalTensor(this.latentShape, 0, 1, seed)
  }

  /**
   * Decodes latents and maps the decoder's [-1, 1] range onto 8-bit pixels.
   */
  async makeImages (latents: FloatTensor): Promise<ImageTensor> {
    const decoded = await this.decoder.decode(latents)
    assertSameDims('decoder.decode', [this.batchSize, this.height, this.width, 3], decoded.dims)

    const scaled = clipByValue(mul(div(add(decoded, 1), 2), 255), 0, 255)
    return new Tensor('uint8', Uint8Array.from(scaled.data, Math.trunc), decoded.dims)
  }

  async release () {
    await this.noisePredictor.release?.()
    await this.decoder.release?.()
    await this.textEncoder.release?.()
  }
}
