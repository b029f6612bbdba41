import { DDIMScheduler } from '../schedulers/DDIMScheduler'
import { AlphaSchedule } from '../schedulers/AlphaSchedule'
import { ImageDecoderModel, NoisePredictorModel, TextEncoderModel, Tokenizer } from '../models/types'
import { timestepEmbedding } from '../embeddings/timestepEmbedding'
import { ValidationError } from '../errors'
import { assertSameDims, cat, FloatTensor, ImageTensor, repeatBatch, sliceBatch } from '../util/Tensor'
import { classifierFreeGuidance } from './guidance'
import { dispatchProgress, ProgressCallback, ProgressStatus } from './common'
import { PipelineBase, PipelineOptions, PromptEmbeds } from './PipelineBase'

export interface GenerateOptions {
  numInferenceSteps?: number
  guidanceScale?: number
  /** Scales injected noise when `eta > 0`. */
  temperature?: number
  /** DDIM stochasticity; 0 keeps sampling deterministic. */
  eta?: number
  /** Seeds the initial latent noise and, with `eta > 0`, the per-step noise. */
  seed?: string
  negativePrompt?: string
  /** Run both noise estimates as one call with a doubled batch. */
  batchedGuidance?: boolean
  progressCallback?: ProgressCallback
  signal?: AbortSignal
}

export interface StableDiffusionInput extends GenerateOptions {
  prompt: string
}

export const DEFAULT_GENERATION_OPTIONS = {
  numInferenceSteps: 25,
  guidanceScale: 7.5,
  temperature: 1,
  eta: 0,
} as const

export class StableDiffusionPipeline extends PipelineBase {
  constructor (
    noisePredictor: NoisePredictorModel,
    decoder: ImageDecoderModel,
    textEncoder: TextEncoderModel,
    tokenizer: Tokenizer,
    alphaSchedule: AlphaSchedule = AlphaSchedule.default,
    options: PipelineOptions = {},
  ) {
    super(noisePredictor, decoder, textEncoder, tokenizer, alphaSchedule, options)
  }

  generate (prompt: string, options: GenerateOptions = {}) {
    return this.run({ ...options, prompt })
  }

  async run (input: StableDiffusionInput): Promise<ImageTensor> {
    const numInferenceSteps = input.numInferenceSteps ?? DEFAULT_GENERATION_OPTIONS.numInferenceSteps
    const guidanceScale = input.guidanceScale ?? DEFAULT_GENERATION_OPTIONS.guidanceScale
    const temperature = input.temperature ?? DEFAULT_GENERATION_OPTIONS.temperature
    const seed = input.seed ?? ''
    const { signal, progressCallback } = input

    if (!Number.isFinite(guidanceScale) || guidanceScale < 0) {
      throw new ValidationError(`guidanceScale must be a finite number >= 0, got ${guidanceScale}`)
    }
    signal?.throwIfAborted()

    const schedule = this.alphaSchedule.buildSchedule(numInferenceSteps)
    const scheduler = new DDIMScheduler({
      eta: input.eta ?? DEFAULT_GENERATION_OPTIONS.eta,
      seed: seed !== '' ? `${seed}/noise` : '',
    })

    await dispatchProgress(progressCallback, {
      status: ProgressStatus.EncodingPrompt,
    })
    const promptEmbeds = await this.getPromptEmbeds(input.prompt, input.negativePrompt)
    await dispatchProgress(progressCallback, {
      status: ProgressStatus.ContextBuilt,
    })

    let latents = this.prepareLatents(seed)
    const steps = schedule.steps()
    let humanStep = 1

    for (const { timestep, alphaT, alphaPrev } of steps) {
      signal?.throwIfAborted()
      await dispatchProgress(progressCallback, {
        status: ProgressStatus.Sampling,
        step: humanStep,
        totalSteps: steps.length,
        timestep,
      })

      const timestepEmbeds = repeatBatch(timestepEmbedding(timestep), this.batchSize)
      const noisePred = await this.predictNoise(latents, timestepEmbeds, promptEmbeds, guidanceScale, input.batchedGuidance)

      // only the stepped latent is carried forward
      latents = scheduler.step(latents, noisePred, alphaT, alphaPrev, temperature)[0]
      humanStep++
    }

    signal?.throwIfAborted()
    await dispatchProgress(progressCallback, {
      status: ProgressStatus.Decoding,
    })
    const images = await this.makeImages(latents)
    await dispatchProgress(progressCallback, {
      status: ProgressStatus.Decoded,
    })

    await dispatchProgress(progressCallback, {
      status: ProgressStatus.Done,
    })
    return images
  }

  /**
   * Unconditional and text-conditioned noise estimates for the same latent, combined
   * with classifier-free guidance.
   */
  async predictNoise (
    latents: FloatTensor,
    timestepEmbeds: FloatTensor,
    { context, unconditionalContext }: PromptEmbeds,
    guidanceScale: number,
    batched = false,
  ) {
    let noisePredUncond: FloatTensor
    let noisePredText: FloatTensor

    if (batched) {
      const batchSize = latents.dims[0]
      const noisePred = await this.noisePredictor.predict(
        cat([latents, latents]),
        cat([timestepEmbeds, timestepEmbeds]),
        cat([unconditionalContext, context]),
      )
      assertSameDims('noisePredictor.predict', [batchSize * 2, ...latents.dims.slice(1)], noisePred.dims)
      noisePredUncond = sliceBatch(noisePred, 0, batchSize)
      noisePredText = sliceBatch(noisePred, batchSize, batchSize * 2)
    } else {
      [noisePredUncond, noisePredText] = await Promise.all([
        this.noisePredictor.predict(latents, timestepEmbeds, unconditionalContext),
        this.noisePredictor.predict(latents, timestepEmbeds, context),
      ])
      assertSameDims('noisePredictor.predict (unconditional)', latents.dims, noisePredUncond.dims)
      assertSameDims('noisePredictor.predict (conditional)', latents.dims, noisePredText.dims)
    }

    return classifierFreeGuidance(noisePredUncond, noisePredText, guidanceScale)
  }
}
