import { ImageDecoderModel, NoisePredictorModel, TextEncoderModel } from '../models/types'
import { div, FloatTensor, IntTensor } from '../util/Tensor'
import { Session } from './index'

function pickOutput (session: Session, result: Record<string, FloatTensor>, name?: string) {
  const outputName = name ?? session.outputNames[0]
  const output = result[outputName]
  if (!output) {
    throw new Error(`Model has no output named ${outputName}`)
  }
  return output
}

export interface TextEncoderNames {
  inputIds?: string
  positionIds?: string
  output?: string
}

export class OnnxTextEncoder implements TextEncoderModel {
  private readonly session: Session
  private readonly names: Required<Omit<TextEncoderNames, 'output'>> & Pick<TextEncoderNames, 'output'>

  constructor (session: Session, names: TextEncoderNames = {}) {
    this.session = session
    this.names = {
      inputIds: names.inputIds ?? 'input_ids',
      positionIds: names.positionIds ?? 'position_ids',
      output: names.output,
    }
  }

  async encode (inputIds: IntTensor, positionIds: IntTensor) {
    const result = await this.session.run({
      [this.names.inputIds]: inputIds,
      [this.names.positionIds]: positionIds,
    })
    return pickOutput(this.session, result, this.names.output)
  }

  release () {
    return this.session.release()
  }
}

export interface NoisePredictorNames {
  latent?: string
  timestepEmbedding?: string
  context?: string
  output?: string
}

export class OnnxNoisePredictor implements NoisePredictorModel {
  private readonly session: Session
  private readonly names: NoisePredictorNames

  constructor (session: Session, names: NoisePredictorNames = {}) {
    this.session = session
    this.names = names
  }

  async predict (latent: FloatTensor, timestepEmbedding: FloatTensor, context: FloatTensor) {
    const result = await this.session.run({
      [this.names.latent ?? 'latent']: latent,
      [this.names.timestepEmbedding ?? 't_emb']: timestepEmbedding,
      [this.names.context ?? 'context']: context,
    })
    return pickOutput(this.session, result, this.names.output)
  }

  release () {
    return this.session.release()
  }
}

export interface ImageDecoderNames {
  latent?: string
  output?: string
}

/**
 * Divides latents by the `scaling_factor` from the model's config.json, when present,
 * before decoding.
 */
export class OnnxImageDecoder implements ImageDecoderModel {
  private readonly session: Session
  private readonly names: ImageDecoderNames

  constructor (session: Session, names: ImageDecoderNames = {}) {
    this.session = session
    this.names = names
  }

  get scalingFactor () {
    const factor = this.session.config.scaling_factor
    return typeof factor === 'number' && factor > 0 ? factor : 1
  }

  async decode (latent: FloatTensor) {
    const scaled = this.scalingFactor === 1 ? latent : div(latent, this.scalingFactor)
    const result = await this.session.run({ [this.names.latent ?? 'latent']: scaled })
    return pickOutput(this.session, result, this.names.output)
  }

  release () {
    return this.session.release()
  }
}
