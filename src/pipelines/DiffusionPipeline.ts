import { loadModel } from '../backends'
import { OnnxImageDecoder, OnnxNoisePredictor, OnnxTextEncoder } from '../backends/models'
import { getModelJSON } from '../hub'
import { GetModelFileOptions } from '../hub/common'
import { Tokenizer } from '../models/types'
import { CLIPTokenizer } from '../tokenizers/CLIPTokenizer'
import { AlphaSchedule } from '../schedulers/AlphaSchedule'
import { parseSchedulerConfig } from '../schedulers/common'
import { dispatchProgress, PretrainedOptions, ProgressStatus } from './common'
import { PipelineOptions } from './PipelineBase'
import { StableDiffusionPipeline } from './StableDiffusionPipeline'

export interface DiffusionPretrainedOptions extends PretrainedOptions, PipelineOptions {
  /** Prompt tokenizer matching the repository's text encoder. Defaults to the repository's `tokenizer/`. */
  tokenizer?: Tokenizer
}

export class DiffusionPipeline {
  /**
   * Builds a pipeline from a repository holding `tokenizer/` files and `text_encoder/`,
   * `unet/` and `vae_decoder/` ONNX models. `scheduler/scheduler_config.json` is optional; without it
   * the built-in alpha table is used.
   */
  static async fromPretrained (modelRepoOrPath: string, options: DiffusionPretrainedOptions = {}) {
    const { tokenizer, height, width, batchSize, contextDim, ...rest } = options
    const opts: GetModelFileOptions = {
      ...rest,
    }

    // order matters because WASM memory cannot be decreased. so we load the biggest one first
    const unet = await loadModel(modelRepoOrPath, 'unet/model.onnx', opts)
    const textEncoder = await loadModel(modelRepoOrPath, 'text_encoder/model.onnx', opts)
    const vae = await loadModel(modelRepoOrPath, 'vae_decoder/model.onnx', opts)

    const promptTokenizer = tokenizer ?? await CLIPTokenizer.fromPretrained(modelRepoOrPath, opts)
    const schedulerConfig = await getModelJSON(modelRepoOrPath, 'scheduler/scheduler_config.json', false, opts)
    const alphaSchedule = schedulerConfig === null
      ? AlphaSchedule.default
      : AlphaSchedule.fromConfig(parseSchedulerConfig(schedulerConfig))

    await dispatchProgress(opts.progressCallback, {
      status: ProgressStatus.Ready,
    })
    return new StableDiffusionPipeline(
      new OnnxNoisePredictor(unet),
      new OnnxImageDecoder(vae),
      new OnnxTextEncoder(textEncoder),
      promptTokenizer,
      alphaSchedule,
      { height, width, batchSize, contextDim },
    )
  }
}
