export * from './errors'
export * from './util/Tensor'
export * from './models/types'
export * from './schedulers/AlphaSchedule'
export * from './schedulers/DDIMScheduler'
export * from './schedulers/common'
export * from './embeddings/timestepEmbedding'
export * from './tokenizers/common'
export * from './tokenizers/CLIPTokenizer'
export * from './pipelines/guidance'
export * from './pipelines/common'
export * from './pipelines/progress'
export * from './pipelines/PipelineBase'
export * from './pipelines/StableDiffusionPipeline'
export * from './pipelines/DiffusionPipeline'
export * from './backends'
export * from './backends/models'
export * from './hub'
export { setModelCacheDir } from './hub/node'
