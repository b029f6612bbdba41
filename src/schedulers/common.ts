import { ConfigurationError } from '../errors'
import { cumprod, linspace } from '../util/Tensor'

/**
 * Subset of a diffusers `scheduler_config.json` needed to rebuild the noise schedule.
 */
export interface SchedulerConfig {
  beta_start: number
  beta_end: number
  beta_schedule: string
  num_train_timesteps: number
  trained_betas?: readonly number[]|null
}

export function betasForAlphaBar (
  numDiffusionTimesteps: number,
  maxBeta = 0.999,
  alphaTransformType: 'exp'|'cosine' = 'cosine',
) {
  function alphaBar (timeStep: number) {
    if (alphaTransformType === 'cosine') {
      return Math.cos((timeStep + 0.008) / 1.008 * Math.PI / 2) ** 2
    }
    return Math.exp(timeStep * -12)
  }

  const betas: number[] = []
  for (let i = 0; i < numDiffusionTimesteps; i++) {
    const t1 = i / numDiffusionTimesteps
    const t2 = (i + 1) / numDiffusionTimesteps
    betas.push(Math.min(1 - alphaBar(t2) / alphaBar(t1), maxBeta))
  }
  return betas
}

export function betasFromConfig (config: SchedulerConfig): number[] {
  if (config.trained_betas) {
    if (config.trained_betas.length !== config.num_train_timesteps) {
      throw new ConfigurationError(
        `trained_betas has ${config.trained_betas.length} entries, expected ${config.num_train_timesteps}`,
      )
    }
    return [...config.trained_betas]
  }

  switch (config.beta_schedule) {
    case 'linear':
      return linspace(config.beta_start, config.beta_end, config.num_train_timesteps)
    case 'scaled_linear':
      return linspace(config.beta_start ** 0.5, config.beta_end ** 0.5, config.num_train_timesteps)
        .map((beta) => beta ** 2)
    case 'squaredcos_cap_v2':
      return betasForAlphaBar(config.num_train_timesteps)
    default:
      throw new ConfigurationError(`beta_schedule ${config.beta_schedule} is not implemented`)
  }
}

export function alphasCumprodFromConfig (config: SchedulerConfig) {
  if (!Number.isInteger(config.num_train_timesteps) || config.num_train_timesteps < 1) {
    throw new ConfigurationError(`num_train_timesteps must be a positive integer, got ${config.num_train_timesteps}`)
  }
  return cumprod(betasFromConfig(config).map((beta) => 1 - beta))
}

function isRecord (value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Validates the parsed contents of a `scheduler_config.json`.
 */
export function parseSchedulerConfig (json: unknown): SchedulerConfig {
  if (!isRecord(json)) {
    throw new ConfigurationError('Scheduler config must be a JSON object')
  }
  const {
    beta_start: betaStart = 0.00085,
    beta_end: betaEnd = 0.012,
    beta_schedule: betaSchedule = 'scaled_linear',
    num_train_timesteps: numTrainTimesteps = 1000,
    trained_betas: trainedBetas = null,
  } = json

  if (typeof betaStart !== 'number' || typeof betaEnd !== 'number') {
    throw new ConfigurationError('beta_start and beta_end must be numbers')
  }
  if (typeof betaSchedule !== 'string') {
    throw new ConfigurationError('beta_schedule must be a string')
  }
  if (typeof numTrainTimesteps !== 'number') {
    throw new ConfigurationError('num_train_timesteps must be a number')
  }
  let betas: number[]|null = null
  if (trainedBetas !== null) {
    if (!Array.isArray(trainedBetas) || !trainedBetas.every((beta): beta is number => typeof beta === 'number')) {
      throw new ConfigurationError('trained_betas must be an array of numbers')
    }
    betas = trainedBetas
  }

  return {
    beta_start: betaStart,
    beta_end: betaEnd,
    beta_schedule: betaSchedule,
    num_train_timesteps: numTrainTimesteps,
    trained_betas: betas,
  }
}
