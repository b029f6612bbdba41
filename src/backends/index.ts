import fs from 'fs'
import * as ort from 'onnxruntime-web'
import { toFloatTensors } from '../util/Tensor'
import { getModelFile, getModelJSON } from '../hub'
import { GetModelFileOptions } from '../hub/common'

const onnxSessionOptions: ort.InferenceSession.SessionOptions = {
  executionProviders: ['wasm'],
  graphOptimizationLevel: 'all',
}

export interface ExternalWeights {
  /** File name the model graph refers to, e.g. `model.onnx_data`. */
  path: string
  data: Uint8Array
}

export class Session {
  private session: ort.InferenceSession
  public config: Record<string, unknown>

  constructor (session: ort.InferenceSession, config: Record<string, unknown> = {}) {
    this.session = session
    this.config = config
  }

  static async create (
    model: Uint8Array,
    weights?: ExternalWeights,
    config?: Record<string, unknown>,
    options?: ort.InferenceSession.SessionOptions,
  ) {
    const sessionOptions: ort.InferenceSession.SessionOptions = {
      ...onnxSessionOptions,
      ...options,
    }
    if (weights) {
      sessionOptions.externalData = [{ path: weights.path, data: weights.data }]
    }

    const session = await ort.InferenceSession.create(model, sessionOptions)
    return new Session(session, config)
  }

  get inputNames () {
    return this.session.inputNames
  }

  get outputNames () {
    return this.session.outputNames
  }

  async run (inputs: Record<string, ort.Tensor>) {
    const result = await this.session.run(inputs)
    return toFloatTensors(result)
  }

  release () {
    return this.session.release()
  }
}

function isRecord (value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Loads `<dir>/model.onnx` with its optional external weights (`model.onnx_data` or
 * `weights.pb`) and `<dir>/config.json`.
 */
export async function loadModel (
  modelRepoOrPath: string,
  filename: string,
  opts: GetModelFileOptions,
) {
  const modelPath = await getModelFile(modelRepoOrPath, filename, true, opts)
  if (modelPath === null) {
    throw new Error(`${filename} was not found in ${modelRepoOrPath}`)
  }

  const dirName = filename.split('/')[0]
  let weightsName = filename.split('/').pop() + '_data'
  let weightsPath = await getModelFile(modelRepoOrPath, filename + '_data', false, opts)
  if (!weightsPath) {
    weightsName = 'weights.pb'
    weightsPath = await getModelFile(modelRepoOrPath, dirName + '/weights.pb', false, opts)
  }

  const config = await getModelJSON(modelRepoOrPath, dirName + '/config.json', false, opts)

  const model = await fs.promises.readFile(modelPath)
  const weights = weightsPath
    ? { path: weightsName, data: await fs.promises.readFile(weightsPath) }
    : undefined

  return Session.create(model, weights, isRecord(config) ? config : {})
}
