import { CacheImpl, GetModelFileOptions } from './common'
import nodeCache from './node'

let cacheImpl: CacheImpl = nodeCache

export function setCacheImpl (impl: CacheImpl) {
  cacheImpl = impl
}

export async function getModelFile (modelRepoOrPath: string, fileName: string, fatal = true, options: GetModelFileOptions = {}) {
  return cacheImpl.getModelFile(modelRepoOrPath, fileName, fatal, options)
}

export function getModelTextFile (modelPath: string, fileName: string, fatal: boolean, options: GetModelFileOptions = {}) {
  return getModelFile(modelPath, fileName, fatal, { ...options, returnText: true })
}

export async function getModelJSON (modelPath: string, fileName: string, fatal = true, options: GetModelFileOptions = {}): Promise<unknown> {
  const jsonData = await getModelTextFile(modelPath, fileName, fatal, options)
  if (jsonData === null) {
    return null
  }

  return JSON.parse(jsonData)
}
