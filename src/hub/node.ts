import path from 'path'
import fs from 'fs'
import { Readable, Transform } from 'stream'
import { pipeline } from 'stream/promises'
import progress from 'cli-progress'
import { downloadFile } from '@huggingface/hub'
import { CacheImpl, GetModelFileOptions, pathJoin } from './common'
import { dispatchProgress, ProgressCallback, ProgressStatus } from '../pipelines/common'

let cacheDir = '.cache'

export function setModelCacheDir (dir: string) {
  cacheDir = dir
}

async function fileExists (filePath: string) {
  try {
    await fs.promises.access(filePath)
    return true
  } catch (error) {
    return false
  }
}

export function getCacheKey (modelRepoOrPath: string, fileName: string, revision: string) {
  const filePath = pathJoin(cacheDir, modelRepoOrPath, revision === 'main' ? '' : revision, fileName)
  return path.resolve(filePath)
}

function formatSize (size: number): string {
  if (size < 1024) return `${size} Bytes`
  else if (size < 1048576) return `${(size / 1024).toFixed(2)} KB`
  else if (size < 1073741824) return `${(size / 1048576).toFixed(2)} MB`
  return `${(size / 1073741824).toFixed(2)} GB`
}

async function removeFile (filePath: string) {
  try {
    const stat = await fs.promises.lstat(filePath)
    if (stat.isFile()) {
      await fs.promises.unlink(filePath)
    }
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
      throw error
    }
  }
}

async function writeResponseToFile (
  response: Response,
  displayName: string,
  outputPath: string,
  progressCallback?: ProgressCallback,
): Promise<void> {
  const totalSize = parseInt(response.headers.get('content-length') || '0')
  if (!response.body) {
    throw new Error(`Empty response body for ${displayName}`)
  }

  // without a callback the download is reported on the terminal
  const progressBar = progressCallback
    ? null
    : new progress.SingleBar({
      format: `Downloading ${displayName} | {bar} | {percentage}% | {size}/{totalFormatted}`,
    }, progress.Presets.shades_classic)
  progressBar?.start(totalSize, 0, { totalFormatted: formatSize(totalSize), size: formatSize(0) })

  let downloaded = 0
  const reportProgress = new Transform({
    transform (chunk: Uint8Array, _encoding, callback) {
      downloaded += chunk.length
      if (progressBar) {
        progressBar.update(downloaded, { size: formatSize(downloaded) })
        callback(null, chunk)
        return
      }
      dispatchProgress(progressCallback, {
        status: ProgressStatus.Downloading,
        downloadStatus: { file: displayName, size: totalSize, downloaded },
      }).then(() => callback(null, chunk), callback)
    },
  })

  const tmpPath = outputPath + '.tmp'
  try {
    await pipeline(Readable.fromWeb(response.body), reportProgress, fs.createWriteStream(tmpPath))
  } catch (error) {
    // a partial file must never be renamed into the cache
    await removeFile(tmpPath)
    throw error
  } finally {
    progressBar?.stop()
  }
  await fs.promises.rename(tmpPath, outputPath)
}

export async function getModelFile (modelRepoOrPath: string, fileName: string, fatal = true, options: GetModelFileOptions = {}) {
  const revision = options.revision || 'main'
  const cachePath = getCacheKey(modelRepoOrPath, fileName, revision)
  if (await fileExists(cachePath)) {
    if (options.returnText) {
      return fs.promises.readFile(cachePath, { encoding: 'utf-8' })
    }

    return cachePath
  }

  // only a missing file is optional; transport and server errors reject either way
  const response = await downloadFile({ repo: modelRepoOrPath, path: fileName, revision })
  if (!response) {
    if (!fatal) {
      return null
    }
    throw new Error(`${fileName} was not found in ${modelRepoOrPath}@${revision}`)
  }

  const targetPath = path.dirname(cachePath)
  if (!await fileExists(targetPath)) {
    await fs.promises.mkdir(targetPath, { recursive: true })
  }
  await writeResponseToFile(response, fileName, cachePath, options.progressCallback)

  if (options.returnText) {
    return fs.promises.readFile(cachePath, { encoding: 'utf-8' })
  }

  return cachePath
}

const nodeCache: CacheImpl = {
  getModelFile,
}

export default nodeCache
