import fs from 'fs'
import os from 'os'
import path from 'path'
import { downloadFile } from '@huggingface/hub'
import { getModelFile, getModelJSON, setCacheImpl } from '../../hub'
import nodeCache, { getCacheKey, setModelCacheDir } from '../../hub/node'
import { pathJoin } from '../../hub/common'
import { ProgressCallbackPayload, ProgressStatus } from '../../pipelines/common'

jest.mock('@huggingface/hub', () => ({
  downloadFile: jest.fn(),
}))

const mockedDownloadFile = jest.mocked(downloadFile)

describe('model cache', () => {
  let cacheDir: string

  beforeEach(async () => {
    cacheDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'latent-ddim-'))
    setModelCacheDir(cacheDir)
    mockedDownloadFile.mockReset()
  })

  afterEach(async () => {
    setCacheImpl(nodeCache)
    await fs.promises.rm(cacheDir, { recursive: true, force: true })
  })

  it('should join path segments without doubled slashes', () => {
    expect(pathJoin('a/', '/b/', 'c')).toBe('a/b/c')
    expect(pathJoin('models', '', 'unet.onnx')).toBe('models/unet.onnx')
  })

  it('should keep non-main revisions apart', () => {
    expect(getCacheKey('test/repo', 'unet/model.onnx', 'main'))
      .toBe(path.join(cacheDir, 'test/repo', 'unet/model.onnx'))
    expect(getCacheKey('test/repo', 'unet/model.onnx', 'fp16'))
      .toBe(path.join(cacheDir, 'test/repo', 'fp16', 'unet/model.onnx'))
  })

  it('should serve cached files without downloading', async () => {
    const filePath = getCacheKey('test/repo', 'scheduler/scheduler_config.json', 'main')
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true })
    await fs.promises.writeFile(filePath, '{"beta_schedule":"linear"}')

    expect(await getModelJSON('test/repo', 'scheduler/scheduler_config.json')).toEqual({ beta_schedule: 'linear' })
    expect(await getModelFile('test/repo', 'scheduler/scheduler_config.json')).toBe(filePath)
    expect(mockedDownloadFile).not.toHaveBeenCalled()
  })

  it('should download missing files into the cache and report progress', async () => {
    mockedDownloadFile.mockResolvedValue(new Response('{"scaling_factor":0.18215}', {
      headers: { 'content-length': '26' },
    }))
    const payloads: ProgressCallbackPayload[] = []

    const json = await getModelJSON('test/repo', 'vae_decoder/config.json', true, {
      revision: 'fp16',
      progressCallback: (payload) => {
        payloads.push(payload)
      },
    })

    expect(json).toEqual({ scaling_factor: 0.18215 })
    expect(mockedDownloadFile).toHaveBeenCalledWith({ repo: 'test/repo', path: 'vae_decoder/config.json', revision: 'fp16' })
    const cached = await fs.promises.readFile(getCacheKey('test/repo', 'vae_decoder/config.json', 'fp16'), 'utf-8')
    expect(cached).toBe('{"scaling_factor":0.18215}')
    expect(payloads.length).toBeGreaterThan(0)
    expect(payloads[payloads.length - 1].status).toBe(ProgressStatus.Downloading)
    expect(payloads[payloads.length - 1].downloadStatus).toEqual({ file: 'vae_decoder/config.json', size: 26, downloaded: 26 })
    expect(payloads[payloads.length - 1].statusText).toBe('Downloading vae_decoder/config.json (100%)')
  })

  it('should return null for a missing optional file', async () => {
    mockedDownloadFile.mockResolvedValue(null)

    expect(await getModelJSON('test/repo', 'scheduler/scheduler_config.json', false)).toBeNull()
  })

  it('should throw for a missing required file', async () => {
    mockedDownloadFile.mockResolvedValue(null)

    await expect(getModelFile('test/repo', 'unet/model.onnx')).rejects.toThrow(
      'unet/model.onnx was not found in test/repo@main',
    )
  })

  it('should reject and leave no cache entry when the file cannot be written', async () => {
    mockedDownloadFile.mockResolvedValue(new Response('{"a":1}', {
      headers: { 'content-length': '7' },
    }))
    const cachePath = getCacheKey('test/repo', 'unet/config.json', 'main')
    // a directory in place of the temporary file makes the open fail
    await fs.promises.mkdir(cachePath + '.tmp', { recursive: true })

    await expect(getModelFile('test/repo', 'unet/config.json', true, { progressCallback: () => undefined }))
      .rejects.toMatchObject({ code: 'EISDIR' })
    await expect(fs.promises.access(cachePath)).rejects.toMatchObject({ code: 'ENOENT' })
    expect((await fs.promises.stat(cachePath + '.tmp')).isDirectory()).toBe(true)
  })

  it('should reject on download errors even for optional files', async () => {
    mockedDownloadFile.mockRejectedValue(new Error('Internal Server Error'))

    await expect(getModelJSON('test/repo', 'scheduler/scheduler_config.json', false)).rejects.toThrow(
      'Internal Server Error',
    )
    await expect(fs.promises.access(getCacheKey('test/repo', 'scheduler/scheduler_config.json', 'main')))
      .rejects.toMatchObject({ code: 'ENOENT' })
  })

  it('should delegate to a custom cache implementation', async () => {
    const getFile = jest.fn(async () => null)
    setCacheImpl({ getModelFile: getFile })

    expect(await getModelJSON('test/repo', 'config.json', false)).toBeNull()
    expect(getFile).toHaveBeenCalledWith('test/repo', 'config.json', false, { returnText: true })
  })
})
