export const enum ProgressStatus {
  Downloading = 'Downloading',
  Ready = 'Ready',
  EncodingPrompt = 'EncodingPrompt',
  ContextBuilt = 'ContextBuilt',
  Sampling = 'Sampling',
  Decoding = 'Decoding',
  Decoded = 'Decoded',
  Done = 'Done',
}

interface ProgressDownloadStatus {
  file: string
  size: number
  downloaded: number
}

export interface ProgressCallbackPayload {
  status: ProgressStatus
  downloadStatus?: ProgressDownloadStatus
  statusText?: string
  /** 1-based position in the denoising loop. */
  step?: number
  totalSteps?: number
  timestep?: number
}

export type ProgressCallback = (payload: ProgressCallbackPayload) => Promise<void>|void

export interface PretrainedOptions {
  revision?: string
  progressCallback?: ProgressCallback
}

function setStatusText (payload: ProgressCallbackPayload) {
  switch (payload.status) {
    case ProgressStatus.Downloading:
      if (payload.downloadStatus) {
        const { file, downloaded, size } = payload.downloadStatus
        return `Downloading ${file} (${size > 0 ? Math.round(downloaded / size * 100) : 0}%)`
      }
      return 'Downloading'
    case ProgressStatus.EncodingPrompt:
      return 'Encoding prompt'
    case ProgressStatus.ContextBuilt:
      return 'Prompt encoded'
    case ProgressStatus.Sampling:
      return `Sampling (${payload.step ?? 0}/${payload.totalSteps ?? 0}, t=${payload.timestep ?? 0})`
    case ProgressStatus.Decoding:
      return 'Decoding latents'
    case ProgressStatus.Decoded:
      return 'Latents decoded'
    case ProgressStatus.Done:
      return 'Done'
    case ProgressStatus.Ready:
      return 'Ready'
  }
}

export async function dispatchProgress (cb: ProgressCallback|undefined, payload: ProgressCallbackPayload) {
  if (!payload.statusText) {
    payload.statusText = setStatusText(payload)
  }
  if (cb) {
    await cb(payload)
  }
}
