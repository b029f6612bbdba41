import progress from 'cli-progress'
import { ProgressCallback, ProgressStatus } from './common'

/**
 * Progress callback that draws the denoising loop as a terminal progress bar.
 */
export function createCliProgressCallback (stream: NodeJS.WritableStream = process.stderr): ProgressCallback {
  const bar = new progress.SingleBar({
    format: 'Sampling | {bar} | {value}/{total} | t={timestep}',
    stream,
  }, progress.Presets.shades_classic)
  let total = 0

  return (payload) => {
    if (payload.status === ProgressStatus.Sampling && payload.totalSteps) {
      const completed = (payload.step ?? 1) - 1
      if (total === 0) {
        total = payload.totalSteps
        bar.start(total, completed, { timestep: payload.timestep })
      } else {
        bar.update(completed, { timestep: payload.timestep })
      }
    } else if (payload.status === ProgressStatus.Decoding && total > 0) {
      bar.update(total)
      bar.stop()
      total = 0
    }
  }
}
