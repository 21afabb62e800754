import { fluentFfmpeg as ffmpegLib } from '../../L1-infra/ffmpeg/ffmpeg.js'
import type { FfprobeData } from '../../L1-infra/ffmpeg/ffmpeg.js'
import type { MediaInfo } from '../../L0-pure/types/index.js'
import { getFFprobePath } from './ffmpeg.js'

/** Reads container and stream attributes of a media file. */
export interface MediaProber {
  probe(filePath: string): Promise<MediaInfo>
}

/** Promisified ffprobe: raw metadata for one file. */
export function ffprobe(filePath: string, ffprobePath: string = getFFprobePath()): Promise<FfprobeData> {
  return new Promise((resolve, reject) => {
    ffmpegLib.setFfprobePath(ffprobePath)
    ffmpegLib.ffprobe(filePath, (err, data) => {
      if (err) reject(err)
      else resolve(data)
    })
  })
}

/**
 * Parse an ffprobe rate such as `30000/1001` or `25`. Returns undefined for
 * `0/0` and anything unparseable.
 */
export function parseFrameRate(raw: string | undefined): number | undefined {
  if (!raw) return undefined
  const [num, den] = raw.split('/')
  const numerator = Number(num)
  const denominator = den === undefined ? 1 : Number(den)
  if (!Number.isFinite(numerator) || !Number.isFinite(denominator) || denominator === 0) return undefined
  const fps = numerator / denominator
  return fps > 0 ? Math.round(fps * 1000) / 1000 : undefined
}

function positiveOrUndefined(value: number | string | undefined): number | undefined {
  if (value === undefined) return undefined
  const n = typeof value === 'number' ? value : Number(value)
  return Number.isFinite(n) && n > 0 ? n : undefined
}

/** Reduce ffprobe output to the fields the mixer cares about. */
export function toMediaInfo(data: FfprobeData): MediaInfo {
  const video = data.streams.find((s) => s.codec_type === 'video')
  const hasAudio = data.streams.some((s) => s.codec_type === 'audio')
  return {
    durationSeconds: positiveOrUndefined(data.format.duration),
    width: positiveOrUndefined(video?.width),
    height: positiveOrUndefined(video?.height),
    fps: parseFrameRate(video?.avg_frame_rate) ?? parseFrameRate(video?.r_frame_rate),
    container: data.format.format_name,
    hasAudio,
  }
}

/** MediaProber backed by fluent-ffmpeg's ffprobe wrapper. */
export function createMediaProber(ffprobePath: string = getFFprobePath()): MediaProber {
  return {
    async probe(filePath) {
      return toMediaInfo(await ffprobe(filePath, ffprobePath))
    },
  }
}
