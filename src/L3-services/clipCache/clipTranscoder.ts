import { runOrThrow } from '../../L2-clients/ffmpeg/ffmpeg.js'
import type { CommandRunner, RunOptions } from '../../L2-clients/ffmpeg/ffmpeg.js'
import { CommandFailed, HardwareEncoderUnavailable } from '../../L0-pure/errors/errors.js'
import { clampTrim, formatSeconds } from '../../L0-pure/trim/trim.js'
import type { EncodingProfile, NormalizationProfile, TrimSpec } from '../../L0-pure/types/index.js'

/**
 * Filter chain that fits any source into the profile's frame.
 *
 * - `pad`: scale down to fit, then letterbox/pillarbox in black
 * - `crop`: scale up to cover, then center-crop
 */
export function videoFilter(profile: NormalizationProfile): string {
  const { width: w, height: h } = profile
  const fit = profile.fillMode === 'pad'
    ? [`scale=${w}:${h}:force_original_aspect_ratio=decrease`, `pad=${w}:${h}:(ow-iw)/2:(oh-ih)/2:black`]
    : [`scale=${w}:${h}:force_original_aspect_ratio=increase`, `crop=${w}:${h}`]
  return [...fit, `fps=${formatSeconds(profile.fps)}`, `format=${profile.pixelFormat}`, 'setsar=1'].join(',')
}

export function encoderArgs(encoding: EncodingProfile): string[] {
  if (encoding.family === 'hardware') {
    return [
      '-c:v', encoding.encoder,
      '-preset', encoding.preset,
      '-rc', 'vbr',
      '-cq', String(encoding.qualityValue),
      '-b:v', '0',
      '-pix_fmt', 'yuv420p',
    ]
  }
  return [
    '-c:v', encoding.encoder,
    '-crf', String(encoding.qualityValue),
    '-preset', encoding.preset,
    '-profile:v', 'high',
    '-pix_fmt', 'yuv420p',
  ]
}

export interface TranscodeRequest {
  inputPath: string
  /** Source duration when probing succeeded. */
  durationSeconds?: number
  trim: TrimSpec
  profile: NormalizationProfile
  encoding: EncodingProfile
  outputPath: string
}

/** ffmpeg arguments that turn one source into a normalized, silent MPEG-TS segment. */
export function buildTranscodeArgs(request: TranscodeRequest): string[] {
  const { startSeconds, durationSeconds } = clampTrim(request.trim, request.durationSeconds)
  const args = ['-hide_banner', '-nostdin', '-y', '-fflags', '+genpts']
  if (startSeconds > 0) args.push('-ss', formatSeconds(startSeconds))
  args.push('-i', request.inputPath)
  if (durationSeconds !== undefined && request.trim.tailSeconds > 0) {
    args.push('-t', formatSeconds(durationSeconds))
  }
  args.push(
    '-vf', videoFilter(request.profile),
    '-an',
    '-map_metadata', '-1',
    ...encoderArgs(request.encoding),
    '-f', 'mpegts',
    request.outputPath,
  )
  return args
}

/**
 * Run one transcode. A hardware encode that exits non-zero surfaces as
 * {@link HardwareEncoderUnavailable} so the job can retry on software.
 */
export async function transcodeSegment(
  runner: CommandRunner,
  request: TranscodeRequest,
  options: RunOptions = {},
): Promise<void> {
  try {
    await runOrThrow(runner, 'ffmpeg', buildTranscodeArgs(request), options)
  } catch (err: unknown) {
    if (err instanceof CommandFailed && request.encoding.family === 'hardware') {
      throw new HardwareEncoderUnavailable(request.encoding.encoder, err)
    }
    throw err
  }
}
