import { runOrThrow } from '../../L2-clients/ffmpeg/ffmpeg.js'
import type { CommandRunner, RunOptions } from '../../L2-clients/ffmpeg/ffmpeg.js'
import { writeAtomically } from '../../L1-infra/fileSystem/fileSystem.js'
import logger from '../../L1-infra/logger/configLogger.js'
import { MuxFailed, RunCancelled } from '../../L0-pure/errors/errors.js'
import { formatSeconds } from '../../L0-pure/trim/trim.js'

export interface MuxRequest {
  videoPath: string
  bgmPath: string
  /** Video duration; the looped track is cut to exactly this. Undefined → `-shortest`. */
  targetDuration?: number
  outputPath: string
  audioBitrate: string
}

export function buildMuxArgs(request: MuxRequest, outputPath: string): string[] {
  const length = request.targetDuration !== undefined && request.targetDuration > 0
    ? ['-t', formatSeconds(request.targetDuration)]
    : ['-shortest']
  return [
    '-hide_banner', '-nostdin', '-y',
    '-i', request.videoPath,
    '-stream_loop', '-1',
    '-i', request.bgmPath,
    '-map', '0:v:0',
    '-map', '1:a:0',
    '-c:v', 'copy',
    '-c:a', 'aac',
    '-b:a', request.audioBitrate,
    ...length,
    '-movflags', '+faststart',
    '-f', 'mp4',
    outputPath,
  ]
}

/**
 * Replace the video's (absent) audio with the BGM track, looped to cover the
 * full duration. The output appears only once ffmpeg succeeds.
 *
 * @throws MuxFailed
 */
export async function muxBackgroundAudio(
  runner: CommandRunner,
  request: MuxRequest,
  options: RunOptions = {},
): Promise<void> {
  logger.debug(`Muxing ${request.bgmPath} → ${request.outputPath}`)
  try {
    await writeAtomically(request.outputPath, (partial) => runOrThrow(runner, 'ffmpeg', buildMuxArgs(request, partial), options))
  } catch (err: unknown) {
    if (err instanceof RunCancelled) throw err
    throw new MuxFailed(err)
  }
}
