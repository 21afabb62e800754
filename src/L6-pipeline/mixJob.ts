import { withTempDir } from '../L1-infra/fileSystem/fileSystem.js'
import { join } from '../L1-infra/paths/paths.js'
import logger from '../L1-infra/logger/configLogger.js'
import { HardwareEncoderUnavailable, describeError } from '../L0-pure/errors/errors.js'
import { createRandom } from '../L0-pure/random/random.js'
import type {
  CacheEntry,
  EncodingProfile,
  JobFailure,
  JobResult,
  JobStage,
  JobSuccess,
  MediaInfo,
  OutputJob,
  RunEvent,
  SelectedSegment,
  TrimSpec,
} from '../L0-pure/types/index.js'
import type { CommandRunner } from '../L2-clients/ffmpeg/ffmpeg.js'
import type { MediaProber } from '../L2-clients/ffmpeg/probe.js'
import type { AssetCatalog } from '../L3-services/assetCatalog/assetCatalog.js'
import type { ClipCache } from '../L3-services/clipCache/clipCache.js'
import { transcodeSegment } from '../L3-services/clipCache/clipTranscoder.js'
import type { EncodingProfileResolver } from '../L3-services/encoding/encodingProfileResolver.js'
import { concatSegments } from '../L3-services/concat/concatenator.js'
import { muxBackgroundAudio } from '../L3-services/audio/audioReplacer.js'
import { reportCompression } from '../L3-services/compression/compressionReporter.js'
import { pickBgm, select } from '../L3-services/segmentSelector/segmentSelector.js'

/** Everything a job shares with the rest of the run. All of it is read-only or safe to share. */
export interface MixJobContext {
  runner: CommandRunner
  prober: MediaProber
  catalog: AssetCatalog
  cache: ClipCache
  resolver: EncodingProfileResolver
  /** Encoder chosen for the run; a job may downgrade its own copy. */
  encoding: EncodingProfile
  trim: TrimSpec
  clipsPerOutput: number
  bgmList: readonly string[]
  emit: (event: RunEvent) => void
  signal?: AbortSignal
}

/** Failure result for a job, keeping only the error's name and message. */
export function jobFailure(index: number, stage: JobStage, error: unknown): JobFailure {
  return {
    status: 'failed',
    index,
    stage,
    error: error instanceof Error
      ? { name: error.name, message: error.message }
      : { name: 'Error', message: String(error) },
  }
}

/**
 * Produce one output video: select → transcode (cached) → concat → mux.
 *
 * Never throws; any failure is returned with the stage it happened in.
 */
export async function runMixJob(job: OutputJob, ctx: MixJobContext): Promise<JobResult> {
  let stage: JobStage = 'select'
  const progress = (completed: number, total: number): void => {
    ctx.emit({ type: 'job-progress', index: job.index, stage, completed, total })
  }

  try {
    // Segments first, then BGM, from the same per-job stream
    const random = createRandom(job.seed)
    const selection = select(job.pool, ctx.clipsPerOutput, ctx.trim, random)
    const bgm = pickBgm(ctx.bgmList, random)
    logger.info(`Job ${job.index}: ${selection.length} segment(s)${job.group ? ` from ${job.group}` : ''}, bgm ${bgm}`)
    progress(1, 1)

    stage = 'transcode'
    let encoding = ctx.encoding
    let fellBack = false
    const entries: CacheEntry[] = []
    for (const [i, segment] of selection.entries()) {
      const result = await buildSegment(segment, encoding, ctx).catch(async (err: unknown) => {
        if (!(err instanceof HardwareEncoderUnavailable)) throw err
        encoding = ctx.resolver.fallback(encoding)
        fellBack = true
        ctx.emit({
          type: 'log',
          level: 'warn',
          message: `Job ${job.index}: ${describeError(err)}; retrying with ${encoding.encoder}`,
        })
        return buildSegment(segment, encoding, ctx)
      })
      entries.push(result)
      progress(i + 1, selection.length)
    }

    return await withTempDir<JobSuccess>('clipmix-', async (workDir) => {
      stage = 'concat'
      const joined = join(workDir, 'joined.mp4')
      await concatSegments(ctx.runner, entries, joined, { signal: ctx.signal })
      progress(1, 1)

      stage = 'mux'
      const info = await ctx.prober.probe(joined).catch((err: unknown): MediaInfo => {
        logger.warn(`Job ${job.index}: could not read joined duration (${describeError(err)}); BGM will stop at the shortest stream`)
        return {}
      })
      await muxBackgroundAudio(ctx.runner, {
        videoPath: joined,
        bgmPath: bgm,
        targetDuration: info.durationSeconds,
        outputPath: job.outputPath,
        audioBitrate: encoding.audioBitrate,
      }, { signal: ctx.signal })
      progress(1, 1)

      return {
        status: 'succeeded',
        index: job.index,
        outputPath: job.outputPath,
        selection,
        bgm,
        encoder: encoding.encoder,
        fellBack,
        durationSeconds: info.durationSeconds,
        compression: await reportCompression(selection, job.outputPath),
      }
    })
  } catch (err: unknown) {
    logger.error(`Job ${job.index} failed during ${stage}: ${describeError(err)}`)
    return jobFailure(job.index, stage, err)
  }
}

async function buildSegment(
  segment: SelectedSegment,
  encoding: EncodingProfile,
  ctx: MixJobContext,
): Promise<CacheEntry> {
  const info = await ctx.catalog.probe(segment.asset)
  const { entry } = await ctx.cache.getOrBuild(segment.asset, segment.trim, (partialPath) =>
    transcodeSegment(ctx.runner, {
      inputPath: segment.asset.path,
      durationSeconds: info.durationSeconds,
      trim: segment.trim,
      profile: ctx.cache.profile,
      encoding,
      outputPath: partialPath,
    }, { signal: ctx.signal }),
  )
  return entry
}
