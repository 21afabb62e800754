import logger, { popPipe, pushPipe } from '../L1-infra/logger/configLogger.js'
import { ensureDirectory } from '../L1-infra/fileSystem/fileSystem.js'
import {
  findSettingsProblems,
  normalizationProfileOf,
  outputDirOf,
  outputPathFor,
  trimOf,
} from '../L1-infra/config/mixSettings.js'
import type { MixSettings } from '../L1-infra/config/mixSettings.js'
import { InvalidSettings, RunCancelled, describeError } from '../L0-pure/errors/errors.js'
import { deriveJobSeed, generateRunSeed } from '../L0-pure/random/random.js'
import { profileKey } from '../L0-pure/trim/trim.js'
import type { JobResult, OutputJob, RunEvent, RunEventListener, RunSummary, SourceAsset } from '../L0-pure/types/index.js'
import { createCommandRunner, ensureToolsAvailable } from '../L2-clients/ffmpeg/ffmpeg.js'
import type { CommandRunner } from '../L2-clients/ffmpeg/ffmpeg.js'
import { createMediaProber } from '../L2-clients/ffmpeg/probe.js'
import type { MediaProber } from '../L2-clients/ffmpeg/probe.js'
import { AssetCatalog } from '../L3-services/assetCatalog/assetCatalog.js'
import { ClipCache } from '../L3-services/clipCache/clipCache.js'
import { EncodingProfileResolver } from '../L3-services/encoding/encodingProfileResolver.js'
import { aggregateCompression } from '../L3-services/compression/compressionReporter.js'
import { allocateOutputs, groupByResolution } from '../L3-services/segmentSelector/segmentSelector.js'
import { runScheduled } from './jobScheduler.js'
import { jobFailure, runMixJob } from './mixJob.js'

export interface MixRunOptions {
  signal?: AbortSignal
  onEvent?: RunEventListener
  /** Substitutes for the real ffmpeg/ffprobe (tests). */
  runner?: CommandRunner
  prober?: MediaProber
}

/** Build the event sink: every event is logged, then handed to the listener, whose errors are contained. */
export function createEmitter(listener?: RunEventListener): (event: RunEvent) => void {
  return (event) => {
    switch (event.type) {
      case 'log':
        logger[event.level](event.message)
        break
      case 'phase':
        logger.info(`── ${event.phase} ──`)
        break
      case 'job-progress':
        logger.debug(`Job ${event.index}: ${event.stage} ${event.completed}/${event.total}`)
        break
      case 'job-complete':
        if (event.result.status === 'succeeded') logger.info(`Job ${event.result.index} → ${event.result.outputPath}`)
        else logger.warn(`Job ${event.result.index} failed (${event.result.stage}): ${event.result.error.message}`)
        break
      case 'summary':
        logger.info(`Run finished: ${event.summary.succeeded}/${event.summary.total} succeeded`)
        break
    }
    if (!listener) return
    try {
      listener(event)
    } catch (err: unknown) {
      logger.warn(`Event listener failed: ${describeError(err)}`)
    }
  }
}

/**
 * Plan the run's jobs. Grouped runs spread outputs over resolution groups;
 * when no group is large enough the whole catalog is used instead.
 */
export async function planJobs(
  settings: MixSettings,
  assets: SourceAsset[],
  catalog: AssetCatalog,
  runSeed: number,
  emit: (event: RunEvent) => void,
): Promise<OutputJob[]> {
  const pools: Array<{ pool: SourceAsset[]; group?: string }> = []

  if (settings.groupByResolution) {
    const groups = await groupByResolution(assets, (asset) => catalog.probe(asset))
    const allocations = allocateOutputs(groups, settings.outputs, settings.clipsPerOutput)
    if (allocations) {
      for (const allocation of allocations) {
        emit({ type: 'log', level: 'info', message: `Group ${allocation.group}: ${allocation.pool.length} clip(s), ${allocation.outputs} output(s)` })
        for (let i = 0; i < allocation.outputs; i++) pools.push({ pool: allocation.pool, group: allocation.group })
      }
    } else {
      emit({
        type: 'log',
        level: 'warn',
        message: `No resolution group has ${settings.clipsPerOutput} clips; selecting from all ${assets.length}`,
      })
    }
  }
  while (pools.length < settings.outputs) pools.push({ pool: assets })

  return pools.map(({ pool, group }, i) => {
    const index = i + 1
    return { index, seed: deriveJobSeed(runSeed, index), outputPath: outputPathFor(settings, index), pool, group }
  })
}

/**
 * Run a whole batch: scan inputs, prepare cache and encoder, mix every
 * output on a bounded worker pool, then summarize.
 *
 * Run-level problems (`InvalidSettings`, `ExternalToolMissing`, `EmptyCatalog`)
 * are thrown before any job starts. Job failures end up in the summary.
 */
export async function runMix(settings: MixSettings, options: MixRunOptions = {}): Promise<RunSummary> {
  const problems = findSettingsProblems(settings)
  if (problems.length > 0) throw new InvalidSettings(problems)

  const emit = createEmitter(options.onEvent)
  const runner = options.runner ?? createCommandRunner({ ffmpegPath: settings.ffmpegPath, ffprobePath: settings.ffprobePath })
  const prober = options.prober ?? createMediaProber(settings.ffprobePath)
  const outputDir = outputDirOf(settings)
  await ensureDirectory(outputDir)

  pushPipe(outputDir)
  try {
    emit({ type: 'phase', phase: 'scan' })
    const version = await ensureToolsAvailable(runner)
    emit({ type: 'log', level: 'debug', message: version })
    const catalog = new AssetCatalog(prober)
    const assets = await catalog.listVideos(settings.videoDirs)
    const bgmList = await catalog.resolveBgm(settings.bgmPath)
    emit({ type: 'log', level: 'info', message: `${assets.length} clip(s), ${bgmList.length} BGM track(s)` })

    emit({ type: 'phase', phase: 'prepare' })
    const trim = trimOf(settings)
    const profile = normalizationProfileOf(settings)
    const cache = new ClipCache(settings.cacheDir, profile)
    if (settings.clearMismatchedCache) {
      const removed = await cache.pruneMismatched(trim)
      emit({ type: 'log', level: 'info', message: `Removed ${removed.length} mismatched cache entr${removed.length === 1 ? 'y' : 'ies'}` })
    }
    const resolver = new EncodingProfileResolver(runner, {
      quality: settings.qualityProfile,
      nvencCq: settings.nvencCq,
      x264Crf: settings.x264Crf,
      presetGpu: settings.presetGpu,
      presetCpu: settings.presetCpu,
    })
    const encoding = await resolver.resolve(settings.preferHardware)
    const runSeed = settings.seed ?? generateRunSeed()
    emit({
      type: 'log',
      level: 'info',
      message: `Seed ${runSeed}; profile ${profileKey(profile)}; encoder ${encoding.encoder}; cache ${settings.cacheDir}`,
    })
    const jobs = await planJobs(settings, assets, catalog, runSeed, emit)

    emit({ type: 'phase', phase: 'mix' })
    const context = {
      runner,
      prober,
      catalog,
      cache,
      resolver,
      encoding,
      trim,
      clipsPerOutput: settings.clipsPerOutput,
      bgmList,
      emit,
      signal: options.signal,
    }
    const results = await runScheduled<OutputJob, JobResult>(jobs, settings.threads, (job) => runMixJob(job, context), {
      signal: options.signal,
      onError: (job, err) => jobFailure(job.index, 'select', err),
      onSkipped: (job) => jobFailure(job.index, 'dispatch', new RunCancelled('Run cancelled before this job started')),
      onSettled: (result) => emit({ type: 'job-complete', result }),
    })

    emit({ type: 'phase', phase: 'summary' })
    const summary = summarize(runSeed, results)
    emit({ type: 'summary', summary })
    return summary
  } finally {
    popPipe()
  }
}

export function summarize(runSeed: number, results: JobResult[]): RunSummary {
  const succeeded = results.filter((r) => r.status === 'succeeded').length
  return {
    runSeed,
    total: results.length,
    succeeded,
    failed: results.length - succeeded,
    results,
    totals: aggregateCompression(results.flatMap((r) => (r.status === 'succeeded' ? [r.compression] : []))),
    ok: succeeded > 0,
  }
}
