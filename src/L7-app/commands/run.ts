import { initConfig } from '../../L1-infra/config/environment.js'
import { buildMixSettings } from '../../L1-infra/config/mixSettings.js'
import { setConsoleSilent, setVerbose } from '../../L1-infra/logger/configLogger.js'
import { describeError } from '../../L0-pure/errors/errors.js'
import { formatMegabytes, formatRatio } from '../../L0-pure/format/format.js'
import type { RunEvent } from '../../L0-pure/types/index.js'
import { runMix } from '../../L6-pipeline/mixRun.js'

export interface RunCommandOptions {
  bgm: string
  count?: number
  outputs?: number
  output?: string
  threads?: number
  gpu?: boolean
  width?: number
  height?: number
  fps?: number
  fill?: string
  trimHead?: number
  trimTail?: number
  quality?: string
  groupByResolution?: boolean
  clearMismatchedCache?: boolean
  seed?: number
  cacheDir?: string
  nvencCq?: number
  x264Crf?: number
  presetGpu?: string
  presetCpu?: string
  ffmpeg?: string
  ffprobe?: string
  verbose?: boolean
}

/** One console line per event; undefined means "print nothing". */
export function formatEvent(event: RunEvent, verbose = false): string | undefined {
  switch (event.type) {
    case 'phase':
      return `▸ ${event.phase}`
    case 'log':
      if (event.level === 'debug') return verbose ? `  ${event.message}` : undefined
      if (event.level === 'warn') return `⚠ ${event.message}`
      if (event.level === 'error') return `✖ ${event.message}`
      return `  ${event.message}`
    case 'job-progress':
      return verbose ? `  [job ${event.index}] ${event.stage} ${event.completed}/${event.total}` : undefined
    case 'job-complete': {
      const result = event.result
      if (result.status === 'failed') {
        return `✖ [job ${result.index}] ${result.stage}: ${result.error.name}: ${result.error.message}`
      }
      const details: string[] = [result.fellBack ? `${result.encoder}, fell back` : result.encoder]
      if (result.compression.kind === 'known') details.push(formatRatio(result.compression.ratio))
      return `✔ [job ${result.index}] ${result.outputPath} (${details.join(', ')})`
    }
    case 'summary': {
      const { summary } = event
      let line = `Done: ${summary.succeeded}/${summary.total} succeeded (seed ${summary.runSeed})`
      if (summary.totals) {
        line += `, ${formatMegabytes(summary.totals.inputBytes)} → ${formatMegabytes(summary.totals.outputBytes)} (${formatRatio(summary.totals.ratio)})`
      }
      return line
    }
  }
}

/**
 * `clipmix run`: mix every requested output, printing one line per event.
 *
 * @returns the process exit code: 0 when at least one output was produced
 */
export async function runRunCommand(videoDirs: string[], opts: RunCommandOptions): Promise<number> {
  initConfig({ ffmpegPath: opts.ffmpeg, ffprobePath: opts.ffprobe, cacheDir: opts.cacheDir, verbose: opts.verbose })
  if (opts.verbose) setVerbose()
  setConsoleSilent(true)

  const controller = new AbortController()
  const onSigint = (): void => {
    console.log('\nCancelling: running jobs will stop, nothing new will start...')
    controller.abort()
  }
  process.once('SIGINT', onSigint)

  try {
    const settings = buildMixSettings({
      videoDirs,
      bgmPath: opts.bgm,
      output: opts.output,
      outputs: opts.outputs,
      clipsPerOutput: opts.count,
      threads: opts.threads,
      preferHardware: opts.gpu,
      width: opts.width,
      height: opts.height,
      fps: opts.fps,
      fillMode: opts.fill,
      trimHead: opts.trimHead,
      trimTail: opts.trimTail,
      cacheDir: opts.cacheDir,
      qualityProfile: opts.quality,
      groupByResolution: opts.groupByResolution,
      clearMismatchedCache: opts.clearMismatchedCache,
      seed: opts.seed,
      nvencCq: opts.nvencCq,
      x264Crf: opts.x264Crf,
      presetGpu: opts.presetGpu,
      presetCpu: opts.presetCpu,
      verbose: opts.verbose,
    })
    const summary = await runMix(settings, {
      signal: controller.signal,
      onEvent: (event) => {
        const line = formatEvent(event, settings.verbose)
        if (line !== undefined) console.log(line)
      },
    })
    return summary.ok ? 0 : 1
  } catch (err: unknown) {
    console.error(`✖ ${describeError(err)}`)
    return 1
  } finally {
    process.off('SIGINT', onSigint)
    setConsoleSilent(false)
  }
}
