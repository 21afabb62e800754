import { getConfig } from './environment.js'
import { basename, extname, join, resolve, siblingDir, dirname } from '../paths/paths.js'
import { InvalidSettings } from '../../L0-pure/errors/errors.js'
import { isQualityProfile } from '../../L0-pure/encoding/qualityPresets.js'
import type { FillMode, NormalizationProfile, QualityProfile, TrimSpec } from '../../L0-pure/types/index.js'

/** The single settings structure a run is driven by. */
export interface MixSettings {
  videoDirs: string[]
  bgmPath: string
  /** Explicit output file (`.mp4`, numbered per job) or directory. */
  output?: string
  outputs: number
  clipsPerOutput: number
  threads: number
  preferHardware: boolean
  width: number
  height: number
  fps: number
  fillMode: FillMode
  trimHead: number
  trimTail: number
  cacheDir: string
  qualityProfile: QualityProfile
  groupByResolution: boolean
  clearMismatchedCache: boolean
  /** Run-level seed; generated (and logged) when absent. */
  seed?: number
  nvencCq?: number
  x264Crf?: number
  presetGpu?: string
  presetCpu?: string
  ffmpegPath: string
  ffprobePath: string
  verbose: boolean
}

/** Everything the CLI (or another front end) may supply; unset fields fall back to env, then defaults. */
export interface MixOptions {
  videoDirs: string[]
  bgmPath: string
  output?: string
  outputs?: number
  clipsPerOutput?: number
  threads?: number
  preferHardware?: boolean
  width?: number
  height?: number
  fps?: number
  fillMode?: string
  trimHead?: number
  trimTail?: number
  cacheDir?: string
  qualityProfile?: string
  groupByResolution?: boolean
  clearMismatchedCache?: boolean
  seed?: number
  nvencCq?: number
  x264Crf?: number
  presetGpu?: string
  presetCpu?: string
  verbose?: boolean
}

export const DEFAULT_SETTINGS = {
  outputs: 1,
  clipsPerOutput: 5,
  threads: 4,
  preferHardware: true,
  width: 1080,
  height: 1920,
  fps: 25,
  fillMode: 'pad',
  trimHead: 0,
  trimTail: 1,
  groupByResolution: false,
  clearMismatchedCache: false,
} as const

const NVENC_PRESETS = ['p1', 'p2', 'p3', 'p4', 'p5', 'p6', 'p7']
const X264_PRESETS = ['ultrafast', 'superfast', 'veryfast', 'faster', 'fast', 'medium', 'slow', 'slower', 'veryslow']

function isPositiveInt(value: number): boolean {
  return Number.isInteger(value) && value > 0
}

/** Collect every problem with a settings candidate; an empty list means valid. */
export function findSettingsProblems(options: MixOptions): string[] {
  const problems: string[] = []
  if (options.videoDirs.length === 0) problems.push('at least one video directory is required')
  if (!options.bgmPath) problems.push('a BGM file or directory is required')

  const positiveInts: Array<[string, number | undefined]> = [
    ['outputs', options.outputs],
    ['clipsPerOutput', options.clipsPerOutput],
    ['threads', options.threads],
    ['width', options.width],
    ['height', options.height],
  ]
  for (const [name, value] of positiveInts) {
    if (value !== undefined && !isPositiveInt(value)) problems.push(`${name} must be a positive integer (got ${value})`)
  }
  if (options.fps !== undefined && !(Number.isFinite(options.fps) && options.fps > 0)) {
    problems.push(`fps must be positive (got ${options.fps})`)
  }
  if (options.fillMode !== undefined && options.fillMode !== 'pad' && options.fillMode !== 'crop') {
    problems.push(`fill mode must be "pad" or "crop" (got "${options.fillMode}")`)
  }
  for (const [name, value] of [['trimHead', options.trimHead], ['trimTail', options.trimTail]] as const) {
    if (value !== undefined && !(Number.isFinite(value) && value >= 0)) problems.push(`${name} must be ≥ 0 (got ${value})`)
  }
  if (options.qualityProfile !== undefined && !isQualityProfile(options.qualityProfile)) {
    problems.push(`quality profile must be visual, balanced or size (got "${options.qualityProfile}")`)
  }
  if (options.presetGpu !== undefined && !NVENC_PRESETS.includes(options.presetGpu)) {
    problems.push(`GPU preset must be one of ${NVENC_PRESETS.join(', ')}`)
  }
  if (options.presetCpu !== undefined && !X264_PRESETS.includes(options.presetCpu)) {
    problems.push(`CPU preset must be one of ${X264_PRESETS.join(', ')}`)
  }
  for (const [name, value] of [['nvencCq', options.nvencCq], ['x264Crf', options.x264Crf]] as const) {
    if (value !== undefined && !(Number.isInteger(value) && value >= 0 && value <= 51)) {
      problems.push(`${name} must be an integer between 0 and 51`)
    }
  }
  if (options.seed !== undefined && !Number.isInteger(options.seed)) problems.push('seed must be an integer')
  if (options.output && extname(options.output).toLowerCase() === '.mp4' && options.videoDirs.length > 1) {
    problems.push('with several input directories the output must be a directory, not an .mp4 file')
  }
  return problems
}

/**
 * Build validated run settings from front-end options.
 * Precedence: explicit option → environment (`CLIPMIX_*`) → {@link DEFAULT_SETTINGS}.
 *
 * @throws InvalidSettings listing every problem found
 */
export function buildMixSettings(options: MixOptions): MixSettings {
  const env = getConfig()
  const merged: MixOptions = {
    ...options,
    threads: options.threads ?? env.THREADS,
    qualityProfile: options.qualityProfile ?? env.QUALITY,
    cacheDir: options.cacheDir ?? (env.CACHE_DIR || undefined),
  }
  const problems = findSettingsProblems(merged)
  if (problems.length > 0) throw new InvalidSettings(problems)

  const videoDirs = merged.videoDirs.map((d) => resolve(d))
  const qualityProfile = merged.qualityProfile !== undefined && isQualityProfile(merged.qualityProfile)
    ? merged.qualityProfile
    : 'balanced'

  return {
    videoDirs,
    bgmPath: resolve(merged.bgmPath),
    output: merged.output ? resolve(merged.output) : undefined,
    outputs: merged.outputs ?? DEFAULT_SETTINGS.outputs,
    clipsPerOutput: merged.clipsPerOutput ?? DEFAULT_SETTINGS.clipsPerOutput,
    threads: merged.threads ?? DEFAULT_SETTINGS.threads,
    preferHardware: merged.preferHardware ?? DEFAULT_SETTINGS.preferHardware,
    width: merged.width ?? DEFAULT_SETTINGS.width,
    height: merged.height ?? DEFAULT_SETTINGS.height,
    fps: merged.fps ?? DEFAULT_SETTINGS.fps,
    fillMode: merged.fillMode === 'crop' ? 'crop' : DEFAULT_SETTINGS.fillMode,
    trimHead: merged.trimHead ?? DEFAULT_SETTINGS.trimHead,
    trimTail: merged.trimTail ?? DEFAULT_SETTINGS.trimTail,
    cacheDir: merged.cacheDir ? resolve(merged.cacheDir) : siblingDir(videoDirs[0], '_clipcache'),
    qualityProfile,
    groupByResolution: merged.groupByResolution ?? DEFAULT_SETTINGS.groupByResolution,
    clearMismatchedCache: merged.clearMismatchedCache ?? DEFAULT_SETTINGS.clearMismatchedCache,
    seed: merged.seed,
    nvencCq: merged.nvencCq,
    x264Crf: merged.x264Crf,
    presetGpu: merged.presetGpu,
    presetCpu: merged.presetCpu,
    ffmpegPath: env.FFMPEG_PATH,
    ffprobePath: env.FFPROBE_PATH,
    verbose: merged.verbose ?? env.VERBOSE,
  }
}

export function normalizationProfileOf(settings: MixSettings): NormalizationProfile {
  return {
    width: settings.width,
    height: settings.height,
    fps: settings.fps,
    fillMode: settings.fillMode,
    pixelFormat: 'yuv420p',
  }
}

export function trimOf(settings: MixSettings): TrimSpec {
  return { headSeconds: settings.trimHead, tailSeconds: settings.trimTail }
}

/** Directory final videos are written to. */
export function outputDirOf(settings: MixSettings): string {
  if (settings.output) {
    return extname(settings.output).toLowerCase() === '.mp4' ? dirname(settings.output) : settings.output
  }
  const suffix = settings.videoDirs.length > 1 ? '_longvideo_combined' : '_longvideo'
  return siblingDir(settings.videoDirs[0], suffix)
}

/**
 * Deterministic output path for job `index` (1-based).
 *
 * - `--output clips/mix.mp4` → `clips/mix_<index>.mp4`
 * - directory or default → `<dir>/concat_<count>videos_with_bgm_<index>.mp4`
 */
export function outputPathFor(settings: MixSettings, index: number): string {
  if (settings.output && extname(settings.output).toLowerCase() === '.mp4') {
    const ext = extname(settings.output)
    return join(dirname(settings.output), `${basename(settings.output, ext)}_${index}${ext}`)
  }
  return join(outputDirOf(settings), `concat_${settings.clipsPerOutput}videos_with_bgm_${index}.mp4`)
}
