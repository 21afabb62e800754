/**
 * Type definitions for the clipmix batch pipeline.
 *
 * Domain types covering source assets, trim/cache keys, normalization and
 * encoding profiles, per-output jobs, and the run event stream.
 *
 * ### Time convention
 * All durations and trims are in **seconds** (floating-point). Trims are
 * measured from the start (`headSeconds`) and end (`tailSeconds`) of a source.
 */

// ============================================================================
// SOURCE ASSETS
// ============================================================================

/**
 * A usable video file discovered by the catalog.
 *
 * Identity is `path` + `signature`: a source edited in place (new size or
 * mtime) gets a new signature, which invalidates its cache entries.
 *
 * @property assetKey - Filesystem-safe stem plus a short path hash; the cache namespace for this file
 * @property signature - `<size>-<mtimeMs>` at enumeration time
 */
export interface SourceAsset {
  path: string
  stem: string
  extension: string
  assetKey: string
  sizeBytes: number
  modifiedMs: number
  signature: string
}

/** Media attributes read from ffprobe. Every field is optional: probing is best-effort. */
export interface MediaInfo {
  durationSeconds?: number
  width?: number
  height?: number
  fps?: number
  container?: string
  hasAudio?: boolean
}

// ============================================================================
// TRIM / NORMALIZATION
// ============================================================================

export interface TrimSpec {
  headSeconds: number
  tailSeconds: number
}

export type FillMode = 'pad' | 'crop'

/**
 * Output geometry every cached segment is normalized to.
 *
 * Fixed for an entire run. Concatenated inputs must share resolution, frame
 * rate and pixel format.
 */
export interface NormalizationProfile {
  width: number
  height: number
  fps: number
  fillMode: FillMode
  pixelFormat: 'yuv420p'
}

/** A normalized, audio-free intermediate segment on disk. */
export interface CacheEntry {
  assetKey: string
  trim: TrimSpec
  profileKey: string
  signatureTag: string
  path: string
}

// ============================================================================
// ENCODING
// ============================================================================

export type QualityProfile = 'visual' | 'balanced' | 'size'

export type EncoderFamily = 'hardware' | 'software'

export type VideoEncoder = 'h264_nvenc' | 'libx264'

/**
 * Resolved encoder settings for one job.
 *
 * `qualityValue` is NVENC `-cq` for hardware profiles and x264 `-crf` for
 * software profiles. The two scales are not interchangeable.
 */
export interface EncodingProfile {
  family: EncoderFamily
  encoder: VideoEncoder
  quality: QualityProfile
  preset: string
  qualityValue: number
  audioBitrate: string
}

// ============================================================================
// JOBS
// ============================================================================

export interface SelectedSegment {
  asset: SourceAsset
  trim: TrimSpec
}

export type SegmentSelection = SelectedSegment[]

/** One requested output video. */
export interface OutputJob {
  index: number
  seed: number
  outputPath: string
  /** Assets this job may draw from (whole catalog, or one resolution group). */
  pool: SourceAsset[]
  /** `WxH` when the job was allocated to a resolution group. */
  group?: string
}

export type JobStage = 'select' | 'transcode' | 'concat' | 'mux' | 'dispatch'

export type CompressionReport =
  | { kind: 'known'; inputBytes: number; outputBytes: number; ratio: number }
  | { kind: 'unknown'; reason: string }

export interface JobSuccess {
  status: 'succeeded'
  index: number
  outputPath: string
  selection: SegmentSelection
  bgm: string
  encoder: VideoEncoder
  /** True when the job started on the hardware encoder and finished on software. */
  fellBack: boolean
  durationSeconds?: number
  compression: CompressionReport
}

export interface JobFailure {
  status: 'failed'
  index: number
  stage: JobStage
  error: { name: string; message: string }
}

export type JobResult = JobSuccess | JobFailure

export interface RunSummary {
  runSeed: number
  total: number
  succeeded: number
  failed: number
  results: JobResult[]
  /** Aggregate of every known compression report. */
  totals?: { inputBytes: number; outputBytes: number; ratio: number }
  /** At least one job produced an output. */
  ok: boolean
}

// ============================================================================
// EVENTS
// ============================================================================

export type RunPhase = 'scan' | 'prepare' | 'mix' | 'summary'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type RunEvent =
  | { type: 'phase'; phase: RunPhase }
  | { type: 'log'; level: LogLevel; message: string }
  | { type: 'job-progress'; index: number; stage: JobStage; completed: number; total: number }
  | { type: 'job-complete'; result: JobResult }
  | { type: 'summary'; summary: RunSummary }

export type RunEventListener = (event: RunEvent) => void
