import type { CacheEntry, NormalizationProfile, TrimSpec } from '../types/index.js'

/** Shortest segment (seconds) clamping will leave behind. */
export const MIN_KEEP_SECONDS = 0.5

export const CACHE_EXTENSION = '.ts'

/**
 * Canonical text for a trim value: integers without decimals, anything else
 * rounded to one decimal place.
 *
 * @example formatTrimValue(1) // "1"
 * @example formatTrimValue(0.5) // "0.5"
 * @example formatTrimValue(2.04) // "2"
 */
export function formatTrimValue(seconds: number): string {
  if (Number.isInteger(seconds)) return String(seconds)
  const rounded = Math.round(seconds * 10) / 10
  return Number.isInteger(rounded) ? String(rounded) : rounded.toFixed(1)
}

/** Seconds (or a frame rate) as an ffmpeg argument: at most three decimals, no trailing zeros. */
export function formatSeconds(seconds: number): string {
  return String(Math.round(seconds * 1000) / 1000)
}

export function createTrim(headSeconds: number, tailSeconds: number): TrimSpec {
  if (!Number.isFinite(headSeconds) || headSeconds < 0) {
    throw new RangeError(`head trim must be a non-negative number, got ${headSeconds}`)
  }
  if (!Number.isFinite(tailSeconds) || tailSeconds < 0) {
    throw new RangeError(`tail trim must be a non-negative number, got ${tailSeconds}`)
  }
  return { headSeconds, tailSeconds }
}

/** `h<head>_t<tail>`: the trim component of a cache key. */
export function trimKey(trim: TrimSpec): string {
  return `h${formatTrimValue(trim.headSeconds)}_t${formatTrimValue(trim.tailSeconds)}`
}

/** Two trims are the same cache key when their canonical encodings match. */
export function sameTrim(a: TrimSpec, b: TrimSpec): boolean {
  return trimKey(a) === trimKey(b)
}

export interface ClampedTrim {
  startSeconds: number
  /** Undefined when the source duration is unknown (tail trim cannot be applied). */
  durationSeconds?: number
}

/**
 * Bound a trim by the source duration instead of failing on it.
 *
 * Head is capped so at least {@link MIN_KEEP_SECONDS} remain, then tail is
 * capped against what is left. Without a duration only the head applies.
 */
export function clampTrim(trim: TrimSpec, sourceDuration: number | undefined): ClampedTrim {
  if (sourceDuration === undefined || !Number.isFinite(sourceDuration) || sourceDuration <= 0) {
    return { startSeconds: trim.headSeconds }
  }
  const head = Math.min(trim.headSeconds, Math.max(0, sourceDuration - MIN_KEEP_SECONDS))
  const tail = Math.min(trim.tailSeconds, Math.max(0, sourceDuration - head - MIN_KEEP_SECONDS))
  return { startSeconds: head, durationSeconds: sourceDuration - head - tail }
}

// ── Profile / filename keys ─────────────────────────────────────────────────

/** `<w>x<h>_<fps>fps_<fill>`; fractional rates keep up to three decimals (`29.97fps`). */
export function profileKey(profile: NormalizationProfile): string {
  return `${profile.width}x${profile.height}_${formatSeconds(profile.fps)}fps_${profile.fillMode}`
}

/** Make a file stem safe to embed in a cache filename (no `__` separators, no path chars). */
export function sanitizeStem(stem: string): string {
  const cleaned = stem
    .replace(/[^\p{L}\p{N}.-]+/gu, '-')
    .replace(/-{2,}/g, '-')
    .replace(/^[-.]+|[-.]+$/g, '')
  return cleaned.length > 0 ? cleaned : 'clip'
}

/**
 * Cache filename for a key. Every component is recoverable with
 * {@link parseCacheFileName}.
 *
 * `<assetKey>__h<head>_t<tail>__<profileKey>__<signatureTag>.ts`
 */
export function cacheFileName(
  assetKey: string,
  trim: TrimSpec,
  profile: NormalizationProfile,
  signatureTag: string,
): string {
  return `${assetKey}__${trimKey(trim)}__${profileKey(profile)}__${signatureTag}${CACHE_EXTENSION}`
}

const CACHE_FILE_PATTERN =
  /^(.+)__h(\d+(?:\.\d)?)_t(\d+(?:\.\d)?)__(\d+x\d+_\d+(?:\.\d+)?fps_(?:pad|crop))__([0-9a-f]+)\.ts$/

export type ParsedCacheFile = Omit<CacheEntry, 'path'>

/** Inverse of {@link cacheFileName}. Returns undefined for anything that is not a finished cache file. */
export function parseCacheFileName(fileName: string): ParsedCacheFile | undefined {
  const match = CACHE_FILE_PATTERN.exec(fileName)
  if (!match) return undefined
  const [, assetKey, head, tail, profile, signatureTag] = match
  return {
    assetKey,
    trim: { headSeconds: Number(head), tailSeconds: Number(tail) },
    profileKey: profile,
    signatureTag,
  }
}
