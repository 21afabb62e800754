import { createHash } from 'crypto'
import { fileExists, getFileStats, listFilesRecursive } from '../../L1-infra/fileSystem/fileSystem.js'
import { extname, fileStem, resolve } from '../../L1-infra/paths/paths.js'
import logger from '../../L1-infra/logger/configLogger.js'
import { EmptyCatalog, describeError } from '../../L0-pure/errors/errors.js'
import { sanitizeStem } from '../../L0-pure/trim/trim.js'
import type { MediaInfo, SourceAsset } from '../../L0-pure/types/index.js'
import type { MediaProber } from '../../L2-clients/ffmpeg/probe.js'

// ── Constants ────────────────────────────────────────────────────────────────

export const VIDEO_EXTENSIONS: readonly string[] = ['.mp4', '.mov', '.mkv', '.avi', '.webm', '.flv', '.m4v']

export const AUDIO_EXTENSIONS: readonly string[] = ['.mp3', '.wav', '.m4a', '.aac', '.flac', '.ogg']

function hasExtension(filePath: string, extensions: readonly string[]): boolean {
  return extensions.includes(extname(filePath).toLowerCase())
}

/** First 8 hex chars of sha1(text). */
export function shortHash(text: string): string {
  return createHash('sha1').update(text).digest('hex').slice(0, 8)
}

/** Stat a video file into a {@link SourceAsset}. */
export async function describeAsset(filePath: string): Promise<SourceAsset> {
  const absolute = resolve(filePath)
  const stats = await getFileStats(absolute)
  const stem = fileStem(absolute)
  const modifiedMs = Math.floor(stats.mtimeMs)
  return {
    path: absolute,
    stem,
    extension: extname(absolute).toLowerCase(),
    assetKey: `${sanitizeStem(stem)}-${shortHash(absolute)}`,
    sizeBytes: stats.size,
    modifiedMs,
    signature: `${stats.size}-${modifiedMs}`,
  }
}

async function isDirectory(path: string): Promise<boolean> {
  if (!(await fileExists(path))) return false
  return (await getFileStats(path)).isDirectory()
}

// ── Catalog ──────────────────────────────────────────────────────────────────

/**
 * Enumerates source videos and background tracks, and memoizes media probes.
 *
 * One catalog lives for one run; its probe results are shared by every job.
 */
export class AssetCatalog {
  private readonly probes = new Map<string, Promise<MediaInfo>>()

  constructor(private readonly prober: MediaProber) {}

  /**
   * Every supported video under each directory (recursive), sorted by path
   * within a directory, directories in the order given. Duplicate paths are
   * kept once.
   *
   * @throws EmptyCatalog when a directory is missing or holds no videos
   */
  async listVideos(dirs: readonly string[]): Promise<SourceAsset[]> {
    const seen = new Set<string>()
    const assets: SourceAsset[] = []

    for (const dir of dirs) {
      const absoluteDir = resolve(dir)
      if (!(await isDirectory(absoluteDir))) {
        throw new EmptyCatalog(absoluteDir, 'directory not found')
      }
      const videos = (await listFilesRecursive(absoluteDir)).filter((f) => hasExtension(f, VIDEO_EXTENSIONS))
      if (videos.length === 0) {
        throw new EmptyCatalog(absoluteDir, `no video files (${VIDEO_EXTENSIONS.join(' ')})`)
      }
      for (const video of videos) {
        if (seen.has(video)) continue
        seen.add(video)
        assets.push(await describeAsset(video))
      }
      logger.info(`Found ${videos.length} video(s) in ${absoluteDir}`)
    }

    return assets
  }

  /**
   * Background music candidates: the file itself, or every audio file under
   * a directory (recursive, sorted).
   *
   * @throws EmptyCatalog when nothing usable is found
   */
  async resolveBgm(bgmPath: string): Promise<string[]> {
    const absolute = resolve(bgmPath)
    if (!(await fileExists(absolute))) {
      throw new EmptyCatalog(absolute, 'BGM path not found')
    }
    if (!(await isDirectory(absolute))) {
      if (!hasExtension(absolute, AUDIO_EXTENSIONS)) {
        throw new EmptyCatalog(absolute, `not a supported audio file (${AUDIO_EXTENSIONS.join(' ')})`)
      }
      return [absolute]
    }
    const tracks = (await listFilesRecursive(absolute)).filter((f) => hasExtension(f, AUDIO_EXTENSIONS))
    if (tracks.length === 0) {
      throw new EmptyCatalog(absolute, `no audio files (${AUDIO_EXTENSIONS.join(' ')})`)
    }
    logger.info(`Found ${tracks.length} BGM track(s) in ${absolute}`)
    return tracks
  }

  /** Media info for an asset, probed once. A failed probe yields `{}`. */
  probe(asset: SourceAsset): Promise<MediaInfo> {
    const cached = this.probes.get(asset.path)
    if (cached) return cached

    const pending = this.prober.probe(asset.path).catch((err: unknown): MediaInfo => {
      logger.warn(`Could not probe ${asset.path}: ${describeError(err)}`)
      return {}
    })
    this.probes.set(asset.path, pending)
    return pending
  }
}
