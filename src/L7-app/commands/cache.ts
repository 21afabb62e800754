import { getConfig, initConfig } from '../../L1-infra/config/environment.js'
import { DEFAULT_SETTINGS, findSettingsProblems } from '../../L1-infra/config/mixSettings.js'
import { getFileStats } from '../../L1-infra/fileSystem/fileSystem.js'
import { basename, resolve, siblingDir } from '../../L1-infra/paths/paths.js'
import { InvalidSettings, describeError } from '../../L0-pure/errors/errors.js'
import { formatMegabytes } from '../../L0-pure/format/format.js'
import { trimKey } from '../../L0-pure/trim/trim.js'
import type { FillMode, NormalizationProfile } from '../../L0-pure/types/index.js'
import { ClipCache } from '../../L3-services/clipCache/clipCache.js'

export interface CacheCommandOptions {
  cacheDir?: string
  width?: number
  height?: number
  fps?: number
  fill?: string
  trimHead?: number
  trimTail?: number
}

/**
 * Cache directory for a cache subcommand: `--cache-dir`, then
 * `CLIPMIX_CACHE_DIR`, then `<videoDir>_clipcache`.
 */
export function resolveCacheDir(opts: CacheCommandOptions, videoDir?: string): string {
  if (opts.cacheDir) return resolve(opts.cacheDir)
  const fromEnv = getConfig().CACHE_DIR
  if (fromEnv) return resolve(fromEnv)
  if (videoDir) return siblingDir(videoDir, '_clipcache')
  throw new InvalidSettings(['pass --cache-dir, set CLIPMIX_CACHE_DIR, or name the video directory'])
}

function profileFrom(opts: CacheCommandOptions): NormalizationProfile {
  const fillMode: FillMode = opts.fill === 'crop' ? 'crop' : DEFAULT_SETTINGS.fillMode
  return {
    width: opts.width ?? DEFAULT_SETTINGS.width,
    height: opts.height ?? DEFAULT_SETTINGS.height,
    fps: opts.fps ?? DEFAULT_SETTINGS.fps,
    fillMode,
    pixelFormat: 'yuv420p',
  }
}

/** `clipmix cache list` */
export async function runCacheList(videoDir: string | undefined, opts: CacheCommandOptions): Promise<number> {
  initConfig({ cacheDir: opts.cacheDir })
  try {
    const cache = new ClipCache(resolveCacheDir(opts, videoDir), profileFrom(opts))
    const entries = await cache.list()
    let totalBytes = 0
    for (const entry of entries) {
      const { size } = await getFileStats(entry.path)
      totalBytes += size
      console.log(`  ${basename(entry.path)}  ${trimKey(entry.trim)}  ${entry.profileKey}  ${formatMegabytes(size)}`)
    }
    console.log(`${entries.length} entr${entries.length === 1 ? 'y' : 'ies'} in ${cache.cacheDir} (${formatMegabytes(totalBytes)})`)
    return 0
  } catch (err: unknown) {
    console.error(`✖ ${describeError(err)}`)
    return 1
  }
}

/** `clipmix cache prune`: drop entries that do not match the given trim and profile. */
export async function runCachePrune(videoDir: string | undefined, opts: CacheCommandOptions): Promise<number> {
  initConfig({ cacheDir: opts.cacheDir })
  try {
    const problems = findSettingsProblems({
      videoDirs: videoDir ? [videoDir] : ['.'],
      bgmPath: '-',
      width: opts.width,
      height: opts.height,
      fps: opts.fps,
      fillMode: opts.fill,
      trimHead: opts.trimHead,
      trimTail: opts.trimTail,
    })
    if (problems.length > 0) throw new InvalidSettings(problems)

    const cache = new ClipCache(resolveCacheDir(opts, videoDir), profileFrom(opts))
    const removed = await cache.pruneMismatched({
      headSeconds: opts.trimHead ?? DEFAULT_SETTINGS.trimHead,
      tailSeconds: opts.trimTail ?? DEFAULT_SETTINGS.trimTail,
    })
    for (const entry of removed) console.log(`  removed ${basename(entry.path)}`)
    console.log(`Removed ${removed.length} entr${removed.length === 1 ? 'y' : 'ies'} from ${cache.cacheDir}`)
    return 0
  } catch (err: unknown) {
    console.error(`✖ ${describeError(err)}`)
    return 1
  }
}
