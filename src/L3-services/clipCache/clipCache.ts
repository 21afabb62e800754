import {
  fileExists,
  getFileStats,
  listDirectory,
  removeFile,
  writeAtomically,
} from '../../L1-infra/fileSystem/fileSystem.js'
import { join } from '../../L1-infra/paths/paths.js'
import logger from '../../L1-infra/logger/configLogger.js'
import {
  HardwareEncoderUnavailable,
  RunCancelled,
  SegmentBuildFailed,
} from '../../L0-pure/errors/errors.js'
import { cacheFileName, parseCacheFileName, profileKey, sameTrim } from '../../L0-pure/trim/trim.js'
import type { CacheEntry, NormalizationProfile, SourceAsset, TrimSpec } from '../../L0-pure/types/index.js'
import { shortHash } from '../assetCatalog/assetCatalog.js'

/** Fills the given temporary path with the segment; the cache renames it into place. */
export type SegmentBuilder = (partialPath: string) => Promise<void>

export interface CacheLookup {
  entry: CacheEntry
  /** False on a cache hit (no transcode ran for this call). */
  built: boolean
}

export interface ClipCacheOptions {
  /**
   * Entries of the same source under another trim or profile are kept while
   * younger than this; a concurrent run sharing the directory may still need
   * them. Entries built from an older source signature are always purged.
   */
  purgeGraceMs?: number
}

export const DEFAULT_PURGE_GRACE_MS = 10 * 60 * 1000

/**
 * On-disk store of normalized segments for one {@link NormalizationProfile}.
 *
 * Key: `(assetKey, trim, profile, source signature)`, encoded in the filename.
 * Within a process at most one build per key runs; concurrent callers join it.
 */
export class ClipCache {
  private readonly inFlight = new Map<string, Promise<CacheLookup>>()
  readonly profileKey: string
  private readonly purgeGraceMs: number

  constructor(
    readonly cacheDir: string,
    readonly profile: NormalizationProfile,
    options: ClipCacheOptions = {},
  ) {
    this.profileKey = profileKey(profile)
    this.purgeGraceMs = options.purgeGraceMs ?? DEFAULT_PURGE_GRACE_MS
  }

  /** The entry an asset/trim pair maps to, whether or not it exists yet. */
  entryFor(asset: SourceAsset, trim: TrimSpec): CacheEntry {
    const signatureTag = shortHash(asset.signature)
    return {
      assetKey: asset.assetKey,
      trim,
      profileKey: this.profileKey,
      signatureTag,
      path: join(this.cacheDir, cacheFileName(asset.assetKey, trim, this.profile, signatureTag)),
    }
  }

  /**
   * Return the cached segment, building it first on a miss.
   *
   * @throws SegmentBuildFailed wrapping the builder's error
   * @throws HardwareEncoderUnavailable / RunCancelled unchanged, so callers can react
   */
  getOrBuild(asset: SourceAsset, trim: TrimSpec, build: SegmentBuilder): Promise<CacheLookup> {
    const entry = this.entryFor(asset, trim)
    const pending = this.inFlight.get(entry.path)
    if (pending) {
      logger.debug(`Joining in-flight build: ${entry.path}`)
      return pending.then((lookup) => ({ entry: lookup.entry, built: false }))
    }

    const lookup = this.lookupOrBuild(asset, entry, build).finally(() => {
      this.inFlight.delete(entry.path)
    })
    this.inFlight.set(entry.path, lookup)
    return lookup
  }

  private async lookupOrBuild(asset: SourceAsset, entry: CacheEntry, build: SegmentBuilder): Promise<CacheLookup> {
    if (await fileExists(entry.path)) {
      logger.debug(`Cache hit: ${entry.path}`)
      return { entry, built: false }
    }

    await this.purgeStale(entry)
    logger.debug(`Cache miss, building: ${entry.path}`)
    try {
      await writeAtomically(entry.path, build)
    } catch (err: unknown) {
      if (err instanceof HardwareEncoderUnavailable || err instanceof RunCancelled) throw err
      throw new SegmentBuildFailed(asset, err)
    }
    return { entry, built: true }
  }

  /** Delete finished entries of the same asset under any other key, outside the grace window. */
  private async purgeStale(entry: CacheEntry): Promise<void> {
    const cutoff = Date.now() - this.purgeGraceMs
    for (const stale of await this.list()) {
      if (stale.assetKey !== entry.assetKey || stale.path === entry.path) continue
      if (stale.signatureTag === entry.signatureTag && (await getFileStats(stale.path)).mtimeMs > cutoff) {
        logger.debug(`Keeping recent cache entry: ${stale.path}`)
        continue
      }
      logger.info(`Removing stale cache entry: ${stale.path}`)
      await removeFile(stale.path)
    }
  }

  /** Every finished entry in the cache directory (partials and foreign files are ignored). */
  async list(): Promise<CacheEntry[]> {
    if (!(await fileExists(this.cacheDir))) return []
    const entries: CacheEntry[] = []
    for (const name of (await listDirectory(this.cacheDir)).sort()) {
      const parsed = parseCacheFileName(name)
      if (parsed) entries.push({ ...parsed, path: join(this.cacheDir, name) })
    }
    return entries
  }

  /**
   * Delete entries whose trim or profile differ from the given ones.
   *
   * @returns the removed entries
   */
  async pruneMismatched(trim: TrimSpec): Promise<CacheEntry[]> {
    const removed: CacheEntry[] = []
    for (const entry of await this.list()) {
      if (sameTrim(entry.trim, trim) && entry.profileKey === this.profileKey) continue
      await removeFile(entry.path)
      removed.push(entry)
    }
    if (removed.length > 0) logger.info(`Pruned ${removed.length} mismatched cache entr${removed.length === 1 ? 'y' : 'ies'}`)
    return removed
  }
}
