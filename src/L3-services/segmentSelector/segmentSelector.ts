import { EmptyCatalog } from '../../L0-pure/errors/errors.js'
import { pickOne, sample } from '../../L0-pure/random/random.js'
import type { RandomSource } from '../../L0-pure/random/random.js'
import type { MediaInfo, SegmentSelection, SourceAsset, TrimSpec } from '../../L0-pure/types/index.js'

// ── Selection ────────────────────────────────────────────────────────────────

/**
 * Choose `count` segments from `pool`, all with the run's trim.
 * Order of the result is the concat order.
 */
export function select(
  pool: readonly SourceAsset[],
  count: number,
  trim: TrimSpec,
  random: RandomSource,
): SegmentSelection {
  return sample(pool, count, random).map((asset) => ({ asset, trim }))
}

/** One BGM track, drawn from the job's stream after its segments. */
export function pickBgm(bgmList: readonly string[], random: RandomSource): string {
  const track = pickOne(bgmList, random)
  if (track === undefined) throw new EmptyCatalog('bgm', 'no BGM tracks to choose from')
  return track
}

// ── Resolution groups ────────────────────────────────────────────────────────

/** `WxH` group label for probed media, or undefined when it has no dimensions. */
export function resolutionKey(info: MediaInfo): string | undefined {
  if (info.width === undefined || info.height === undefined) return undefined
  return `${info.width}x${info.height}`
}

/**
 * Partition assets by probed resolution. Assets that cannot be probed belong
 * to no group. Order within a group follows the input order.
 */
export async function groupByResolution(
  assets: readonly SourceAsset[],
  probe: (asset: SourceAsset) => Promise<MediaInfo>,
): Promise<Map<string, SourceAsset[]>> {
  const infos = await Promise.all(assets.map((asset) => probe(asset)))
  const groups = new Map<string, SourceAsset[]>()
  assets.forEach((asset, i) => {
    const key = resolutionKey(infos[i])
    if (key === undefined) return
    const members = groups.get(key)
    if (members) members.push(asset)
    else groups.set(key, [asset])
  })
  return groups
}

export interface OutputAllocation {
  group: string
  pool: SourceAsset[]
  outputs: number
}

/**
 * Split `outputs` across groups with at least `clipsPerOutput` members,
 * proportionally to group size (largest remainder; ties go to the larger
 * group, then the lower key).
 *
 * @returns allocations with at least one output, largest group first, or
 *   undefined when no group qualifies
 */
export function allocateOutputs(
  groups: ReadonlyMap<string, SourceAsset[]>,
  outputs: number,
  clipsPerOutput: number,
): OutputAllocation[] | undefined {
  const qualifying = [...groups.entries()]
    .filter(([, members]) => members.length >= clipsPerOutput)
    .sort(([keyA, a], [keyB, b]) => b.length - a.length || keyA.localeCompare(keyB))
  if (qualifying.length === 0) return undefined

  const totalMembers = qualifying.reduce((sum, [, members]) => sum + members.length, 0)
  const shares = qualifying.map(([group, members], order) => {
    const quota = (outputs * members.length) / totalMembers
    return { group, pool: members, outputs: Math.floor(quota), remainder: quota - Math.floor(quota), order }
  })

  let left = outputs - shares.reduce((sum, s) => sum + s.outputs, 0)
  const byRemainder = [...shares].sort((a, b) => b.remainder - a.remainder || a.order - b.order)
  for (const share of byRemainder) {
    if (left === 0) break
    share.outputs += 1
    left -= 1
  }

  return shares
    .filter((s) => s.outputs > 0)
    .map(({ group, pool, outputs: count }) => ({ group, pool, outputs: count }))
}
