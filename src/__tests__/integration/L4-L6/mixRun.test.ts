import { describe, it, expect, afterEach } from 'vitest'
import { basename, join } from 'path'
import { existsSync } from 'fs'
import { runMix, planJobs } from '../../../L6-pipeline/mixRun.js'
import { buildMixSettings } from '../../../L1-infra/config/mixSettings.js'
import type { MixOptions, MixSettings } from '../../../L1-infra/config/mixSettings.js'
import { AssetCatalog } from '../../../L3-services/assetCatalog/assetCatalog.js'
import { ClipCache } from '../../../L3-services/clipCache/clipCache.js'
import { EmptyCatalog, InvalidSettings } from '../../../L0-pure/errors/errors.js'
import type { JobSuccess, MediaInfo, RunEvent } from '../../../L0-pure/types/index.js'
import { cleanupTempDirs, createFakeProber, createFakeRunner, failure, makeTempDir, writeBytes } from '../../fakes.js'

afterEach(async () => {
  await cleanupTempDirs()
})

// ── Fixtures ─────────────────────────────────────────────────────────────

const JOINED_DURATION = 36.04

interface Workspace {
  root: string
  videos: string
  bgm: string
}

async function workspace(clips: Record<string, number>): Promise<Workspace> {
  const root = await makeTempDir()
  const videos = join(root, 'videos')
  const bgm = join(root, 'bgm', 'track.mp3')
  for (const [name, bytes] of Object.entries(clips)) await writeBytes(join(videos, name), bytes)
  await writeBytes(bgm, 500)
  return { root, videos, bgm }
}

function settingsFor(ws: Workspace, overrides: Partial<MixOptions> = {}): MixSettings {
  return buildMixSettings({
    videoDirs: [ws.videos],
    bgmPath: ws.bgm,
    output: join(ws.root, 'out'),
    cacheDir: join(ws.root, 'cache'),
    threads: 2,
    qualityProfile: 'balanced',
    seed: 42,
    ...overrides,
  })
}

/** Sources are 10s long; their resolution comes from the filename prefix. */
function infoFor(filePath: string): MediaInfo | undefined {
  const name = basename(filePath)
  if (name === 'joined.mp4') return { durationSeconds: JOINED_DURATION, width: 1080, height: 1920, fps: 25 }
  if (name.startsWith('hd_')) return { durationSeconds: 10, width: 1920, height: 1080, fps: 30 }
  if (name.startsWith('md_')) return { durationSeconds: 10, width: 1280, height: 720, fps: 30 }
  if (name.startsWith('sd_')) return { durationSeconds: 10, width: 640, height: 480, fps: 30 }
  return undefined
}

function inputOf(args: string[]): string {
  return args[args.indexOf('-i') + 1]
}

function succeeded(results: readonly { status: string }[]): JobSuccess[] {
  return results.filter((r): r is JobSuccess => r.status === 'succeeded')
}

function tenClips(): Record<string, number> {
  const clips: Record<string, number> = {}
  for (let i = 1; i <= 10; i++) clips[`hd_${String(i).padStart(2, '0')}.mp4`] = 1000
  return clips
}

// ── runMix ───────────────────────────────────────────────────────────────

describe('runMix', () => {
  it('mixes every requested output from cached segments', async () => {
    const ws = await workspace(tenClips())
    const runner = createFakeRunner()
    const settings = settingsFor(ws, { outputs: 3, clipsPerOutput: 4 })

    const summary = await runMix(settings, { runner, prober: createFakeProber(infoFor) })

    expect(summary).toMatchObject({ runSeed: 42, total: 3, succeeded: 3, failed: 0, ok: true })
    const outputs = succeeded(summary.results).map((r) => r.outputPath)
    expect(outputs).toEqual([1, 2, 3].map((i) => join(ws.root, 'out', `concat_4videos_with_bgm_${i}.mp4`)))
    for (const output of outputs) expect(existsSync(output)).toBe(true)

    // One transcode per distinct source, however many jobs picked it
    const distinct = new Set(succeeded(summary.results).flatMap((r) => r.selection.map((s) => s.asset.path)))
    expect(runner.transcodes()).toHaveLength(distinct.size)
    const cached = await new ClipCache(settings.cacheDir, { width: 1080, height: 1920, fps: 25, fillMode: 'pad', pixelFormat: 'yuv420p' }).list()
    expect(cached).toHaveLength(distinct.size)
    expect(cached.length).toBeLessThanOrEqual(10)
  })

  it('picks distinct clips within an output when the pool allows it', async () => {
    const ws = await workspace(tenClips())
    const summary = await runMix(settingsFor(ws, { outputs: 2, clipsPerOutput: 4 }), {
      runner: createFakeRunner(),
      prober: createFakeProber(infoFor),
    })

    for (const result of succeeded(summary.results)) {
      expect(new Set(result.selection.map((s) => s.asset.path)).size).toBe(4)
    }
  })

  it('reproduces the same selection for the same seed', async () => {
    const ws = await workspace(tenClips())
    const settings = settingsFor(ws, { outputs: 2, clipsPerOutput: 3 })
    const first = await runMix(settings, { runner: createFakeRunner(), prober: createFakeProber(infoFor) })
    const second = await runMix(settings, { runner: createFakeRunner(), prober: createFakeProber(infoFor) })

    const picks = (s: typeof first) => succeeded(s.results).map((r) => [r.selection.map((x) => x.asset.path), r.bgm])
    expect(picks(second)).toEqual(picks(first))
  })

  it('reuses the cache on a second run', async () => {
    const ws = await workspace(tenClips())
    const settings = settingsFor(ws, { outputs: 1, clipsPerOutput: 4 })
    await runMix(settings, { runner: createFakeRunner(), prober: createFakeProber(infoFor) })

    const rerun = createFakeRunner()
    const summary = await runMix(settings, { runner: rerun, prober: createFakeProber(infoFor) })

    expect(summary.succeeded).toBe(1)
    expect(rerun.transcodes()).toEqual([])
  })

  it('cuts the looped BGM to the joined video duration', async () => {
    const ws = await workspace(tenClips())
    const runner = createFakeRunner()
    await runMix(settingsFor(ws, { outputs: 1, clipsPerOutput: 4 }), { runner, prober: createFakeProber(infoFor) })

    const muxArgs = runner.calls.find((c) => c.args.includes('-stream_loop'))?.args ?? []
    expect(muxArgs[muxArgs.indexOf('-t') + 1]).toBe('36.04')
    expect(muxArgs).toContain(ws.bgm)
  })

  it('reports compression against the selected sources', async () => {
    const ws = await workspace(tenClips())
    const summary = await runMix(settingsFor(ws, { outputs: 1, clipsPerOutput: 4 }), {
      runner: createFakeRunner({ outputBytes: 100 }),
      prober: createFakeProber(infoFor),
    })

    expect(succeeded(summary.results)[0].compression).toEqual({ kind: 'known', inputBytes: 4000, outputBytes: 100, ratio: 0.025 })
    expect(summary.totals).toEqual({ inputBytes: 4000, outputBytes: 100, ratio: 0.025 })
  })

  it('isolates a failing job from the rest of the batch', async () => {
    const ws = await workspace({ 'hd_1.mp4': 1000, 'hd_2.mp4': 1000, 'md_1.mp4': 1000, 'md_2.mp4': 1000, 'sd_1.mp4': 1000, 'sd_2.mp4': 1000 })
    const runner = createFakeRunner({
      intercept: (_tool, args) => (args.includes('mpegts') && basename(inputOf(args)).startsWith('sd_') ? failure() : undefined),
    })

    const summary = await runMix(settingsFor(ws, { outputs: 3, clipsPerOutput: 2, groupByResolution: true }), {
      runner,
      prober: createFakeProber(infoFor),
    })

    expect(summary).toMatchObject({ total: 3, succeeded: 2, failed: 1, ok: true })
    expect(summary.results.map((r) => r.status)).toEqual(['succeeded', 'succeeded', 'failed'])
    expect(summary.results[2]).toMatchObject({ status: 'failed', index: 3, stage: 'transcode', error: { name: 'SegmentBuildFailed' } })
    expect(existsSync(join(ws.root, 'out', 'concat_2videos_with_bgm_3.mp4'))).toBe(false)
  })

  it('keeps grouped outputs within one resolution', async () => {
    const ws = await workspace({ 'hd_1.mp4': 1000, 'hd_2.mp4': 1000, 'hd_3.mp4': 1000, 'md_1.mp4': 1000, 'md_2.mp4': 1000 })
    const summary = await runMix(settingsFor(ws, { outputs: 2, clipsPerOutput: 2, groupByResolution: true }), {
      runner: createFakeRunner(),
      prober: createFakeProber(infoFor),
    })

    for (const result of succeeded(summary.results)) {
      const prefixes = new Set(result.selection.map((s) => basename(s.asset.path).slice(0, 3)))
      expect(prefixes.size).toBe(1)
    }
  })

  it('falls back to software when the hardware encoder fails', async () => {
    const ws = await workspace(tenClips())
    const runner = createFakeRunner({
      encoders: ['h264_nvenc', 'libx264'],
      intercept: (_tool, args) => (args.includes('h264_nvenc') ? failure('OpenEncodeSessionEx failed: out of memory') : undefined),
    })
    const events: RunEvent[] = []

    const summary = await runMix(settingsFor(ws, { outputs: 1, clipsPerOutput: 3 }), {
      runner,
      prober: createFakeProber(infoFor),
      onEvent: (e) => events.push(e),
    })

    expect(succeeded(summary.results)[0]).toMatchObject({ encoder: 'libx264', fellBack: true })
    expect(runner.transcodes().filter((c) => c.args.includes('libx264'))).toHaveLength(3)
    expect(events.some((e) => e.type === 'log' && e.level === 'warn' && e.message.includes('retrying with libx264'))).toBe(true)
  })

  it('never tries hardware when it is disabled', async () => {
    const ws = await workspace(tenClips())
    const runner = createFakeRunner({ encoders: ['h264_nvenc', 'libx264'] })
    const summary = await runMix(settingsFor(ws, { outputs: 1, clipsPerOutput: 2, preferHardware: false }), {
      runner,
      prober: createFakeProber(infoFor),
    })

    expect(succeeded(summary.results)[0]).toMatchObject({ encoder: 'libx264', fellBack: false })
    expect(runner.calls.some((c) => c.args.includes('h264_nvenc'))).toBe(false)
  })

  it('emits phases in order and contains listener errors', async () => {
    const ws = await workspace(tenClips())
    const phases: string[] = []
    const summary = await runMix(settingsFor(ws, { outputs: 1, clipsPerOutput: 2 }), {
      runner: createFakeRunner(),
      prober: createFakeProber(infoFor),
      onEvent: (e) => {
        if (e.type === 'phase') phases.push(e.phase)
        throw new Error('listener broke')
      },
    })

    expect(phases).toEqual(['scan', 'prepare', 'mix', 'summary'])
    expect(summary.succeeded).toBe(1)
  })

  it('marks every job as not dispatched when cancelled up front', async () => {
    const ws = await workspace(tenClips())
    const controller = new AbortController()
    controller.abort()
    const runner = createFakeRunner()

    const summary = await runMix(settingsFor(ws, { outputs: 2, clipsPerOutput: 2 }), {
      runner,
      prober: createFakeProber(infoFor),
      signal: controller.signal,
    })

    expect(summary).toMatchObject({ succeeded: 0, failed: 2, ok: false })
    for (const result of summary.results) {
      expect(result).toMatchObject({ status: 'failed', stage: 'dispatch', error: { name: 'RunCancelled' } })
    }
    expect(runner.transcodes()).toEqual([])
  })

  it('fails the run on an empty input directory', async () => {
    const ws = await workspace({ 'notes.txt': 10 })
    await expect(runMix(settingsFor(ws), { runner: createFakeRunner(), prober: createFakeProber(infoFor) }))
      .rejects.toBeInstanceOf(EmptyCatalog)
  })

  it('rejects invalid settings before touching anything', async () => {
    const ws = await workspace(tenClips())
    const runner = createFakeRunner()
    const settings = { ...settingsFor(ws), clipsPerOutput: 0 }

    await expect(runMix(settings, { runner, prober: createFakeProber(infoFor) })).rejects.toBeInstanceOf(InvalidSettings)
    expect(runner.calls).toEqual([])
  })
})

// ── planJobs ─────────────────────────────────────────────────────────────

describe('planJobs', () => {
  it('falls back to the whole catalog when no group is large enough', async () => {
    const ws = await workspace({ 'hd_1.mp4': 1000, 'md_1.mp4': 1000, 'sd_1.mp4': 1000 })
    const catalog = new AssetCatalog(createFakeProber(infoFor))
    const assets = await catalog.listVideos([ws.videos])
    const events: RunEvent[] = []

    const jobs = await planJobs(
      settingsFor(ws, { outputs: 2, clipsPerOutput: 2, groupByResolution: true }),
      assets,
      catalog,
      7,
      (e) => events.push(e),
    )

    expect(jobs.map((j) => [j.index, j.pool.length, j.group])).toEqual([[1, 3, undefined], [2, 3, undefined]])
    expect(events).toContainEqual({ type: 'log', level: 'warn', message: 'No resolution group has 2 clips; selecting from all 3' })
  })

  it('gives each job its own seed', async () => {
    const ws = await workspace(tenClips())
    const catalog = new AssetCatalog(createFakeProber(infoFor))
    const assets = await catalog.listVideos([ws.videos])

    const jobs = await planJobs(settingsFor(ws, { outputs: 3 }), assets, catalog, 7, () => {})
    expect(new Set(jobs.map((j) => j.seed)).size).toBe(3)
  })
})
