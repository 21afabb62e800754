import { describe, it, expect, afterEach } from 'vitest'
import { promises as fsp, readFileSync } from 'fs'
import { join } from 'path'
import {
  buildConcatArgs,
  concatListContent,
  concatSegments,
  quoteConcatPath,
} from '../../../L3-services/concat/concatenator.js'
import { ConcatFailed, ProfileMismatch } from '../../../L0-pure/errors/errors.js'
import type { CacheEntry } from '../../../L0-pure/types/index.js'
import { cleanupTempDirs, createFakeRunner, failure, makeTempDir } from '../../fakes.js'

afterEach(async () => {
  await cleanupTempDirs()
})

function entry(path: string, profileKey = '1080x1920_25fps_pad'): CacheEntry {
  return { assetKey: 'a-00000000', trim: { headSeconds: 0, tailSeconds: 1 }, profileKey, signatureTag: 'deadbeef', path }
}

describe('concat list', () => {
  it('escapes single quotes', () => {
    expect(quoteConcatPath("/cache/it's.ts")).toBe(`'/cache/it'\\''s.ts'`)
  })

  it('writes one file line per segment, in order', () => {
    expect(concatListContent(['/c/b.ts', '/c/a.ts', '/c/b.ts'])).toBe("file '/c/b.ts'\nfile '/c/a.ts'\nfile '/c/b.ts'\n")
  })
})

describe('buildConcatArgs', () => {
  it('stream-copies through the concat demuxer', () => {
    expect(buildConcatArgs('/w/list.txt', '/w/out.mp4')).toEqual([
      '-hide_banner', '-nostdin', '-y',
      '-fflags', '+genpts',
      '-f', 'concat', '-safe', '0', '-i', '/w/list.txt',
      '-c', 'copy', '-an', '-avoid_negative_ts', 'make_zero',
      '-f', 'mp4', '/w/out.mp4',
    ])
  })
})

describe('concat timestamps', () => {
  it('regenerates timestamps on the input side of the demuxer', () => {
    const args = buildConcatArgs('/w/list.txt', '/w/out.mp4')
    expect(args.indexOf('-fflags')).toBeLessThan(args.indexOf('-i'))
    expect(args[args.indexOf('-fflags') + 1]).toBe('+genpts')
  })
})

describe('concatSegments', () => {
  it('refuses segments from different profiles without running ffmpeg', async () => {
    const runner = createFakeRunner()
    const error = await concatSegments(runner, [entry('/c/a.ts'), entry('/c/b.ts', '720x1280_25fps_pad')], '/w/out.mp4')
      .catch((err: unknown) => err)

    expect(error).toBeInstanceOf(ProfileMismatch)
    expect(error).toMatchObject({ profileKeys: ['1080x1920_25fps_pad', '720x1280_25fps_pad'] })
    expect(runner.calls).toEqual([])
  })

  it('refuses an empty list', async () => {
    await expect(concatSegments(createFakeRunner(), [], '/w/out.mp4')).rejects.toBeInstanceOf(ProfileMismatch)
  })

  it('writes the list, joins, and cleans up the list', async () => {
    const dir = await makeTempDir()
    const output = join(dir, 'joined.mp4')
    let listSeen = ''
    const runner = createFakeRunner({
      intercept: (_tool, args) => {
        listSeen = readFileSync(args[args.indexOf('-i') + 1], 'utf-8')
        return undefined
      },
    })

    await concatSegments(runner, [entry('/c/b.ts'), entry('/c/a.ts')], output)

    expect(listSeen).toBe("file '/c/b.ts'\nfile '/c/a.ts'\n")
    expect(runner.calls).toHaveLength(1)
    expect(runner.calls[0].args.slice(0, -1)).toEqual(buildConcatArgs(`${output}.concat.txt`, '').slice(0, -1))
    expect(await fsp.readdir(dir)).toEqual(['joined.mp4'])
  })

  it('wraps an ffmpeg failure in ConcatFailed', async () => {
    const dir = await makeTempDir()
    const runner = createFakeRunner({ intercept: () => failure('Non-monotonous DTS') })

    await expect(concatSegments(runner, [entry('/c/a.ts')], join(dir, 'joined.mp4'))).rejects.toBeInstanceOf(ConcatFailed)
    expect(await fsp.readdir(dir)).toEqual([])
  })
})
