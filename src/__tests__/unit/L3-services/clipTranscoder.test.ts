import { describe, it, expect } from 'vitest'
import {
  buildTranscodeArgs,
  encoderArgs,
  transcodeSegment,
  videoFilter,
} from '../../../L3-services/clipCache/clipTranscoder.js'
import { hardwareProfile, softwareProfile } from '../../../L3-services/encoding/encodingProfileResolver.js'
import { CommandFailed, HardwareEncoderUnavailable } from '../../../L0-pure/errors/errors.js'
import type { NormalizationProfile } from '../../../L0-pure/types/index.js'
import { createFakeRunner, failure } from '../../fakes.js'

const PAD: NormalizationProfile = { width: 1080, height: 1920, fps: 25, fillMode: 'pad', pixelFormat: 'yuv420p' }
const CROP: NormalizationProfile = { ...PAD, fillMode: 'crop' }
const SOFTWARE = softwareProfile({ quality: 'balanced' })
const HARDWARE = hardwareProfile({ quality: 'balanced' })

describe('videoFilter', () => {
  it('letterboxes in pad mode', () => {
    expect(videoFilter(PAD)).toBe(
      'scale=1080:1920:force_original_aspect_ratio=decrease,pad=1080:1920:(ow-iw)/2:(oh-ih)/2:black,fps=25,format=yuv420p,setsar=1',
    )
  })

  it('center-crops in crop mode', () => {
    expect(videoFilter({ ...CROP, fps: 29.97 })).toBe(
      'scale=1080:1920:force_original_aspect_ratio=increase,crop=1080:1920,fps=29.97,format=yuv420p,setsar=1',
    )
  })
})

describe('encoderArgs', () => {
  it('uses constant quality for NVENC', () => {
    expect(encoderArgs(HARDWARE)).toEqual(['-c:v', 'h264_nvenc', '-preset', 'p6', '-rc', 'vbr', '-cq', '31', '-b:v', '0', '-pix_fmt', 'yuv420p'])
  })

  it('uses CRF for x264', () => {
    expect(encoderArgs(SOFTWARE)).toEqual(['-c:v', 'libx264', '-crf', '23', '-preset', 'slow', '-profile:v', 'high', '-pix_fmt', 'yuv420p'])
  })
})

describe('buildTranscodeArgs', () => {
  it('cuts the tail when the duration is known', () => {
    const args = buildTranscodeArgs({
      inputPath: '/in/a.mp4',
      durationSeconds: 10,
      trim: { headSeconds: 0, tailSeconds: 1 },
      profile: PAD,
      encoding: SOFTWARE,
      outputPath: '/cache/a.ts.partial-1',
    })

    expect(args).toEqual([
      '-hide_banner', '-nostdin', '-y',
      '-fflags', '+genpts',
      '-i', '/in/a.mp4',
      '-t', '9',
      '-vf', videoFilter(PAD),
      '-an',
      '-map_metadata', '-1',
      '-c:v', 'libx264', '-crf', '23', '-preset', 'slow', '-profile:v', 'high', '-pix_fmt', 'yuv420p',
      '-f', 'mpegts',
      '/cache/a.ts.partial-1',
    ])
  })

  it('regenerates timestamps as an input option', () => {
    const args = buildTranscodeArgs({
      inputPath: '/in/a.mp4',
      durationSeconds: 10,
      trim: { headSeconds: 2, tailSeconds: 1 },
      profile: PAD,
      encoding: SOFTWARE,
      outputPath: '/out.ts',
    })

    expect(args.indexOf('+genpts')).toBe(args.indexOf('-fflags') + 1)
    expect(args.indexOf('-fflags')).toBeLessThan(args.indexOf('-i'))
    expect(args.filter((a) => a === '-fflags')).toHaveLength(1)
  })

  it('seeks before the input for a head trim', () => {
    const args = buildTranscodeArgs({
      inputPath: '/in/a.mp4',
      durationSeconds: 10,
      trim: { headSeconds: 2, tailSeconds: 1 },
      profile: PAD,
      encoding: SOFTWARE,
      outputPath: '/out.ts',
    })

    expect(args.slice(5, 11)).toEqual(['-ss', '2', '-i', '/in/a.mp4', '-t', '7'])
  })

  it('skips the tail trim when the duration is unknown', () => {
    const args = buildTranscodeArgs({
      inputPath: '/in/a.mp4',
      trim: { headSeconds: 1.5, tailSeconds: 1 },
      profile: PAD,
      encoding: SOFTWARE,
      outputPath: '/out.ts',
    })

    expect(args.slice(5, 9)).toEqual(['-ss', '1.5', '-i', '/in/a.mp4'])
    expect(args).not.toContain('-t')
  })

  it('clamps a trim longer than the source', () => {
    const args = buildTranscodeArgs({
      inputPath: '/in/short.mp4',
      durationSeconds: 2,
      trim: { headSeconds: 3, tailSeconds: 1 },
      profile: PAD,
      encoding: SOFTWARE,
      outputPath: '/out.ts',
    })

    expect(args.slice(5, 11)).toEqual(['-ss', '1.5', '-i', '/in/short.mp4', '-t', '0.5'])
  })
})

describe('transcodeSegment', () => {
  const request = {
    inputPath: '/in/a.mp4',
    durationSeconds: 10,
    trim: { headSeconds: 0, tailSeconds: 1 },
    profile: PAD,
    outputPath: '/out.ts',
  }

  it('reports a failed hardware encode as HardwareEncoderUnavailable', async () => {
    const runner = createFakeRunner({ intercept: () => failure('No NVENC capable devices found') })
    const error = await transcodeSegment(runner, { ...request, encoding: HARDWARE }).catch((err: unknown) => err)

    expect(error).toBeInstanceOf(HardwareEncoderUnavailable)
    expect(error).toMatchObject({ encoder: 'h264_nvenc' })
  })

  it('reports a failed software encode as CommandFailed', async () => {
    const runner = createFakeRunner({ intercept: () => failure() })
    await expect(transcodeSegment(runner, { ...request, encoding: SOFTWARE })).rejects.toBeInstanceOf(CommandFailed)
  })
})
