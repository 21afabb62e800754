import { describe, it, expect } from 'vitest'
import {
  EncodingProfileResolver,
  hardwareProfile,
  parseEncoderList,
  softwareProfile,
} from '../../../L3-services/encoding/encodingProfileResolver.js'
import type { CommandRunner } from '../../../L2-clients/ffmpeg/ffmpeg.js'
import { createFakeRunner } from '../../fakes.js'

describe('parseEncoderList', () => {
  it('reads encoder names and skips the legend', () => {
    const output = [
      'Encoders:',
      ' V..... = Video',
      ' A..... = Audio',
      ' ------',
      ' V....D libx264              libx264 H.264 / AVC',
      ' V....D h264_nvenc           NVIDIA NVENC H.264 encoder (codec h264)',
      ' A....D aac                  AAC (Advanced Audio Coding)',
    ].join('\n')

    expect([...parseEncoderList(output)]).toEqual(['libx264', 'h264_nvenc', 'aac'])
  })
})

describe('EncodingProfileResolver.resolve', () => {
  it('picks NVENC when it is listed and preferred', async () => {
    const resolver = new EncodingProfileResolver(createFakeRunner({ encoders: ['libx264', 'h264_nvenc'] }), { quality: 'balanced' })

    expect(await resolver.resolve(true)).toEqual({
      family: 'hardware',
      encoder: 'h264_nvenc',
      quality: 'balanced',
      preset: 'p6',
      qualityValue: 31,
      audioBitrate: '128k',
    })
  })

  it('falls back to x264 when NVENC is not listed', async () => {
    const resolver = new EncodingProfileResolver(createFakeRunner({ encoders: ['libx264'] }), { quality: 'balanced' })

    expect(await resolver.resolve(true)).toEqual({
      family: 'software',
      encoder: 'libx264',
      quality: 'balanced',
      preset: 'slow',
      qualityValue: 23,
      audioBitrate: '128k',
    })
  })

  it('does not probe when hardware is not preferred', async () => {
    const runner = createFakeRunner({ encoders: ['h264_nvenc'] })
    const profile = await new EncodingProfileResolver(runner, { quality: 'size' }).resolve(false)

    expect(profile.encoder).toBe('libx264')
    expect(runner.calls).toEqual([])
  })

  it('probes only once', async () => {
    const runner = createFakeRunner({ encoders: ['h264_nvenc'] })
    const resolver = new EncodingProfileResolver(runner, { quality: 'balanced' })

    await Promise.all([resolver.resolve(true), resolver.resolve(true), resolver.probe()])
    expect(runner.calls.filter((c) => c.args.includes('-encoders'))).toHaveLength(1)
  })

  it('treats a failing probe as no hardware', async () => {
    const broken: CommandRunner = {
      run: async () => { throw new Error('spawn ffmpeg ENOENT') },
    }
    const profile = await new EncodingProfileResolver(broken, { quality: 'balanced' }).resolve(true)

    expect(profile.family).toBe('software')
  })

  it('applies explicit overrides', () => {
    expect(hardwareProfile({ quality: 'visual', nvencCq: 25, presetGpu: 'p4' })).toMatchObject({ qualityValue: 25, preset: 'p4' })
    expect(softwareProfile({ quality: 'visual', x264Crf: 18, presetCpu: 'fast' })).toMatchObject({ qualityValue: 18, preset: 'fast' })
  })
})

describe('EncodingProfileResolver.fallback', () => {
  it('maps hardware quality knobs through the lookup tables', () => {
    const resolver = new EncodingProfileResolver(createFakeRunner(), { quality: 'visual' })

    expect(resolver.fallback(hardwareProfile({ quality: 'visual' }))).toEqual({
      family: 'software',
      encoder: 'libx264',
      quality: 'visual',
      preset: 'medium',
      qualityValue: 20,
      audioBitrate: '192k',
    })
  })

  it('maps an overridden cq to the nearest table row', () => {
    const resolver = new EncodingProfileResolver(createFakeRunner(), { quality: 'balanced', nvencCq: 33 })
    const fallback = resolver.fallback(hardwareProfile({ quality: 'balanced', nvencCq: 33 }))

    expect(fallback.qualityValue).toBe(26)
    expect(fallback.preset).toBe('slow')
  })

  it('prefers explicit x264 settings', () => {
    const resolver = new EncodingProfileResolver(createFakeRunner(), { quality: 'size', x264Crf: 21, presetCpu: 'fast' })
    expect(resolver.fallback(hardwareProfile({ quality: 'size' }))).toMatchObject({ qualityValue: 21, preset: 'fast' })
  })

  it('returns a software profile unchanged', () => {
    const resolver = new EncodingProfileResolver(createFakeRunner(), { quality: 'balanced' })
    const profile = softwareProfile({ quality: 'balanced' })
    expect(resolver.fallback(profile)).toBe(profile)
  })
})
