import type { QualityProfile } from '../types/index.js'

export const QUALITY_PROFILES: readonly QualityProfile[] = ['visual', 'balanced', 'size']

export interface QualityPreset {
  nvencCq: number
  nvencPreset: string
  x264Crf: number
  x264Preset: string
  audioBitrate: string
}

/** Lower cq/crf = higher quality, larger files. */
export const QUALITY_PRESETS: Record<QualityProfile, QualityPreset> = {
  visual: { nvencCq: 28, nvencPreset: 'p5', x264Crf: 20, x264Preset: 'medium', audioBitrate: '192k' },
  balanced: { nvencCq: 31, nvencPreset: 'p6', x264Crf: 23, x264Preset: 'slow', audioBitrate: '128k' },
  size: { nvencCq: 34, nvencPreset: 'p7', x264Crf: 26, x264Preset: 'veryslow', audioBitrate: '96k' },
}

/**
 * NVENC constant-quality → x264 CRF. The scales differ, so a downgrade
 * goes through this table rather than copying the number.
 */
export const NVENC_CQ_TO_X264_CRF: ReadonlyArray<readonly [cq: number, crf: number]> = [
  [28, 20],
  [31, 23],
  [34, 26],
]

export const NVENC_PRESET_TO_X264_PRESET: Readonly<Record<string, string>> = {
  p1: 'ultrafast',
  p2: 'superfast',
  p3: 'veryfast',
  p4: 'medium',
  p5: 'medium',
  p6: 'slow',
  p7: 'veryslow',
}

export function isQualityProfile(value: string): value is QualityProfile {
  return (QUALITY_PROFILES as readonly string[]).includes(value)
}

/** Map a cq to its crf; values between table rows take the nearest row (lower cq on ties). */
export function mapCqToCrf(cq: number): number {
  let best = NVENC_CQ_TO_X264_CRF[0]
  for (const row of NVENC_CQ_TO_X264_CRF) {
    if (Math.abs(row[0] - cq) < Math.abs(best[0] - cq)) best = row
  }
  return best[1]
}

export function mapNvencPreset(preset: string): string {
  return NVENC_PRESET_TO_X264_PRESET[preset] ?? 'slow'
}
