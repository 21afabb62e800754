import logger from '../../L1-infra/logger/configLogger.js'
import { describeError } from '../../L0-pure/errors/errors.js'
import { QUALITY_PRESETS, mapCqToCrf, mapNvencPreset } from '../../L0-pure/encoding/qualityPresets.js'
import type { EncodingProfile, QualityProfile } from '../../L0-pure/types/index.js'
import type { CommandRunner } from '../../L2-clients/ffmpeg/ffmpeg.js'

export const HARDWARE_ENCODER = 'h264_nvenc'
export const SOFTWARE_ENCODER = 'libx264'

/** Quality selector plus the per-knob overrides a run may set. */
export interface EncodingSettings {
  quality: QualityProfile
  nvencCq?: number
  x264Crf?: number
  presetGpu?: string
  presetCpu?: string
}

export function hardwareProfile(settings: EncodingSettings): EncodingProfile {
  const preset = QUALITY_PRESETS[settings.quality]
  return {
    family: 'hardware',
    encoder: HARDWARE_ENCODER,
    quality: settings.quality,
    preset: settings.presetGpu ?? preset.nvencPreset,
    qualityValue: settings.nvencCq ?? preset.nvencCq,
    audioBitrate: preset.audioBitrate,
  }
}

export function softwareProfile(settings: EncodingSettings): EncodingProfile {
  const preset = QUALITY_PRESETS[settings.quality]
  return {
    family: 'software',
    encoder: SOFTWARE_ENCODER,
    quality: settings.quality,
    preset: settings.presetCpu ?? preset.x264Preset,
    qualityValue: settings.x264Crf ?? preset.x264Crf,
    audioBitrate: preset.audioBitrate,
  }
}

/**
 * Encoder names from `ffmpeg -encoders`. Lines look like
 * ` V....D h264_nvenc           NVIDIA NVENC H.264 encoder`.
 */
export function parseEncoderList(output: string): Set<string> {
  const names = new Set<string>()
  for (const line of output.split(/\r?\n/)) {
    const match = /^\s*[VAS][A-Z.]{5}\s+(\S+)/.exec(line)
    if (match && match[1] !== '=') names.add(match[1])
  }
  return names
}

/**
 * Picks the video encoder for a run and downgrades it for a job when the
 * hardware encoder fails. The capability probe runs at most once.
 */
export class EncodingProfileResolver {
  private encoders?: Promise<Set<string>>

  constructor(
    private readonly runner: CommandRunner,
    private readonly settings: EncodingSettings,
  ) {}

  /** Whether ffmpeg lists the hardware encoder. A failed probe counts as no. */
  async probe(): Promise<boolean> {
    if (!this.encoders) {
      this.encoders = this.runner
        .run('ffmpeg', ['-hide_banner', '-encoders'])
        .then((outcome) => {
          if (outcome.exitCode !== 0) {
            logger.warn(`Encoder probe exited with ${outcome.exitCode}; assuming no hardware encoder`)
            return new Set<string>()
          }
          return parseEncoderList(outcome.stdout)
        })
        .catch((err: unknown) => {
          logger.warn(`Encoder probe failed: ${describeError(err)}`)
          return new Set<string>()
        })
    }
    return (await this.encoders).has(HARDWARE_ENCODER)
  }

  async resolve(preferHardware: boolean): Promise<EncodingProfile> {
    if (preferHardware && (await this.probe())) {
      const profile = hardwareProfile(this.settings)
      logger.info(`Encoder: ${profile.encoder} (cq ${profile.qualityValue}, preset ${profile.preset})`)
      return profile
    }
    if (preferHardware) logger.info(`${HARDWARE_ENCODER} not available, using ${SOFTWARE_ENCODER}`)
    const profile = softwareProfile(this.settings)
    logger.info(`Encoder: ${profile.encoder} (crf ${profile.qualityValue}, preset ${profile.preset})`)
    return profile
  }

  /**
   * Software equivalent of a hardware profile. cq and preset go through the
   * fixed lookup tables unless the run set explicit x264 values.
   */
  fallback(profile: EncodingProfile): EncodingProfile {
    if (profile.family === 'software') return profile
    return {
      family: 'software',
      encoder: SOFTWARE_ENCODER,
      quality: profile.quality,
      preset: this.settings.presetCpu ?? mapNvencPreset(profile.preset),
      qualityValue: this.settings.x264Crf ?? mapCqToCrf(profile.qualityValue),
      audioBitrate: profile.audioBitrate,
    }
  }
}
