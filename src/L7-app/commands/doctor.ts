import { getConfig } from '../../L1-infra/config/environment.js'
import { QUALITY_PRESETS, isQualityProfile } from '../../L0-pure/encoding/qualityPresets.js'
import { createCommandRunner, getFFmpegPath, getFFprobePath } from '../../L2-clients/ffmpeg/ffmpeg.js'
import type { CommandRunner, ToolName } from '../../L2-clients/ffmpeg/ffmpeg.js'
import { EncodingProfileResolver, HARDWARE_ENCODER, SOFTWARE_ENCODER } from '../../L3-services/encoding/encodingProfileResolver.js'

export interface CheckResult {
  label: string
  ok: boolean
  required: boolean
  message: string
}

export function parseVersionFromOutput(output: string): string {
  const match = output.match(/(\d+\.\d+(?:\.\d+)?)/)
  return match ? match[1] : 'unknown'
}

function getFFmpegInstallHint(): string {
  const platform = process.platform
  const lines = ['Install FFmpeg:']
  if (platform === 'win32') {
    lines.push('  winget install Gyan.FFmpeg')
    lines.push('  choco install ffmpeg        (alternative)')
  } else if (platform === 'darwin') {
    lines.push('  brew install ffmpeg')
  } else {
    lines.push('  sudo apt install ffmpeg     (Debian/Ubuntu)')
    lines.push('  sudo dnf install ffmpeg     (Fedora)')
    lines.push('  sudo pacman -S ffmpeg       (Arch)')
  }
  lines.push('  Or set FFMPEG_PATH / FFPROBE_PATH to a custom binary location')
  return lines.join('\n          ')
}

export function checkNode(version: string = process.version): CheckResult {
  const major = parseInt(version.slice(1), 10)
  const ok = major >= 20
  return {
    label: 'Node.js',
    ok,
    required: true,
    message: ok
      ? `Node.js ${version} (required: ≥20)`
      : `Node.js ${version} — version ≥20 required`,
  }
}

async function checkTool(runner: CommandRunner, tool: ToolName, label: string, binPath: string): Promise<CheckResult> {
  try {
    const result = await runner.run(tool, ['-version'])
    if (result.exitCode === 0 && result.stdout) {
      const ver = parseVersionFromOutput(result.stdout)
      return { label, ok: true, required: true, message: `${label} ${ver} (${binPath})` }
    }
  } catch { /* spawn failed, reported below */ }
  return {
    label,
    ok: false,
    required: true,
    message: `${label} not found at ${binPath} — ${getFFmpegInstallHint()}`,
  }
}

async function checkNvenc(runner: CommandRunner): Promise<CheckResult> {
  const available = await new EncodingProfileResolver(runner, { quality: 'balanced' }).probe()
  return {
    label: 'NVENC',
    ok: available,
    required: false,
    message: available
      ? `${HARDWARE_ENCODER} available (GPU encoding)`
      : `${HARDWARE_ENCODER} not available (optional — ${SOFTWARE_ENCODER} will be used)`,
  }
}

function checkQuality(): CheckResult {
  const quality = getConfig().QUALITY
  const ok = isQualityProfile(quality)
  return {
    label: 'Quality',
    ok,
    required: true,
    message: ok
      ? `Quality profile: ${quality} (audio ${QUALITY_PRESETS[quality].audioBitrate})`
      : `CLIPMIX_QUALITY="${quality}" — use visual, balanced or size`,
  }
}

/** Run every check; returns the individual results. */
export async function collectChecks(runner: CommandRunner): Promise<CheckResult[]> {
  const ffmpeg = await checkTool(runner, 'ffmpeg', 'FFmpeg', getFFmpegPath())
  const results: CheckResult[] = [
    checkNode(),
    ffmpeg,
    await checkTool(runner, 'ffprobe', 'FFprobe', getFFprobePath()),
  ]
  if (ffmpeg.ok) results.push(await checkNvenc(runner))
  results.push(checkQuality())
  return results
}

/**
 * `clipmix doctor`: print prerequisite checks.
 *
 * @returns 0 when every required check passed, else 1
 */
export async function runDoctor(runner: CommandRunner = createCommandRunner()): Promise<number> {
  console.log('\n🔍 clipmix doctor — checking prerequisites...\n')

  const results = await collectChecks(runner)
  for (const r of results) {
    const icon = r.ok ? '✅' : r.required ? '❌' : '⬚'
    console.log(`  ${icon} ${r.message}`)
  }

  const failedRequired = results.filter((r) => r.required && !r.ok)
  console.log()
  if (failedRequired.length === 0) {
    console.log('  All required checks passed! ✅\n')
    return 0
  }
  console.log(`  ${failedRequired.length} required check${failedRequired.length > 1 ? 's' : ''} failed ❌\n`)
  return 1
}
