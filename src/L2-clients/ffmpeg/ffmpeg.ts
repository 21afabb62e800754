import { createModuleRequire, execCommand, isAbortError, isExecError, isSpawnFailure } from '../../L1-infra/process/process.js'
import { fileExistsSync } from '../../L1-infra/fileSystem/fileSystem.js'
import logger from '../../L1-infra/logger/configLogger.js'
import { getConfig } from '../../L1-infra/config/environment.js'
import { CommandFailed, ExternalToolMissing, RunCancelled } from '../../L0-pure/errors/errors.js'

const require = createModuleRequire(import.meta.url)

/** Get the resolved path to the FFmpeg binary. */
export function getFFmpegPath(): string {
  const config = getConfig()
  if (config.FFMPEG_PATH && config.FFMPEG_PATH !== 'ffmpeg') {
    logger.debug(`FFmpeg: using FFMPEG_PATH config: ${config.FFMPEG_PATH}`)
    return config.FFMPEG_PATH
  }
  logger.debug('FFmpeg: using system PATH')
  return 'ffmpeg'
}

/** Get the resolved path to the FFprobe binary. */
export function getFFprobePath(): string {
  const config = getConfig()
  if (config.FFPROBE_PATH && config.FFPROBE_PATH !== 'ffprobe') {
    logger.debug(`FFprobe: using FFPROBE_PATH config: ${config.FFPROBE_PATH}`)
    return config.FFPROBE_PATH
  }
  try {
    const installer: unknown = require('@ffprobe-installer/ffprobe')
    const probePath = typeof installer === 'object' && installer !== null && 'path' in installer ? installer.path : undefined
    if (typeof probePath === 'string' && fileExistsSync(probePath)) {
      logger.debug(`FFprobe: using @ffprobe-installer/ffprobe: ${probePath}`)
      return probePath
    }
  } catch { /* @ffprobe-installer/ffprobe not available for this platform */ }
  logger.debug('FFprobe: falling back to system PATH')
  return 'ffprobe'
}

// ── Command runner ───────────────────────────────────────────────────────────

export type ToolName = 'ffmpeg' | 'ffprobe'

export interface RunOptions {
  signal?: AbortSignal
}

export interface CommandOutcome {
  exitCode: number
  stdout: string
  stderr: string
}

/**
 * The single seam every external-process call goes through (transcode,
 * concat, mux, probe). A non-zero exit resolves with its code; only a missing
 * executable or a cancellation rejects.
 */
export interface CommandRunner {
  run(tool: ToolName, args: string[], options?: RunOptions): Promise<CommandOutcome>
}

export interface ToolPaths {
  ffmpegPath: string
  ffprobePath: string
}

/** Run a command and turn a non-zero exit into {@link CommandFailed}. */
export async function runOrThrow(
  runner: CommandRunner,
  tool: ToolName,
  args: string[],
  options?: RunOptions,
): Promise<CommandOutcome> {
  const outcome = await runner.run(tool, args, options)
  if (outcome.exitCode !== 0) {
    throw new CommandFailed(tool, outcome.exitCode, outcome.stderr)
  }
  return outcome
}

/** CommandRunner backed by child_process.execFile. */
export function createCommandRunner(paths: ToolPaths = { ffmpegPath: getFFmpegPath(), ffprobePath: getFFprobePath() }): CommandRunner {
  return {
    async run(tool, args, options = {}) {
      const bin = tool === 'ffmpeg' ? paths.ffmpegPath : paths.ffprobePath
      logger.debug(`${tool} ${args.join(' ')}`)
      try {
        const { stdout, stderr } = await execCommand(bin, args, { signal: options.signal })
        return { exitCode: 0, stdout, stderr }
      } catch (err: unknown) {
        if (isAbortError(err)) throw new RunCancelled(`${tool} aborted`)
        if (isSpawnFailure(err)) throw new ExternalToolMissing(bin, err)
        if (!isExecError(err)) throw err
        return {
          exitCode: typeof err.code === 'number' ? err.code : 1,
          stdout: err.stdout,
          stderr: err.stderr || err.message,
        }
      }
    },
  }
}

/**
 * Confirm both executables start. Run-fatal when either is missing, so it
 * runs before any job is dispatched.
 *
 * @returns the first line of `ffmpeg -version`
 */
export async function ensureToolsAvailable(runner: CommandRunner): Promise<string> {
  const ffmpeg = await runner.run('ffmpeg', ['-hide_banner', '-version'])
  if (ffmpeg.exitCode !== 0) throw new ExternalToolMissing('ffmpeg', new CommandFailed('ffmpeg', ffmpeg.exitCode, ffmpeg.stderr))
  const ffprobe = await runner.run('ffprobe', ['-hide_banner', '-version'])
  if (ffprobe.exitCode !== 0) throw new ExternalToolMissing('ffprobe', new CommandFailed('ffprobe', ffprobe.exitCode, ffprobe.stderr))
  return ffmpeg.stdout.split(/\r?\n/)[0] ?? ''
}
