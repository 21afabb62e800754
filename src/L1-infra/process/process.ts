import { execFile as nodeExecFile } from 'child_process'
import type { ExecFileException } from 'child_process'
import { createRequire } from 'module'

export interface ExecResult {
  stdout: string
  stderr: string
}

export interface ExecOptions {
  cwd?: string
  maxBuffer?: number
  /** Aborting kills the child process and rejects with an AbortError. */
  signal?: AbortSignal
}

/** Error from {@link execCommand}, with captured output attached. */
export type ExecError = ExecFileException & ExecResult

/** ffmpeg can be chatty on stderr; 64 MB keeps long encodes from overflowing. */
const DEFAULT_MAX_BUFFER = 64 * 1024 * 1024

/**
 * Execute a command asynchronously via execFile.
 * Returns promise of { stdout, stderr }; rejects with an {@link ExecError}.
 */
export function execCommand(
  cmd: string,
  args: string[],
  opts: ExecOptions = {},
): Promise<ExecResult> {
  return new Promise((resolve, reject) => {
    nodeExecFile(
      cmd,
      args,
      {
        encoding: 'utf8',
        cwd: opts.cwd,
        maxBuffer: opts.maxBuffer ?? DEFAULT_MAX_BUFFER,
        signal: opts.signal,
        windowsHide: true,
      },
      (error, stdout, stderr) => {
        if (error) {
          reject(Object.assign(error, { stdout: String(stdout ?? ''), stderr: String(stderr ?? '') }))
        } else {
          resolve({ stdout: String(stdout ?? ''), stderr: String(stderr ?? '') })
        }
      },
    )
  })
}

/** Narrow a rejection from {@link execCommand}. */
export function isExecError(error: unknown): error is ExecError {
  return error instanceof Error && 'stderr' in error && 'stdout' in error
}

/** True when the error means the executable itself could not be started. */
export function isSpawnFailure(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) return false
  return error.code === 'ENOENT' || error.code === 'EACCES'
}

/** True when the error came from an AbortSignal. */
export function isAbortError(error: unknown): boolean {
  if (!(error instanceof Error)) return false
  return error.name === 'AbortError' || ('code' in error && error.code === 'ABORT_ERR')
}

/**
 * Create a require function for ESM modules to use CommonJS require().
 * Usage: const require = createModuleRequire(import.meta.url)
 */
export function createModuleRequire(metaUrl: string): NodeRequire {
  return createRequire(metaUrl)
}
