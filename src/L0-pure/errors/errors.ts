import type { SourceAsset } from '../types/index.js'

/** Base class for every error the pipeline raises on purpose. */
export class ClipmixError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message)
    this.name = 'ClipmixError'
  }
}

/** No usable input assets (or BGM files): run-fatal. */
export class EmptyCatalog extends ClipmixError {
  constructor(public readonly location: string, detail = 'no supported files found') {
    super(`Empty catalog at ${location}: ${detail}`)
    this.name = 'EmptyCatalog'
  }
}

/** A clip failed to transcode into the cache: job-fatal. */
export class SegmentBuildFailed extends ClipmixError {
  constructor(public readonly asset: SourceAsset, cause: unknown) {
    super(`Segment build failed for ${asset.path}: ${describeError(cause)}`, cause)
    this.name = 'SegmentBuildFailed'
  }
}

/** Segments handed to the concatenator were built under different profiles. */
export class ProfileMismatch extends ClipmixError {
  constructor(public readonly profileKeys: string[]) {
    super(`Cannot concatenate segments with mixed profiles: ${profileKeys.join(', ')}`)
    this.name = 'ProfileMismatch'
  }
}

export class ConcatFailed extends ClipmixError {
  constructor(cause: unknown) {
    super(`Concatenation failed: ${describeError(cause)}`, cause)
    this.name = 'ConcatFailed'
  }
}

export class MuxFailed extends ClipmixError {
  constructor(cause: unknown) {
    super(`Audio replacement failed: ${describeError(cause)}`, cause)
    this.name = 'MuxFailed'
  }
}

/** The hardware encoder rejected a job; callers downgrade to software and retry. */
export class HardwareEncoderUnavailable extends ClipmixError {
  constructor(public readonly encoder: string, cause?: unknown) {
    super(`Hardware encoder ${encoder} failed${cause === undefined ? '' : `: ${describeError(cause)}`}`, cause)
    this.name = 'HardwareEncoderUnavailable'
  }
}

/** ffmpeg / ffprobe cannot be executed: run-fatal. */
export class ExternalToolMissing extends ClipmixError {
  constructor(public readonly tool: string, cause?: unknown) {
    super(`${tool} not found or not executable (set FFMPEG_PATH / FFPROBE_PATH)`, cause)
    this.name = 'ExternalToolMissing'
  }
}

export class InvalidSettings extends ClipmixError {
  constructor(public readonly problems: string[]) {
    super(`Invalid settings: ${problems.join('; ')}`)
    this.name = 'InvalidSettings'
  }
}

export class RunCancelled extends ClipmixError {
  constructor(message = 'Run cancelled') {
    super(message)
    this.name = 'RunCancelled'
  }
}

/** Non-zero exit from an external command. */
export class CommandFailed extends ClipmixError {
  constructor(
    public readonly command: string,
    public readonly exitCode: number | null,
    public readonly stderr: string,
    cause?: unknown,
  ) {
    super(`${command} exited with ${exitCode ?? 'signal'}: ${tail(stderr, 500)}`, cause)
    this.name = 'CommandFailed'
  }
}

/** Render any thrown value as a single-line message. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}

function tail(text: string, max: number): string {
  const trimmed = text.trim()
  return trimmed.length > max ? `…${trimmed.slice(-max)}` : trimmed
}
