import dotenv from 'dotenv'
import { join } from '../paths/paths.js'
import { fileExistsSync } from '../fileSystem/fileSystem.js'

// Load .env file from the working directory
const envPath = join(process.cwd(), '.env')
if (fileExistsSync(envPath)) {
  dotenv.config({ path: envPath })
}

export interface AppEnvironment {
  FFMPEG_PATH: string
  FFPROBE_PATH: string
  CACHE_DIR: string
  THREADS: number | undefined
  QUALITY: string
  VERBOSE: boolean
}

export interface EnvironmentOverrides {
  ffmpegPath?: string
  ffprobePath?: string
  cacheDir?: string
  verbose?: boolean
}

let config: AppEnvironment | null = null

function parseOptionalInt(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined
  const parsed = Number.parseInt(raw, 10)
  return Number.isNaN(parsed) ? undefined : parsed
}

/** Merge CLI options → env vars → defaults. Call before getConfig(). */
export function initConfig(cli: EnvironmentOverrides = {}): AppEnvironment {
  config = {
    FFMPEG_PATH: cli.ffmpegPath || process.env.FFMPEG_PATH || 'ffmpeg',
    FFPROBE_PATH: cli.ffprobePath || process.env.FFPROBE_PATH || 'ffprobe',
    CACHE_DIR: cli.cacheDir || process.env.CLIPMIX_CACHE_DIR || '',
    THREADS: parseOptionalInt(process.env.CLIPMIX_THREADS),
    QUALITY: process.env.CLIPMIX_QUALITY || 'balanced',
    VERBOSE: cli.verbose ?? false,
  }

  return config
}

export function getConfig(): AppEnvironment {
  if (config) {
    return config
  }

  // Fallback: init with no CLI options (pure env-var mode)
  return initConfig()
}
