#!/usr/bin/env node
import { Command, Option, parseDecimal, parseInteger } from '../L1-infra/cli/cli.js'
import { initConfig } from '../L1-infra/config/environment.js'
import { readTextFileSync } from '../L1-infra/fileSystem/fileSystem.js'
import { projectRoot, join } from '../L1-infra/paths/paths.js'
import { QUALITY_PROFILES } from '../L0-pure/encoding/qualityPresets.js'
import { runRunCommand } from './commands/run.js'
import type { RunCommandOptions } from './commands/run.js'
import { runCacheList, runCachePrune } from './commands/cache.js'
import type { CacheCommandOptions } from './commands/cache.js'
import { runDoctor } from './commands/doctor.js'

const pkg: { version: string } = JSON.parse(readTextFileSync(join(projectRoot(), 'package.json')))

const program = new Command()

program
  .name('clipmix')
  .description('Batch-produce long videos from random clips: cached normalization, lossless concat, looped BGM')
  .version(pkg.version, '-V, --version')

program
  .command('run')
  .description('Mix one or more output videos from the clips in <video-dirs>')
  .argument('<video-dirs...>', 'Directories scanned (recursively) for source clips')
  .requiredOption('--bgm <path>', 'Background music file, or a directory to pick tracks from')
  .option('-n, --count <n>', 'Clips per output (default: 5)', parseInteger)
  .option('-m, --outputs <n>', 'Number of output videos (default: 1)', parseInteger)
  .option('-o, --output <path>', 'Output .mp4 (numbered per output) or directory (default: <first-dir>_longvideo)')
  .option('--threads <n>', 'Outputs mixed in parallel (default: env CLIPMIX_THREADS or 4)', parseInteger)
  .option('--no-gpu', 'Never use the NVENC hardware encoder')
  .option('--width <px>', 'Output width (default: 1080)', parseInteger)
  .option('--height <px>', 'Output height (default: 1920)', parseInteger)
  .option('--fps <n>', 'Output frame rate (default: 25)', parseDecimal)
  .addOption(new Option('--fill <mode>', 'Fit sources by padding or cropping (default: pad)').choices(['pad', 'crop']))
  .option('--trim-head <seconds>', 'Seconds cut from the start of every clip (default: 0)', parseDecimal)
  .option('--trim-tail <seconds>', 'Seconds cut from the end of every clip (default: 1)', parseDecimal)
  .addOption(new Option('--quality <profile>', 'Encoding preset (default: env CLIPMIX_QUALITY or balanced)').choices([...QUALITY_PROFILES]))
  .option('--group-by-resolution', 'Only mix clips that share a source resolution')
  .option('--clear-mismatched-cache', 'Delete cached segments built with another trim or profile first')
  .option('--seed <n>', 'Run seed for a reproducible selection', parseInteger)
  .option('--cache-dir <path>', 'Segment cache (default: env CLIPMIX_CACHE_DIR or <first-dir>_clipcache)')
  .option('--nvenc-cq <n>', 'Override NVENC constant quality', parseInteger)
  .option('--x264-crf <n>', 'Override x264 CRF', parseInteger)
  .option('--preset-gpu <preset>', 'Override NVENC preset (p1-p7)')
  .option('--preset-cpu <preset>', 'Override x264 preset')
  .option('--ffmpeg <path>', 'ffmpeg binary (default: env FFMPEG_PATH or PATH)')
  .option('--ffprobe <path>', 'ffprobe binary (default: env FFPROBE_PATH, bundled, or PATH)')
  .option('-v, --verbose', 'Verbose logging')
  .action(async (videoDirs: string[], opts: RunCommandOptions) => {
    process.exitCode = await runRunCommand(videoDirs, opts)
  })

const cache = program
  .command('cache')
  .description('Inspect or clean the normalized segment cache')

function addProfileOptions(command: Command): Command {
  return command
    .option('--cache-dir <path>', 'Segment cache (default: env CLIPMIX_CACHE_DIR or <video-dir>_clipcache)')
    .option('--width <px>', 'Profile width (default: 1080)', parseInteger)
    .option('--height <px>', 'Profile height (default: 1920)', parseInteger)
    .option('--fps <n>', 'Profile frame rate (default: 25)', parseDecimal)
    .addOption(new Option('--fill <mode>', 'Profile fill mode (default: pad)').choices(['pad', 'crop']))
}

addProfileOptions(
  cache
    .command('list')
    .description('List cached segments')
    .argument('[video-dir]', 'Input directory whose default cache to use'),
).action(async (videoDir: string | undefined, opts: CacheCommandOptions) => {
  process.exitCode = await runCacheList(videoDir, opts)
})

addProfileOptions(
  cache
    .command('prune')
    .description('Delete cached segments whose trim or profile differ from the given ones')
    .argument('[video-dir]', 'Input directory whose default cache to use')
    .option('--trim-head <seconds>', 'Trim to keep (default: 0)', parseDecimal)
    .option('--trim-tail <seconds>', 'Trim to keep (default: 1)', parseDecimal),
).action(async (videoDir: string | undefined, opts: CacheCommandOptions) => {
  process.exitCode = await runCachePrune(videoDir, opts)
})

program
  .command('doctor')
  .description('Check Node.js, ffmpeg, ffprobe and NVENC availability')
  .action(async () => {
    initConfig()
    process.exitCode = await runDoctor()
  })

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err))
  process.exitCode = 1
})
