import { runOrThrow } from '../../L2-clients/ffmpeg/ffmpeg.js'
import type { CommandRunner, RunOptions } from '../../L2-clients/ffmpeg/ffmpeg.js'
import { removeFile, writeAtomically, writeTextFile } from '../../L1-infra/fileSystem/fileSystem.js'
import logger from '../../L1-infra/logger/configLogger.js'
import { ConcatFailed, ProfileMismatch, RunCancelled } from '../../L0-pure/errors/errors.js'
import type { CacheEntry } from '../../L0-pure/types/index.js'

/** Quote a path for the concat demuxer's list file (`'` becomes `'\''`). */
export function quoteConcatPath(filePath: string): string {
  return `'${filePath.replace(/'/g, `'\\''`)}'`
}

export function concatListContent(paths: readonly string[]): string {
  return paths.map((p) => `file ${quoteConcatPath(p)}`).join('\n') + '\n'
}

export function buildConcatArgs(listPath: string, outputPath: string): string[] {
  return [
    '-hide_banner', '-nostdin', '-y',
    '-fflags', '+genpts',
    '-f', 'concat',
    '-safe', '0',
    '-i', listPath,
    '-c', 'copy',
    '-an',
    '-avoid_negative_ts', 'make_zero',
    '-f', 'mp4',
    outputPath,
  ]
}

/**
 * Join same-profile segments losslessly, in order, into `outputPath`.
 *
 * @throws ProfileMismatch when the entries were built under different profiles (or there are none)
 * @throws ConcatFailed when ffmpeg fails
 */
export async function concatSegments(
  runner: CommandRunner,
  entries: readonly CacheEntry[],
  outputPath: string,
  options: RunOptions = {},
): Promise<void> {
  const profiles = [...new Set(entries.map((e) => e.profileKey))]
  if (profiles.length !== 1) throw new ProfileMismatch(profiles)

  const listPath = `${outputPath}.concat.txt`
  await writeTextFile(listPath, concatListContent(entries.map((e) => e.path)))
  logger.debug(`Concatenating ${entries.length} segment(s) → ${outputPath}`)
  try {
    await writeAtomically(outputPath, (partial) => runOrThrow(runner, 'ffmpeg', buildConcatArgs(listPath, partial), options))
  } catch (err: unknown) {
    if (err instanceof RunCancelled) throw err
    throw new ConcatFailed(err)
  } finally {
    await removeFile(listPath)
  }
}
