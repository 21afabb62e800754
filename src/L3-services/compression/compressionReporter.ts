import { getFileStats } from '../../L1-infra/fileSystem/fileSystem.js'
import logger from '../../L1-infra/logger/configLogger.js'
import { describeError } from '../../L0-pure/errors/errors.js'
import { formatMegabytes, formatRatio } from '../../L0-pure/format/format.js'
import type { CompressionReport, RunSummary, SegmentSelection } from '../../L0-pure/types/index.js'

/**
 * Compare the output's size against the sources it was cut from. Every
 * selected segment counts its whole source file, duplicates included.
 */
export async function reportCompression(
  selection: SegmentSelection,
  outputPath: string,
): Promise<CompressionReport> {
  try {
    let inputBytes = 0
    for (const { asset } of selection) {
      inputBytes += (await getFileStats(asset.path)).size
    }
    const outputBytes = (await getFileStats(outputPath)).size
    if (inputBytes <= 0) return { kind: 'unknown', reason: 'source files are empty' }
    const ratio = outputBytes / inputBytes
    logger.info(`${outputPath}: ${formatMegabytes(inputBytes)} → ${formatMegabytes(outputBytes)} (${formatRatio(ratio)})`)
    return { kind: 'known', inputBytes, outputBytes, ratio }
  } catch (err: unknown) {
    return { kind: 'unknown', reason: describeError(err) }
  }
}

/** Sum of every known report, or undefined when there is none. */
export function aggregateCompression(reports: readonly CompressionReport[]): RunSummary['totals'] {
  let inputBytes = 0
  let outputBytes = 0
  let known = 0
  for (const report of reports) {
    if (report.kind !== 'known') continue
    inputBytes += report.inputBytes
    outputBytes += report.outputBytes
    known++
  }
  if (known === 0 || inputBytes <= 0) return undefined
  return { inputBytes, outputBytes, ratio: outputBytes / inputBytes }
}
