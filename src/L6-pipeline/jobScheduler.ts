import logger from '../L1-infra/logger/configLogger.js'
import { describeError } from '../L0-pure/errors/errors.js'

export interface ScheduleOptions<J, R> {
  signal?: AbortSignal
  /** Turns a worker rejection into a result; the run keeps going. */
  onError: (job: J, error: unknown) => R
  /** Result for a job that never started because the signal fired. */
  onSkipped: (job: J) => R
  /** Called once per settled job, in completion order. */
  onSettled?: (result: R) => void
}

/**
 * Run `worker` over `jobs` with at most `maxConcurrency` in flight.
 *
 * No fail-fast: a failing job becomes a result and the pool moves on. Once
 * `signal` aborts, nothing new is started. Results keep the order of `jobs`.
 */
export async function runScheduled<J, R>(
  jobs: readonly J[],
  maxConcurrency: number,
  worker: (job: J) => Promise<R>,
  options: ScheduleOptions<J, R>,
): Promise<R[]> {
  const results = new Array<R>(jobs.length)
  const workerCount = Math.max(1, Math.min(maxConcurrency, jobs.length))
  let next = 0

  const settle = (i: number, result: R): void => {
    results[i] = result
    try {
      options.onSettled?.(result)
    } catch (err: unknown) {
      logger.warn(`Result listener failed: ${describeError(err)}`)
    }
  }

  const loop = async (): Promise<void> => {
    while (next < jobs.length) {
      const i = next++
      const job = jobs[i]
      if (options.signal?.aborted) {
        settle(i, options.onSkipped(job))
        continue
      }
      try {
        settle(i, await worker(job))
      } catch (err: unknown) {
        settle(i, options.onError(job, err))
      }
    }
  }

  logger.debug(`Scheduling ${jobs.length} job(s) on ${workerCount} worker(s)`)
  await Promise.all(Array.from({ length: workerCount }, () => loop()))
  return results
}
