import { Command, InvalidArgumentError, Option } from 'commander'

export { Command, InvalidArgumentError, Option }

/** commander value parser for integer options. */
export function parseInteger(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed)) throw new InvalidArgumentError(`Not an integer: ${value}`)
  return parsed
}

/** commander value parser for non-negative decimal options (seconds, fps). */
export function parseDecimal(value: string): number {
  const parsed = Number(value)
  if (!Number.isFinite(parsed) || parsed < 0) throw new InvalidArgumentError(`Not a non-negative number: ${value}`)
  return parsed
}
