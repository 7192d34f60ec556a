/**
 * Commander option parsers.
 */

import { InvalidArgumentError } from 'commander'

export function parseIntegerOption(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.')
  }
  return parsed
}
