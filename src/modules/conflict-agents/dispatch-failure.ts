/**
 * Turn a dispatch result that carries no usable verdict into one error line.
 */

import type { DispatchResult } from '../agent-dispatch/types.js'

export function describeDispatchFailure<T>(result: DispatchResult<T>): string {
  switch (result.status) {
    case 'completed':
      return result.parseError === 'no_yaml_block' || result.parseError === null
        ? 'Agent output contained no YAML result block'
        : `Invalid agent output: ${result.parseError}`
    case 'timeout':
    case 'cancelled':
      return result.parseError ?? `Agent dispatch ${result.status}`
    case 'failed': {
      const reason = result.parseError ?? 'Agent dispatch failed'
      const stderr = result.output.split('\n--- stderr ---\n')[1]?.trim()
      return stderr ? `${reason}: ${lastLine(stderr)}` : reason
    }
  }
}

function lastLine(text: string): string {
  const lines = text.split('\n').filter((l) => l.trim() !== '')
  return lines[lines.length - 1] ?? text
}
