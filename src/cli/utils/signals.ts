/**
 * SIGINT/SIGTERM wiring for a running command.
 */

import { createLogger } from '../../utils/logger.js'

const logger = createLogger('cli:signals')

/**
 * Call `onSignal` on the first SIGINT or SIGTERM. Returns a function that
 * removes both handlers.
 */
export function installSignalHandlers(onSignal: (signal: NodeJS.Signals) => void): () => void {
  const handler = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, 'Signal received, cancelling run')
    onSignal(signal)
  }
  process.once('SIGINT', handler)
  process.once('SIGTERM', handler)
  return () => {
    process.removeListener('SIGINT', handler)
    process.removeListener('SIGTERM', handler)
  }
}
