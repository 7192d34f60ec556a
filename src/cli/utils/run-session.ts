/**
 * Drives one orchestrator run from the CLI: renders progress (or streams
 * NDJSON events), turns signals into cancellation and maps the outcome to an
 * exit code.
 */

import type { RebaseRunHandle } from '../../modules/rebase-orchestrator/index.js'
import type { RebaseEvents } from '../../core/event-bus.types.js'
import { ConfigError, ConfigIncompatibleFormatError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { EXIT_FAILURE, EXIT_USAGE_ERROR, exitCodeForOutcome } from '../exit-codes.js'
import { attachEventStream } from '../formatters/streaming.js'
import { formatLogEntry, formatOutcome } from '../formatters/progress-formatter.js'
import type { Runtime } from '../runtime.js'
import { installSignalHandlers } from './signals.js'

const logger = createLogger('cli:run')

export interface RunSessionOptions {
  /** Stream NDJSON events on stdout instead of progress lines */
  events: boolean
}

/**
 * Start a run with `launch` and wait for its outcome. Subscriptions are in
 * place before `launch` is called, so the first log entry is not missed.
 */
export async function driveRun(
  runtime: Runtime,
  launch: () => RebaseRunHandle,
  options: RunSessionOptions,
): Promise<number> {
  const { eventBus } = runtime
  let detachOutput: () => void

  if (options.events) {
    detachOutput = attachEventStream(eventBus)
  } else {
    const onLog = ({ entry }: RebaseEvents['rebase:log']): void => {
      process.stdout.write(formatLogEntry(entry) + '\n')
    }
    eventBus.on('rebase:log', onLog)
    detachOutput = () => eventBus.off('rebase:log', onLog)
  }

  let interrupted = false
  let removeSignalHandlers: () => void = () => {}

  try {
    const handle = launch()
    removeSignalHandlers = installSignalHandlers((signal) => {
      interrupted = true
      handle.cancel(`Interrupted by ${signal}`)
    })

    const outcome = await handle.result
    if (!options.events) {
      const { sourceBranch, targetBranch } = handle.getStatus()
      process.stdout.write(formatOutcome(outcome, sourceBranch, targetBranch) + '\n')
    }
    logger.debug({ runId: outcome.runId, success: outcome.success }, 'Run finished')
    return exitCodeForOutcome(outcome, interrupted)
  } finally {
    removeSignalHandlers()
    detachOutput()
  }
}

/**
 * Report a failure to build the runtime and pick the exit code for it.
 */
export function reportStartupError(err: unknown): number {
  const message = err instanceof Error ? err.message : String(err)
  if (err instanceof ConfigError || err instanceof ConfigIncompatibleFormatError) {
    process.stderr.write(`Configuration error: ${message}\n`)
    return EXIT_USAGE_ERROR
  }
  logger.error({ error: message }, 'Failed to initialise')
  process.stderr.write(`Error: ${message}\n`)
  return EXIT_FAILURE
}
