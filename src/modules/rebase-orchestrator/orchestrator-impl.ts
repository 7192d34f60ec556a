/**
 * Rebase workflow controller. Drives one run through its stages:
 *
 *   initializing ─┐
 *                 ├─> detecting_conflicts <──> resolving_conflicts
 *   continuing ───┘          │                        │
 *                        completed                 failed ─> rolling_back ─> failed
 *
 * Every run resolves its `result` promise and calls `onComplete` exactly once,
 * through the operation tracker. `start()` and `resume()` never throw; every
 * error becomes a failed outcome.
 */

import { randomUUID } from 'node:crypto'
import type { RunStage } from '../../core/types.js'
import {
  RebasePilotError,
  IllegalTransitionError,
  NoRebaseInProgressError,
  RunCancelledError,
} from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { detectConflictFiles } from './conflict-detector.js'
import { createEventLog } from './event-log.js'
import { createOperationTracker } from './operation-tracker.js'
import { runResolutionRound } from './resolution-engine.js'
import { rollbackRun } from './rollback.js'
import { DEFAULT_MAX_ATTEMPTS, initializeRun, normalizeRunInput } from './validator.js'
import type {
  OrchestratorDeps,
  RebaseOrchestrator,
  RebaseRunHandle,
  ResumeInput,
  RunContext,
  RunInput,
  RunOutcome,
  RunStatus,
} from './types.js'

const logger = createLogger('rebase-orchestrator')

// ---------------------------------------------------------------------------
// Stage transitions
// ---------------------------------------------------------------------------

export const STAGE_TRANSITIONS: Readonly<Record<RunStage, readonly RunStage[]>> = {
  initializing: ['detecting_conflicts', 'failed'],
  continuing: ['detecting_conflicts', 'failed'],
  detecting_conflicts: ['resolving_conflicts', 'completed', 'failed'],
  resolving_conflicts: ['detecting_conflicts', 'failed'],
  failed: ['rolling_back'],
  rolling_back: ['failed'],
  completed: [],
}

export function canTransition(from: RunStage, to: RunStage): boolean {
  return STAGE_TRANSITIONS[from].includes(to)
}

// ---------------------------------------------------------------------------
// createRebaseOrchestrator
// ---------------------------------------------------------------------------

export function createRebaseOrchestrator(deps: OrchestratorDeps): RebaseOrchestrator {
  const { vcs, eventBus } = deps
  const repositoryPath = deps.repositoryPath ?? process.cwd()
  const generateRunId = deps.generateRunId ?? randomUUID

  function launch(input: ResumeInput, mode: 'start' | 'resume'): RebaseRunHandle {
    const runId = generateRunId()
    const controller = new AbortController()
    let failureCode: string | undefined

    let deliver: (outcome: RunOutcome) => void = () => {}
    const result = new Promise<RunOutcome>((resolve) => {
      deliver = resolve
    })

    const ctx: RunContext = {
      runId,
      sourceRef: input.sourceBranch,
      targetRef: input.targetBranch,
      attemptGlobal: 0,
      maxAttemptsGlobal: input.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
      fileAttempts: new Map(),
      conflictFiles: [],
      initialSnapshot: null,
      stage: mode === 'start' ? 'initializing' : 'continuing',
      tracker: createOperationTracker({
        onTerminal: (success, error) => finish(success, error),
        onMismatch: () => {
          ctx.eventLog.append({
            stage: ctx.stage,
            details: 'Attempted to complete operation when no operations were pending',
            progressPercent: ctx.eventLog.lastProgress(),
          })
          eventBus.emit('tracker:mismatch', { runId })
        },
      }),
      eventLog: createEventLog({ runId, eventBus, ...(input.onLog !== undefined ? { onLog: input.onLog } : {}) }),
      resolutionErrors: [],
      lastIssues: new Map(),
      signal: controller.signal,
      cancelReason: null,
      rolledBack: false,
    }

    // -- terminal delivery --

    function finish(success: boolean, error?: string): void {
      const outcome: RunOutcome = {
        runId,
        success,
        attempts: ctx.attemptGlobal,
        stage: ctx.stage,
        rolledBack: ctx.rolledBack,
        fileAttempts: Object.fromEntries(ctx.fileAttempts),
        eventLog: ctx.eventLog.entries(),
        ...(error !== undefined ? { error } : {}),
        ...(!success && failureCode !== undefined ? { errorCode: failureCode } : {}),
      }
      deliver(outcome)

      try {
        input.onComplete?.(success, error)
      } catch (err) {
        logger.error({ runId, error: err instanceof Error ? err.message : String(err) }, 'onComplete callback threw')
      }

      if (success) {
        logger.info({ runId, attempts: ctx.attemptGlobal }, 'Rebase completed')
        eventBus.emit('rebase:completed', { runId, attempts: ctx.attemptGlobal })
      } else {
        logger.warn({ runId, error, rolledBack: ctx.rolledBack }, 'Rebase failed')
        eventBus.emit('rebase:failed', {
          runId,
          error: error ?? 'Unknown error',
          attempts: ctx.attemptGlobal,
          rolledBack: ctx.rolledBack,
        })
      }
    }

    // -- stage handling --

    function setStage(to: RunStage): void {
      const from = ctx.stage
      ctx.stage = to
      eventBus.emit('rebase:stage-changed', { runId, from, to })
    }

    function transition(to: RunStage): void {
      if (!canTransition(ctx.stage, to)) {
        throw new IllegalTransitionError(ctx.stage, to)
      }
      setStage(to)
    }

    function throwIfCancelled(): void {
      if (ctx.signal.aborted) {
        throw new RunCancelledError(ctx.cancelReason ?? undefined)
      }
    }

    function emitStarted(resumed: boolean): void {
      if (ctx.initialSnapshot === null) return
      eventBus.emit('rebase:started', {
        runId,
        sourceBranch: ctx.sourceRef,
        targetBranch: ctx.targetRef,
        maxAttempts: ctx.maxAttemptsGlobal,
        snapshot: ctx.initialSnapshot,
        resumed,
      })
    }

    // -- entry stages --

    async function initialize(): Promise<void> {
      ctx.eventLog.append({
        stage: 'initializing',
        details: `Initializing rebase workflow: ${input.sourceBranch} onto ${input.targetBranch}`,
        progressPercent: 10,
      })
      const validated = await initializeRun(vcs, input, repositoryPath)
      ctx.sourceRef = validated.sourceRef
      ctx.targetRef = validated.targetRef
      ctx.maxAttemptsGlobal = validated.maxAttempts
      ctx.initialSnapshot = validated.initialSnapshot
      emitStarted(false)
    }

    async function enterResume(): Promise<void> {
      const normalized = normalizeRunInput(input)
      ctx.sourceRef = normalized.sourceRef
      ctx.targetRef = normalized.targetRef
      ctx.maxAttemptsGlobal = normalized.maxAttempts

      if (!(await vcs.isRebaseInProgress())) {
        throw new NoRebaseInProgressError()
      }
      ctx.initialSnapshot =
        input.initialSnapshot ?? (await vcs.readRebaseOrigHead()) ?? (await vcs.captureSnapshot())

      ctx.eventLog.append({
        stage: 'continuing',
        details: `Resuming rebase workflow: ${ctx.sourceRef} onto ${ctx.targetRef}`,
        progressPercent: 10,
      })
      emitStarted(true)
    }

    // -- main loop --

    async function detectAndResolve(): Promise<void> {
      transition('detecting_conflicts')

      for (;;) {
        throwIfCancelled()

        ctx.eventLog.append({
          stage: 'detecting_conflicts',
          details: `Rebasing ${ctx.sourceRef} onto ${ctx.targetRef} and checking for conflicts`,
          progressPercent: 20,
        })

        const op = await vcs.startOrContinueRebase(ctx.targetRef, ctx.sourceRef)
        const { files, skipped } = await detectConflictFiles(vcs)

        if (skipped.length > 0) {
          ctx.eventLog.append({
            stage: 'detecting_conflicts',
            details: `Skipped ${String(skipped.length)} conflicted files that need manual resolution`,
            progressPercent: 20,
            files: skipped.map((s) => s.path),
          })
        }

        if (files.length === 0) {
          if (!op.ok) {
            await fail(`Rebase failed without clear conflict information: ${op.output}`, 'GIT_ERROR')
            return
          }
          succeed()
          return
        }

        ctx.conflictFiles = files
        transition('resolving_conflicts')

        if (ctx.attemptGlobal >= ctx.maxAttemptsGlobal) {
          await fail('Maximum global resolution attempts exceeded')
          return
        }
        ctx.attemptGlobal += 1

        ctx.eventLog.append({
          stage: 'resolving_conflicts',
          details: `Attempting to resolve conflicts (Global attempt ${String(ctx.attemptGlobal)}/${String(ctx.maxAttemptsGlobal)})`,
          progressPercent: 25,
          files,
        })

        const round = await runResolutionRound(ctx, deps)
        if (!round.success) {
          await fail(round.error ?? 'Conflict resolution failed', round.errorCode)
          return
        }

        transition('detecting_conflicts')
      }
    }

    // -- outcomes --

    function succeed(): void {
      transition('completed')
      ctx.eventLog.append({ stage: 'completed', details: 'Rebase completed successfully', progressPercent: 100 })
      ctx.tracker.complete(true)
    }

    async function fail(message: string, code?: string): Promise<void> {
      failureCode = code
      if (ctx.stage !== 'failed') {
        if (canTransition(ctx.stage, 'failed')) {
          transition('failed')
        } else {
          logger.error({ runId, from: ctx.stage }, 'Forcing failed stage after an unexpected error')
          setStage('failed')
        }
      }

      ctx.eventLog.append({
        stage: 'failed',
        details: 'Rebase failed',
        progressPercent: 100,
        errors: [message],
      })

      if (ctx.initialSnapshot !== null && !ctx.rolledBack) {
        transition('rolling_back')
        await rollbackRun(ctx, deps)
        transition('failed')
      }

      ctx.tracker.complete(false, message)
    }

    async function execute(): Promise<void> {
      try {
        if (mode === 'start') {
          await initialize()
        } else {
          await enterResume()
        }
        throwIfCancelled()
        await detectAndResolve()
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err)
        const code = err instanceof RebasePilotError ? err.code : undefined
        try {
          await fail(message, code)
        } catch (failErr) {
          logger.error(
            { runId, error: failErr instanceof Error ? failErr.message : String(failErr) },
            'Failure handling threw',
          )
          ctx.tracker.complete(false, message)
        }
      }
    }

    // Registered first so dispatch completions never drain the count mid-run
    ctx.tracker.track()
    logger.debug({ runId, mode, sourceBranch: input.sourceBranch, targetBranch: input.targetBranch }, 'Run launched')
    eventBus.emit('rebase:requested', {
      runId,
      sourceBranch: input.sourceBranch,
      targetBranch: input.targetBranch,
      mode,
    })
    void execute()

    return {
      runId,
      result,
      cancel(reason?: string): void {
        if (ctx.tracker.completed || controller.signal.aborted) return
        ctx.cancelReason = reason ?? 'Run cancelled'
        logger.info({ runId, reason: ctx.cancelReason }, 'Run cancellation requested')
        controller.abort(ctx.cancelReason)
      },
      getStatus(): RunStatus {
        return {
          runId,
          sourceBranch: ctx.sourceRef,
          targetBranch: ctx.targetRef,
          stage: ctx.stage,
          attemptGlobal: ctx.attemptGlobal,
          maxAttempts: ctx.maxAttemptsGlobal,
          conflictFiles: [...ctx.conflictFiles],
          fileAttempts: Object.fromEntries(ctx.fileAttempts),
          pendingOps: ctx.tracker.pendingOps,
          completed: ctx.tracker.completed,
        }
      },
    }
  }

  return {
    start(input: RunInput): RebaseRunHandle {
      return launch(input, 'start')
    },
    resume(input: ResumeInput): RebaseRunHandle {
      return launch(input, 'resume')
    },
  }
}
