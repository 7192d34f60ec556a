/**
 * Resolution agent: asks a coding agent to rewrite one conflicted file.
 *
 * Renders prompts/resolve-conflict.md with the (truncated) conflicted content
 * and any issues from the previous verification, dispatches it, and reads the
 * `result:` YAML block the agent ends with. The agent edits the file in place;
 * this module never touches the working tree itself.
 */

import type { AgentId } from '../../core/types.js'
import type { Dispatcher } from '../agent-dispatch/types.js'
import { createLogger } from '../../utils/logger.js'
import { describeDispatchFailure } from './dispatch-failure.js'
import { loadPromptTemplate, renderPrompt, truncateContent } from './prompt-assembler.js'
import { ResolutionResultSchema } from './schemas.js'
import type { ResolutionAgent, ResolveOutcome, ResolveRequest } from './types.js'

const logger = createLogger('conflict-agents:resolution')

/** Default character budget for conflicted content in the prompt */
export const DEFAULT_RESOLUTION_CHAR_LIMIT = 4000

export interface ResolutionAgentOptions {
  dispatcher: Dispatcher
  agent: AgentId
  workingDirectory: string
  model?: string
  timeoutMs?: number
  charLimit?: number
  /** Directory holding the prompt templates; defaults to the bundled prompts/ */
  promptsDir?: string
}

function formatPreviousIssues(issues: readonly string[]): string {
  if (issues.length === 0) return 'None.'
  return issues.map((issue) => `- ${issue}`).join('\n')
}

export function createResolutionAgent(options: ResolutionAgentOptions): ResolutionAgent {
  const charLimit = options.charLimit ?? DEFAULT_RESOLUTION_CHAR_LIMIT

  return {
    async resolve(request: ResolveRequest): Promise<ResolveOutcome> {
      const { path, attempt } = request

      let template: string
      try {
        template = await loadPromptTemplate('resolve-conflict', options.promptsDir)
      } catch (err) {
        const error = err instanceof Error ? err.message : String(err)
        logger.error({ error }, 'Failed to load resolve-conflict prompt template')
        return { ok: false, error: `Failed to load prompt template: ${error}` }
      }

      const prompt = renderPrompt(template, {
        file_path: path,
        file_content: truncateContent(request.content, charLimit),
        previous_issues: formatPreviousIssues(request.previousIssues),
        attempt,
        max_attempts: request.maxAttempts,
      })

      logger.debug({ path, attempt, promptLength: prompt.length }, 'Dispatching resolution agent')

      const handle = options.dispatcher.dispatch({
        prompt,
        agent: options.agent,
        taskType: 'resolve-conflict',
        outputSchema: ResolutionResultSchema,
        workingDirectory: options.workingDirectory,
        ...(options.model !== undefined ? { model: options.model } : {}),
        ...(options.timeoutMs !== undefined ? { timeout: options.timeoutMs } : {}),
        ...(request.signal !== undefined ? { signal: request.signal } : {}),
      })

      let dispatchResult
      try {
        dispatchResult = await handle.result
      } catch (err) {
        const error = err instanceof Error ? err.message : String(err)
        logger.error({ path, error }, 'Resolution dispatch threw unexpected error')
        return { ok: false, error: `Dispatch error: ${error}` }
      }

      if (dispatchResult.status !== 'completed' || dispatchResult.parsed === null) {
        const error = describeDispatchFailure(dispatchResult)
        logger.warn({ path, status: dispatchResult.status, error }, 'Resolution dispatch produced no result')
        return { ok: false, error }
      }

      const parsed = dispatchResult.parsed
      if (parsed.result === 'failed') {
        const error = parsed.error ?? 'Agent reported the conflict could not be resolved'
        logger.info({ path, error }, 'Resolution agent gave up on file')
        return { ok: false, error }
      }

      logger.info({ path, attempt, notes: parsed.notes }, 'Resolution agent resolved file')
      return { ok: true }
    },
  }
}
