/**
 * Verification agent: asks a second coding agent to review a resolved file
 * and answer with a `verdict:` YAML block.
 */

import type { AgentId } from '../../core/types.js'
import type { Dispatcher } from '../agent-dispatch/types.js'
import { createLogger } from '../../utils/logger.js'
import { describeDispatchFailure } from './dispatch-failure.js'
import { loadPromptTemplate, renderPrompt, truncateContent } from './prompt-assembler.js'
import { VerificationResultSchema } from './schemas.js'
import type { VerificationAgent, VerifyOutcome, VerifyRequest } from './types.js'

const logger = createLogger('conflict-agents:verification')

/** Default character budget for resolved content in the prompt */
export const DEFAULT_VERIFICATION_CHAR_LIMIT = 8000

export interface VerificationAgentOptions {
  dispatcher: Dispatcher
  agent: AgentId
  workingDirectory: string
  model?: string
  timeoutMs?: number
  charLimit?: number
  promptsDir?: string
}

export function createVerificationAgent(options: VerificationAgentOptions): VerificationAgent {
  const charLimit = options.charLimit ?? DEFAULT_VERIFICATION_CHAR_LIMIT

  return {
    async verify(request: VerifyRequest): Promise<VerifyOutcome> {
      const { path, attempt } = request

      let template: string
      try {
        template = await loadPromptTemplate('verify-resolution', options.promptsDir)
      } catch (err) {
        const error = err instanceof Error ? err.message : String(err)
        logger.error({ error }, 'Failed to load verify-resolution prompt template')
        return { passed: false, issues: [], error: `Failed to load prompt template: ${error}` }
      }

      const prompt = renderPrompt(template, {
        file_path: path,
        file_content: truncateContent(request.content, charLimit),
        attempt,
        max_attempts: request.maxAttempts,
      })

      const handle = options.dispatcher.dispatch({
        prompt,
        agent: options.agent,
        taskType: 'verify-resolution',
        outputSchema: VerificationResultSchema,
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
        logger.error({ path, error }, 'Verification dispatch threw unexpected error')
        return { passed: false, issues: [], error: `Dispatch error: ${error}` }
      }

      if (dispatchResult.status !== 'completed' || dispatchResult.parsed === null) {
        const error = describeDispatchFailure(dispatchResult)
        logger.warn({ path, status: dispatchResult.status, error }, 'Verification dispatch produced no verdict')
        return { passed: false, issues: [], error }
      }

      const { verdict, issues } = dispatchResult.parsed
      const issueList = issues ?? []

      if (verdict === 'pass') {
        logger.info({ path, attempt }, 'Verification passed')
        return { passed: true, issues: issueList }
      }

      logger.info({ path, attempt, issues: issueList }, 'Verification rejected resolution')
      return { passed: false, issues: issueList.length > 0 ? issueList : ['Unknown verification issues'] }
    },
  }
}
