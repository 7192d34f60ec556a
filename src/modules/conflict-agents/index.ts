/**
 * Conflict agents module: public exports.
 */

export type {
  ResolutionAgent,
  VerificationAgent,
  ResolveRequest,
  ResolveOutcome,
  VerifyRequest,
  VerifyOutcome,
} from './types.js'
export { createResolutionAgent, DEFAULT_RESOLUTION_CHAR_LIMIT } from './resolution-agent.js'
export type { ResolutionAgentOptions } from './resolution-agent.js'
export { createVerificationAgent, DEFAULT_VERIFICATION_CHAR_LIMIT } from './verification-agent.js'
export type { VerificationAgentOptions } from './verification-agent.js'
export { ResolutionResultSchema, VerificationResultSchema } from './schemas.js'
export { loadPromptTemplate, renderPrompt, truncateContent } from './prompt-assembler.js'
