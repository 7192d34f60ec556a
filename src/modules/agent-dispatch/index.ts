/**
 * Agent dispatch module: public exports.
 */

export type {
  Dispatcher,
  DispatchRequest,
  DispatchHandle,
  DispatchResult,
  DispatchConfig,
  DispatchStatus,
} from './types.js'
export { DispatcherShuttingDownError, DEFAULT_TIMEOUTS, FALLBACK_TIMEOUT_MS } from './types.js'
export { extractYamlBlock, parseYamlResult } from './yaml-parser.js'
export { DispatcherImpl, createDispatcher } from './dispatcher-impl.js'
export type { CreateDispatcherOptions } from './dispatcher-impl.js'
