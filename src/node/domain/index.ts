/**
 * Domain Layer - Pure business logic with no I/O dependencies.
 *
 * All classes in this module are pure - they contain only synchronous functions
 * that operate on data without side effects. For work that needs the
 * repository, see the core and operations layers.
 */

export { LEGACY_HEADER, LEGACY_HEADER_LENGTH, LegacyStateCodec } from './LegacyStateCodec'
export type { LegacyCodecOptions } from './LegacyStateCodec'
export {
  createIdlePhase,
  getPhaseDescription,
  InvalidTransitionError,
  transition
} from './RebasePhase'
export type { RebaseEvent, RebasePhase } from './RebasePhase'
export { RebasePlanBuilder } from './RebasePlanBuilder'
export type { PlanCandidate } from './RebasePlanBuilder'
export { DEFAULT_FLAGS, RebaseStateMachine } from './RebaseStateMachine'
export { RebaseValidator, referencedIds } from './RebaseValidator'
export type { ValidationErrorCode, ValidationResult } from './RebaseValidator'
export { defaultSkipTokens, LEGACY_PENDING_TOKEN, SkipTokenTable } from './SkipTokens'
