/**
 * Chat turn orchestration
 */

export { ok, err, settle } from './result.js';
export type { Result } from './result.js';

export {
  TurnState,
  TurnStage,
  GENERATION_FALLBACK_ANSWER,
  SYSTEM_ERROR_ANSWER,
  TURN_FAILURE_ANSWER,
  EmptyRetrievalMode,
  OrchestratorConfigSchema,
  OrchestrationError,
  isOrchestrationError,
  generateRequestId,
} from './types.js';
export type {
  OrchestratorConfig,
  OrchestratorConfigInput,
  ChatTurnInput,
  ChatResponse,
  StateEntry,
  TurnTrace,
  ChatTurnOutcome,
} from './types.js';

export {
  MAX_QUESTION_LENGTH,
  ChatRequestSchema,
  HistoryQuerySchema,
  ValidationError,
  isValidationError,
  transformZodErrors,
  parseChatRequest,
  parseHistoryQuery,
} from './validation.js';
export type { ChatRequest, HistoryQuery, ValidationIssue } from './validation.js';

export { TurnTracker } from './turn-tracker.js';
export type { TurnTrackerOptions } from './turn-tracker.js';

export { ChatOrchestrator, createChatOrchestrator } from './orchestrator.js';
export type { ChatOrchestratorDependencies } from './orchestrator.js';
