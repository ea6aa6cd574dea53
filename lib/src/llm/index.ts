/**
 * Text generation against the hosted model endpoint
 */

export {
  DecodingParamsSchema,
  DEFAULT_STOP_SEQUENCES,
  DEFAULT_GENERATION_BASE_URL,
  GenerationConfigSchema,
  EMPTY_GENERATION_PLACEHOLDER,
  CONNECTION_TEST_PROMPT,
  GenerationErrorCode,
} from './types.js';

export type {
  DecodingParams,
  DecodingParamsInput,
  GenerationConfig,
  GenerationConfigInput,
  GenerateOptions,
  GenerationPayload,
  GenerationResult,
  GenerationErrorInfo,
} from './types.js';

export {
  GenerationError,
  GenerationTimeoutError,
  UnauthorizedError,
  RateLimitedError,
  ModelLoadingError,
  ModelNotFoundError,
  NetworkError,
  UpstreamError,
  isGenerationError,
} from './errors.js';

export type { GenerationErrorOptions } from './errors.js';

export { normalizeModelId, loadGenerationConfig, validateGenerationEnv } from './config.js';

export { cleanResponse } from './text-cleanup.js';

export {
  parseGenerationResponse,
  classifyUpstreamError,
  UpstreamErrorKind,
} from './response-parser.js';

export type { ParsedGeneration } from './response-parser.js';

export {
  GenerationClient,
  createGenerationClient,
  createHttpTransport,
  mapTransportError,
} from './generation-client.js';

export type { HttpTransport, GenerationClientDependencies } from './generation-client.js';
