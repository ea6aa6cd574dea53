/**
 * Retrieval and prompt assembly
 */

export {
  RetrievalErrorCode,
  RetrievalError,
  isRetrievalError,
  RetrieverConfigSchema,
  loadRetrieverConfig,
  PromptTemplateSchema,
  DEFAULT_ROLE_PREAMBLE,
  DEFAULT_GROUNDED_ROLE,
  DEFAULT_GROUNDED_INSTRUCTIONS,
  DEFAULT_FALLBACK_INSTRUCTION,
  DEFAULT_PROMPT_TEMPLATE,
  SOURCE_CONTEXT_SEPARATOR,
} from './types.js';

export type {
  RetrievedPassage,
  RetrieverConfig,
  RetrieverConfigInput,
  PromptTemplate,
  PromptTemplateDefaults,
  PromptBundle,
} from './types.js';

export { PassageRetriever, createPassageRetriever } from './retriever.js';
export type { PassageRetrieverDependencies } from './retriever.js';

export { PromptBuilder, createPromptBuilder } from './prompt-builder.js';
