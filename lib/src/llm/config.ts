/**
 * Generation Configuration
 *
 * Loads the hosted-model settings from the environment and normalises the
 * model identifier.
 */

import {
  GenerationConfigSchema,
  type GenerationConfig,
} from './types.js';

const MODEL_URL_PREFIXES = [
  'https://api-inference.huggingface.co/models/',
  'https://huggingface.co/',
] as const;

const PLACEHOLDER_MODEL_ID = 'your_model_name_here';

/**
 * Turn a repository id or a full model URL into a bare repository id.
 *
 * @throws {Error} When the result is empty or still the placeholder value
 */
export function normalizeModelId(raw: string): string {
  let modelId = raw.trim();

  for (const prefix of MODEL_URL_PREFIXES) {
    if (modelId.startsWith(prefix)) {
      modelId = modelId.slice(prefix.length);
      break;
    }
  }

  if (!modelId || modelId === PLACEHOLDER_MODEL_ID) {
    throw new Error(
      "HUGGINGFACE_MODEL_URL must be set to the model repository id (e.g. 'org/epf-assistant-7b')"
    );
  }

  return modelId;
}

function parseNumber(value: string | undefined): number | undefined {
  return value ? Number(value) : undefined;
}

/**
 * Loads generation configuration from the environment.
 *
 * Environment variables:
 * - HUGGINGFACE_MODEL_URL (required; repository id or full URL)
 * - HUGGINGFACE_API_TOKEN
 * - GENERATION_BASE_URL
 * - GENERATION_TIMEOUT_MS (default: 30000)
 * - GENERATION_MAX_NEW_TOKENS (default: 512)
 * - GENERATION_TEMPERATURE (default: 0.7)
 * - GENERATION_TOP_P (default: 0.95)
 */
export function loadGenerationConfig(
  env: Record<string, string | undefined> = process.env
): GenerationConfig {
  return GenerationConfigSchema.parse({
    modelId: normalizeModelId(env['HUGGINGFACE_MODEL_URL'] ?? ''),
    apiToken: env['HUGGINGFACE_API_TOKEN'] || undefined,
    baseUrl: env['GENERATION_BASE_URL'] || undefined,
    timeoutMs: parseNumber(env['GENERATION_TIMEOUT_MS']),
    decoding: {
      maxNewTokens: parseNumber(env['GENERATION_MAX_NEW_TOKENS']),
      temperature: parseNumber(env['GENERATION_TEMPERATURE']),
      topP: parseNumber(env['GENERATION_TOP_P']),
    },
  });
}

/**
 * Validates the generation environment without throwing.
 */
export function validateGenerationEnv(
  env: Record<string, string | undefined> = process.env
): {
  isValid: boolean;
  missingVars: string[];
  errors: string[];
  warnings: string[];
} {
  const missingVars: string[] = [];
  const errors: string[] = [];
  const warnings: string[] = [];

  const modelUrl = env['HUGGINGFACE_MODEL_URL'];
  if (!modelUrl) {
    missingVars.push('HUGGINGFACE_MODEL_URL');
  } else {
    try {
      normalizeModelId(modelUrl);
    } catch (error) {
      errors.push(error instanceof Error ? error.message : String(error));
    }
  }

  if (!env['HUGGINGFACE_API_TOKEN']) {
    warnings.push('HUGGINGFACE_API_TOKEN not set; using public inference');
  }

  const temperature = parseNumber(env['GENERATION_TEMPERATURE']);
  if (temperature !== undefined && !(temperature >= 0 && temperature <= 1)) {
    errors.push('GENERATION_TEMPERATURE must be between 0 and 1');
  }

  const topP = parseNumber(env['GENERATION_TOP_P']);
  if (topP !== undefined && !(topP > 0 && topP <= 1)) {
    errors.push('GENERATION_TOP_P must be greater than 0 and at most 1');
  }

  return {
    isValid: missingVars.length === 0 && errors.length === 0,
    missingVars,
    errors,
    warnings,
  };
}
