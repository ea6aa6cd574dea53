/**
 * Generation Client
 *
 * Posts a prompt to the hosted text-generation endpoint, decodes the reply,
 * maps failures onto the generation error taxonomy and cleans the completion.
 * One attempt per call; retry policy belongs to the caller.
 */

import http from 'node:http';
import https from 'node:https';
import axios, { isAxiosError, type AxiosInstance } from 'axios';
import { z, ZodError } from 'zod';
import { getGlobalLogger, type Logger } from '../logging/index.js';
import { normalizeModelId } from './config.js';
import {
  GenerationError,
  GenerationTimeoutError,
  ModelLoadingError,
  ModelNotFoundError,
  NetworkError,
  RateLimitedError,
  UnauthorizedError,
  UpstreamError,
} from './errors.js';
import { parseGenerationResponse, UpstreamErrorKind } from './response-parser.js';
import { cleanResponse } from './text-cleanup.js';
import {
  CONNECTION_TEST_PROMPT,
  DecodingParamsSchema,
  EMPTY_GENERATION_PLACEHOLDER,
  GenerationConfigSchema,
  type DecodingParams,
  type GenerateOptions,
  type GenerationConfig,
  type GenerationConfigInput,
  type GenerationPayload,
  type GenerationResult,
} from './types.js';

/** The part of an axios instance the client needs */
export type HttpTransport = Pick<AxiosInstance, 'post'>;

export interface GenerationClientDependencies {
  http?: HttpTransport;
  logger?: Logger;
}

/**
 * Shared axios instance with keep-alive agents; safe for concurrent turns.
 */
export function createHttpTransport(): AxiosInstance {
  return axios.create({
    httpAgent: new http.Agent({ keepAlive: true }),
    httpsAgent: new https.Agent({ keepAlive: true }),
    headers: { 'Content-Type': 'application/json' },
  });
}

const LoadingBodySchema = z.object({ estimated_time: z.number().nonnegative() });

function parseRetryAfter(value: unknown, now: number = Date.now()): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return Math.max(0, Math.round(value * 1000));
  }
  if (typeof value !== 'string' || value.trim() === '') {
    return undefined;
  }
  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, Math.round(seconds * 1000));
  }
  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

function estimatedTimeMs(body: unknown): number | undefined {
  const parsed = LoadingBodySchema.safeParse(body);
  return parsed.success ? Math.round(parsed.data.estimated_time * 1000) : undefined;
}

/**
 * Map a transport or HTTP failure onto the error taxonomy.
 */
export function mapTransportError(error: unknown, model: string): GenerationError {
  if (error instanceof GenerationError) {
    return error;
  }

  if (!isAxiosError(error)) {
    const message = error instanceof Error ? error.message : String(error);
    return new UpstreamError(`Unexpected generation failure: ${message}`, model, {
      originalError: error,
    });
  }

  if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
    return new GenerationTimeoutError(
      'The request timed out as the model is taking too long to respond.',
      model,
      { originalError: error }
    );
  }

  const response = error.response;
  if (!response) {
    return new NetworkError(`Network error occurred: ${error.message}`, model, {
      originalError: error,
    });
  }

  const status = response.status;
  switch (status) {
    case 401:
    case 403:
      return new UnauthorizedError(
        'Authentication failed. Please check your HUGGINGFACE_API_TOKEN.',
        model,
        { status, originalError: error }
      );
    case 429: {
      const retryAfter: unknown = response.headers['retry-after'];
      return new RateLimitedError('Rate limit exceeded. Please try again later.', model, {
        status,
        retryAfterMs: parseRetryAfter(retryAfter),
        originalError: error,
      });
    }
    case 503:
      return new ModelLoadingError(
        'The model is currently loading. Please try again in a few moments.',
        model,
        { status, retryAfterMs: estimatedTimeMs(response.data), originalError: error }
      );
    case 404:
      return new ModelNotFoundError(
        `Model '${model}' not found. Please check the model name.`,
        model,
        { status, originalError: error }
      );
    default:
      return new UpstreamError(`Generation endpoint error (HTTP ${status}): ${error.message}`, model, {
        status,
        originalError: error,
      });
  }
}

export class GenerationClient {
  private readonly config: GenerationConfig;
  private readonly http: HttpTransport;
  private readonly logger: Logger;

  constructor(config: GenerationConfigInput, deps: GenerationClientDependencies = {}) {
    this.config = GenerationConfigSchema.parse({
      ...config,
      modelId: normalizeModelId(config.modelId),
    });
    this.http = deps.http ?? createHttpTransport();
    this.logger = deps.logger ?? getGlobalLogger().child('GenerationClient');

    if (!this.config.apiToken) {
      this.logger.warn('HUGGINGFACE_API_TOKEN not set; using public inference (may have limitations)');
    }

    this.logger.info('Generation client initialized', { model: this.config.modelId });
  }

  /**
   * Generate a completion for a prompt.
   *
   * An empty completion is not an error: the result carries the placeholder
   * text and `placeholder: true`.
   *
   * @throws {GenerationError} One of the taxonomy subclasses
   */
  async generate(prompt: string, options: GenerateOptions = {}): Promise<GenerationResult> {
    const startTime = performance.now();
    const { model, decoding } = this.resolveOptions(options);
    const apiToken = options.apiToken ?? this.config.apiToken;
    const oneShot = options.model !== undefined || options.apiToken !== undefined;

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (apiToken) {
      headers['Authorization'] = `Bearer ${apiToken}`;
    }

    this.logger.info('Sending generation request', {
      model,
      promptLength: prompt.length,
      ...(oneShot && { override: true }),
    });

    let body: unknown;
    try {
      const response = await this.http.post<unknown>(
        this.buildUrl(model),
        this.buildPayload(prompt, decoding),
        { headers, timeout: this.config.timeoutMs }
      );
      body = response.data;
    } catch (error) {
      const mapped = mapTransportError(error, model);
      this.logger.error('Generation request failed', mapped, {
        model,
        status: mapped.status,
      });
      throw mapped;
    }

    const parsed = parseGenerationResponse(body);
    const durationMs = performance.now() - startTime;

    switch (parsed.kind) {
      case 'error': {
        this.logger.error('Generation endpoint returned an error', {
          model,
          upstreamMessage: parsed.message,
        });
        throw this.fromUpstreamMessage(parsed.errorKind, parsed.message, model, parsed.estimatedTimeSeconds);
      }
      case 'malformed':
        this.logger.warn('Unexpected response format', { model, description: parsed.description });
        throw new UpstreamError(
          `Unexpected response format from generation endpoint: ${parsed.description}`,
          model
        );
      case 'text':
        break;
    }

    const cleanedText = parsed.text ? cleanResponse(parsed.text) : '';
    if (!cleanedText) {
      this.logger.warn('Received empty response from generation endpoint', { model });
      return {
        rawText: parsed.text,
        cleanedText: EMPTY_GENERATION_PLACEHOLDER,
        model,
        durationMs,
        placeholder: true,
      };
    }

    this.logger.debug('Generation completed', {
      model,
      shape: parsed.shape,
      rawLength: parsed.text.length,
      cleanedLength: cleanedText.length,
      durationMs: Math.round(durationMs),
    });

    return { rawText: parsed.text, cleanedText, model, durationMs, placeholder: false };
  }

  /**
   * Send a short prompt and report whether non-empty text came back.
   */
  async testConnection(): Promise<boolean> {
    try {
      const result = await this.generate(CONNECTION_TEST_PROMPT);
      return result.cleanedText.trim().length > 0;
    } catch (error) {
      this.logger.error('Connection test failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  getModelId(): string {
    return this.config.modelId;
  }

  getDecodingDefaults(): DecodingParams {
    return { ...this.config.decoding };
  }

  /**
   * Apply per-call overrides. A rejected override is reported as an UpstreamError
   * naming the configured model, since no request was sent.
   */
  private resolveOptions(options: GenerateOptions): { model: string; decoding: DecodingParams } {
    try {
      const model = options.model !== undefined ? normalizeModelId(options.model) : this.config.modelId;
      const decoding = DecodingParamsSchema.parse({ ...this.config.decoding, ...options.decoding });
      return { model, decoding };
    } catch (error) {
      const detail =
        error instanceof ZodError
          ? error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
          : error instanceof Error
            ? error.message
            : String(error);
      const mapped = new UpstreamError(`Invalid generation options: ${detail}`, this.config.modelId, {
        originalError: error,
      });
      this.logger.error('Rejected generation options', mapped, { model: this.config.modelId });
      throw mapped;
    }
  }

  private buildUrl(model: string): string {
    return `${this.config.baseUrl.replace(/\/+$/, '')}/${model}`;
  }

  private buildPayload(prompt: string, decoding: DecodingParams): GenerationPayload {
    return {
      inputs: prompt,
      parameters: {
        max_new_tokens: decoding.maxNewTokens,
        temperature: decoding.temperature,
        top_p: decoding.topP,
        return_full_text: false,
        stop: [...this.config.stopSequences],
      },
    };
  }

  private fromUpstreamMessage(
    kind: UpstreamErrorKind,
    message: string,
    model: string,
    estimatedTimeSeconds?: number
  ): GenerationError {
    switch (kind) {
      case UpstreamErrorKind.MODEL_LOADING:
        return new ModelLoadingError(
          'The model is currently loading. Please try again in a few moments.',
          model,
          {
            retryAfterMs:
              estimatedTimeSeconds !== undefined ? Math.round(estimatedTimeSeconds * 1000) : undefined,
          }
        );
      case UpstreamErrorKind.RATE_LIMITED:
        return new RateLimitedError('Rate limit exceeded. Please try again later.', model);
      case UpstreamErrorKind.OTHER:
        return new UpstreamError(`Generation endpoint error: ${message}`, model);
    }
  }
}

export function createGenerationClient(
  config: GenerationConfigInput,
  deps?: GenerationClientDependencies
): GenerationClient {
  return new GenerationClient(config, deps);
}
