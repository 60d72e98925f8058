import OpenAI from 'openai';
import pLimit from 'p-limit';
import { OpenAIConfig } from '../config/openai.js';
import { createLogger } from '../utils/logger.js';
import {
  type InferenceRequest,
  type InferenceResponse,
  type InvokeOptions,
  type ModelClient,
  isRateLimitError,
  sleep,
} from './ModelClient.js';

/**
 * OpenAI Model Client Options
 */
export interface OpenAIModelClientOptions {
  model?: string;
  /**
   * Maximum concurrent API calls allowed across all agents sharing this client.
   * Excess calls queue instead of flooding the API.
   * Default: 20
   */
  maxConcurrentApiCalls?: number;
  /**
   * Maximum requests per second.
   * Default: undefined (only concurrency limiting)
   */
  requestsPerSecond?: number;
  /** Retries on 429 responses. Default: 5 */
  maxRetries?: number;
  /** Injected SDK client (tests); defaults to the shared OpenAIConfig client */
  client?: OpenAI;
}

/**
 * OpenAI Model Client
 *
 * Wrapper for the OpenAI Responses API with structured outputs.
 * Handles call limiting, request spacing and 429 retries.
 */
export class OpenAIModelClient implements ModelClient {
  readonly provider = 'openai';
  private client: OpenAI;
  private logger = createLogger('OpenAIModelClient');
  private model: string;
  private apiLimiter: ReturnType<typeof pLimit>;
  private minDelayMs: number;
  private maxRetries: number;
  private lastRequestTime: number = 0;
  private rateLimitMutex: Promise<void> = Promise.resolve();

  constructor(options: OpenAIModelClientOptions = {}) {
    const maxConcurrentApiCalls = options.maxConcurrentApiCalls ?? 20;
    this.apiLimiter = pLimit(maxConcurrentApiCalls);
    this.minDelayMs = options.requestsPerSecond ? Math.ceil(1000 / options.requestsPerSecond) : 0;
    this.maxRetries = options.maxRetries ?? 5;
    this.client = options.client ?? OpenAIConfig.getClient();
    this.model = options.model ?? OpenAIConfig.getModel();

    this.logger.debug('Client initialized', {
      model: this.model,
      maxConcurrentApiCalls,
      minDelayMs: this.minDelayMs,
    });
  }

  /**
   * Enforce request spacing; the mutex keeps timing sequential under concurrency
   */
  private async enforceRateLimit(): Promise<void> {
    if (this.minDelayMs === 0) return;

    this.rateLimitMutex = this.rateLimitMutex.then(async () => {
      const waitTime = this.minDelayMs - (Date.now() - this.lastRequestTime);
      if (waitTime > 0) {
        await sleep(waitTime);
      }
      this.lastRequestTime = Date.now();
    });

    await this.rateLimitMutex;
  }

  async invoke(request: InferenceRequest, options: InvokeOptions = {}): Promise<InferenceResponse> {
    return this.apiLimiter(async () => {
      options.signal?.throwIfAborted();
      await this.enforceRateLimit();

      return this.retryWithBackoff(async () => {
        const response = await this.client.responses.create(
          this.buildRequestBody(request),
          { signal: options.signal }
        );

        return {
          text: response.output_text,
          finishReason: response.incomplete_details?.reason === 'max_output_tokens' ? 'length' : 'stop',
          usage: response.usage
            ? {
                promptTokens: response.usage.input_tokens,
                completionTokens: response.usage.output_tokens,
                totalTokens: response.usage.total_tokens,
              }
            : undefined,
          model: response.model,
        };
      }, options.signal);
    });
  }

  /**
   * Retry 429s, honouring Retry-After when present, else exponential backoff
   */
  private async retryWithBackoff<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        if (!isRateLimitError(error) || attempt >= this.maxRetries) {
          throw error;
        }

        let waitSeconds = Math.pow(2, attempt + 1) + Math.random() * 2;
        const retryAfter = error instanceof OpenAI.APIError ? error.headers?.['retry-after'] : undefined;
        if (retryAfter) {
          const parsed = parseInt(retryAfter, 10);
          if (!isNaN(parsed)) {
            waitSeconds = parsed;
          }
        }

        // Cap wait time at 60 seconds (token window)
        waitSeconds = Math.min(waitSeconds, 60);

        this.logger.info('Rate limit hit, backing off', {
          waitSeconds: waitSeconds.toFixed(1),
          attempt: attempt + 1,
          maxRetries: this.maxRetries,
        });
        await sleep(waitSeconds * 1000, signal);
      }
    }
  }

  private buildRequestBody(request: InferenceRequest): OpenAI.Responses.ResponseCreateParamsNonStreaming {
    const format: OpenAI.Responses.ResponseFormatTextConfig = request.responseSchema
      ? {
          type: 'json_schema',
          name: request.responseSchemaName ?? 'structured_extraction',
          schema: request.responseSchema,
          strict: false,
        }
      : { type: 'json_object' };

    const body: OpenAI.Responses.ResponseCreateParamsNonStreaming = {
      model: this.model,
      instructions: request.system,
      input: request.prompt,
      text: { format },
    };

    if (request.maxOutputTokens) body.max_output_tokens = request.maxOutputTokens;
    if (request.temperature !== undefined) body.temperature = request.temperature;

    return body;
  }
}
