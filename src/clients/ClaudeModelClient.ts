import Anthropic from '@anthropic-ai/sdk';
import { AnthropicConfig } from '../config/anthropic.js';
import { createLogger } from '../utils/logger.js';
import {
  type InferenceRequest,
  type InferenceResponse,
  type InvokeOptions,
  type ModelClient,
  isRateLimitError,
  sleep,
} from './ModelClient.js';

export interface ClaudeModelClientOptions {
  model?: string;
  maxRetries?: number;
  client?: Anthropic;
}

/**
 * Claude Model Client
 *
 * Wrapper for the Anthropic Messages API. Claude has no native JSON-schema
 * response format here, so the schema is appended to the system prompt.
 */
export class ClaudeModelClient implements ModelClient {
  readonly provider = 'anthropic';
  private client: Anthropic;
  private logger = createLogger('ClaudeModelClient');
  private model: string;
  private maxRetries: number;

  constructor(options: ClaudeModelClientOptions = {}) {
    this.client = options.client ?? AnthropicConfig.getClient();
    this.model = options.model ?? AnthropicConfig.getModel();
    this.maxRetries = options.maxRetries ?? 3;
  }

  async invoke(request: InferenceRequest, options: InvokeOptions = {}): Promise<InferenceResponse> {
    return this.retryWithBackoff(async () => {
      const response = await this.client.messages.create(this.buildRequestBody(request), {
        signal: options.signal,
      });
      return this.normalizeResponse(response);
    }, options.signal);
  }

  /**
   * Retry with exponential backoff (1s, 2s, 4s) on rate limits only
   */
  private async retryWithBackoff<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        const rateLimited =
          isRateLimitError(error) || error instanceof Anthropic.RateLimitError;
        if (!rateLimited || attempt >= this.maxRetries) {
          throw error;
        }

        const waitSeconds = Math.pow(2, attempt);
        this.logger.info(`Retry attempt ${attempt + 1}/${this.maxRetries}`, { waitSeconds });
        await sleep(waitSeconds * 1000, signal);
      }
    }
  }

  private buildRequestBody(request: InferenceRequest): Anthropic.MessageCreateParamsNonStreaming {
    let systemPrompt = request.system;

    if (request.responseSchema) {
      systemPrompt += `\n\nYou must respond with valid JSON that matches this exact schema:\n\`\`\`json\n${JSON.stringify(request.responseSchema, null, 2)}\n\`\`\`\n\nIMPORTANT: Return ONLY the JSON object, no markdown formatting, no code blocks, no explanations.`;
    } else {
      systemPrompt += '\n\nYou must respond with valid JSON only. No markdown, no code blocks, no explanations.';
    }

    // SDK rejects non-streaming calls whose max_tokens implies > 10 minutes
    const safeMaxTokens = Math.min(request.maxOutputTokens ?? 8192, 20000);

    const body: Anthropic.MessageCreateParamsNonStreaming = {
      model: this.model,
      max_tokens: safeMaxTokens,
      system: systemPrompt,
      messages: [{ role: 'user', content: request.prompt }],
    };

    if (request.temperature !== undefined) {
      body.temperature = request.temperature;
    }

    return body;
  }

  private normalizeResponse(response: Anthropic.Message): InferenceResponse {
    let text = '';
    for (const block of response.content) {
      if (block.type === 'text') {
        text += block.text;
      }
    }

    return {
      text,
      finishReason: response.stop_reason === 'max_tokens' ? 'length' : 'stop',
      usage: {
        promptTokens: response.usage.input_tokens,
        completionTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens,
      },
      model: response.model,
    };
  }
}
