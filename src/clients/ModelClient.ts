/**
 * Model-inference capability shared by every discovery and extraction agent.
 * Implementations are remote and unreliable: they may throw, hang or be aborted.
 */

export interface InferenceRequest {
  /** Instructions that frame the task */
  system: string;
  /** Task-specific prompt, including the document context */
  prompt: string;
  /** JSON schema the reply must satisfy */
  responseSchema?: Record<string, unknown>;
  responseSchemaName?: string;
  maxOutputTokens?: number;
  temperature?: number;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface InferenceResponse {
  text: string;
  /** 'length' when the reply was cut off by the token limit */
  finishReason: 'stop' | 'length';
  usage?: TokenUsage;
  model: string;
}

export interface InvokeOptions {
  signal?: AbortSignal;
}

export interface ModelClient {
  readonly provider: string;
  invoke(request: InferenceRequest, options?: InvokeOptions): Promise<InferenceResponse>;
}

/**
 * Rate-limit detection shared by the provider clients
 */
export function isRateLimitError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) {
    return false;
  }
  if ('status' in error && error.status === 429) {
    return true;
  }
  return 'code' in error && error.code === 'rate_limit_exceeded';
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error('Aborted'));
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(new Error('Aborted'));
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
