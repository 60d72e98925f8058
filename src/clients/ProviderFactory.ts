import type { EngineConfig, ModelProvider } from '../config/engine.js';
import { OpenAIConfig } from '../config/openai.js';
import { AnthropicConfig } from '../config/anthropic.js';
import { ConfigurationError } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import type { ModelClient } from './ModelClient.js';
import { OpenAIModelClient } from './OpenAIModelClient.js';
import { ClaudeModelClient } from './ClaudeModelClient.js';

const logger = createLogger('ProviderFactory');

/**
 * Provider Factory
 *
 * Creates the model client backing discovery and extraction agents
 */
export class ProviderFactory {
  /**
   * Create a model client for the configured provider
   *
   * @param config Engine configuration (provider and API call limits)
   */
  static createClient(config: Pick<EngineConfig, 'provider' | 'maxConcurrentApiCalls' | 'requestsPerSecond'>): ModelClient {
    switch (config.provider) {
      case 'openai':
        logger.info('Using OpenAI Responses API');
        return new OpenAIModelClient({
          maxConcurrentApiCalls: config.maxConcurrentApiCalls,
          requestsPerSecond: config.requestsPerSecond,
        });

      case 'anthropic':
        logger.info('Using Anthropic Messages API');
        return new ClaudeModelClient();

      default:
        throw new ConfigurationError(
          `Unknown provider type: ${String(config.provider)}. Valid options: 'openai', 'anthropic'`
        );
    }
  }

  /**
   * Validate provider configuration without creating a client
   */
  static validateProvider(provider: ModelProvider): boolean {
    return provider === 'openai' ? OpenAIConfig.validate() : AnthropicConfig.validate();
  }
}
