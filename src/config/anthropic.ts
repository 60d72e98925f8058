import Anthropic from '@anthropic-ai/sdk';
import dotenv from 'dotenv';
import { ConfigurationError } from '../errors.js';
import { createLogger } from '../utils/logger.js';

dotenv.config();

const logger = createLogger('AnthropicConfig');

/**
 * Anthropic Configuration
 *
 * Manages the shared client used by the Claude discovery and extraction agents
 */
export class AnthropicConfig {
  private static client: Anthropic | null = null;

  /**
   * Get required environment variables
   */
  static getConfig(): { apiKey: string; model: string } {
    const apiKey = process.env.ANTHROPIC_API_KEY;
    const model = process.env.ANTHROPIC_MODEL || 'claude-sonnet-4-5-20250929';

    if (!apiKey) {
      throw new ConfigurationError(
        'Missing required Anthropic configuration. ' +
          'Please ensure ANTHROPIC_API_KEY is set in .env'
      );
    }

    return {
      apiKey,
      model,
    };
  }

  /**
   * Reset cached client (useful when environment variables change)
   */
  static resetClient(): void {
    dotenv.config({ override: true });
    this.client = null;
  }

  /**
   * Get or create Anthropic client
   *
   * Per-call timeouts are enforced by the agent pool, so the SDK timeout
   * only guards against hung sockets.
   */
  static getClient(): Anthropic {
    if (!this.client) {
      const config = this.getConfig();

      this.client = new Anthropic({
        apiKey: config.apiKey,
        timeout: 600000, // 10 minutes
        maxRetries: 2,
      });

      logger.info('Anthropic client initialized', { model: config.model });
    }

    return this.client;
  }

  /**
   * Get the default model name
   */
  static getModel(): string {
    return this.getConfig().model;
  }

  /**
   * Validate Anthropic configuration without creating client
   */
  static validate(): boolean {
    try {
      this.getConfig();
      return true;
    } catch (error) {
      logger.warn('Anthropic configuration invalid', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
