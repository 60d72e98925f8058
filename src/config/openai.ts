import OpenAI from 'openai';
import dotenv from 'dotenv';
import { ConfigurationError } from '../errors.js';
import { createLogger } from '../utils/logger.js';

dotenv.config();

const logger = createLogger('OpenAIConfig');

/**
 * OpenAI Configuration
 *
 * Manages the shared client used by the OpenAI discovery and extraction
 * agents. The client is created lazily so that tests and other providers
 * never need OPENAI_API_KEY.
 */
export class OpenAIConfig {
  private static client: OpenAI | null = null;

  /**
   * Get required environment variables
   */
  static getConfig(): { apiKey: string; organization?: string; model: string } {
    const apiKey = process.env.OPENAI_API_KEY;
    const organization = process.env.OPENAI_ORG_ID; // Optional
    const model = process.env.OPENAI_MODEL || 'gpt-4o-mini';

    if (!apiKey) {
      throw new ConfigurationError(
        'Missing required OpenAI configuration. ' +
          'Please ensure OPENAI_API_KEY is set in .env'
      );
    }

    return {
      apiKey,
      organization,
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
   * Get or create OpenAI client
   */
  static getClient(): OpenAI {
    if (!this.client) {
      const config = this.getConfig();

      this.client = new OpenAI({
        apiKey: config.apiKey,
        organization: config.organization,
      });

      logger.info('OpenAI client initialized', {
        model: config.model,
        organization: config.organization,
      });
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
   * Validate OpenAI configuration without creating client
   */
  static validate(): boolean {
    try {
      this.getConfig();
      return true;
    } catch (error) {
      logger.warn('OpenAI configuration invalid', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
