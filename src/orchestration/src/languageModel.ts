/**
 * Language model access
 * A prompt goes in, a completion comes out. The Groq implementation relies on
 * groq-sdk's own bounded retries with exponential backoff and request timeout.
 */

import Groq from 'groq-sdk';
import { GroqConfig } from './types';
import { LanguageModelError, describeError } from './errors';
import { logger } from './logger';

export interface LanguageModel {
  readonly model: string;
  generate(prompt: string): Promise<string>;
}

export class GroqLanguageModel implements LanguageModel {
  readonly model: string;
  private client: Groq;
  private config: GroqConfig;

  constructor(config: GroqConfig) {
    if (!config.apiKey) {
      throw new LanguageModelError('Groq API key is required. Set GROQ_API_KEY or pass --groq-key.');
    }
    this.config = config;
    this.model = config.model;
    this.client = new Groq({
      apiKey: config.apiKey,
      maxRetries: config.maxRetries,
      timeout: config.timeoutMs
    });
  }

  async generate(prompt: string): Promise<string> {
    logger.info(`Calling ${this.model} (${prompt.length} prompt chars)`);

    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create({
        model: this.config.model,
        messages: [{ role: 'user', content: prompt }],
        temperature: this.config.temperature,
        max_tokens: this.config.maxTokens
      });
      content = response.choices[0]?.message?.content;
    } catch (error) {
      logger.error('Language model call failed', error);
      throw new LanguageModelError(`Language model call failed: ${describeError(error)}`, { cause: error });
    }

    if (!content || content.trim().length === 0) {
      throw new LanguageModelError('Language model returned an empty completion');
    }

    logger.success(`Answer generated (${content.length} characters)`);
    return content;
  }
}
