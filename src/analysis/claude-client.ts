import Anthropic from '@anthropic-ai/sdk';
import type { AIConfig } from '../config/settings.js';
import type { ClaudeAPIResponse, CompletionClient } from './ai-types.js';
import { AIError } from '../errors.js';
import { logger } from '../observability/logger.js';
import { metrics } from '../metrics/metrics.js';

const TIMEOUT_MS = 60000;
// The SDK retries 429s and 5xx with exponential backoff.
const MAX_RETRIES = 2;

export class ClaudeClient implements CompletionClient {
  private client: Anthropic;

  constructor(apiKey: string, private readonly config: AIConfig) {
    if (!apiKey) {
      throw new AIError('Anthropic API key is required');
    }

    this.client = new Anthropic({
      apiKey,
      timeout: TIMEOUT_MS,
      maxRetries: MAX_RETRIES,
    });
  }

  private async send(prompt: string): Promise<ClaudeAPIResponse> {
    try {
      const response = await this.client.messages.create({
        model: this.config.model,
        max_tokens: this.config.maxTokens,
        temperature: this.config.temperature,
        messages: [
          {
            role: 'user',
            content: prompt,
          },
        ],
      });

      return {
        content: response.content,
        stop_reason: response.stop_reason,
        usage: response.usage ? {
          input_tokens: response.usage.input_tokens,
          output_tokens: response.usage.output_tokens,
        } : undefined,
      };
    } catch (error) {
      if (error instanceof Anthropic.APIError) {
        logger.error('ai_api', 'Claude API error', {
          status: error.status,
          message: error.message,
        });
        throw new AIError(`Claude API failed: ${error.message}`);
      }
      throw error;
    }
  }

  async complete(prompt: string): Promise<string> {
    metrics.recordAIInvocation();

    logger.debug('ai_invocation', 'Calling Claude API', {
      model: this.config.model,
      promptChars: prompt.length,
    });

    const response = await this.send(prompt);

    if (response.usage) {
      metrics.recordTokenUsage(response.usage.input_tokens, response.usage.output_tokens);
      logger.info('ai_response', 'Claude API response received', {
        input_tokens: response.usage.input_tokens,
        output_tokens: response.usage.output_tokens,
        stop_reason: response.stop_reason,
      });
    }

    const textContent = response.content.find(c => c.type === 'text');
    if (!textContent || !textContent.text) {
      throw new AIError('No text content in Claude response');
    }

    return textContent.text;
  }
}

export function createClaudeClient(apiKey: string, config: AIConfig): ClaudeClient {
  if (!apiKey) {
    throw new AIError('ANTHROPIC_API_KEY environment variable not set');
  }

  return new ClaudeClient(apiKey, config);
}
