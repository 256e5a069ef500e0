/**
 * Anthropic Completion Client
 * Single-turn completions used for query rewriting, reranking and answer generation
 */

import Anthropic from '@anthropic-ai/sdk';
import type { CompletionModel, CompletionOptions } from '../retrieval/types.js';
import { createLogger, type RetrievalLogger } from '../utils/logger.js';

/**
 * Subset of the Messages response the client reads
 */
export interface CompletionMessage {
  content: Array<{ type: string; text?: string }>;
  usage: { input_tokens: number; output_tokens: number };
}

/**
 * Subset of the SDK's messages resource, injectable for tests
 */
export interface MessagesApi {
  create(
    body: Anthropic.Messages.MessageCreateParamsNonStreaming,
    options?: { timeout?: number; maxRetries?: number }
  ): PromiseLike<CompletionMessage>;
}

export interface AnthropicCompletionConfig {
  apiKey: string;
  model: string;
  timeoutMs: number;
  maxTokens?: number;
  temperature?: number;
}

export class AnthropicCompletionClient implements CompletionModel {
  private readonly messages: MessagesApi;
  private readonly logger: RetrievalLogger;

  constructor(
    private readonly config: AnthropicCompletionConfig,
    deps: { messages?: MessagesApi; logger?: RetrievalLogger } = {}
  ) {
    this.logger = deps.logger ?? createLogger('Completion Client');
    if (!config.apiKey && !deps.messages) {
      this.logger.warn('ANTHROPIC_API_KEY not set, completions will fail', { model: config.model });
    }

    this.messages = deps.messages ?? new Anthropic({ apiKey: config.apiKey }).messages;
  }

  /**
   * Run one completion and return the concatenated text blocks.
   * Rejects on API errors, timeouts and empty output.
   */
  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const startTime = Date.now();

    const response = await this.messages.create(
      {
        model: this.config.model,
        max_tokens: options.maxTokens ?? this.config.maxTokens ?? 512,
        temperature: options.temperature ?? this.config.temperature ?? 0.1,
        ...(options.system ? { system: options.system } : {}),
        messages: [{ role: 'user', content: prompt }],
      },
      { timeout: options.timeoutMs ?? this.config.timeoutMs, maxRetries: 0 }
    );

    const text = response.content
      .map((block) => (block.type === 'text' && block.text ? block.text : ''))
      .join('')
      .trim();

    const latency = Date.now() - startTime;
    const tokensUsed = response.usage.input_tokens + response.usage.output_tokens;

    if (!text) {
      throw new Error(`Empty completion from ${this.config.model}`);
    }

    this.logger.debug('Completion received', { model: this.config.model, latencyMs: latency, tokensUsed });
    return text;
  }
}
