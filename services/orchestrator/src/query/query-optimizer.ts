/**
 * Query Optimizer
 * Turns a raw question (plus recent dialogue) into the string used for retrieval.
 * The raw question stays the input for answer generation.
 */

import type { ConversationMessage } from '@medrag/shared-types';
import { buildRewritePrompt, REWRITE_ANSWER_LABEL } from '../anthropic/prompt-templates.js';
import type { CompletionModel } from '../retrieval/types.js';
import { getErrorMessage, withTimeout } from '../utils/errors.js';
import { createLogger, type RetrievalLogger } from '../utils/logger.js';
import { normalizeKeywords, type SynonymTable } from './synonym-table.js';

export interface OptimizeOptions {
  rewrite: boolean;
  normalize: boolean;
}

export interface QueryOptimizerDeps {
  model: CompletionModel;
  synonyms: SynonymTable;
  logger?: RetrievalLogger;
  /** Most recent turns given to the rewrite prompt (default 6) */
  historyTurns?: number;
  /** Rewrite call budget (default 8000ms) */
  timeoutMs?: number;
}

const QUOTE_CHARS = /^["'“”‘’「」『』]+|["'“”‘’「」『』]+$/g;

/**
 * Reduce a model reply to the single rewritten line, or '' if there is none
 */
export function parseRewriteOutput(output: string): string {
  const firstLine = output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .find((line) => line.length > 0);

  if (!firstLine) {
    return '';
  }

  let line = firstLine;
  const labelStem = REWRITE_ANSWER_LABEL.slice(0, -1);
  if (line.startsWith(labelStem)) {
    line = line.slice(labelStem.length).replace(/^[：:]/, '').trim();
  }

  return line.replace(QUOTE_CHARS, '').trim();
}

export class QueryOptimizer {
  private readonly model: CompletionModel;
  private readonly synonyms: SynonymTable;
  private readonly logger: RetrievalLogger;
  private readonly historyTurns: number;
  private readonly timeoutMs: number;

  constructor(deps: QueryOptimizerDeps) {
    this.model = deps.model;
    this.synonyms = deps.synonyms;
    this.logger = deps.logger ?? createLogger('Query Optimizer');
    this.historyTurns = deps.historyTurns ?? 6;
    this.timeoutMs = deps.timeoutMs ?? 8000;
  }

  /**
   * Rewrite (optional) then normalize (optional). Never throws.
   */
  async optimize(
    question: string,
    history: ConversationMessage[] = [],
    options: OptimizeOptions = { rewrite: true, normalize: true }
  ): Promise<string> {
    if (!question || !question.trim()) {
      return question;
    }

    let query = question.trim();
    if (options.rewrite) {
      query = await this.rewrite(query, history);
    }
    if (options.normalize) {
      query = this.normalize(query);
    }

    this.logger.debug('Query optimized', { original: question, optimized: query });
    return query;
  }

  /**
   * LLM rewrite; falls back to the input on error, timeout or empty output
   */
  async rewrite(question: string, history: ConversationMessage[] = []): Promise<string> {
    const recent = this.historyTurns > 0 ? history.slice(-this.historyTurns) : [];
    const prompt = buildRewritePrompt(question, recent);

    try {
      const output = await withTimeout(
        this.model.complete(prompt, { maxTokens: 200, temperature: 0.1, timeoutMs: this.timeoutMs }),
        this.timeoutMs,
        'Query rewrite'
      );

      const rewritten = parseRewriteOutput(output);
      if (rewritten) {
        return rewritten;
      }
      this.logger.warn('Query rewrite returned no usable line, using original question');
    } catch (error) {
      this.logger.warn('Query rewrite failed, using original question', { error: getErrorMessage(error) });
    }

    return question;
  }

  normalize(text: string): string {
    return normalizeKeywords(text, this.synonyms);
  }
}
