/**
 * LLM Reranker
 * Asks a fast model to pick the most relevant candidates by index,
 * falling back to score order when the answer is unusable
 */

import type { EvidenceItem } from '@medrag/shared-types';
import { buildRerankPrompt } from '../anthropic/prompt-templates.js';
import { getErrorMessage, withTimeout } from '../utils/errors.js';
import { createLogger, type RetrievalLogger } from '../utils/logger.js';
import { previewContent } from './evidence.js';
import type { CompletionModel } from './types.js';

export interface LlmRerankerDeps {
  model: CompletionModel;
  logger?: RetrievalLogger;
  /** Characters of content shown per candidate (default 200) */
  previewLength?: number;
  timeoutMs?: number;
}

const DIGITS = /^\d+$/;

/**
 * Indices from a comma-separated reply (ASCII or full-width commas).
 * Keeps in-range integers once each, in reply order, at most topK.
 */
export function parseRerankIndices(output: string, count: number, topK: number): number[] {
  const indices: number[] = [];

  for (const part of output.split(/[,，]/)) {
    if (indices.length >= topK) break;
    const token = part.trim();
    if (!DIGITS.test(token)) continue;

    const index = Number.parseInt(token, 10);
    if (index >= count || indices.includes(index)) continue;
    indices.push(index);
  }

  return indices;
}

/**
 * Stable sort by descending score (null as 0), truncated to topK
 */
export function sortByScore(items: readonly EvidenceItem[], topK: number): EvidenceItem[] {
  return items
    .map((item, position) => ({ item, position }))
    .sort((a, b) => (b.item.score ?? 0) - (a.item.score ?? 0) || a.position - b.position)
    .slice(0, Math.max(0, topK))
    .map(({ item }) => item);
}

export class LlmReranker {
  private readonly model: CompletionModel;
  private readonly logger: RetrievalLogger;
  private readonly previewLength: number;
  private readonly timeoutMs: number;

  constructor(deps: LlmRerankerDeps) {
    this.model = deps.model;
    this.logger = deps.logger ?? createLogger('Reranker');
    this.previewLength = deps.previewLength ?? 200;
    this.timeoutMs = deps.timeoutMs ?? 8000;
  }

  /**
   * Select topK items. Lists that already fit are returned as-is without a model call.
   */
  async rerank(query: string, items: EvidenceItem[], topK: number): Promise<EvidenceItem[]> {
    if (items.length <= topK) {
      return items;
    }

    const previews = items.map((item) => previewContent(item.content, this.previewLength));
    const prompt = buildRerankPrompt(query, previews, topK);

    try {
      const output = await withTimeout(
        this.model.complete(prompt, { maxTokens: 50, temperature: 0, timeoutMs: this.timeoutMs }),
        this.timeoutMs,
        'Rerank'
      );

      const indices = parseRerankIndices(output, items.length, topK);
      const selected = indices.flatMap((index) => {
        const item = items[index];
        return item ? [item] : [];
      });

      if (selected.length > 0) {
        this.logger.debug('Rerank selected candidates', { indices, candidates: items.length });
        return selected;
      }
      this.logger.warn('Rerank reply had no valid indices, using score order', { output });
    } catch (error) {
      this.logger.warn('Rerank failed, using score order', { error: getErrorMessage(error) });
    }

    return sortByScore(items, topK);
  }
}
