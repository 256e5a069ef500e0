/**
 * Rule Path
 * Keyword rules that classify a query into a medical category
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, resolve } from 'path';
import { RULE_CATEGORIES, isRuleCategory, type RuleCategory } from '@medrag/shared-types';
import { ConfigurationError } from '../utils/errors.js';
import { createLogger, type RetrievalLogger } from '../utils/logger.js';
import type { RuleMatch } from './types.js';

export interface RuleEntry {
  category: RuleCategory;
  keywords: readonly string[];
}

/** Categories in match-priority order */
export type RuleTable = readonly RuleEntry[];

const __dirname = dirname(fileURLToPath(import.meta.url));

export const DEFAULT_RULES_PATH = resolve(__dirname, '../../data/medical-rules.json');

/**
 * Validate raw JSON ({ categories: [{ category, keywords }] }) into a table
 * ordered by the canonical category order
 */
export function parseRuleTable(raw: unknown): RuleTable {
  if (typeof raw !== 'object' || raw === null) {
    throw new ConfigurationError('Rule table must be an object');
  }
  const categories = (raw as Record<string, unknown>)['categories'];
  if (!Array.isArray(categories)) {
    throw new ConfigurationError('Rule table must have a "categories" array');
  }

  const byCategory = new Map<RuleCategory, string[]>();
  for (const entry of categories) {
    if (typeof entry !== 'object' || entry === null) {
      throw new ConfigurationError('Rule entries must be objects');
    }
    const obj = entry as Record<string, unknown>;
    const category = obj['category'];
    const keywords = obj['keywords'];
    if (!isRuleCategory(category)) {
      throw new ConfigurationError(`Unknown rule category: ${String(category)}`);
    }
    if (byCategory.has(category)) {
      throw new ConfigurationError(`Duplicate rule category: ${category}`);
    }
    if (
      !Array.isArray(keywords) ||
      !keywords.every((keyword): keyword is string => typeof keyword === 'string' && keyword.length > 0)
    ) {
      throw new ConfigurationError(`Rule category "${category}" needs non-empty string keywords`);
    }
    byCategory.set(category, keywords);
  }

  return RULE_CATEGORIES.flatMap((category) => {
    const keywords = byCategory.get(category);
    return keywords ? [{ category, keywords: Object.freeze([...keywords]) }] : [];
  });
}

export function loadRuleTable(path: string = DEFAULT_RULES_PATH): RuleTable {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  return parseRuleTable(raw);
}

export interface RulePathDeps {
  table: RuleTable;
  logger?: RetrievalLogger;
}

export class RulePath {
  private readonly table: RuleTable;
  private readonly logger: RetrievalLogger;

  constructor(deps: RulePathDeps) {
    this.table = deps.table;
    this.logger = deps.logger ?? createLogger('Rule Path');
  }

  /**
   * First category (table order) with a substring hit, plus that category's hits.
   * Emergency keywords are always scanned, whichever category wins.
   */
  match(query: string): RuleMatch {
    const emergencyKeywords = this.scan(query, 'emergency');
    if (emergencyKeywords.length > 0) {
      this.logger.warn('Emergency keywords detected', { matchedKeywords: emergencyKeywords });
    }

    for (const { category, keywords } of this.table) {
      const matchedKeywords = keywords.filter((keyword) => query.includes(keyword));
      if (matchedKeywords.length === 0) continue;

      this.logger.debug('Rule matched', { category, matchedKeywords });
      return { evidence: [], category, matchedKeywords, emergencyKeywords };
    }

    return { evidence: [], category: null, matchedKeywords: [], emergencyKeywords };
  }

  private scan(query: string, category: RuleCategory): string[] {
    const entry = this.table.find((rule) => rule.category === category);
    return entry ? entry.keywords.filter((keyword) => query.includes(keyword)) : [];
  }
}
