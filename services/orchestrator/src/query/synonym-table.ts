/**
 * Synonym Table
 * Colloquial-to-standard medical term mapping used by query normalization
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, resolve } from 'path';
import { ConfigurationError } from '../utils/errors.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const DEFAULT_SYNONYMS_PATH = resolve(__dirname, '../../data/medical-synonyms.json');

/**
 * Ordered [colloquial, standard] pairs
 */
export type SynonymTable = ReadonlyArray<readonly [string, string]>;

/**
 * Validate a parsed synonym document.
 * Rejects identity entries and standard forms that contain a colloquial key,
 * then checks that normalization is idempotent on every key, every standard
 * form and every key spliced into another key, which is where a replacement
 * can recreate an earlier key across its boundary.
 */
export function parseSynonymTable(raw: unknown): SynonymTable {
  if (typeof raw !== 'object' || raw === null) {
    throw new ConfigurationError('Synonym table must be an object');
  }

  const entries = (raw as Record<string, unknown>)['entries'];
  if (!Array.isArray(entries)) {
    throw new ConfigurationError('Synonym table is missing an "entries" array');
  }

  const table: Array<readonly [string, string]> = [];
  for (const entry of entries) {
    if (!Array.isArray(entry) || entry.length !== 2) {
      throw new ConfigurationError(`Invalid synonym entry: ${JSON.stringify(entry)}`);
    }
    const [colloquial, standard] = entry;
    if (typeof colloquial !== 'string' || typeof standard !== 'string' || !colloquial || !standard) {
      throw new ConfigurationError(`Invalid synonym entry: ${JSON.stringify(entry)}`);
    }
    if (colloquial === standard) {
      throw new ConfigurationError(`Identity synonym entry: ${colloquial}`);
    }
    table.push([colloquial, standard] as const);
  }

  for (const [, standard] of table) {
    const clash = table.find(([colloquial]) => standard.includes(colloquial));
    if (clash) {
      throw new ConfigurationError(`Standard term "${standard}" contains colloquial key "${clash[0]}"`);
    }
  }

  for (const sample of idempotenceSamples(table)) {
    const once = normalizeKeywords(sample, table);
    if (normalizeKeywords(once, table) !== once) {
      throw new ConfigurationError(`Normalization of "${sample}" is not idempotent`);
    }
  }

  return table;
}

function idempotenceSamples(table: SynonymTable): string[] {
  const samples: string[] = [];
  for (const [colloquial, standard] of table) {
    samples.push(colloquial, standard);
    for (const [other] of table) {
      for (let cut = 1; cut < colloquial.length; cut++) {
        samples.push(colloquial.slice(0, cut) + other, other + colloquial.slice(cut));
      }
    }
  }
  return samples;
}

export function loadSynonymTable(path: string = DEFAULT_SYNONYMS_PATH): SynonymTable {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  return parseSynonymTable(raw);
}

/**
 * Replace every colloquial term with its standard form.
 * One full pass per table entry, in table order. Blank input is returned as is.
 */
export function normalizeKeywords(query: string, table: SynonymTable): string {
  if (!query || !query.trim()) {
    return query;
  }

  let text = query.trim();
  for (const [colloquial, standard] of table) {
    if (text.includes(colloquial)) {
      text = text.replaceAll(colloquial, standard);
    }
  }
  return text;
}
