/**
 * FalkorDB Document Store
 * Vector nearest-neighbor search and paginated corpus snapshots over (:Document) nodes
 */

import type { CorpusDocument } from '@medrag/shared-types';
import type { CorpusSnapshotProvider, NeighborHit, VectorStore } from '../retrieval/types.js';
import type { GraphClient, GraphRow } from './client.js';

/** Auxiliary disease fields carried into evidence metadata */
export const DOCUMENT_FIELDS = [
  'category_primary',
  'symptoms',
  'cure_department',
  'cure_way',
  'get_way',
  'cured_prob',
] as const;

function projection(alias: string): string {
  return [
    `${alias}.id AS id`,
    `${alias}.name AS name`,
    `${alias}.content AS content`,
    ...DOCUMENT_FIELDS.map((field) => `${alias}.${field} AS ${field}`),
  ].join(', ');
}

// Euclidean distance; lower is closer
export const VECTOR_SEARCH_QUERY = `
  CALL db.idx.vector.queryNodes('Document', 'embedding', $k, vecf32($embedding))
  YIELD node, score
  RETURN ${projection('node')}, score
  ORDER BY score ASC
`;

export const SNAPSHOT_PAGE_QUERY = `
  MATCH (d:Document)
  RETURN ${projection('d')}
  ORDER BY d.id
  SKIP $offset
  LIMIT $limit
`;

function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string') return Number.parseFloat(value);
  return Number.NaN;
}

/**
 * Convert a projected row to a document. Missing content becomes ''.
 */
export function rowToDocument(row: GraphRow): CorpusDocument {
  const id = row['id'];
  const content = row['content'];

  const fields: Record<string, unknown> = {};
  for (const field of DOCUMENT_FIELDS) {
    fields[field] = row[field] ?? null;
  }

  const document: CorpusDocument = {
    id: typeof id === 'string' || typeof id === 'number' ? String(id) : '',
    content: typeof content === 'string' ? content : '',
    fields,
  };
  const name = row['name'];
  if (typeof name === 'string' && name) {
    document.name = name;
  }
  return document;
}

export class FalkorDocumentStore implements VectorStore, CorpusSnapshotProvider {
  constructor(private readonly graph: GraphClient) {}

  async nearestNeighbors(vector: number[], k: number): Promise<NeighborHit[]> {
    const rows = await this.graph.query(VECTOR_SEARCH_QUERY, { k, embedding: vector });
    return rows.flatMap((row) => {
      const document = rowToDocument(row);
      return document.content ? [{ distance: toNumber(row['score']), document }] : [];
    });
  }

  async fetchPage(offset: number, limit: number): Promise<CorpusDocument[]> {
    // One document per row so a short page still marks the end of the corpus
    const rows = await this.graph.query(SNAPSHOT_PAGE_QUERY, { offset, limit });
    return rows.map(rowToDocument);
  }
}
