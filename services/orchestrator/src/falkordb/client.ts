/**
 * FalkorDB Client
 * Cypher queries against the medical knowledge graph over a Redis connection
 */

import { createLogger, logError, type RetrievalLogger } from '../utils/logger.js';

export type GraphParam = string | number | boolean | null | number[] | string[];

export type GraphRow = Record<string, unknown>;

/**
 * Subset of the ioredis API the client needs
 */
export interface GraphConnection {
  call(command: string, ...args: string[]): Promise<unknown>;
  ping(): Promise<string>;
  quit(): Promise<string>;
}

export interface GraphClientDeps {
  connection: GraphConnection;
  graphName: string;
  logger?: RetrievalLogger;
}

/**
 * Prefix a query with `CYPHER key=value ...` parameters.
 * ioredis has no --params flag, so parameters travel inline as JSON literals.
 */
export function buildCypherQuery(cypherQuery: string, params: Record<string, GraphParam> = {}): string {
  const cypherPrefix = Object.entries(params)
    .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
    .join(' ');

  return cypherPrefix ? `CYPHER ${cypherPrefix} ${cypherQuery}` : cypherQuery;
}

function parseValue(value: unknown): unknown {
  if (value === undefined || value === null) return null;
  if (Array.isArray(value)) return value.map((v) => parseValue(v));
  return value;
}

function columnName(entry: unknown): string {
  // Header entries are either plain names or [type, name] pairs
  if (Array.isArray(entry)) return String(entry[entry.length - 1]);
  return String(entry);
}

/**
 * Map a raw `[header, rows, statistics]` reply onto objects keyed by column
 */
export function parseGraphResult(result: unknown): GraphRow[] {
  if (!Array.isArray(result) || result.length < 2) {
    return [];
  }

  const [header, data] = result;
  if (!Array.isArray(header) || !Array.isArray(data) || data.length === 0) {
    return [];
  }

  const columns = header.map(columnName);
  return data.map((row: unknown) => {
    const obj: GraphRow = {};
    columns.forEach((column, index) => {
      obj[column] = Array.isArray(row) ? parseValue(row[index]) : null;
    });
    return obj;
  });
}

export class GraphClient {
  private readonly connection: GraphConnection;
  private readonly graphName: string;
  private readonly logger: RetrievalLogger;

  constructor(deps: GraphClientDeps) {
    this.connection = deps.connection;
    this.graphName = deps.graphName;
    this.logger = deps.logger ?? createLogger('FalkorDB');
  }

  async connect(): Promise<void> {
    await this.connection.ping();
    this.logger.info('FalkorDB client connected', { graph: this.graphName });
  }

  async quit(): Promise<void> {
    await this.connection.quit();
    this.logger.info('FalkorDB client disconnected');
  }

  async query(cypherQuery: string, params: Record<string, GraphParam> = {}): Promise<GraphRow[]> {
    try {
      const result = await this.connection.call(
        'GRAPH.QUERY',
        this.graphName,
        buildCypherQuery(cypherQuery, params)
      );
      return parseGraphResult(result);
    } catch (error) {
      logError(this.logger, 'Graph query failed', error, { graph: this.graphName });
      throw error;
    }
  }
}
