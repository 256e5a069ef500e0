/**
 * HTTP API
 * Consultation, knowledge rebuild and health endpoints
 */

import express, { type Express, type Request, type Response } from 'express';
import { isConsultRequest, type ConsultRequest, type ConsultResponse } from '@medrag/shared-types';
import type { LexicalIndexStats, LexicalRebuildResult } from '../retrieval/lexical-path.js';
import { getErrorMessage } from '../utils/errors.js';
import { createLogger, logError, type RetrievalLogger } from '../utils/logger.js';

export interface AppDeps {
  consult: { consult(request: ConsultRequest): Promise<ConsultResponse> };
  lexical: {
    rebuild(): Promise<LexicalRebuildResult>;
    stats(): LexicalIndexStats;
  };
  logger?: RetrievalLogger;
}

export function createApp(deps: AppDeps): Express {
  const logger = deps.logger ?? createLogger('HTTP');
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req: Request, res: Response) => {
    const lexical = deps.lexical.stats();
    res.json({
      status: 'healthy',
      service: 'medrag',
      lexicalIndex: {
        ...lexical,
        builtAt: lexical.builtAt === null ? null : new Date(lexical.builtAt).toISOString(),
      },
      timestamp: new Date().toISOString(),
    });
  });

  app.post('/api/consult', async (req: Request, res: Response) => {
    const body: unknown = req.body;
    if (!isConsultRequest(body) || !body.question.trim()) {
      res.status(400).json({ success: false, error: 'Request needs a non-empty "question" string' });
      return;
    }

    try {
      const response = await deps.consult.consult(body);
      res.json(response);
    } catch (error) {
      logError(logger, 'Consultation failed', error, { userId: body.userId });
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  });

  app.post('/api/knowledge/rebuild', async (_req: Request, res: Response) => {
    try {
      const result = await deps.lexical.rebuild();
      res.status(result.status === 'failed' ? 500 : 200).json({
        success: result.status !== 'failed',
        ...result,
      });
    } catch (error) {
      logError(logger, 'Knowledge rebuild failed', error);
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  });

  return app;
}
