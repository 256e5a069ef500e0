/**
 * Consult Service
 * Runs the consult workflow for one request and shapes the API response
 */

import type { ConsultRequest, ConsultResponse } from '@medrag/shared-types';
import { createLogger, logPerformance, type RetrievalLogger } from '../utils/logger.js';
import { toEvidencePreview } from './suggestions.js';
import type { ConsultWorkflow } from './workflow.js';

export class ConsultService {
  private readonly logger: RetrievalLogger;

  constructor(
    private readonly workflow: ConsultWorkflow,
    logger?: RetrievalLogger
  ) {
    this.logger = logger ?? createLogger('Consult');
  }

  async consult(request: ConsultRequest): Promise<ConsultResponse> {
    const startTime = Date.now();
    const state = await this.workflow.invoke({
      question: request.question,
      history: request.history ?? [],
    });

    this.logger.info('Consultation complete', {
      userId: request.userId,
      evidence: state.evidence.length,
      augmented: state.augmented,
      matchedCategory: state.matchedCategory,
      failed: state.error !== null,
    });
    logPerformance('consultation', Date.now() - startTime, { userId: request.userId });

    return {
      answer: state.answer,
      sources: state.evidence.map(toEvidencePreview),
      suggestions: state.suggestions,
      augmented: state.augmented,
      matchedCategory: state.matchedCategory,
      isEmergency: state.isEmergency,
    };
  }
}
