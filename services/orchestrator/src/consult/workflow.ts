/**
 * Consult Workflow
 * LangGraph pipeline: optimize -> retrieve -> gate -> [augment] -> respond
 */

import { Annotation, END, START, StateGraph } from '@langchain/langgraph';
import {
  isEvidenceItem,
  type ConversationMessage,
  type EvidenceItem,
  type RuleCategory,
} from '@medrag/shared-types';
import { buildConsultUserPrompt, CONSULT_SYSTEM_PROMPT } from '../anthropic/prompt-templates.js';
import type { OptimizeOptions, QueryOptimizer } from '../query/query-optimizer.js';
import { evaluateConfidence, type ConfidenceDecision } from '../retrieval/confidence-gate.js';
import type { MultiPathRetriever } from '../retrieval/multi-path-retriever.js';
import type { AugmentationProvider, CompletionModel, RetrievalStats } from '../retrieval/types.js';
import { getErrorMessage, withTimeout } from '../utils/errors.js';
import { createLogger, logError, type RetrievalLogger } from '../utils/logger.js';
import { extractSuggestions } from './suggestions.js';

export const ANSWER_FAILURE_MESSAGE = '抱歉，生成回答时出现问题，请稍后重试。如有紧急情况请立即就医。';

function lastValue<T>(initial: () => T) {
  return Annotation<T>({ reducer: (_current: T, update: T) => update, default: initial });
}

export const ConsultState = Annotation.Root({
  question: Annotation<string>,
  history: lastValue<ConversationMessage[]>(() => []),
  retrievalQuery: lastValue<string>(() => ''),
  evidence: lastValue<EvidenceItem[]>(() => []),
  matchedCategory: lastValue<RuleCategory | null>(() => null),
  isEmergency: lastValue<boolean>(() => false),
  retrievalStats: lastValue<RetrievalStats | null>(() => null),
  confidence: lastValue<ConfidenceDecision | null>(() => null),
  augmented: lastValue<boolean>(() => false),
  answer: lastValue<string>(() => ''),
  suggestions: lastValue<string[]>(() => []),
  error: lastValue<string | null>(() => null),
});

export type ConsultStateType = typeof ConsultState.State;
type ConsultUpdate = typeof ConsultState.Update;

export interface ConsultWorkflowDeps {
  optimizer: Pick<QueryOptimizer, 'optimize'>;
  retriever: Pick<MultiPathRetriever, 'retrieve'>;
  answerModel: CompletionModel;
  /** Absent means augmentation is skipped */
  augmentation?: AugmentationProvider;
  optimizeOptions?: OptimizeOptions;
  confidenceThreshold?: number;
  answerTimeoutMs?: number;
  augmentationTimeoutMs?: number;
  logger?: RetrievalLogger;
}

export function createConsultWorkflow(deps: ConsultWorkflowDeps) {
  const logger = deps.logger ?? createLogger('Consult Workflow');
  const answerTimeoutMs = deps.answerTimeoutMs ?? 60000;
  const augmentationTimeoutMs = deps.augmentationTimeoutMs ?? 10000;

  async function optimizeNode(state: ConsultStateType): Promise<ConsultUpdate> {
    const retrievalQuery = await deps.optimizer.optimize(
      state.question,
      state.history,
      deps.optimizeOptions
    );
    return { retrievalQuery };
  }

  async function retrieveNode(state: ConsultStateType): Promise<ConsultUpdate> {
    const result = await deps.retriever.retrieve(state.retrievalQuery);
    return {
      evidence: result.evidence,
      matchedCategory: result.matchedCategory,
      isEmergency: result.emergencyKeywords.length > 0,
      retrievalStats: result.stats,
    };
  }

  function gateNode(state: ConsultStateType): ConsultUpdate {
    const confidence = evaluateConfidence(state.evidence, deps.confidenceThreshold);
    if (confidence.needsAugmentation) {
      logger.info('Internal evidence below confidence threshold', {
        maxScore: confidence.maxScore,
        threshold: confidence.threshold,
      });
    }
    return { confidence };
  }

  function routeAfterGate(state: ConsultStateType): 'augment' | 'respond' {
    return state.confidence?.needsAugmentation && deps.augmentation ? 'augment' : 'respond';
  }

  async function augmentNode(state: ConsultStateType): Promise<ConsultUpdate> {
    if (!deps.augmentation) {
      return {};
    }

    try {
      const results = await withTimeout(
        deps.augmentation.search(state.retrievalQuery),
        augmentationTimeoutMs,
        'Augmentation search'
      );
      const external = results.filter(isEvidenceItem);
      return { evidence: [...state.evidence, ...external], augmented: true };
    } catch (error) {
      logger.warn('Augmentation failed, answering from internal evidence', {
        error: getErrorMessage(error),
      });
      return { augmented: true };
    }
  }

  async function respondNode(state: ConsultStateType): Promise<ConsultUpdate> {
    const prompt = buildConsultUserPrompt(state.question, state.evidence, state.history);

    try {
      const answer = await withTimeout(
        deps.answerModel.complete(prompt, {
          system: CONSULT_SYSTEM_PROMPT,
          maxTokens: 2000,
          temperature: 0.7,
          timeoutMs: answerTimeoutMs,
        }),
        answerTimeoutMs,
        'Answer generation'
      );
      return { answer, suggestions: extractSuggestions(answer) };
    } catch (error) {
      logError(logger, 'Answer generation failed', error, { evidence: state.evidence.length });
      return { answer: ANSWER_FAILURE_MESSAGE, suggestions: [], error: getErrorMessage(error) };
    }
  }

  return new StateGraph(ConsultState)
    .addNode('optimize', optimizeNode)
    .addNode('retrieve', retrieveNode)
    .addNode('gate', gateNode)
    .addNode('augment', augmentNode)
    .addNode('respond', respondNode)
    .addEdge(START, 'optimize')
    .addEdge('optimize', 'retrieve')
    .addEdge('retrieve', 'gate')
    .addConditionalEdges('gate', routeAfterGate, ['augment', 'respond'])
    .addEdge('augment', 'respond')
    .addEdge('respond', END)
    .compile();
}

export type ConsultWorkflow = ReturnType<typeof createConsultWorkflow>;
