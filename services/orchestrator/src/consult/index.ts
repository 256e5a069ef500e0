export { ConsultService } from './consult-service.js';
export {
  createConsultWorkflow,
  ConsultState,
  ANSWER_FAILURE_MESSAGE,
  type ConsultStateType,
  type ConsultWorkflow,
  type ConsultWorkflowDeps,
} from './workflow.js';
export { extractSuggestions, toEvidencePreview } from './suggestions.js';
