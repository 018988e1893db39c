export { InferenceRouter, isImageMediaType, type InferenceClient, type InferenceRequest, type InferenceResponse } from './router.js';
export {
  LlmReasoner,
  parseCorrection,
  parseTriage,
  renderCorrectionPrompt,
  stripFences,
  stubClassification,
  type Correction,
  type CorrectionRequest,
  type LlmReasonerOptions,
  type Reasoner,
  type ReasonerResult
} from './reasoner.js';
