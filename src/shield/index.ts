export { evaluateIntent } from './evaluator.js';
export { checkActionType } from './rule-action-type.js';
export { checkSensitiveContent, findSensitiveContent, type SensitiveMatch } from './rule-sensitive-content.js';
export { checkPathScope, depthBelow } from './rule-path-scope.js';
export { Shield, auditStatusFor, type ShieldOptions, type EvaluationContext } from './shield.js';
