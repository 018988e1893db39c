import type { Intent, Outcome, Policy } from '../types/index.js';
import { ALLOW } from '../types/index.js';
import { checkActionType } from './rule-action-type.js';
import { checkSensitiveContent } from './rule-sensitive-content.js';
import { checkPathScope } from './rule-path-scope.js';

type Rule = (intent: Intent, policy: Policy) => Outcome | null;

// Content precedes path: a routed handoff must not be masked by a path block
const RULES: readonly Rule[] = [
  checkActionType,
  checkSensitiveContent,
  checkPathScope
];

/**
 * Pure evaluation of an Intent against a Policy. First failing rule wins;
 * any internal error is a block, never an allow.
 */
export function evaluateIntent(intent: Intent, policy: Policy): Outcome {
  try {
    for (const rule of RULES) {
      const outcome = rule(intent, policy);
      if (outcome) return outcome;
    }
    return ALLOW;
  } catch (error) {
    return {
      kind: 'block',
      ruleId: 'RULE:EVALUATION_ERROR',
      reason: `Policy evaluation failed: ${error instanceof Error ? error.name : 'unknown error'}`
    };
  }
}
