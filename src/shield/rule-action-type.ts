import type { Intent, Outcome, Policy } from '../types/index.js';

export function checkActionType(intent: Intent, policy: Policy): Outcome | null {
  if (policy.allowedActionKinds.has(intent.actionKind)) return null;

  return {
    kind: 'block',
    ruleId: 'RULE:ACTION_TYPE',
    reason: `Action type \`${intent.actionKind}\` is not permitted. Allowed types: ${[...policy.allowedActionKinds].join(', ')}`
  };
}
