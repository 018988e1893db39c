export type BlockRuleId =
  | 'RULE:ACTION_TYPE'
  | 'RULE:DIR_SCOPE'
  | 'RULE:ORACLE_DENY'
  | 'RULE:EVALUATION_ERROR';

export type RouteRuleId = 'RULE:MEDICAL_BLOCK';

export type RuleId = BlockRuleId | RouteRuleId | 'RULE:AUTHORITY_EXCEEDED' | 'RULE:TOOL_ERROR';

export type Outcome =
  | { kind: 'allow' }
  | { kind: 'route'; reason: string; ruleId: RouteRuleId }
  | { kind: 'block'; reason: string; ruleId: BlockRuleId };

export const ALLOW: Outcome = Object.freeze({ kind: 'allow' });

// Only scope and action-type violations can be repaired by regenerating the proposal
export const REFLECTION_ELIGIBLE_RULES: ReadonlySet<BlockRuleId> = new Set<BlockRuleId>([
  'RULE:ACTION_TYPE',
  'RULE:DIR_SCOPE'
]);
