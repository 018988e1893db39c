import type { CorrectionRequest, Correction } from '../inference/reasoner.js';
import type { BlockRuleId, MissionProposal, Outcome, Policy } from '../types/index.js';
import { REFLECTION_ELIGIBLE_RULES } from '../types/index.js';

export const MAX_REFLECTION_ATTEMPTS = 2;

export type BlockOutcome = Extract<Outcome, { kind: 'block' }>;

export function isReflectionEligible(ruleId: BlockRuleId): boolean {
  return REFLECTION_ELIGIBLE_RULES.has(ruleId);
}

export function buildCorrectionRequest(
  proposal: MissionProposal,
  outcome: BlockOutcome,
  policy: Policy,
  attempt: number
): CorrectionRequest {
  return {
    missionText: proposal.missionText,
    targetDirectory: proposal.targetDirectory,
    actionKind: proposal.actionKind,
    ruleId: outcome.ruleId,
    reason: outcome.reason,
    allowedActionKinds: [...policy.allowedActionKinds],
    allowedBaseDirectory: policy.allowedBaseDirectory,
    attempt
  };
}

/** Fields the correction leaves out keep their previous value. */
export function applyCorrection(proposal: MissionProposal, correction: Correction): MissionProposal {
  return {
    missionText: correction.missionText,
    targetDirectory: correction.targetDirectory ?? proposal.targetDirectory,
    actionKind: correction.actionKind ?? proposal.actionKind,
    corrected: true
  };
}

export function blockedMessage(reason: string, attempts: number): string {
  if (attempts === 0) return reason;
  return `${reason} (after ${attempts} reflection attempt${attempts === 1 ? '' : 's'})`;
}
