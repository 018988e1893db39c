import { LogisticsSubAgent } from '../agents/logistics.js';
import { MedicalSubAgent } from '../agents/medical.js';
import {
  DISPATCH_SCHEMA_VERSION,
  MEDICAL_SCHEMA_VERSION,
  type DispatchPayload,
  type MedicalRoutingPayload
} from '../agents/payloads.js';
import type { Intent, MissionProposal, Outcome, Policy, TriageClassification } from '../types/index.js';

export const COMMANDER_NAME = 'TriageCommander';

export const RULES_CHECKED = ['RULE:ACTION_TYPE', 'RULE:MEDICAL_BLOCK', 'RULE:DIR_SCOPE'];

export const MEDICAL_RESTRICTIONS = [
  'No diagnosis',
  'No treatment plan',
  'No prescription or dosage',
  'Handoff to qualified medical responders only'
];

export interface DispatchContext {
  missionId: string;
  runId: string;
  intent: Intent;
  proposal: MissionProposal;
  triage: TriageClassification;
  policy: Policy;
  reflectionAttempts: number;
  now?: Date;
}

export function buildDispatchPayload(context: DispatchContext): DispatchPayload {
  const { intent, proposal, triage, policy } = context;
  return {
    schema_version: DISPATCH_SCHEMA_VERSION,
    generated_at_utc: (context.now ?? new Date()).toISOString(),
    run_id: context.runId,
    mission_id: context.missionId,
    disaster_category: intent.category,
    severity: triage.severity,
    recommended_actions: [...triage.recommendedActions],
    affected_zones: [...triage.affectedZones],
    confidence: triage.confidence,
    mission_briefing: proposal.missionText,
    triage_source: triage.source,
    enforcement: {
      shield_cleared: true,
      action_kind: intent.actionKind,
      rules_checked: [...RULES_CHECKED],
      policy_version: policy.version,
      self_healed: proposal.corrected,
      reflection_attempts: context.reflectionAttempts
    },
    delegation: {
      commander: COMMANDER_NAME,
      sub_agent: 'LogisticsSubAgent',
      scope: LogisticsSubAgent.SCOPE,
      bounded: true
    }
  };
}

export interface RoutingContext {
  missionId: string;
  runId: string;
  outcome: Extract<Outcome, { kind: 'route' }>;
  proposal: MissionProposal;
  triage: TriageClassification;
  now?: Date;
}

/** The routed mission text goes through unmodified; nothing clinical is added. */
export function buildMedicalPayload(context: RoutingContext): MedicalRoutingPayload {
  return {
    schema_version: MEDICAL_SCHEMA_VERSION,
    generated_at_utc: (context.now ?? new Date()).toISOString(),
    run_id: context.runId,
    mission_id: context.missionId,
    routing_reason: context.outcome.reason,
    rule_id: context.outcome.ruleId,
    severity: context.triage.severity,
    mission_briefing: context.proposal.missionText,
    restrictions: [...MEDICAL_RESTRICTIONS],
    delegation: {
      commander: COMMANDER_NAME,
      sub_agent: 'MedicalSubAgent',
      scope: MedicalSubAgent.SCOPE,
      bounded: true
    }
  };
}
