import type { ActionKind, DisasterCategory } from './intent.js';
import type { RuleId } from './outcome.js';

export type Severity = 'CRITICAL' | 'HIGH' | 'MEDIUM' | 'LOW';

export interface MissionImage {
  data: Buffer;
  mimeType: string;
}

export interface MissionRequest {
  mission: string;
  image?: MissionImage;
  targetDirectory?: string;
  actionKind?: ActionKind;
  confirmHighVolume?: boolean;
}

export interface TriageClassification {
  severity: Severity;
  category: string;
  recommendedActions: string[];
  affectedZones: string[];
  confidence: number;
  source: 'reasoner' | 'stub';
}

/** A (possibly corrected) proposal the commander evaluates. */
export interface MissionProposal {
  missionText: string;
  targetDirectory: string;
  actionKind: ActionKind;
  corrected: boolean;
}

export type MissionStatus =
  | 'SUCCESS'
  | 'SUCCESS_AFTER_REFLECTION'
  | 'ROUTED_TO_MEDICAL'
  | 'BLOCKED_BY_SHIELD'
  | 'BLOCKED_BY_SUB_AGENT'
  | 'TOOL_ERROR'
  | 'PENDING_CONFIRMATION';

export interface MissionResult {
  status: MissionStatus;
  missionId: string;
  mission: string;
  reflectionAttempts: number;
  category?: DisasterCategory;
  result?: string;
  filename?: string;
  triage?: TriageClassification;
  ruleId?: RuleId;
  error?: string;
}
