import type { ActionKind } from './intent.js';
import type { RuleId } from './outcome.js';

export type AuditStatus = 'ALLOWED' | 'ROUTED' | 'BLOCKED' | 'AUTHORITY_EXCEEDED' | 'TOOL_ERROR';

export interface AuditEntry {
  missionId: string;
  severity: string;
  actionKind: ActionKind;
  status: AuditStatus;
  ruleId?: RuleId;
  rawText: string;
  policyHash: string;
}

export interface AuditRecord {
  event_id: string;
  timestamp: string;
  mission_id: string;
  severity: string;
  action_kind: ActionKind;
  status: AuditStatus;
  rule_id?: RuleId;
  text_excerpt: string;
  hash_input: string;
  policy_hash: string;
  prev_record_hash: string;
  service_version: string;
  signature?: string;
}

/** Append-only sink; one row per Shield evaluation or terminal failure. */
export interface AuditSink {
  record(entry: AuditEntry): AuditRecord;
}
