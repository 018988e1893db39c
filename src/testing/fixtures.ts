import { mkdtempSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import type { Correction, CorrectionRequest, Reasoner, ReasonerResult } from '../inference/reasoner.js';
import { loadPolicy, withBaseDirectory } from '../policy/loader.js';
import type { AuditEntry, AuditRecord, AuditSink, MissionImage, Policy, TriageClassification } from '../types/index.js';

export const POLICY_DIR = fileURLToPath(new URL('../../policies', import.meta.url));

export function tempDir(prefix = 'dispatch-shield-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

/** The shipped default policy, re-rooted at `base`. */
export function defaultPolicy(base: string): Policy {
  return withBaseDirectory(loadPolicy(POLICY_DIR, 'default'), base);
}

export class MemoryAuditSink implements AuditSink {
  readonly entries: AuditEntry[] = [];

  record(entry: AuditEntry): AuditRecord {
    this.entries.push(entry);
    return {
      event_id: `event-${this.entries.length}`,
      timestamp: '2026-01-01T00:00:00.000Z',
      mission_id: entry.missionId,
      severity: entry.severity,
      action_kind: entry.actionKind,
      status: entry.status,
      rule_id: entry.ruleId,
      text_excerpt: entry.rawText.slice(0, 120),
      hash_input: 'test-hash',
      policy_hash: entry.policyHash,
      prev_record_hash: 'test-prev',
      service_version: 'test'
    };
  }

  statuses(): string[] {
    return this.entries.map(entry => entry.status);
  }
}

export const SAMPLE_TRIAGE: TriageClassification = {
  severity: 'MEDIUM',
  category: 'flood',
  recommendedActions: ['Stage purification units at zone 4'],
  affectedZones: ['zone_4'],
  confidence: 0.9,
  source: 'reasoner'
};

/** Scripted reasoner: classify returns `triage`; each regenerate call takes the next scripted result. */
export class ScriptedReasoner implements Reasoner {
  readonly classifyCalls: Array<{ text: string; image?: MissionImage }> = [];
  readonly regenerateCalls: CorrectionRequest[] = [];

  constructor(
    private triage: ReasonerResult<TriageClassification> = { ok: true, value: SAMPLE_TRIAGE },
    private corrections: Array<ReasonerResult<Correction>> = []
  ) {}

  async classify(text: string, image?: MissionImage): Promise<ReasonerResult<TriageClassification>> {
    this.classifyCalls.push({ text, image });
    return this.triage;
  }

  async regenerate(request: CorrectionRequest): Promise<ReasonerResult<Correction>> {
    this.regenerateCalls.push(request);
    return this.corrections.shift() ?? { ok: false, error: 'no scripted correction' };
  }
}
