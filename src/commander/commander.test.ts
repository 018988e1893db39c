import { readdirSync, readFileSync, rmSync } from 'fs';
import { join } from 'path';
import { describe, it, expect } from 'vitest';
import { LogisticsSubAgent } from '../agents/logistics.js';
import { MedicalSubAgent } from '../agents/medical.js';
import type { Correction, Reasoner, ReasonerResult } from '../inference/reasoner.js';
import { silentLogger } from '../logger.js';
import { createPolicy, toPolicyDocument } from '../policy/loader.js';
import type { OracleVerdict, PolicyOracle } from '../oracle/client.js';
import { Shield } from '../shield/shield.js';
import { defaultPolicy, MemoryAuditSink, SAMPLE_TRIAGE, ScriptedReasoner, tempDir } from '../testing/fixtures.js';
import type { TriageClassification } from '../types/index.js';
import { TriageCommander, type CommanderOptions } from './commander.js';

const ALLOW_TEXT = '500 water purification units needed for flood zone 4';
const ROUTE_TEXT = 'Field team requests diagnosis and treatment guidance for flood victims';
const DISPATCH_FILE = /^dispatch_[0-9a-f]{32}\.json$/;
const MEDICAL_FILE = /^medical_[0-9a-f]{32}\.json$/;

function setup(
  reasoner: Reasoner | ((dispatchDir: string) => Reasoner) = new ScriptedReasoner(),
  options: { oracle?: PolicyOracle } & Partial<CommanderOptions> = {}
) {
  const { oracle, ...overrides } = options;
  const root = tempDir();
  const dispatchDir = join(root, 'outgoing_dispatch');
  const medicalDir = join(root, 'medical_logs');
  const audit = new MemoryAuditSink();
  const policy = defaultPolicy(dispatchDir);
  const shield = new Shield({ policy, audit, oracle, logger: silentLogger });
  const commander = new TriageCommander({
    shield,
    reasoner: typeof reasoner === 'function' ? reasoner(dispatchDir) : reasoner,
    logistics: new LogisticsSubAgent(dispatchDir, silentLogger),
    medical: new MedicalSubAgent(medicalDir, silentLogger),
    audit,
    logger: silentLogger,
    ...overrides
  });
  return { root, dispatchDir, medicalDir, audit, commander };
}

function readJson(path: string): Record<string, unknown> {
  return JSON.parse(readFileSync(path, 'utf-8'));
}

function moveTo(targetDirectory: string, missionText = ALLOW_TEXT): ReasonerResult<Correction> {
  return { ok: true, value: { missionText, targetDirectory } };
}

describe('TriageCommander.runMission', () => {
  it('allows a clean logistics mission and writes one dispatch log', async () => {
    const { dispatchDir, medicalDir, audit, commander } = setup();

    const result = await commander.runMission({ mission: ALLOW_TEXT });

    expect(result.status).toBe('SUCCESS');
    expect(result.reflectionAttempts).toBe(0);
    expect(result.category).toBe('flood');
    expect(result.filename).toMatch(DISPATCH_FILE);
    expect(result.result).toBe(`LOG WRITTEN: ${result.filename}`);
    expect(result.triage).toEqual(SAMPLE_TRIAGE);
    expect(readdirSync(dispatchDir)).toEqual([result.filename]);
    expect(readdirSync(medicalDir)).toEqual([]);
    expect(audit.statuses()).toEqual(['ALLOWED']);

    const written = readJson(join(dispatchDir, String(result.filename)));
    expect(written).toMatchObject({
      schema_version: '2.1.0',
      mission_id: result.missionId,
      disaster_category: 'flood',
      severity: 'MEDIUM',
      mission_briefing: ALLOW_TEXT,
      triage_source: 'reasoner',
      enforcement: { shield_cleared: true, self_healed: false, reflection_attempts: 0, policy_version: '1.2.0' },
      delegation: { commander: 'TriageCommander', sub_agent: 'LogisticsSubAgent', bounded: true }
    });
  });

  it('routes medical content to the medical sub-agent only', async () => {
    const { dispatchDir, medicalDir, audit, commander } = setup();

    const result = await commander.runMission({ mission: ROUTE_TEXT });

    expect(result.status).toBe('ROUTED_TO_MEDICAL');
    expect(result.ruleId).toBe('RULE:MEDICAL_BLOCK');
    expect(result.filename).toMatch(MEDICAL_FILE);
    expect(readdirSync(dispatchDir)).toEqual([]);
    expect(readdirSync(medicalDir)).toEqual([result.filename]);
    expect(audit.statuses()).toEqual(['ROUTED']);

    const written = readJson(join(medicalDir, String(result.filename)));
    expect(written.mission_briefing).toBe(ROUTE_TEXT);
    expect(written.rule_id).toBe('RULE:MEDICAL_BLOCK');
    expect(written.routing_reason).toBe(
      'Medical/out-of-scope terminology detected. Blocked keyword cluster: [diagnosis, treatment]'
    );
    expect(Object.keys(written)).not.toContain('dosage');
    expect(Object.keys(written)).not.toContain('prescription');
  });

  it('reflects once on a scope block and then succeeds', async () => {
    let reasoner = new ScriptedReasoner();
    const { root, dispatchDir, audit, commander } = setup(dir => {
      reasoner = new ScriptedReasoner(undefined, [moveTo(dir)]);
      return reasoner;
    });

    const result = await commander.runMission({ mission: ALLOW_TEXT, targetDirectory: join(root, 'elsewhere') });

    expect(result.status).toBe('SUCCESS_AFTER_REFLECTION');
    expect(result.reflectionAttempts).toBe(1);
    expect(audit.statuses()).toEqual(['BLOCKED', 'ALLOWED']);
    expect(reasoner.regenerateCalls).toHaveLength(1);
    expect(reasoner.regenerateCalls[0]).toMatchObject({
      ruleId: 'RULE:DIR_SCOPE',
      attempt: 1,
      targetDirectory: join(root, 'elsewhere'),
      allowedBaseDirectory: dispatchDir,
      allowedActionKinds: ['WriteDispatchLog']
    });

    const written = readJson(join(dispatchDir, String(result.filename)));
    expect(written.enforcement).toMatchObject({ self_healed: true, reflection_attempts: 1 });
  });

  it('stops at the reflection ceiling and reports the attempt count', async () => {
    const reasoner = new ScriptedReasoner(undefined, [moveTo('/elsewhere'), moveTo('/still/elsewhere')]);
    const { dispatchDir, audit, commander } = setup(reasoner);

    const result = await commander.runMission({ mission: ALLOW_TEXT, targetDirectory: '/outside' });

    expect(result.status).toBe('BLOCKED_BY_SHIELD');
    expect(result.ruleId).toBe('RULE:DIR_SCOPE');
    expect(result.reflectionAttempts).toBe(2);
    expect(result.error).toMatch(/^Directory scope violation: .* \(after 2 reflection attempts\)$/);
    expect(reasoner.regenerateCalls).toHaveLength(2);
    expect(audit.statuses()).toEqual(['BLOCKED', 'BLOCKED', 'BLOCKED']);
    expect(readdirSync(dispatchDir)).toEqual([]);
  });

  it('counts a failed regeneration as a spent attempt', async () => {
    const reasoner = new ScriptedReasoner(undefined, []);
    const { commander } = setup(reasoner);

    const result = await commander.runMission({ mission: ALLOW_TEXT, targetDirectory: '/outside' });

    expect(result.status).toBe('BLOCKED_BY_SHIELD');
    expect(result.reflectionAttempts).toBe(2);
    expect(reasoner.regenerateCalls.map(call => call.targetDirectory)).toEqual(['/outside', '/outside']);
  });

  it('repairs an action-type block and keeps the omitted target directory', async () => {
    const fix: ReasonerResult<Correction> = { ok: true, value: { missionText: ALLOW_TEXT, actionKind: 'WriteDispatchLog' } };
    const reasoner = new ScriptedReasoner(undefined, [fix]);
    const { dispatchDir, commander } = setup(reasoner);

    const result = await commander.runMission({ mission: ALLOW_TEXT, actionKind: 'SendNotification' });

    expect(result.status).toBe('SUCCESS_AFTER_REFLECTION');
    expect(reasoner.regenerateCalls[0].ruleId).toBe('RULE:ACTION_TYPE');
    expect(readdirSync(dispatchDir)).toEqual([result.filename]);
  });

  it('does not reflect on an oracle deny', async () => {
    const oracle: PolicyOracle = {
      consult: async (): Promise<OracleVerdict> => ({ decision: 'deny', reason: 'corridor closed', sensitive: false })
    };
    const reasoner = new ScriptedReasoner();
    const { commander } = setup(reasoner, { oracle });

    const result = await commander.runMission({ mission: ALLOW_TEXT });

    expect(result).toMatchObject({
      status: 'BLOCKED_BY_SHIELD',
      ruleId: 'RULE:ORACLE_DENY',
      reflectionAttempts: 0,
      error: 'Policy oracle denied: corridor closed'
    });
    expect(reasoner.regenerateCalls).toHaveLength(0);
  });

  it('degrades a failed triage to the stub classification', async () => {
    const { dispatchDir, commander } = setup(new ScriptedReasoner({ ok: false, error: 'malformed' }));

    const result = await commander.runMission({ mission: ALLOW_TEXT });

    expect(result.status).toBe('SUCCESS');
    expect(result.triage).toMatchObject({ severity: 'HIGH', category: 'logistics', source: 'stub', confidence: 0.75 });
    expect(readJson(join(dispatchDir, String(result.filename))).triage_source).toBe('stub');
  });

  it('degrades a reasoner timeout to the stub classification', async () => {
    const hanging: Reasoner = {
      classify: () => new Promise<ReasonerResult<TriageClassification>>(() => undefined),
      regenerate: async () => ({ ok: false, error: 'unused' })
    };
    const { commander } = setup(hanging, { reasonerTimeoutMs: 20 });

    const result = await commander.runMission({ mission: ALLOW_TEXT });

    expect(result.status).toBe('SUCCESS');
    expect(result.triage?.source).toBe('stub');
  });

  it('holds a high-volume request for confirmation before any triage', async () => {
    const reasoner = new ScriptedReasoner();
    const { dispatchDir, audit, commander } = setup(reasoner);
    const mission = 'Send 1,500 blankets to flood zone 2';

    const pending = await commander.runMission({ mission });
    expect(pending.status).toBe('PENDING_CONFIRMATION');
    expect(pending.error).toBe('Requested quantity exceeds 1000; resubmit with confirmation to proceed.');
    expect(reasoner.classifyCalls).toHaveLength(0);
    expect(audit.entries).toHaveLength(0);
    expect(readdirSync(dispatchDir)).toEqual([]);

    const confirmed = await commander.runMission({ mission, confirmHighVolume: true });
    expect(confirmed.status).toBe('SUCCESS');
  });

  it('reports a sub-agent refusal as BLOCKED_BY_SUB_AGENT and writes nothing', async () => {
    const badTriage: TriageClassification = { ...SAMPLE_TRIAGE, confidence: 1.5 };
    const { dispatchDir, audit, commander } = setup(new ScriptedReasoner({ ok: true, value: badTriage }));

    const result = await commander.runMission({ mission: ALLOW_TEXT });

    expect(result).toMatchObject({
      status: 'BLOCKED_BY_SUB_AGENT',
      ruleId: 'RULE:AUTHORITY_EXCEEDED',
      error: 'Payload does not match the LogisticsSubAgent schema: confidence'
    });
    expect(audit.statuses()).toEqual(['ALLOWED', 'AUTHORITY_EXCEEDED']);
    expect(readdirSync(dispatchDir)).toEqual([]);
  });

  it('reports a filesystem failure as TOOL_ERROR', async () => {
    const { dispatchDir, audit, commander } = setup();
    rmSync(dispatchDir, { recursive: true });

    const result = await commander.runMission({ mission: ALLOW_TEXT });

    expect(result).toMatchObject({
      status: 'TOOL_ERROR',
      ruleId: 'RULE:TOOL_ERROR',
      error: 'LogisticsSubAgent filesystem write failed (ENOENT)'
    });
    expect(audit.statuses()).toEqual(['ALLOWED', 'TOOL_ERROR']);
  });

  it('refuses to write anywhere but the path the Shield approved', async () => {
    const root = tempDir();
    const dispatchDir = join(root, 'outgoing_dispatch');
    const audit = new MemoryAuditSink();
    const nested = createPolicy({
      ...toPolicyDocument(defaultPolicy(dispatchDir)),
      max_path_depth: 2,
      allow_subdirectories: true
    });
    const commander = new TriageCommander({
      shield: new Shield({ policy: nested, audit, logger: silentLogger }),
      reasoner: new ScriptedReasoner(),
      logistics: new LogisticsSubAgent(dispatchDir, silentLogger),
      medical: new MedicalSubAgent(join(root, 'medical_logs'), silentLogger),
      audit,
      logger: silentLogger
    });

    const result = await commander.runMission({ mission: ALLOW_TEXT, targetDirectory: join(dispatchDir, 'zone4') });

    expect(result.status).toBe('BLOCKED_BY_SUB_AGENT');
    expect(result.ruleId).toBe('RULE:AUTHORITY_EXCEEDED');
    expect(result.error).toMatch(/^Path containment violation: `zone4\/dispatch_[0-9a-f]{32}\.json` does not resolve directly inside/);
    expect(audit.statuses()).toEqual(['ALLOWED', 'AUTHORITY_EXCEEDED']);
    expect(readdirSync(dispatchDir)).toEqual([]);
  });

  it('trims the mission preview to 100 characters', async () => {
    const { commander } = setup();
    const result = await commander.runMission({ mission: `${ALLOW_TEXT} ${'x'.repeat(200)}` });
    expect(result.mission).toHaveLength(100);
  });

  it('stops without side effects when cancelled', async () => {
    const { dispatchDir, audit, commander } = setup();

    await expect(commander.runMission({ mission: ALLOW_TEXT }, { signal: AbortSignal.abort() }))
      .rejects.toMatchObject({ name: 'AbortError' });
    expect(audit.entries).toHaveLength(0);
    expect(readdirSync(dispatchDir)).toEqual([]);
  });
});

describe('TriageCommander construction', () => {
  it('refuses sub-agents sharing or nesting a root', () => {
    const root = tempDir();
    const policy = defaultPolicy(join(root, 'outgoing_dispatch'));
    const audit = new MemoryAuditSink();
    const base = {
      shield: new Shield({ policy, audit, logger: silentLogger }),
      reasoner: new ScriptedReasoner(),
      logistics: new LogisticsSubAgent(join(root, 'outgoing_dispatch'), silentLogger),
      audit,
      logger: silentLogger
    };

    expect(() => new TriageCommander({ ...base, medical: new MedicalSubAgent(join(root, 'outgoing_dispatch'), silentLogger) }))
      .toThrow(/^Sub-agent roots must be disjoint/);
    expect(() => new TriageCommander({ ...base, medical: new MedicalSubAgent(join(root, 'outgoing_dispatch', 'medical'), silentLogger) }))
      .toThrow(/^Sub-agent roots must be disjoint/);
  });
});
