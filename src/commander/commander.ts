import { join, relative, resolve } from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { LogisticsSubAgent } from '../agents/logistics.js';
import type { MedicalSubAgent } from '../agents/medical.js';
import { AuthorityExceededError, ShieldError } from '../errors.js';
import { detectHighVolume, DEFAULT_HIGH_VOLUME_THRESHOLD, extractIntent } from '../intent/index.js';
import { stubClassification, type Reasoner } from '../inference/reasoner.js';
import { createLogger, type Logger } from '../logger.js';
import { depthBelow } from '../shield/rule-path-scope.js';
import type { Shield } from '../shield/shield.js';
import { withTimeout } from '../timeout.js';
import type {
  AuditSink,
  Intent,
  MissionImage,
  MissionProposal,
  MissionRequest,
  MissionResult,
  Outcome,
  TriageClassification
} from '../types/index.js';
import { buildDispatchPayload, buildMedicalPayload } from './payload.js';
import {
  applyCorrection,
  blockedMessage,
  buildCorrectionRequest,
  isReflectionEligible,
  MAX_REFLECTION_ATTEMPTS,
  type BlockOutcome
} from './reflection.js';

export interface CommanderOptions {
  shield: Shield;
  reasoner: Reasoner;
  logistics: LogisticsSubAgent;
  medical: MedicalSubAgent;
  audit: AuditSink;
  logger?: Logger;
  reasonerTimeoutMs?: number;
  highVolumeThreshold?: number;
  maxReflectionAttempts?: number;
}

export interface RunOptions {
  signal?: AbortSignal;
}

const DEFAULT_REASONER_TIMEOUT_MS = 20_000;
const PREVIEW_CHARS = 100;

function freshName(prefix: string): string {
  return `${prefix}_${uuidv4().replace(/-/g, '')}.json`;
}

/**
 * Orchestrates one mission: triage, Shield evaluation, bounded reflection on
 * repairable blocks, and delegation to the logistics or medical sub-agent.
 */
export class TriageCommander {
  private shield: Shield;
  private reasoner: Reasoner;
  private logistics: LogisticsSubAgent;
  private medical: MedicalSubAgent;
  private audit: AuditSink;
  private logger: Logger;
  private reasonerTimeoutMs: number;
  private highVolumeThreshold: number;
  private maxReflectionAttempts: number;

  constructor(options: CommanderOptions) {
    const logisticsRoot = options.logistics.boundary.root;
    const medicalRoot = options.medical.boundary.root;
    if (
      logisticsRoot === medicalRoot ||
      depthBelow(logisticsRoot, medicalRoot) !== null ||
      depthBelow(medicalRoot, logisticsRoot) !== null
    ) {
      throw new Error(`Sub-agent roots must be disjoint: ${logisticsRoot} and ${medicalRoot}`);
    }

    this.shield = options.shield;
    this.reasoner = options.reasoner;
    this.logistics = options.logistics;
    this.medical = options.medical;
    this.audit = options.audit;
    this.logger = options.logger ?? createLogger('commander');
    this.reasonerTimeoutMs = options.reasonerTimeoutMs ?? DEFAULT_REASONER_TIMEOUT_MS;
    this.highVolumeThreshold = options.highVolumeThreshold ?? DEFAULT_HIGH_VOLUME_THRESHOLD;
    this.maxReflectionAttempts = options.maxReflectionAttempts ?? MAX_REFLECTION_ATTEMPTS;
  }

  async runMission(request: MissionRequest, options: RunOptions = {}): Promise<MissionResult> {
    const { signal } = options;
    const missionId = uuidv4();
    const preview = request.mission.slice(0, PREVIEW_CHARS);
    const log = this.logger.child({ missionId });

    log.info({ briefing: request.mission.slice(0, 80) }, 'Mission start');

    if (!request.confirmHighVolume && detectHighVolume(request.mission, this.highVolumeThreshold)) {
      log.warn({ threshold: this.highVolumeThreshold, status: 'PENDING_CONFIRMATION' }, 'High-volume request held for confirmation');
      return {
        status: 'PENDING_CONFIRMATION',
        missionId,
        mission: preview,
        reflectionAttempts: 0,
        error: `Requested quantity exceeds ${this.highVolumeThreshold}; resubmit with confirmation to proceed.`
      };
    }

    const triage = await this.triage(request.mission, request.image, log, signal);
    log.info({ severity: triage.severity, category: triage.category, source: triage.source }, 'Triage complete');

    let proposal: MissionProposal = {
      missionText: request.mission,
      targetDirectory: resolve(request.targetDirectory ?? this.shield.policy.allowedBaseDirectory),
      actionKind: request.actionKind ?? 'WriteDispatchLog',
      corrected: false
    };
    let attempts = 0;

    for (;;) {
      const filename = freshName('dispatch');
      const intent = extractIntent(proposal.missionText, join(proposal.targetDirectory, filename), {
        actionKind: proposal.actionKind,
        metadata: { missionId, attempt: attempts }
      });

      const outcome = await this.shield.evaluate(intent, { missionId, severity: triage.severity, signal });

      switch (outcome.kind) {
        case 'allow':
          signal?.throwIfAborted();
          return this.dispatch({ missionId, preview, intent, proposal, triage, filename, attempts, log });

        case 'route':
          signal?.throwIfAborted();
          return this.route({ missionId, preview, intent, proposal, triage, outcome, attempts, log });

        case 'block':
          if (isReflectionEligible(outcome.ruleId) && attempts < this.maxReflectionAttempts) {
            attempts++;
            proposal = await this.reflect(proposal, outcome, attempts, log, signal);
            continue;
          }

          log.warn({ ruleId: outcome.ruleId, attempts, status: 'BLOCKED_BY_SHIELD' }, 'Mission blocked by Shield');
          return {
            status: 'BLOCKED_BY_SHIELD',
            missionId,
            mission: preview,
            reflectionAttempts: attempts,
            category: intent.category,
            ruleId: outcome.ruleId,
            error: blockedMessage(outcome.reason, attempts)
          };
      }
    }
  }

  private async triage(
    text: string,
    image: MissionImage | undefined,
    log: Logger,
    signal?: AbortSignal
  ): Promise<TriageClassification> {
    try {
      const result = await withTimeout(s => this.reasoner.classify(text, image, s), this.reasonerTimeoutMs, signal);
      if (result.ok) return result.value;
      log.warn({ error: result.error }, 'Triage failed, using stub classification');
    } catch (error) {
      if (signal?.aborted) throw error;
      log.warn({ error: error instanceof Error ? error.message : String(error) }, 'Reasoner unavailable, using stub classification');
    }
    return stubClassification();
  }

  // A failed regeneration still spends the attempt and keeps the previous proposal
  private async reflect(
    proposal: MissionProposal,
    outcome: BlockOutcome,
    attempt: number,
    log: Logger,
    signal?: AbortSignal
  ): Promise<MissionProposal> {
    log.info({ ruleId: outcome.ruleId, attempt }, 'Reflection: regenerating proposal');
    const request = buildCorrectionRequest(proposal, outcome, this.shield.policy, attempt);

    try {
      const result = await withTimeout(s => this.reasoner.regenerate(request, s), this.reasonerTimeoutMs, signal);
      if (result.ok) {
        const corrected = applyCorrection(proposal, result.value);
        return { ...corrected, targetDirectory: resolve(corrected.targetDirectory) };
      }
      log.warn({ attempt, error: result.error }, 'Regeneration failed');
    } catch (error) {
      if (signal?.aborted) throw error;
      log.warn({ attempt, error: error instanceof Error ? error.message : String(error) }, 'Regeneration unavailable');
    }
    return proposal;
  }

  private dispatch(step: {
    missionId: string;
    preview: string;
    intent: Intent;
    proposal: MissionProposal;
    triage: TriageClassification;
    filename: string;
    attempts: number;
    log: Logger;
  }): MissionResult {
    const payload = buildDispatchPayload({
      missionId: step.missionId,
      runId: uuidv4().replace(/-/g, ''),
      intent: step.intent,
      proposal: step.proposal,
      triage: step.triage,
      policy: this.shield.policy,
      reflectionAttempts: step.attempts
    });

    // The agent is handed the approved path itself; one outside its root is refused there
    const approved = relative(this.logistics.boundary.root, join(step.proposal.targetDirectory, step.filename));

    try {
      const message = this.logistics.write(payload, approved);
      const status = step.attempts > 0 ? 'SUCCESS_AFTER_REFLECTION' : 'SUCCESS';
      step.log.info({ status, filename: step.filename }, 'Mission complete');
      return {
        status,
        missionId: step.missionId,
        mission: step.preview,
        reflectionAttempts: step.attempts,
        category: step.intent.category,
        result: message,
        filename: step.filename,
        triage: step.triage
      };
    } catch (error) {
      return this.fail(error, step);
    }
  }

  private route(step: {
    missionId: string;
    preview: string;
    intent: Intent;
    proposal: MissionProposal;
    triage: TriageClassification;
    outcome: Extract<Outcome, { kind: 'route' }>;
    attempts: number;
    log: Logger;
  }): MissionResult {
    const filename = freshName('medical');
    const payload = buildMedicalPayload({
      missionId: step.missionId,
      runId: uuidv4().replace(/-/g, ''),
      outcome: step.outcome,
      proposal: step.proposal,
      triage: step.triage
    });

    try {
      const message = this.medical.write(payload, filename);
      step.log.info({ status: 'ROUTED_TO_MEDICAL', ruleId: step.outcome.ruleId, filename }, 'Mission routed to medical specialist');
      return {
        status: 'ROUTED_TO_MEDICAL',
        missionId: step.missionId,
        mission: step.preview,
        reflectionAttempts: step.attempts,
        category: step.intent.category,
        ruleId: step.outcome.ruleId,
        result: message,
        filename,
        triage: step.triage
      };
    } catch (error) {
      return this.fail(error, step);
    }
  }

  private fail(
    error: unknown,
    step: { missionId: string; preview: string; intent: Intent; triage: TriageClassification; attempts: number; log: Logger }
  ): MissionResult {
    if (!(error instanceof ShieldError)) throw error;

    this.audit.record({
      missionId: step.missionId,
      severity: step.triage.severity,
      actionKind: step.intent.actionKind,
      status: error.code,
      ruleId: error.ruleId,
      rawText: step.intent.rawText,
      policyHash: this.shield.policy.hash
    });

    const status = error instanceof AuthorityExceededError ? 'BLOCKED_BY_SUB_AGENT' : 'TOOL_ERROR';
    step.log.error({ status, ruleId: error.ruleId, error: error.message }, 'Delegated write failed');
    return {
      status,
      missionId: step.missionId,
      mission: step.preview,
      reflectionAttempts: step.attempts,
      category: step.intent.category,
      ruleId: error.ruleId,
      error: error instanceof AuthorityExceededError ? error.reason : error.message
    };
  }
}
