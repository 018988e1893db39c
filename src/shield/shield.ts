import type { AuditSink, AuditStatus, Intent, Outcome, Policy } from '../types/index.js';
import { createLogger, type Logger } from '../logger.js';
import { consultOracle, type OracleVerdict, type PolicyOracle } from '../oracle/client.js';
import { evaluateIntent } from './evaluator.js';
import { findSensitiveContent } from './rule-sensitive-content.js';

export interface ShieldOptions {
  policy: Policy;
  audit: AuditSink;
  oracle?: PolicyOracle;
  oracleTimeoutMs?: number;
  logger?: Logger;
}

export interface EvaluationContext {
  missionId: string;
  severity: string;
  signal?: AbortSignal;
}

const DEFAULT_ORACLE_TIMEOUT_MS = 3_000;

export function auditStatusFor(outcome: Outcome): AuditStatus {
  switch (outcome.kind) {
    case 'allow':
      return 'ALLOWED';
    case 'route':
      return 'ROUTED';
    case 'block':
      return 'BLOCKED';
  }
}

/**
 * The Shield: optional oracle pre-check, the deterministic rule chain, and
 * one audit record per evaluation.
 */
export class Shield {
  readonly policy: Policy;
  private audit: AuditSink;
  private oracle?: PolicyOracle;
  private oracleTimeoutMs: number;
  private logger: Logger;

  constructor(options: ShieldOptions) {
    this.policy = options.policy;
    this.audit = options.audit;
    this.oracle = options.oracle;
    this.oracleTimeoutMs = options.oracleTimeoutMs ?? DEFAULT_ORACLE_TIMEOUT_MS;
    this.logger = options.logger ?? createLogger('shield');
  }

  async evaluate(intent: Intent, context: EvaluationContext): Promise<Outcome> {
    this.logger.info({
      missionId: context.missionId,
      action: intent.actionKind,
      file: intent.proposedPath,
      keywords: [...intent.keywords].slice(0, 8)
    }, 'Shield evaluating');

    let outcome: Outcome | null = null;
    if (this.oracle) {
      const verdict = await consultOracle(this.oracle, intent, this.oracleTimeoutMs, this.logger, context.signal);
      outcome = this.fromOracle(verdict, intent);
    }
    outcome ??= evaluateIntent(intent, this.policy);

    this.audit.record({
      missionId: context.missionId,
      severity: context.severity,
      actionKind: intent.actionKind,
      status: auditStatusFor(outcome),
      ruleId: outcome.kind === 'allow' ? undefined : outcome.ruleId,
      rawText: intent.rawText,
      policyHash: this.policy.hash
    });

    if (outcome.kind === 'allow') {
      this.logger.info({ missionId: context.missionId }, 'Shield cleared: action approved');
    } else {
      this.logger.warn({ missionId: context.missionId, ruleId: outcome.ruleId, reason: outcome.reason },
        outcome.kind === 'route' ? 'Shield routed to specialist' : 'Shield blocked action');
    }

    return outcome;
  }

  // A deny only tightens; an allow never skips the deterministic rules
  private fromOracle(verdict: OracleVerdict, intent: Intent): Outcome | null {
    if (verdict.decision !== 'deny') return null;

    if (verdict.sensitive || findSensitiveContent(intent, this.policy)) {
      return { kind: 'route', ruleId: 'RULE:MEDICAL_BLOCK', reason: `Policy oracle denied: ${verdict.reason}` };
    }
    return { kind: 'block', ruleId: 'RULE:ORACLE_DENY', reason: `Policy oracle denied: ${verdict.reason}` };
  }
}
