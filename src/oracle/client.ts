import { z } from 'zod';
import type { Intent } from '../types/index.js';
import type { Logger } from '../logger.js';
import { withTimeout } from '../timeout.js';

export interface IntentSummary {
  action: string;
  path: string | null;
  category: string;
  keywords: string[];
  text_excerpt: string;
}

export type OracleVerdict =
  | { decision: 'allow'; reason?: string }
  | { decision: 'deny'; reason: string; sensitive: boolean }
  | { decision: 'unavailable'; reason: string };

/** Advisory policy check. Safety never depends on it being reachable. */
export interface PolicyOracle {
  consult(summary: IntentSummary, signal: AbortSignal): Promise<OracleVerdict>;
}

const verdictSchema = z.object({
  decision: z.enum(['allow', 'deny']),
  reason: z.string().optional(),
  category: z.enum(['sensitive', 'general']).optional()
});

export function summarizeIntent(intent: Intent): IntentSummary {
  return {
    action: intent.actionKind,
    path: intent.proposedPath ?? null,
    category: intent.category,
    keywords: [...intent.keywords].sort(),
    text_excerpt: intent.rawText.slice(0, 200)
  };
}

export function parseVerdict(body: unknown): OracleVerdict {
  const parsed = verdictSchema.safeParse(body);
  if (!parsed.success) {
    return { decision: 'unavailable', reason: 'Malformed oracle response' };
  }

  const { decision, reason, category } = parsed.data;
  if (decision === 'allow') {
    return { decision: 'allow', reason };
  }
  return {
    decision: 'deny',
    reason: reason ?? 'Denied by policy oracle',
    sensitive: category === 'sensitive'
  };
}

export class HttpPolicyOracle implements PolicyOracle {
  constructor(
    private url: string,
    private fetchImpl: typeof fetch = fetch
  ) {}

  async consult(summary: IntentSummary, signal: AbortSignal): Promise<OracleVerdict> {
    const response = await this.fetchImpl(this.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(summary),
      signal
    });

    if (!response.ok) {
      return { decision: 'unavailable', reason: `Oracle HTTP ${response.status}` };
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      return { decision: 'unavailable', reason: 'Oracle returned non-JSON body' };
    }
    return parseVerdict(body);
  }
}

/**
 * Consult the oracle under a deadline. Every failure mode degrades to
 * `unavailable`; only an abort from the caller propagates.
 */
export async function consultOracle(
  oracle: PolicyOracle,
  intent: Intent,
  timeoutMs: number,
  logger: Logger,
  signal?: AbortSignal
): Promise<OracleVerdict> {
  try {
    const verdict = await withTimeout(s => oracle.consult(summarizeIntent(intent), s), timeoutMs, signal);
    logger.debug({ decision: verdict.decision }, 'Oracle verdict');
    return verdict;
  } catch (error) {
    if (signal?.aborted) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    logger.warn({ reason }, 'Policy oracle unavailable, falling back to deterministic rules');
    return { decision: 'unavailable', reason };
  }
}
