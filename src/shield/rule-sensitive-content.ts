import type { Intent, Outcome, Policy } from '../types/index.js';
import { tokenize } from '../intent/extractor.js';

export interface SensitiveMatch {
  kind: 'cluster' | 'pattern';
  detail: string;
}

/** Matches clusters against the intent's keywords plus tokens re-extracted from its raw text. */
export function findSensitiveContent(intent: Intent, policy: Policy): SensitiveMatch | null {
  const tokens = new Set<string>(tokenize(intent.rawText));
  for (const keyword of intent.keywords) tokens.add(keyword);

  for (const cluster of policy.blockedKeywordClusters) {
    let complete = true;
    for (const term of cluster) {
      if (!tokens.has(term)) {
        complete = false;
        break;
      }
    }
    if (complete) {
      return { kind: 'cluster', detail: `[${[...cluster].sort().join(', ')}]` };
    }
  }

  for (const pattern of policy.blockedPatterns) {
    const match = pattern.exec(intent.rawText);
    if (match) {
      return { kind: 'pattern', detail: `\`${pattern.source}\` | Match: \`${match[0]}\`` };
    }
  }

  return null;
}

export function checkSensitiveContent(intent: Intent, policy: Policy): Outcome | null {
  const match = findSensitiveContent(intent, policy);
  if (!match) return null;

  const reason = match.kind === 'cluster'
    ? `Medical/out-of-scope terminology detected. Blocked keyword cluster: ${match.detail}`
    : `Blocked pattern matched in intent text. Pattern: ${match.detail}`;

  return { kind: 'route', ruleId: 'RULE:MEDICAL_BLOCK', reason };
}
