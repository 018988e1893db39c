import { isAbsolute, relative, resolve, sep } from 'path';
import type { Intent, Outcome, Policy } from '../types/index.js';

function dirScope(reason: string): Outcome {
  return { kind: 'block', ruleId: 'RULE:DIR_SCOPE', reason };
}

/** Components of `target` below `base`, or null when `target` is not a strict descendant. */
export function depthBelow(base: string, target: string): number | null {
  const rel = relative(base, target);
  if (rel === '' || isAbsolute(rel) || rel === '..' || rel.startsWith('..' + sep)) {
    return null;
  }
  return rel.split(sep).length;
}

export function checkPathScope(intent: Intent, policy: Policy): Outcome | null {
  if (intent.proposedPath === undefined) return null;

  const resolved = resolve(intent.proposedPath);
  const base = policy.allowedBaseDirectory;

  const depth = depthBelow(base, resolved);
  if (depth === null) {
    return dirScope(`Directory scope violation: proposed path \`${resolved}\` is outside the allowed base \`${base}\`.`);
  }

  if (depth > policy.maxPathDepth) {
    return dirScope(`File depth violation: path is ${depth} level(s) deep, but policy allows max ${policy.maxPathDepth}.`);
  }

  if (!policy.allowSubdirectories && depth > 1) {
    return dirScope(`Subdirectory violation: policy requires files to be direct children of \`${base}\`, but \`${resolved}\` is nested.`);
  }

  return null;
}
