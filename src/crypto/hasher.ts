import { createHash } from 'crypto';

export function sha256(data: string | Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonicalize);
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, entry] of entries) {
      sorted[key] = canonicalize(entry);
    }
    return sorted;
  }
  return value;
}

// Key order must not change the hash of a policy or record
export function hashObject(obj: object): string {
  return sha256(JSON.stringify(canonicalize(obj)));
}

export const GENESIS_HASH = sha256('dispatch-shield-audit-genesis');
