import { readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { describe, it, expect } from 'vitest';
import { tempDir } from '../testing/fixtures.js';
import type { AuditEntry } from '../types/index.js';
import { AuditLog } from './audit-log.js';
import { GENESIS_HASH, hashObject, sha256 } from './hasher.js';
import { auditSigningPayload, generateKeyPair, saveKeyPair, verifySignature } from './signer.js';

function entry(rawText: string, overrides: Partial<AuditEntry> = {}): AuditEntry {
  return {
    missionId: 'mission-1',
    severity: 'HIGH',
    actionKind: 'WriteDispatchLog',
    status: 'ALLOWED',
    rawText,
    policyHash: 'policy-hash',
    ...overrides
  };
}

function lines(path: string): string[] {
  return readFileSync(path, 'utf-8').split('\n').filter(Boolean);
}

describe('AuditLog', () => {
  it('chains each record to the line before it', () => {
    const path = join(tempDir(), 'logs', 'audit.jsonl');
    const log = new AuditLog(path);

    const first = log.record(entry('flood relief at zone 4'));
    const second = log.record(entry('bridge closed', { status: 'BLOCKED', ruleId: 'RULE:DIR_SCOPE' }));

    const written = lines(path);
    expect(first.prev_record_hash).toBe(GENESIS_HASH);
    expect(second.prev_record_hash).toBe(sha256(written[0]));
    expect(second.rule_id).toBe('RULE:DIR_SCOPE');
    expect(first.signature).toBeUndefined();
    expect(log.verify()).toEqual({ valid: true, errors: [] });
  });

  it('stores an excerpt and a hash of the full text', () => {
    const log = new AuditLog(join(tempDir(), 'audit.jsonl'));
    const text = 'x'.repeat(300);

    const record = log.record(entry(text));

    expect(record.text_excerpt).toBe('x'.repeat(120));
    expect(record.hash_input).toBe(sha256(text));
    expect(record.policy_hash).toBe('policy-hash');
  });

  it('continues the chain after reopening the file', () => {
    const path = join(tempDir(), 'audit.jsonl');
    new AuditLog(path).record(entry('first'));

    const reopened = new AuditLog(path);
    const record = reopened.record(entry('second'));

    expect(record.prev_record_hash).toBe(sha256(lines(path)[0]));
    expect(reopened.verify().valid).toBe(true);
  });

  it('detects an edited record', () => {
    const path = join(tempDir(), 'audit.jsonl');
    const log = new AuditLog(path);
    log.record(entry('first'));
    log.record(entry('second'));

    const [head, ...rest] = lines(path);
    writeFileSync(path, [head.replace('"first"', '"edited"'), ...rest].join('\n') + '\n');

    const result = log.verify();
    expect(result.valid).toBe(false);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatch(/^Record 1: Chain broken/);
  });

  it('signs records when a key pair exists', () => {
    const dir = tempDir();
    const keyDir = join(dir, 'keys');
    const keyPair = generateKeyPair();
    saveKeyPair(keyDir, keyPair);

    const log = new AuditLog(join(dir, 'audit.jsonl'), keyDir);
    const record = log.record(entry('flood relief'));

    expect(record.signature).toBeDefined();
    expect(verifySignature(auditSigningPayload(record), String(record.signature), keyPair.publicKey)).toBe(true);
    expect(log.verify().valid).toBe(true);
  });

  it('returns the newest records from tail', () => {
    const log = new AuditLog(join(tempDir(), 'audit.jsonl'));
    log.record(entry('one'));
    log.record(entry('two'));
    log.record(entry('three'));

    expect(log.tail(2).map(record => record.text_excerpt)).toEqual(['two', 'three']);
    expect(log.tail(0)).toEqual([]);
    expect(log.tail(10)).toHaveLength(3);
  });
});

describe('hashObject', () => {
  it('ignores key order', () => {
    expect(hashObject({ a: 1, b: { c: 2, d: [3, 4] } })).toBe(hashObject({ b: { d: [3, 4], c: 2 }, a: 1 }));
    expect(hashObject({ a: 1 })).not.toBe(hashObject({ a: 2 }));
  });
});
