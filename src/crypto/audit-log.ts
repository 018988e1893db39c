import { appendFileSync, readFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { AuditEntry, AuditRecord, AuditSink } from '../types/index.js';
import { GENESIS_HASH, sha256 } from './hasher.js';
import { auditSigningPayload, loadKeyPair, signData, verifySignature, type KeyPair } from './signer.js';
import { SERVICE_VERSION } from '../version.js';

const EXCERPT_CHARS = 120;

/**
 * Hash-chained JSONL audit trail. Each line records the sha256 of the line
 * before it; appends are synchronous, so concurrent missions in one process
 * cannot interleave a record.
 */
export class AuditLog implements AuditSink {
  private logPath: string;
  private keyPair: KeyPair | null;
  private lastHash: string;

  constructor(logPath: string, keyDir?: string) {
    this.logPath = logPath;
    this.keyPair = keyDir ? loadKeyPair(keyDir) : null;

    const dir = dirname(logPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    const lines = this.readLines();
    this.lastHash = lines.length > 0 ? sha256(lines[lines.length - 1]) : GENESIS_HASH;
  }

  private readLines(): string[] {
    if (!existsSync(this.logPath)) return [];
    return readFileSync(this.logPath, 'utf-8').split('\n').filter(Boolean);
  }

  record(entry: AuditEntry): AuditRecord {
    const record: AuditRecord = {
      event_id: uuidv4(),
      timestamp: new Date().toISOString(),
      mission_id: entry.missionId,
      severity: entry.severity,
      action_kind: entry.actionKind,
      status: entry.status,
      rule_id: entry.ruleId,
      text_excerpt: entry.rawText.slice(0, EXCERPT_CHARS),
      hash_input: sha256(entry.rawText),
      policy_hash: entry.policyHash,
      prev_record_hash: this.lastHash,
      service_version: SERVICE_VERSION
    };

    if (this.keyPair) {
      record.signature = signData(auditSigningPayload(record), this.keyPair.privateKey);
    }

    const line = JSON.stringify(record);
    appendFileSync(this.logPath, line + '\n');
    this.lastHash = sha256(line);

    return record;
  }

  /** Newest records last. */
  tail(limit: number): AuditRecord[] {
    if (limit <= 0) return [];
    const lines = this.readLines().slice(-limit);
    const records: AuditRecord[] = [];
    for (const line of lines) {
      try {
        records.push(JSON.parse(line));
      } catch {
        continue;
      }
    }
    return records;
  }

  verify(): { valid: boolean; errors: string[] } {
    const lines = this.readLines();
    const errors: string[] = [];

    let prevHash = GENESIS_HASH;

    for (let i = 0; i < lines.length; i++) {
      let record: AuditRecord;
      try {
        record = JSON.parse(lines[i]);
      } catch {
        errors.push(`Record ${i}: Invalid JSON`);
        prevHash = sha256(lines[i]);
        continue;
      }

      if (record.prev_record_hash !== prevHash) {
        errors.push(`Record ${i}: Chain broken - expected prev_hash ${prevHash}, got ${record.prev_record_hash}`);
      }

      if (this.keyPair && record.signature &&
          !verifySignature(auditSigningPayload(record), record.signature, this.keyPair.publicKey)) {
        errors.push(`Record ${i}: Signature mismatch`);
      }

      prevHash = sha256(lines[i]);
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }
}
