import { mkdirSync, writeFileSync } from 'fs';
import { dirname, extname, resolve } from 'path';
import type { z } from 'zod';
import type { Logger } from '../logger.js';
import { AuthorityExceededError, ToolError } from '../errors.js';

export interface AuthorityBoundary {
  readonly root: string;
  readonly allowedExtensions: ReadonlySet<string>;
}

export interface SubAgentOptions<TPayload> {
  name: string;
  root: string;
  allowedExtensions: string[];
  schema: z.ZodType<TPayload>;
  logger: Logger;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * A sub-agent with exactly one write action. Every call re-validates payload
 * and filename against the agent's own boundary, whatever the caller checked.
 */
export abstract class BoundedSubAgent<TPayload> {
  readonly name: string;
  readonly boundary: AuthorityBoundary;
  private schema: z.ZodType<TPayload>;
  protected logger: Logger;

  constructor(options: SubAgentOptions<TPayload>) {
    this.name = options.name;
    this.schema = options.schema;
    this.logger = options.logger;
    this.boundary = Object.freeze({
      root: resolve(options.root),
      allowedExtensions: new Set(options.allowedExtensions.map(ext => ext.toLowerCase()))
    });

    mkdirSync(this.boundary.root, { recursive: true });
    this.logger.debug({ root: this.boundary.root, allowed: [...this.boundary.allowedExtensions] }, `${this.name} initialised`);
  }

  private deny(reason: string, attemptedFilename: string): never {
    const error = new AuthorityExceededError(reason, attemptedFilename, this.name);
    this.logger.warn({ agent: this.name, attemptedFilename, reason }, 'Sub-agent authority exceeded');
    throw error;
  }

  validatePayload(payload: unknown): Record<string, unknown> {
    if (!isPlainObject(payload)) {
      const kind = Array.isArray(payload) ? 'array' : payload === null ? 'null' : typeof payload;
      return this.deny(`Payload must be a plain JSON object. Got: ${kind}`, '<payload rejected before filename check>');
    }
    return payload;
  }

  /** Returns the resolved target path. */
  validateFilename(filename: string): string {
    if (filename.includes('\0')) {
      return this.deny('Null byte detected in filename: path injection attempt.', filename.replace(/\0/g, '\\0'));
    }

    const root = this.boundary.root;
    const target = resolve(root, filename);
    if (dirname(target) !== root) {
      return this.deny(`Path containment violation: \`${filename}\` does not resolve directly inside the agent directory.`, filename);
    }

    const ext = extname(target).toLowerCase();
    if (!this.boundary.allowedExtensions.has(ext)) {
      return this.deny(
        `File extension \`${ext || '(none)'}\` is not permitted. Accepted: ${[...this.boundary.allowedExtensions].sort().join(', ')} only.`,
        filename
      );
    }

    return target;
  }

  /** The agent's single write surface. */
  write(payload: unknown, filename: string): string {
    const candidate = this.validatePayload(payload);
    const target = this.validateFilename(filename);

    const parsed = this.schema.safeParse(candidate);
    if (!parsed.success) {
      const fields = parsed.error.issues.map(issue => issue.path.join('.') || issue.message);
      return this.deny(`Payload does not match the ${this.name} schema: ${fields.join(', ')}`, filename);
    }

    try {
      // 'wx': a dispatch file is written once and never reused
      writeFileSync(target, JSON.stringify(parsed.data, null, 2) + '\n', { encoding: 'utf-8', flag: 'wx' });
    } catch (error) {
      const detail = error instanceof Error && 'code' in error ? String(error.code) : 'write failed';
      this.logger.error({ agent: this.name, filename, detail }, 'Sub-agent write failed');
      throw new ToolError(`${this.name} filesystem write failed (${detail})`, filename, { cause: error });
    }

    this.logger.info({ agent: this.name, path: target }, 'Sub-agent log written');
    return `LOG WRITTEN: ${filename}`;
  }
}
