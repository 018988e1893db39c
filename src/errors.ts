import type { RuleId } from './types/index.js';

export type ShieldErrorCode = 'AUTHORITY_EXCEEDED' | 'TOOL_ERROR';

export abstract class ShieldError extends Error {
  abstract readonly code: ShieldErrorCode;
  abstract readonly ruleId: RuleId;
}

/** A sub-agent refused a write outside its own authority boundary. Never retried. */
export class AuthorityExceededError extends ShieldError {
  readonly code = 'AUTHORITY_EXCEEDED';
  readonly ruleId = 'RULE:AUTHORITY_EXCEEDED';

  constructor(
    readonly reason: string,
    readonly attemptedFilename: string,
    readonly agent: string
  ) {
    super(`${agent} authority exceeded for ${attemptedFilename}: ${reason}`);
    this.name = 'AuthorityExceededError';
  }
}

/** Filesystem failure during an authorised write. */
export class ToolError extends ShieldError {
  readonly code = 'TOOL_ERROR';
  readonly ruleId = 'RULE:TOOL_ERROR';

  constructor(message: string, readonly filename: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ToolError';
  }
}
