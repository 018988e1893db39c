import { z } from 'zod';
import { createLogger, type Logger } from '../logger.js';
import {
  ACTION_KINDS,
  type ActionKind,
  type BlockRuleId,
  type MissionImage,
  type Severity,
  type TriageClassification
} from '../types/index.js';
import type { InferenceClient } from './router.js';

export type ReasonerResult<T> = { ok: true; value: T } | { ok: false; error: string };

/** What the commander tells the reasoner after a repairable block. */
export interface CorrectionRequest {
  missionText: string;
  targetDirectory: string;
  actionKind: ActionKind;
  ruleId: BlockRuleId;
  reason: string;
  allowedActionKinds: ActionKind[];
  allowedBaseDirectory: string;
  attempt: number;
}

export interface Correction {
  missionText: string;
  targetDirectory?: string;
  actionKind?: ActionKind;
}

export interface Reasoner {
  classify(text: string, image?: MissionImage, signal?: AbortSignal): Promise<ReasonerResult<TriageClassification>>;
  regenerate(request: CorrectionRequest, signal?: AbortSignal): Promise<ReasonerResult<Correction>>;
}

const TRIAGE_SYSTEM_PROMPT = `You are a triage assistant for a disaster logistics command. Your only role is to analyse emergency situation reports and produce a structured JSON triage summary for logistics use.

Output ONLY a JSON object with these keys:
{
  "severity": "CRITICAL" | "HIGH" | "MEDIUM" | "LOW",
  "category": string (e.g. "flood", "earthquake"),
  "recommended_actions": [logistics steps, max 5],
  "affected_zones": [zone identifiers],
  "confidence": number between 0.0 and 1.0
}

If an image is provided, factor the visible damage into the severity.
Do NOT include medical advice, treatment plans, or clinical diagnoses.
No preamble, no explanation, no markdown fences.`;

const CORRECTION_SYSTEM_PROMPT = `You are a correction assistant for a disaster logistics command. A proposed dispatch action was blocked by policy. Your job is to rewrite the proposal so it complies.

Rules:
1. Keep the operational meaning of the mission intact
2. Only use an allowed action kind
3. Only target the allowed base directory, never a parent or sibling of it
4. Do not add medical, treatment or dosage content
5. Be concise

Output ONLY a JSON object: {"mission": string, "target_directory": string, "action_kind": string}`;

const STUB_ACTIONS = [
  'Deploy rapid-response logistics unit',
  'Establish supply corridor',
  'Activate zone command centre'
];

export function stubClassification(): TriageClassification {
  return {
    severity: 'HIGH',
    category: 'logistics',
    recommendedActions: [...STUB_ACTIONS],
    affectedZones: ['zone_unspecified'],
    confidence: 0.75,
    source: 'stub'
  };
}

/** Drops a surrounding ``` fence (with or without a language tag). */
export function stripFences(raw: string): string {
  const text = raw.trim();
  if (!text.startsWith('```')) return text;

  const newline = text.indexOf('\n');
  const body = newline === -1 ? '' : text.slice(newline + 1);
  const close = body.lastIndexOf('```');
  return (close === -1 ? body : body.slice(0, close)).trim();
}

function parseJson(raw: string): ReasonerResult<unknown> {
  const text = stripFences(raw);
  if (!text) return { ok: false, error: 'Empty reasoner response' };
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false, error: 'Reasoner returned non-JSON output' };
  }
}

const severitySchema = z
  .string()
  .transform(value => value.trim().toUpperCase())
  .pipe(z.enum(['CRITICAL', 'HIGH', 'MEDIUM', 'LOW']));

const triageSchema = z.object({
  severity: severitySchema,
  category: z.string().min(1).default('unknown'),
  recommended_actions: z.array(z.string()).transform(actions => actions.slice(0, 5)),
  affected_zones: z.array(z.string()).default([]),
  confidence: z.number().min(0).max(1)
});

const correctionSchema = z.object({
  mission: z.string().trim().min(1),
  target_directory: z.string().min(1).optional(),
  action_kind: z.enum(ACTION_KINDS).optional()
});

function describeIssues(error: z.ZodError): string {
  return error.issues.map(issue => issue.path.join('.') || issue.message).join(', ');
}

export function parseTriage(raw: string): ReasonerResult<TriageClassification> {
  const json = parseJson(raw);
  if (!json.ok) return json;

  const parsed = triageSchema.safeParse(json.value);
  if (!parsed.success) {
    return { ok: false, error: `Malformed triage: ${describeIssues(parsed.error)}` };
  }

  const severity: Severity = parsed.data.severity;
  return {
    ok: true,
    value: {
      severity,
      category: parsed.data.category,
      recommendedActions: parsed.data.recommended_actions,
      affectedZones: parsed.data.affected_zones,
      confidence: parsed.data.confidence,
      source: 'reasoner'
    }
  };
}

export function parseCorrection(raw: string): ReasonerResult<Correction> {
  const json = parseJson(raw);
  if (!json.ok) return json;

  const parsed = correctionSchema.safeParse(json.value);
  if (!parsed.success) {
    return { ok: false, error: `Malformed correction: ${describeIssues(parsed.error)}` };
  }

  return {
    ok: true,
    value: {
      missionText: parsed.data.mission,
      targetDirectory: parsed.data.target_directory,
      actionKind: parsed.data.action_kind
    }
  };
}

export function renderCorrectionPrompt(request: CorrectionRequest): string {
  return [
    `Blocked proposal (attempt ${request.attempt}, ${request.ruleId}): ${request.reason}`,
    '',
    `Mission: ${request.missionText}`,
    `Proposed action kind: ${request.actionKind}`,
    `Proposed target directory: ${request.targetDirectory}`,
    '',
    `Allowed action kinds: ${request.allowedActionKinds.join(', ')}`,
    `Allowed base directory: ${request.allowedBaseDirectory}`,
    '',
    'Rewrite the proposal to comply:'
  ].join('\n');
}

export interface LlmReasonerOptions {
  backend?: string;
  logger?: Logger;
}

/** Reasoner backed by the inference router. Never throws; failures come back as `{ ok: false }`. */
export class LlmReasoner implements Reasoner {
  private backend?: string;
  private logger: Logger;

  constructor(private client: InferenceClient, options: LlmReasonerOptions = {}) {
    this.backend = options.backend;
    this.logger = options.logger ?? createLogger('reasoner');
  }

  async classify(text: string, image?: MissionImage, signal?: AbortSignal): Promise<ReasonerResult<TriageClassification>> {
    return this.call('classify', async () => {
      const response = await this.client.infer({
        input: text,
        systemPrompt: TRIAGE_SYSTEM_PROMPT,
        image,
        maxTokens: 512,
        temperature: 0.1,
        signal
      }, this.backend);
      this.logger.debug({ model: response.model, latencyMs: response.latencyMs }, 'Triage response received');
      return parseTriage(response.output);
    });
  }

  async regenerate(request: CorrectionRequest, signal?: AbortSignal): Promise<ReasonerResult<Correction>> {
    return this.call('regenerate', async () => {
      const response = await this.client.infer({
        input: renderCorrectionPrompt(request),
        systemPrompt: CORRECTION_SYSTEM_PROMPT,
        maxTokens: 512,
        temperature: 0.3,
        signal
      }, this.backend);
      this.logger.debug({ model: response.model, latencyMs: response.latencyMs }, 'Correction response received');
      return parseCorrection(response.output);
    });
  }

  private async call<T>(operation: string, run: () => Promise<ReasonerResult<T>>): Promise<ReasonerResult<T>> {
    try {
      const result = await run();
      if (!result.ok) {
        this.logger.warn({ operation, error: result.error }, 'Reasoner output rejected');
      }
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn({ operation, error: message }, 'Reasoner call failed');
      return { ok: false, error: message };
    }
  }
}
