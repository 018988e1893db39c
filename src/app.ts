import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { basename, isAbsolute } from 'path';
import { z } from 'zod';
import type { ServiceConfig } from './config.js';
import { isImageMediaType } from './inference/router.js';
import { createLogger, type Logger } from './logger.js';
import { sanitizeMission } from './sanitize/input.js';
import { ACTION_KINDS } from './types/index.js';
import type { AuditRecord, MissionRequest, MissionResult, MissionStatus, Policy } from './types/index.js';
import { SERVICE_VERSION } from './version.js';

export interface MissionRunner {
  runMission(request: MissionRequest, options?: { signal?: AbortSignal }): Promise<MissionResult>;
}

export interface AuditReader {
  tail(limit: number): AuditRecord[];
  verify(): { valid: boolean; errors: string[] };
}

export interface AppDeps {
  config: ServiceConfig;
  commander: MissionRunner;
  audit: AuditReader;
  policy: Policy;
  backends: string[];
  logger?: Logger;
}

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

const missionBodySchema = z.object({
  mission: z.string(),
  image: z.object({
    data: z.string().regex(BASE64_PATTERN, 'image data must be base64'),
    mime_type: z.string().refine(isImageMediaType, 'unsupported image type')
  }).optional(),
  target_directory: z.string().min(1).optional(),
  action_kind: z.enum(ACTION_KINDS).optional(),
  confirm_high_volume: z.boolean().optional()
}).strict();

const auditQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50)
});

export function httpStatusFor(status: MissionStatus): number {
  switch (status) {
    case 'SUCCESS':
    case 'SUCCESS_AFTER_REFLECTION':
    case 'ROUTED_TO_MEDICAL':
    case 'PENDING_CONFIRMATION':
      return 200;
    case 'BLOCKED_BY_SHIELD':
    case 'BLOCKED_BY_SUB_AGENT':
      return 403;
    case 'TOOL_ERROR':
      return 500;
  }
}

/** Reduce backticked absolute paths in a reason to their basename. */
export function redactPaths(message: string): string {
  return message.replace(/`([^`]+)`/g, (quoted, inner: string) => (isAbsolute(inner) ? `\`${basename(inner)}\`` : quoted));
}

export function toResponseBody(result: MissionResult): Record<string, unknown> {
  return {
    status: result.status,
    mission_id: result.missionId,
    mission: result.mission,
    reflection_attempts: result.reflectionAttempts,
    category: result.category,
    result: result.result,
    filename: result.filename,
    rule_id: result.ruleId,
    error: result.error && redactPaths(result.error),
    triage: result.triage && {
      severity: result.triage.severity,
      category: result.triage.category,
      recommended_actions: result.triage.recommendedActions,
      affected_zones: result.triage.affectedZones,
      confidence: result.triage.confidence,
      source: result.triage.source
    }
  };
}

// '*' in a configured origin matches any run of characters
export function originMatcher(allowed: string): string | RegExp {
  if (!allowed.includes('*')) return allowed;
  const escaped = allowed.split('*').map(part => part.replace(/[.+?^${}()|[\]\\/]/g, '\\$&'));
  return new RegExp('^' + escaped.join('.*') + '$');
}

function issueList(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`);
}

export async function buildApp(deps: AppDeps): Promise<FastifyInstance> {
  const { config, commander, audit, policy } = deps;
  const logger = deps.logger ?? createLogger('http');
  const apiKeys = new Set(config.auth.api_keys);

  const app = Fastify({ logger: false });

  await app.register(cors, {
    origin: config.auth.allowed_origins.map(originMatcher),
    credentials: true
  });

  await app.register(rateLimit, {
    max: config.rate_limits.requests_per_second * 60,
    timeWindow: '1 minute'
  });

  // Internal detail stays in the log; clients get a generic message
  app.setErrorHandler((error, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      logger.error({ err: error, url: request.url }, 'Request failed');
      return reply.status(500).send({ error: 'Internal error' });
    }
    return reply.status(statusCode).send({ error: error.message });
  });

  async function requireApiKey(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | undefined> {
    const header = request.headers.authorization;
    const apiKey = header?.startsWith('Bearer ') ? header.slice('Bearer '.length) : undefined;
    if (!apiKey || !apiKeys.has(apiKey)) {
      logger.warn({ url: request.url }, 'Rejected request: invalid or missing API key');
      return reply.status(401).send({ error: 'Invalid or missing API key' });
    }
    return undefined;
  }

  app.get('/api/health', async () => {
    const auditVerification = audit.verify();
    return {
      status: 'healthy',
      version: SERVICE_VERSION,
      backends: deps.backends,
      policy: { name: policy.name, version: policy.version },
      audit_log_valid: auditVerification.valid
    };
  });

  app.post('/api/missions', { preHandler: requireApiKey }, async (request, reply) => {
    const body = missionBodySchema.safeParse(request.body);
    if (!body.success) {
      reply.status(400);
      return { error: 'Invalid request body', issues: issueList(body.error) };
    }

    const sanitized = sanitizeMission(body.data.mission, config.rate_limits.max_input_chars);
    if (!sanitized.ok) {
      logger.warn({ reason: sanitized.reason }, 'Mission rejected by input sanitizer');
      reply.status(400);
      return { error: sanitized.reason };
    }

    const { image } = body.data;
    const controller = new AbortController();
    const onClose = (): void => {
      if (!reply.raw.writableEnded) controller.abort(new Error('Client disconnected'));
    };
    reply.raw.once('close', onClose);

    try {
      const result = await commander.runMission({
        mission: sanitized.text,
        image: image && { data: Buffer.from(image.data, 'base64'), mimeType: image.mime_type },
        targetDirectory: body.data.target_directory,
        actionKind: body.data.action_kind,
        confirmHighVolume: body.data.confirm_high_volume
      }, { signal: controller.signal });

      logger.info({ missionId: result.missionId, status: result.status, ruleId: result.ruleId }, 'Mission processed');
      reply.status(httpStatusFor(result.status));
      return toResponseBody(result);
    } finally {
      reply.raw.off('close', onClose);
    }
  });

  app.get('/api/audit', { preHandler: requireApiKey }, async (request, reply) => {
    const query = auditQuerySchema.safeParse(request.query);
    if (!query.success) {
      reply.status(400);
      return { error: 'Invalid query', issues: issueList(query.error) };
    }

    return { records: audit.tail(query.data.limit) };
  });

  return app;
}
