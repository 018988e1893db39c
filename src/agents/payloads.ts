import { z } from 'zod';
import { ACTION_KINDS, DISASTER_CATEGORIES } from '../types/index.js';

export const SEVERITIES = ['CRITICAL', 'HIGH', 'MEDIUM', 'LOW'] as const;

const delegationSchema = z.object({
  commander: z.string().min(1),
  sub_agent: z.string().min(1),
  scope: z.string().min(1),
  bounded: z.literal(true)
}).strict();

export const DISPATCH_SCHEMA_VERSION = '2.1.0';

export const dispatchPayloadSchema = z.object({
  schema_version: z.literal(DISPATCH_SCHEMA_VERSION),
  generated_at_utc: z.string().datetime(),
  run_id: z.string().min(1),
  mission_id: z.string().min(1),
  disaster_category: z.enum(DISASTER_CATEGORIES),
  severity: z.enum(SEVERITIES),
  recommended_actions: z.array(z.string()),
  affected_zones: z.array(z.string()),
  confidence: z.number().min(0).max(1),
  mission_briefing: z.string(),
  triage_source: z.enum(['reasoner', 'stub']),
  enforcement: z.object({
    shield_cleared: z.literal(true),
    action_kind: z.enum(ACTION_KINDS),
    rules_checked: z.array(z.string()),
    policy_version: z.string(),
    self_healed: z.boolean(),
    reflection_attempts: z.number().int().min(0)
  }).strict(),
  delegation: delegationSchema
}).strict();

export type DispatchPayload = z.infer<typeof dispatchPayloadSchema>;

export const MEDICAL_SCHEMA_VERSION = '1.0.0';

// Strict: no treatment, prescription or dosage field can ride along
export const medicalRoutingPayloadSchema = z.object({
  schema_version: z.literal(MEDICAL_SCHEMA_VERSION),
  generated_at_utc: z.string().datetime(),
  run_id: z.string().min(1),
  mission_id: z.string().min(1),
  routing_reason: z.string().min(1),
  rule_id: z.literal('RULE:MEDICAL_BLOCK'),
  severity: z.enum(SEVERITIES),
  mission_briefing: z.string(),
  restrictions: z.array(z.string()),
  delegation: delegationSchema
}).strict();

export type MedicalRoutingPayload = z.infer<typeof medicalRoutingPayloadSchema>;
