import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

const backendSchema = z.object({
  name: z.string().min(1),
  type: z.enum(['anthropic', 'ollama']),
  model: z.string().min(1),
  base_url: z.string().url().optional()
});

const home = homedir();

// Leading ~ is the home directory; relative paths resolve against the working directory
export function expandPath(path: string): string {
  if (path === '~') return home;
  if (path.startsWith('~/')) return resolve(home, path.slice(2));
  return resolve(path);
}

const pathSchema = z.string().min(1).transform(expandPath);

const configSchema = z.object({
  server: z.object({
    port: z.number().int().positive().default(8088),
    host: z.string().default('127.0.0.1')
  }).default({}),
  auth: z.object({
    api_keys: z.array(z.string().min(1)).default([]),
    allowed_origins: z.array(z.string()).default(['http://localhost:*'])
  }).default({}),
  rate_limits: z.object({
    requests_per_second: z.number().positive().default(10),
    max_input_chars: z.number().int().positive().default(1000)
  }).default({}),
  inference: z.object({
    backends: z.array(backendSchema).default([
      { name: 'claude', type: 'anthropic', model: 'claude-3-5-haiku-latest' },
      { name: 'local', type: 'ollama', model: 'mistral' }
    ]),
    default: z.string().default('claude'),
    timeout_ms: z.number().int().positive().default(20_000)
  }).default({}),
  oracle: z.object({
    url: z.string().url().optional(),
    timeout_ms: z.number().int().positive().default(3_000)
  }).default({}),
  workspace: z.object({
    dispatch_dir: pathSchema.default(resolve(process.cwd(), 'workspace', 'outgoing_dispatch')),
    medical_dir: pathSchema.default(resolve(process.cwd(), 'workspace', 'medical_logs'))
  }).default({}),
  crypto: z.object({
    key_dir: pathSchema.default(resolve(home, '.dispatch-shield', 'keys')),
    audit_log: pathSchema.default(resolve(home, '.dispatch-shield', 'logs', 'audit.jsonl'))
  }).default({}),
  policies: z.object({
    directory: pathSchema.default(resolve(process.cwd(), 'policies')),
    default: z.string().default('default')
  }).default({}),
  missions: z.object({
    high_volume_threshold: z.number().int().positive().default(1000),
    max_reflection_attempts: z.number().int().min(0).max(5).default(2)
  }).default({})
});

export type ServiceConfig = z.infer<typeof configSchema>;
export type BackendConfig = z.infer<typeof backendSchema>;

export const CONFIG_SEARCH_PATHS = [
  resolve(process.cwd(), 'dispatch-shield.yaml'),
  resolve(home, '.dispatch-shield', 'config.yaml'),
  resolve(home, '.config', 'dispatch-shield', 'config.yaml')
];

export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const config = configSchema.parse(raw ?? {});

  if (env.DISPATCH_SHIELD_API_KEY) {
    config.auth.api_keys = [...config.auth.api_keys, env.DISPATCH_SHIELD_API_KEY];
  }
  if (env.DISPATCH_SHIELD_ORACLE_URL) {
    config.oracle.url = env.DISPATCH_SHIELD_ORACLE_URL;
  }

  return config;
}

export function loadConfig(paths: string[] = CONFIG_SEARCH_PATHS): ServiceConfig {
  for (const path of paths) {
    if (existsSync(path)) {
      return parseConfig(parseYaml(readFileSync(path, 'utf-8')));
    }
  }
  return parseConfig({});
}
