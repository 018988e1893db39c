import { readFileSync } from 'fs';
import { isAbsolute, resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { Policy, PolicyDocument } from '../types/index.js';
import { ACTION_KINDS } from '../types/index.js';
import { hashObject } from '../crypto/hasher.js';

// Cluster terms are matched against /[a-z]+/ tokens, so anything else could never fire
const clusterTermSchema = z.string().regex(/^[a-z]+$/i, 'cluster terms must be single alphabetic words');

const policyDocumentSchema = z.object({
  name: z.string().min(1),
  version: z.string().regex(/^\d+\.\d+\.\d+$/),
  allowed_action_kinds: z.array(z.enum(ACTION_KINDS)).min(1),
  allowed_base_directory: z.string().min(1),
  blocked_keyword_clusters: z.array(z.array(clusterTermSchema).min(1)).default([]),
  blocked_patterns: z.array(z.string().min(1)).default([]),
  max_path_depth: z.number().int().min(1),
  allow_subdirectories: z.boolean()
}).strict();

export class PolicyLoadError extends Error {
  constructor(message: string, readonly source: string) {
    super(message);
    this.name = 'PolicyLoadError';
  }
}

function compilePattern(source: string, origin: string): RegExp {
  try {
    // No 'g' flag: a shared global regex would carry lastIndex between missions
    return new RegExp(source, 'i');
  } catch {
    throw new PolicyLoadError(`Invalid blocked pattern: ${source}`, origin);
  }
}

function compile(raw: unknown, origin: string, baseDir: string): Policy {
  const parsed = policyDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new PolicyLoadError(`Invalid policy document: ${issues.join('; ')}`, origin);
  }
  const doc = parsed.data;

  const allowedBaseDirectory = isAbsolute(doc.allowed_base_directory)
    ? resolve(doc.allowed_base_directory)
    : resolve(baseDir, doc.allowed_base_directory);

  const canonical: PolicyDocument = { ...doc, allowed_base_directory: allowedBaseDirectory };

  return Object.freeze({
    name: doc.name,
    version: doc.version,
    hash: hashObject(canonical),
    allowedActionKinds: new Set(doc.allowed_action_kinds),
    allowedBaseDirectory,
    blockedKeywordClusters: Object.freeze(
      doc.blocked_keyword_clusters.map(cluster => new Set(cluster.map(term => term.toLowerCase())))
    ),
    blockedPatterns: Object.freeze(doc.blocked_patterns.map(p => compilePattern(p, origin))),
    maxPathDepth: doc.max_path_depth,
    allowSubdirectories: doc.allow_subdirectories
  });
}

/**
 * Build a frozen Policy from a rule document. Relative base directories are
 * resolved against `baseDir` (defaults to the process working directory).
 */
export function createPolicy(document: PolicyDocument, origin: string = '<inline>', baseDir: string = process.cwd()): Policy {
  return compile(document, origin, baseDir);
}

export function loadPolicyFile(path: string): Policy {
  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new PolicyLoadError(`Cannot read policy: ${error instanceof Error ? error.message : String(error)}`, path);
  }
  return compile(raw, path, process.cwd());
}

export function loadPolicy(directory: string, name: string): Policy {
  return loadPolicyFile(resolve(directory, `${name}.yaml`));
}

export function toPolicyDocument(policy: Policy): PolicyDocument {
  return {
    name: policy.name,
    version: policy.version,
    allowed_action_kinds: [...policy.allowedActionKinds],
    allowed_base_directory: policy.allowedBaseDirectory,
    blocked_keyword_clusters: policy.blockedKeywordClusters.map(cluster => [...cluster]),
    blocked_patterns: policy.blockedPatterns.map(pattern => pattern.source),
    max_path_depth: policy.maxPathDepth,
    allow_subdirectories: policy.allowSubdirectories
  };
}

/** Dev/production directory switch: always a new Policy, never a mutation. */
export function withBaseDirectory(policy: Policy, directory: string): Policy {
  return createPolicy({ ...toPolicyDocument(policy), allowed_base_directory: resolve(directory) });
}
