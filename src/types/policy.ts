import type { ActionKind } from './intent.js';

export interface Policy {
  readonly name: string;
  readonly version: string;
  readonly hash: string;
  readonly allowedActionKinds: ReadonlySet<ActionKind>;
  readonly allowedBaseDirectory: string;
  readonly blockedKeywordClusters: readonly ReadonlySet<string>[];
  readonly blockedPatterns: readonly RegExp[];
  readonly maxPathDepth: number;
  readonly allowSubdirectories: boolean;
}

// On-disk rule document, as written in policies/*.yaml
export interface PolicyDocument {
  name: string;
  version: string;
  allowed_action_kinds: ActionKind[];
  allowed_base_directory: string;
  blocked_keyword_clusters: string[][];
  blocked_patterns: string[];
  max_path_depth: number;
  allow_subdirectories: boolean;
}
