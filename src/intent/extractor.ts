import type { ActionKind, DisasterCategory, Intent } from '../types/index.js';
import { loadDefaultVocabulary, type Vocabulary } from './vocabulary.js';

const TOKEN_PATTERN = /[a-z]+/g;

export interface ExtractOptions {
  actionKind?: ActionKind;
  metadata?: Record<string, unknown>;
  vocabulary?: Vocabulary;
}

/** Lowercase alphabetic tokens, in order of first appearance. */
export function tokenize(text: string): string[] {
  return Array.from(new Set(text.toLowerCase().match(TOKEN_PATTERN) ?? []));
}

export function createIntent(fields: {
  actionKind: ActionKind;
  rawText: string;
  proposedPath?: string;
  category?: DisasterCategory;
  keywords?: Iterable<string>;
  metadata?: Record<string, unknown>;
}): Intent {
  const keywords = new Set<string>();
  for (const keyword of fields.keywords ?? []) {
    const normalized = keyword.trim().toLowerCase();
    if (normalized) keywords.add(normalized);
  }

  return Object.freeze({
    actionKind: fields.actionKind,
    rawText: fields.rawText,
    proposedPath: fields.proposedPath,
    category: fields.category ?? 'unknown',
    keywords,
    metadata: Object.freeze({ ...fields.metadata })
  });
}

export function extractIntent(rawText: string, proposedPath?: string, options: ExtractOptions = {}): Intent {
  const vocabulary = options.vocabulary ?? loadDefaultVocabulary();
  const tokens = tokenize(rawText);

  const keywords = tokens.filter(token =>
    vocabulary.sensitive.has(token) || vocabulary.categories.has(token)
  );

  let category: DisasterCategory = 'unknown';
  for (const token of tokens) {
    const match = vocabulary.categories.get(token);
    if (match) {
      category = match;
      break;
    }
  }

  return createIntent({
    actionKind: options.actionKind ?? 'WriteDispatchLog',
    rawText,
    proposedPath,
    category,
    keywords,
    metadata: options.metadata
  });
}
