import { readFileSync } from 'fs';
import { z } from 'zod';
import { isDisasterCategory, type DisasterCategory } from '../types/index.js';

export interface Vocabulary {
  readonly sensitive: ReadonlySet<string>;
  readonly categories: ReadonlyMap<string, DisasterCategory>;
}

const vocabularyFileSchema = z.object({
  version: z.string(),
  sensitive: z.array(z.string().min(1)),
  categories: z.record(z.string().refine(isDisasterCategory, { message: 'Unknown disaster category' }))
});

export function parseVocabulary(raw: unknown): Vocabulary {
  const file = vocabularyFileSchema.parse(raw);
  const categories = new Map<string, DisasterCategory>();
  for (const [token, category] of Object.entries(file.categories)) {
    if (isDisasterCategory(category)) {
      categories.set(token.toLowerCase(), category);
    }
  }

  return Object.freeze({
    sensitive: new Set(file.sensitive.map(term => term.toLowerCase())),
    categories
  });
}

let defaultVocabulary: Vocabulary | undefined;

export function loadDefaultVocabulary(): Vocabulary {
  if (!defaultVocabulary) {
    const url = new URL('../../config/vocabulary.json', import.meta.url);
    defaultVocabulary = parseVocabulary(JSON.parse(readFileSync(url, 'utf-8')));
  }
  return defaultVocabulary;
}
