export { extractIntent, createIntent, tokenize, type ExtractOptions } from './extractor.js';
export { loadDefaultVocabulary, parseVocabulary, type Vocabulary } from './vocabulary.js';
export { detectHighVolume, extractQuantities, DEFAULT_HIGH_VOLUME_THRESHOLD } from './volume.js';
