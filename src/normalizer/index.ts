export type { NormalizerOptions, TextProcessor } from './normalizer.js';

export {
  TextNormalizer,
  normalize,
  stripMarkup,
  collapseWhitespace,
  collapseBlankLines,
  lowercase,
  removePatterns,
  DEFAULT_NORMALIZER_OPTIONS,
} from './normalizer.js';
