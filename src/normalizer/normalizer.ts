import { composeProcessors, type Processor } from '../utils/compose.js';

export type TextProcessor = Processor<string>;

/**
 * Toggles for each normalization step.
 */
export interface NormalizerOptions {
  /** Replace markup tags with a space. Disable when the caller already extracted text from a DOM */
  stripMarkup: boolean;
  /** Collapse runs of spaces and tabs to one space */
  collapseWhitespace: boolean;
  /** Trim every line and collapse runs of blank lines to one paragraph break */
  collapseBlankLines: boolean;
  /** Fold to lower case */
  lowercase: boolean;
  /** Patterns removed after markup stripping */
  removePatterns: RegExp[];
  /** Extra stages appended after the built-in ones */
  processors: TextProcessor[];
}

export const DEFAULT_NORMALIZER_OPTIONS: NormalizerOptions = {
  stripMarkup: true,
  collapseWhitespace: true,
  collapseBlankLines: true,
  lowercase: false,
  removePatterns: [],
  processors: [],
};

export const stripMarkup: TextProcessor = (text) =>
  text
    .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, ' ')
    .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, ' ')
    .replace(/<[^>]+>/g, ' ');

export const collapseWhitespace: TextProcessor = (text) => text.replace(/[^\S\r\n]+/g, ' ');

export const collapseBlankLines: TextProcessor = (text) =>
  text
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.trim())
    .join('\n')
    .replace(/\n{2,}/g, '\n\n')
    .trim();

export const lowercase: TextProcessor = (text) => text.toLowerCase();

export function removePatterns(patterns: readonly RegExp[]): TextProcessor {
  return (text) =>
    patterns.reduce((current, pattern) => {
      // Without the global flag replace() would only drop the first match
      const global = pattern.global ? pattern : new RegExp(pattern.source, `${pattern.flags}g`);
      return current.replace(global, '');
    }, text);
}

/**
 * Text Normalizer - strips markup and normalizes whitespace in extracted text.
 * Pure: output depends only on the input and the options.
 */
export class TextNormalizer {
  private readonly options: NormalizerOptions;
  private readonly run: TextProcessor;

  constructor(options: Partial<NormalizerOptions> = {}) {
    this.options = { ...DEFAULT_NORMALIZER_OPTIONS, ...options };
    this.run = composeProcessors(this.buildStages());
  }

  /**
   * Normalize raw text. Non-string input is returned unchanged.
   */
  normalize(raw: string): string;
  normalize(raw: unknown): unknown;
  normalize(raw: unknown): unknown {
    if (typeof raw !== 'string') {
      console.warn(`[Normalizer] Expected a string but received ${describeType(raw)}, returning input unchanged`);
      return raw;
    }
    return this.run(raw);
  }

  getOptions(): Readonly<NormalizerOptions> {
    return this.options;
  }

  private buildStages(): TextProcessor[] {
    const stages: TextProcessor[] = [];
    if (this.options.stripMarkup) stages.push(stripMarkup);
    if (this.options.removePatterns.length > 0) stages.push(removePatterns(this.options.removePatterns));
    if (this.options.collapseWhitespace) stages.push(collapseWhitespace);
    if (this.options.collapseBlankLines) stages.push(collapseBlankLines);
    if (this.options.lowercase) stages.push(lowercase);
    stages.push(...this.options.processors);
    return stages;
  }
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * Normalize with default options.
 */
export function normalize(raw: string, options?: Partial<NormalizerOptions>): string {
  return new TextNormalizer(options).normalize(raw);
}
