/**
 * Regex Extraction Strategy
 *
 * The fallback tier. Deterministic, offline, and always returns a record
 * for any text: fields without a match become NOT_SPECIFIED.
 */

import { JOB_FIELDS, createJobRecord, type JobFields, type JobRecord } from '../types';
import { BaseExtractor } from './base-extractor';
import type { ExtractionStrategy, ExtractorResult } from './types';
import { matchField } from './field-matcher';
import { getDefaultPatternTable, type PatternTable } from './patterns';

/**
 * Clean PDF-to-text output for matching: trim, collapse any whitespace around a
 * line break into a single newline, collapse other whitespace runs to one space.
 */
export function normalizeWhitespace(text: string): string {
  return text.trim().replace(/\s*\n\s*/g, '\n').replace(/[^\S\n]+/g, ' ');
}

/**
 * Extract a JobRecord with the pattern table. Each field is matched on its own;
 * raw_text is the head of the normalized text.
 */
export function extractFallback(text: string, table: PatternTable = getDefaultPatternTable()): Readonly<JobRecord> {
  const cleaned = normalizeWhitespace(text);

  const fields: Partial<JobFields> = {};
  for (const field of JOB_FIELDS) {
    const value = matchField(cleaned, table[field]);
    if (value !== null) fields[field] = value;
  }

  return createJobRecord(fields, cleaned);
}

export class RegexExtractor extends BaseExtractor {
  readonly strategy: ExtractionStrategy = 'regex';
  readonly description = 'Pattern table extraction over normalized text';

  constructor(private readonly table: PatternTable = getDefaultPatternTable()) {
    super();
  }

  protected async extractImpl(text: string): Promise<ExtractorResult> {
    return {
      record: extractFallback(text, this.table),
      extractionMethod: 'regex',
      metadata: {},
    };
  }
}
