/**
 * Job Notice Pattern Table
 *
 * Ordered candidate patterns per field for the regex tier, most specific first.
 * The table is configuration: the default lives in patterns/job-notice.patterns.json
 * and PATTERN_TABLE_PATH swaps in another file with the same shape.
 *
 * Section patterns read "until the next numbered section": a line starting
 * with `<n>.0 ` (e.g. "6.0 EDUCATIONAL QUALIFICATIONS") or the end of the text.
 */

import fs from 'fs';
import path from 'path';
import { JOB_FIELDS, type JobField } from '../types';
import { PatternTableError } from '../errors';
import { validatePatternTable, type ValidationResult } from '../schemas';
import { compileFieldPattern, type FieldPattern, type FieldPatternSpec } from './field-matcher';
import { config } from '../config';
import { logger } from '../logger';

export type PatternTableSpec = Record<JobField, FieldPatternSpec[]>;

export type PatternTable = Readonly<Record<JobField, readonly FieldPattern[]>>;

export const DEFAULT_PATTERN_FILE = 'job-notice.patterns.json';

function resolveDefaultPatternPath(): string {
  const candidates = [
    // packages/shared/src/extractors -> packages/shared/patterns
    path.join(__dirname, '../../patterns', DEFAULT_PATTERN_FILE),
    // dist/packages/shared/src/extractors -> packages/shared/patterns
    path.join(__dirname, '../../../../../packages/shared/patterns', DEFAULT_PATTERN_FILE),
    path.join(process.cwd(), 'packages/shared/patterns', DEFAULT_PATTERN_FILE),
  ];

  const found = candidates.find((candidate) => fs.existsSync(candidate));
  if (!found) {
    throw new PatternTableError(`Default pattern table not found (looked in ${candidates.join(', ')})`);
  }
  return found;
}

function isPatternTableSpec(data: unknown, result: ValidationResult): data is PatternTableSpec {
  return result.valid;
}

/**
 * Validate and compile a pattern table spec.
 * Throws PatternTableError when the shape is wrong or a pattern does not compile.
 */
export function compilePatternTable(data: unknown): PatternTable {
  const result = validatePatternTable(data);
  if (!isPatternTableSpec(data, result)) {
    throw new PatternTableError(`Invalid pattern table: ${(result.errors ?? []).join('; ')}`);
  }

  const compile = (field: JobField): readonly FieldPattern[] =>
    Object.freeze(
      data[field].map((spec, index) => {
        try {
          return compileFieldPattern(spec);
        } catch (error) {
          throw new PatternTableError(`Pattern ${field}[${index}] does not compile: ${spec.pattern}`, {
            cause: error,
          });
        }
      })
    );

  const table: Record<JobField, readonly FieldPattern[]> = {
    job_title: compile('job_title'),
    department: compile('department'),
    vacancies: compile('vacancies'),
    eligibility: compile('eligibility'),
    salary: compile('salary'),
    application_deadline: compile('application_deadline'),
    application_url: compile('application_url'),
  };

  return Object.freeze(table);
}

/**
 * Read, validate and compile a pattern table file
 */
export function loadPatternTable(filePath: string): PatternTable {
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new PatternTableError(`Cannot read pattern table ${filePath}`, { cause: error });
  }

  const table = compilePatternTable(data);

  logger.debug('Pattern table loaded', {
    path: filePath,
    pattern_counts: Object.fromEntries(JOB_FIELDS.map((field) => [field, table[field].length])),
  });

  return table;
}

let defaultTable: PatternTable | null = null;

/**
 * The process-wide pattern table: PATTERN_TABLE_PATH if set, else the bundled default.
 * Loaded once and shared read-only.
 */
export function getDefaultPatternTable(): PatternTable {
  if (!defaultTable) {
    defaultTable = loadPatternTable(config.patternTablePath || resolveDefaultPatternPath());
  }
  return defaultTable;
}
