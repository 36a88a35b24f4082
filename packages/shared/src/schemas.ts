/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for job records, pattern tables and API responses.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { ValidateFunction } from 'ajv';
import { logger } from './logger';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
});

const SCHEMA_FILES = {
  jobRecord: 'job_record.schema.json',
  patternTable: 'pattern_table.schema.json',
  parseResponse: 'parse_response.schema.json',
} as const;

type SchemaName = keyof typeof SCHEMA_FILES;

export function resolveContractsDir(): string {
  const candidates = [
    // packages/shared/src -> repo root
    path.join(__dirname, '../../../docs/contracts'),
    // dist/packages/shared/src -> repo root
    path.join(__dirname, '../../../../docs/contracts'),
    path.join(process.cwd(), 'docs/contracts'),
  ];

  const found = candidates.find((dir) => fs.existsSync(path.join(dir, SCHEMA_FILES.jobRecord)));
  if (!found) {
    throw new Error(`Schema contracts not found (looked in ${candidates.join(', ')})`);
  }
  return found;
}

function isSchemaWithId(value: unknown): value is { $id: string } {
  return typeof value === 'object' && value !== null && '$id' in value && typeof value.$id === 'string';
}

function registerSchema(dir: string, file: string): string {
  const schema: unknown = JSON.parse(fs.readFileSync(path.join(dir, file), 'utf-8'));
  if (!isSchemaWithId(schema)) {
    throw new Error(`Schema ${file} has no $id`);
  }
  ajv.addSchema(schema);
  return schema.$id;
}

function getCompiled(id: string): ValidateFunction {
  const validateFn = ajv.getSchema(id);
  if (!validateFn) throw new Error(`Schema ${id} failed to register`);
  return validateFn;
}

// Loaded lazily on first use; all schemas are registered before compiling so $refs resolve
let validators: Record<SchemaName, ValidateFunction> | null = null;

function getValidators(): Record<SchemaName, ValidateFunction> {
  if (validators) return validators;

  const dir = resolveContractsDir();
  const ids: Record<SchemaName, string> = {
    jobRecord: registerSchema(dir, SCHEMA_FILES.jobRecord),
    patternTable: registerSchema(dir, SCHEMA_FILES.patternTable),
    parseResponse: registerSchema(dir, SCHEMA_FILES.parseResponse),
  };

  validators = {
    jobRecord: getCompiled(ids.jobRecord),
    patternTable: getCompiled(ids.patternTable),
    parseResponse: getCompiled(ids.parseResponse),
  };
  return validators;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

function validate(name: SchemaName, label: string, data: unknown): ValidationResult {
  const validateFn = getValidators()[name];
  const valid = validateFn(data);

  if (!valid) {
    const errors = validateFn.errors?.map((e) => `${e.instancePath || '/'}: ${e.message}`);
    logger.warn(`${label} validation failed`, { errors });
    return { valid: false, errors };
  }

  return { valid: true };
}

/**
 * Validate a JobRecord against job_record.schema.json
 */
export function validateJobRecord(data: unknown): ValidationResult {
  return validate('jobRecord', 'JobRecord', data);
}

/**
 * Validate a pattern table against pattern_table.schema.json
 */
export function validatePatternTable(data: unknown): ValidationResult {
  return validate('patternTable', 'PatternTable', data);
}

/**
 * Validate an API response envelope against parse_response.schema.json
 */
export function validateParseResponse(data: unknown): ValidationResult {
  return validate('parseResponse', 'ParseResponse', data);
}
