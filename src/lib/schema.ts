/**
 * JSON Schema validation utilities using Ajv.
 *
 * Schemas live in the package-level `schemas/` directory.
 */

import AjvDefault from 'ajv';
import type { ValidateFunction } from 'ajv';
import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { join } from 'node:path';

/** Directory holding the bundled JSON schemas */
export const SCHEMA_DIR = fileURLToPath(new URL('../../schemas/', import.meta.url));

/**
 * Result of schema validation.
 */
export interface ValidationResult<T> {
  /** Whether the data is valid */
  valid: boolean;
  /** Typed data if valid, null otherwise */
  data: T | null;
  /** Validation error messages if invalid */
  errors: string[];
}

// Compiled validators keyed by schema $id
const schemaCache = new Map<string, ValidateFunction>();

/**
 * Loads and parses a schema file from SCHEMA_DIR.
 *
 * @param fileName - File name such as "config.schema.json"
 * @throws Error if the schema file cannot be read or parsed
 */
export async function loadSchema(fileName: string): Promise<object> {
  const schemaPath = join(SCHEMA_DIR, fileName);
  try {
    const content = await readFile(schemaPath, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    if (typeof parsed !== 'object' || parsed === null) {
      throw new Error('schema is not an object');
    }
    return parsed;
  } catch (error) {
    throw new Error(
      `Failed to load schema from ${schemaPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

function compile(schema: object): ValidateFunction {
  const schemaId = '$id' in schema && typeof schema.$id === 'string' ? schema.$id : JSON.stringify(schema);
  const cached = schemaCache.get(schemaId);
  if (cached) {
    return cached;
  }

  // Type assertion needed due to NodeNext module resolution
  const Ajv = AjvDefault as unknown as new (options?: { strict?: boolean; allErrors?: boolean }) => {
    compile: (schema: object) => ValidateFunction;
  };
  const ajv = new Ajv({ strict: true, allErrors: true });
  const validate = ajv.compile(schema);
  schemaCache.set(schemaId, validate);
  return validate;
}

/**
 * Validates data against a JSON schema.
 *
 * The type parameter is trusted: the schema must describe T.
 *
 * @param data - Data to validate
 * @param schema - JSON schema object
 * @returns ValidationResult with typed data or error messages
 */
export function validateWithSchema<T>(data: unknown, schema: object): ValidationResult<T> {
  const validate = compile(schema);

  if (validate(data)) {
    return {
      valid: true,
      data: data as T,
      errors: [],
    };
  }

  const errors = (validate.errors ?? []).map((error) => {
    const path = error.instancePath || error.schemaPath || '';
    const message = error.message || 'Validation error';
    return `${path ? `${path}: ` : ''}${message}`;
  });

  return {
    valid: false,
    data: null,
    errors,
  };
}
