/**
 * Validation utilities
 * @internal
 */

import type { JSONSchema, ValidationError, ValidationResult } from '../types/public-api.js';

function prefixErrors(key: string, result: ValidationResult, errors: ValidationError[]): void {
  for (const err of result.errors ?? []) {
    errors.push({
      path: err.path ? `${key}.${err.path}` : key,
      message: err.message,
    });
  }
}

/**
 * Validate input against JSON Schema
 *
 * Covers the subset tool schemas use: type (one or a list), properties,
 * required, items, enum, minimum and pattern. Tools parse their input again into typed
 * values; this check only guards the protocol boundary.
 */
export function validateInput(input: unknown, schema: JSONSchema): ValidationResult {
  const types = schema.type;
  if (Array.isArray(types)) {
    const attempts = types.map((type) => validateInput(input, { ...schema, type }));
    const got = Array.isArray(input) ? 'array' : input === null ? 'null' : typeof input;
    return (
      attempts.find((r) => r.valid) ?? {
        valid: false,
        errors: [{ path: '', message: `Expected ${types.join(' or ')}, got ${got}` }],
      }
    );
  }

  const errors: ValidationError[] = [];

  // Validate object type - reject null and arrays explicitly
  if (schema.type === 'object') {
    if (input === null) {
      errors.push({ path: '', message: 'Expected object, got null' });
      return { valid: false, errors };
    }
    if (Array.isArray(input)) {
      errors.push({ path: '', message: 'Expected object, got array' });
      return { valid: false, errors };
    }
    if (typeof input !== 'object') {
      errors.push({ path: '', message: `Expected object, got ${typeof input}` });
      return { valid: false, errors };
    }

    for (const field of schema.required ?? []) {
      if (!Object.hasOwn(input, field)) {
        errors.push({ path: field, message: `Missing required field: ${field}` });
      }
    }

    if (schema.properties) {
      for (const [key, value] of Object.entries(input)) {
        const propSchema = Object.hasOwn(schema.properties, key) ? schema.properties[key] : undefined;
        if (propSchema) {
          prefixErrors(key, validateInput(value, propSchema), errors);
        }
      }
    }
  }

  if (schema.type === 'string') {
    const pattern = schema['pattern'];
    if (typeof input !== 'string') {
      errors.push({ path: '', message: `Expected string, got ${typeof input}` });
    } else if (typeof pattern === 'string' && !new RegExp(pattern).test(input)) {
      errors.push({ path: '', message: `Value does not match pattern ${pattern}` });
    }
  }

  if (schema.type === 'number' || schema.type === 'integer') {
    const minimum = schema['minimum'];
    if (typeof input !== 'number' || Number.isNaN(input)) {
      errors.push({ path: '', message: `Expected ${schema.type}, got ${typeof input}` });
    } else if (schema.type === 'integer' && !Number.isInteger(input)) {
      errors.push({ path: '', message: 'Expected integer, got fractional number' });
    } else if (typeof minimum === 'number' && input < minimum) {
      errors.push({ path: '', message: `Value must be at least ${minimum}` });
    }
  }

  if (schema.type === 'boolean' && typeof input !== 'boolean') {
    errors.push({ path: '', message: `Expected boolean, got ${typeof input}` });
  }

  if (schema.type === 'array') {
    if (!Array.isArray(input)) {
      errors.push({ path: '', message: `Expected array, got ${typeof input}` });
    } else if (schema.items) {
      const itemSchema = schema.items;
      input.forEach((item, index) => {
        prefixErrors(String(index), validateInput(item, itemSchema), errors);
      });
    }
  }

  if (schema.enum && !schema.enum.includes(input)) {
    errors.push({ path: '', message: `Value must be one of: ${schema.enum.join(', ')}` });
  }

  return {
    valid: errors.length === 0,
    errors: errors.length > 0 ? errors : undefined,
  };
}

export const validation = {
  validateInput,
};
