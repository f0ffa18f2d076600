import { describe, it, expect } from 'vitest';
import { validateInput } from '../validation.js';
import type { JSONSchema } from '../../types/public-api.js';

describe('validateInput', () => {
  describe('object type validation', () => {
    const objectSchema: JSONSchema = {
      type: 'object',
      properties: {
        contact_phone: { type: 'string' },
        num_guests: { type: 'integer', minimum: 1 },
      },
      required: ['contact_phone'],
    };

    it('should accept valid objects', () => {
      const result = validateInput({ contact_phone: '021 555 0101', num_guests: 2 }, objectSchema);
      expect(result.valid).toBe(true);
      expect(result.errors).toBeUndefined();
    });

    it('should reject null when expecting object', () => {
      const result = validateInput(null, objectSchema);
      expect(result.valid).toBe(false);
      expect(result.errors).toHaveLength(1);
      expect(result.errors?.[0]?.message).toBe('Expected object, got null');
    });

    it('should reject arrays when expecting object', () => {
      const result = validateInput([1, 2, 3], objectSchema);
      expect(result.valid).toBe(false);
      expect(result.errors).toHaveLength(1);
      expect(result.errors?.[0]?.message).toBe('Expected object, got array');
    });

    it('should reject primitives when expecting object', () => {
      expect(validateInput('string', objectSchema).valid).toBe(false);
      expect(validateInput(123, objectSchema).valid).toBe(false);
      expect(validateInput(true, objectSchema).valid).toBe(false);
      expect(validateInput(undefined, objectSchema).valid).toBe(false);
    });

    it('should validate required fields', () => {
      const result = validateInput({ num_guests: 2 }, objectSchema);
      expect(result.valid).toBe(false);
      expect(result.errors).toContainEqual({
        path: 'contact_phone',
        message: 'Missing required field: contact_phone',
      });
    });

    it('should only count own keys as present', () => {
      const result = validateInput({}, { type: 'object', properties: {}, required: ['toString'] });
      expect(result.errors).toEqual([{ path: 'toString', message: 'Missing required field: toString' }]);
    });

    it('should accept any type of a type list', () => {
      const codes: JSONSchema = { type: ['string', 'array'], items: { type: 'string' } };
      expect(validateInput('NZ,QF', codes).valid).toBe(true);
      expect(validateInput(['NZ', 'QF'], codes).valid).toBe(true);
      expect(validateInput(5, codes).errors).toEqual([{ path: '', message: 'Expected string or array, got number' }]);
      expect(validateInput(['NZ', 5], codes).errors).toEqual([
        { path: '', message: 'Expected string or array, got array' },
      ]);
    });

    it('should validate nested property types', () => {
      const result = validateInput({ contact_phone: 123 }, objectSchema);
      expect(result.valid).toBe(false);
      expect(result.errors).toContainEqual({
        path: 'contact_phone',
        message: 'Expected string, got number',
      });
    });

    it('should apply minimum to nested integers', () => {
      const result = validateInput({ contact_phone: '021 555 0101', num_guests: 0 }, objectSchema);
      expect(result.errors).toEqual([
        { path: 'num_guests', message: 'Value must be at least 1' },
      ]);
    });
  });

  describe('primitive type validation', () => {
    it('should validate string type', () => {
      const schema: JSONSchema = { type: 'string' };
      expect(validateInput('hello', schema).valid).toBe(true);
      expect(validateInput(123, schema).valid).toBe(false);
    });

    it('should validate number type', () => {
      const schema: JSONSchema = { type: 'number' };
      expect(validateInput(42, schema).valid).toBe(true);
      expect(validateInput('42', schema).valid).toBe(false);
    });

    it('should validate boolean type', () => {
      const schema: JSONSchema = { type: 'boolean' };
      expect(validateInput(true, schema).valid).toBe(true);
      expect(validateInput('true', schema).valid).toBe(false);
    });
  });

  describe('integer and pattern validation', () => {
    it('should reject fractional integers', () => {
      const schema: JSONSchema = { type: 'integer' };
      expect(validateInput(3, schema).valid).toBe(true);
      expect(validateInput(2.5, schema).errors).toEqual([
        { path: '', message: 'Expected integer, got fractional number' },
      ]);
    });

    it('should check string patterns', () => {
      const schema: JSONSchema = { type: 'string', pattern: '^\\d{4}-\\d{2}-\\d{2}$' };
      expect(validateInput('2025-03-01', schema).valid).toBe(true);
      expect(validateInput('01/03/2025', schema).valid).toBe(false);
    });
  });

  describe('array type validation', () => {
    it('should validate array type', () => {
      const schema: JSONSchema = { type: 'array' };
      expect(validateInput([1, 2, 3], schema).valid).toBe(true);
      expect(validateInput('not an array', schema).valid).toBe(false);
      expect(validateInput({}, schema).valid).toBe(false);
    });

    it('should validate items with their index in the path', () => {
      const schema: JSONSchema = { type: 'array', items: { type: 'string' } };
      expect(validateInput(['NZ', 7], schema).errors).toEqual([
        { path: '1', message: 'Expected string, got number' },
      ]);
    });
  });

  describe('enum validation', () => {
    it('should validate enum values', () => {
      const schema: JSONSchema = { type: 'string', enum: ['create', 'modify', 'cancel'] };
      expect(validateInput('create', schema).valid).toBe(true);
      expect(validateInput('delete', schema).valid).toBe(false);
    });
  });
});
