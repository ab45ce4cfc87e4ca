import { describe, expect, it } from 'vitest';
import type { AttributeConstraints, ValueType } from '@graphdoc/shared';
import { fromColumns, toAttributeValue, toColumns, type ValueDefinition } from '../src/attribute-values.js';
import { expectGraphError } from './helpers.js';

function definition(valueType: ValueType, constraints: AttributeConstraints = {}): ValueDefinition {
  return { key: 'field', valueType, constraints };
}

describe('toAttributeValue', () => {
  it('should tag values of each type', () => {
    expect(toAttributeValue(definition('string'), 'Alice')).toEqual({ type: 'string', value: 'Alice' });
    expect(toAttributeValue(definition('number'), 28)).toEqual({ type: 'number', value: 28 });
    expect(toAttributeValue(definition('boolean'), false)).toEqual({ type: 'boolean', value: false });
  });

  it('should normalize datetimes to UTC ISO strings', () => {
    expect(toAttributeValue(definition('datetime'), '2024-03-01T10:00:00+02:00')).toEqual({
      type: 'datetime',
      value: '2024-03-01T08:00:00.000Z',
    });
    expect(toAttributeValue(definition('datetime'), new Date('2024-03-01T08:00:00.000Z'))).toEqual({
      type: 'datetime',
      value: '2024-03-01T08:00:00.000Z',
    });
  });

  it('should keep vector payloads as opaque text', () => {
    expect(toAttributeValue(definition('vector'), [0.5, 1, 2])).toEqual({ type: 'vector', value: '[0.5,1,2]' });
    expect(toAttributeValue(definition('vector'), 'b64:AAAA')).toEqual({ type: 'vector', value: 'b64:AAAA' });
  });

  it('should reject values of the wrong type', () => {
    const error = expectGraphError(() => toAttributeValue(definition('number'), '28'), 'TypeMismatch');
    expect(error.message).toBe('Attribute "field" expects a number value');

    expectGraphError(() => toAttributeValue(definition('string'), 28), 'TypeMismatch');
    expectGraphError(() => toAttributeValue(definition('boolean'), 'true'), 'TypeMismatch');
    expectGraphError(() => toAttributeValue(definition('datetime'), 'yesterday'), 'TypeMismatch');
    expectGraphError(() => toAttributeValue(definition('number'), Number.POSITIVE_INFINITY), 'TypeMismatch');
    expectGraphError(() => toAttributeValue(definition('vector'), { x: 1 }), 'TypeMismatch');
  });

  it('should enforce string constraints', () => {
    const status = definition('string', { enum: ['active', 'inactive'] });
    expect(toAttributeValue(status, 'active').value).toBe('active');

    const error = expectGraphError(() => toAttributeValue(status, 'retired'), 'ConstraintViolation');
    expect(error.message).toBe('Attribute "field": Value must be one of: active, inactive');

    const code = definition('string', { maxLength: 3 });
    expect(expectGraphError(() => toAttributeValue(code, 'ABCD'), 'ConstraintViolation').message).toBe(
      'Attribute "field": String must contain at most 3 character(s)'
    );

    expectGraphError(() => toAttributeValue(definition('string', { pattern: '^[A-Z]+$' }), 'abc'), 'ConstraintViolation');
  });

  it('should enforce number constraints', () => {
    const age = definition('number', { min: 0, max: 150, integer: true });
    expect(toAttributeValue(age, 28).value).toBe(28);

    expect(expectGraphError(() => toAttributeValue(age, -1), 'ConstraintViolation').message).toBe(
      'Attribute "field": Number must be greater than or equal to 0'
    );
    expectGraphError(() => toAttributeValue(age, 151), 'ConstraintViolation');
    expectGraphError(() => toAttributeValue(age, 28.5), 'ConstraintViolation');
  });

  it('should enforce vector dimensions', () => {
    const embedding = definition('vector', { dimensions: 3 });
    expect(toAttributeValue(embedding, [1, 2, 3]).value).toBe('[1,2,3]');

    expect(expectGraphError(() => toAttributeValue(embedding, [1, 2]), 'ConstraintViolation').message).toBe(
      'Attribute "field": Array must contain exactly 3 element(s)'
    );
  });
});

describe('storage columns', () => {
  it('should populate exactly one column', () => {
    expect(toColumns({ type: 'boolean', value: false })).toEqual({
      value_text: null,
      value_number: null,
      value_time: null,
      value_bool: 0,
      value_vector: null,
    });

    const columns = toColumns({ type: 'datetime', value: '2024-03-01T08:00:00.000Z' });
    expect(Object.values(columns).filter(value => value !== null)).toEqual(['2024-03-01T08:00:00.000Z']);
  });

  it('should recover the tag from the populated column', () => {
    expect(fromColumns(toColumns({ type: 'boolean', value: false }))).toEqual({ type: 'boolean', value: false });
    expect(fromColumns(toColumns({ type: 'vector', value: '[1,2]' }))).toEqual({ type: 'vector', value: '[1,2]' });
    expect(fromColumns(toColumns({ type: 'number', value: 0 }))).toEqual({ type: 'number', value: 0 });
  });

  it('should throw for a row without a value', () => {
    expect(() =>
      fromColumns({ value_text: null, value_number: null, value_time: null, value_bool: null, value_vector: null })
    ).toThrow('Attribute row has no populated value column');
  });
});
