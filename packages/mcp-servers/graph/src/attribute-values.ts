/**
 * Typed attribute values
 *
 * At the application boundary a value is a tagged union; in storage it is
 * five nullable columns of which exactly one is set.
 */

import { z } from 'zod';
import {
  GraphError,
  type AttributeConstraints,
  type AttributeScalar,
  type AttributeValue,
  type ValueType,
} from '@graphdoc/shared';

export interface ValueColumns {
  value_text: string | null;
  value_number: number | null;
  value_time: string | null;
  value_bool: number | null;
  value_vector: string | null;
}

/**
 * The part of an attribute (or relation attribute) definition a value is checked against
 */
export interface ValueDefinition {
  key: string;
  valueType: ValueType;
  constraints: AttributeConstraints;
}

const StringValue = z.string();
const NumberValue = z.number().finite();
const BooleanValue = z.boolean();
const DatetimeValue = z
  .union([z.date(), z.string().datetime({ offset: true })])
  .transform(value => new Date(value).toISOString());
const VectorValue = z.union([z.array(z.number().finite()), z.string()]);

function expectType<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  raw: unknown,
  definition: ValueDefinition
): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new GraphError(
      'TypeMismatch',
      `Attribute "${definition.key}" expects a ${definition.valueType} value`,
      { key: definition.key, valueType: definition.valueType }
    );
  }
  return result.data;
}

function enforce<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: T, definition: ValueDefinition): void {
  const result = schema.safeParse(value);
  if (!result.success) {
    const reason = result.error.issues[0]?.message ?? 'constraint failed';
    throw new GraphError('ConstraintViolation', `Attribute "${definition.key}": ${reason}`, {
      key: definition.key,
      constraints: definition.constraints,
    });
  }
}

function stringRules(constraints: AttributeConstraints): z.ZodType<string, z.ZodTypeDef, unknown> {
  let schema = z.string();
  if (constraints.minLength !== undefined) schema = schema.min(constraints.minLength);
  if (constraints.maxLength !== undefined) schema = schema.max(constraints.maxLength);
  if (constraints.pattern !== undefined) schema = schema.regex(new RegExp(constraints.pattern));

  const allowed = constraints.enum;
  if (allowed) {
    return schema.refine(value => allowed.includes(value), {
      message: `Value must be one of: ${allowed.join(', ')}`,
    });
  }
  return schema;
}

function numberRules(constraints: AttributeConstraints): z.ZodType<number, z.ZodTypeDef, unknown> {
  let schema = z.number();
  if (constraints.min !== undefined) schema = schema.min(constraints.min);
  if (constraints.max !== undefined) schema = schema.max(constraints.max);
  if (constraints.integer) schema = schema.int();
  return schema;
}

/**
 * Check a raw value against its definition and tag it.
 * Throws TypeMismatch or ConstraintViolation.
 */
export function toAttributeValue(definition: ValueDefinition, raw: unknown): AttributeValue {
  const { constraints } = definition;

  switch (definition.valueType) {
    case 'string': {
      const value = expectType(StringValue, raw, definition);
      enforce(stringRules(constraints), value, definition);
      return { type: 'string', value };
    }
    case 'number': {
      const value = expectType(NumberValue, raw, definition);
      enforce(numberRules(constraints), value, definition);
      return { type: 'number', value };
    }
    case 'boolean':
      return { type: 'boolean', value: expectType(BooleanValue, raw, definition) };
    case 'datetime':
      return { type: 'datetime', value: expectType(DatetimeValue, raw, definition) };
    case 'vector': {
      const value = expectType(VectorValue, raw, definition);
      if (typeof value === 'string') {
        return { type: 'vector', value };
      }
      if (constraints.dimensions !== undefined) {
        enforce(z.array(z.number()).length(constraints.dimensions), value, definition);
      }
      return { type: 'vector', value: JSON.stringify(value) };
    }
  }
}

/**
 * Spread a tagged value onto the storage columns
 */
export function toColumns(value: AttributeValue): ValueColumns {
  const columns: ValueColumns = {
    value_text: null,
    value_number: null,
    value_time: null,
    value_bool: null,
    value_vector: null,
  };

  switch (value.type) {
    case 'string':
      columns.value_text = value.value;
      break;
    case 'number':
      columns.value_number = value.value;
      break;
    case 'datetime':
      columns.value_time = value.value;
      break;
    case 'boolean':
      columns.value_bool = value.value ? 1 : 0;
      break;
    case 'vector':
      columns.value_vector = value.value;
      break;
  }
  return columns;
}

/**
 * Recover the tagged value from a row; the populated column is the tag.
 */
export function fromColumns(row: ValueColumns): AttributeValue {
  if (row.value_text !== null) return { type: 'string', value: row.value_text };
  if (row.value_number !== null) return { type: 'number', value: row.value_number };
  if (row.value_time !== null) return { type: 'datetime', value: row.value_time };
  if (row.value_bool !== null) return { type: 'boolean', value: row.value_bool === 1 };
  if (row.value_vector !== null) return { type: 'vector', value: row.value_vector };
  throw new Error('Attribute row has no populated value column');
}

export function toScalar(value: AttributeValue): AttributeScalar {
  return value.value;
}
