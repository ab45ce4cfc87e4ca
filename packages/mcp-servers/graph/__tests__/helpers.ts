/**
 * Shared fixtures for graph tests
 */

import { expect } from 'vitest';
import { GraphError, type GraphErrorCode } from '@graphdoc/shared';
import { GraphService } from '../src/graph-service.js';
import type { MaterializerStrategy } from '../src/materializer.js';

export function createTestService(materializer: MaterializerStrategy = 'query'): GraphService {
  return new GraphService({ storage: { dbPath: ':memory:' }, materializer });
}

export interface PeopleSchema {
  person: number;
  company: number;
  employee: number;
  worksFor: number;
}

/**
 * Person and Company base types, an Employee trait and works_for between
 * them. On a fresh database the ids are 1, 2, 3 and 1.
 */
export function definePeopleSchema(service: GraphService): PeopleSchema {
  const person = service.defineType({ name: 'Person', kind: 'base', description: 'A human person' });
  const company = service.defineType({ name: 'Company', kind: 'base' });
  const employee = service.defineType({ name: 'Employee', kind: 'trait' });

  service.defineAttribute({ typeId: person, key: 'age', valueType: 'number' });
  service.defineAttribute({ typeId: person, key: 'nickname', valueType: 'string' });
  service.defineAttribute({ typeId: employee, key: 'salary', valueType: 'number' });

  const worksFor = service.defineRelationshipType({ fromTypeId: person, toTypeId: company, name: 'works_for' });
  service.defineRelationAttribute({ relationshipTypeId: worksFor, key: 'role', valueType: 'string' });

  return { person, company, employee, worksFor };
}

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the call to throw');
}

export function expectGraphError(fn: () => unknown, code: GraphErrorCode): GraphError {
  const error = catchError(fn);
  expect(error).toBeInstanceOf(GraphError);
  if (!(error instanceof GraphError)) throw error;
  expect(error.code).toBe(code);
  return error;
}
