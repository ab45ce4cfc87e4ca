import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { GraphService } from '../src/graph-service.js';
import type { MaterializerStrategy } from '../src/materializer.js';
import { createTestService, definePeopleSchema, expectGraphError, type PeopleSchema } from './helpers.js';

const NOW = '2024-03-01T09:00:00.000Z';

const PERSON = { id: 1, name: 'Person', description: 'A human person' };
const COMPANY = { id: 2, name: 'Company', description: null };
const EMPLOYEE = { id: 3, name: 'Employee', description: null };

const strategies: MaterializerStrategy[] = ['walk', 'query'];

describe.each(strategies)('materialize (%s)', (strategy) => {
  let service: GraphService;
  let schema: PeopleSchema;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(NOW));
    service = createTestService(strategy);
    schema = definePeopleSchema(service);
  });

  afterEach(() => {
    service.close();
    vi.useRealTimers();
  });

  function createAliceAtAcme(): { alice: number; acme: number; relation: number } {
    const alice = service.createEntity({ baseTypeId: schema.person, title: 'Alice', body: 'Backend engineer' });
    service.assignTrait(alice, schema.employee);
    service.setAttribute(alice, 'age', 28);

    const acme = service.createEntity({ baseTypeId: schema.company, title: 'Acme' });
    const relation = service.createRelation(alice, acme, schema.worksFor);
    service.setRelationAttribute(relation, 'role', 'Engineer');

    return { alice, acme, relation };
  }

  it('should assemble the entity, its attributes and its relations', () => {
    const { alice } = createAliceAtAcme();

    expect(service.materialize(alice)).toEqual({
      model: {
        id: 1,
        title: 'Alice',
        body: 'Backend engineer',
        created_at: NOW,
        updated_at: NOW,
        model_type: { base_model: PERSON, traits: [EMPLOYEE] },
      },
      attributes: { age: 28 },
      relations: [
        {
          relation_id: 1,
          relation_name: 'works_for',
          direction: 'outgoing',
          other_model: {
            id: 2,
            title: 'Acme',
            body: null,
            created_at: NOW,
            updated_at: NOW,
            model_type: { base_model: COMPANY, traits: [] },
          },
          relation_attributes: { role: 'Engineer' },
        },
      ],
    });
  });

  it('should show the relation as incoming from the other end', () => {
    const { acme } = createAliceAtAcme();

    const document = service.materialize(acme);

    expect(document.attributes).toEqual({});
    expect(document.relations).toHaveLength(1);
    expect(document.relations[0]).toMatchObject({
      relation_id: 1,
      direction: 'incoming',
      other_model: { id: 1, title: 'Alice', model_type: { base_model: PERSON, traits: [EMPLOYEE] } },
    });
  });

  it('should use empty collections for a bare entity', () => {
    const id = service.createEntity({ baseTypeId: schema.company, title: 'Initech' });

    const document = service.materialize(id);

    expect(document.model.model_type).toEqual({ base_model: COMPANY, traits: [] });
    expect(document.attributes).toEqual({});
    expect(document.relations).toEqual([]);
  });

  it('should show the most recent value of a multi-valued key', () => {
    const { alice } = createAliceAtAcme();
    service.setAttribute(alice, 'age', 29);

    expect(service.materialize(alice).attributes).toEqual({ age: 29 });
  });

  it('should fall back to the remaining value when the latest is removed', () => {
    const { alice } = createAliceAtAcme();
    const latest = service.setAttribute(alice, 'age', 29);
    service.removeAttributeValue(latest);

    expect(service.materialize(alice).attributes).toEqual({ age: 28 });
  });

  it('should list relations oldest first', () => {
    const { alice, acme } = createAliceAtAcme();
    const globex = service.createEntity({ baseTypeId: schema.company, title: 'Globex' });
    service.createRelation(alice, globex, schema.worksFor);
    const bob = service.createEntity({ baseTypeId: schema.person, title: 'Bob' });
    service.createRelation(bob, acme, schema.worksFor);

    expect(service.materialize(alice).relations.map(r => [r.relation_id, r.other_model.title])).toEqual([
      [1, 'Acme'],
      [2, 'Globex'],
    ]);
    expect(service.materialize(acme).relations.map(r => [r.relation_id, r.direction, r.other_model.title])).toEqual([
      [1, 'incoming', 'Alice'],
      [3, 'incoming', 'Bob'],
    ]);
  });

  it('should list traits in assignment order', () => {
    const contractor = service.defineType({ name: 'Contractor', kind: 'trait', description: 'Works on contract' });
    const id = service.createEntity({ baseTypeId: schema.person, title: 'Carol' });
    service.assignTrait(id, contractor);
    service.assignTrait(id, schema.employee);

    expect(service.materialize(id).model.model_type.traits).toEqual([
      { id: contractor, name: 'Contractor', description: 'Works on contract' },
      EMPLOYEE,
    ]);
  });

  it('should keep every value type intact', () => {
    service.defineAttribute({ typeId: schema.person, key: 'active', valueType: 'boolean' });
    service.defineAttribute({ typeId: schema.person, key: 'born', valueType: 'datetime' });
    service.defineAttribute({ typeId: schema.person, key: 'profile', valueType: 'vector' });
    const id = service.createEntity({ baseTypeId: schema.person, title: 'Dana' });

    service.setAttribute(id, 'nickname', 'D');
    service.setAttribute(id, 'age', 41.5);
    service.setAttribute(id, 'active', false);
    service.setAttribute(id, 'born', '1983-06-15T00:00:00Z');
    service.setAttribute(id, 'profile', [0.5, 0.25]);

    expect(service.materialize(id).attributes).toEqual({
      nickname: 'D',
      age: 41.5,
      active: false,
      born: '1983-06-15T00:00:00.000Z',
      profile: '[0.5,0.25]',
    });
  });

  it('should drop relations whose other end was deleted', () => {
    const { alice, acme } = createAliceAtAcme();

    service.deleteEntity(acme);

    expect(service.materialize(alice).relations).toEqual([]);
  });

  it('should drop incoming relations whose source was deleted', () => {
    const { alice, acme } = createAliceAtAcme();

    service.deleteEntity(alice);

    expect(service.materialize(acme).relations).toEqual([]);
  });

  it('should keep an attribute keyed __proto__ as a plain entry', () => {
    service.defineAttribute({ typeId: schema.person, key: '__proto__', valueType: 'string' });
    const id = service.createEntity({ baseTypeId: schema.person, title: 'Eve' });
    service.setAttribute(id, '__proto__', 'x');

    const { attributes } = service.materialize(id);

    expect(Object.entries(attributes)).toEqual([['__proto__', 'x']]);
    expect(Object.getPrototypeOf(attributes)).toBe(Object.prototype);
  });

  it('should throw EntityNotFound for a missing entity', () => {
    expectGraphError(() => service.materialize(404), 'EntityNotFound');
  });
});

describe('materialization strategies', () => {
  it('should produce identical documents', () => {
    const service = createTestService();
    const schema = definePeopleSchema(service);

    const alice = service.createEntity({ baseTypeId: schema.person, title: 'Alice' });
    const bob = service.createEntity({ baseTypeId: schema.person, title: 'Bob', body: 'Designer' });
    const acme = service.createEntity({ baseTypeId: schema.company, title: 'Acme' });
    service.assignTrait(alice, schema.employee);
    service.setAttribute(alice, 'salary', 50000);
    service.setAttribute(alice, 'age', 28);
    service.setAttribute(alice, 'nickname', 'Al');
    service.setAttribute(alice, 'nickname', 'Ali');
    const relation = service.createRelation(alice, acme, schema.worksFor);
    service.setRelationAttribute(relation, 'role', 'Engineer');
    service.createRelation(bob, acme, schema.worksFor);

    for (const id of [alice, bob, acme]) {
      expect(service.materialize(id, 'query')).toEqual(service.materialize(id, 'walk'));
    }

    service.close();
  });
});
