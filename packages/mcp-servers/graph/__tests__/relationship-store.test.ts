import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { openDatabase, type Db } from '../src/database.js';
import { EntityStore } from '../src/entity-store.js';
import { RelationshipStore } from '../src/relationship-store.js';
import { TypeRegistry } from '../src/type-registry.js';
import { expectGraphError } from './helpers.js';

describe('RelationshipStore', () => {
  let db: Db;
  let registry: TypeRegistry;
  let entities: EntityStore;
  let relations: RelationshipStore;
  let worksFor: number;
  let alice: number;
  let bob: number;
  let acme: number;

  beforeEach(() => {
    db = openDatabase({ dbPath: ':memory:' });
    registry = new TypeRegistry(db);
    entities = new EntityStore(db, registry);
    relations = new RelationshipStore(db, registry, entities);

    const person = registry.defineType({ name: 'Person', kind: 'base' });
    const company = registry.defineType({ name: 'Company', kind: 'base' });
    worksFor = registry.defineRelationshipType({ fromTypeId: person, toTypeId: company, name: 'works_for' });
    registry.defineRelationAttribute({ relationshipTypeId: worksFor, key: 'role', valueType: 'string' });

    alice = entities.createEntity({ baseTypeId: person, title: 'Alice' });
    bob = entities.createEntity({ baseTypeId: person, title: 'Bob' });
    acme = entities.createEntity({ baseTypeId: company, title: 'Acme' });
  });

  afterEach(() => {
    vi.useRealTimers();
    db.close();
  });

  describe('createRelation', () => {
    it('should connect entities of the declared types', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2024-03-01T09:00:00.000Z'));

      const id = relations.createRelation(alice, acme, worksFor);

      expect(relations.getRelation(id)).toEqual({
        id,
        fromId: alice,
        toId: acme,
        relationshipTypeId: worksFor,
        createdAt: '2024-03-01T09:00:00.000Z',
      });
    });

    it('should reject endpoints in the wrong direction', () => {
      const error = expectGraphError(() => relations.createRelation(acme, alice, worksFor), 'EndpointTypeMismatch');
      expect(error.details).toEqual({
        relationshipTypeId: worksFor,
        expected: { from: 1, to: 2 },
        actual: { from: 2, to: 1 },
      });
    });

    it('should reject endpoints of the same wrong type', () => {
      expectGraphError(() => relations.createRelation(alice, bob, worksFor), 'EndpointTypeMismatch');
    });

    it('should reject a missing endpoint or relationship type', () => {
      expectGraphError(() => relations.createRelation(alice, 99, worksFor), 'EntityNotFound');
      expectGraphError(() => relations.createRelation(99, acme, worksFor), 'EntityNotFound');
      expectGraphError(() => relations.createRelation(alice, acme, 99), 'UnknownType');
      expect(relations.listRelations(alice)).toEqual([]);
    });
  });

  describe('listRelations', () => {
    it('should include both directions, oldest first', () => {
      const first = relations.createRelation(alice, acme, worksFor);
      const second = relations.createRelation(bob, acme, worksFor);

      expect(relations.listRelations(acme).map(r => r.id)).toEqual([first, second]);
      expect(relations.listRelations(alice).map(r => r.id)).toEqual([first]);
    });
  });

  describe('relation attributes', () => {
    it('should store values declared by the relationship type', () => {
      const id = relations.createRelation(alice, acme, worksFor);
      const attributeId = relations.setRelationAttribute(id, 'role', 'Engineer');

      expect(relations.getRelationAttributeValues(id)).toEqual([
        { id: attributeId, ownerId: id, definitionId: 1, key: 'role', value: { type: 'string', value: 'Engineer' } },
      ]);
    });

    it('should reject undeclared keys and wrong types', () => {
      const id = relations.createRelation(alice, acme, worksFor);

      expectGraphError(() => relations.setRelationAttribute(id, 'since', '2020-01-01T00:00:00Z'), 'UnknownAttributeKey');
      expectGraphError(() => relations.setRelationAttribute(id, 'role', 7), 'TypeMismatch');
    });

    it('should reject a missing relation', () => {
      const error = expectGraphError(() => relations.setRelationAttribute(12, 'role', 'Engineer'), 'RelationNotFound');
      expect(error.message).toBe('Relation 12 not found');
    });

    it('should reject the identical value twice', () => {
      const id = relations.createRelation(alice, acme, worksFor);
      relations.setRelationAttribute(id, 'role', 'Engineer');

      expectGraphError(() => relations.setRelationAttribute(id, 'role', 'Engineer'), 'DuplicateValue');
    });
  });

  describe('deleteRelation', () => {
    it('should remove the relation and its attributes', () => {
      const id = relations.createRelation(alice, acme, worksFor);
      relations.setRelationAttribute(id, 'role', 'Engineer');

      expect(relations.deleteRelation(id)).toBe(true);
      expect(relations.findRelation(id)).toBeNull();
      expect(relations.getRelationAttributeValues(id)).toEqual([]);
      expect(relations.deleteRelation(id)).toBe(false);
    });

    it('should go away when an endpoint is deleted', () => {
      const id = relations.createRelation(alice, acme, worksFor);

      entities.deleteEntity(acme);

      expect(relations.findRelation(id)).toBeNull();
      expect(relations.listRelations(alice)).toEqual([]);
    });
  });
});
