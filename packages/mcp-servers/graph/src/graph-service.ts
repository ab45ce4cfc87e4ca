/**
 * Graph Service
 *
 * High-level interface combining the registry, the stores and the
 * materializer over one database connection.
 */

import {
  createLogger,
  standardize,
  validate,
  type CreateEntityInput,
  type DefineAttributeInput,
  type DefineRelationAttributeInput,
  type DefineRelationshipTypeInput,
  type DefineTypeInput,
  type EmbeddingRecord,
  type EntityRecord,
  type MaterializedEntity,
  type ModelTypeRecord,
  type RelationRecord,
  type RelationshipTypeRecord,
  type StoredAttribute,
  type TypeKind,
  type UpdateEntityInput,
} from '@graphdoc/shared';
import { openDatabase, transaction, type Db, type StorageConfig } from './database.js';
import { EntityStore, type ListEntitiesOptions, type TypeComposition } from './entity-store.js';
import { GraphMaterializer, type MaterializerStrategy } from './materializer.js';
import { RelationshipStore } from './relationship-store.js';
import { TypeRegistry } from './type-registry.js';

const log = createLogger('graph-service');

export interface GraphServiceConfig {
  storage: StorageConfig;
  materializer?: MaterializerStrategy;
}

export class GraphService {
  readonly types: TypeRegistry;
  readonly entities: EntityStore;
  readonly relations: RelationshipStore;

  private db: Db;
  private materializer: GraphMaterializer;
  private strategy: MaterializerStrategy;

  constructor(config: GraphServiceConfig) {
    this.db = openDatabase(config.storage);
    this.types = new TypeRegistry(this.db);
    this.entities = new EntityStore(this.db, this.types);
    this.relations = new RelationshipStore(this.db, this.types, this.entities);
    this.materializer = new GraphMaterializer(this.db, this.types, this.entities, this.relations);
    this.strategy = config.materializer ?? 'query';

    log.info(`Opened ${config.storage.dbPath} (materializer: ${this.strategy})`);
  }

  // ============================================================================
  // Type registry
  // ============================================================================

  defineType(input: DefineTypeInput): number {
    return this.types.defineType(input);
  }

  defineAttribute(input: DefineAttributeInput): number {
    return this.types.defineAttribute(input);
  }

  defineRelationshipType(input: DefineRelationshipTypeInput): number {
    return this.types.defineRelationshipType(input);
  }

  defineRelationAttribute(input: DefineRelationAttributeInput): number {
    return this.types.defineRelationAttribute(input);
  }

  listTypes(kind?: TypeKind): ModelTypeRecord[] {
    return this.types.listTypes(kind);
  }

  findRelationshipTypes(name: string): RelationshipTypeRecord[] {
    return this.types.findRelationshipTypes(name);
  }

  // ============================================================================
  // Entities
  // ============================================================================

  createEntity(input: CreateEntityInput): number {
    return this.entities.createEntity(input);
  }

  getEntity(id: number): EntityRecord {
    return this.entities.getEntity(id);
  }

  listEntities(options?: ListEntitiesOptions): EntityRecord[] {
    return this.entities.listEntities(options);
  }

  updateEntity(id: number, changes: UpdateEntityInput): EntityRecord {
    return this.entities.updateEntity(id, changes);
  }

  deleteEntity(id: number): boolean {
    return this.entities.deleteEntity(id);
  }

  assignTrait(entityId: number, traitTypeId: number): void {
    this.entities.assignTrait(entityId, traitTypeId);
  }

  getTypeComposition(entityId: number): TypeComposition {
    return this.entities.getTypeComposition(entityId);
  }

  setAttribute(entityId: number, key: string, value: unknown): number {
    return this.entities.setAttribute(entityId, key, value);
  }

  getAttributeValues(entityId: number, key?: string): StoredAttribute[] {
    return this.entities.getAttributeValues(entityId, key);
  }

  removeAttributeValue(attributeId: number): boolean {
    return this.entities.removeAttributeValue(attributeId);
  }

  setEmbedding(entityId: number, embedding: number[] | string, model?: string): void {
    this.entities.setEmbedding(entityId, embedding, model);
  }

  getEmbedding(entityId: number): EmbeddingRecord | null {
    return this.entities.getEmbedding(entityId);
  }

  // ============================================================================
  // Relations
  // ============================================================================

  createRelation(fromId: number, toId: number, relationshipTypeId: number): number {
    return this.relations.createRelation(fromId, toId, relationshipTypeId);
  }

  getRelation(id: number): RelationRecord {
    return this.relations.getRelation(id);
  }

  listRelations(entityId: number): RelationRecord[] {
    return this.relations.listRelations(entityId);
  }

  deleteRelation(id: number): boolean {
    return this.relations.deleteRelation(id);
  }

  setRelationAttribute(relationId: number, key: string, value: unknown): number {
    return this.relations.setRelationAttribute(relationId, key, value);
  }

  getRelationAttributeValues(relationId: number): StoredAttribute[] {
    return this.relations.getRelationAttributeValues(relationId);
  }

  // ============================================================================
  // Read model
  // ============================================================================

  /**
   * The entity with its types, attributes and immediate neighbours, in
   * canonical shape
   */
  materialize(entityId: number, strategy: MaterializerStrategy = this.strategy): MaterializedEntity {
    const raw = this.materializer.materialize(entityId, strategy);
    const document = standardize('model_full', raw);
    validate('model_full', document);
    return document;
  }

  /**
   * Run several operations as one unit; nested writes become savepoints.
   */
  transaction<T>(work: () => T): T {
    return transaction(this.db, work);
  }

  /**
   * Close the service
   */
  close(): void {
    if (this.db.open) {
      this.db.close();
      log.info('Closed database');
    }
  }
}

// Singleton for use by tools
let serviceInstance: GraphService | null = null;

export function initializeService(config: GraphServiceConfig): GraphService {
  if (serviceInstance) {
    serviceInstance.close();
  }
  serviceInstance = new GraphService(config);
  return serviceInstance;
}

export function getService(): GraphService {
  if (!serviceInstance) {
    throw new Error('Graph service not initialized. Call initializeService first.');
  }
  return serviceInstance;
}
