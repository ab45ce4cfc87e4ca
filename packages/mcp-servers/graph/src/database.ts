/**
 * SQLite Storage Layer for Graph Server
 *
 * Opens the database, creates the schema, and runs work inside transactions
 * with SQLite failures translated into graph errors.
 */

import Database from 'better-sqlite3';
import { GraphError } from '@graphdoc/shared';

export type Db = Database.Database;

export interface StorageConfig {
  dbPath: string;
  busyTimeoutMs?: number;  // How long a writer waits on a locked database
}

const VALUE_COLUMNS = `
  value_text TEXT,
  value_number REAL,
  value_time TEXT,
  value_bool INTEGER CHECK (value_bool IN (0, 1)),
  value_vector TEXT,
  CHECK (
    (value_text IS NOT NULL) + (value_number IS NOT NULL) + (value_time IS NOT NULL)
      + (value_bool IS NOT NULL) + (value_vector IS NOT NULL) = 1
  )`;

const VALUE_TYPES = `('string', 'number', 'datetime', 'boolean', 'vector')`;

// The single populated column is the value; COALESCE picks it for uniqueness
const VALUE_KEY = 'COALESCE(value_text, value_number, value_time, value_bool, value_vector)';

const SCHEMA_SQL = `
  -- Base and trait types
  CREATE TABLE IF NOT EXISTS model_types (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL UNIQUE,
    parent_id INTEGER REFERENCES model_types(id) ON DELETE SET NULL,
    type_kind TEXT NOT NULL CHECK (type_kind IN ('base', 'trait')),
    description TEXT
  );

  -- Entities (documents)
  CREATE TABLE IF NOT EXISTS models (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    model_type_id INTEGER NOT NULL REFERENCES model_types(id) ON DELETE CASCADE,
    title TEXT NOT NULL,
    body TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS trait_assignments (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    model_id INTEGER NOT NULL REFERENCES models(id) ON DELETE CASCADE,
    trait_type_id INTEGER NOT NULL REFERENCES model_types(id) ON DELETE CASCADE,
    applied_at TEXT NOT NULL,
    UNIQUE (model_id, trait_type_id)
  );

  -- EAV schema and values
  CREATE TABLE IF NOT EXISTS attribute_definitions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    model_type_id INTEGER NOT NULL REFERENCES model_types(id) ON DELETE CASCADE,
    key TEXT NOT NULL,
    value_type TEXT NOT NULL CHECK (value_type IN ${VALUE_TYPES}),
    required INTEGER NOT NULL DEFAULT 0,
    constraints TEXT NOT NULL DEFAULT '{}',
    UNIQUE (model_type_id, key)
  );

  CREATE TABLE IF NOT EXISTS attributes (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    model_id INTEGER NOT NULL REFERENCES models(id) ON DELETE CASCADE,
    attribute_definition_id INTEGER NOT NULL REFERENCES attribute_definitions(id) ON DELETE CASCADE,
    ${VALUE_COLUMNS}
  );

  -- Relationship schema and edges
  CREATE TABLE IF NOT EXISTS relationship_types (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    from_model_type_id INTEGER NOT NULL REFERENCES model_types(id) ON DELETE CASCADE,
    to_model_type_id INTEGER NOT NULL REFERENCES model_types(id) ON DELETE CASCADE,
    relation_name TEXT NOT NULL,
    multiplicity TEXT NOT NULL DEFAULT 'many' CHECK (multiplicity IN ('one', 'many')),
    description TEXT,
    UNIQUE (from_model_type_id, to_model_type_id, relation_name)
  );

  CREATE TABLE IF NOT EXISTS relation_attribute_definitions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    relationship_type_id INTEGER NOT NULL REFERENCES relationship_types(id) ON DELETE CASCADE,
    key TEXT NOT NULL,
    value_type TEXT NOT NULL CHECK (value_type IN ${VALUE_TYPES}),
    required INTEGER NOT NULL DEFAULT 0,
    constraints TEXT NOT NULL DEFAULT '{}',
    UNIQUE (relationship_type_id, key)
  );

  CREATE TABLE IF NOT EXISTS relations (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    from_id INTEGER NOT NULL REFERENCES models(id) ON DELETE CASCADE,
    to_id INTEGER NOT NULL REFERENCES models(id) ON DELETE CASCADE,
    relationship_type_id INTEGER NOT NULL REFERENCES relationship_types(id) ON DELETE CASCADE,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS relation_attributes (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    relation_id INTEGER NOT NULL REFERENCES relations(id) ON DELETE CASCADE,
    relation_attribute_definition_id INTEGER NOT NULL
      REFERENCES relation_attribute_definitions(id) ON DELETE CASCADE,
    ${VALUE_COLUMNS}
  );

  -- Opaque vector payload, one per entity
  CREATE TABLE IF NOT EXISTS embeddings (
    model_id INTEGER PRIMARY KEY REFERENCES models(id) ON DELETE CASCADE,
    embedding TEXT NOT NULL,
    model TEXT,
    updated_at TEXT NOT NULL
  );

  -- Multi-valued attributes: never the identical value twice
  CREATE UNIQUE INDEX IF NOT EXISTS idx_attributes_value
    ON attributes(model_id, attribute_definition_id, ${VALUE_KEY});
  CREATE UNIQUE INDEX IF NOT EXISTS idx_relation_attributes_value
    ON relation_attributes(relation_id, relation_attribute_definition_id, ${VALUE_KEY});

  -- Indexes for common queries
  CREATE INDEX IF NOT EXISTS idx_models_type ON models(model_type_id);
  CREATE INDEX IF NOT EXISTS idx_trait_assignments_model ON trait_assignments(model_id);
  CREATE INDEX IF NOT EXISTS idx_relations_from ON relations(from_id);
  CREATE INDEX IF NOT EXISTS idx_relations_to ON relations(to_id);
`;

/**
 * Open (and if needed create) a graph database
 */
export function openDatabase(config: StorageConfig): Db {
  let db: Db;
  try {
    db = new Database(config.dbPath, { timeout: config.busyTimeoutMs ?? 5000 });
  } catch (error) {
    throw new GraphError('StoreUnavailable', `Cannot open database: ${errorMessage(error)}`, {
      dbPath: config.dbPath,
    });
  }

  if (!db.memory) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');
  db.exec(SCHEMA_SQL);
  return db;
}

// ============================================================================
// Transactions
// ============================================================================

const UNAVAILABLE_PREFIXES = [
  'SQLITE_BUSY',
  'SQLITE_LOCKED',
  'SQLITE_CANTOPEN',
  'SQLITE_IOERR',
  'SQLITE_READONLY',
  'SQLITE_FULL',
  'SQLITE_NOTADB',
  'SQLITE_CORRUPT',
];

function sqliteCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Map a SQLite failure onto the graph error taxonomy. Unique-constraint
 * violations become whatever `onUnique` says; anything unrecognised is
 * returned unchanged.
 */
export function translateError(error: unknown, onUnique?: () => GraphError): unknown {
  if (error instanceof GraphError) return error;

  const code = sqliteCode(error);
  if (code === undefined) return error;

  if ((code === 'SQLITE_CONSTRAINT_UNIQUE' || code === 'SQLITE_CONSTRAINT_PRIMARYKEY') && onUnique) {
    return onUnique();
  }
  if (UNAVAILABLE_PREFIXES.some(prefix => code.startsWith(prefix))) {
    return new GraphError('StoreUnavailable', errorMessage(error), { sqliteCode: code });
  }
  return error;
}

function ensureOpen(db: Db): void {
  if (!db.open) {
    throw new GraphError('StoreUnavailable', 'Database connection is closed');
  }
}

/**
 * Run `work` in one write transaction; on any error nothing is persisted.
 * Immediate: the write lock is held before `work` reads anything.
 */
export function transaction<T>(db: Db, work: () => T, onUnique?: () => GraphError): T {
  ensureOpen(db);
  try {
    return db.transaction(work).immediate();
  } catch (error) {
    throw translateError(error, onUnique);
  }
}

/**
 * Run `work` against one consistent snapshot. Deferred: takes no write lock.
 */
export function read<T>(db: Db, work: () => T): T {
  ensureOpen(db);
  try {
    return db.transaction(work).deferred();
  } catch (error) {
    throw translateError(error);
  }
}

/**
 * Row id of the last insert as a plain number
 */
export function insertedId(result: Database.RunResult): number {
  return Number(result.lastInsertRowid);
}
