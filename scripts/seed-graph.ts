#!/usr/bin/env npx tsx
/**
 * Load the demo graph into the configured database and print one entity.
 *
 * Usage:
 *   GRAPH_DB_PATH=/tmp/demo.db npx tsx scripts/seed-graph.ts [data.json]
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { createLogger, setLogLevel } from '@graphdoc/shared';
import { GraphService } from '../packages/mcp-servers/graph/src/graph-service.js';
import { loadConfig } from '../packages/mcp-servers/graph/src/config.js';
import { seedGraph } from '../packages/mcp-servers/graph/src/seed.js';

const log = createLogger('seed-graph');

const here = path.dirname(fileURLToPath(import.meta.url));
const dataFile = process.argv[2] ?? path.join(here, 'demo-graph.json');

function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const { dbPath } = config.service.storage;
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const data: unknown = JSON.parse(fs.readFileSync(dataFile, 'utf-8'));
  const service = new GraphService(config.service);

  try {
    const result = seedGraph(service, data);
    log.info(`Database: ${dbPath}`);

    const first = Object.values(result.entityIds)[0];
    if (first !== undefined) {
      console.log(JSON.stringify(service.materialize(first), null, 2));
    }
  } finally {
    service.close();
  }
}

try {
  main();
} catch (error) {
  log.error('Seeding failed:', error);
  process.exit(1);
}
