#!/usr/bin/env node
/**
 * MCP Graph Server (stdio transport)
 *
 * Typed entity graph over SQLite.
 *
 * Environment variables:
 * - GRAPH_DB_PATH: SQLite database path (default: ~/.graphdoc/graph.db)
 * - GRAPH_MATERIALIZER: "query" (single SQL statement, default) or "walk"
 * - GRAPH_BUSY_TIMEOUT_MS: How long writers wait on a locked database (default: 5000)
 * - LOG_LEVEL: debug | info | warn | error | silent (default: info)
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createLogger, setLogLevel } from '@graphdoc/shared';
import { createGraphServer } from './server-setup.js';
import { loadConfig } from './config.js';
import * as fs from 'fs';
import * as path from 'path';

const log = createLogger('mcp-graph');

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const { dbPath } = config.service.storage;
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  log.info('Starting server');
  log.info(`Database: ${dbPath}`);
  log.info(`Materializer: ${config.service.materializer ?? 'query'}`);

  const server = createGraphServer(config.service);

  const transport = new StdioServerTransport();
  await server.connect(transport);

  log.info('Server started');
}

main().catch((error) => {
  log.error('Fatal error:', error);
  process.exit(1);
});
