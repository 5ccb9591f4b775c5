#!/usr/bin/env tsx

import { getConfig } from '../src/config/index.js';
import { initializeSchema } from '../src/db/schema.js';
import { neo4jService } from '../src/db/neo4j.js';

async function main() {
  try {
    const config = getConfig();

    // Connect to Neo4j first
    await neo4jService.connect({
      uri: config.NEO4J_URI,
      username: config.NEO4J_USERNAME,
      password: config.NEO4J_PASSWORD,
    });

    // Constraints and indexes
    await initializeSchema();

    await neo4jService.close();
    process.exit(0);
  } catch (error) {
    console.error('Failed to initialize schema:', error);
    await neo4jService.close();
    process.exit(1);
  }
}

void main();
