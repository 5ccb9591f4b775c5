import neo4j, { Driver, ManagedTransaction, Transaction } from 'neo4j-driver';
import type { z } from 'zod';

export interface Neo4jCredentials {
  uri?: string;
  username?: string;
  password?: string;
}

/**
 * Converts Neo4j-specific types to JavaScript primitives
 * Handles: Integer, Date, DateTime, LocalDateTime, Time, LocalTime, Duration, Point
 */
export function serializeNeo4jValue(value: unknown): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  // Neo4j Integer (the main culprit)
  if (neo4j.isInt(value)) {
    return value.toNumber();
  }

  if (neo4j.isDate(value) || neo4j.isDateTime(value) || neo4j.isLocalDateTime(value)) {
    return value.toString();
  }

  if (neo4j.isTime(value) || neo4j.isLocalTime(value)) {
    return value.toString();
  }

  if (neo4j.isDuration(value)) {
    return value.toString();
  }

  if (neo4j.isPoint(value)) {
    return {
      x: value.x,
      y: value.y,
      z: value.z,
      srid: neo4j.isInt(value.srid) ? value.srid.toNumber() : value.srid,
    };
  }

  if (Array.isArray(value)) {
    return value.map(serializeNeo4jValue);
  }

  if (typeof value === 'object') {
    const serialized: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      serialized[key] = serializeNeo4jValue(val);
    }
    return serialized;
  }

  return value;
}

/**
 * Run a Cypher statement inside an open transaction and validate each record
 */
export async function runQuery<S extends z.ZodTypeAny>(
  tx: Transaction | ManagedTransaction,
  cypher: string,
  params: Record<string, unknown>,
  rowSchema: S
): Promise<Array<z.output<S>>> {
  const result = await tx.run(cypher, params);
  return result.records.map((record) => rowSchema.parse(serializeNeo4jValue(record.toObject())));
}

/**
 * Run a Cypher statement whose result is not read
 */
export async function runStatement(
  tx: Transaction | ManagedTransaction,
  cypher: string,
  params: Record<string, unknown> = {}
): Promise<void> {
  await tx.run(cypher, params);
}

export class Neo4jService {
  private driver: Driver | null = null;

  /**
   * Initialize the Neo4j driver connection
   */
  async connect(credentials: Neo4jCredentials): Promise<void> {
    const { uri, username, password } = credentials;

    if (!uri || !username || !password) {
      throw new Error(
        'Missing Neo4j credentials. Please set NEO4J_URI, NEO4J_USERNAME, and NEO4J_PASSWORD environment variables.'
      );
    }

    try {
      this.driver = neo4j.driver(uri, neo4j.auth.basic(username, password));

      // Verify connectivity
      await this.driver.verifyConnectivity();
      console.log(`🔌 Connected to Neo4j at ${uri}`);
    } catch (error) {
      console.error('❌ Neo4j connection failed:', error);
      throw error;
    }
  }

  /**
   * Get the Neo4j driver instance
   */
  getDriver(): Driver {
    if (!this.driver) {
      throw new Error('Neo4j driver not initialized. Call connect() first.');
    }
    return this.driver;
  }

  /**
   * Close the Neo4j driver connection
   */
  async close(): Promise<void> {
    if (this.driver) {
      await this.driver.close();
      this.driver = null;
    }
  }

  /**
   * Execute a single auto-commit Cypher statement (schema management)
   */
  async executeQuery<S extends z.ZodTypeAny>(
    cypher: string,
    rowSchema: S,
    params: Record<string, unknown> = {}
  ): Promise<Array<z.output<S>>> {
    const session = this.getDriver().session();

    try {
      const result = await session.run(cypher, params);
      return result.records.map((record) => rowSchema.parse(serializeNeo4jValue(record.toObject())));
    } catch (error) {
      console.error('Neo4j query error:', error);
      throw error;
    } finally {
      await session.close();
    }
  }
}

// Export singleton instance
export const neo4jService = new Neo4jService();
