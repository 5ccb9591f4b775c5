/**
 * Environment configuration
 *
 * Loaded once from process.env (and .env via dotenv), validated with zod.
 */

import 'dotenv/config';
import { z } from 'zod';
import { DEFAULT_ASSOCIATION_TOMBSTONE_TTL_DAYS, DEFAULT_TOMBSTONE_GRACE_DAYS } from '../constants/graph.js';

const envSchema = z
  .object({
    NODE_ENV: z.string().default('development'),
    PORT: z.coerce.number().int().positive().default(3001),
    STORE_BACKEND: z.enum(['neo4j', 'memory']).default('neo4j'),
    NEO4J_URI: z.string().optional(),
    NEO4J_USERNAME: z.string().optional(),
    NEO4J_PASSWORD: z.string().optional(),
    TOMBSTONE_GRACE_DAYS: z.coerce.number().int().nonnegative().default(DEFAULT_TOMBSTONE_GRACE_DAYS),
    SWEEP_CRON: z.string().default('0 3 * * *'),
    ASSOCIATION_TOMBSTONE_TTL_DAYS: z.coerce
      .number()
      .int()
      .positive()
      .default(DEFAULT_ASSOCIATION_TOMBSTONE_TTL_DAYS),
    RECONCILE_CONCURRENCY: z.coerce.number().int().positive().default(4),
    PGBOSS_DATABASE_URL: z.string().optional(),
    DATABASE_URL: z.string().optional(),
    TRACING_MODE: z.enum(['console', 'disabled']).optional(),
  })
  .superRefine((env, ctx) => {
    if (env.STORE_BACKEND !== 'neo4j') return;
    for (const key of ['NEO4J_URI', 'NEO4J_USERNAME', 'NEO4J_PASSWORD'] as const) {
      if (!env[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `${key} is required when STORE_BACKEND=neo4j`,
        });
      }
    }
  });

export type AppConfig = z.infer<typeof envSchema>;

let cached: AppConfig | null = null;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
    throw new Error(`Invalid environment configuration:\n${details}`);
  }
  return parsed.data;
}

/**
 * Process-wide configuration (parsed on first use)
 */
export function getConfig(): AppConfig {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}

export function queueDatabaseUrl(config: AppConfig): string {
  const url = config.PGBOSS_DATABASE_URL || config.DATABASE_URL;
  if (!url) {
    throw new Error('PGBOSS_DATABASE_URL or DATABASE_URL environment variable is required for pg-boss');
  }
  return url;
}
