import { z } from 'zod';
import { ENTITY_KINDS, RELATIONSHIP_KINDS, SceneAssociationKinds, type AssociationKind, type EntityKind } from '../../constants/graph.js';
import { fieldValueSchema } from '../../schemas/entryDescriptor.js';

/**
 * Record shapes returned by Cypher queries
 *
 * Map-valued properties (attributes, metadata, baselines) are stored as JSON
 * strings because Neo4j properties cannot hold nested maps.
 */

const ASSOCIATION_KINDS: readonly AssociationKind[] = [...RELATIONSHIP_KINDS, ...Object.values(SceneAssociationKinds)];

function jsonOf<S extends z.ZodTypeAny>(schema: S) {
  return z
    .string()
    .transform((raw, ctx) => {
      try {
        const parsed: unknown = JSON.parse(raw);
        return parsed;
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Stored JSON is malformed' });
        return z.NEVER;
      }
    })
    .pipe(schema);
}

const entityKindSchema = z.custom<EntityKind>(
  (value) => typeof value === 'string' && ENTITY_KINDS.some((kind) => kind === value)
);

const associationKindSchema = z.custom<AssociationKind>(
  (value) => typeof value === 'string' && ASSOCIATION_KINDS.some((kind) => kind === value)
);

const nullableString = z.string().nullable().default(null);

export const fieldMapJson = jsonOf(z.record(fieldValueSchema));

export const entryRowSchema = z.object({
  entry: z.object({
    id: z.string(),
    date: z.string(),
    digest: z.string(),
    word_count: z.number(),
    notes: nullableString,
    deleted_at: nullableString,
    created_at: z.string(),
    updated_at: z.string(),
  }),
});

export const entityRowSchema = z.object({
  entity: z
    .object({
      id: z.string(),
      kind: entityKindSchema,
      name: z.string(),
      name_key: z.string(),
      disambiguator: nullableString,
      disambiguator_key: z.string(),
      parent_id: nullableString,
      alias_keys: z.array(z.string()).default([]),
      attributes_json: fieldMapJson,
      deleted_at: nullableString,
      created_at: z.string(),
      updated_at: z.string(),
    })
    .transform(({ attributes_json, ...rest }) => ({ ...rest, attributes: attributes_json })),
});

export const associationRowSchema = z.object({
  edge: z
    .object({
      kind: associationKindSchema,
      source_id: z.string(),
      target_id: z.string(),
      discriminator: z.string(),
      metadata_json: jsonOf(z.record(z.union([z.string(), z.number()]))),
      created_at: z.string(),
      updated_at: z.string(),
    })
    .transform(({ metadata_json, ...rest }) => ({ ...rest, metadata: metadata_json })),
});

export const poemVersionRowSchema = z.object({
  version: z.object({
    id: z.string(),
    poem_id: z.string(),
    entry_id: z.string(),
    content: z.string(),
    content_hash: z.string(),
    created_at: z.string(),
  }),
});

const fieldConflictSchema = z.object({
  field: z.string(),
  baseline: fieldValueSchema,
  store: fieldValueSchema,
  note: fieldValueSchema,
});

export const syncStateRowSchema = z.object({
  state: z
    .object({
      entity_id: z.string(),
      kind: z.union([entityKindSchema, z.literal('Entry')]),
      fingerprint: z.string(),
      baseline_json: fieldMapJson,
      last_merged_at: z.string(),
      conflict_detected: z.boolean(),
      conflict_resolved: z.boolean(),
      conflicts_json: jsonOf(z.array(fieldConflictSchema)),
    })
    .transform(({ baseline_json, conflicts_json, ...rest }) => ({
      ...rest,
      baseline: baseline_json,
      conflicts: conflicts_json,
    })),
});

export const associationTombstoneRowSchema = z.object({
  tombstone: z.object({
    id: z.string(),
    kind: associationKindSchema,
    source_id: z.string(),
    target_id: z.string(),
    discriminator: z.string(),
    removed_by: z.string(),
    sync_source: z.enum(['descriptor', 'manual']),
    reason: nullableString,
    removed_at: z.string(),
    expires_at: nullableString,
  }),
});

export const groupCountRowSchema = z.object({
  group: z.string(),
  count: z.number(),
});

export const countRowSchema = z.object({
  id: z.string(),
  count: z.number(),
});

export const emptyRowSchema = z.object({}).passthrough();
