import { z } from 'zod';
import { EntityKinds, RelationshipKinds, SceneAssociationKinds } from '../constants/graph.js';
import { isoDateSchema } from './entryDescriptor.js';

/**
 * Request shapes for the archive HTTP API
 */

export const entityKindSchema = z.nativeEnum(EntityKinds);

export const syncSubjectKindSchema = z.union([entityKindSchema, z.literal('Entry')]);

export const sequenceKindSchema = z.enum(['Thread', 'Arc']);

export const reconcileModeSchema = z.enum(['replace', 'merge']).default('replace');

export const entryDateParamsSchema = z.object({ date: isoDateSchema });

export const entityParamsSchema = z.object({ kind: entityKindSchema, id: z.string().min(1) });

export const listEntitiesQuerySchema = z.object({
  includeDeleted: z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => value === 'true'),
});

export const reconcileBatchSchema = z.object({
  descriptors: z.array(z.unknown()).min(1),
  mode: reconcileModeSchema,
  concurrency: z.number().int().positive().max(32).optional(),
});

export const syncParamsSchema = z.object({ kind: syncSubjectKindSchema, id: z.string().min(1) });

export const sweepRequestSchema = z.object({
  graceDays: z.number().int().nonnegative().optional(),
  orphanMinAgeMinutes: z.number().int().nonnegative().optional(),
});

export const associationKindSchema = z.union([z.nativeEnum(RelationshipKinds), z.nativeEnum(SceneAssociationKinds)]);

export const associationTombstonesQuerySchema = z.object({
  kind: associationKindSchema.optional(),
  sourceId: z.string().min(1).optional(),
  limit: z.coerce.number().int().positive().max(1000).optional(),
});
