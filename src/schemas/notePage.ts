import { z } from 'zod';
import { fieldValueSchema } from './entryDescriptor.js';

/**
 * Field values read back from an edited note page
 */
export const noteFieldsSchema = z.record(fieldValueSchema);

export const notePageSchema = z.object({
  fields: noteFieldsSchema,
});

/**
 * Shape of an editable field value; computed fields are display-only and accept anything
 */
export function editableValueSchema(field: string) {
  if (field === 'aliases') {
    return z.array(z.string().trim().min(1));
  }
  return z.string().nullable();
}

export const conflictResolutionSchema = z.object({
  field: z.string().min(1),
  choice: z.union([z.literal('store'), z.literal('note'), z.object({ value: fieldValueSchema })]),
});

export type NoteFields = z.infer<typeof noteFieldsSchema>;
export type ConflictChoice = z.infer<typeof conflictResolutionSchema>['choice'];

/**
 * Note fields accepted for a kind: its editable fields with their value shapes,
 * its computed fields as display-only values. Anything else is rejected.
 */
export function noteFieldsSchemaFor(editable: readonly string[], computed: readonly string[]) {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const field of computed) {
    shape[field] = fieldValueSchema.optional();
  }
  for (const field of editable) {
    shape[field] = editableValueSchema(field).optional();
  }
  return z.object(shape).strict();
}
