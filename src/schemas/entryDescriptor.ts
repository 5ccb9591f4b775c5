import { z } from 'zod';
import { isIsoDate } from '../utils/dates.js';
import { normalizeDisambiguatorKey, normalizeNameKey } from '../utils/entityNormalization.js';

/**
 * Entry descriptor schemas
 *
 * The ingestion collaborator emits one descriptor per entry with fourteen
 * relationship lists. Every list accepts bare strings for the common case; the
 * schemas normalize them to object specs so processors see a single shape.
 */

export const isoDateSchema = z.string().refine(isIsoDate, { message: 'Expected an ISO date (YYYY-MM-DD)' });

export const fieldValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(z.string())]);

export const attributesSchema = z.record(fieldValueSchema);

const nonEmpty = z.string().trim().min(1);

/**
 * Accept either the full object spec or a bare string for its `name` field
 */
function withShorthand<T extends z.ZodTypeAny>(schema: T, field: 'name' | 'date' = 'name') {
  const shorthand = (field === 'date' ? isoDateSchema : nonEmpty).transform((value) => ({ [field]: value }));
  return z.union([shorthand, schema]).pipe(schema);
}

/**
 * Natural-key reference used on its own or as the parent of another spec
 */
export const namedRefSchema = withShorthand(
  z.object({
    name: nonEmpty,
    disambiguator: nonEmpty.optional(),
    attributes: attributesSchema.optional(),
  })
);

export const personSpecSchema = withShorthand(
  z.object({
    name: nonEmpty,
    disambiguator: nonEmpty.optional(),
    alias: nonEmpty.optional(),
    relationType: nonEmpty.optional(),
    attributes: attributesSchema.optional(),
  })
);

export const locationSpecSchema = withShorthand(
  z.object({
    name: nonEmpty,
    city: namedRefSchema.optional(),
    attributes: attributesSchema.optional(),
  })
);

export const conceptSpecSchema = withShorthand(
  z.object({
    name: nonEmpty,
    attributes: attributesSchema.optional(),
  })
);

export const narratedDateSpecSchema = withShorthand(
  z.object({
    date: isoDateSchema,
    context: nonEmpty.optional(),
  }),
  'date'
);

export const REFERENCE_MODES = ['direct', 'indirect', 'paraphrase', 'visual'] as const;

export const referenceSpecSchema = z.object({
  content: nonEmpty.optional(),
  description: nonEmpty.optional(),
  speaker: nonEmpty.optional(),
  mode: z.enum(REFERENCE_MODES).default('direct'),
  source: namedRefSchema.optional(),
  attributes: attributesSchema.optional(),
});

export const poemSpecSchema = z.object({
  title: nonEmpty,
  disambiguator: nonEmpty.optional(),
  content: z.string().min(1),
});

export const sceneSpecSchema = withShorthand(
  z.object({
    name: nonEmpty,
    description: nonEmpty.optional(),
    people: z.array(personSpecSchema).default([]),
    locations: z.array(locationSpecSchema).default([]),
    dates: z.array(isoDateSchema).default([]),
  })
);

export const sceneEventSpecSchema = z.object({
  name: nonEmpty,
  disambiguator: nonEmpty.optional(),
  scenes: z.array(nonEmpty).min(1),
  attributes: attributesSchema.optional(),
});

export const sequenceSpecSchema = withShorthand(
  z.object({
    name: nonEmpty,
    disambiguator: nonEmpty.optional(),
    position: z.number().int().positive().optional(),
    attributes: attributesSchema.optional(),
  })
);

export const motifSpecSchema = withShorthand(
  z.object({
    name: nonEmpty,
    locator: z.string().default(''),
    attributes: attributesSchema.optional(),
  })
);

export const entryDescriptorSchema = z.object({
  date: isoDateSchema,
  digest: z.string().default(''),
  wordCount: z.number().int().nonnegative().default(0),
  people: z.array(personSpecSchema).default([]),
  cities: z.array(namedRefSchema).default([]),
  locations: z.array(locationSpecSchema).default([]),
  tags: z.array(conceptSpecSchema).default([]),
  themes: z.array(conceptSpecSchema).default([]),
  narratedDates: z.array(narratedDateSpecSchema).default([]),
  references: z.array(referenceSpecSchema).default([]),
  poems: z.array(poemSpecSchema).default([]),
  scenes: z.array(sceneSpecSchema).default([]),
  sceneEvents: z.array(sceneEventSpecSchema).default([]),
  entryEvents: z.array(namedRefSchema).default([]),
  threads: z.array(sequenceSpecSchema).default([]),
  arcs: z.array(sequenceSpecSchema).default([]),
  motifs: z.array(motifSpecSchema).default([]),
}).superRefine((descriptor, ctx) => {
  // A scene or poem appears once per entry; two specs with one key would fight over its contents
  const seenScenes = new Set<string>();
  descriptor.scenes.forEach((scene, index) => {
    const key = normalizeNameKey('Scene', scene.name);
    if (seenScenes.has(key)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['scenes', index, 'name'], message: `Duplicate scene "${scene.name}"` });
    }
    seenScenes.add(key);
  });

  const seenPoems = new Set<string>();
  descriptor.poems.forEach((poem, index) => {
    const key = `${normalizeNameKey('Poem', poem.title)}|${normalizeDisambiguatorKey(poem.disambiguator)}`;
    if (seenPoems.has(key)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['poems', index, 'title'], message: `Duplicate poem "${poem.title}"` });
    }
    seenPoems.add(key);
  });
});

export type NamedRefSpec = z.infer<typeof namedRefSchema>;
export type PersonSpec = z.infer<typeof personSpecSchema>;
export type LocationSpec = z.infer<typeof locationSpecSchema>;
export type ConceptSpec = z.infer<typeof conceptSpecSchema>;
export type NarratedDateSpec = z.infer<typeof narratedDateSpecSchema>;
export type ReferenceSpec = z.infer<typeof referenceSpecSchema>;
export type PoemSpec = z.infer<typeof poemSpecSchema>;
export type SceneSpec = z.infer<typeof sceneSpecSchema>;
export type SceneEventSpec = z.infer<typeof sceneEventSpecSchema>;
export type SequenceSpec = z.infer<typeof sequenceSpecSchema>;
export type MotifSpec = z.infer<typeof motifSpecSchema>;

/** Descriptor as accepted on input (strings allowed, lists optional) */
export type EntryDescriptorInput = z.input<typeof entryDescriptorSchema>;

/** Descriptor after validation and normalization */
export type EntryDescriptor = z.output<typeof entryDescriptorSchema>;

/**
 * Per-kind declared specs, keyed by relationship kind
 */
export interface DeclaredSpecs {
  people: PersonSpec[];
  cities: NamedRefSpec[];
  locations: LocationSpec[];
  tags: ConceptSpec[];
  themes: ConceptSpec[];
  narratedDates: NarratedDateSpec[];
  references: ReferenceSpec[];
  poems: PoemSpec[];
  scenes: SceneSpec[];
  sceneEvents: SceneEventSpec[];
  entryEvents: NamedRefSpec[];
  threads: SequenceSpec[];
  arcs: SequenceSpec[];
  motifs: MotifSpec[];
}

export const EMPTY_DECLARED_SPECS: Readonly<DeclaredSpecs> = {
  people: [],
  cities: [],
  locations: [],
  tags: [],
  themes: [],
  narratedDates: [],
  references: [],
  poems: [],
  scenes: [],
  sceneEvents: [],
  entryEvents: [],
  threads: [],
  arcs: [],
  motifs: [],
};
