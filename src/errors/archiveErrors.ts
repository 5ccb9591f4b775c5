/**
 * Error taxonomy for the reconciliation engine.
 *
 * Every error is scoped to one entry or one entity: it aborts only the
 * transaction it was raised in and carries the offending descriptor.
 */

import type { ZodIssue } from 'zod';
import type { EntityKind } from '../constants/graph.js';
import type { FieldConflict, SyncSubjectKind } from '../types/graph.js';

export type ArchiveErrorCode =
  | 'AMBIGUOUS_REFERENCE'
  | 'INVALID_ASSOCIATION'
  | 'ORDERING_VIOLATION'
  | 'MERGE_CONFLICT'
  | 'ENTITY_NOT_FOUND'
  | 'INVALID_DESCRIPTOR';

export abstract class ArchiveError extends Error {
  abstract readonly code: ArchiveErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export interface AmbiguousCandidate {
  id: string;
  name: string;
  disambiguator: string | null;
}

export class AmbiguousReferenceError extends ArchiveError {
  readonly code = 'AMBIGUOUS_REFERENCE';

  constructor(
    readonly kind: EntityKind,
    readonly descriptor: unknown,
    readonly candidates: AmbiguousCandidate[]
  ) {
    const names = candidates
      .map((c) => (c.disambiguator ? `${c.name} (${c.disambiguator})` : c.name))
      .join(', ');
    super(`Ambiguous ${kind} reference ${JSON.stringify(descriptor)}; add a disambiguator. Candidates: ${names}`);
  }
}

export class InvalidAssociationError extends ArchiveError {
  readonly code = 'INVALID_ASSOCIATION';

  constructor(
    readonly reason: string,
    readonly descriptor: unknown
  ) {
    super(`Invalid association: ${reason} (${JSON.stringify(descriptor)})`);
  }
}

export class OrderingViolationError extends ArchiveError {
  readonly code = 'ORDERING_VIOLATION';

  constructor(
    readonly kind: 'Thread' | 'Arc',
    readonly sequenceName: string,
    readonly entryDate: string,
    readonly declaredPosition: number,
    readonly chronologicalPosition: number
  ) {
    super(
      `${kind} "${sequenceName}": entry ${entryDate} declared at position ${declaredPosition} ` +
        `but its date places it at position ${chronologicalPosition}`
    );
  }
}

export class MergeConflictError extends ArchiveError {
  readonly code = 'MERGE_CONFLICT';

  constructor(
    readonly kind: SyncSubjectKind,
    readonly entityId: string,
    readonly conflicts: FieldConflict[]
  ) {
    super(
      `Conflicting edits on ${kind} ${entityId}: ${conflicts.map((c) => c.field).join(', ')} changed in both the store and the note page`
    );
  }
}

export class EntityNotFoundError extends ArchiveError {
  readonly code = 'ENTITY_NOT_FOUND';

  constructor(
    readonly kind: SyncSubjectKind,
    readonly identifier: string
  ) {
    super(`${kind} ${identifier} not found`);
  }
}

export class DescriptorValidationError extends ArchiveError {
  readonly code = 'INVALID_DESCRIPTOR';

  constructor(
    readonly subject: string,
    readonly issues: ZodIssue[]
  ) {
    super(
      `Invalid ${subject}: ${issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')}`
    );
  }
}

export function isArchiveError(error: unknown): error is ArchiveError {
  return error instanceof ArchiveError;
}
