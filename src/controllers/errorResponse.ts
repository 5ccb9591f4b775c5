import type { Response } from 'express';
import type { ZodIssue } from 'zod';
import {
  AmbiguousReferenceError,
  DescriptorValidationError,
  InvalidAssociationError,
  MergeConflictError,
  OrderingViolationError,
  isArchiveError,
  type ArchiveErrorCode,
} from '../errors/archiveErrors.js';

const STATUS_BY_CODE: Record<ArchiveErrorCode, number> = {
  INVALID_DESCRIPTOR: 400,
  ENTITY_NOT_FOUND: 404,
  AMBIGUOUS_REFERENCE: 409,
  MERGE_CONFLICT: 409,
  INVALID_ASSOCIATION: 422,
  ORDERING_VIOLATION: 422,
};

export interface ErrorBody {
  error: string;
  message: string;
  details?: unknown;
}

function detailsOf(error: unknown): unknown {
  if (error instanceof DescriptorValidationError) return { issues: error.issues };
  if (error instanceof AmbiguousReferenceError) return { kind: error.kind, candidates: error.candidates };
  if (error instanceof InvalidAssociationError) return { descriptor: error.descriptor };
  if (error instanceof MergeConflictError) return { kind: error.kind, entityId: error.entityId, conflicts: error.conflicts };
  if (error instanceof OrderingViolationError) {
    return {
      kind: error.kind,
      sequence: error.sequenceName,
      entryDate: error.entryDate,
      declaredPosition: error.declaredPosition,
      chronologicalPosition: error.chronologicalPosition,
    };
  }
  return undefined;
}

export function errorBody(error: unknown): ErrorBody {
  if (isArchiveError(error)) {
    return { error: error.code, message: error.message, details: detailsOf(error) };
  }
  return { error: 'INTERNAL_ERROR', message: error instanceof Error ? error.message : 'Unknown error' };
}

export function sendError(res: Response, error: unknown): void {
  if (isArchiveError(error)) {
    res.status(STATUS_BY_CODE[error.code]).json(errorBody(error));
    return;
  }
  console.error('Error:', error);
  res.status(500).json(errorBody(error));
}

export function sendValidationError(res: Response, subject: string, issues: ZodIssue[]): void {
  sendError(res, new DescriptorValidationError(subject, issues));
}
