/**
 * OpenTelemetry tracing utilities for the archive backend
 *
 * Provides helper functions for creating custom spans with proper attributes,
 * sanitizing sensitive metadata, and building standard attribute sets.
 */

import { trace, SpanStatusCode, type Span } from '@opentelemetry/api';

// ============================================================================
// Constants for standard attribute keys
// ============================================================================

export const TraceAttributes = {
  // Entry context
  ENTRY_DATE: 'entryDate',
  RECONCILE_MODE: 'reconcileMode',

  // Operation metadata
  OPERATION_TYPE: 'operationType',
  OPERATION_NAME: 'operationName',
  ENTITY_TYPE: 'entityType',
  ENTITY_ID: 'entityId',
  RELATIONSHIP_KIND: 'relationshipKind',

  // Counts
  ITEM_COUNT: 'itemCount',
  CHANGE_COUNT: 'changeCount',
} as const;

export type SpanAttributes = Record<string, string | number | boolean | undefined>;

/**
 * Get the OpenTelemetry tracer instance for the archive backend
 */
export function getTracer() {
  return trace.getTracer('journal-archive', '1.0.0');
}

// ============================================================================
// Span wrapper for async operations
// ============================================================================

/**
 * Wrap an async function with OpenTelemetry span tracking
 *
 * @param name - Span name (e.g., "reconcile.entry", "resolver.resolve")
 * @param attributes - Span attributes for context
 * @param fn - Async function to execute; receives the span for attributes known only at the end
 *
 * @example
 * const report = await withSpan('reconcile.entry', {
 *   entryDate: '2024-03-01',
 * }, async () => {
 *   return await reconcileOnce(descriptor);
 * });
 */
export async function withSpan<T>(name: string, attributes: SpanAttributes, fn: (span: Span) => Promise<T>): Promise<T> {
  const tracer = getTracer();
  const sanitized = sanitizeMetadata(attributes);

  return tracer.startActiveSpan(name, { attributes: sanitized }, async (span) => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: errorMessage,
      });
      span.recordException(error instanceof Error ? error : new Error(String(error)));
      throw error;
    } finally {
      span.end();
    }
  });
}

// ============================================================================
// Metadata sanitization
// ============================================================================

/**
 * Remove free text from span attributes
 *
 * DO NOT include in spans:
 * - Entry notes, poem content or quoted references
 * - Note-page field values
 * - Credentials
 *
 * SAFE to include:
 * - Entity ids and kinds
 * - Entry dates
 * - Counts and modes
 */
export function sanitizeMetadata(
  metadata: Record<string, string | number | boolean | undefined | null>
): Record<string, string | number | boolean> {
  const sanitized: Record<string, string | number | boolean> = {};

  for (const [key, value] of Object.entries(metadata)) {
    if (value === null || value === undefined) {
      continue;
    }

    const lowered = key.toLowerCase();
    if (
      lowered.includes('password') ||
      lowered.includes('secret') ||
      lowered.includes('token') ||
      lowered.includes('content') ||
      lowered.includes('notes') ||
      lowered.includes('description')
    ) {
      continue;
    }

    sanitized[key] = value;
  }

  return sanitized;
}

// ============================================================================
// Standard attribute builders
// ============================================================================

/**
 * Build entity/node operation attributes
 */
export function buildEntityAttributes(
  entityType: string,
  operationType: 'create' | 'update' | 'delete' | 'query' | 'resolve' | 'merge'
): SpanAttributes {
  return {
    [TraceAttributes.ENTITY_TYPE]: entityType,
    [TraceAttributes.OPERATION_TYPE]: operationType,
  };
}
