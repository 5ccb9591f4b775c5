/**
 * Base Entity Resolver
 *
 * Natural-key resolution shared by every entity kind:
 * 1. Exact (name, disambiguator) match among non-deleted entities
 * 2. Name-only match when no disambiguator was given (ambiguity is an error)
 * 3. Alias match (kinds that carry aliases)
 * 4. Resurrection of a tombstone with the exact key
 * 5. Creation
 *
 * Each call runs under the natural-key lock and in its own store transaction,
 * so a created or resurrected entity is visible to every other resolver as
 * soon as the lock is released.
 */

import type { EntityKind } from '../../constants/graph.js';
import { AmbiguousReferenceError, InvalidAssociationError } from '../../errors/archiveErrors.js';
import type { ArchiveStore, StoreTransaction } from '../../repositories/types.js';
import type { EntityNode, EntityPatch, FieldMap } from '../../types/graph.js';
import {
  naturalKeyLockId,
  normalizeDisambiguatorKey,
  normalizeEntityName,
  normalizeNameKey,
} from '../../utils/entityNormalization.js';
import { fieldValuesEqual, pickEditable } from '../../utils/fieldOwnership.js';
import type { KeyedLock } from '../../utils/keyedLock.js';
import { buildEntityAttributes, withSpan } from '../../utils/tracing.js';
import { reactivate } from '../lifecycleService.js';
import type { EntityRef } from './types.js';

export interface ResolverContext {
  store: ArchiveStore;
  locks: KeyedLock;
  now: () => string;
}

/**
 * Normalized request handed to resolveByKey by the kind-specific resolvers
 */
export interface KeyedResolution {
  name: string;
  disambiguator: string | null;
  parentId: string | null;
  attributes: FieldMap;
  /** Alias to record on the matched entity (Person) */
  alias?: string;
  /** The matched entity must already hang under parentId */
  strictParent?: boolean;
  /** Original descriptor, reported on errors */
  descriptor: unknown;
}

export abstract class BaseResolver {
  constructor(
    protected readonly kind: EntityKind,
    protected readonly ctx: ResolverContext
  ) {}

  /**
   * Whether name-only lookups fall back to alias matches
   */
  protected get usesAliases(): boolean {
    return false;
  }

  getEntityType(): EntityKind {
    return this.kind;
  }

  protected async resolveByKey(request: KeyedResolution): Promise<EntityRef> {
    const nameKey = normalizeNameKey(this.kind, request.name);
    if (!nameKey) {
      throw new InvalidAssociationError(`${this.kind} name is empty`, request.descriptor);
    }

    return withSpan('resolver.resolve', buildEntityAttributes(this.kind, 'resolve'), () =>
      this.ctx.locks.run(naturalKeyLockId(this.kind, nameKey), () =>
        this.ctx.store.withTransaction((tx) => this.resolveInTransaction(tx, nameKey, request))
      )
    );
  }

  private async resolveInTransaction(tx: StoreTransaction, nameKey: string, request: KeyedResolution): Promise<EntityRef> {
    const disambiguatorKey = normalizeDisambiguatorKey(request.disambiguator);
    const now = this.ctx.now();

    const match = await this.findActive(tx, nameKey, disambiguatorKey, request);
    if (match) {
      if (request.strictParent && match.parent_id !== request.parentId) {
        throw new InvalidAssociationError(
          `${this.kind} "${match.name}" already belongs to a different parent`,
          request.descriptor
        );
      }
      const refreshed = await this.refresh(tx, match, request, now);
      return this.toRef(refreshed, 'matched');
    }

    const tombstone = await tx.entities.findLatestTombstone(this.kind, nameKey, disambiguatorKey);
    if (tombstone) {
      const revived = await reactivate(tx, tombstone, now);
      const refreshed = await this.refresh(tx, revived, request, now);
      return this.toRef(refreshed, 'resurrected');
    }

    const aliasKey = request.alias ? normalizeEntityName(request.alias) : null;
    const attributes = pickEditable(this.kind, request.attributes);
    if (request.alias && aliasKey) {
      attributes.aliases = [request.alias];
    }

    const created = await tx.entities.create(
      {
        kind: this.kind,
        name: request.name.trim(),
        name_key: nameKey,
        disambiguator: request.disambiguator?.trim() || null,
        disambiguator_key: disambiguatorKey,
        parent_id: request.parentId,
        alias_keys: aliasKey ? [aliasKey] : [],
        attributes,
      },
      now
    );
    return this.toRef(created, 'created');
  }

  /**
   * Active lookup: exact key with a disambiguator; otherwise unique name, then unique alias
   */
  private async findActive(
    tx: StoreTransaction,
    nameKey: string,
    disambiguatorKey: string,
    request: KeyedResolution
  ): Promise<EntityNode | null> {
    if (disambiguatorKey) {
      return tx.entities.findActiveByKey(this.kind, nameKey, disambiguatorKey);
    }

    const byName = await tx.entities.findActiveByName(this.kind, nameKey);
    if (byName.length > 1) {
      throw this.ambiguous(request.descriptor, byName);
    }
    if (byName.length === 1) {
      return byName[0];
    }

    if (!this.usesAliases) {
      return null;
    }

    const byAlias = await tx.entities.findActiveByAlias(this.kind, nameKey);
    if (byAlias.length > 1) {
      throw this.ambiguous(request.descriptor, byAlias);
    }
    return byAlias[0] ?? null;
  }

  /**
   * Apply descriptor attributes to a matched entity. Only editable fields are
   * written; computed fields in the descriptor are dropped.
   */
  private async refresh(tx: StoreTransaction, entity: EntityNode, request: KeyedResolution, now: string): Promise<EntityNode> {
    const patch: EntityPatch = {};

    const incoming = pickEditable(this.kind, request.attributes);
    const changed = Object.entries(incoming).filter(([field, value]) => !fieldValuesEqual(entity.attributes[field], value));
    const attributes: FieldMap = { ...entity.attributes };
    for (const [field, value] of changed) {
      attributes[field] = value;
    }

    if (request.alias) {
      const aliasKey = normalizeEntityName(request.alias);
      if (aliasKey && aliasKey !== entity.name_key && !entity.alias_keys.includes(aliasKey)) {
        patch.alias_keys = [...entity.alias_keys, aliasKey];
        const displayed = Array.isArray(attributes.aliases) ? attributes.aliases : [];
        attributes.aliases = [...displayed, request.alias];
        changed.push(['aliases', attributes.aliases]);
      }
    }

    if (changed.length > 0) {
      patch.attributes = attributes;
    }
    if (request.parentId !== null && request.parentId !== entity.parent_id) {
      patch.parent_id = request.parentId;
    }

    if (Object.keys(patch).length === 0) {
      return entity;
    }
    return tx.entities.update(entity.id, patch, now);
  }

  private ambiguous(descriptor: unknown, candidates: EntityNode[]): AmbiguousReferenceError {
    return new AmbiguousReferenceError(
      this.kind,
      descriptor,
      candidates.map((c) => ({ id: c.id, name: c.name, disambiguator: c.disambiguator }))
    );
  }

  protected toRef(entity: EntityNode, outcome: EntityRef['outcome']): EntityRef {
    return {
      id: entity.id,
      kind: entity.kind,
      name: entity.name,
      nameKey: entity.name_key,
      disambiguator: entity.disambiguator,
      parentId: entity.parent_id,
      outcome,
    };
  }
}
