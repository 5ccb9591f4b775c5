/**
 * Entity lifecycle state machine
 *
 *   active ──lastReferenceRemoved──▶ tombstoned ──graceElapsed──▶ purged
 *      ▲                                 │
 *      └───────────referenced────────────┘
 *
 * A tombstone is the deleted_at timestamp on the entity row; purged entities no
 * longer have a row.
 */

export type LifecycleState = 'active' | 'tombstoned' | 'purged';

export type LifecycleEvent = 'referenced' | 'lastReferenceRemoved' | 'graceElapsed';

const TRANSITIONS: Record<LifecycleState, Partial<Record<LifecycleEvent, LifecycleState>>> = {
  active: {
    referenced: 'active',
    lastReferenceRemoved: 'tombstoned',
  },
  tombstoned: {
    referenced: 'active',
    lastReferenceRemoved: 'tombstoned',
    graceElapsed: 'purged',
  },
  purged: {},
};

export function nextLifecycleState(state: LifecycleState, event: LifecycleEvent): LifecycleState {
  const next = TRANSITIONS[state][event];
  if (!next) {
    throw new Error(`Invalid lifecycle transition: ${event} from ${state}`);
  }
  return next;
}

export function lifecycleStateOf(node: { deleted_at: string | null } | null): LifecycleState {
  if (!node) return 'purged';
  return node.deleted_at ? 'tombstoned' : 'active';
}

/**
 * Whether a tombstone set at `deletedAt` has outlived the grace window at `now`
 */
export function graceElapsed(deletedAt: string, now: Date, graceDays: number): boolean {
  const graceMs = graceDays * 24 * 60 * 60 * 1000;
  return now.getTime() - new Date(deletedAt).getTime() >= graceMs;
}
