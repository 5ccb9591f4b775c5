import crypto from 'crypto';

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, item] of entries) {
      if (item === undefined || item === null) continue;
      sorted[key] = canonicalize(item);
    }
    return sorted;
  }
  return value;
}

/**
 * JSON with sorted keys; null and undefined members are dropped so that
 * `{a: 1}` and `{a: 1, b: null}` compare equal.
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(canonicalize(value)) ?? 'null';
}

export function fingerprint(value: unknown): string {
  return crypto.createHash('sha256').update(stableStringify(value)).digest('hex');
}
