import natural from 'natural';
import crypto from 'crypto';
import { STEMMED_KINDS, type EntityKind } from '../constants/graph.js';

const tokenizer = new natural.WordTokenizer();

/**
 * Case- and diacritic-insensitive folding: "Café Zoë" → "cafe zoe"
 */
export function foldText(value: string): string {
  return value
    .normalize('NFKD')
    .replace(/\p{M}/gu, '')
    .toLowerCase()
    .trim();
}

/**
 * Normalizes entity names for natural-key matching.
 * Handles:
 * - Case and diacritic folding
 * - Tokenization (punctuation and repeated whitespace collapse)
 * - Optional stemming for concept-like names (plural → singular)
 *
 * Examples:
 * - "  Zoë  O'Brien " → "zoe o brien"
 * - "Saint-Étienne" → "saint etienne"
 * - "Travels" (stemmed) → "travel"
 */
export function normalizeEntityName(name: string, options: { stem?: boolean } = {}): string {
  if (!name || typeof name !== 'string') {
    return '';
  }

  const folded = foldText(name);
  const tokens = tokenizer.tokenize(folded) || [];

  // Scripts the tokenizer does not split keep their folded form
  if (tokens.length === 0) {
    return folded.replace(/\s+/g, ' ');
  }

  const finalTokens = options.stem ? tokens.map((token) => natural.PorterStemmer.stem(token)) : tokens;
  return finalTokens.join(' ');
}

/**
 * Natural-key name for an entity kind (concept kinds are stemmed)
 */
export function normalizeNameKey(kind: EntityKind, name: string): string {
  return normalizeEntityName(name, { stem: STEMMED_KINDS.has(kind) });
}

/**
 * Disambiguator key; '' when absent
 */
export function normalizeDisambiguatorKey(disambiguator: string | null | undefined): string {
  if (!disambiguator) {
    return '';
  }
  return normalizeEntityName(disambiguator);
}

/**
 * Free-text locator key (motif excerpts, scene references): folded, whitespace collapsed
 */
export function normalizeLocatorKey(locator: string): string {
  return foldText(locator).replace(/\s+/g, ' ');
}

/**
 * Lock key shared by everything that creates or resolves an entity of this kind and name
 */
export function naturalKeyLockId(kind: EntityKind, nameKey: string): string {
  return `${kind}:${nameKey}`;
}

/**
 * Stable SHA-256 of text content (poem versions)
 */
export function hashContent(content: string): string {
  return crypto.createHash('sha256').update(content).digest('hex');
}
