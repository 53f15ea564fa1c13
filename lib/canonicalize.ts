/**
 * Canonicalization: surface form -> normalized key -> canonical entity.
 *
 * Two tracks per surface form:
 * - canonicalKey(): aggressive grouping key (lowercase alphanumerics only)
 * - normalizeDisplay(): cleaned string that keeps the writer's casing
 *
 * canonicalize() is two-pass. Pass 1 clusters every mention by key and counts
 * display variants; pass 2 picks display names. Naming on first sight would
 * make the output depend on document order.
 */

import type { Lexicon, AliasRecord } from './lexicon';
import type { CanonicalEntity, CanonicalMention, RawMention, VariantCount } from '@/types';

const DASH_RE = /[\u2010-\u2015\u2212\uFE58\uFE63\uFF0D]/g;
const TRAILING_PUNCT_RE = /[\s.,;:!?)\]}>"'\u2019\u201D]+$/;
const LEADING_PUNCT_RE = /^[\s(\[{<"'\u2018\u201C]+/;

// "Q-150" / "Q 150" -> "Q150" (lone letter followed by 2-4 digits).
// Not after "&"/"and": the W of "B & W 607" is part of the brand.
const LETTER_DASH_DIGITS_RE = /(?<=^|\s)(?<!(?:&|\band)\s*)([A-Za-z])-(\d{2,4})\b/g;
const LETTER_SPACE_DIGITS_RE = /(?<=^|\s)(?<!(?:&|\band)\s*)([A-Za-z])\s+(\d{2,4})\b/g;

const BW_PHRASE_RE = /\bbowers\s*(?:&|and)?\s*wilkins\b/gi;
const BW_RE = /\b(?:b\s*&\s*w|b\s+and\s+w)\b/gi;
const BW_BARE_RE = /^(?:bowers|wilkins)(?![a-z])/i;

export function normalizeDashes(s: string): string {
  return s.replace(DASH_RE, '-');
}

export function normalizeDisplay(raw: string): string {
  return normalizeDashes(raw.normalize('NFKC'))
    .replace(/\s*-\s*/g, '-')
    .replace(LEADING_PUNCT_RE, '')
    .replace(TRAILING_PUNCT_RE, '')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(LETTER_DASH_DIGITS_RE, '$1$2')
    .replace(LETTER_SPACE_DIGITS_RE, '$1$2');
}

/**
 * Normalized clustering key: lowercase, accents stripped, "B&W" spellings
 * collapsed, every non-alphanumeric dropped. "RP-600M", "RP 600M" and
 * "rp600m" share a key.
 */
export function canonicalKey(raw: string): string {
  return normalizeDisplay(raw)
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(BW_PHRASE_RE, 'bw')
    .replace(BW_RE, 'bw')
    .replace(BW_BARE_RE, 'bw')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '');
}

/**
 * String a mention is keyed and displayed by. An inferred brand is put in
 * front of the bare model token.
 */
export function mentionForm(mention: RawMention): string {
  if (!mention.inferredBrand) return mention.surfaceForm;
  return `${mention.inferredBrand} ${normalizeDisplay(mention.surfaceForm).toUpperCase()}`;
}

export type ResolvedKey = {
  key: string;
  alias: AliasRecord | null;
};

/**
 * Pure: same surface form + same alias table -> same entity key
 */
export function resolveKey(surfaceForm: string, lexicon: Lexicon): ResolvedKey {
  const own = canonicalKey(surfaceForm);
  const alias = own ? lexicon.aliases.get(own) ?? null : null;
  return { key: alias ? alias.key : own, alias };
}

type VariantTally = { count: number; firstSeen: number };

type Cluster = Map<string, VariantTally>;

export type CanonicalizeResult = {
  entities: Map<string, CanonicalEntity>;  // keyed by entity key, sorted by key
  mentions: CanonicalMention[];
  unresolved: number;                      // surface forms with an empty key
};

function orderVariants(variants: Map<string, VariantTally>): (VariantCount & { firstSeen: number })[] {
  return Array.from(variants.entries())
    .map(([variant, t]) => ({ variant, count: t.count, firstSeen: t.firstSeen }))
    .sort((a, b) => b.count - a.count || a.firstSeen - b.firstSeen);
}

export function canonicalize(mentions: RawMention[], lexicon: Lexicon): CanonicalizeResult {
  const clusters = new Map<string, Cluster>();
  const resolved: CanonicalMention[] = [];
  let unresolved = 0;

  // Pass 1: cluster and count variants
  mentions.forEach((mention, index) => {
    const form = mentionForm(mention);
    const { key } = resolveKey(form, lexicon);
    if (!key) {
      unresolved++;
      return;
    }

    let cluster = clusters.get(key);
    if (!cluster) {
      cluster = new Map();
      clusters.set(key, cluster);
    }

    const variant = normalizeDisplay(form);
    const tally = cluster.get(variant);
    if (tally) {
      tally.count++;
    } else {
      cluster.set(variant, { count: 1, firstSeen: index });
    }

    resolved.push({ mention, entityKey: key });
  });

  // Pass 2: display names (curated alias, else most frequent, first seen on ties)
  const entities = new Map<string, CanonicalEntity>();
  const keys = Array.from(clusters.keys()).sort();
  for (const key of keys) {
    const cluster = clusters.get(key);
    if (!cluster) continue;

    const ordered = orderVariants(cluster);
    const curated = lexicon.curated.get(key);
    entities.set(key, {
      key,
      displayName: curated ?? ordered[0].variant,
      aliased: curated !== undefined,
      variants: ordered.map(({ variant, count }) => ({ variant, count }))
    });
  }

  return { entities, mentions: resolved, unresolved };
}
