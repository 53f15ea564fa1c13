/**
 * Brand list, junk tokens, speaker-context words and curated aliases for
 * mention extraction.
 *
 * The lexicon is built once and passed into the extractor and the
 * canonicalizer; tests build smaller ones with makeLexicon().
 */

import { z } from 'zod';
import lexiconSeed from '../config/lexicon.json';
import { canonicalKey, normalizeDisplay } from './canonicalize';

export type AliasSeed = {
  alias: string;
  canonical: string;
};

export type LexiconSeed = {
  brands: string[];
  junkTokens?: string[];
  contextWords?: string[];
  aliases?: AliasSeed[];
};

export type AliasRecord = {
  key: string;          // canonical key of the curated entity
  displayName: string;  // preferred display string
};

export type Lexicon = {
  readonly brands: readonly string[];
  readonly junkTokens: ReadonlySet<string>;
  // words that let a bare model token borrow a brand ("speakers", "amp")
  readonly contextWords: readonly string[];
  // normalized alias key -> curated entity
  readonly aliases: ReadonlyMap<string, AliasRecord>;
  // entity key -> curated display name
  readonly curated: ReadonlyMap<string, string>;
  // surface strings matched as whole phrases (aliases and their targets)
  readonly phrases: readonly string[];
};

const lexiconFileSchema = z.object({
  brands: z.array(z.string().trim().min(1)).min(1),
  junk_tokens: z.array(z.string().trim().min(1)).default([]),
  context_words: z.array(z.string().trim().min(1)).default([]),
  aliases: z
    .array(z.object({
      alias: z.string().trim().min(1),
      canonical: z.string().trim().min(1)
    }))
    .default([])
});

export function makeLexicon(seed: LexiconSeed): Lexicon {
  const aliases = new Map<string, AliasRecord>();
  const curated = new Map<string, string>();
  const phrases = new Set<string>();

  for (const a of seed.aliases ?? []) {
    const displayName = normalizeDisplay(a.canonical);
    const targetKey = canonicalKey(displayName);
    const aliasKey = canonicalKey(a.alias);
    if (!targetKey || !aliasKey) continue;

    const record: AliasRecord = { key: targetKey, displayName };
    aliases.set(aliasKey, record);
    // The curated name resolves to itself, so "kefq150" picks up "KEF Q150"
    if (!aliases.has(targetKey)) aliases.set(targetKey, record);
    if (!curated.has(targetKey)) curated.set(targetKey, displayName);

    phrases.add(normalizeDisplay(a.alias));
    phrases.add(displayName);
  }

  return Object.freeze({
    brands: Object.freeze([...new Set(seed.brands.map(b => b.trim()).filter(Boolean))]),
    junkTokens: new Set((seed.junkTokens ?? []).map(t => t.toUpperCase())),
    contextWords: Object.freeze([...new Set((seed.contextWords ?? []).map(w => w.trim().toLowerCase()).filter(Boolean))]),
    aliases,
    curated,
    phrases: Object.freeze([...phrases])
  });
}

/**
 * Parse a lexicon file body (config/lexicon.json shape)
 */
export function parseLexiconFile(input: unknown): Lexicon {
  const parsed = lexiconFileSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`);
    throw new Error(`Invalid lexicon file:\n${issues.map(i => `  - ${i}`).join('\n')}`);
  }

  return makeLexicon({
    brands: parsed.data.brands,
    junkTokens: parsed.data.junk_tokens,
    contextWords: parsed.data.context_words,
    aliases: parsed.data.aliases
  });
}

let defaultLexicon: Lexicon | null = null;

export function getDefaultLexicon(): Lexicon {
  if (!defaultLexicon) {
    defaultLexicon = parseLexiconFile(lexiconSeed);
  }
  return defaultLexicon;
}
