/**
 * Lexical model-mention extraction from free text.
 * Strategy:
 * 1) Curated lexicon phrases ("LS50 Meta", "Diamond 12.1"), tolerant of
 *    spacing, hyphens and dots between letter and digit runs.
 * 2) Generic "BRAND MODEL" shape: a known brand followed by a model token that
 *    contains at least one digit ("KEF Q150", "kef-q150", "ELAC B6.2").
 * 3) Scan word starts left to right; the longest match at a start wins and
 *    scanning resumes after it, so mentions never overlap.
 * 4) Brand inference: in a record with speaker-context words, a bare model
 *    token ("R3", "ZX500") takes the record's most common brand, else the
 *    thread's. Runs after 1-3 and only claims text they left alone.
 */

import tuning from '../config/tuning.json';
import { canonicalKey, normalizeDashes, normalizeDisplay } from './canonicalize';
import type { Lexicon } from './lexicon';
import type { CandidateToken, FlatRecord, MentionMethod, RawMention } from '@/types';

export type ExtractedSpan = {
  surfaceForm: string;  // exact text span
  spanOffset: number;   // index in source text
  method: MentionMethod;
  inferredBrand?: string;
};

// brand label -> mention count
export type BrandCounts = Map<string, number>;

type Matcher = {
  method: MentionMethod;
  re: RegExp;  // sticky, case-insensitive
};

const MODEL_TOKEN = String.raw`[A-Z]?[A-Z0-9][A-Z0-9.\-]{1,20}\d[A-Z0-9.\-]{0,20}`;
const BRAND_MODEL_SEP = String.raw`(?:\s+|\s*-\s*)`;
const PHRASE_SEP = String.raw`[\s\-._/]*`;
const RUN_SEP = String.raw`[\s\-.]?`;

const STANDALONE_RE = new RegExp(String.raw`(?<![\w])(${MODEL_TOKEN})(?![\w])`, 'gi');
const TRAILING_JUNK_RE = /[.\-]+$/;
const WORD_CHAR_RE = /\w/;

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\\/-]/g, '\\$&');
}

export function brandPattern(brand: string): string {
  return brand
    .trim()
    .split(/\s+/)
    .map(part => part.split('&').map(escapeRegExp).join(String.raw`\s*&\s*`))
    .join(String.raw`\s+`);
}

/**
 * "KEF LS50 Meta" -> KEF[\s\-._/]*LS[\s\-.]?50[\s\-._/]*Meta
 */
export function phrasePattern(phrase: string): string {
  const chunks = phrase.match(/[A-Za-z]+|\d+|&|[\s\-._/]+|[^A-Za-z\d\s\-._/&]/g) ?? [];
  let out = '';
  let prev: 'alnum' | 'sep' | 'other' | null = null;

  for (const chunk of chunks) {
    if (/^[\s\-._/]+$/.test(chunk)) {
      if (prev !== 'sep' && prev !== null) out += PHRASE_SEP;
      prev = 'sep';
    } else if (chunk === '&') {
      out += String.raw`\s*(?:&|and)\s*`;
      prev = 'other';
    } else if (/^[A-Za-z\d]+$/.test(chunk)) {
      if (prev === 'alnum') out += RUN_SEP;
      out += escapeRegExp(chunk);
      prev = 'alnum';
    } else {
      out += escapeRegExp(chunk);
      prev = 'other';
    }
  }

  return out;
}

type Compiled = {
  matchers: Matcher[];
  leadingBrand: RegExp | null;
  context: RegExp | null;
};

const compiled = new WeakMap<Lexicon, Compiled>();

function compile(lexicon: Lexicon): Compiled {
  const cached = compiled.get(lexicon);
  if (cached) return cached;

  const matchers: Matcher[] = lexicon.phrases
    .map(phrase => phrasePattern(phrase))
    .filter(p => p.length > 0)
    .map(p => ({ method: 'lexicon' as const, re: new RegExp(`${p}(?![\\w])`, 'iy') }));

  // Longest brand first so "Q Acoustics" beats a shorter alternative
  const brands = [...lexicon.brands].sort((a, b) => b.length - a.length || (a < b ? -1 : a > b ? 1 : 0));
  const alternation = brands.map(brandPattern).join('|');
  if (brands.length > 0) {
    matchers.push({
      method: 'brand_pattern',
      re: new RegExp(`(?:${alternation})${BRAND_MODEL_SEP}(${MODEL_TOKEN})(?![\\w])`, 'iy')
    });
  }

  const words = lexicon.contextWords.map(escapeRegExp).join('|');
  const result: Compiled = {
    matchers,
    leadingBrand: brands.length > 0 ? new RegExp(`^(?:${alternation})(?![\\w])`, 'i') : null,
    context: words ? new RegExp(`(?<![\\w.])(?:${words})(?![\\w])`, 'i') : null
  };

  compiled.set(lexicon, result);
  return result;
}

const BRAND_FOLDS = new Map<string, string>([
  ['BW', 'B&W'],
  ['B & W', 'B&W'],
  ['B AND W', 'B&W'],
  ['BOWERS', 'B&W'],
  ['WILKINS', 'B&W'],
  ['BOWERS & WILKINS', 'B&W'],
  ['BOWERS AND WILKINS', 'B&W'],
  ['QACOUSTICS', 'Q ACOUSTICS']
]);

/**
 * Upper-case brand label used for brand counts: "b & w" -> "B&W"
 */
export function brandLabel(raw: string): string {
  const label = normalizeDisplay(raw).toUpperCase().replace(/\s*&\s*/g, ' & ');
  return BRAND_FOLDS.get(label) ?? label;
}

export function countBrands(spans: ExtractedSpan[], lexicon: Lexicon, into: BrandCounts = new Map()): BrandCounts {
  const { leadingBrand } = compile(lexicon);
  if (!leadingBrand) return into;

  for (const span of spans) {
    const m = leadingBrand.exec(span.surfaceForm);
    if (!m) continue;
    const label = brandLabel(m[0]);
    into.set(label, (into.get(label) ?? 0) + 1);
  }
  return into;
}

// Ties go to the brand counted first
function mostCommon(counts: BrandCounts): string | null {
  let best: string | null = null;
  let bestCount = 0;
  for (const [brand, count] of counts) {
    if (count > bestCount) {
      best = brand;
      bestCount = count;
    }
  }
  return best;
}

function overlaps(spans: ExtractedSpan[], start: number, end: number): boolean {
  return spans.some(s => start < s.spanOffset + s.surfaceForm.length && end > s.spanOffset);
}

function isWordStart(text: string, i: number): boolean {
  return WORD_CHAR_RE.test(text[i]) && (i === 0 || !WORD_CHAR_RE.test(text[i - 1]));
}

/**
 * Length of the usable match at `at`, or 0
 */
function matchAt(matcher: Matcher, text: string, at: number, lexicon: Lexicon): number {
  matcher.re.lastIndex = at;
  const m = matcher.re.exec(text);
  if (!m) return 0;

  if (matcher.method === 'lexicon') return m[0].length;

  const model = m[1].replace(TRAILING_JUNK_RE, '');
  if (!model || lexicon.junkTokens.has(model.toUpperCase())) return 0;
  return m[0].replace(TRAILING_JUNK_RE, '').length;
}

function scanText(text: string, lexicon: Lexicon): ExtractedSpan[] {
  const spans: ExtractedSpan[] = [];
  const { matchers } = compile(lexicon);
  // Same length as the source, so offsets index the original text
  const prepared = normalizeDashes(text);

  let i = 0;
  while (i < prepared.length) {
    if (!isWordStart(prepared, i)) {
      i++;
      continue;
    }

    let bestLength = 0;
    let bestMethod: MentionMethod = 'lexicon';
    for (const matcher of matchers) {
      const length = matchAt(matcher, prepared, i, lexicon);
      if (length > bestLength) {
        bestLength = length;
        bestMethod = matcher.method;
      }
    }

    if (bestLength > 0) {
      spans.push({ surfaceForm: text.slice(i, i + bestLength), spanOffset: i, method: bestMethod });
      i += bestLength;
    } else {
      i++;
    }
  }

  return spans;
}

function inferBrands(
  text: string,
  spans: ExtractedSpan[],
  lexicon: Lexicon,
  threadBrands: BrandCounts
): ExtractedSpan[] {
  const { context } = compile(lexicon);
  if (!context || !context.test(text)) return [];

  const brand = mostCommon(countBrands(spans, lexicon)) ?? mostCommon(threadBrands);
  if (!brand) return [];

  const inferred: ExtractedSpan[] = [];
  for (const m of normalizeDashes(text).matchAll(STANDALONE_RE)) {
    const start = m.index ?? 0;
    const token = m[1].replace(TRAILING_JUNK_RE, '');
    const end = start + token.length;
    if (overlaps(spans, start, end)) continue;

    const display = normalizeDisplay(token).toUpperCase();
    if (!looksLikeModel(display, lexicon)) continue;
    // Alias tokens belong to the lexicon matcher
    if (lexicon.aliases.has(canonicalKey(display))) continue;

    inferred.push({
      surfaceForm: text.slice(start, end),
      spanOffset: start,
      method: 'inferred_brand',
      inferredBrand: brand
    });
  }
  return inferred;
}

function withInferredBrands(
  text: string,
  spans: ExtractedSpan[],
  lexicon: Lexicon,
  threadBrands: BrandCounts
): ExtractedSpan[] {
  const inferred = inferBrands(text, spans, lexicon, threadBrands);
  if (inferred.length === 0) return spans;
  return [...spans, ...inferred].sort((a, b) => a.spanOffset - b.spanOffset);
}

/**
 * Mentions in one text. Brand inference runs only when the thread's brand
 * counts are passed in.
 */
export function extractFromText(text: string, lexicon: Lexicon, threadBrands?: BrandCounts): ExtractedSpan[] {
  const spans = scanText(text, lexicon);
  return threadBrands ? withInferredBrands(text, spans, lexicon, threadBrands) : spans;
}

export function extractMentions(records: FlatRecord[], lexicon: Lexicon): RawMention[] {
  const scanned = records.map(record => scanText(record.text, lexicon));

  const threadBrands = new Map<string, BrandCounts>();
  records.forEach((record, i) => {
    const counts = threadBrands.get(record.sourceDocumentId) ?? new Map<string, number>();
    threadBrands.set(record.sourceDocumentId, countBrands(scanned[i], lexicon, counts));
  });

  const mentions: RawMention[] = [];
  records.forEach((record, recordRef) => {
    const counts = threadBrands.get(record.sourceDocumentId) ?? new Map<string, number>();
    for (const span of withInferredBrands(record.text, scanned[recordRef], lexicon, counts)) {
      mentions.push({ recordRef, ...span });
    }
  });
  return mentions;
}

/**
 * Model-looking token that no mention claimed (candidate for the alias table)
 */
export function looksLikeModel(token: string, lexicon: Lexicon): boolean {
  const t = token.toUpperCase().trim();
  if (t.length < 2 || t.length > 25) return false;
  if (lexicon.junkTokens.has(t)) return false;
  if (/^[\d.\-]+$/.test(t)) return false;
  return true;
}

function snippet(text: string): string {
  return text.replace(/\s+/g, ' ').trim().slice(0, tuning.candidates.snippet_chars);
}

export function collectCandidates(
  records: FlatRecord[],
  mentions: RawMention[],
  lexicon: Lexicon
): CandidateToken[] {
  const claimed = new Map<number, [number, number][]>();
  for (const m of mentions) {
    const spans = claimed.get(m.recordRef) ?? [];
    spans.push([m.spanOffset, m.spanOffset + m.surfaceForm.length]);
    claimed.set(m.recordRef, spans);
  }

  const tally = new Map<string, CandidateToken>();
  records.forEach((record, recordRef) => {
    const spans = claimed.get(recordRef) ?? [];
    const prepared = normalizeDashes(record.text);

    for (const m of prepared.matchAll(STANDALONE_RE)) {
      const start = m.index ?? 0;
      const end = start + m[0].length;
      if (spans.some(([s, e]) => start < e && end > s)) continue;

      const token = normalizeDisplay(m[1]).toUpperCase();
      if (!looksLikeModel(token, lexicon)) continue;

      const entry = tally.get(token) ?? { token, count: 0, examples: [] };
      entry.count++;
      if (entry.examples.length < tuning.candidates.max_examples) {
        entry.examples.push(snippet(record.text));
      }
      tally.set(token, entry);
    }
  });

  return Array.from(tally.values()).sort(
    (a, b) => b.count - a.count || (a.token < b.token ? -1 : a.token > b.token ? 1 : 0)
  );
}
