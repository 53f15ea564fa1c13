/**
 * Rank table: a pure view over computed EntityStats.
 * Sorting or truncating never recomputes stats.
 */

import tuning from '../config/tuning.json';
import type { EntityStats, RankedRow, ScoreVariant, SortColumn } from '@/types';

export const SORT_COLUMNS: readonly SortColumn[] = [
  'mentions',
  'score_v2',
  'vote_score',
  'unique_threads',
  'avg_doc_score',
  'avg_vote',
  'canonical_model',
];

export const VARIANT_COLUMN: Record<ScoreVariant, SortColumn> = {
  v1: 'mentions',
  v2: 'score_v2',
};

export type RankOptions = {
  n?: unknown;
  variant?: ScoreVariant;
  sortBy?: SortColumn;
};

export function isSortColumn(value: string): value is SortColumn {
  return (SORT_COLUMNS as readonly string[]).includes(value);
}

/**
 * Top-N is never an error: non-numeric -> default, otherwise clamped to
 * [min, max] and floored.
 */
export function clampTopN(value: unknown): number {
  const { default_top_n, min_top_n, max_top_n } = tuning.ranking;

  const n = typeof value === 'number'
    ? value
    : typeof value === 'string' && value.trim() !== ''
      ? Number(value)
      : NaN;

  if (Number.isNaN(n)) return default_top_n;
  if (n < min_top_n) return min_top_n;
  if (n > max_top_n) return max_top_n;
  return Math.floor(n);
}

/**
 * Case-insensitive, locale-independent ordinal compare
 */
export function compareNames(a: string, b: string): number {
  const la = a.toLowerCase();
  const lb = b.toLowerCase();
  if (la !== lb) return la < lb ? -1 : 1;
  if (a !== b) return a < b ? -1 : 1;
  return 0;
}

function columnValue(s: EntityStats, column: Exclude<SortColumn, 'canonical_model'>): number {
  switch (column) {
    case 'mentions': return s.mentions;
    case 'score_v2': return s.scoreV2;
    case 'vote_score': return s.voteScore;
    case 'unique_threads': return s.uniqueThreads;
    case 'avg_doc_score': return s.avgDocScore;
    case 'avg_vote': return s.avgVote;
  }
}

/**
 * Primary column (desc; name asc), then mentions desc, vote_score desc,
 * name, key. Keys are unique, so the order is total.
 */
export function comparatorFor(column: SortColumn): (a: EntityStats, b: EntityStats) => number {
  return (a, b) => {
    if (column !== 'canonical_model') {
      const primary = columnValue(b, column) - columnValue(a, column);
      if (primary !== 0) return primary;
    } else {
      const byName = compareNames(a.canonicalModel, b.canonicalModel);
      if (byName !== 0) return byName;
    }

    return (
      b.mentions - a.mentions ||
      b.voteScore - a.voteScore ||
      compareNames(a.canonicalModel, b.canonicalModel) ||
      (a.canonicalKey < b.canonicalKey ? -1 : a.canonicalKey > b.canonicalKey ? 1 : 0)
    );
  };
}

export function rankTable(stats: EntityStats[], options: RankOptions = {}): RankedRow[] {
  const column = options.sortBy ?? VARIANT_COLUMN[options.variant ?? 'v2'];
  const n = clampTopN(options.n ?? tuning.ranking.default_top_n);

  return [...stats]
    .sort(comparatorFor(column))
    .slice(0, n)
    .map((s, i) => ({ ...s, rank: i + 1 }));
}

export const OUTPUT_COLUMNS = [
  'rank',
  'canonical_model',
  'mentions',
  'unique_threads',
  'vote_score',
  'score_v2',
  'avg_doc_score',
  'avg_vote',
] as const;

export type OutputRow = {
  rank: number;
  canonical_model: string;
  mentions: number;
  unique_threads: number;
  vote_score: number;
  score_v2: number;
  avg_doc_score: number;
  avg_vote: number;
};

function round4(x: number): number {
  return Math.round(x * 10000) / 10000;
}

/**
 * Row shape consumed by the API and the exports
 */
export function toOutputRow(row: RankedRow): OutputRow {
  return {
    rank: row.rank,
    canonical_model: row.canonicalModel,
    mentions: row.mentions,
    unique_threads: row.uniqueThreads,
    vote_score: row.voteScore,
    score_v2: round4(row.scoreV2),
    avg_doc_score: round4(row.avgDocScore),
    avg_vote: round4(row.avgVote),
  };
}
