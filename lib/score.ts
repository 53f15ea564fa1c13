/**
 * Pure scoring utilities for ThreadTally.
 * No IO. No globals. Fully testable.
 *
 * SCORE_V2 (vote-weighted composite):
 *   1. m = ln(1 + mentions),  v = sign(vote_score) * ln(1 + |vote_score|)
 *   2. min-max scale m and v across the run's entities to [0,1]
 *      (a column with a single distinct value scales to 1)
 *   3. score_v2 = scale * (mention_weight * m' + vote_weight * v')
 *
 * Log scaling keeps one very loud comment from dominating; each term is
 * non-decreasing in its input, so more mentions or more votes never lower
 * score_v2 when everything else is equal.
 */

import tuning from '../config/tuning.json';
import type { CanonicalizeResult } from './canonicalize';
import type { EntityStats, FlatRecord } from '@/types';

export type ScoreParams = {
  mentionWeight: number;   // e.g., 0.5
  voteWeight: number;      // e.g., 0.5
  scale: number;           // e.g., 100
  voteBase: number;        // per-mention base vote weight, e.g., 1.0
  postMultiplier: number;  // posts weigh a bit more, e.g., 1.35
};

export const DEFAULT_PARAMS: ScoreParams = {
  mentionWeight: tuning.scoring.v2.mention_weight,
  voteWeight: tuning.scoring.v2.vote_weight,
  scale: tuning.scoring.v2.scale,
  voteBase: tuning.scoring.vote_weight.base,
  postMultiplier: tuning.scoring.vote_weight.post_multiplier,
};

export function signedLog1p(x: number): number {
  return Math.sign(x) * Math.log1p(Math.abs(x));
}

/**
 * Per-mention vote weight (feeds avg_vote): base + signed log boost,
 * posts multiplied.
 */
export function voteWeight(score: number, isPost: boolean, p: ScoreParams = DEFAULT_PARAMS): number {
  return (p.voteBase + signedLog1p(score)) * (isPost ? p.postMultiplier : 1);
}

export function minMaxScale(values: number[]): number[] {
  if (values.length === 0) return [];
  const min = Math.min(...values);
  const max = Math.max(...values);
  if (max === min) return values.map(() => 1);
  return values.map(v => (v - min) / (max - min));
}

type Accum = {
  mentions: number;
  threads: Set<string>;
  records: Set<number>;
  voteScore: number;
  voteWeightSum: number;
};

/**
 * Fill score_v2 for every row, relative to the other rows of the same run
 */
export function applyScoreV2(stats: EntityStats[], p: ScoreParams = DEFAULT_PARAMS): EntityStats[] {
  const m = minMaxScale(stats.map(s => Math.log1p(s.mentions)));
  const v = minMaxScale(stats.map(s => signedLog1p(s.voteScore)));

  return stats.map((s, i) => ({
    ...s,
    scoreV2: p.scale * (p.mentionWeight * m[i] + p.voteWeight * v[i]),
  }));
}

/**
 * Aggregate canonical mentions into one EntityStats row per entity.
 *
 * vote_score sums the vote of each distinct record the entity appears in:
 * a comment naming the same model twice adds its vote once.
 */
export function aggregate(
  canonical: CanonicalizeResult,
  records: FlatRecord[],
  p: ScoreParams = DEFAULT_PARAMS
): EntityStats[] {
  const accums = new Map<string, Accum>();

  for (const { mention, entityKey } of canonical.mentions) {
    const record = records[mention.recordRef];
    if (!record) continue;

    let acc = accums.get(entityKey);
    if (!acc) {
      acc = { mentions: 0, threads: new Set(), records: new Set(), voteScore: 0, voteWeightSum: 0 };
      accums.set(entityKey, acc);
    }

    acc.mentions++;
    acc.threads.add(record.sourceDocumentId);
    acc.voteWeightSum += voteWeight(record.voteScore, record.isPost, p);
    if (!acc.records.has(mention.recordRef)) {
      acc.records.add(mention.recordRef);
      acc.voteScore += record.voteScore;
    }
  }

  const stats: EntityStats[] = [];
  for (const entity of canonical.entities.values()) {
    const acc = accums.get(entity.key);
    if (!acc || acc.mentions === 0) continue;

    stats.push({
      canonicalKey: entity.key,
      canonicalModel: entity.displayName,
      mentions: acc.mentions,
      uniqueThreads: acc.threads.size,
      voteScore: acc.voteScore,
      avgDocScore: acc.voteScore / acc.mentions,
      avgVote: acc.voteWeightSum / acc.mentions,
      scoreV2: 0,
      variants: entity.variants,
    });
  }

  return applyScoreV2(stats, p);
}
