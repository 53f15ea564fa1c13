/**
 * GET /api/top-models - Ranked leaderboard of the latest run
 *
 * Query params:
 * - n: Top-N (default 15, clamped to 1..200; never an error)
 * - v2: "0" ranks by mentions, anything else by score_v2
 * - sort: explicit sort column, overrides v2
 *
 * Caching:
 * - ETag: run id + stats fingerprint + view params
 * - 304 when If-None-Match matches
 */

import { NextRequest } from 'next/server';
import { createApiErrorResponse, createApiResponse, errorResponse } from '@/lib/api-response';
import { checkETag, generateETag, notModified, RANKING_CACHE_CONTROL } from '@/lib/cache';
import { NoResultsError } from '@/lib/errors';
import { clampTopN, isSortColumn, rankTable, SORT_COLUMNS, toOutputRow, VARIANT_COLUMN } from '@/lib/rank';
import { getState } from '@/lib/state';
import type { ScoreVariant } from '@/types';

export const dynamic = 'force-dynamic';

export async function GET(request: NextRequest) {
  const startTime = Date.now();

  try {
    const { searchParams } = request.nextUrl;
    const n = clampTopN(searchParams.get('n'));
    const variant: ScoreVariant = searchParams.get('v2') === '0' ? 'v1' : 'v2';

    const sortParam = searchParams.get('sort');
    if (sortParam !== null && !isSortColumn(sortParam)) {
      return createApiErrorResponse(
        `Invalid sort column "${sortParam}". Must be one of: ${SORT_COLUMNS.join(', ')}`,
        400,
        'INVALID_SORT'
      );
    }
    const sortBy = sortParam ?? VARIANT_COLUMN[variant];

    const run = getState().runner.latestRun;
    if (!run) throw new NoResultsError();

    const etag = generateETag({ runId: run.runId, fingerprint: run.result.fingerprint, variant, sortBy, n });
    if (checkETag(request, etag)) {
      return notModified(etag);
    }

    const rows = rankTable(run.result.stats, { n, sortBy }).map(toOutputRow);

    return createApiResponse({
      run_id: run.runId,
      completed_at: run.completedAt,
      variant,
      sort: sortBy,
      n,
      total_models: run.result.stats.length,
      rows
    }, startTime, {
      'Cache-Control': RANKING_CACHE_CONTROL,
      'ETag': etag
    });

  } catch (error) {
    return errorResponse(error, 'top-models');
  }
}
