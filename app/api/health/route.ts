/**
 * GET /api/health - Service status
 *
 * Returns:
 * - Document store counts
 * - Whether a pipeline run is in progress
 * - Summary of the last published run (null before the first)
 */

import { NextResponse } from 'next/server';
import { createApiResponse } from '@/lib/api-response';
import { NO_STORE } from '@/lib/cache';
import { getState } from '@/lib/state';

export const dynamic = 'force-dynamic';

export async function GET() {
  const startTime = Date.now();

  try {
    const { store, runner } = getState();
    const last = runner.latestRun;

    return createApiResponse({
      status: 'healthy',
      store: {
        batches: store.batchCount,
        threads: store.threadCount
      },
      running: runner.running,
      last_run: last && {
        run_id: last.runId,
        completed_at: last.completedAt,
        fingerprint: last.result.fingerprint,
        entities: last.result.report.entities,
        mentions: last.result.report.mentions
      }
    }, startTime, {
      'Cache-Control': NO_STORE
    });

  } catch (error) {
    console.error('[health] Error:', error);
    return NextResponse.json({
      status: 'unhealthy',
      error: String(error)
    }, {
      status: 503,
      headers: {
        'Cache-Control': NO_STORE
      }
    });
  }
}
