/**
 * POST /api/pipeline - Rank every stored thread
 *
 * 409 PIPELINE_BUSY while a run is active, 500 PIPELINE_FAILED when a stage
 * throws (the previous result stays published).
 */

import { createApiResponse, errorResponse } from '@/lib/api-response';
import { NO_STORE } from '@/lib/cache';
import { getState } from '@/lib/state';

export const dynamic = 'force-dynamic';

export async function POST() {
  const startTime = Date.now();

  try {
    const run = getState().runner.run();

    return createApiResponse({
      run_id: run.runId,
      completed_at: run.completedAt,
      fingerprint: run.result.fingerprint,
      report: run.result.report,
      candidates: run.result.candidates.length
    }, startTime, {
      'Cache-Control': NO_STORE
    });

  } catch (error) {
    return errorResponse(error, 'pipeline');
  }
}
