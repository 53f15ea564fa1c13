/**
 * POST /api/import?source=<file name> - Add a batch of threads
 *
 * Body: any accepted import shape (see lib/ingest.ts). The raw payload is kept
 * under data/raw so the batch survives a restart; the store is updated in
 * memory. Nothing is ranked until POST /api/pipeline.
 */

import { NextRequest } from 'next/server';
import { createApiResponse, errorResponse } from '@/lib/api-response';
import { InvalidImportError } from '@/lib/errors';
import { writeRawBatch } from '@/lib/files';
import { parseImportPayload } from '@/lib/ingest';
import { getState } from '@/lib/state';

export const dynamic = 'force-dynamic';

export async function POST(request: NextRequest) {
  const startTime = Date.now();

  try {
    const source = request.nextUrl.searchParams.get('source') || 'upload.json';

    let payload: unknown;
    try {
      payload = await request.json();
    } catch {
      throw new InvalidImportError(`${source}: request body is not valid JSON`, source);
    }

    const batch = parseImportPayload(payload, source);
    const state = getState();
    const storedThreads = state.store.threadCount;

    writeRawBatch(state.rawDir, source, payload);
    const summary = state.store.add(batch);

    return createApiResponse({
      source: summary.source,
      threads: summary.threads,
      comments: summary.comments,
      skipped: summary.malformed,
      duplicates: summary.duplicates,
      stored_threads: {
        before: storedThreads,
        after: summary.storedThreads
      }
    }, startTime, undefined, 201);

  } catch (error) {
    return errorResponse(error, 'import');
  }
}
