/**
 * HTTP caching for ranked output
 *
 * The ETag is derived from the published run (id and stats fingerprint) plus
 * the view parameters, so a client holding a table keeps getting 304 until
 * another run is published.
 */

import { NextResponse } from 'next/server';
import crypto from 'crypto';

export const RANKING_CACHE_CONTROL = 'public, max-age=60, stale-while-revalidate=300';

export const NO_STORE = 'no-cache, no-store, must-revalidate';

export function generateETag(data: string | number | object): string {
  const str = typeof data === 'object'
    ? JSON.stringify(data)
    : String(data);

  const hash = crypto
    .createHash('md5')
    .update(str)
    .digest('hex');

  return `"${hash.slice(0, 16)}"`;
}

/**
 * True if the client's If-None-Match already names this ETag
 */
export function checkETag(req: Request, etag: string): boolean {
  const clientETag = req.headers.get('If-None-Match');
  if (!clientETag) return false;

  return clientETag
    .split(',')
    .map(t => t.trim())
    .some(t => t === etag || t === '*');
}

export function notModified(etag: string): NextResponse {
  return new NextResponse(null, {
    status: 304,
    headers: {
      'ETag': etag,
      'Cache-Control': RANKING_CACHE_CONTROL
    }
  });
}
