/**
 * Response envelopes for the ThreadTally routes.
 *
 * Success bodies are `{ data, meta: { timestamp, response_time_ms } }`; errors
 * are `{ error: { message, code }, meta: { timestamp } }`, with `code` taken
 * from the PipelineError that caused them.
 */

import { NextResponse } from 'next/server';
import { PipelineError } from './errors';

export interface ApiResponse<T> {
  data: T;
  meta: {
    timestamp: string;
    response_time_ms: number;
  };
}

export interface ApiErrorResponse {
  error: {
    message: string;
    code: string;
  };
  meta: {
    timestamp: string;
  };
}

// startTime is the handler's Date.now() on entry
export function createApiResponse<T>(
  data: T,
  startTime: number,
  headers?: Record<string, string>,
  status: number = 200
): NextResponse {
  const elapsed = Date.now() - startTime;
  const response: ApiResponse<T> = {
    data,
    meta: { timestamp: new Date().toISOString(), response_time_ms: elapsed }
  };

  return NextResponse.json(response, {
    status,
    headers: { 'X-Response-Time': `${elapsed}ms`, ...headers }
  });
}

// Errors raised inside a route, e.g. an unknown sort column, go through here
// directly; thrown ones go through errorResponse()
export function createApiErrorResponse(
  message: string,
  status: number,
  code: string
): NextResponse {
  const response: ApiErrorResponse = {
    error: { message, code },
    meta: { timestamp: new Date().toISOString() }
  };

  return NextResponse.json(response, { status });
}

/**
 * Map a thrown value to an error response. Pipeline errors keep their own
 * status and code; anything else is logged and reported as a 500.
 */
export function errorResponse(error: unknown, tag: string): NextResponse {
  if (error instanceof PipelineError) {
    return createApiErrorResponse(error.message, error.statusCode, error.code);
  }

  console.error(`[${tag}] Error:`, error);
  return createApiErrorResponse('Internal server error', 500, 'INTERNAL_ERROR');
}
