// Copyright (c) 2025 Benjamin F. Hall
// SPDX-License-Identifier: MIT

import { ZodError } from 'zod';

export type ErrorDetails = Record<string, unknown>;

export type ApiErrorCode =
  | 'BAD_REQUEST'
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'RATE_LIMITED'
  | 'INTERNAL_ERROR';

export class ApiError extends Error {
  readonly status: number;
  readonly code: ApiErrorCode;
  readonly details?: ErrorDetails;

  constructor(status: number, code: ApiErrorCode, message: string, details?: ErrorDetails) {
    super(message);
    this.name = 'ApiError';
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

export const badRequest = (message: string, details?: ErrorDetails) => new ApiError(400, 'BAD_REQUEST', message, details);
export const unauthorized = (message = 'Unauthorized') => new ApiError(401, 'UNAUTHORIZED', message);
export const forbidden = (message = 'Forbidden') => new ApiError(403, 'FORBIDDEN', message);
export const notFound = (message: string) => new ApiError(404, 'NOT_FOUND', message);
export const conflict = (message: string, details?: ErrorDetails) => new ApiError(409, 'CONFLICT', message, details);
export const tooManyRequests = (message: string) => new ApiError(429, 'RATE_LIMITED', message);

export interface ErrorResponseBody {
  error: { code: ApiErrorCode; message: string; details: ErrorDetails | null };
}

function errorResponse(status: number, body: ErrorResponseBody, requestId?: string): Response {
  return Response.json(body, {
    status,
    headers: requestId ? { 'x-request-id': requestId } : undefined
  });
}

/**
 * Turns anything thrown by a route handler into the JSON error shape. Unknown
 * errors are logged and hidden behind a 500.
 */
export function handleRouteError(error: unknown, requestId?: string): Response {
  if (error instanceof ApiError) {
    return errorResponse(
      error.status,
      { error: { code: error.code, message: error.message, details: error.details ?? null } },
      requestId
    );
  }

  if (error instanceof ZodError) {
    return errorResponse(
      400,
      { error: { code: 'BAD_REQUEST', message: 'Invalid request', details: { issues: error.flatten() } } },
      requestId
    );
  }

  console.error('[API] Unhandled error', { requestId, error });
  return errorResponse(
    500,
    { error: { code: 'INTERNAL_ERROR', message: 'Unexpected error', details: null } },
    requestId
  );
}
