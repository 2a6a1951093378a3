/**
 * Error handler middleware.
 * Outermost layer: turns errors thrown further in (including the ones the
 * traffic logger re-throws) into JSON responses. AppError subclasses keep
 * their status and code; anything else becomes a 500.
 */

import { AppError } from '../errors.js';
import type { Handler } from './pipeline.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export interface ApiErrorResponse {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

export function errorHandler(next: Handler): Handler {
  return async (req, ctx) => {
    try {
      return await next(req, ctx);
    } catch (err) {
      if (err instanceof AppError) {
        const body: ApiErrorResponse = {
          error: {
            code: err.code,
            message: err.message,
            ...(err.details && { details: err.details }),
          },
        };

        return new Response(JSON.stringify(body), {
          status: err.statusCode,
          headers: JSON_HEADERS,
        });
      }

      // Unknown error: don't leak internals
      const body: ApiErrorResponse = {
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
        },
      };

      return new Response(JSON.stringify(body), {
        status: 500,
        headers: JSON_HEADERS,
      });
    }
  };
}
