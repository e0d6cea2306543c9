/**
 * Structured error responses
 *
 * Every handler failure becomes `{ error, error_type }` with HTTP 500.
 * There is no 4xx split: a bad simulate parameter is reported the same way
 * an unreachable event feed is.
 */

import { ShakemapError, ShakemapErrorType } from '../errors/shakemap-errors';
import { metrics } from '../observability/metrics';

export const ERROR_STATUS = 500;

export interface ErrorResponseBody {
  error: string;
  error_type: ShakemapErrorType;
}

interface BodyParserError extends Error {
  type: string;
}

/**
 * body-parser tags its failures (malformed JSON, oversized body) with a `type`
 */
export function isBodyParserError(err: unknown): err is BodyParserError {
  return err instanceof Error
    && 'type' in err
    && typeof err.type === 'string'
    && err.type.startsWith('entity.');
}

export function classifyError(err: unknown): ShakemapErrorType {
  if (err instanceof ShakemapError) {
    return err.errorType;
  }
  if (isBodyParserError(err)) {
    return 'parameter_error';
  }
  return 'internal_error';
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

/**
 * Build the error body and count it by type
 */
export function buildErrorResponse(err: unknown): { status: number; body: ErrorResponseBody } {
  const errorType = classifyError(err);
  metrics.incrementError(errorType);

  return {
    status: ERROR_STATUS,
    body: {
      error: errorMessage(err),
      error_type: errorType,
    },
  };
}
