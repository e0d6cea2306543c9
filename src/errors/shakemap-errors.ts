/**
 * Shakemap error taxonomy
 *
 * - upstream_fetch_error: event feed unreachable, slow or malformed
 * - computation_error: overlay or simulation rejected its input
 * - parameter_error: missing or non-numeric request parameters
 * - internal_error: anything else
 */

export type ShakemapErrorType =
  | 'upstream_fetch_error'
  | 'computation_error'
  | 'parameter_error'
  | 'internal_error';

export class ShakemapError extends Error {
  readonly errorType: ShakemapErrorType;

  constructor(errorType: ShakemapErrorType, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ShakemapError';
    this.errorType = errorType;
  }
}

export class UpstreamFetchError extends ShakemapError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('upstream_fetch_error', message, options);
    this.name = 'UpstreamFetchError';
  }
}

export class ComputationError extends ShakemapError {
  constructor(message: string) {
    super('computation_error', message);
    this.name = 'ComputationError';
  }
}

export class ParameterError extends ShakemapError {
  constructor(message: string) {
    super('parameter_error', message);
    this.name = 'ParameterError';
  }
}
