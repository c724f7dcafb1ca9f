/**
 * Error taxonomy and the result type used at best-effort boundaries.
 */

/**
 * Missing prerequisite data (no instances, no master safe, unknown staking
 * program). Raised before any chain read; never retried.
 */
export class ServiceValidationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ServiceValidationError';
  }
}

/**
 * A contract read needed for the staking status failed.
 */
export class StakingStatusError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StakingStatusError';
  }
}

/**
 * The staking program metadata could not be fetched from IPFS.
 */
export class MetadataFetchError extends Error {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, detail: string | number, options?: ErrorOptions) {
    super(`Failed to fetch metadata from ${url}: ${detail}`, options);
    this.name = 'MetadataFetchError';
    this.url = url;
    this.status = typeof detail === 'number' ? detail : undefined;
  }
}

/**
 * Failure inside the operate layer (profile files, keys, Safe transactions).
 */
export class OperateError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'OperateError';
  }
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: Error };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: unknown): Result<T> {
  return { ok: false, error: toError(error) };
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
