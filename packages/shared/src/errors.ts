/**
 * Error taxonomy for the commission sync.
 *
 * Fatal classes (ConfigError, AuthError) stop the process with a non-zero exit.
 * Everything else is contained: per record by the updater, per cycle by the poll loop.
 */

export type ErrorCode =
  | 'CONFIG'
  | 'AUTH'
  | 'TRANSIENT'
  | 'DATA'
  | 'CRM_API'
  | 'NOT_FOUND';

export abstract class CommissionSyncError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or malformed configuration, raised before the loop starts. */
export class ConfigError extends CommissionSyncError {
  readonly code = 'CONFIG';

  constructor(
    message: string,
    readonly issues: Record<string, string[]> = {}
  ) {
    super(message);
  }
}

/** Credential rejected by the CRM (401/403). Retrying with the same token cannot succeed. */
export class AuthError extends CommissionSyncError {
  readonly code = 'AUTH';

  constructor(
    message: string,
    readonly status: number
  ) {
    super(message);
  }
}

/** Network failure, timeout, rate limit or 5xx. The next scheduled cycle retries. */
export class TransientError extends CommissionSyncError {
  readonly code = 'TRANSIENT';

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** A record whose loan amount is missing or not a number. */
export class DataError extends CommissionSyncError {
  readonly code = 'DATA';

  constructor(
    message: string,
    readonly opportunityId?: string
  ) {
    super(message);
  }
}

/** Any other non-OK CRM response (e.g. 422 on an update payload). */
export class CrmApiError extends CommissionSyncError {
  readonly code = 'CRM_API';

  constructor(
    message: string,
    readonly status: number,
    readonly body: string
  ) {
    super(message);
  }
}

export class NotFoundError extends CommissionSyncError {
  readonly code = 'NOT_FOUND';
}

export function isFatal(err: unknown): boolean {
  return err instanceof ConfigError || err instanceof AuthError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
