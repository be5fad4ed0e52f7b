/**
 * Collaborator Errors
 *
 * Errors raised by stack, object-store, fleet-status and facts clients.
 * The lifecycle controller translates them into cluster errors.
 */

import type { FleetStatus } from '../update/types.js';

/**
 * Classification of a collaborator failure.
 */
export type CloudErrorKind = 'NOT_FOUND' | 'ALREADY_EXISTS' | 'CONFLICT' | 'ACCESS_DENIED' | 'FAILED';

/**
 * Error returned by a collaborator call.
 */
export class CloudClientError extends Error {
  constructor(
    message: string,
    public readonly kind: CloudErrorKind,
    public readonly service: string,
    options?: { cause?: unknown }
  ) {
    super(message);
    this.name = 'CloudClientError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
    Object.setPrototypeOf(this, CloudClientError.prototype);
  }
}

/**
 * The fleet status did not match the expected value of a compare-and-swap.
 *
 * `actual` is null when the record was locked by another writer.
 */
export class StatusConflictError extends CloudClientError {
  constructor(
    public readonly cluster: string,
    public readonly expected: FleetStatus,
    public readonly actual: FleetStatus | null
  ) {
    super(
      actual === null
        ? `Fleet status of '${cluster}' is locked by another writer`
        : `Fleet status of '${cluster}' is ${actual}, expected ${expected}`,
      'CONFLICT',
      'fleet-status'
    );
    this.name = 'StatusConflictError';
    Object.setPrototypeOf(this, StatusConflictError.prototype);
  }
}

/**
 * Check if an error is a collaborator error of the given kind.
 */
export function isCloudError(error: unknown, kind?: CloudErrorKind): error is CloudClientError {
  return error instanceof CloudClientError && (kind === undefined || error.kind === kind);
}
