/**
 * Error Types for hpcstack
 *
 * Custom error classes with error codes for structured error handling.
 */

import type { ValidationFinding } from '../validation/types.js';
import type { ChangeVerdict } from '../update/types.js';

/**
 * Error codes for all hpcstack errors
 */
export type ErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_INVALID_YAML'
  | 'CONFIG_VALIDATION_FAILED'
  | 'SCHEMA_DEFINITION_INVALID'
  | 'INVALID_VALUE'
  | 'INVALID_LABEL'
  | 'TOO_MANY_SECTIONS'
  | 'DUPLICATE_SECTION'
  | 'UNKNOWN_FIELD'
  | 'DISALLOWED_FIELD'
  | 'UPDATE_NOT_ALLOWED'
  | 'CONCURRENT_UPDATE'
  | 'CLUSTER_NOT_FOUND'
  | 'CLUSTER_ALREADY_EXISTS'
  | 'CLUSTER_BUSY'
  | 'STACK_WAIT_TIMEOUT'
  | 'OPERATION_FAILED';

/**
 * Mapping of error codes to exit codes
 */
export const EXIT_CODES: Record<ErrorCode, number> = {
  CONFIG_NOT_FOUND: 1,
  CONFIG_INVALID_YAML: 1,
  CONFIG_VALIDATION_FAILED: 1,
  SCHEMA_DEFINITION_INVALID: 2,
  INVALID_VALUE: 1,
  INVALID_LABEL: 1,
  TOO_MANY_SECTIONS: 1,
  DUPLICATE_SECTION: 1,
  UNKNOWN_FIELD: 1,
  DISALLOWED_FIELD: 1,
  UPDATE_NOT_ALLOWED: 1,
  CONCURRENT_UPDATE: 1,
  CLUSTER_NOT_FOUND: 1,
  CLUSTER_ALREADY_EXISTS: 1,
  CLUSTER_BUSY: 1,
  STACK_WAIT_TIMEOUT: 1,
  OPERATION_FAILED: 1,
};

/**
 * Base error class for all hpcstack errors.
 *
 * Provides structured error information with codes and suggestions.
 */
export class ClusterError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'ClusterError';
    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, ClusterError.prototype);
  }

  /**
   * Get the exit code for this error.
   */
  get exitCode(): number {
    return EXIT_CODES[this.code];
  }

  /**
   * Format the error for display.
   */
  format(): string {
    let output = `Error: ${this.message}`;
    if (this.suggestion) {
      output += `\n\nFix: ${this.suggestion}`;
    }
    return output;
  }
}

// =============================================================================
// Configuration Model Errors
// =============================================================================

/**
 * A parameter value violates its type or allowed values.
 */
export class InvalidValueError extends ClusterError {
  constructor(
    public readonly paramKey: string,
    public readonly value: unknown,
    public readonly allowed?: string
  ) {
    super(
      allowed === undefined
        ? `Invalid value '${describeValue(value)}' for parameter '${paramKey}'`
        : `Invalid value '${describeValue(value)}' for parameter '${paramKey}', allowed: ${allowed}`,
      'INVALID_VALUE',
      allowed === undefined ? undefined : `Use one of: ${allowed}`
    );
    this.name = 'InvalidValueError';
    Object.setPrototypeOf(this, InvalidValueError.prototype);
  }
}

/**
 * A section label does not match the label pattern.
 */
export class InvalidLabelError extends ClusterError {
  constructor(
    public readonly sectionKey: string,
    public readonly label: string
  ) {
    super(
      `Invalid label '${label}' for section '${sectionKey}'`,
      'INVALID_LABEL',
      'Labels must start with a letter, contain only letters, digits, hyphens and underscores, and be at most 30 characters long.'
    );
    this.name = 'InvalidLabelError';
    Object.setPrototypeOf(this, InvalidLabelError.prototype);
  }
}

/**
 * Attaching a child would exceed the per-parent cap for its section key.
 */
export class TooManySectionsError extends ClusterError {
  constructor(
    public readonly sectionKey: string,
    public readonly parentId: string,
    public readonly maxInstances: number
  ) {
    super(
      `Too many '${sectionKey}' sections under '${parentId}': at most ${maxInstances} allowed`,
      'TOO_MANY_SECTIONS',
      `Remove '${sectionKey}' sections until there are at most ${maxInstances}.`
    );
    this.name = 'TooManySectionsError';
    Object.setPrototypeOf(this, TooManySectionsError.prototype);
  }
}

/**
 * A section with the same key and label already exists under the parent.
 */
export class DuplicateSectionError extends ClusterError {
  constructor(
    public readonly sectionKey: string,
    public readonly label: string,
    public readonly parentId: string
  ) {
    super(
      `Duplicate '${sectionKey}' section '${label}' under '${parentId}'`,
      'DUPLICATE_SECTION',
      'Give every section of the same kind a unique name.'
    );
    this.name = 'DuplicateSectionError';
    Object.setPrototypeOf(this, DuplicateSectionError.prototype);
  }
}

/**
 * A document key is not declared by the section.
 */
export class UnknownFieldError extends ClusterError {
  constructor(
    public readonly field: string,
    public readonly sectionId: string
  ) {
    super(
      `Unknown field '${field}' in section '${sectionId}'`,
      'UNKNOWN_FIELD',
      'Check the spelling of the field and the section it is placed in.'
    );
    this.name = 'UnknownFieldError';
    Object.setPrototypeOf(this, UnknownFieldError.prototype);
  }
}

/**
 * A document sets an internal (PRIVATE) parameter.
 */
export class DisallowedFieldError extends ClusterError {
  constructor(
    public readonly field: string,
    public readonly sectionId: string
  ) {
    super(
      `Field '${field}' in section '${sectionId}' is not allowed`,
      'DISALLOWED_FIELD',
      `Remove '${field}' from the configuration; it is managed internally.`
    );
    this.name = 'DisallowedFieldError';
    Object.setPrototypeOf(this, DisallowedFieldError.prototype);
  }
}

/**
 * The schema registry was constructed from inconsistent definitions.
 */
export class SchemaDefinitionError extends ClusterError {
  constructor(message: string) {
    super(message, 'SCHEMA_DEFINITION_INVALID');
    this.name = 'SchemaDefinitionError';
    Object.setPrototypeOf(this, SchemaDefinitionError.prototype);
  }
}

/**
 * Error for configuration loading issues.
 */
export class ConfigLoadError extends ClusterError {
  constructor(
    message: string,
    code: 'CONFIG_NOT_FOUND' | 'CONFIG_INVALID_YAML',
    public readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    super(
      message,
      code,
      code === 'CONFIG_NOT_FOUND'
        ? 'Ensure the configuration file exists and is readable.'
        : 'Fix the YAML syntax error and try again.'
    );
    this.name = 'ConfigLoadError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
    Object.setPrototypeOf(this, ConfigLoadError.prototype);
  }
}

/**
 * Aggregate of every validation finding at or above the failure level.
 */
export class ConfigValidationError extends ClusterError {
  constructor(
    message: string,
    public readonly findings: ValidationFinding[]
  ) {
    super(message, 'CONFIG_VALIDATION_FAILED', 'Fix the reported configuration errors and try again.');
    this.name = 'ConfigValidationError';
    Object.setPrototypeOf(this, ConfigValidationError.prototype);
  }

  override format(): string {
    let output = super.format();
    if (this.findings.length > 0) {
      output += '\n\nValidation findings:';
      for (const finding of this.findings) {
        const where = finding.path ? `${finding.path}: ` : '';
        output += `\n  - ${finding.level} ${where}${finding.message}`;
      }
    }
    return output;
  }
}

// =============================================================================
// Lifecycle Errors
// =============================================================================

/**
 * The update policy engine denied the update.
 */
export class ClusterUpdateError extends ClusterError {
  constructor(
    message: string,
    public readonly verdicts: ChangeVerdict[]
  ) {
    super(message, 'UPDATE_NOT_ALLOWED', remediationFor(verdicts));
    this.name = 'ClusterUpdateError';
    Object.setPrototypeOf(this, ClusterUpdateError.prototype);
  }

  override format(): string {
    let output = super.format();
    const blocking = this.verdicts.filter((v) => v.result !== 'SUCCEEDED');
    if (blocking.length > 0) {
      output += '\n\nBlocking changes:';
      for (const verdict of blocking) {
        output += `\n  - ${verdict.parameter}: ${verdict.failReason}`;
      }
    }
    return output;
  }
}

/**
 * A compare-and-swap on the fleet status lost a race.
 */
export class ConcurrentUpdateError extends ClusterError {
  constructor(
    public readonly clusterName: string,
    public readonly expected: string,
    public readonly actual: string | null
  ) {
    super(
      actual === null
        ? `Fleet status of cluster '${clusterName}' is being changed by another operation`
        : `Fleet status of cluster '${clusterName}' changed concurrently: expected ${expected}, found ${actual}`,
      'CONCURRENT_UPDATE',
      'Retry the operation.'
    );
    this.name = 'ConcurrentUpdateError';
    Object.setPrototypeOf(this, ConcurrentUpdateError.prototype);
  }
}

/**
 * Error for failed lifecycle operations and collaborator calls.
 */
export class ClusterActionError extends ClusterError {
  constructor(
    message: string,
    code:
      | 'CLUSTER_NOT_FOUND'
      | 'CLUSTER_ALREADY_EXISTS'
      | 'CLUSTER_BUSY'
      | 'STACK_WAIT_TIMEOUT'
      | 'OPERATION_FAILED' = 'OPERATION_FAILED',
    suggestion?: string,
    options?: { cause?: unknown }
  ) {
    super(message, code, suggestion);
    this.name = 'ClusterActionError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
    Object.setPrototypeOf(this, ClusterActionError.prototype);
  }
}

/**
 * Check if an error is a ClusterError.
 */
export function isClusterError(error: unknown): error is ClusterError {
  return error instanceof ClusterError;
}

/**
 * Get the exit code for any error.
 */
export function getExitCode(error: unknown): number {
  if (isClusterError(error)) {
    return error.exitCode;
  }
  // Default to system error for unknown errors
  return 2;
}

/**
 * Pick one remediation for a denied update.
 *
 * Override instructions and the generic fleet-stop instruction are never
 * merged; the first blocking verdict decides.
 */
function remediationFor(verdicts: ChangeVerdict[]): string | undefined {
  const blocking = verdicts.find((v) => v.result !== 'SUCCEEDED' && v.actionNeeded);
  return blocking?.actionNeeded ?? undefined;
}

function describeValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
