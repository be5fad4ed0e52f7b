/**
 * Validation Types
 *
 * Findings, severities and the validator signatures used by parameter,
 * section and whole-tree validation.
 */

import type { ClusterConfig } from '../config/root.js';
import type { Section } from '../config/section.js';
import type { ParamValue } from '../config/params.js';
import type { ComputeFactsProvider } from '../cloud/types.js';
import type { FactsSnapshot } from './facts.js';

/**
 * Severity of a validation finding.
 */
export type Severity = 'INFO' | 'WARNING' | 'ERROR';

export const SEVERITY_RANK: Record<Severity, number> = {
  INFO: 0,
  WARNING: 1,
  ERROR: 2,
};

export const SEVERITIES: readonly Severity[] = ['INFO', 'WARNING', 'ERROR'];

/**
 * Check if a string names a severity.
 */
export function isSeverity(value: string): value is Severity {
  return SEVERITIES.some((severity) => severity === value);
}

/**
 * A single validation result.
 */
export interface ValidationFinding {
  /** Name of the validator that produced the finding */
  validator: string;
  level: Severity;
  message: string;
  /** Section id or parameter path the finding refers to */
  path?: string;
}

/**
 * What a parameter or section validator returns.
 */
export interface ValidatorOutput {
  errors: string[];
  warnings: string[];
  infos?: string[];
}

/**
 * Inputs available to every synchronous validator.
 */
export interface ValidationContext {
  readonly config: ClusterConfig;
  readonly facts: FactsSnapshot;
}

/**
 * Validator attached to a parameter definition.
 *
 * Only runs when the parameter has a value.
 */
export interface ParamValidator {
  readonly name: string;
  run(key: string, value: ParamValue, section: Section, context: ValidationContext): ValidatorOutput;
}

/**
 * Validator attached to a section definition.
 */
export interface SectionValidator {
  readonly name: string;
  run(section: Section, context: ValidationContext): ValidatorOutput;
}

/**
 * Whole-tree validator that talks to the target account.
 *
 * Each run is a single attempt; collaborator errors become warnings.
 */
export interface LiveValidator {
  readonly name: string;
  run(config: ClusterConfig, provider: ComputeFactsProvider): Promise<ValidationFinding[]>;
}

/**
 * Selects validators to skip: every named validator, or the listed names.
 */
export type SuppressValidators = 'ALL' | readonly string[];

/**
 * Options for a full validation pass.
 */
export interface ValidationOptions {
  /** Facts source; fact-based and live checks are skipped without one */
  provider?: ComputeFactsProvider;
  suppressValidators?: SuppressValidators;
  failureLevel?: Severity;
}

/**
 * Result of a full validation pass.
 */
export interface ValidationReport {
  findings: ValidationFinding[];
  failureLevel: Severity;
  /** True when any finding is at or above the failure level */
  failed: boolean;
}

/**
 * Empty validator output.
 */
export function noFindings(): ValidatorOutput {
  return { errors: [], warnings: [] };
}
