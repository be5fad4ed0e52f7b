/**
 * Validator Engine
 *
 * Runs a full validation pass over a configuration: parse findings,
 * every section (section validators, then parameters), then the live
 * dry-run checks against the target account.
 */

import type { ClusterConfig } from '../config/root.js';
import { collectFacts, FactsSnapshot } from './facts.js';
import { LIVE_VALIDATORS } from './live.js';
import {
  SEVERITY_RANK,
  type Severity,
  type SuppressValidators,
  type ValidationFinding,
  type ValidationOptions,
  type ValidationReport,
} from './types.js';

/**
 * Build the suppression predicate for a suppression setting.
 *
 * Required-parameter checks are not validators and are never suppressed.
 */
export function suppressionFilter(suppress: SuppressValidators | undefined): (name: string) => boolean {
  if (suppress === undefined) {
    return () => false;
  }
  if (suppress === 'ALL') {
    return () => true;
  }
  const names = new Set(suppress);
  return (name) => names.has(name);
}

/**
 * Whether any finding reaches the failure level.
 */
export function reachesLevel(findings: readonly ValidationFinding[], level: Severity): boolean {
  return findings.some((finding) => SEVERITY_RANK[finding.level] >= SEVERITY_RANK[level]);
}

/**
 * Validate a configuration.
 *
 * Findings are collected exhaustively; the report fails when any finding
 * is at or above the failure level (default ERROR).
 *
 * @param config - Configuration to validate
 * @param options - Facts provider, suppression and failure level
 * @returns Every finding, in discovery order
 */
export async function validateConfig(
  config: ClusterConfig,
  options: ValidationOptions = {}
): Promise<ValidationReport> {
  const failureLevel = options.failureLevel ?? 'ERROR';
  const isSuppressed = suppressionFilter(options.suppressValidators);
  const findings: ValidationFinding[] = [...config.parseFindings];

  let facts = FactsSnapshot.empty();
  if (options.provider) {
    const collected = await collectFacts(config, options.provider);
    facts = collected.facts;
    findings.push(...collected.findings);
  }

  const context = { config, facts };
  for (const section of config.allSections()) {
    findings.push(...section.validate(context, isSuppressed));
  }

  if (options.provider) {
    for (const validator of LIVE_VALIDATORS) {
      if (isSuppressed(validator.name)) continue;
      findings.push(...(await validator.run(config, options.provider)));
    }
  }

  return {
    findings,
    failureLevel,
    failed: reachesLevel(findings, failureLevel),
  };
}
