/**
 * Shared Command Plumbing
 *
 * Option types, controller construction and error handling used by every
 * command handler.
 */

import { ClusterController } from '../../core/controller.js';
import type { ValidationSettings } from '../../core/controller.js';
import { getExitCode } from '../../core/errors.js';
import { configureLogger } from '../../lib/logger.js';
import { resolveStateDir } from '../../lib/paths.js';
import { createLocalProvider } from '../../local/index.js';
import { isSeverity, type SuppressValidators } from '../../validation/types.js';
import type { OutputFormatter } from '../output.js';

/**
 * Options accepted by every command
 */
export interface CommonOptions {
  json?: boolean;
  verbose?: boolean;
  stateDir?: string;
}

/**
 * Options of the commands that validate a configuration
 */
export interface ValidationOptions extends CommonOptions {
  suppressValidators?: string[];
  validationFailureLevel?: string;
}

/**
 * Build the lifecycle controller for a command.
 *
 * Configures the global logger from --json and --verbose and roots the
 * local backend at --state-dir.
 */
export function createController(options: CommonOptions): ClusterController {
  const logger = configureLogger(options.json ? 'json' : 'human', options.verbose ?? false);
  const provider = createLocalProvider(resolveStateDir(options.stateDir));
  return new ClusterController(provider, { logger });
}

/**
 * Translate CLI validation options.
 */
export function validationSettings(options: ValidationOptions): ValidationSettings {
  const level = options.validationFailureLevel;
  let suppressValidators: SuppressValidators | undefined;
  if (options.suppressValidators !== undefined) {
    suppressValidators = options.suppressValidators.includes('ALL') ? 'ALL' : options.suppressValidators;
  }
  return {
    suppressValidators,
    failureLevel: level !== undefined && isSeverity(level) ? level : undefined,
  };
}

/**
 * Handle errors and exit appropriately.
 */
export function handleError(output: OutputFormatter, error: unknown): never {
  output.failure(error);
  output.flush();
  process.exit(getExitCode(error));
}
