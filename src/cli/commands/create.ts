/**
 * Create Command Handler
 *
 * Creates a cluster from a YAML configuration.
 */

import { resolve } from 'node:path';

import { loadYamlFile } from '../../config/loader.js';
import { createOutput } from '../output.js';
import { createController, handleError, validationSettings, type ValidationOptions } from './shared.js';

/**
 * Options for the create command
 */
export interface CreateCommandOptions extends ValidationOptions {
  /** Roll back stack resources on failure (default true) */
  rollbackOnFailure?: boolean;
  wait?: boolean;
}

/**
 * Execute the create command.
 *
 * @param name - Cluster name
 * @param file - Path to the configuration file
 * @param options - Command options
 */
export async function createCommand(name: string, file: string, options: CreateCommandOptions): Promise<void> {
  const output = createOutput('create', options);

  try {
    const controller = createController(options);
    const { document, text } = await loadYamlFile(resolve(file));

    const result = await controller.create(name, document, {
      ...validationSettings(options),
      sourceText: text,
      disableRollback: options.rollbackOnFailure === false,
      wait: options.wait,
    });

    output.findings(result.findings.filter((finding) => finding.level !== 'ERROR'));
    output.setConfigVersion(result.configVersion);
    output.clusterStatus(result.cluster);
    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}
