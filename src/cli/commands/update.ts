/**
 * Update Command Handler
 *
 * Updates a running cluster to a new YAML configuration. The change set
 * is printed whether or not the update is allowed.
 */

import { resolve } from 'node:path';

import { loadYamlFile } from '../../config/loader.js';
import { createOutput } from '../output.js';
import { createController, handleError, validationSettings, type ValidationOptions } from './shared.js';

/**
 * Options for the update command
 */
export interface UpdateCommandOptions extends ValidationOptions {
  force?: boolean;
  wait?: boolean;
}

/**
 * Execute the update command.
 *
 * @param name - Cluster name
 * @param file - Path to the configuration file
 * @param options - Command options
 */
export async function updateCommand(name: string, file: string, options: UpdateCommandOptions): Promise<void> {
  const output = createOutput('update', options);

  try {
    const controller = createController(options);
    const { document, text } = await loadYamlFile(resolve(file));

    const result = await controller.update(name, document, {
      ...validationSettings(options),
      sourceText: text,
      force: options.force,
      wait: options.wait,
    });

    if (result.changeSet.length === 0) {
      output.info('No changes found in the configuration.');
    } else {
      output.changeSet(result.changeSet);
    }
    if (result.forced) {
      output.warning('Update was forced; changes that were not allowed were applied');
    }
    output.setConfigVersion(result.configVersion);
    output.clusterStatus(result.cluster);
    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}
