/**
 * Validate Command Handler
 *
 * Validates a YAML cluster configuration without touching any stack.
 * Fact-based checks run against the local backend's facts catalog.
 */

import { resolve } from 'node:path';

import { loadYamlFile } from '../../config/loader.js';
import { createOutput } from '../output.js';
import { createController, handleError, validationSettings, type ValidationOptions } from './shared.js';

/**
 * Execute the validate command.
 *
 * @param file - Path to the configuration file
 * @param options - Command options
 */
export async function validateCommand(file: string, options: ValidationOptions): Promise<void> {
  const output = createOutput('validate', options);

  try {
    const controller = createController(options);
    output.info(`Validating configuration: ${file}`);

    const { document } = await loadYamlFile(resolve(file));
    const report = await controller.validate(document, validationSettings(options));

    output.validationReport(report);
    output.flush();
    process.exit(report.failed ? 1 : 0);
  } catch (error) {
    handleError(output, error);
  }
}
