/**
 * Describe Command Handler
 *
 * Prints the resolved configuration of a running cluster as YAML.
 */

import { dumpYaml } from '../../config/loader.js';
import { createOutput } from '../output.js';
import { createController, handleError, type CommonOptions } from './shared.js';

/**
 * Execute the describe command.
 *
 * @param name - Cluster name
 * @param options - Command options
 */
export async function describeCommand(name: string, options: CommonOptions): Promise<void> {
  const output = createOutput('describe', options);

  try {
    const document = await createController(options).describe(name);
    output.configuration(document, dumpYaml(document));
    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}
