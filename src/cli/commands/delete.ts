/**
 * Delete Command Handler
 *
 * Deletes a cluster and its configuration artifacts.
 */

import { createOutput } from '../output.js';
import { createController, handleError, type CommonOptions } from './shared.js';

/**
 * Options for the delete command
 */
export interface DeleteCommandOptions extends CommonOptions {
  keepLogs?: boolean;
  wait?: boolean;
}

/**
 * Execute the delete command.
 *
 * @param name - Cluster name
 * @param options - Command options
 */
export async function deleteCommand(name: string, options: DeleteCommandOptions): Promise<void> {
  const output = createOutput('delete', options);

  try {
    const controller = createController(options);
    const result = await controller.delete(name, { keepLogs: options.keepLogs, wait: options.wait });

    output.deletion(result);
    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}
