/**
 * Status and List Command Handlers
 *
 * Show the derived state of one cluster or of every managed cluster.
 */

import { createOutput } from '../output.js';
import { createController, handleError, type CommonOptions } from './shared.js';

/**
 * Execute the status command.
 *
 * @param name - Cluster name
 * @param options - Command options
 */
export async function statusCommand(name: string, options: CommonOptions): Promise<void> {
  const output = createOutput('status', options);

  try {
    const summary = await createController(options).status(name);
    output.clusterStatus(summary);
    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}

/**
 * Execute the list command.
 */
export async function listCommand(options: CommonOptions): Promise<void> {
  const output = createOutput('list', options);

  try {
    const summaries = await createController(options).list();
    output.clusterList(summaries);
    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}
