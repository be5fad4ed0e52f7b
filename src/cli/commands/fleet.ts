/**
 * Start and Stop Command Handlers
 *
 * Move the compute fleet of a cluster between RUNNING and STOPPED.
 */

import { createOutput } from '../output.js';
import { createController, handleError, type CommonOptions } from './shared.js';

/**
 * Execute the start command.
 *
 * @param name - Cluster name
 * @param options - Command options
 */
export async function startCommand(name: string, options: CommonOptions): Promise<void> {
  const output = createOutput('start', options);

  try {
    const result = await createController(options).start(name);
    output.fleet(result);
    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}

/**
 * Execute the stop command.
 *
 * @param name - Cluster name
 * @param options - Command options
 */
export async function stopCommand(name: string, options: CommonOptions): Promise<void> {
  const output = createOutput('stop', options);

  try {
    const result = await createController(options).stop(name);
    output.fleet(result);
    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}
