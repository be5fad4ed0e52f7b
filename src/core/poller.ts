/**
 * Stack Poller
 *
 * Bounded polling loop that waits for a stack to leave its transitional
 * status. The caller's signal is checked between attempts.
 */

import { setTimeout as delay } from 'node:timers/promises';

import { isCloudError } from '../cloud/errors.js';
import type { StackClient, StackDescription } from '../cloud/types.js';
import { logger as defaultLogger, type Logger } from '../lib/logger.js';
import { ClusterActionError } from './errors.js';
import { isTransitional } from './types.js';

export interface PollOptions {
  /** Delay between attempts, in milliseconds */
  delayMs?: number;
  maxAttempts?: number;
  signal?: AbortSignal;
  logger?: Logger;
}

export const DEFAULT_POLL_DELAY_MS = 5000;
export const DEFAULT_POLL_ATTEMPTS = 360;

/**
 * Wait until a stack reaches a stable status.
 *
 * @param stacks - Stack client to poll
 * @param name - Stack name
 * @param options - Delay, attempt bound and cancellation signal
 * @returns The final description, or null when the stack is gone
 * @throws ClusterActionError (STACK_WAIT_TIMEOUT) when the bound is exceeded
 */
export async function waitForStackStatus(
  stacks: StackClient,
  name: string,
  options: PollOptions = {}
): Promise<StackDescription | null> {
  const delayMs = options.delayMs ?? DEFAULT_POLL_DELAY_MS;
  const maxAttempts = options.maxAttempts ?? DEFAULT_POLL_ATTEMPTS;
  const log = options.logger ?? defaultLogger;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    options.signal?.throwIfAborted();

    let description: StackDescription;
    try {
      description = await stacks.describeStack(name);
    } catch (error) {
      if (isCloudError(error, 'NOT_FOUND')) {
        return null;
      }
      throw error;
    }

    if (!isTransitional(description.status)) {
      return description;
    }
    log.debug(`Stack ${name} is ${description.status} (attempt ${attempt}/${maxAttempts})`);

    if (attempt < maxAttempts) {
      await delay(delayMs, undefined, { signal: options.signal });
    }
  }

  throw new ClusterActionError(
    `Stack '${name}' did not reach a stable status after ${maxAttempts} attempts`,
    'STACK_WAIT_TIMEOUT',
    "Check the stack events, then run 'hpcstack status' again."
  );
}
