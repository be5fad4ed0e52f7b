/**
 * Unit tests for the Stack Poller
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { CloudClientError } from '../../../src/cloud/errors.js';
import type { StackDescription, StackStatus } from '../../../src/cloud/types.js';
import { ClusterActionError } from '../../../src/core/errors.js';
import { waitForStackStatus } from '../../../src/core/poller.js';
import { LocalObjectStore, LocalStackClient } from '../../../src/local/index.js';
import { quietLogger, recordingLogger } from '../../helpers/documents.js';

/**
 * Stack client answering describe calls from a fixed list of statuses.
 *
 * Once the list is used up the stack is gone.
 */
class ScriptedStacks extends LocalStackClient {
  calls = 0;

  constructor(private readonly statuses: StackStatus[]) {
    super('/nonexistent', new LocalObjectStore('/nonexistent'));
  }

  override async describeStack(name: string): Promise<StackDescription> {
    const status = this.statuses[this.calls];
    this.calls++;
    if (status === undefined) {
      throw new CloudClientError(`Stack ${name} does not exist`, 'NOT_FOUND', 'stacks');
    }
    return { name, status, parameters: {}, tags: {}, outputs: {}, createdAt: '2026-01-01T00:00:00.000Z' };
  }
}

describe('waitForStackStatus', () => {
  it('should return once the stack leaves its transitional status', async () => {
    const stacks = new ScriptedStacks(['UPDATE_IN_PROGRESS', 'UPDATE_COMPLETE_CLEANUP_IN_PROGRESS', 'UPDATE_COMPLETE']);

    const description = await waitForStackStatus(stacks, 'c1', { delayMs: 1, logger: quietLogger() });

    assert.strictEqual(description?.status, 'UPDATE_COMPLETE');
    assert.strictEqual(stacks.calls, 3);
  });

  it('should return null when the stack disappears', async () => {
    const stacks = new ScriptedStacks(['DELETE_IN_PROGRESS']);

    const description = await waitForStackStatus(stacks, 'c1', { delayMs: 1, logger: quietLogger() });

    assert.strictEqual(description, null);
    assert.strictEqual(stacks.calls, 2);
  });

  it('should log every transitional attempt in verbose mode', async () => {
    const { logger, lines } = recordingLogger(true);
    const stacks = new ScriptedStacks(['CREATE_IN_PROGRESS', 'CREATE_COMPLETE']);

    await waitForStackStatus(stacks, 'c1', { delayMs: 1, maxAttempts: 5, logger });

    assert.deepStrictEqual(lines, ['  Stack c1 is CREATE_IN_PROGRESS (attempt 1/5)']);
  });

  it('should give up after the attempt bound', async () => {
    const stacks = new ScriptedStacks(['UPDATE_IN_PROGRESS', 'UPDATE_IN_PROGRESS', 'UPDATE_IN_PROGRESS']);

    await assert.rejects(
      async () => waitForStackStatus(stacks, 'c1', { delayMs: 1, maxAttempts: 2, logger: quietLogger() }),
      (error: unknown) => {
        assert.ok(error instanceof ClusterActionError);
        assert.strictEqual(error.code, 'STACK_WAIT_TIMEOUT');
        assert.strictEqual(error.message, "Stack 'c1' did not reach a stable status after 2 attempts");
        return true;
      }
    );
    assert.strictEqual(stacks.calls, 2);
  });

  it('should stop when the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const stacks = new ScriptedStacks(['UPDATE_IN_PROGRESS']);

    await assert.rejects(
      async () => waitForStackStatus(stacks, 'c1', { signal: controller.signal, logger: quietLogger() }),
      (error: unknown) => {
        assert.ok(typeof error === 'object' && error !== null && 'name' in error);
        assert.strictEqual(error.name, 'AbortError');
        return true;
      }
    );
    assert.strictEqual(stacks.calls, 0);
  });

  it('should pass on other collaborator errors', async () => {
    const stacks = new ScriptedStacks([]);
    stacks.describeStack = async () => {
      throw new CloudClientError('Access denied', 'ACCESS_DENIED', 'stacks');
    };

    await assert.rejects(
      async () => waitForStackStatus(stacks, 'c1', { delayMs: 1, logger: quietLogger() }),
      (error: unknown) => {
        assert.ok(error instanceof CloudClientError);
        assert.strictEqual(error.kind, 'ACCESS_DENIED');
        return true;
      }
    );
  });
});
