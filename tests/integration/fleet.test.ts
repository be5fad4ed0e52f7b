/**
 * Integration tests for starting and stopping the compute fleet
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { CloudClientError } from '../../src/cloud/errors.js';
import { ClusterController } from '../../src/core/controller.js';
import { ClusterActionError, ConcurrentUpdateError } from '../../src/core/errors.js';
import { computeEnvironmentName } from '../../src/core/naming.js';
import type { FleetResult } from '../../src/core/types.js';
import { createLocalProvider, type LocalProvider } from '../../src/local/index.js';
import { awsBatchDocument, createStateDir, quietLogger, slurmDocument } from '../helpers/documents.js';

describe('fleet integration', () => {
  let stateDir: string;
  let provider: LocalProvider;
  let controller: ClusterController;

  beforeEach(async () => {
    stateDir = await createStateDir();
    provider = createLocalProvider(stateDir);
    controller = new ClusterController(provider, { logger: quietLogger(), version: '1.2.3' });
  });

  afterEach(async () => {
    await rm(stateDir, { recursive: true, force: true });
  });

  // ===========================================================================
  // Transitions
  // ===========================================================================

  describe('a slurm cluster', () => {
    beforeEach(async () => {
      await controller.create('c1', slurmDocument());
    });

    it('should stop a running fleet', async () => {
      const result = await controller.stop('c1');

      assert.deepStrictEqual(result, { name: 'c1', previous: 'RUNNING', current: 'STOPPED', changed: true });
      assert.strictEqual((await controller.status('c1')).fleetStatus, 'STOPPED');
    });

    it('should leave a stopped fleet alone', async () => {
      await controller.stop('c1');

      const result = await controller.stop('c1');

      assert.deepStrictEqual(result, { name: 'c1', previous: 'STOPPED', current: 'STOPPED', changed: false });
    });

    it('should start a stopped fleet', async () => {
      await controller.stop('c1');

      const result = await controller.start('c1');

      assert.deepStrictEqual(result, { name: 'c1', previous: 'STOPPED', current: 'RUNNING', changed: true });
      assert.strictEqual(await provider.fleetStatus.getStatus('c1'), 'RUNNING');
    });

    it('should leave a running fleet alone', async () => {
      const result = await controller.start('c1');

      assert.strictEqual(result.changed, false);
      assert.strictEqual(result.current, 'RUNNING');
    });

    it('should let exactly one of two concurrent stops change the status', async () => {
      const results = await Promise.allSettled([controller.stop('c1'), controller.stop('c1')]);

      const changed = results.filter(
        (result): result is PromiseFulfilledResult<FleetResult> => result.status === 'fulfilled' && result.value.changed
      );
      assert.strictEqual(changed.length, 1);
      for (const result of results) {
        if (result.status === 'rejected') {
          assert.ok(result.reason instanceof ConcurrentUpdateError);
        }
      }
      assert.strictEqual(await provider.fleetStatus.getStatus('c1'), 'STOPPED');
    });

    it('should report a status held by another writer', async () => {
      await writeFile(join(stateDir, 'fleet', 'c1.lock'), '', 'utf-8');

      await assert.rejects(
        async () => controller.stop('c1'),
        (error: unknown) => {
          assert.ok(error instanceof ConcurrentUpdateError);
          assert.strictEqual(error.code, 'CONCURRENT_UPDATE');
          assert.strictEqual(error.message, "Fleet status of cluster 'c1' is being changed by another operation");
          return true;
        }
      );
    });

    it('should refuse a cluster with a stack operation in progress', async () => {
      await provider.stacks.setStatus('c1', 'UPDATE_IN_PROGRESS');

      await assert.rejects(
        async () => controller.stop('c1'),
        (error: unknown) => {
          assert.ok(error instanceof ClusterActionError);
          assert.strictEqual(error.code, 'CLUSTER_BUSY');
          assert.strictEqual(error.message, "Cluster 'c1' is UPDATING");
          return true;
        }
      );
    });

    it('should refuse a fleet without a recorded status', async () => {
      await provider.fleetStatus.remove('c1');

      await assert.rejects(
        async () => controller.stop('c1'),
        (error: unknown) => {
          assert.ok(error instanceof ClusterActionError);
          assert.strictEqual(error.code, 'OPERATION_FAILED');
          assert.strictEqual(error.message, "Compute fleet of 'c1' is UNKNOWN; cannot move it to STOPPED");
          return true;
        }
      );
    });
  });

  // ===========================================================================
  // Managed Batch
  // ===========================================================================

  describe('a batch cluster', () => {
    beforeEach(async () => {
      await controller.create('c1', awsBatchDocument());
    });

    it('should drain and restore the compute environment', async () => {
      const name = computeEnvironmentName('c1');

      await controller.stop('c1');
      const stopped = await provider.computeEnvironments.describe(name);
      await controller.start('c1');
      const started = await provider.computeEnvironments.describe(name);

      assert.deepStrictEqual(stopped, { enabled: false, minvCpus: 0, desiredvCpus: 0, maxvCpus: 16 });
      assert.deepStrictEqual(started, { enabled: true, minvCpus: 2, desiredvCpus: 2, maxvCpus: 16 });
    });

    it('should restore the fleet status when the compute environment refuses the change', async () => {
      provider.computeEnvironments.update = async () => {
        throw new CloudClientError('Rate exceeded', 'FAILED', 'batch');
      };

      await assert.rejects(
        async () => controller.stop('c1'),
        (error: unknown) => {
          assert.ok(error instanceof ClusterActionError);
          assert.strictEqual(error.message, 'Failed to update compute environment: Rate exceeded');
          return true;
        }
      );
      assert.strictEqual(await provider.fleetStatus.getStatus('c1'), 'RUNNING');
    });
  });

  it('should refuse a cluster that does not exist', async () => {
    await assert.rejects(
      async () => controller.start('c1'),
      (error: unknown) => {
        assert.ok(error instanceof ClusterActionError);
        assert.strictEqual(error.code, 'CLUSTER_NOT_FOUND');
        return true;
      }
    );
  });
});
