/**
 * Integration tests for cluster creation
 *
 * Runs the lifecycle controller against the local backend in a
 * temporary state directory.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { rm } from 'node:fs/promises';

import { CloudClientError } from '../../src/cloud/errors.js';
import { ClusterController } from '../../src/core/controller.js';
import { ClusterActionError, ConfigValidationError } from '../../src/core/errors.js';
import { artifactKeys, generateBucketName } from '../../src/core/naming.js';
import { isJsonObject } from '../../src/lib/json.js';
import { createLocalProvider, type LocalProvider } from '../../src/local/index.js';
import { createStateDir, quietLogger, slurmDocument } from '../helpers/documents.js';

const BUCKET = generateBucketName('us-east-1', 'c1');

describe('create integration', () => {
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
  // Success
  // ===========================================================================

  describe('a valid configuration', () => {
    it('should create an active cluster with a running fleet', async () => {
      const result = await controller.create('c1', slurmDocument(), { wait: true });

      assert.deepStrictEqual(result.findings, []);
      assert.strictEqual(result.cluster.name, 'c1');
      assert.strictEqual(result.cluster.state, 'ACTIVE');
      assert.strictEqual(result.cluster.stackStatus, 'CREATE_COMPLETE');
      assert.strictEqual(result.cluster.version, '1.2.3');
      assert.strictEqual(result.cluster.scheduler, 'slurm');
      assert.strictEqual(result.cluster.fleetStatus, 'RUNNING');
      assert.strictEqual(result.cluster.configVersion, result.configVersion);
      assert.match(result.configVersion, /^[0-9a-z]+-[0-9a-f]{8}$/);
    });

    it('should record the artifact location and tags on the stack', async () => {
      await controller.create('c1', slurmDocument({ tags: [{ Key: 'team', Value: 'hpc' }] }));

      const stack = await provider.stacks.describeStack('c1');

      assert.strictEqual(stack.parameters['ResourcesS3Bucket'], BUCKET);
      assert.match(stack.parameters['ArtifactDirectory'] ?? '', /^hpcstack\/c1-[a-z0-9]{8}$/);
      assert.strictEqual(stack.parameters['Version'], '1.2.3');
      assert.deepStrictEqual(stack.tags, {
        team: 'hpc',
        'hpcstack:version': '1.2.3',
        'hpcstack:cluster-name': 'c1',
      });
    });

    it('should upload one configuration version', async () => {
      const sourceText = 'Region: us-east-1\n';
      const result = await controller.create('c1', slurmDocument(), { sourceText });
      const stack = await provider.stacks.describeStack('c1');
      const keys = artifactKeys(stack.parameters['ArtifactDirectory'] ?? '', result.configVersion);

      assert.deepStrictEqual(
        await provider.objects.listKeys(BUCKET),
        [keys.originalConfig, keys.resolvedConfig, keys.storageBlob, keys.template].sort()
      );
      assert.strictEqual(await provider.objects.getBlob(BUCKET, keys.originalConfig), sourceText);
    });

    it('should describe the resolved configuration', async () => {
      await controller.create('c1', slurmDocument());

      const document = await controller.describe('c1');

      assert.strictEqual(document['Region'], 'us-east-1');
      assert.strictEqual(document['Version'], undefined);
      const scheduling = document['Scheduling'];
      assert.ok(isJsonObject(scheduling));
      const queues = scheduling['SlurmQueues'];
      assert.ok(Array.isArray(queues));
      const queue = queues[0];
      assert.ok(isJsonObject(queue));
      assert.strictEqual(queue['Name'], 'q1');
      const resources = queue['ComputeResources'];
      assert.ok(Array.isArray(resources));
      const resource = resources[0];
      assert.ok(isJsonObject(resource));
      assert.strictEqual(resource['MaxCount'], 10);
    });

    it('should list managed clusters by name', async () => {
      await controller.create('zeta', slurmDocument());
      await controller.create('alpha', slurmDocument());

      const clusters = await controller.list();

      assert.deepStrictEqual(
        clusters.map((cluster) => [cluster.name, cluster.state]),
        [
          ['alpha', 'ACTIVE'],
          ['zeta', 'ACTIVE'],
        ]
      );
    });

    it('should report an absent cluster', async () => {
      const summary = await controller.status('c1');

      assert.strictEqual(summary.state, 'ABSENT');
      assert.strictEqual(summary.stackStatus, null);
      assert.strictEqual(summary.fleetStatus, null);
    });
  });

  // ===========================================================================
  // Refusals
  // ===========================================================================

  describe('refused creations', () => {
    it('should refuse an invalid cluster name', async () => {
      await assert.rejects(
        async () => controller.create('1-bad', slurmDocument()),
        (error: unknown) => {
          assert.ok(error instanceof ClusterActionError);
          assert.strictEqual(error.message, "Invalid cluster name '1-bad'");
          return true;
        }
      );
    });

    it('should refuse an existing cluster', async () => {
      await controller.create('c1', slurmDocument());

      await assert.rejects(
        async () => controller.create('c1', slurmDocument()),
        (error: unknown) => {
          assert.ok(error instanceof ClusterActionError);
          assert.strictEqual(error.code, 'CLUSTER_ALREADY_EXISTS');
          assert.strictEqual(error.message, "Cluster 'c1' already exists");
          return true;
        }
      );
    });

    it('should refuse an invalid configuration before touching storage', async () => {
      const document = slurmDocument({ computeResource: { Name: 'cr1', InstanceType: 'x9.nothing' } });

      await assert.rejects(
        async () => controller.create('c1', document),
        (error: unknown) => {
          assert.ok(error instanceof ConfigValidationError);
          assert.ok(error.findings.some((finding) => finding.validator === 'instance_type'));
          return true;
        }
      );
      assert.strictEqual(await provider.objects.bucketExists(BUCKET), false);
      assert.strictEqual(await provider.stacks.stackExists('c1'), false);
    });

    it('should refuse a custom bucket that does not exist', async () => {
      await assert.rejects(
        async () => controller.create('c1', slurmDocument({ customBucket: 'my-bucket' })),
        (error: unknown) => {
          assert.ok(error instanceof ClusterActionError);
          assert.strictEqual(error.message, "Bucket 'my-bucket' does not exist");
          return true;
        }
      );
    });

    it('should remove uploaded artifacts when the stack cannot be created', async () => {
      provider.stacks.createStack = async () => {
        throw new CloudClientError('Limit exceeded', 'FAILED', 'stacks');
      };

      await assert.rejects(
        async () => controller.create('c1', slurmDocument()),
        (error: unknown) => {
          assert.ok(error instanceof ClusterActionError);
          assert.strictEqual(error.code, 'OPERATION_FAILED');
          assert.strictEqual(error.message, "Failed to create cluster 'c1': Limit exceeded");
          return true;
        }
      );
      assert.deepStrictEqual(await provider.objects.listKeys(BUCKET), []);
      assert.strictEqual(await provider.fleetStatus.getStatus('c1'), 'UNKNOWN');
    });
  });
});
