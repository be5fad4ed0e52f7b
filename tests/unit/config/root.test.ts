/**
 * Unit tests for the Configuration Root
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { ClusterConfig, METADATA_KEY } from '../../../src/config/root.js';
import type { SchemaRegistry } from '../../../src/config/registry.js';
import { createClusterRegistry } from '../../../src/config/schema/index.js';
import { ConfigValidationError, TooManySectionsError, UnknownFieldError } from '../../../src/core/errors.js';
import { createTestRegistry } from '../../helpers/registry.js';
import { slurmDocument } from '../../helpers/documents.js';

const GROUP_ID = 'root[default]/group[g1]';

describe('ClusterConfig', () => {
  let registry: SchemaRegistry;

  beforeEach(() => {
    registry = createTestRegistry();
  });

  // ===========================================================================
  // fromDocument
  // ===========================================================================

  describe('fromDocument', () => {
    it('should build the section tree parents first', () => {
      const config = ClusterConfig.fromDocument(registry, {
        Groups: [{ Name: 'g1', Items: [{ Name: 'i1', Size: 2 }, { Name: 'i2', Size: 3 }] }],
      });

      assert.deepStrictEqual(
        config.allSections().map((section) => section.id),
        [
          'root[default]',
          GROUP_ID,
          `${GROUP_ID}/item[i1]`,
          `${GROUP_ID}/item[i2]`,
          'root[default]/options[default]',
        ]
      );
      assert.deepStrictEqual(config.parseFindings, []);
    });

    it('should autocreate single sections with defaults', () => {
      const config = ClusterConfig.fromDocument(registry, {});
      const options = config.find('options');

      assert.ok(options);
      assert.strictEqual(options.label, 'default');
      assert.strictEqual(options.getNumber('Level'), 1);
    });

    it('should navigate between parents and children', () => {
      const config = ClusterConfig.fromDocument(registry, {
        Groups: [{ Name: 'g1', Items: [{ Name: 'i2', Size: 1 }, { Name: 'i1', Size: 1 }] }],
      });
      const group = config.getSection(GROUP_ID);
      assert.ok(group);

      assert.deepStrictEqual(
        config.childrenOf(group, 'item').map((item) => item.label),
        ['i2', 'i1']
      );
      assert.strictEqual(config.parentOf(group), config.root);
      assert.strictEqual(config.parentOf(config.root), undefined);
      assert.strictEqual(config.getSections('item').length, 2);
    });

    it('should report exceeded caps and keep the accepted sections', () => {
      const config = ClusterConfig.fromDocument(registry, {
        Groups: [{ Name: 'g1', Items: [{ Name: 'i1', Size: 1 }, { Name: 'i2', Size: 1 }, { Name: 'i3', Size: 1 }] }],
      });

      assert.deepStrictEqual(config.parseFindings, [
        {
          validator: 'too_many_sections',
          level: 'ERROR',
          message: `Too many 'item' sections under '${GROUP_ID}': at most 2 allowed`,
        },
      ]);
      assert.strictEqual(config.getSection(`${GROUP_ID}/item[i3]`), undefined);
      assert.strictEqual(config.getSections('item').length, 2);
    });

    it('should report duplicate and invalid labels', () => {
      const config = ClusterConfig.fromDocument(registry, {
        Groups: [{ Name: 'g1' }, { Name: 'g1' }, { Name: '9x' }],
      });

      assert.deepStrictEqual(
        config.parseFindings.map((finding) => [finding.validator, finding.message]),
        [
          ['duplicate_section', "Duplicate 'group' section 'g1' under 'root[default]'"],
          ['invalid_label', "Invalid label '9x' for section 'group'"],
        ]
      );
    });

    it('should report list fields that are not lists', () => {
      const config = ClusterConfig.fromDocument(registry, { Groups: { Name: 'g1' } });

      assert.deepStrictEqual(
        config.parseFindings.map((finding) => finding.message),
        [`Invalid value '{"Name":"g1"}' for parameter 'root.Groups', allowed: a list`]
      );
    });

    it('should report list elements without a label', () => {
      const config = ClusterConfig.fromDocument(registry, { Groups: [{ Items: [] }] });

      assert.deepStrictEqual(
        config.parseFindings.map((finding) => finding.message),
        [`Invalid value '{"Items":[]}' for parameter 'root.Groups', allowed: a mapping with a Name`]
      );
    });

    it('should still build a tree for documents that are not mappings', () => {
      const config = ClusterConfig.fromDocument(registry, 'just text');

      assert.deepStrictEqual(
        config.parseFindings.map((finding) => finding.message),
        ["Invalid value 'just text' for parameter 'configuration', allowed: a mapping"]
      );
      assert.ok(config.find('options'));
    });

    it('should keep the source text', () => {
      const config = ClusterConfig.fromDocument(registry, {}, 'Title: x\n');

      assert.strictEqual(config.sourceDocument, 'Title: x\n');
    });
  });

  // ===========================================================================
  // Mutation
  // ===========================================================================

  describe('addSection', () => {
    it('should add a populated child', () => {
      const config = ClusterConfig.fromDocument(registry, { Groups: [{ Name: 'g1' }] });

      const item = config.addSection(GROUP_ID, 'item', 'i1', { Size: 5, Mode: 'slow' });

      assert.strictEqual(item.id, `${GROUP_ID}/item[i1]`);
      assert.strictEqual(item.getString('Label'), 'slow-item');
      assert.deepStrictEqual(config.getSection(GROUP_ID)?.childLabels('item'), ['i1']);
    });

    it('should roll back a child with an invalid fragment', () => {
      const config = ClusterConfig.fromDocument(registry, {
        Groups: [{ Name: 'g1', Items: [{ Name: 'i1', Size: 1 }] }],
      });

      assert.throws(
        () => config.addSection(GROUP_ID, 'item', 'i3', { Size: 'big' }),
        (error: unknown) => {
          assert.ok(error instanceof ConfigValidationError);
          assert.strictEqual(error.message, "Section 'Groups[g1].Items[i3]' is invalid");
          assert.deepStrictEqual(
            error.findings.map((finding) => finding.validator),
            ['invalid_value']
          );
          return true;
        }
      );
      assert.deepStrictEqual(config.getSection(GROUP_ID)?.childLabels('item'), ['i1']);
      assert.strictEqual(config.getSection(`${GROUP_ID}/item[i3]`), undefined);
    });

    it('should enforce the cap', () => {
      const config = ClusterConfig.fromDocument(registry, {
        Groups: [{ Name: 'g1', Items: [{ Name: 'i1', Size: 1 }, { Name: 'i2', Size: 1 }] }],
      });

      assert.throws(() => config.addSection(GROUP_ID, 'item', 'i3', { Size: 1 }), TooManySectionsError);
    });

    it('should reject a child key the parent does not hold', () => {
      const config = ClusterConfig.fromDocument(registry, {});

      assert.throws(
        () => config.addSection('root[default]', 'item', 'i1'),
        (error: unknown) => {
          assert.ok(error instanceof UnknownFieldError);
          assert.strictEqual(error.message, "Unknown field 'item' in section 'root'");
          return true;
        }
      );
    });
  });

  describe('removeSection', () => {
    it('should drop the section with its descendants', () => {
      const config = ClusterConfig.fromDocument(registry, {
        Groups: [{ Name: 'g1', Items: [{ Name: 'i1', Size: 1 }] }, { Name: 'g2' }],
      });

      config.removeSection(GROUP_ID);

      assert.strictEqual(config.getSection(GROUP_ID), undefined);
      assert.strictEqual(config.getSection(`${GROUP_ID}/item[i1]`), undefined);
      assert.deepStrictEqual(config.root.childLabels('group'), ['g2']);
    });

    it('should refuse to remove the root', () => {
      const config = ClusterConfig.fromDocument(registry, {});

      assert.throws(() => config.removeSection('root[default]'), /root section cannot be removed/);
    });
  });

  // ===========================================================================
  // Serialization
  // ===========================================================================

  describe('serialization', () => {
    function sample(): ClusterConfig {
      const config = ClusterConfig.fromDocument(registry, {
        Groups: [{ Name: 'g1', Items: [{ Name: 'i1', Size: 2 }] }],
      });
      config.getSection(`${GROUP_ID}/item[i1]`)?.setValue('Secret', 'test-secret');
      return config;
    }

    it('should resolve defaults and hide internal fields in documents', () => {
      assert.deepStrictEqual(sample().toDocument(), {
        Title: 'untitled',
        Groups: [{ Name: 'g1', Items: [{ Name: 'i1', Size: 2, Mode: 'fast', Label: 'fast-item' }] }],
        Options: { Level: 1, Mode: 'fast' },
      });
    });

    it('should split storage into flat parameters and a structured blob', () => {
      const storage = sample().toStorage();

      assert.deepStrictEqual(storage.params, {
        Title: 'untitled',
        GroupSettings: 'g1',
        OptionSettings: 'default',
        OptionValues: '1,fast',
        [METADATA_KEY]: '{"root":["default"],"group":["g1"],"item":["i1"],"options":["default"]}',
      });
      assert.deepStrictEqual(storage.blob, {
        group: {
          g1: {
            Items: ['i1'],
            item: { i1: { Size: 2, Mode: 'fast', Label: 'fast-item', Secret: 'test-secret' } },
          },
        },
      });
    });

    it('should rebuild the same tree from storage', () => {
      const original = sample();

      const restored = ClusterConfig.fromStorage(registry, original.toStorage());

      assert.deepStrictEqual(restored.toDocument(), original.toDocument());
      assert.strictEqual(restored.getSection(`${GROUP_ID}/item[i1]`)?.getString('Secret'), 'test-secret');
    });

    it('should clone without sharing state', () => {
      const original = sample();
      const copy = original.clone();

      copy.root.setValue('Title', 'copy');
      copy.removeSection(GROUP_ID);

      assert.strictEqual(original.root.getString('Title'), 'untitled');
      assert.ok(original.getSection(GROUP_ID));
    });
  });

  // ===========================================================================
  // Validation
  // ===========================================================================

  describe('validate', () => {
    it('should combine parse findings with section findings', async () => {
      const config = ClusterConfig.fromDocument(registry, {
        Extra: true,
        Groups: [{ Name: 'g1', Items: [{ Name: 'i1' }] }],
      });

      const report = await config.validate();

      assert.deepStrictEqual(
        report.findings.map((finding) => finding.validator),
        ['unknown_field', 'required']
      );
      assert.strictEqual(report.failed, true);
    });

    it('should only fail at or above the failure level', async () => {
      const config = ClusterConfig.fromDocument(registry, { Groups: [{ Name: 'g1' }] });

      const lenient = await config.validate();
      const strict = await config.validate({ failureLevel: 'WARNING' });

      assert.strictEqual(lenient.failed, false);
      assert.strictEqual(strict.failed, true);
      assert.strictEqual(strict.failureLevel, 'WARNING');
    });
  });

  // ===========================================================================
  // Cluster Schema
  // ===========================================================================

  describe('with the cluster schema', () => {
    const clusterRegistry = createClusterRegistry();

    it('should resolve the defaults of a minimal cluster', () => {
      const config = ClusterConfig.fromDocument(clusterRegistry, slurmDocument());

      assert.deepStrictEqual(config.parseFindings, []);
      assert.deepStrictEqual(config.toDocument(), {
        Region: 'us-east-1',
        Image: { Os: 'alinux2' },
        HeadNode: {
          InstanceType: 't3.medium',
          DisableSimultaneousMultithreading: false,
          Networking: { SubnetId: 'subnet-0head' },
          Ssh: { AllowedIps: '0.0.0.0/0' },
          Dcv: { Enabled: false, Port: 8443, AllowedIps: '0.0.0.0/0' },
        },
        Scheduling: {
          Scheduler: 'slurm',
          SlurmSettings: {
            ScaledownIdletime: 10,
            QueueUpdateStrategy: 'COMPUTE_FLEET_STOP',
            EnableMemoryBasedScheduling: false,
          },
          SlurmQueues: [
            {
              Name: 'q1',
              CapacityType: 'ONDEMAND',
              AllocationStrategy: 'lowest-price',
              Networking: { SubnetIds: ['subnet-0compute'], PlacementGroup: { Enabled: false } },
              ComputeResources: [
                {
                  Name: 'cr1',
                  InstanceType: 'c5.xlarge',
                  MinCount: 0,
                  MaxCount: 10,
                  DisableSimultaneousMultithreading: false,
                  Efa: { Enabled: false, GdrSupport: false },
                },
              ],
            },
          ],
        },
        Monitoring: {
          DetailedMonitoring: false,
          Logs: { Enabled: true, RetentionInDays: 180, DeletionPolicy: 'Delete' },
        },
      });
    });

    it('should store slurm options as one combined entry', () => {
      const config = ClusterConfig.fromDocument(clusterRegistry, slurmDocument({ queueUpdateStrategy: 'DRAIN' }));

      const { params } = config.toStorage();

      assert.strictEqual(params['SlurmOptions'], '10,DRAIN,false');
      assert.strictEqual(params['HeadNodeInstanceType'], 't3.medium');
      assert.strictEqual(params['CustomS3Bucket'], 'NONE');
    });

    it('should round-trip a full cluster through storage', () => {
      const config = ClusterConfig.fromDocument(
        clusterRegistry,
        slurmDocument({
          queueUpdateStrategy: 'TERMINATE',
          extraQueues: ['q2'],
          efa: { Enabled: true },
          placementGroup: { Enabled: true },
          sharedStorage: [{ Name: 'home', MountDir: '/shared', StorageType: 'Ebs', EbsSettings: { Size: 100 } }],
          tags: [{ Key: 'team', Value: 'hpc' }],
        })
      );

      const restored = ClusterConfig.fromStorage(clusterRegistry, config.toStorage());

      assert.deepStrictEqual(restored.toDocument(), config.toDocument());
    });

    it('should derive the resources bucket from the custom bucket', () => {
      const config = ClusterConfig.fromDocument(clusterRegistry, slurmDocument({ customBucket: 'my-bucket' }));

      assert.strictEqual(config.root.getString('ResourcesS3Bucket'), 'my-bucket');
    });

    it('should report a bad value and a missing required value together', async () => {
      const config = ClusterConfig.fromDocument(
        clusterRegistry,
        slurmDocument({ computeResource: { Name: 'cr1', MinCount: 'x' } })
      );

      const report = await config.validate();

      assert.deepStrictEqual(report.findings, [
        {
          validator: 'invalid_value',
          level: 'ERROR',
          message: "Invalid value 'x' for parameter 'MinCount', allowed: an integer",
        },
        {
          validator: 'required',
          level: 'ERROR',
          message: "Configuration parameter 'InstanceType' must have a value",
          path: 'Scheduling.SlurmQueues[q1].ComputeResources[cr1].InstanceType',
        },
      ]);
    });
  });
});
