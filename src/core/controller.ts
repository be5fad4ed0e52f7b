/**
 * Cluster Lifecycle Controller
 *
 * Orchestrates create, update, delete, start and stop of one cluster
 * against the collaborator contracts. Each operation is a sequential
 * series of collaborator calls; the only compensating action is the
 * artifact cleanup after a failed stack creation.
 */

import { isCloudError, StatusConflictError } from '../cloud/errors.js';
import type { CloudProvider, ComputeEnvironmentCapacity, StackDescription } from '../cloud/types.js';
import { dumpYaml } from '../config/loader.js';
import type { SchemaRegistry } from '../config/registry.js';
import { ClusterConfig } from '../config/root.js';
import { createClusterRegistry } from '../config/schema/index.js';
import { isJsonObject, type JsonObject } from '../lib/json.js';
import { logger as defaultLogger, type Logger } from '../lib/logger.js';
import { ConfigPatch } from '../update/patch.js';
import { ClusterSnapshot } from '../update/snapshot.js';
import type { FleetStatus } from '../update/types.js';
import type { SuppressValidators, Severity, ValidationReport } from '../validation/types.js';
import {
  ClusterActionError,
  ClusterUpdateError,
  ConcurrentUpdateError,
  ConfigValidationError,
  isClusterError,
} from './errors.js';
import {
  artifactKeys,
  clusterTags,
  computeEnvironmentName,
  generateArtifactDirectory,
  generateBucketName,
  generateConfigVersion,
  isManagedStack,
  isValidClusterName,
  VERSION_TAG,
} from './naming.js';
import { waitForStackStatus, type PollOptions } from './poller.js';
import { buildStackTemplate, retainLogGroups } from './template.js';
import {
  clusterStateOf,
  type ClusterSummary,
  type CreateResult,
  type DeleteResult,
  type FleetResult,
  type UpdateResult,
} from './types.js';
import { PRODUCT_VERSION } from './version.js';

// =============================================================================
// Options
// =============================================================================

export interface ControllerOptions {
  registry?: SchemaRegistry;
  logger?: Logger;
  /** Product version recorded on every stack */
  version?: string;
  /** Poll settings used when an operation waits */
  poll?: Omit<PollOptions, 'logger' | 'signal'>;
}

export interface ValidationSettings {
  suppressValidators?: SuppressValidators;
  failureLevel?: Severity;
}

export interface WaitSettings {
  /** Wait for the stack to reach a stable status */
  wait?: boolean;
  signal?: AbortSignal;
}

export interface CreateOptions extends ValidationSettings, WaitSettings {
  /** Original document text, stored verbatim */
  sourceText?: string;
  /** Keep failed resources for inspection (default false) */
  disableRollback?: boolean;
}

export interface UpdateOptions extends ValidationSettings, WaitSettings {
  sourceText?: string;
  /** Apply denied changes anyway; validation still applies */
  force?: boolean;
}

export interface DeleteOptions extends WaitSettings {
  /** Keep the cluster log groups after the stack is gone */
  keepLogs?: boolean;
}

/**
 * Location of one persisted configuration version.
 */
interface StoredVersion {
  bucket: string;
  artifactDirectory: string;
  configVersion: string;
}

const GENERIC_CLUSTER_HINT = "Run 'hpcstack list' to see existing clusters.";

// =============================================================================
// Controller
// =============================================================================

export class ClusterController {
  private readonly registry: SchemaRegistry;
  private readonly logger: Logger;
  private readonly version: string;
  private readonly poll: Omit<PollOptions, 'logger' | 'signal'>;

  constructor(
    private readonly provider: CloudProvider,
    options: ControllerOptions = {}
  ) {
    this.registry = options.registry ?? createClusterRegistry();
    this.logger = options.logger ?? defaultLogger;
    this.version = options.version ?? PRODUCT_VERSION;
    this.poll = options.poll ?? {};
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  /**
   * Current state of a cluster; ABSENT when there is no stack.
   */
  async status(name: string): Promise<ClusterSummary> {
    const description = await this.findStack(name);
    if (!description) {
      return {
        name,
        state: 'ABSENT',
        stackStatus: null,
        version: null,
        configVersion: null,
        scheduler: null,
        fleetStatus: null,
        createdAt: null,
        updatedAt: null,
      };
    }
    return this.summarize(description);
  }

  /**
   * Every managed cluster, sorted by name.
   */
  async list(): Promise<ClusterSummary[]> {
    const stacks = await this.call('list stacks', () => this.provider.stacks.listStacks());
    const managed = stacks.filter((stack) => isManagedStack(stack.tags));
    const summaries: ClusterSummary[] = [];
    for (const stack of managed) {
      summaries.push(await this.summarize(stack));
    }
    return summaries.sort((a, b) => a.name.localeCompare(b.name));
  }

  /**
   * Resolved configuration of a running cluster.
   */
  async describe(name: string): Promise<JsonObject> {
    const description = await this.requireStack(name);
    const config = await this.loadStoredConfig(description);
    return config.toDocument();
  }

  /**
   * Validate a document without touching any stack.
   */
  async validate(document: unknown, options: ValidationSettings = {}): Promise<ValidationReport> {
    const config = ClusterConfig.fromDocument(this.registry, document);
    return config.validate({
      provider: this.provider.facts,
      suppressValidators: options.suppressValidators,
      failureLevel: options.failureLevel,
    });
  }

  // ===========================================================================
  // Create
  // ===========================================================================

  /**
   * Create a cluster from a configuration document.
   *
   * @throws ConfigValidationError if any finding reaches the failure level
   * @throws ClusterActionError if a collaborator call fails; artifacts
   *   uploaded before a failed stack creation are removed first
   */
  async create(name: string, document: unknown, options: CreateOptions = {}): Promise<CreateResult> {
    if (!isValidClusterName(name)) {
      throw new ClusterActionError(
        `Invalid cluster name '${name}'`,
        'OPERATION_FAILED',
        'Cluster names start with a letter and contain only letters, digits and hyphens (at most 60 characters).'
      );
    }
    if (await this.call('check stack', () => this.provider.stacks.stackExists(name))) {
      throw new ClusterActionError(`Cluster '${name}' already exists`, 'CLUSTER_ALREADY_EXISTS', GENERIC_CLUSTER_HINT);
    }

    const config = ClusterConfig.fromDocument(this.registry, document, options.sourceText);
    const report = await this.validateOrThrow(config, options);
    this.logger.success('Configuration validated');

    const root = config.root;
    const customBucket = root.getString('CustomS3Bucket');
    const bucket = customBucket ?? generateBucketName(root.getString('Region') ?? 'us-east-1', name);
    await this.ensureBucket(bucket, customBucket !== null);

    const artifactDirectory = generateArtifactDirectory(name);
    root.setValue('Version', this.version);
    root.setValue('ArtifactDirectory', artifactDirectory);
    root.setValue('ResourcesS3Bucket', bucket);

    let configVersion: string;
    try {
      configVersion = await this.persist(name, config, { bucket, artifactDirectory }, options.sourceText ?? dumpYaml(document), {
        onTemplate: async (templateUrl, parameters) => {
          this.logger.action(`Creating stack ${name}`);
          await this.provider.stacks.createStack({
            name,
            templateUrl,
            parameters,
            tags: { ...userTags(config), ...clusterTags(name, this.version) },
            disableRollback: options.disableRollback ?? false,
          });
        },
      });
    } catch (error) {
      await this.cleanupArtifacts(bucket, artifactDirectory);
      if (isCloudError(error, 'ALREADY_EXISTS')) {
        throw new ClusterActionError(`Cluster '${name}' already exists`, 'CLUSTER_ALREADY_EXISTS', GENERIC_CLUSTER_HINT, {
          cause: error,
        });
      }
      throw this.actionError(`Failed to create cluster '${name}'`, error);
    }

    await this.call('initialize fleet status', () => this.provider.fleetStatus.initialize(name, 'RUNNING'));
    this.logger.success(`Cluster ${name} creation started`);

    if (options.wait) {
      await this.waitStable(name, options.signal);
    }
    return { cluster: await this.status(name), configVersion, findings: report.findings };
  }

  // ===========================================================================
  // Update
  // ===========================================================================

  /**
   * Update a running cluster to a new configuration document.
   *
   * @throws ClusterUpdateError if a change is denied and the update is not forced
   */
  async update(name: string, document: unknown, options: UpdateOptions = {}): Promise<UpdateResult> {
    const description = await this.requireStack(name);
    const state = clusterStateOf(description.status);
    if (state === 'CREATING' || state === 'UPDATING' || state === 'DELETING') {
      throw new ClusterActionError(
        `Cluster '${name}' is ${state}; wait for the operation in progress to finish`,
        'CLUSTER_BUSY',
        `Run 'hpcstack status ${name}' until the cluster is ACTIVE.`
      );
    }
    if (state !== 'ACTIVE' && description.status !== 'UPDATE_ROLLBACK_COMPLETE') {
      throw new ClusterActionError(`Cluster '${name}' cannot be updated in status ${description.status}`);
    }

    const base = await this.loadStoredConfig(description);
    const target = ClusterConfig.fromDocument(this.registry, document, options.sourceText);
    const report = await this.validateOrThrow(target, options);

    const scheduler = base.find('scheduling')?.getString('Scheduler') ?? 'slurm';
    const snapshot = await this.call('read cluster state', () => ClusterSnapshot.capture(name, scheduler, this.provider));
    const patch = ConfigPatch.between(snapshot, base, target);
    const check = patch.check();

    if (patch.changes.length === 0) {
      this.logger.info('No changes found in the configuration');
      return {
        cluster: await this.summarize(description),
        configVersion: base.configVersion ?? '',
        findings: report.findings,
        changeSet: [],
        forced: false,
      };
    }
    if (!check.allowed && !options.force) {
      throw new ClusterUpdateError(`Update of cluster '${name}' is not allowed`, check.verdicts);
    }
    if (!check.allowed) {
      this.logger.warning('Applying changes that were not allowed because the update is forced');
    }

    const baseRoot = base.root;
    const bucket = baseRoot.getString('ResourcesS3Bucket');
    const artifactDirectory = baseRoot.getString('ArtifactDirectory');
    if (bucket === null || artifactDirectory === null) {
      throw new ClusterActionError(`Cluster '${name}' has no recorded artifact location`);
    }
    const root = target.root;
    root.setValue('CustomS3Bucket', baseRoot.getString('CustomS3Bucket'));
    root.setValue('ResourcesS3Bucket', bucket);
    root.setValue('ArtifactDirectory', artifactDirectory);
    root.setValue('Version', this.version);

    let configVersion: string;
    try {
      configVersion = await this.persist(name, target, { bucket, artifactDirectory }, options.sourceText ?? dumpYaml(document), {
        onTemplate: async (templateUrl, parameters) => {
          this.logger.action(`Updating stack ${name}`);
          await this.provider.stacks.updateStack({
            name,
            templateUrl,
            parameters,
            tags: { ...description.tags, [VERSION_TAG]: this.version },
          });
        },
      });
    } catch (error) {
      throw this.actionError(`Failed to update cluster '${name}'`, error);
    }
    this.logger.success(`Cluster ${name} update started`);

    if (options.wait) {
      await this.waitStable(name, options.signal);
    }
    return {
      cluster: await this.status(name),
      configVersion,
      findings: report.findings,
      changeSet: check.changeSet,
      forced: !check.allowed,
    };
  }

  // ===========================================================================
  // Delete
  // ===========================================================================

  /**
   * Delete a cluster. A cluster that is already gone counts as deleted.
   */
  async delete(name: string, options: DeleteOptions = {}): Promise<DeleteResult> {
    const keepLogs = options.keepLogs ?? false;
    const description = await this.findStack(name);
    if (!description) {
      this.logger.info(`Cluster ${name} does not exist`);
      return { name, deleted: false, keptLogs: keepLogs, artifactsRemoved: 0 };
    }
    if (description.status === 'DELETE_IN_PROGRESS') {
      throw new ClusterActionError(`Cluster '${name}' is already being deleted`, 'CLUSTER_BUSY');
    }

    if (keepLogs) {
      await this.retainLogs(name);
    }

    this.logger.action(`Deleting stack ${name}`);
    try {
      await this.provider.stacks.deleteStack(name);
    } catch (error) {
      if (!isCloudError(error, 'NOT_FOUND')) {
        throw this.actionError(`Failed to delete cluster '${name}'`, error);
      }
      this.logger.debug(`Stack ${name} was already gone`);
    }

    let artifactsRemoved = 0;
    const bucket = description.parameters['ResourcesS3Bucket'];
    const artifactDirectory = description.parameters['ArtifactDirectory'];
    if (bucket !== undefined && artifactDirectory !== undefined) {
      artifactsRemoved = await this.call('remove configuration artifacts', () =>
        this.provider.objects.deletePrefix(bucket, `${artifactDirectory}/`)
      );
    }
    if (description.parameters['Scheduler'] === 'awsbatch') {
      await this.call('remove compute environment', () =>
        this.provider.computeEnvironments.remove(computeEnvironmentName(name))
      );
    }
    await this.call('remove fleet status', () => this.provider.fleetStatus.remove(name));

    if (options.wait) {
      await this.waitStable(name, options.signal);
    }
    this.logger.success(`Cluster ${name} deleted`);
    return { name, deleted: true, keptLogs: keepLogs, artifactsRemoved };
  }

  // ===========================================================================
  // Start / Stop
  // ===========================================================================

  /**
   * Start the compute fleet. Starting a running fleet is a no-op.
   */
  async start(name: string): Promise<FleetResult> {
    return this.switchFleet(name, 'RUNNING');
  }

  /**
   * Stop the compute fleet. Stopping a stopped fleet is a no-op.
   */
  async stop(name: string): Promise<FleetResult> {
    return this.switchFleet(name, 'STOPPED');
  }

  private async switchFleet(name: string, target: 'RUNNING' | 'STOPPED'): Promise<FleetResult> {
    const description = await this.requireStack(name);
    const state = clusterStateOf(description.status);
    if (state !== 'ACTIVE') {
      throw new ClusterActionError(`Cluster '${name}' is ${state}`, 'CLUSTER_BUSY');
    }

    const transitional: FleetStatus = target === 'RUNNING' ? 'STARTING' : 'STOPPING';
    const opposite: 'RUNNING' | 'STOPPED' = target === 'RUNNING' ? 'STOPPED' : 'RUNNING';
    const current = await this.call('read fleet status', () => this.provider.fleetStatus.getStatus(name));

    if (current === target || current === transitional) {
      this.logger.info(`Compute fleet of ${name} is already ${current}`);
      return { name, previous: current, current, changed: false };
    }
    if (current !== opposite) {
      throw new ClusterActionError(
        `Compute fleet of '${name}' is ${current}; cannot move it to ${target}`,
        current === 'UNKNOWN' ? 'OPERATION_FAILED' : 'CLUSTER_BUSY'
      );
    }

    this.logger.action(`${target === 'RUNNING' ? 'Starting' : 'Stopping'} compute fleet of ${name}`);
    try {
      await this.provider.fleetStatus.compareAndSwap(name, opposite, transitional, target);
    } catch (error) {
      if (error instanceof StatusConflictError) {
        throw new ConcurrentUpdateError(name, opposite, error.actual);
      }
      throw this.actionError(`Failed to change the fleet status of '${name}'`, error);
    }

    if (description.parameters['Scheduler'] === 'awsbatch') {
      try {
        const config = await this.loadStoredConfig(description);
        const capacity = batchCapacity(config, target === 'RUNNING');
        await this.call('update compute environment', () =>
          this.provider.computeEnvironments.update(computeEnvironmentName(name), capacity)
        );
      } catch (error) {
        await this.restoreFleetStatus(name, target, opposite);
        throw error;
      }
    }

    this.logger.success(`Compute fleet of ${name} is ${target}`);
    return { name, previous: current, current: target, changed: true };
  }

  /**
   * Put the fleet status back after the compute environment refused a change.
   *
   * A failed restore is reported as a warning; the caller rethrows the
   * original error.
   */
  private async restoreFleetStatus(name: string, from: FleetStatus, to: 'RUNNING' | 'STOPPED'): Promise<void> {
    const transitional: FleetStatus = to === 'RUNNING' ? 'STARTING' : 'STOPPING';
    this.logger.action(`Restoring compute fleet of ${name} to ${to}`);
    try {
      await this.provider.fleetStatus.compareAndSwap(name, from, transitional, to);
    } catch (error) {
      this.logger.warning(`Could not restore the fleet status of ${name}: ${messageOf(error)}`);
    }
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private async validateOrThrow(config: ClusterConfig, settings: ValidationSettings): Promise<ValidationReport> {
    const report = await config.validate({
      provider: this.provider.facts,
      suppressValidators: settings.suppressValidators,
      failureLevel: settings.failureLevel,
    });
    if (report.failed) {
      throw new ConfigValidationError('Configuration is invalid', report.findings);
    }
    for (const finding of report.findings) {
      if (finding.level === 'WARNING') {
        this.logger.warning(finding.message);
      }
    }
    return report;
  }

  private async ensureBucket(bucket: string, custom: boolean): Promise<void> {
    const exists = await this.call('check bucket', () => this.provider.objects.bucketExists(bucket));
    if (exists) return;
    if (custom) {
      throw new ClusterActionError(
        `Bucket '${bucket}' does not exist`,
        'OPERATION_FAILED',
        'Create the bucket or remove CustomS3Bucket from the configuration.'
      );
    }
    this.logger.action(`Creating bucket ${bucket}`);
    await this.call('create bucket', () => this.provider.objects.createBucket(bucket));
  }

  /**
   * Upload one configuration version and hand the template to the stack call.
   *
   * @returns The new config version token
   */
  private async persist(
    name: string,
    config: ClusterConfig,
    location: Omit<StoredVersion, 'configVersion'>,
    originalText: string,
    hooks: { onTemplate: (templateUrl: string, parameters: Record<string, string>) => Promise<void> }
  ): Promise<string> {
    const resolvedText = dumpYaml(config.toDocument());
    const configVersion = generateConfigVersion(resolvedText);
    config.root.setValue('ConfigVersion', configVersion);

    const storage = config.toStorage();
    const keys = artifactKeys(location.artifactDirectory, configVersion);
    const objects = this.provider.objects;

    this.logger.action(`Uploading configuration ${configVersion}`);
    await objects.putBlob(location.bucket, keys.originalConfig, originalText, 'text');
    await objects.putBlob(location.bucket, keys.resolvedConfig, resolvedText, 'text');
    await objects.putBlob(location.bucket, keys.storageBlob, JSON.stringify(storage.blob), 'json');
    const templateVersion = await objects.putBlob(
      location.bucket,
      keys.template,
      JSON.stringify(buildStackTemplate(name, config)),
      'json'
    );

    await hooks.onTemplate(objects.urlFor(location.bucket, keys.template, templateVersion), storage.params);
    return configVersion;
  }

  private async cleanupArtifacts(bucket: string, artifactDirectory: string): Promise<void> {
    try {
      const removed = await this.provider.objects.deletePrefix(bucket, `${artifactDirectory}/`);
      this.logger.debug(`Removed ${removed} uploaded artifacts`);
    } catch (error) {
      this.logger.warning(`Unable to remove uploaded artifacts under ${artifactDirectory}: ${messageOf(error)}`);
    }
  }

  private async retainLogs(name: string): Promise<void> {
    try {
      const template = await this.provider.stacks.getStackTemplate(name);
      const { template: retained, changed } = retainLogGroups(template);
      if (changed > 0) {
        this.logger.action('Marking log groups to be retained');
        await this.provider.stacks.updateStackTemplate(name, retained);
      }
    } catch (error) {
      if (!isCloudError(error, 'NOT_FOUND')) {
        throw this.actionError(`Failed to retain the logs of cluster '${name}'`, error);
      }
    }
  }

  /**
   * Rebuild the running configuration from stack parameters and its blob.
   */
  private async loadStoredConfig(description: StackDescription): Promise<ClusterConfig> {
    const location = storedVersionOf(description);
    const keys = artifactKeys(location.artifactDirectory, location.configVersion);
    const content = await this.call('read stored configuration', () =>
      this.provider.objects.getBlob(location.bucket, keys.storageBlob)
    );
    let blob: unknown;
    try {
      blob = JSON.parse(content);
    } catch (error) {
      throw new ClusterActionError(`Stored configuration of '${description.name}' is not valid JSON`, 'OPERATION_FAILED', undefined, {
        cause: error,
      });
    }
    if (!isJsonObject(blob)) {
      throw new ClusterActionError(`Stored configuration of '${description.name}' is not an object`);
    }
    return ClusterConfig.fromStorage(this.registry, { params: description.parameters, blob });
  }

  private async summarize(description: StackDescription): Promise<ClusterSummary> {
    const fleetStatus = await this.call('read fleet status', () => this.provider.fleetStatus.getStatus(description.name));
    return {
      name: description.name,
      state: clusterStateOf(description.status),
      stackStatus: description.status,
      version: description.tags[VERSION_TAG] ?? null,
      configVersion: description.parameters['ConfigVersion'] ?? null,
      scheduler: description.parameters['Scheduler'] ?? null,
      fleetStatus,
      createdAt: description.createdAt,
      updatedAt: description.updatedAt ?? null,
    };
  }

  private async findStack(name: string): Promise<StackDescription | null> {
    try {
      return await this.provider.stacks.describeStack(name);
    } catch (error) {
      if (isCloudError(error, 'NOT_FOUND')) {
        return null;
      }
      throw this.actionError(`Failed to describe cluster '${name}'`, error);
    }
  }

  private async requireStack(name: string): Promise<StackDescription> {
    const description = await this.findStack(name);
    if (!description) {
      throw new ClusterActionError(`Cluster '${name}' does not exist`, 'CLUSTER_NOT_FOUND', GENERIC_CLUSTER_HINT);
    }
    return description;
  }

  private async waitStable(name: string, signal: AbortSignal | undefined): Promise<void> {
    this.logger.info(`Waiting for stack ${name}...`);
    const final = await waitForStackStatus(this.provider.stacks, name, { ...this.poll, signal, logger: this.logger });
    if (final !== null && clusterStateOf(final.status) === 'FAILED') {
      throw new ClusterActionError(
        `Stack '${name}' ended in ${final.status}${final.statusReason ? `: ${final.statusReason}` : ''}`
      );
    }
  }

  /**
   * Run one collaborator call, translating its failure.
   */
  private async call<T>(what: string, fn: () => Promise<T>): Promise<T> {
    this.logger.debug(what);
    try {
      return await fn();
    } catch (error) {
      throw this.actionError(`Failed to ${what}`, error);
    }
  }

  private actionError(message: string, error: unknown): Error {
    if (isClusterError(error)) {
      return error;
    }
    return new ClusterActionError(`${message}: ${messageOf(error)}`, 'OPERATION_FAILED', undefined, { cause: error });
  }
}

// =============================================================================
// Helpers
// =============================================================================

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function storedVersionOf(description: StackDescription): StoredVersion {
  const bucket = description.parameters['ResourcesS3Bucket'];
  const artifactDirectory = description.parameters['ArtifactDirectory'];
  const configVersion = description.parameters['ConfigVersion'];
  if (bucket === undefined || artifactDirectory === undefined || configVersion === undefined) {
    throw new ClusterActionError(`Stack '${description.name}' does not record a configuration version`);
  }
  return { bucket, artifactDirectory, configVersion };
}

/**
 * User tags from the Tags parameter, as a key/value map.
 */
function userTags(config: ClusterConfig): Record<string, string> {
  const tags: Record<string, string> = {};
  const value = config.root.value('Tags');
  if (value?.type !== 'json' || !Array.isArray(value.value)) {
    return tags;
  }
  for (const entry of value.value) {
    if (isJsonObject(entry) && typeof entry['Key'] === 'string' && typeof entry['Value'] === 'string') {
      tags[entry['Key']] = entry['Value'];
    }
  }
  return tags;
}

/**
 * Capacity of the managed compute environment for a fleet state.
 */
function batchCapacity(config: ClusterConfig, running: boolean): ComputeEnvironmentCapacity {
  const resource = config.getSections('awsbatch_compute_resource')[0];
  const minvCpus = resource?.getNumber('MinvCpus') ?? 0;
  const maxvCpus = resource?.getNumber('MaxvCpus') ?? 0;
  if (!running) {
    return { enabled: false, minvCpus: 0, desiredvCpus: 0, maxvCpus };
  }
  return {
    enabled: true,
    minvCpus,
    desiredvCpus: resource?.getNumber('DesiredvCpus') ?? minvCpus,
    maxvCpus,
  };
}
