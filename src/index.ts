/**
 * hpcstack
 *
 * Typed cluster configuration, validation, update policies and the
 * lifecycle controller, usable without the CLI.
 */

export * from './core/errors.js';
export * from './core/types.js';
export { ClusterController } from './core/controller.js';
export type {
  ControllerOptions,
  CreateOptions,
  DeleteOptions,
  UpdateOptions,
  ValidationSettings,
} from './core/controller.js';
export { waitForStackStatus, type PollOptions } from './core/poller.js';
export { PRODUCT_VERSION } from './core/version.js';

export { ClusterConfig, METADATA_KEY, type StorageData } from './config/root.js';
export { Section } from './config/section.js';
export { Parameter, type ParamDefinition, type ParamValue } from './config/params.js';
export { SchemaRegistry, type SectionDefinition } from './config/registry.js';
export { createClusterRegistry, ROOT_SECTION, SCHEDULERS, SUPPORTED_OSES, type Scheduler } from './config/schema/index.js';
export { dumpYaml, loadYamlFile, parseYaml, type LoadedDocument } from './config/loader.js';

export { validateConfig } from './validation/engine.js';
export type { Severity, ValidationFinding, ValidationOptions, ValidationReport } from './validation/types.js';

export { ConfigPatch, diffDocuments } from './update/patch.js';
export { ClusterSnapshot } from './update/snapshot.js';
export * from './update/policy.js';
export type { Change, ChangeVerdict, ClusterContext, FleetStatus, UpdatePolicy } from './update/types.js';

export { CloudClientError, StatusConflictError, isCloudError } from './cloud/errors.js';
export * from './cloud/types.js';
export { createLocalProvider, type LocalProvider } from './local/index.js';

export { Logger, configureLogger, logger } from './lib/logger.js';
