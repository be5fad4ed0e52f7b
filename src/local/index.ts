/**
 * Local Backend
 *
 * Every collaborator contract implemented against a directory tree.
 */

import type { CloudProvider } from '../cloud/types.js';
import { LocalComputeEnvironmentClient } from './compute-environments.js';
import { LocalFactsProvider } from './facts.js';
import { LocalFleetStatusStore } from './fleet-status.js';
import { LocalObjectStore } from './object-store.js';
import { LocalStackClient } from './stacks.js';

export { LocalComputeEnvironmentClient } from './compute-environments.js';
export { FACTS_FILE, LocalFactsProvider } from './facts.js';
export { LocalFleetStatusStore } from './fleet-status.js';
export { LocalObjectStore, parseObjectUrl } from './object-store.js';
export { LocalStackClient } from './stacks.js';

/**
 * Local provider with its concrete clients exposed.
 */
export interface LocalProvider extends CloudProvider {
  stacks: LocalStackClient;
  objects: LocalObjectStore;
  fleetStatus: LocalFleetStatusStore;
  facts: LocalFactsProvider;
  computeEnvironments: LocalComputeEnvironmentClient;
}

/**
 * Create every local collaborator rooted at a state directory.
 */
export function createLocalProvider(stateDir: string): LocalProvider {
  const objects = new LocalObjectStore(stateDir);
  return {
    stacks: new LocalStackClient(stateDir, objects),
    objects,
    fleetStatus: new LocalFleetStatusStore(stateDir),
    facts: new LocalFactsProvider(stateDir),
    computeEnvironments: new LocalComputeEnvironmentClient(stateDir),
  };
}
