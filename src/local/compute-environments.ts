/**
 * Local Compute Environment Client
 *
 * Capacity records of managed compute environments under
 * <stateDir>/compute-environments.
 */

import { join } from 'node:path';

import type { ComputeEnvironmentCapacity, ComputeEnvironmentClient } from '../cloud/types.js';
import { readJson, removeFile, writeJson } from './files.js';
import { computeEnvironmentRecordSchema, recordCheck, type ComputeEnvironmentRecord } from './schemas.js';

const SERVICE = 'compute-environments';

const checkRecord = recordCheck(computeEnvironmentRecordSchema, SERVICE);

export class LocalComputeEnvironmentClient implements ComputeEnvironmentClient {
  private readonly root: string;

  constructor(stateDir: string) {
    this.root = join(stateDir, 'compute-environments');
  }

  async describe(name: string): Promise<ComputeEnvironmentCapacity | null> {
    const record = await readJson(this.recordPath(name), checkRecord, SERVICE);
    if (!record) {
      return null;
    }
    const { enabled, minvCpus, desiredvCpus, maxvCpus } = record;
    return { enabled, minvCpus, desiredvCpus, maxvCpus };
  }

  /**
   * Set the capacity, creating the environment record if needed.
   */
  async update(name: string, capacity: ComputeEnvironmentCapacity): Promise<void> {
    const record: ComputeEnvironmentRecord = { name, ...capacity };
    await writeJson(this.recordPath(name), record);
  }

  async remove(name: string): Promise<void> {
    await removeFile(this.recordPath(name));
  }

  private recordPath(name: string): string {
    return join(this.root, `${name}.json`);
  }
}
