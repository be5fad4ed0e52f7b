/**
 * Local Stack Client
 *
 * Stack records under <stateDir>/stacks. Operations complete at once:
 * a created stack is CREATE_COMPLETE, an updated one UPDATE_COMPLETE,
 * and deletion removes the record.
 */

import { readdir } from 'node:fs/promises';
import { join } from 'node:path';

import { CloudClientError } from '../cloud/errors.js';
import type {
  CreateStackRequest,
  ObjectStore,
  StackClient,
  StackDescription,
  UpdateStackRequest,
} from '../cloud/types.js';
import { isJsonObject, type JsonObject } from '../lib/json.js';
import { errnoCode, readJson, readTextIfExists, removeFile, writeJson } from './files.js';
import { parseObjectUrl } from './object-store.js';
import { recordCheck, stackRecordSchema, type StackRecord } from './schemas.js';

const SERVICE = 'stacks';

const checkStack = recordCheck(stackRecordSchema, SERVICE);

export class LocalStackClient implements StackClient {
  private readonly root: string;

  /**
   * @param stateDir - Local backend root
   * @param objects - Store the template URLs point into
   */
  constructor(
    stateDir: string,
    private readonly objects: ObjectStore
  ) {
    this.root = join(stateDir, 'stacks');
  }

  async stackExists(name: string): Promise<boolean> {
    return (await this.load(name)) !== null;
  }

  async createStack(request: CreateStackRequest): Promise<void> {
    if (await this.stackExists(request.name)) {
      throw new CloudClientError(`Stack ${request.name} already exists`, 'ALREADY_EXISTS', SERVICE);
    }
    const template = await this.fetchTemplate(request.templateUrl);
    await writeJson(this.templatePath(request.name), template);
    await this.save({
      name: request.name,
      status: 'CREATE_COMPLETE',
      templateUrl: request.templateUrl,
      parameters: { ...request.parameters },
      tags: { ...request.tags },
      outputs: {},
      disableRollback: request.disableRollback,
      createdAt: new Date().toISOString(),
    });
  }

  async updateStack(request: UpdateStackRequest): Promise<void> {
    const record = await this.require(request.name);
    const template = await this.fetchTemplate(request.templateUrl);
    await writeJson(this.templatePath(request.name), template);
    await this.save({
      ...record,
      status: 'UPDATE_COMPLETE',
      templateUrl: request.templateUrl,
      parameters: { ...request.parameters },
      tags: { ...request.tags },
      updatedAt: new Date().toISOString(),
    });
  }

  async deleteStack(name: string): Promise<void> {
    await this.require(name);
    await removeFile(this.templatePath(name));
    await removeFile(this.recordPath(name));
  }

  async describeStack(name: string): Promise<StackDescription> {
    return describe(await this.require(name));
  }

  async listStacks(): Promise<StackDescription[]> {
    let entries: string[];
    try {
      entries = await readdir(this.root);
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return [];
      }
      throw error;
    }
    const stacks: StackDescription[] = [];
    for (const entry of entries.filter((file) => file.endsWith('.stack.json')).sort()) {
      const record = await this.load(entry.slice(0, -'.stack.json'.length));
      if (record) {
        stacks.push(describe(record));
      }
    }
    return stacks;
  }

  async getStackTemplate(name: string): Promise<JsonObject> {
    await this.require(name);
    const content = await readTextIfExists(this.templatePath(name));
    const template: unknown = content === null ? null : JSON.parse(content);
    if (!isJsonObject(template)) {
      throw new CloudClientError(`Template of stack ${name} is missing or invalid`, 'FAILED', SERVICE);
    }
    return template;
  }

  async updateStackTemplate(name: string, template: JsonObject): Promise<void> {
    await this.require(name);
    await writeJson(this.templatePath(name), template);
  }

  /**
   * Force a stack status. Used to simulate stacks in transition.
   */
  async setStatus(name: string, status: StackRecord['status'], reason?: string): Promise<void> {
    const record = await this.require(name);
    await this.save({ ...record, status, statusReason: reason });
  }

  private recordPath(name: string): string {
    return join(this.root, `${name}.stack.json`);
  }

  private templatePath(name: string): string {
    return join(this.root, `${name}.template.json`);
  }

  private async load(name: string): Promise<StackRecord | null> {
    return readJson(this.recordPath(name), checkStack, SERVICE);
  }

  private async require(name: string): Promise<StackRecord> {
    const record = await this.load(name);
    if (!record) {
      throw new CloudClientError(`Stack ${name} does not exist`, 'NOT_FOUND', SERVICE);
    }
    return record;
  }

  private async save(record: StackRecord): Promise<void> {
    await writeJson(this.recordPath(record.name), record);
  }

  private async fetchTemplate(url: string): Promise<JsonObject> {
    const location = parseObjectUrl(url);
    const content = await this.objects.getBlob(location.bucket, location.key, location.versionId);
    let template: unknown;
    try {
      template = JSON.parse(content);
    } catch (error) {
      throw new CloudClientError(`Template at ${url} is not valid JSON`, 'FAILED', SERVICE, { cause: error });
    }
    if (!isJsonObject(template)) {
      throw new CloudClientError(`Template at ${url} is not an object`, 'FAILED', SERVICE);
    }
    return template;
  }
}

function describe(record: StackRecord): StackDescription {
  return {
    name: record.name,
    status: record.status,
    statusReason: record.statusReason,
    parameters: { ...record.parameters },
    tags: { ...record.tags },
    outputs: { ...record.outputs },
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
  };
}
