/**
 * Configuration Patch
 *
 * Structural diff between two resolved configuration documents and the
 * per-change policy verdicts that decide whether an update may proceed.
 */

import type { ClusterConfig } from '../config/root.js';
import { isSettingsParam, type ParamDefinition } from '../config/params.js';
import type { SchemaRegistry, SectionDefinition } from '../config/registry.js';
import { isJsonObject, jsonEqual, type JsonObject, type JsonValue } from '../lib/json.js';
import { checkChange, selectPolicy, UNKNOWN } from './policy.js';
import type {
  Change,
  ClusterContext,
  PatchCheckResult,
  PatchContext,
  UpdatePolicy,
} from './types.js';

// =============================================================================
// Diff
// =============================================================================

function createChange(
  path: readonly string[],
  key: string,
  oldValue: JsonValue | null,
  newValue: JsonValue | null,
  isList: boolean,
  candidatePolicies: readonly UpdatePolicy[]
): Change {
  return {
    path,
    key,
    oldValue,
    newValue,
    isList,
    updatePolicy: selectPolicy(candidatePolicies),
    candidatePolicies,
  };
}

function policyOf(param: ParamDefinition): UpdatePolicy {
  return param.updatePolicy ?? UNKNOWN;
}

/**
 * Index list elements by their label, keeping document order.
 */
function elementsByLabel(value: JsonValue | undefined, labelKey: string): Map<string, JsonObject> {
  const elements = new Map<string, JsonObject>();
  if (!Array.isArray(value)) {
    return elements;
  }
  for (const element of value) {
    const label = isJsonObject(element) ? element[labelKey] : undefined;
    if (isJsonObject(element) && typeof label === 'string') {
      elements.set(label, element);
    }
  }
  return elements;
}

function diffSection(
  registry: SchemaRegistry,
  definition: SectionDefinition,
  base: JsonObject,
  target: JsonObject,
  path: readonly string[],
  floors: readonly UpdatePolicy[],
  changes: Change[]
): void {
  for (const param of definition.params) {
    if (param.visibility === 'PRIVATE') continue;
    const oldValue = base[param.key];
    const newValue = target[param.key];

    if (!isSettingsParam(param)) {
      if (!jsonEqual(oldValue ?? null, newValue ?? null)) {
        changes.push(createChange(path, param.key, oldValue ?? null, newValue ?? null, false, [policyOf(param), ...floors]));
      }
      continue;
    }

    const child = registry.section(param.section);
    const childFloors = child.updatePolicyFloor ? [...floors, child.updatePolicyFloor] : floors;
    const candidates = [policyOf(param), ...childFloors];

    if (child.labelKey === undefined) {
      const oldChild = isJsonObject(oldValue) ? oldValue : null;
      const newChild = isJsonObject(newValue) ? newValue : null;
      if (oldChild && newChild) {
        diffSection(registry, child, oldChild, newChild, [...path, param.key], childFloors, changes);
      } else if (oldChild || newChild) {
        changes.push(createChange(path, param.key, oldChild, newChild, false, candidates));
      }
      continue;
    }

    const oldElements = elementsByLabel(oldValue, child.labelKey);
    const newElements = elementsByLabel(newValue, child.labelKey);
    for (const [label, oldElement] of oldElements) {
      const newElement = newElements.get(label);
      if (newElement === undefined) {
        changes.push(createChange(path, param.key, oldElement, null, true, candidates));
      } else {
        const elementPath = [...path, `${param.key}[${label}]`];
        diffSection(registry, child, oldElement, newElement, elementPath, childFloors, changes);
      }
    }
    for (const [label, newElement] of newElements) {
      if (!oldElements.has(label)) {
        changes.push(createChange(path, param.key, null, newElement, true, candidates));
      }
    }
  }
}

/**
 * Compute every change between two resolved documents.
 *
 * List elements are matched by label; removals come before additions
 * within a list. Reordering a list is not a change.
 *
 * @param registry - Schema both documents follow
 * @param base - Resolved document of the running configuration
 * @param target - Resolved document of the requested configuration
 * @returns Changes in document order
 */
export function diffDocuments(registry: SchemaRegistry, base: JsonObject, target: JsonObject): Change[] {
  const changes: Change[] = [];
  const root = registry.root;
  const floors = root.updatePolicyFloor ? [root.updatePolicyFloor] : [];
  diffSection(registry, root, base, target, [], floors, changes);
  return changes;
}

// =============================================================================
// Patch
// =============================================================================

export class ConfigPatch implements PatchContext {
  readonly changes: readonly Change[];

  /**
   * @param registry - Schema both documents follow
   * @param cluster - Live state of the running cluster
   * @param baseConfig - Resolved document of the running configuration
   * @param targetConfig - Resolved document of the requested configuration
   */
  constructor(
    registry: SchemaRegistry,
    readonly cluster: ClusterContext,
    readonly baseConfig: JsonObject,
    readonly targetConfig: JsonObject
  ) {
    this.changes = diffDocuments(registry, baseConfig, targetConfig);
  }

  /**
   * Patch between two configurations, each resolved to a fresh document.
   */
  static between(cluster: ClusterContext, base: ClusterConfig, target: ClusterConfig): ConfigPatch {
    return new ConfigPatch(base.registry, cluster, base.toDocument(), target.toDocument());
  }

  /**
   * Highest policy level among the changes, or null for an empty patch.
   */
  get updatePolicyLevel(): number | null {
    if (this.changes.length === 0) {
      return null;
    }
    return Math.max(...this.changes.map((change) => change.updatePolicy.level));
  }

  /**
   * Evaluate every change.
   *
   * The update is allowed only when every change succeeded.
   */
  check(): PatchCheckResult {
    const verdicts = this.changes.map((change) => checkChange(change, this));
    return {
      allowed: verdicts.every((verdict) => verdict.result === 'SUCCEEDED'),
      verdicts,
      changeSet: verdicts.filter((verdict) => verdict.display),
    };
  }
}
