/**
 * Schema Registry
 *
 * Immutable catalog of section definitions. Built once and passed to the
 * configuration root; definition errors surface at construction time.
 */

import { SchemaDefinitionError } from '../core/errors.js';
import type { UpdatePolicy } from '../update/types.js';
import type { SectionValidator } from '../validation/types.js';
import type { Section } from './section.js';
import {
  isSettingsParam,
  storageKeyOf,
  type ParamDefinition,
  type SettingsParamDefinition,
} from './params.js';

/**
 * How a section is persisted in the flat/blob storage representation.
 *
 * - params: one flat entry per parameter
 * - combined: one flat entry holding every parameter in declared order
 * - json: an object in the structured blob
 */
export type StorageFormat = 'params' | 'combined' | 'json';

/**
 * Always, never, or decided by the already populated parent section.
 */
export type AutocreateRule = boolean | ((parent: Section) => boolean);

export interface SectionDefinition {
  readonly key: string;
  /** Document field carrying the label of list-shaped sections */
  readonly labelKey?: string;
  /** Cap on sibling sections of this key under one parent */
  readonly maxInstances: number;
  /** Create with defaults when the parent document omits it */
  readonly autocreate?: AutocreateRule;
  readonly storage: StorageFormat;
  /** Flat key of a combined section */
  readonly storageKey?: string;
  readonly params: readonly ParamDefinition[];
  readonly validators?: readonly SectionValidator[];
  /** Policy competing with the policy of every field below this section */
  readonly updatePolicyFloor?: UpdatePolicy;
}

/**
 * A section definition together with the settings parameter that
 * references it from its parent.
 */
export interface ParentLink {
  readonly parent: SectionDefinition;
  readonly settings: SettingsParamDefinition;
}

export class SchemaRegistry {
  private readonly definitions: ReadonlyMap<string, SectionDefinition>;
  private readonly parentLinks: ReadonlyMap<string, ParentLink>;

  constructor(
    readonly rootKey: string,
    definitions: readonly SectionDefinition[]
  ) {
    const byKey = new Map<string, SectionDefinition>();
    for (const definition of definitions) {
      if (byKey.has(definition.key)) {
        throw new SchemaDefinitionError(`Section '${definition.key}' is defined more than once`);
      }
      byKey.set(definition.key, definition);
    }
    if (!byKey.has(rootKey)) {
      throw new SchemaDefinitionError(`Root section '${rootKey}' is not defined`);
    }

    const links = new Map<string, ParentLink>();
    for (const definition of definitions) {
      checkParams(definition);
      for (const param of definition.params) {
        if (!isSettingsParam(param)) continue;
        if (!byKey.has(param.section)) {
          throw new SchemaDefinitionError(
            `Parameter '${definition.key}.${param.key}' references undefined section '${param.section}'`
          );
        }
        if (param.section === rootKey || links.has(param.section)) {
          throw new SchemaDefinitionError(`Section '${param.section}' is referenced more than once`);
        }
        links.set(param.section, { parent: definition, settings: param });
      }
    }

    for (const definition of definitions) {
      if (definition.key !== rootKey && !links.has(definition.key)) {
        throw new SchemaDefinitionError(`Section '${definition.key}' is not reachable from '${rootKey}'`);
      }
      checkShape(definition, links.get(definition.key));
    }
    checkFlatKeys(definitions);

    this.definitions = byKey;
    this.parentLinks = links;
    Object.freeze(this);
  }

  /**
   * Get a section definition by key.
   *
   * @throws SchemaDefinitionError for an unknown key
   */
  section(key: string): SectionDefinition {
    const definition = this.definitions.get(key);
    if (!definition) {
      throw new SchemaDefinitionError(`Unknown section '${key}'`);
    }
    return definition;
  }

  get root(): SectionDefinition {
    return this.section(this.rootKey);
  }

  /**
   * Get the parent definition and settings parameter of a section.
   */
  parentLink(key: string): ParentLink | undefined {
    return this.parentLinks.get(key);
  }

  /**
   * Whether sections of this key appear as a list in documents.
   */
  isList(key: string): boolean {
    return this.section(key).labelKey !== undefined;
  }

  keys(): string[] {
    return [...this.definitions.keys()];
  }
}

// =============================================================================
// Construction Checks
// =============================================================================

function checkParams(definition: SectionDefinition): void {
  const declared = new Set<string>();
  for (const param of definition.params) {
    if (declared.has(param.key)) {
      throw new SchemaDefinitionError(`Parameter '${definition.key}.${param.key}' is declared more than once`);
    }
    if (param.key === definition.labelKey) {
      throw new SchemaDefinitionError(
        `Parameter '${definition.key}.${param.key}' collides with the section label field`
      );
    }
    if (!isSettingsParam(param) && param.derivedDefault) {
      for (const dependency of param.derivedDefault.dependsOn) {
        if (dependency === param.key) {
          throw new SchemaDefinitionError(
            `Default of '${definition.key}.${param.key}' depends on itself`
          );
        }
        if (!declared.has(dependency)) {
          throw new SchemaDefinitionError(
            `Default of '${definition.key}.${param.key}' depends on '${dependency}', which is not declared before it`
          );
        }
      }
    }
    declared.add(param.key);
  }
}

function checkShape(definition: SectionDefinition, link: ParentLink | undefined): void {
  const where = `Section '${definition.key}'`;
  if (definition.labelKey === undefined && definition.maxInstances !== 1) {
    throw new SchemaDefinitionError(`${where} has no label field and must allow exactly one instance`);
  }
  if (definition.maxInstances < 1) {
    throw new SchemaDefinitionError(`${where} must allow at least one instance`);
  }
  if (definition.autocreate && definition.labelKey !== undefined) {
    throw new SchemaDefinitionError(`${where} is a list and cannot be autocreated`);
  }
  if (definition.storage === 'json') {
    return;
  }
  if (definition.maxInstances !== 1) {
    throw new SchemaDefinitionError(`${where} is stored as flat parameters and must be single-instance`);
  }
  if (link && link.parent.storage !== 'params') {
    throw new SchemaDefinitionError(`${where} is stored as flat parameters under a non-flat parent`);
  }
  if (definition.storage === 'combined') {
    if (!definition.storageKey) {
      throw new SchemaDefinitionError(`${where} is combined and needs a storage key`);
    }
    const [first] = definition.params;
    if (!first || isSettingsParam(first) || (first.defaultValue === undefined && !first.required)) {
      throw new SchemaDefinitionError(`${where} is combined and its first parameter must always have a value`);
    }
    for (const param of definition.params) {
      const scalar =
        param.type === 'int' ||
        param.type === 'float' ||
        param.type === 'bool' ||
        (param.type === 'string' && Array.isArray(param.allowedValues));
      if (!scalar) {
        throw new SchemaDefinitionError(
          `Parameter '${definition.key}.${param.key}' cannot be stored in a combined section`
        );
      }
    }
  }
}

function checkFlatKeys(definitions: readonly SectionDefinition[]): void {
  const seen = new Map<string, string>();
  const claim = (flatKey: string, owner: string): void => {
    const existing = seen.get(flatKey);
    if (existing !== undefined) {
      throw new SchemaDefinitionError(`Storage key '${flatKey}' is used by both ${existing} and ${owner}`);
    }
    seen.set(flatKey, owner);
  };
  for (const definition of definitions) {
    if (definition.storage === 'params') {
      for (const param of definition.params) {
        claim(storageKeyOf(param), `'${definition.key}.${param.key}'`);
      }
    } else if (definition.storage === 'combined' && definition.storageKey) {
      claim(definition.storageKey, `'${definition.key}'`);
    }
  }
}
