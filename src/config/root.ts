/**
 * Configuration Root
 *
 * Owns the full section tree of one cluster version. Builds it from a
 * declarative document or from the persisted flat/blob representation,
 * validates it and serializes it back.
 */

import {
  ClusterError,
  ConfigValidationError,
  InvalidValueError,
  UnknownFieldError,
} from '../core/errors.js';
import { isJsonObject, type JsonObject, type JsonValue } from '../lib/json.js';
import { validateConfig } from '../validation/engine.js';
import type {
  ValidationFinding,
  ValidationOptions,
  ValidationReport,
} from '../validation/types.js';
import type { SettingsParamDefinition } from './params.js';
import type { SchemaRegistry, SectionDefinition } from './registry.js';
import { DEFAULT_LABEL, Section } from './section.js';

/**
 * Persisted form: flat stack parameters plus the structured blob.
 */
export interface StorageData {
  params: Record<string, string>;
  blob: JsonObject;
}

/**
 * Flat key holding the section label index written by toStorage.
 */
export const METADATA_KEY = 'ClusterConfigMetadata';

export class ClusterConfig {
  private readonly sections = new Map<string, Section>();
  private readonly problems: ClusterError[] = [];
  /** Original document text, kept verbatim when known */
  sourceDocument: string | null = null;

  private constructor(readonly registry: SchemaRegistry) {}

  // ===========================================================================
  // Factories
  // ===========================================================================

  /**
   * Build the section tree from a parsed document.
   *
   * Parse problems (unknown or internal fields, bad values, bad labels,
   * exceeded caps) do not throw; they are reported by validate().
   *
   * @param registry - Schema to build against
   * @param document - Parsed YAML/JSON document
   * @param sourceText - Original text of the document
   */
  static fromDocument(registry: SchemaRegistry, document: unknown, sourceText?: string): ClusterConfig {
    const config = new ClusterConfig(registry);
    config.sourceDocument = sourceText ?? null;

    const root = new Section(registry.root, DEFAULT_LABEL, null, registry);
    config.register(root);
    if (isJsonObject(document)) {
      config.build(root, document, config.problems);
    } else {
      config.problems.push(new InvalidValueError('configuration', document ?? null, 'a mapping'));
      config.build(root, {}, config.problems);
    }
    return config;
  }

  /**
   * Rebuild the section tree from its persisted representation.
   */
  static fromStorage(registry: SchemaRegistry, storage: StorageData): ClusterConfig {
    const config = new ClusterConfig(registry);
    const root = new Section(registry.root, DEFAULT_LABEL, null, registry);
    root.populateFromStorage({ flat: storage.params });
    config.register(root);
    config.buildFromStorage(root, storage.params, storage.blob);
    return config;
  }

  // ===========================================================================
  // Tree Access
  // ===========================================================================

  get root(): Section {
    const root = this.sections.get(`${this.registry.rootKey}[${DEFAULT_LABEL}]`);
    if (!root) {
      throw new Error('Configuration has no root section');
    }
    return root;
  }

  /**
   * Opaque token of the persisted version this configuration came from.
   */
  get configVersion(): string | null {
    return this.root.getString('ConfigVersion');
  }

  /**
   * Problems found while building from a document.
   */
  get parseFindings(): ValidationFinding[] {
    return toFindings(this.problems);
  }

  /**
   * All sections, parents before children.
   */
  allSections(): Section[] {
    return [...this.sections.values()];
  }

  getSection(id: string): Section | undefined {
    return this.sections.get(id);
  }

  /**
   * All sections of a key, in tree order.
   */
  getSections(key: string): Section[] {
    return this.allSections().filter((section) => section.key === key);
  }

  parentOf(section: Section): Section | undefined {
    return section.parentId === null ? undefined : this.sections.get(section.parentId);
  }

  /**
   * Children of a section for one child key, in label order.
   */
  childrenOf(section: Section, childKey: string): Section[] {
    return section
      .childLabels(childKey)
      .map((label) => this.sections.get(`${section.id}/${childKey}[${label}]`))
      .filter((child): child is Section => child !== undefined);
  }

  /**
   * First child of a single-instance child key.
   */
  childOf(section: Section, childKey: string): Section | undefined {
    return this.childrenOf(section, childKey)[0];
  }

  /**
   * Walk from the root along single-instance children.
   */
  find(...keys: string[]): Section | undefined {
    let current: Section | undefined = this.root;
    for (const key of keys) {
      if (!current) return undefined;
      current = this.childOf(current, key);
    }
    return current;
  }

  /**
   * Add a section below a parent and populate it from a fragment.
   *
   * @throws ConfigValidationError if the fragment has problems
   */
  addSection(parentId: string, key: string, label: string, fragment: JsonObject = {}): Section {
    const parent = this.sections.get(parentId);
    const link = this.registry.parentLink(key);
    if (!parent || !link || link.parent.key !== parent.key) {
      throw new UnknownFieldError(key, parent?.displayName ?? parentId);
    }
    const problems: ClusterError[] = [];
    const child = this.createChild(parent, link.settings, this.registry.section(key), label);
    this.build(child, fragment, problems);
    if (problems.length > 0) {
      this.removeSection(child.id);
      throw new ConfigValidationError(
        `Section '${child.displayName}' is invalid`,
        toFindings(problems)
      );
    }
    return child;
  }

  /**
   * Detach a section from its parent and drop it with its descendants.
   */
  removeSection(id: string): void {
    const section = this.sections.get(id);
    if (!section) return;
    const parent = this.parentOf(section);
    if (!parent) {
      throw new Error('The root section cannot be removed');
    }
    parent.detachChild(section.key, section.label);
    for (const sectionId of [...this.sections.keys()]) {
      if (sectionId === id || sectionId.startsWith(`${id}/`)) {
        this.sections.delete(sectionId);
      }
    }
  }

  // ===========================================================================
  // Validation and Serialization
  // ===========================================================================

  /**
   * Validate every section, then run whole-tree checks.
   */
  async validate(options: ValidationOptions = {}): Promise<ValidationReport> {
    return validateConfig(this, options);
  }

  /**
   * Resolved document: every public field, defaults included.
   */
  toDocument(): JsonObject {
    return this.documentOf(this.root);
  }

  /**
   * Flat parameters and structured blob, private fields included.
   */
  toStorage(): StorageData {
    const params: Record<string, string> = {};
    const blob: JsonObject = {};
    this.writeStorage(this.root, params, blob);
    params[METADATA_KEY] = JSON.stringify(this.labelIndex());
    return { params, blob };
  }

  /**
   * Deep copy that shares nothing with this configuration.
   */
  clone(): ClusterConfig {
    const copy = ClusterConfig.fromStorage(this.registry, this.toStorage());
    copy.sourceDocument = this.sourceDocument;
    copy.problems.push(...this.problems);
    return copy;
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private register(section: Section): void {
    this.sections.set(section.id, section);
  }

  private createChild(
    parent: Section,
    settings: SettingsParamDefinition,
    definition: SectionDefinition,
    label: string
  ): Section {
    const child = new Section(
      definition,
      label,
      { id: parent.id, documentPath: parent.documentPath, settingsKey: settings.key },
      this.registry
    );
    parent.attachChild(child);
    this.register(child);
    return child;
  }

  private tryCreateChild(
    parent: Section,
    settings: SettingsParamDefinition,
    definition: SectionDefinition,
    label: string,
    problems: ClusterError[]
  ): Section | undefined {
    try {
      return this.createChild(parent, settings, definition, label);
    } catch (error) {
      if (error instanceof ClusterError) {
        problems.push(error);
        return undefined;
      }
      throw error;
    }
  }

  private build(section: Section, fragment: JsonObject, problems: ClusterError[]): void {
    section.populateFrom(fragment, problems);

    for (const settings of section.settingsParams()) {
      const definition = this.registry.section(settings.section);
      const raw = fragment[settings.key];

      if (raw === undefined || raw === null) {
        if (autocreates(definition, section)) {
          const child = this.tryCreateChild(section, settings, definition, DEFAULT_LABEL, problems);
          if (child) this.build(child, {}, problems);
        }
        continue;
      }

      const labelKey = definition.labelKey;
      if (labelKey === undefined) {
        if (!isJsonObject(raw)) {
          problems.push(new InvalidValueError(`${section.displayName}.${settings.key}`, raw, 'a mapping'));
          continue;
        }
        const child = this.tryCreateChild(section, settings, definition, DEFAULT_LABEL, problems);
        if (child) this.build(child, raw, problems);
        continue;
      }

      if (!Array.isArray(raw)) {
        problems.push(new InvalidValueError(`${section.displayName}.${settings.key}`, raw, 'a list'));
        continue;
      }
      for (const element of raw) {
        const label = isJsonObject(element) ? element[labelKey] : undefined;
        if (!isJsonObject(element) || typeof label !== 'string') {
          problems.push(
            new InvalidValueError(`${section.displayName}.${settings.key}`, element, `a mapping with a ${labelKey}`)
          );
          continue;
        }
        const child = this.tryCreateChild(section, settings, definition, label, problems);
        if (child) this.build(child, element, problems);
      }
    }
  }

  private buildFromStorage(section: Section, flat: Record<string, string>, container: JsonObject): void {
    for (const settings of section.settingsParams()) {
      const definition = this.registry.section(settings.section);
      const labels = [...section.getList(settings.key)];
      section.param(settings.key).set(null);

      for (const label of labels) {
        const child = this.createChild(section, settings, definition, label);
        if (definition.storage === 'json') {
          const group = container[definition.key];
          const own = isJsonObject(group) ? group[label] : undefined;
          const json = isJsonObject(own) ? own : {};
          child.populateFromStorage({ flat, json });
          this.buildFromStorage(child, flat, json);
        } else {
          child.populateFromStorage({ flat });
          this.buildFromStorage(child, flat, container);
        }
      }
    }
  }

  private writeStorage(section: Section, params: Record<string, string>, container: JsonObject): void {
    let childContainer = container;
    if (section.definition.storage === 'json') {
      const json = section.toJson();
      let group: JsonValue | undefined = container[section.key];
      if (!isJsonObject(group)) {
        const created: JsonObject = {};
        container[section.key] = created;
        group = created;
      }
      group[section.label] = json;
      childContainer = json;
    } else {
      section.writeFlat(params);
    }

    for (const settings of section.settingsParams()) {
      for (const child of this.childrenOf(section, settings.section)) {
        this.writeStorage(child, params, childContainer);
      }
    }
  }

  private documentOf(section: Section): JsonObject {
    const document: JsonObject = {};
    const labelKey = section.definition.labelKey;
    if (labelKey !== undefined) {
      document[labelKey] = section.label;
    }
    const fields = section.toDocumentFields();
    for (const param of section.parameters()) {
      const definition = param.definition;
      if (definition.type !== 'settings') {
        const value = fields[param.key];
        if (value !== undefined) {
          document[param.key] = value;
        }
        continue;
      }
      const children = this.childrenOf(section, definition.section);
      if (children.length === 0) continue;
      if (this.registry.isList(definition.section)) {
        document[param.key] = children.map((child) => this.documentOf(child));
      } else if (children[0]) {
        document[param.key] = this.documentOf(children[0]);
      }
    }
    return document;
  }

  private labelIndex(): Record<string, string[]> {
    const index: Record<string, string[]> = {};
    for (const section of this.allSections()) {
      (index[section.key] ??= []).push(section.label);
    }
    return index;
  }
}

function autocreates(definition: SectionDefinition, parent: Section): boolean {
  const rule = definition.autocreate;
  return typeof rule === 'function' ? rule(parent) : rule === true;
}

function toFindings(problems: readonly ClusterError[]): ValidationFinding[] {
  return problems.map(
    (problem): ValidationFinding => ({
      validator: problem.code.toLowerCase(),
      level: 'ERROR',
      message: problem.message,
    })
  );
}
