/**
 * Section Model
 *
 * A labeled group of parameters. Sections never own their children: a
 * parent only records child labels in its settings parameters, and the
 * configuration root keeps the section table.
 */

import {
  ClusterError,
  DisallowedFieldError,
  DuplicateSectionError,
  InvalidLabelError,
  InvalidValueError,
  SchemaDefinitionError,
  TooManySectionsError,
  UnknownFieldError,
} from '../core/errors.js';
import type { JsonObject } from '../lib/json.js';
import type {
  ValidationContext,
  ValidationFinding,
  ValidatorOutput,
  Severity,
} from '../validation/types.js';
import {
  asBool,
  asList,
  asNumber,
  asString,
  formatStorageValue,
  isSettingsParam,
  NONE,
  Parameter,
  type ParamValue,
  type SectionValues,
  type SettingsParamDefinition,
} from './params.js';
import type { SchemaRegistry, SectionDefinition } from './registry.js';

/**
 * Label pattern for every section instance.
 */
export const LABEL_PATTERN = /^[a-zA-Z][a-zA-Z0-9-_]{0,29}$/;

/**
 * Label given to single-instance sections.
 */
export const DEFAULT_LABEL = 'default';

/**
 * Where a section reads its persisted values from.
 */
export interface StorageSource {
  flat: Readonly<Record<string, string>>;
  /** The section's own object in the structured blob (json sections) */
  json?: JsonObject;
}

export class Section {
  /** Path-like identity, e.g. cluster[default]/scheduling[default]/slurm_queue[q1] */
  readonly id: string;
  /** Id of the parent section; resolved through the configuration root */
  readonly parentId: string | null;
  /** Document location, e.g. Scheduling.SlurmQueues[q1] */
  readonly documentPath: string;
  private readonly params = new Map<string, Parameter>();

  constructor(
    readonly definition: SectionDefinition,
    readonly label: string,
    parent: { id: string; documentPath: string; settingsKey: string } | null,
    private readonly registry: SchemaRegistry
  ) {
    if (!LABEL_PATTERN.test(label)) {
      throw new InvalidLabelError(definition.key, label);
    }
    this.parentId = parent?.id ?? null;
    this.id = parent ? `${parent.id}/${definition.key}[${label}]` : `${definition.key}[${label}]`;
    if (!parent) {
      this.documentPath = '';
    } else {
      const segment = definition.labelKey ? `${parent.settingsKey}[${label}]` : parent.settingsKey;
      this.documentPath = parent.documentPath ? `${parent.documentPath}.${segment}` : segment;
    }
    for (const param of definition.params) {
      this.params.set(param.key, new Parameter(param));
    }
  }

  get key(): string {
    return this.definition.key;
  }

  /**
   * Name used in messages: the document path, or the key for the root.
   */
  get displayName(): string {
    return this.documentPath || this.key;
  }

  // ===========================================================================
  // Parameter Access
  // ===========================================================================

  /**
   * Parameters in declaration order.
   */
  parameters(): Parameter[] {
    return [...this.params.values()];
  }

  /**
   * Get a declared parameter.
   *
   * @throws UnknownFieldError when the key is not declared
   */
  param(key: string): Parameter {
    const param = this.params.get(key);
    if (!param) {
      throw new UnknownFieldError(key, this.displayName);
    }
    return param;
  }

  value(key: string): ParamValue | null {
    return this.param(key).value;
  }

  getString(key: string): string | null {
    return asString(this.value(key));
  }

  getNumber(key: string): number | null {
    return asNumber(this.value(key));
  }

  getBool(key: string): boolean | null {
    return asBool(this.value(key));
  }

  getList(key: string): readonly string[] {
    return asList(this.value(key));
  }

  /**
   * Set a parameter from a raw value; null clears it.
   *
   * @throws InvalidValueError if the value is not acceptable
   */
  setValue(key: string, raw: unknown): void {
    const param = this.param(key);
    if (isSettingsParam(param.definition)) {
      throw new InvalidValueError(key, raw, 'child sections are managed with attachChild/detachChild');
    }
    if (raw === null || raw === undefined) {
      param.set(null);
    } else {
      param.load(raw);
    }
  }

  /**
   * Settings parameters, in declaration order.
   */
  settingsParams(): SettingsParamDefinition[] {
    return this.definition.params.filter(isSettingsParam);
  }

  /**
   * Labels of the children of the given section key.
   */
  childLabels(childKey: string): readonly string[] {
    const settings = this.settingsFor(childKey);
    return settings ? this.getList(settings.key) : [];
  }

  private settingsFor(childKey: string): SettingsParamDefinition | undefined {
    return this.settingsParams().find((param) => param.section === childKey);
  }

  // ===========================================================================
  // Children
  // ===========================================================================

  /**
   * Record a child label in the matching settings parameter.
   *
   * @throws DuplicateSectionError if the label is already attached
   * @throws TooManySectionsError if the per-parent cap would be exceeded
   */
  attachChild(child: Section): void {
    const settings = this.settingsFor(child.key);
    if (!settings || child.parentId !== this.id) {
      throw new UnknownFieldError(child.key, this.displayName);
    }
    const labels = this.getList(settings.key);
    if (labels.includes(child.label)) {
      throw new DuplicateSectionError(child.key, child.label, this.id);
    }
    const maxInstances = this.registry.section(child.key).maxInstances;
    if (labels.length >= maxInstances) {
      throw new TooManySectionsError(child.key, this.id, maxInstances);
    }
    this.param(settings.key).set({ type: 'string-list', value: [...labels, child.label] });
  }

  /**
   * Remove a child label from the matching settings parameter.
   *
   * @returns Whether the label was attached
   */
  detachChild(childKey: string, label: string): boolean {
    const settings = this.settingsFor(childKey);
    if (!settings) {
      return false;
    }
    const labels = this.getList(settings.key);
    if (!labels.includes(label)) {
      return false;
    }
    const remaining = labels.filter((existing) => existing !== label);
    this.param(settings.key).set(remaining.length > 0 ? { type: 'string-list', value: remaining } : null);
    return true;
  }

  // ===========================================================================
  // Population
  // ===========================================================================

  /**
   * Load parameter values from a document fragment.
   *
   * Child fragments are left to the configuration root. Every problem is
   * appended to `problems`; nothing is thrown for bad input.
   */
  populateFrom(fragment: JsonObject, problems: ClusterError[]): void {
    for (const field of Object.keys(fragment)) {
      if (field === this.definition.labelKey) continue;
      const param = this.params.get(field);
      if (!param) {
        problems.push(new UnknownFieldError(field, this.displayName));
      } else if (param.visibility === 'PRIVATE') {
        problems.push(new DisallowedFieldError(field, this.displayName));
      }
    }

    for (const param of this.params.values()) {
      if (isSettingsParam(param.definition) || param.visibility === 'PRIVATE') continue;
      const raw = fragment[param.key];
      if (raw === undefined || raw === null) continue;
      try {
        param.load(raw);
      } catch (error) {
        if (error instanceof InvalidValueError) {
          problems.push(error);
        } else {
          throw error;
        }
      }
    }

    this.resolveDefaults();
  }

  /**
   * Fill every unset parameter with its default, in declaration order.
   */
  resolveDefaults(): void {
    for (const param of this.params.values()) {
      if (param.value !== null) continue;
      param.set(param.resolveDefault(this.valuesFor(param)));
    }
  }

  /**
   * Default value a parameter would get from the current section values.
   */
  defaultFor(key: string): ParamValue | null {
    const param = this.param(key);
    return param.resolveDefault(this.valuesFor(param));
  }

  private valuesFor(param: Parameter): SectionValues {
    const definition = param.definition;
    const allowed = new Set(
      !isSettingsParam(definition) && definition.derivedDefault ? definition.derivedDefault.dependsOn : []
    );
    return {
      value: (key: string): ParamValue | null => {
        if (!allowed.has(key)) {
          throw new SchemaDefinitionError(
            `Default of '${this.key}.${param.key}' reads '${key}' without declaring it`
          );
        }
        return this.value(key);
      },
    };
  }

  /**
   * Load parameter values from the storage representation.
   *
   * Combined sections are decoded positionally in declaration order.
   */
  populateFromStorage(source: StorageSource): void {
    switch (this.definition.storage) {
      case 'params':
        for (const param of this.params.values()) {
          const text = source.flat[param.storageKey];
          if (text !== undefined) {
            param.fromStorage(text);
          }
        }
        break;
      case 'combined': {
        const text = source.flat[this.definition.storageKey ?? this.key];
        const parts = text === undefined ? [NONE] : text.split(',');
        const unset = parts[0] === NONE;
        this.parameters().forEach((param, index) => {
          param.fromStorage(unset ? NONE : (parts[index] ?? NONE));
        });
        break;
      }
      case 'json': {
        const json = source.json ?? {};
        for (const param of this.params.values()) {
          const raw = json[param.storageKey];
          if (raw !== undefined && raw !== null) {
            param.load(raw);
          }
        }
        break;
      }
    }
    this.resolveDefaults();
  }

  // ===========================================================================
  // Serialization
  // ===========================================================================

  /**
   * Write the flat entries of a params or combined section.
   */
  writeFlat(target: Record<string, string>): void {
    if (this.definition.storage === 'params') {
      for (const param of this.params.values()) {
        const [key, value] = param.toStorage();
        target[key] = value;
      }
    } else if (this.definition.storage === 'combined') {
      const values = this.parameters().map((param) => formatStorageValue(param.value));
      target[this.definition.storageKey ?? this.key] = values[0] === NONE ? NONE : values.join(',');
    }
  }

  /**
   * Structured-blob object of a json section (children excluded).
   */
  toJson(): JsonObject {
    const json: JsonObject = {};
    for (const param of this.params.values()) {
      const value = param.toDocument();
      if (value !== undefined) {
        json[param.storageKey] = value;
      }
    }
    return json;
  }

  /**
   * Public, set parameter values keyed by document key (children excluded).
   */
  toDocumentFields(): JsonObject {
    const fields: JsonObject = {};
    for (const param of this.params.values()) {
      if (isSettingsParam(param.definition) || param.visibility === 'PRIVATE') continue;
      const value = param.toDocument();
      if (value !== undefined) {
        fields[param.key] = value;
      }
    }
    return fields;
  }

  // ===========================================================================
  // Validation
  // ===========================================================================

  /**
   * Run section validators, then every parameter check.
   *
   * All findings are collected; nothing short-circuits.
   */
  validate(context: ValidationContext, isSuppressed: (name: string) => boolean): ValidationFinding[] {
    const findings: ValidationFinding[] = [];

    for (const validator of this.definition.validators ?? []) {
      if (isSuppressed(validator.name)) continue;
      findings.push(...toFindings(validator.name, this.displayName, validator.run(this, context)));
    }

    for (const param of this.params.values()) {
      const path = this.documentPath ? `${this.documentPath}.${param.key}` : param.key;
      const value = param.value;
      if (value === null || (isSettingsParam(param.definition) && asList(value).length === 0)) {
        if (param.definition.required) {
          findings.push({
            validator: 'required',
            level: 'ERROR',
            message: `Configuration parameter '${param.key}' must have a value`,
            path,
          });
        }
        continue;
      }
      for (const validator of param.definition.validators ?? []) {
        if (isSuppressed(validator.name)) continue;
        findings.push(...toFindings(validator.name, path, validator.run(param.key, value, this, context)));
      }
    }

    return findings;
  }
}

function toFindings(validator: string, path: string, output: ValidatorOutput): ValidationFinding[] {
  const entries: Array<[Severity, string[]]> = [
    ['ERROR', output.errors],
    ['WARNING', output.warnings],
    ['INFO', output.infos ?? []],
  ];
  return entries.flatMap(([level, messages]) =>
    messages.map((message) => ({ validator, level, message, path }))
  );
}
