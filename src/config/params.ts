/**
 * Parameter Model
 *
 * Typed configuration leaf values. A value is a tagged variant; each tag
 * has a small set of pure coercion functions for document input, flat
 * storage and document output.
 */

import { InvalidValueError } from '../core/errors.js';
import { canonicalJson, isJsonValue, type JsonValue } from '../lib/json.js';
import type { UpdatePolicy } from '../update/types.js';
import type { ParamValidator } from '../validation/types.js';

// =============================================================================
// Value Types
// =============================================================================

export type ValueType = 'string' | 'int' | 'float' | 'bool' | 'string-list' | 'json';

export type ParamValue =
  | { readonly type: 'string'; readonly value: string }
  | { readonly type: 'int'; readonly value: number }
  | { readonly type: 'float'; readonly value: number }
  | { readonly type: 'bool'; readonly value: boolean }
  | { readonly type: 'string-list'; readonly value: readonly string[] }
  | { readonly type: 'json'; readonly value: JsonValue };

/**
 * Storage sentinel for an unset value.
 */
export const NONE = 'NONE';

/**
 * Prefix of a stored string or list that would otherwise read as NONE.
 */
const ESCAPE = '\\';

export type Visibility = 'PUBLIC' | 'PRIVATE';

/**
 * Enumerated values (membership) or a pattern (full match).
 */
export type AllowedValues = readonly (string | number)[] | RegExp;

/**
 * Read access to the already-resolved values of a section.
 */
export interface SectionValues {
  value(key: string): ParamValue | null;
}

/**
 * Default computed from other parameters of the same section.
 *
 * `dependsOn` must list every key `resolve` reads; each must be declared
 * before the parameter that owns the default.
 */
export interface DerivedDefault {
  readonly dependsOn: readonly string[];
  readonly resolve: (values: SectionValues) => unknown;
}

interface BaseParamDefinition {
  /** Document key, unique within the section */
  readonly key: string;
  /** Key in the flat storage representation, defaults to `key` */
  readonly storageKey?: string;
  readonly required?: boolean;
  readonly visibility?: Visibility;
  readonly updatePolicy?: UpdatePolicy;
  readonly validators?: readonly ParamValidator[];
}

/**
 * A leaf parameter.
 */
export interface ValueParamDefinition extends BaseParamDefinition {
  readonly type: ValueType;
  readonly allowedValues?: AllowedValues;
  readonly defaultValue?: unknown;
  readonly derivedDefault?: DerivedDefault;
}

/**
 * A parameter whose value is the list of child section labels.
 */
export interface SettingsParamDefinition extends BaseParamDefinition {
  readonly type: 'settings';
  /** Key of the child section definition */
  readonly section: string;
}

export type ParamDefinition = ValueParamDefinition | SettingsParamDefinition;

/**
 * Check whether a definition references child sections.
 */
export function isSettingsParam(definition: ParamDefinition): definition is SettingsParamDefinition {
  return definition.type === 'settings';
}

/**
 * Value type held by a definition; settings hold their labels as a list.
 */
export function valueTypeOf(definition: ParamDefinition): ValueType {
  return definition.type === 'settings' ? 'string-list' : definition.type;
}

/**
 * Storage key of a definition.
 */
export function storageKeyOf(definition: ParamDefinition): string {
  return definition.storageKey ?? definition.key;
}

// =============================================================================
// Coercion
// =============================================================================

const INT_PATTERN = /^-?\d+$/;
const FLOAT_PATTERN = /^-?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?$/;

/**
 * Coerce a raw document or storage value to a typed value.
 *
 * @param type - Target value type
 * @param raw - Raw value (native or string form)
 * @param key - Parameter key, used in errors
 * @param allowed - Optional allowed-values constraint
 * @throws InvalidValueError when the value cannot be coerced or is not allowed
 */
export function coerceValue(
  type: ValueType,
  raw: unknown,
  key: string,
  allowed?: AllowedValues
): ParamValue {
  const value = coerceType(type, raw, key);
  if (allowed !== undefined && !isAllowed(value, allowed)) {
    throw new InvalidValueError(key, raw, describeAllowed(allowed));
  }
  return value;
}

function coerceType(type: ValueType, raw: unknown, key: string): ParamValue {
  switch (type) {
    case 'string':
      if (typeof raw === 'string') return { type, value: raw };
      if (typeof raw === 'number' && Number.isFinite(raw)) return { type, value: String(raw) };
      break;
    case 'int':
      if (typeof raw === 'number' && Number.isSafeInteger(raw)) return { type, value: raw };
      if (typeof raw === 'string' && INT_PATTERN.test(raw.trim())) {
        const parsed = Number(raw.trim());
        if (Number.isSafeInteger(parsed)) return { type, value: parsed };
      }
      break;
    case 'float':
      if (typeof raw === 'number' && Number.isFinite(raw)) return { type, value: raw };
      if (typeof raw === 'string' && FLOAT_PATTERN.test(raw.trim())) {
        const parsed = Number(raw.trim());
        if (Number.isFinite(parsed)) return { type, value: parsed };
      }
      break;
    case 'bool':
      if (typeof raw === 'boolean') return { type, value: raw };
      if (typeof raw === 'string') {
        const lowered = raw.trim().toLowerCase();
        if (lowered === 'true') return { type, value: true };
        if (lowered === 'false') return { type, value: false };
      }
      break;
    case 'string-list': {
      const items = typeof raw === 'string' ? splitList(raw) : raw;
      if (Array.isArray(items) && items.every(isListItem)) {
        return { type, value: items.map((item: string) => item.trim()) };
      }
      break;
    }
    case 'json': {
      if (typeof raw === 'string') {
        try {
          const parsed: unknown = JSON.parse(raw);
          if (isJsonValue(parsed)) return { type, value: parsed };
        } catch {
          throw new InvalidValueError(key, raw, 'a JSON document');
        }
        break;
      }
      if (isJsonValue(raw)) return { type, value: raw };
      break;
    }
  }
  throw new InvalidValueError(key, raw, expectedTypeDescription(type));
}

function isListItem(item: unknown): item is string {
  return typeof item === 'string' && !item.includes(',') && item.trim() !== '';
}

function splitList(raw: string): string[] {
  const trimmed = raw.trim();
  if (trimmed === '') return [];
  return trimmed.split(',').map((item) => item.trim());
}

function expectedTypeDescription(type: ValueType): string {
  switch (type) {
    case 'string':
      return 'a string';
    case 'int':
      return 'an integer';
    case 'float':
      return 'a number';
    case 'bool':
      return 'true or false';
    case 'string-list':
      return 'a list of non-empty strings without commas';
    case 'json':
      return 'a JSON document';
  }
}

function isAllowed(value: ParamValue, allowed: AllowedValues): boolean {
  if (value.type === 'json') {
    return true;
  }
  const items: readonly (string | number | boolean)[] =
    value.type === 'string-list' ? value.value : [value.value];
  if (allowed instanceof RegExp) {
    const anchored = new RegExp(`^(?:${allowed.source})$`, allowed.flags.replace('g', ''));
    return items.every((item) => anchored.test(String(item)));
  }
  return items.every((item) => allowed.some((candidate) => candidate === item));
}

/**
 * Human-readable form of an allowed-values constraint.
 */
export function describeAllowed(allowed: AllowedValues): string {
  if (allowed instanceof RegExp) {
    return `values matching ${allowed.source}`;
  }
  return allowed.map(String).join(', ');
}

/**
 * Canonical flat-storage string of a value.
 *
 * Unset values are written as NONE; lists are comma-joined; JSON keys
 * are sorted. Strings and lists that read as NONE, or start with a
 * backslash, get one more leading backslash.
 */
export function formatStorageValue(value: ParamValue | null): string {
  if (value === null) {
    return NONE;
  }
  switch (value.type) {
    case 'string':
      return escapeText(value.value);
    case 'int':
    case 'float':
      return String(value.value);
    case 'bool':
      return value.value ? 'true' : 'false';
    case 'string-list':
      return escapeText(value.value.join(','));
    case 'json':
      return canonicalJson(value.value);
  }
}

function escapeText(text: string): string {
  return text === NONE || text.startsWith(ESCAPE) ? `${ESCAPE}${text}` : text;
}

/**
 * Inverse of formatStorageValue.
 */
export function parseStorageValue(type: ValueType, text: string, key: string): ParamValue | null {
  if (text === NONE) {
    return null;
  }
  if ((type === 'string' || type === 'string-list') && text.startsWith(ESCAPE)) {
    return coerceValue(type, text.slice(ESCAPE.length), key);
  }
  return coerceValue(type, text, key);
}

/**
 * Native document form of a value.
 */
export function toNative(value: ParamValue): JsonValue {
  if (value.type === 'string-list') {
    return [...value.value];
  }
  return value.value;
}

// =============================================================================
// Typed Accessors
// =============================================================================

export function asString(value: ParamValue | null): string | null {
  return value?.type === 'string' ? value.value : null;
}

export function asNumber(value: ParamValue | null): number | null {
  return value?.type === 'int' || value?.type === 'float' ? value.value : null;
}

export function asBool(value: ParamValue | null): boolean | null {
  return value?.type === 'bool' ? value.value : null;
}

export function asList(value: ParamValue | null): readonly string[] {
  return value?.type === 'string-list' ? value.value : [];
}

// =============================================================================
// Parameter
// =============================================================================

/**
 * A parameter instance owned by a section.
 */
export class Parameter {
  private current: ParamValue | null = null;

  constructor(readonly definition: ParamDefinition) {}

  get key(): string {
    return this.definition.key;
  }

  get storageKey(): string {
    return storageKeyOf(this.definition);
  }

  get visibility(): Visibility {
    return this.definition.visibility ?? 'PUBLIC';
  }

  get value(): ParamValue | null {
    return this.current;
  }

  /**
   * Coerce and store a raw document value.
   *
   * @throws InvalidValueError if the value is not acceptable
   */
  load(raw: unknown): void {
    const allowed = this.definition.type === 'settings' ? undefined : this.definition.allowedValues;
    this.current = coerceValue(valueTypeOf(this.definition), raw, this.key, allowed);
  }

  /**
   * Replace the value with an already-typed value, or clear it.
   */
  set(value: ParamValue | null): void {
    this.current = value;
  }

  /**
   * Compute the default for this parameter.
   *
   * Derived defaults only see the values the section exposes for the
   * declared dependencies.
   */
  resolveDefault(values: SectionValues): ParamValue | null {
    const definition = this.definition;
    if (definition.type === 'settings') {
      return null;
    }
    let raw: unknown = definition.defaultValue;
    if (definition.derivedDefault) {
      raw = definition.derivedDefault.resolve(values);
    }
    if (raw === undefined || raw === null) {
      return null;
    }
    return coerceValue(definition.type, raw, this.key, definition.allowedValues);
  }

  /**
   * Flat storage entry for this parameter.
   */
  toStorage(): [string, string] {
    return [this.storageKey, formatStorageValue(this.current)];
  }

  /**
   * Load the value from its flat storage string.
   */
  fromStorage(text: string): void {
    this.current = parseStorageValue(valueTypeOf(this.definition), text, this.key);
  }

  /**
   * Native document value, or undefined when unset.
   */
  toDocument(): JsonValue | undefined {
    return this.current === null ? undefined : toNative(this.current);
  }
}
