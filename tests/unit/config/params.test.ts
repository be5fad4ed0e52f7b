/**
 * Unit tests for the Parameter Model
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  coerceValue,
  describeAllowed,
  formatStorageValue,
  parseStorageValue,
  Parameter,
  toNative,
  type ParamValue,
} from '../../../src/config/params.js';
import { InvalidValueError } from '../../../src/core/errors.js';

// =============================================================================
// Test Helpers
// =============================================================================

function assertInvalid(fn: () => unknown, message: string): void {
  assert.throws(fn, (error: unknown) => {
    assert.ok(error instanceof InvalidValueError);
    assert.strictEqual(error.message, message);
    assert.strictEqual(error.code, 'INVALID_VALUE');
    return true;
  });
}

// =============================================================================
// Coercion
// =============================================================================

describe('coerceValue', () => {
  describe('scalar types', () => {
    it('should accept integers and integer strings', () => {
      assert.deepStrictEqual(coerceValue('int', 42, 'MaxCount'), { type: 'int', value: 42 });
      assert.deepStrictEqual(coerceValue('int', ' -7 ', 'MaxCount'), { type: 'int', value: -7 });
    });

    it('should reject fractional and non-numeric integers', () => {
      assertInvalid(() => coerceValue('int', 'abc', 'MaxCount'), "Invalid value 'abc' for parameter 'MaxCount', allowed: an integer");
      assertInvalid(() => coerceValue('int', 1.5, 'MaxCount'), "Invalid value '1.5' for parameter 'MaxCount', allowed: an integer");
    });

    it('should accept floats in number and string form', () => {
      assert.deepStrictEqual(coerceValue('float', '0.25', 'SpotPrice'), { type: 'float', value: 0.25 });
      assert.deepStrictEqual(coerceValue('float', '.5', 'SpotPrice'), { type: 'float', value: 0.5 });
      assert.deepStrictEqual(coerceValue('float', 3, 'SpotPrice'), { type: 'float', value: 3 });
    });

    it('should accept booleans case-insensitively', () => {
      assert.deepStrictEqual(coerceValue('bool', 'TRUE', 'Enabled'), { type: 'bool', value: true });
      assert.deepStrictEqual(coerceValue('bool', false, 'Enabled'), { type: 'bool', value: false });
      assertInvalid(() => coerceValue('bool', 'yes', 'Enabled'), "Invalid value 'yes' for parameter 'Enabled', allowed: true or false");
    });

    it('should turn numbers into strings for string parameters', () => {
      assert.deepStrictEqual(coerceValue('string', 8443, 'Port'), { type: 'string', value: '8443' });
    });
  });

  describe('lists', () => {
    it('should split comma-separated strings', () => {
      assert.deepStrictEqual(coerceValue('string-list', 'a, b,c', 'SubnetIds'), {
        type: 'string-list',
        value: ['a', 'b', 'c'],
      });
    });

    it('should read an empty string as an empty list', () => {
      assert.deepStrictEqual(coerceValue('string-list', '', 'SubnetIds'), { type: 'string-list', value: [] });
    });

    it('should reject empty items', () => {
      assertInvalid(
        () => coerceValue('string-list', ['subnet-1', ' '], 'SubnetIds'),
        `Invalid value '["subnet-1"," "]' for parameter 'SubnetIds', allowed: a list of non-empty strings without commas`
      );
    });

    it('should reject items containing commas', () => {
      assertInvalid(
        () => coerceValue('string-list', ['a,b'], 'SubnetIds'),
        `Invalid value '["a,b"]' for parameter 'SubnetIds', allowed: a list of non-empty strings without commas`
      );
    });
  });

  describe('json', () => {
    it('should parse JSON strings', () => {
      assert.deepStrictEqual(coerceValue('json', '{"a":1}', 'Tags'), { type: 'json', value: { a: 1 } });
    });

    it('should keep structured values as they are', () => {
      assert.deepStrictEqual(coerceValue('json', [{ Key: 'team' }], 'Tags'), {
        type: 'json',
        value: [{ Key: 'team' }],
      });
    });

    it('should reject unparseable strings', () => {
      assertInvalid(() => coerceValue('json', '{', 'Tags'), "Invalid value '{' for parameter 'Tags', allowed: a JSON document");
    });
  });

  describe('allowed values', () => {
    it('should check membership of enumerations', () => {
      assert.deepStrictEqual(coerceValue('string', 'gp3', 'VolumeType', ['gp2', 'gp3']), {
        type: 'string',
        value: 'gp3',
      });
      assertInvalid(
        () => coerceValue('string', 'gp4', 'VolumeType', ['gp2', 'gp3']),
        "Invalid value 'gp4' for parameter 'VolumeType', allowed: gp2, gp3"
      );
    });

    it('should require a full pattern match', () => {
      assert.deepStrictEqual(coerceValue('string', 'subnet-0abc', 'SubnetId', /subnet-[0-9a-z]+/), {
        type: 'string',
        value: 'subnet-0abc',
      });
      assertInvalid(
        () => coerceValue('string', 'my-subnet-0abc', 'SubnetId', /subnet-[0-9a-z]+/),
        "Invalid value 'my-subnet-0abc' for parameter 'SubnetId', allowed: values matching subnet-[0-9a-z]+"
      );
    });

    it('should check every list item', () => {
      assertInvalid(
        () => coerceValue('string-list', ['sg-1', 'bad'], 'SecurityGroups', /sg-[0-9a-z]+/),
        `Invalid value '["sg-1","bad"]' for parameter 'SecurityGroups', allowed: values matching sg-[0-9a-z]+`
      );
    });

    it('should compare numbers by value', () => {
      assert.deepStrictEqual(coerceValue('int', '180', 'RetentionInDays', [90, 180]), { type: 'int', value: 180 });
    });
  });
});

describe('describeAllowed', () => {
  it('should describe patterns and enumerations', () => {
    assert.strictEqual(describeAllowed(/ami-[0-9a-z]+/), 'values matching ami-[0-9a-z]+');
    assert.strictEqual(describeAllowed([1, 3, 5]), '1, 3, 5');
  });
});

// =============================================================================
// Storage Form
// =============================================================================

describe('formatStorageValue', () => {
  it('should write NONE for unset values', () => {
    assert.strictEqual(formatStorageValue(null), 'NONE');
  });

  it('should write canonical strings', () => {
    assert.strictEqual(formatStorageValue({ type: 'bool', value: false }), 'false');
    assert.strictEqual(formatStorageValue({ type: 'string-list', value: ['a', 'b'] }), 'a,b');
    assert.strictEqual(formatStorageValue({ type: 'json', value: { b: 1, a: 2 } }), '{"a":2,"b":1}');
  });
});

describe('parseStorageValue', () => {
  it('should read NONE as unset', () => {
    assert.strictEqual(parseStorageValue('int', 'NONE', 'MaxCount'), null);
  });

  it('should restore every value type from its storage string', () => {
    const samples: ParamValue[] = [
      { type: 'string', value: 'c5.xlarge' },
      { type: 'int', value: -3 },
      { type: 'float', value: 0.25 },
      { type: 'bool', value: true },
      { type: 'string-list', value: ['subnet-1', 'subnet-2'] },
      { type: 'string-list', value: [] },
      { type: 'json', value: [{ Key: 'team', Value: 'hpc' }] },
    ];
    for (const sample of samples) {
      assert.deepStrictEqual(parseStorageValue(sample.type, formatStorageValue(sample), 'Key'), sample);
    }
  });
});

describe('storage escaping', () => {
  it('should keep a literal NONE apart from an unset value', () => {
    const literal: ParamValue = { type: 'string', value: 'NONE' };
    const list: ParamValue = { type: 'string-list', value: ['NONE'] };

    assert.strictEqual(formatStorageValue(literal), '\\NONE');
    assert.strictEqual(formatStorageValue(list), '\\NONE');
    assert.deepStrictEqual(parseStorageValue('string', '\\NONE', 'KeyName'), literal);
    assert.deepStrictEqual(parseStorageValue('string-list', '\\NONE', 'SubnetIds'), list);
  });

  it('should escape a leading backslash', () => {
    const value: ParamValue = { type: 'string', value: '\\share' };

    assert.strictEqual(formatStorageValue(value), '\\\\share');
    assert.deepStrictEqual(parseStorageValue('string', formatStorageValue(value), 'MountDir'), value);
  });

  it('should leave other values unescaped', () => {
    assert.strictEqual(formatStorageValue({ type: 'string', value: 'NONE-1' }), 'NONE-1');
    assert.strictEqual(formatStorageValue({ type: 'string-list', value: ['NONE', 'a'] }), 'NONE,a');
  });
});

describe('toNative', () => {
  it('should copy lists', () => {
    const value: ParamValue = { type: 'string-list', value: ['a'] };
    const native = toNative(value);

    assert.deepStrictEqual(native, ['a']);
    assert.notStrictEqual(native, value.value);
  });
});

// =============================================================================
// Parameter
// =============================================================================

describe('Parameter', () => {
  it('should use the document key as storage key by default', () => {
    const param = new Parameter({ key: 'MinCount', type: 'int' });

    assert.strictEqual(param.storageKey, 'MinCount');
    assert.strictEqual(param.visibility, 'PUBLIC');
  });

  it('should round-trip through its storage entry', () => {
    const param = new Parameter({ key: 'Enabled', storageKey: 'LogsEnabled', type: 'bool' });
    param.load('true');

    const [key, text] = param.toStorage();
    const copy = new Parameter({ key: 'Enabled', storageKey: 'LogsEnabled', type: 'bool' });
    copy.fromStorage(text);

    assert.strictEqual(key, 'LogsEnabled');
    assert.deepStrictEqual(copy.value, { type: 'bool', value: true });
  });

  it('should have no document value while unset', () => {
    const param = new Parameter({ key: 'CustomAmi', type: 'string' });

    assert.strictEqual(param.toDocument(), undefined);
  });

  describe('resolveDefault', () => {
    const noValues = { value: () => null };

    it('should coerce the static default', () => {
      const param = new Parameter({ key: 'Size', type: 'int', defaultValue: 35 });

      assert.deepStrictEqual(param.resolveDefault(noValues), { type: 'int', value: 35 });
    });

    it('should prefer the derived default', () => {
      const param = new Parameter({
        key: 'Iops',
        type: 'int',
        defaultValue: 100,
        derivedDefault: { dependsOn: ['VolumeType'], resolve: () => 3000 },
      });

      assert.deepStrictEqual(param.resolveDefault(noValues), { type: 'int', value: 3000 });
    });

    it('should give no default when the derivation yields null', () => {
      const param = new Parameter({
        key: 'Iops',
        type: 'int',
        derivedDefault: { dependsOn: ['VolumeType'], resolve: () => null },
      });

      assert.strictEqual(param.resolveDefault(noValues), null);
    });

    it('should give settings parameters no default', () => {
      const param = new Parameter({ key: 'Networking', type: 'settings', section: 'queue_networking' });

      assert.strictEqual(param.resolveDefault(noValues), null);
    });
  });
});
