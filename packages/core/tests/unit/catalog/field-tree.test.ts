import { describe, expect, it } from 'vitest';
import {
  firstText,
  identityOf,
  isFalse,
  isTrue,
  numberOf,
  queryPath,
  textOf,
} from '../../../src/catalog/field-tree.js';
import { FIELD_PATHS } from '../../../src/catalog/paths.js';

describe('queryPath', () => {
  it('collects every item of a list wrapper', () => {
    const fields = {
      package_configuration: {
        packages: { size: 2, package: [{ id: 1, name: 'Chrome' }, { id: 2, name: 'Flash' }] },
      },
    };
    expect(queryPath(fields, FIELD_PATHS.policyPackages)).toEqual([
      { id: 1, name: 'Chrome' },
      { id: 2, name: 'Flash' },
    ]);
  });

  it('treats a single item stored as an object like a one-item list', () => {
    const fields = { scripts: { script: { id: 7, name: 'cleanup.sh' } } };
    expect(queryPath(fields, FIELD_PATHS.policyScripts)).toEqual([{ id: 7, name: 'cleanup.sh' }]);
  });

  it('crosses arrays at intermediate steps', () => {
    const fields = { scripts: [{ script: { id: 1, name: 'a' } }, { script: [{ id: 2, name: 'b' }] }] };
    expect(queryPath(fields, FIELD_PATHS.configurationScripts)).toEqual([
      { id: 1, name: 'a' },
      { id: 2, name: 'b' },
    ]);
  });

  it('returns an empty list when a segment is missing', () => {
    expect(queryPath({ scripts: {} }, FIELD_PATHS.policyScripts)).toEqual([]);
    expect(queryPath({}, FIELD_PATHS.scopeComputerGroups)).toEqual([]);
  });
});

describe('textOf', () => {
  it('trims strings and treats empty as absent', () => {
    expect(textOf('  10.12.6 ')).toBe('10.12.6');
    expect(textOf('   ')).toBeUndefined();
    expect(textOf(null)).toBeUndefined();
  });

  it('stringifies numbers and booleans and reads the name of a node', () => {
    expect(textOf(42)).toBe('42');
    expect(textOf(false)).toBe('false');
    expect(textOf({ id: 3, name: 'Lab Macs' })).toBe('Lab Macs');
  });
});

describe('firstText', () => {
  it('returns the first non-empty value on the path', () => {
    const fields = { general: { last_contact_time: '2026-10-15 09:30:00' } };
    expect(firstText(fields, FIELD_PATHS.computerLastContact)).toBe('2026-10-15 09:30:00');
    expect(firstText(fields, FIELD_PATHS.computerOsVersion)).toBeUndefined();
  });
});

describe('scalar helpers', () => {
  it('numberOf accepts integers and digit strings only', () => {
    expect(numberOf(5)).toBe(5);
    expect(numberOf(' 12 ')).toBe(12);
    expect(numberOf('12a')).toBeUndefined();
    expect(numberOf(Number.NaN)).toBeUndefined();
  });

  it('isTrue and isFalse accept booleans and strings', () => {
    expect(isTrue(true)).toBe(true);
    expect(isTrue('TRUE')).toBe(true);
    expect(isTrue('yes')).toBe(false);
    expect(isFalse('false')).toBe(true);
    expect(isFalse(undefined)).toBe(false);
  });

  it('identityOf requires an integer id', () => {
    expect(identityOf({ id: '9', name: 'Printer' })).toEqual({ id: 9, name: 'Printer' });
    expect(identityOf({ id: 9 })).toEqual({ id: 9, name: '' });
    expect(identityOf({ name: 'no id' })).toBeUndefined();
    expect(identityOf('plain')).toBeUndefined();
  });
});
