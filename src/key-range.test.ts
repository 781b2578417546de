import { describe, expect, test } from 'vitest';
import { ArscBinary } from './arsc-binary.js';
import { groupEntryCount, keyRange, typeKeys } from './key-range.js';
import { APP_TABLE, buildTableBuffer, type FixturePackage } from './test/arsc-fixture.js';
import type { ResTablePackage } from './types/res-table.js';

function decodePackage(pkg: FixturePackage): ResTablePackage {
  return ArscBinary.parse({ buffer: buildTableBuffer({ packages: [pkg] }) }).packages[0];
}

const appPackage = (): ResTablePackage => ArscBinary.parse({ buffer: buildTableBuffer(APP_TABLE) }).packages[0];

const widePackage: FixturePackage = {
  id: 0x7f,
  name: 'wide',
  types: [
    { name: 'attr', keys: ['a1', 'a2', 'a3'] },
    { name: 'color', keys: [] },
    { name: 'layout', keys: ['main', 'row'], configs: 3 },
    { name: 'string', keys: ['title', 'subtitle', 'footer', 'empty'] },
  ],
};

describe('keyRange', () => {
  test('starts the first type at 0', () => {
    expect(keyRange(appPackage(), 1)).toEqual({ ok: true, value: { first: 0, last: 2 } });
  });

  test('offsets later types by the entries before them', () => {
    expect(keyRange(appPackage(), 2)).toEqual({ ok: true, value: { first: 2, last: 3 } });
  });

  test('ranges are contiguous across ascending type ids', () => {
    const pkg = decodePackage(widePackage);
    const ranges = [1, 2, 3, 4].map((typeId: number) => keyRange(pkg, typeId));
    expect(ranges).toEqual([
      { ok: true, value: { first: 0, last: 3 } },
      { ok: true, value: { first: 3, last: 3 } },
      { ok: true, value: { first: 3, last: 5 } },
      { ok: true, value: { first: 5, last: 9 } },
    ]);
  });

  test('counts only the primary record of multi-config groups', () => {
    const pkg = decodePackage(widePackage);
    expect(pkg.types[2]).toHaveLength(4);
    expect(groupEntryCount(pkg.types[2])).toBe(2);
  });

  test('rejects type ids below 1', () => {
    for (const typeId of [0, -1]) {
      const result = keyRange(appPackage(), typeId);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('InvalidType');
        expect(result.error.message).toBe(`Minimum type id is 1, ${typeId} given`);
      }
    }
  });

  test('fails for a type without a group', () => {
    const result = keyRange(appPackage(), 3);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('TypeNotFound');
    }
  });
});

describe('typeKeys', () => {
  test('keys the slice by position within the type', () => {
    const result = typeKeys(decodePackage(widePackage), 4);
    expect(result.ok && [...result.value]).toEqual([
      [0, 'title'],
      [1, 'subtitle'],
      [2, 'footer'],
      [3, 'empty'],
    ]);
  });

  test('returns no keys for an empty type', () => {
    const result = typeKeys(decodePackage(widePackage), 2);
    expect(result.ok && result.value.size).toBe(0);
  });
});
