import { describe, expect, test } from 'vitest';
import { compose, decompose, formatResourceId, parseResourceId, validateResourceId } from './resource-id.js';

describe('decompose', () => {
  test('splits package, type and entry ids', () => {
    expect(decompose(0x7f010002)).toEqual({ packageId: 0x7f, typeId: 0x01, entryId: 0x0002 });
  });

  test('handles the full 32-bit range', () => {
    expect(decompose(0xffffffff)).toEqual({ packageId: 0xff, typeId: 0xff, entryId: 0xffff });
  });
});

describe('compose', () => {
  test('is the inverse of decompose', () => {
    for (const id of [0, 0x01020304, 0x7f010000, 0x7f0a1234, 0x80000000, 0xffffffff]) {
      expect(compose(decompose(id))).toBe(id);
    }
  });

  test('returns an unsigned value for package ids above 0x7f', () => {
    expect(compose({ packageId: 0xff, typeId: 1, entryId: 0 })).toBe(0xff010000);
  });
});

describe('parseResourceId', () => {
  test('accepts hex, octal, binary and decimal literals', () => {
    expect(parseResourceId('0x7f010000')).toBe(0x7f010000);
    expect(parseResourceId('0X7F010000')).toBe(0x7f010000);
    expect(parseResourceId('2130771968')).toBe(0x7f010000);
    expect(parseResourceId('0o17')).toBe(15);
    expect(parseResourceId('0b101')).toBe(5);
    expect(parseResourceId(' 0x10 ')).toBe(16);
  });

  test('rejects text that is not an unsigned integer', () => {
    for (const text of ['', 'abc', '-1', '1.5', '0x', '0x7g']) {
      expect(() => parseResourceId(text)).toThrow(RangeError);
    }
  });

  test('accepts single underscores between digits', () => {
    expect(parseResourceId('0x7f01_0000')).toBe(0x7f010000);
    expect(parseResourceId('0x_7f')).toBe(0x7f);
    expect(parseResourceId('2_130_771_968')).toBe(0x7f010000);
    expect(parseResourceId('0b1_0')).toBe(2);
  });

  test('accepts zero written with extra zeros', () => {
    expect(parseResourceId('0')).toBe(0);
    expect(parseResourceId('000')).toBe(0);
  });

  test('rejects decimal literals with leading zeros', () => {
    expect(() => parseResourceId('010')).toThrow('Invalid resource id: "010"');
    expect(() => parseResourceId('0_1')).toThrow(RangeError);
  });

  test('rejects misplaced underscores', () => {
    for (const text of ['_10', '10_', '1__0', '0x7f__01', '0x7f_']) {
      expect(() => parseResourceId(text)).toThrow(RangeError);
    }
  });

  test('rejects values above 32 bits', () => {
    expect(() => parseResourceId('0x100000000')).toThrow('Resource id out of 32-bit range: "0x100000000"');
  });
});

describe('formatResourceId', () => {
  test('pads to eight hex digits', () => {
    expect(formatResourceId(0x7f010000)).toBe('0x7f010000');
    expect(formatResourceId(0x10)).toBe('0x00000010');
  });
});

describe('validateResourceId', () => {
  test('rejects package id 0', () => {
    const result = validateResourceId({ packageId: 0, typeId: 1, entryId: 0 });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('MalformedIdentifier');
      expect(result.error.message).toBe('Package id 0 is reserved in 0x00010000');
    }
  });

  test('rejects type id 0', () => {
    const result = validateResourceId({ packageId: 0x7f, typeId: 0, entryId: 3 });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Type id 0 is invalid in 0x7f000003');
    }
  });

  test('accepts ids with non-zero package and type', () => {
    expect(validateResourceId({ packageId: 1, typeId: 1, entryId: 0 })).toEqual({
      ok: true,
      value: { packageId: 1, typeId: 1, entryId: 0 },
    });
  });
});
