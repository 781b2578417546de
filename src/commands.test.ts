import { describe, expect, test } from 'vitest';
import { infoCommand, keysCommand, packagesCommand, parseIdByte, resolveCommand, typesCommand } from './commands.js';
import { APP_TABLE, buildTableBuffer } from './test/arsc-fixture.js';
import { withFixtureFile } from './test/temp.js';

const withAppTable = async (fn: (filePath: string) => Promise<void>): Promise<void> =>
  withFixtureFile('resources.arsc', buildTableBuffer(APP_TABLE), fn);

describe('resolveCommand', () => {
  test('prints the fully-qualified name by default', async () => {
    await withAppTable(async (filePath) => {
      expect(await resolveCommand({ filePath, resourceId: '0x7f010000' })).toBe('app.R.string.app_name');
    });
  });

  test('supports xmlid and json output', async () => {
    await withAppTable(async (filePath) => {
      expect(await resolveCommand({ filePath, resourceId: '0x7f020000', format: 'xmlid' })).toBe('@app:drawable/icon');
      expect(await resolveCommand({ filePath, resourceId: '2130771969', format: 'json' })).toBe('{"package":"app","type":"string","key":"hello"}');
    });
  });

  test('rejects unknown formats', async () => {
    await withAppTable(async (filePath) => {
      await expect(resolveCommand({ filePath, resourceId: '0x7f010000', format: 'yaml' })).rejects.toThrow(
        'Unknown output type: yaml (expected one of fqdn, xmlid, json)'
      );
    });
  });

  test('rejects malformed ids', async () => {
    await withAppTable(async (filePath) => {
      await expect(resolveCommand({ filePath, resourceId: 'R.string.app_name' })).rejects.toThrow(RangeError);
    });
  });

  test('surfaces resolution failures', async () => {
    await withAppTable(async (filePath) => {
      await expect(resolveCommand({ filePath, resourceId: '0x7f030000' })).rejects.toMatchObject({
        name: 'ResolutionError',
        kind: 'TypeNotFound',
      });
      await expect(resolveCommand({ filePath, resourceId: '0x00010000', strict: true })).rejects.toMatchObject({
        kind: 'MalformedIdentifier',
      });
    });
  });
});

describe('listing commands', () => {
  test('packagesCommand lists ids and names', async () => {
    await withAppTable(async (filePath) => {
      expect(await packagesCommand({ filePath })).toEqual(['0x7f app']);
    });
  });

  test('typesCommand lists types with counts', async () => {
    await withAppTable(async (filePath) => {
      expect(await typesCommand({ filePath, packageId: '0x7f' })).toEqual([
        '1 string (2 entries, 1 configs)',
        '2 drawable (1 entries, 1 configs)',
      ]);
    });
  });

  test('keysCommand lists keys with resource ids', async () => {
    await withAppTable(async (filePath) => {
      expect(await keysCommand({ filePath, packageId: '127', typeId: '1' })).toEqual(['0x7f010000 app_name', '0x7f010001 hello']);
    });
  });

  test('infoCommand summarises the file', async () => {
    await withAppTable(async (filePath) => {
      const lines = await infoCommand({ filePath });
      expect(lines[0]).toBe(`File: ${filePath}`);
      expect(lines[1]).toBe(`Size: ${buildTableBuffer(APP_TABLE).length} bytes`);
      expect(lines[2]).toMatch(/^SHA-256: [0-9a-f]{64}$/);
      expect(lines.slice(3)).toEqual(['Packages: 1', 'Global strings: 2']);
    });
  });
});

describe('parseIdByte', () => {
  test('accepts 8-bit ids', () => {
    expect(parseIdByte('0x7f', 'Package id')).toBe(0x7f);
  });

  test('rejects wider values', () => {
    expect(() => parseIdByte('0x100', 'Package id')).toThrow('Package id must be between 0 and 0xff, got "0x100"');
  });
});
