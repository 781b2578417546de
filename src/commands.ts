/**
 * Command implementations behind the CLI. Each reads the table, runs one
 * operation and returns the lines to print.
 */
import { ArscBinary } from './arsc-binary.js';
import { formatResolvedName, isOutputFormat, OUTPUT_FORMATS } from './format.js';
import { formatResourceId, parseResourceId } from './resource-id.js';
import { listKeys, listPackages, listTypes, resolveResourceId } from './resolver.js';
import type { ResTable } from './types/res-table.js';
import { unwrap, type KeySummary, type PackageSummary, type TypeSummary } from './types/resolution.js';

export interface ResolveCommandOptions {
  readonly filePath: string;
  readonly resourceId: string;
  readonly format?: string;
  readonly strict?: boolean;
}

/**
 * Parses an 8-bit package or type id given on the command line.
 */
export function parseIdByte(text: string, label: string): number {
  const value: number = parseResourceId(text);
  if (value > 0xff) {
    throw new RangeError(`${label} must be between 0 and 0xff, got "${text}"`);
  }
  return value;
}

export async function resolveCommand({ filePath, resourceId, format = 'fqdn', strict = false }: ResolveCommandOptions): Promise<string> {
  if (!isOutputFormat(format)) {
    throw new Error(`Unknown output type: ${format} (expected one of ${OUTPUT_FORMATS.join(', ')})`);
  }
  const id: number = parseResourceId(resourceId);
  const table: ResTable = await ArscBinary.read({ filePath });
  return formatResolvedName(unwrap(resolveResourceId(table, id, { strict })), format);
}

export async function packagesCommand({ filePath }: { readonly filePath: string }): Promise<string[]> {
  const table: ResTable = await ArscBinary.read({ filePath });
  return unwrap(listPackages(table)).map((pkg: PackageSummary) => `0x${pkg.id.toString(16).padStart(2, '0')} ${pkg.name}`);
}

export async function typesCommand({ filePath, packageId }: { readonly filePath: string; readonly packageId: string }): Promise<string[]> {
  const id: number = parseIdByte(packageId, 'Package id');
  const table: ResTable = await ArscBinary.read({ filePath });
  return unwrap(listTypes(table, id)).map(
    (type: TypeSummary) => `${type.id} ${type.name} (${type.entryCount} entries, ${type.configCount} configs)`
  );
}

export async function keysCommand({ filePath, packageId, typeId }: { readonly filePath: string; readonly packageId: string; readonly typeId: string }): Promise<string[]> {
  const pid: number = parseIdByte(packageId, 'Package id');
  const tid: number = parseIdByte(typeId, 'Type id');
  const table: ResTable = await ArscBinary.read({ filePath });
  return unwrap(listKeys(table, pid, tid)).map((entry: KeySummary) => `${formatResourceId(entry.resourceId)} ${entry.key}`);
}

export async function infoCommand({ filePath }: { readonly filePath: string }): Promise<string[]> {
  const table: ResTable = await ArscBinary.read({ filePath });
  return [
    `File: ${table.filePath}`,
    `Size: ${table.totalSize} bytes`,
    `SHA-256: ${table.sha256}`,
    `Packages: ${table.packages.length}`,
    `Global strings: ${table.globalStrings.strings.length}`,
  ];
}
