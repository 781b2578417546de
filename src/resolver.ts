/**
 * Resource name resolution over a decoded resource table.
 *
 * Every operation takes the table explicitly and only reads it, so one decoded
 * table can serve any number of lookups.
 */
import { keyRange, typeKeys, groupEntryCount } from './key-range.js';
import { compose, decompose, formatResourceId, validateResourceId } from './resource-id.js';
import { buildTypeTable } from './type-table.js';
import type { ResTable, ResTablePackage, TypeSpecGroup } from './types/res-table.js';
import type { ResourceIdParts } from './types/resource-id.js';
import {
  fail,
  ok,
  type KeyRange,
  type KeySummary,
  type PackageSummary,
  type ResolveOptions,
  type ResolvedName,
  type Result,
  type TypeSummary,
} from './types/resolution.js';
import { decodePoolEntry, decodeUtf16Name } from './utils/pool-string.js';

function hex(value: number): string {
  return `0x${value.toString(16)}`;
}

export function findPackage(table: ResTable, packageId: number): Result<ResTablePackage> {
  const pkg: ResTablePackage | undefined = table.packages.find((candidate: ResTablePackage) => candidate.header.id === packageId);
  if (!pkg) {
    return fail('PackageNotFound', `Package with id ${hex(packageId)} not found`);
  }
  return ok(pkg);
}

function lookupTypeName(pkg: ResTablePackage, typeId: number): Result<string> {
  const types: Result<ReadonlyMap<number, string>> = buildTypeTable(pkg);
  if (!types.ok) {
    return types;
  }
  const name: string | undefined = types.value.get(typeId);
  if (name === undefined) {
    return fail('TypeNotFound', `Type with id ${hex(typeId)} not found in package ${hex(pkg.header.id)}`);
  }
  return ok(name);
}

/**
 * Resolves (package id, type id, entry id) to its package, type and key names.
 */
export function resolve(table: ResTable, packageId: number, typeId: number, entryId: number, options: ResolveOptions = {}): Result<ResolvedName> {
  const parts: ResourceIdParts = { packageId, typeId, entryId };
  if (options.strict) {
    const valid: Result<ResourceIdParts> = validateResourceId(parts);
    if (!valid.ok) {
      return valid;
    }
  }

  const pkg: Result<ResTablePackage> = findPackage(table, packageId);
  if (!pkg.ok) {
    return pkg;
  }
  const packageName: Result<string> = decodeUtf16Name(pkg.value.header.name);
  if (!packageName.ok) {
    return packageName;
  }
  const typeName: Result<string> = lookupTypeName(pkg.value, typeId);
  if (!typeName.ok) {
    return typeName;
  }
  const range: Result<KeyRange> = keyRange(pkg.value, typeId);
  if (!range.ok) {
    return range;
  }

  // entry ids index the type's slice directly
  const sliceLength: number = Math.min(range.value.last, pkg.value.keyStrings.strings.length) - range.value.first;
  if (entryId < 0 || entryId >= sliceLength) {
    return fail('KeyIndexOutOfRange', `Entry id ${hex(entryId)} is outside the ${Math.max(sliceLength, 0)} keys of type ${typeName.value} in ${formatResourceId(compose(parts))}`);
  }
  const key: Result<string> = decodePoolEntry(pkg.value.keyStrings, range.value.first + entryId);
  if (!key.ok) {
    return key;
  }

  return ok({ package: packageName.value, type: typeName.value, key: key.value });
}

export function resolveResourceId(table: ResTable, id: number, options: ResolveOptions = {}): Result<ResolvedName> {
  const { packageId, typeId, entryId }: ResourceIdParts = decompose(id);
  return resolve(table, packageId, typeId, entryId, options);
}

export function listPackages(table: ResTable): Result<PackageSummary[]> {
  const packages: PackageSummary[] = [];
  for (const pkg of table.packages) {
    const name: Result<string> = decodeUtf16Name(pkg.header.name);
    if (!name.ok) {
      return name;
    }
    packages.push({ id: pkg.header.id, name: name.value });
  }
  return ok(packages);
}

export function listTypes(table: ResTable, packageId: number): Result<TypeSummary[]> {
  const pkg: Result<ResTablePackage> = findPackage(table, packageId);
  if (!pkg.ok) {
    return pkg;
  }
  const types: Result<ReadonlyMap<number, string>> = buildTypeTable(pkg.value);
  if (!types.ok) {
    return types;
  }
  const summaries: TypeSummary[] = [];
  for (const [id, name] of types.value) {
    const group: TypeSpecGroup = pkg.value.types[id - 1] ?? [];
    summaries.push({
      id,
      name,
      entryCount: groupEntryCount(group),
      configCount: group.filter((record) => record.kind === 'type').length,
    });
  }
  return ok(summaries);
}

export function listKeys(table: ResTable, packageId: number, typeId: number): Result<KeySummary[]> {
  const pkg: Result<ResTablePackage> = findPackage(table, packageId);
  if (!pkg.ok) {
    return pkg;
  }
  const typeName: Result<string> = lookupTypeName(pkg.value, typeId);
  if (!typeName.ok) {
    return typeName;
  }
  const keys: Result<ReadonlyMap<number, string>> = typeKeys(pkg.value, typeId);
  if (!keys.ok) {
    return keys;
  }
  return ok(
    Array.from(keys.value, ([entryId, key]): KeySummary => ({
      resourceId: compose({ packageId, typeId, entryId }),
      key,
    }))
  );
}
