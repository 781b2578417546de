/**
 * Location of a type's keys inside the package-wide key-name pool.
 *
 * Keys are laid out contiguously in ascending type id order, so the slice for
 * type T starts after the entries of every type before it.
 */
import type { ResTablePackage, TypeSpecGroup, TypeSpecRecord } from './types/res-table.js';
import { fail, ok, type KeyRange, type Result } from './types/resolution.js';
import { decodePoolString, poolEncoding, type PoolEncoding } from './utils/pool-string.js';

/**
 * Entry count declared by a group's primary record.
 */
export function groupEntryCount(group: TypeSpecGroup): number {
  const primary: TypeSpecRecord | undefined = group[0];
  return primary ? primary.header.entryCount : 0;
}

export function keyRange(pkg: ResTablePackage, typeId: number): Result<KeyRange> {
  if (!Number.isInteger(typeId) || typeId < 1) {
    return fail('InvalidType', `Minimum type id is 1, ${typeId} given`);
  }
  if (typeId > pkg.types.length) {
    return fail('TypeNotFound', `Type id ${typeId} has no type spec in package 0x${pkg.header.id.toString(16)}`);
  }
  let first = 0;
  for (const group of pkg.types.slice(0, typeId - 1)) {
    first += groupEntryCount(group);
  }
  return ok({ first, last: first + groupEntryCount(pkg.types[typeId - 1]) });
}

/**
 * Decodes every key of a type. Map keys are positions within the type's
 * slice, which is how entry ids index it.
 */
export function typeKeys(pkg: ResTablePackage, typeId: number): Result<ReadonlyMap<number, string>> {
  const range: Result<KeyRange> = keyRange(pkg, typeId);
  if (!range.ok) {
    return range;
  }
  const encoding: PoolEncoding = poolEncoding(pkg.keyStrings);
  const keys = new Map<number, string>();
  const slice: readonly Buffer[] = pkg.keyStrings.strings.slice(range.value.first, range.value.last);
  for (const [index, raw] of slice.entries()) {
    const key: Result<string> = decodePoolString(raw, encoding);
    if (!key.ok) {
      return key;
    }
    keys.set(index, key.value);
  }
  return ok(keys);
}
