/**
 * Type id to type name mapping for a package.
 */
import type { ResTablePackage } from './types/res-table.js';
import { ok, type Result } from './types/resolution.js';
import { decodePoolString, poolEncoding, type PoolEncoding } from './utils/pool-string.js';

/**
 * Builds the 1-based type table: entry i of the type-name pool names type id i + 1.
 */
export function buildTypeTable(pkg: ResTablePackage): Result<ReadonlyMap<number, string>> {
  const encoding: PoolEncoding = poolEncoding(pkg.typeStrings);
  const table = new Map<number, string>();
  for (const [index, raw] of pkg.typeStrings.strings.entries()) {
    const name: Result<string> = decodePoolString(raw, encoding);
    if (!name.ok) {
      return name;
    }
    table.set(index + 1, name.value);
  }
  return ok(table);
}
