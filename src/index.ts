/**
 * arsc-resolver - Main entry point
 *
 * Resolves 32-bit Android resource ids to package, type and key names using a
 * compiled resources.arsc table.
 */

// Table decoding
export { ArscBinary } from './arsc-binary.js';

// Resolution
export { resolve, resolveResourceId, findPackage, listPackages, listTypes, listKeys } from './resolver.js';
export { buildTypeTable } from './type-table.js';
export { keyRange, typeKeys } from './key-range.js';
export { decompose, compose, parseResourceId, formatResourceId, validateResourceId } from './resource-id.js';
export { decodePoolString, decodeUtf16Name, poolEncoding } from './utils/pool-string.js';
export type { PoolEncoding } from './utils/pool-string.js';
export { formatResolvedName, isOutputFormat, OUTPUT_FORMATS } from './format.js';
export type { OutputFormat } from './format.js';

// Types
export { ResolutionError, unwrap } from './types/resolution.js';
export type { Result, ResolutionErrorKind, ResolvedName, KeyRange, PackageSummary, TypeSummary, KeySummary, ResolveOptions } from './types/resolution.js';
export type { ResourceIdParts } from './types/resource-id.js';
export type { ResTable, ResTablePackage, StringPool, TypeSpecGroup, TypeSpecRecord } from './types/res-table.js';
