/**
 * Bit-level helpers for 32-bit resource identifiers (0xPPTTEEEE).
 */
import type { ResourceIdParts } from './types/resource-id.js';
import { fail, ok, type Result } from './types/resolution.js';

const MAX_RESOURCE_ID = 0xffffffff;

export function decompose(id: number): ResourceIdParts {
  return {
    packageId: (id >>> 24) & 0xff,
    typeId: (id >>> 16) & 0xff,
    entryId: id & 0xffff,
  };
}

export function compose({ packageId, typeId, entryId }: ResourceIdParts): number {
  return (((packageId & 0xff) << 24) | ((typeId & 0xff) << 16) | (entryId & 0xffff)) >>> 0;
}

const INTEGER_LITERAL = /^(?:0[xX](?:_?[0-9a-fA-F])+|0[oO](?:_?[0-7])+|0[bB](?:_?[01])+|[1-9](?:_?\d)*|0(?:_?0)*)$/;

/**
 * Parses an integer literal the way resource ids appear in logs and bytecode:
 * `0x7f010000`, `0o…`, `0b…` or decimal, with single `_` digit separators.
 * Decimal literals other than zero take no leading zeros.
 * @throws {RangeError} If the text is not an integer in the unsigned 32-bit range
 */
export function parseResourceId(text: string): number {
  const trimmed: string = text.trim();
  if (!INTEGER_LITERAL.test(trimmed)) {
    throw new RangeError(`Invalid resource id: "${text}"`);
  }
  const value: number = Number(trimmed.replace(/_/g, ''));
  if (!Number.isSafeInteger(value) || value > MAX_RESOURCE_ID) {
    throw new RangeError(`Resource id out of 32-bit range: "${text}"`);
  }
  return value;
}

export function formatResourceId(id: number): string {
  return `0x${(id >>> 0).toString(16).padStart(8, '0')}`;
}

/**
 * Rejects the reserved package id 0 and type id 0.
 */
export function validateResourceId(parts: ResourceIdParts): Result<ResourceIdParts> {
  if (parts.packageId === 0) {
    return fail('MalformedIdentifier', `Package id 0 is reserved in ${formatResourceId(compose(parts))}`);
  }
  if (parts.typeId === 0) {
    return fail('MalformedIdentifier', `Type id 0 is invalid in ${formatResourceId(compose(parts))}`);
  }
  return ok(parts);
}
