/**
 * Decoding of string pool entries.
 *
 * Entries keep their on-disk envelope: a length prefix, the payload and a
 * terminator. The declared length is read from the prefix rather than assumed,
 * so long strings with two-field prefixes decode correctly.
 */
import { UTF8_FLAG } from '../constants/chunk-types.js';
import type { StringPool } from '../types/res-table.js';
import { fail, ok, type Result } from '../types/resolution.js';

export type PoolEncoding = 'utf8' | 'utf16';

interface LengthField {
  readonly value: number;
  readonly size: number;
}

interface PayloadBounds {
  readonly start: number;
  readonly end: number;
  readonly terminatorSize: number;
}

const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
const utf16Decoder = new TextDecoder('utf-16le', { fatal: true, ignoreBOM: true });

export function poolEncoding(pool: StringPool): PoolEncoding {
  return (pool.header.flags & UTF8_FLAG) !== 0 ? 'utf8' : 'utf16';
}

function readUtf8Length(buffer: Buffer, offset: number): LengthField | null {
  if (offset >= buffer.length) {
    return null;
  }
  const first: number = buffer[offset];
  if ((first & 0x80) === 0) {
    return { value: first, size: 1 };
  }
  if (offset + 1 >= buffer.length) {
    return null;
  }
  return { value: ((first & 0x7f) << 8) | buffer[offset + 1], size: 2 };
}

function readUtf16Length(buffer: Buffer, offset: number): LengthField | null {
  if (offset + 2 > buffer.length) {
    return null;
  }
  const first: number = buffer.readUInt16LE(offset);
  if ((first & 0x8000) === 0) {
    return { value: first, size: 2 };
  }
  if (offset + 4 > buffer.length) {
    return null;
  }
  return { value: ((first & 0x7fff) << 16) | buffer.readUInt16LE(offset + 2), size: 4 };
}

function payloadBounds(buffer: Buffer, offset: number, encoding: PoolEncoding): PayloadBounds | null {
  if (encoding === 'utf8') {
    // character count, then byte count
    const chars: LengthField | null = readUtf8Length(buffer, offset);
    if (!chars) {
      return null;
    }
    const bytes: LengthField | null = readUtf8Length(buffer, offset + chars.size);
    if (!bytes) {
      return null;
    }
    const start: number = offset + chars.size + bytes.size;
    return { start, end: start + bytes.value, terminatorSize: 1 };
  }
  const units: LengthField | null = readUtf16Length(buffer, offset);
  if (!units) {
    return null;
  }
  const start: number = offset + units.size;
  return { start, end: start + units.value * 2, terminatorSize: 2 };
}

/**
 * Measures the envelope of the entry starting at `offset`.
 * @returns Byte length including prefix and terminator, or null if the prefix is truncated
 */
export function measurePoolEntry(buffer: Buffer, offset: number, encoding: PoolEncoding): number | null {
  const bounds: PayloadBounds | null = payloadBounds(buffer, offset, encoding);
  return bounds ? bounds.end + bounds.terminatorSize - offset : null;
}

function trimNul(text: string): string {
  return text.replace(/^\0+|\0+$/g, '');
}

/**
 * Decodes one raw pool entry into text.
 */
export function decodePoolString(rawEntry: Buffer, encoding: PoolEncoding): Result<string> {
  const bounds: PayloadBounds | null = payloadBounds(rawEntry, 0, encoding);
  if (!bounds) {
    return fail('StringDecodeError', `String entry of ${rawEntry.length} bytes is shorter than its length prefix`);
  }
  if (bounds.end > rawEntry.length) {
    return fail('StringDecodeError', `String entry declares ${bounds.end - bounds.start} payload bytes but holds ${rawEntry.length - bounds.start}`);
  }
  const payload: Buffer = rawEntry.subarray(bounds.start, bounds.end);
  try {
    const decoder = encoding === 'utf8' ? utf8Decoder : utf16Decoder;
    return ok(trimNul(decoder.decode(payload)));
  } catch (error) {
    return fail('StringDecodeError', `String entry is not valid ${encoding === 'utf8' ? 'UTF-8' : 'UTF-16LE'}`, error);
  }
}

/**
 * Decodes the entry at `index` of a pool using the pool's declared encoding.
 */
export function decodePoolEntry(pool: StringPool, index: number): Result<string> {
  if (!Number.isInteger(index) || index < 0 || index >= pool.strings.length) {
    return fail('KeyIndexOutOfRange', `String index ${index} is outside pool of ${pool.strings.length} entries`);
  }
  return decodePoolString(pool.strings[index], poolEncoding(pool));
}

/**
 * Decodes a fixed-width UTF-16LE field up to its first NUL code unit.
 */
export function decodeUtf16Name(field: Buffer): Result<string> {
  let end = -1;
  for (let i = 0; i + 1 < field.length; i += 2) {
    if (field[i] === 0 && field[i + 1] === 0) {
      end = i;
      break;
    }
  }
  if (end < 0) {
    return fail('StringDecodeError', 'NUL terminator not found in UTF-16 name field');
  }
  try {
    return ok(utf16Decoder.decode(field.subarray(0, end)));
  } catch (error) {
    return fail('StringDecodeError', 'Name field is not valid UTF-16LE', error);
  }
}
