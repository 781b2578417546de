/**
 * Binary decoder for compiled Android resource tables (resources.arsc).
 */
import { readFile } from 'node:fs/promises';
import { createHash } from 'node:crypto';
import {
  CHUNK_HEADER_SIZE,
  PACKAGE_HEADER_MIN_SIZE,
  PACKAGE_NAME_SIZE,
  RES_STRING_POOL_TYPE,
  RES_TABLE_PACKAGE_TYPE,
  RES_TABLE_TYPE,
  RES_TABLE_TYPE_SPEC_TYPE,
  RES_TABLE_TYPE_TYPE,
  STRING_POOL_HEADER_SIZE,
  TABLE_HEADER_SIZE,
  TYPE_HEADER_MIN_SIZE,
  TYPE_SPEC_HEADER_SIZE,
  UTF8_FLAG,
} from './constants/chunk-types.js';
import type {
  ChunkHeader,
  PackageHeader,
  ResTable,
  ResTablePackage,
  StringPool,
  TypeChunk,
  TypeSpecChunk,
  TypeSpecRecord,
} from './types/res-table.js';
import { measurePoolEntry, type PoolEncoding } from './utils/pool-string.js';

class ArscBinaryError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'ArscBinaryError';
  }
}

const EMPTY_POOL: StringPool = {
  header: { stringCount: 0, styleCount: 0, flags: 0, stringsStart: 0, stylesStart: 0 },
  strings: [],
};

function hex(value: number): string {
  return `0x${value.toString(16).padStart(4, '0')}`;
}

/**
 * Reads a chunk header and checks that the whole chunk lies before `end`.
 * @throws {ArscBinaryError} If the header or chunk body is truncated
 */
function readChunkHeader(buffer: Buffer, offset: number, end: number): ChunkHeader {
  if (offset + CHUNK_HEADER_SIZE > end) {
    throw new ArscBinaryError(`Chunk header at offset ${offset} extends beyond its parent (end ${end})`);
  }
  const type: number = buffer.readUInt16LE(offset);
  const headerSize: number = buffer.readUInt16LE(offset + 2);
  const size: number = buffer.readUInt32LE(offset + 4);
  if (headerSize < CHUNK_HEADER_SIZE || size < headerSize) {
    throw new ArscBinaryError(`Chunk ${hex(type)} at offset ${offset} has invalid sizes: header=${headerSize}, size=${size}`);
  }
  if (offset + size > end) {
    throw new ArscBinaryError(`Chunk ${hex(type)} at offset ${offset} extends beyond its parent: size=${size}, end=${end}`);
  }
  return { type, headerSize, size };
}

function expectChunk(chunk: ChunkHeader, type: number, minHeaderSize: number, offset: number): void {
  if (chunk.type !== type) {
    throw new ArscBinaryError(`Expected chunk ${hex(type)} at offset ${offset}, found ${hex(chunk.type)}`);
  }
  if (chunk.headerSize < minHeaderSize) {
    throw new ArscBinaryError(`Chunk ${hex(type)} at offset ${offset} has a ${chunk.headerSize}-byte header, expected at least ${minHeaderSize}`);
  }
}

/**
 * Parses a string pool chunk, slicing every string as its full envelope.
 */
function parseStringPool(buffer: Buffer, offset: number, end: number): StringPool {
  const chunk: ChunkHeader = readChunkHeader(buffer, offset, end);
  expectChunk(chunk, RES_STRING_POOL_TYPE, STRING_POOL_HEADER_SIZE, offset);
  const header = {
    stringCount: buffer.readUInt32LE(offset + 8),
    styleCount: buffer.readUInt32LE(offset + 12),
    flags: buffer.readUInt32LE(offset + 16),
    stringsStart: buffer.readUInt32LE(offset + 20),
    stylesStart: buffer.readUInt32LE(offset + 24),
  };
  const chunkEnd: number = offset + chunk.size;
  const offsetsStart: number = offset + chunk.headerSize;
  if (offsetsStart + header.stringCount * 4 > chunkEnd) {
    throw new ArscBinaryError(`String pool at offset ${offset} declares ${header.stringCount} strings but its offset table does not fit`);
  }

  const encoding: PoolEncoding = (header.flags & UTF8_FLAG) !== 0 ? 'utf8' : 'utf16';
  const stringsBase: number = offset + header.stringsStart;
  const stringsEnd: number = header.styleCount > 0 && header.stylesStart > header.stringsStart ? offset + header.stylesStart : chunkEnd;
  // bound measurement to the strings region
  const region: Buffer = buffer.subarray(0, stringsEnd);
  const strings: Buffer[] = [];
  for (let i = 0; i < header.stringCount; i++) {
    const entryOffset: number = stringsBase + buffer.readUInt32LE(offsetsStart + i * 4);
    const length: number | null = measurePoolEntry(region, entryOffset, encoding);
    if (length === null || entryOffset + length > stringsEnd) {
      throw new ArscBinaryError(`String ${i} of pool at offset ${offset} extends beyond the pool's string data`);
    }
    strings.push(buffer.subarray(entryOffset, entryOffset + length));
  }
  return { header, strings };
}

function parseTypeSpec(buffer: Buffer, offset: number, chunk: ChunkHeader): TypeSpecChunk {
  expectChunk(chunk, RES_TABLE_TYPE_SPEC_TYPE, TYPE_SPEC_HEADER_SIZE, offset);
  return {
    kind: 'typeSpec',
    header: {
      id: buffer.readUInt8(offset + 8),
      entryCount: buffer.readUInt32LE(offset + 12),
    },
  };
}

function parseType(buffer: Buffer, offset: number, chunk: ChunkHeader): TypeChunk {
  expectChunk(chunk, RES_TABLE_TYPE_TYPE, TYPE_HEADER_MIN_SIZE, offset);
  return {
    kind: 'type',
    header: {
      id: buffer.readUInt8(offset + 8),
      entryCount: buffer.readUInt32LE(offset + 12),
    },
  };
}

/**
 * Groups type spec and type chunks by type id, in file order.
 * A type spec opens a new group; type chunks join the open group of the same id.
 */
function parseTypeGroups(buffer: Buffer, start: number, end: number): TypeSpecRecord[][] {
  const groups: TypeSpecRecord[][] = [];
  let current: TypeSpecRecord[] | null = null;
  let cursor: number = start;
  while (cursor < end) {
    const chunk: ChunkHeader = readChunkHeader(buffer, cursor, end);
    if (chunk.type === RES_TABLE_TYPE_SPEC_TYPE) {
      current = [parseTypeSpec(buffer, cursor, chunk)];
      groups.push(current);
    } else if (chunk.type === RES_TABLE_TYPE_TYPE) {
      const record: TypeChunk = parseType(buffer, cursor, chunk);
      if (current === null || current[0].header.id !== record.header.id) {
        current = [record];
        groups.push(current);
      } else {
        current.push(record);
      }
    }
    cursor += chunk.size;
  }
  return groups;
}

function parsePackage(buffer: Buffer, offset: number, end: number): ResTablePackage {
  const chunk: ChunkHeader = readChunkHeader(buffer, offset, end);
  expectChunk(chunk, RES_TABLE_PACKAGE_TYPE, PACKAGE_HEADER_MIN_SIZE, offset);
  const nameOffset: number = offset + 12;
  const header: PackageHeader = {
    id: buffer.readUInt32LE(offset + 8),
    name: buffer.subarray(nameOffset, nameOffset + PACKAGE_NAME_SIZE),
    typeStrings: buffer.readUInt32LE(offset + 268),
    keyStrings: buffer.readUInt32LE(offset + 276),
  };
  const packageEnd: number = offset + chunk.size;
  return {
    header,
    typeStrings: parseStringPool(buffer, offset + header.typeStrings, packageEnd),
    keyStrings: parseStringPool(buffer, offset + header.keyStrings, packageEnd),
    types: parseTypeGroups(buffer, offset + chunk.headerSize, packageEnd),
  };
}

/**
 * Builds the decoded table from a file buffer.
 *
 * @param buffer - Whole file contents
 * @param filePath - Source path, kept on the result and used in error messages
 */
function buildTable(buffer: Buffer, filePath: string): ResTable {
  if (buffer.length < TABLE_HEADER_SIZE) {
    throw new ArscBinaryError(`File too small to be a resource table: ${filePath}`);
  }
  const chunk: ChunkHeader = readChunkHeader(buffer, 0, buffer.length);
  if (chunk.type !== RES_TABLE_TYPE || chunk.headerSize < TABLE_HEADER_SIZE) {
    throw new ArscBinaryError(`Invalid resource table header in ${filePath}`);
  }
  const declaredPackageCount: number = buffer.readUInt32LE(8);

  let globalStrings: StringPool | null = null;
  const packages: ResTablePackage[] = [];
  let cursor: number = chunk.headerSize;
  while (cursor < chunk.size) {
    const child: ChunkHeader = readChunkHeader(buffer, cursor, chunk.size);
    if (child.type === RES_STRING_POOL_TYPE && globalStrings === null) {
      globalStrings = parseStringPool(buffer, cursor, chunk.size);
    } else if (child.type === RES_TABLE_PACKAGE_TYPE) {
      packages.push(parsePackage(buffer, cursor, chunk.size));
    }
    cursor += child.size;
  }

  if (packages.length !== declaredPackageCount) {
    console.warn(`Table declares ${declaredPackageCount} packages but contains ${packages.length}: ${filePath}`);
  }

  return {
    filePath,
    sha256: createHash('sha256').update(buffer).digest('hex'),
    totalSize: buffer.length,
    declaredPackageCount,
    globalStrings: globalStrings ?? EMPTY_POOL,
    packages,
  };
}

/**
 * Resource table (resources.arsc) decoding utilities.
 */
export class ArscBinary {
  /** Error class for malformed tables. */
  static readonly Error: typeof ArscBinaryError = ArscBinaryError;

  /**
   * Reads and decodes a resource table from disk.
   *
   * @throws {ArscBinaryError} If the file is not a well-formed resource table
   */
  static async read({ filePath }: { readonly filePath: string }): Promise<ResTable> {
    let buffer: Buffer;
    try {
      buffer = await readFile(filePath);
    } catch (error) {
      throw new ArscBinaryError(`Cannot read resource table ${filePath}: ${error instanceof Error ? error.message : String(error)}`, error);
    }
    return buildTable(buffer, filePath);
  }

  /**
   * Decodes a resource table already held in memory.
   */
  static parse({ buffer, filePath = '<buffer>' }: { readonly buffer: Buffer; readonly filePath?: string }): ResTable {
    return buildTable(buffer, filePath);
  }
}
