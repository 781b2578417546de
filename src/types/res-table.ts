/**
 * Decoded view of a compiled Android resource table (resources.arsc).
 * Buffers are slices of the file buffer; nothing here is mutated after decoding.
 */

export interface ChunkHeader {
  readonly type: number;
  readonly headerSize: number;
  readonly size: number;
}

export interface StringPoolHeader {
  readonly stringCount: number;
  readonly styleCount: number;
  readonly flags: number;
  readonly stringsStart: number;
  readonly stylesStart: number;
}

/**
 * String pool with each entry kept as its raw envelope
 * (length prefix, payload and terminator).
 */
export interface StringPool {
  readonly header: StringPoolHeader;
  readonly strings: readonly Buffer[];
}

export interface PackageHeader {
  readonly id: number;
  /** 256-byte UTF-16LE field, NUL-padded. */
  readonly name: Buffer;
  /** Offset of the type-name pool from the package start. */
  readonly typeStrings: number;
  /** Offset of the key-name pool from the package start. */
  readonly keyStrings: number;
}

export interface TypeSpecHeader {
  readonly id: number;
  readonly entryCount: number;
}

export interface TypeHeader {
  readonly id: number;
  readonly entryCount: number;
}

export interface TypeSpecChunk {
  readonly kind: 'typeSpec';
  readonly header: TypeSpecHeader;
}

export interface TypeChunk {
  readonly kind: 'type';
  readonly header: TypeHeader;
}

/** Any record of a type group; every variant declares an entry count. */
export type TypeSpecRecord = TypeSpecChunk | TypeChunk;

/**
 * All records for one type id, in file order. The first record is the
 * primary one (the type spec in a well-formed table).
 */
export type TypeSpecGroup = readonly TypeSpecRecord[];

export interface ResTablePackage {
  readonly header: PackageHeader;
  readonly typeStrings: StringPool;
  readonly keyStrings: StringPool;
  /** Groups ordered by type id: index 0 holds type id 1. */
  readonly types: readonly TypeSpecGroup[];
}

export interface ResTable {
  readonly filePath: string;
  readonly sha256: string;
  readonly totalSize: number;
  readonly declaredPackageCount: number;
  readonly globalStrings: StringPool;
  readonly packages: readonly ResTablePackage[];
}
