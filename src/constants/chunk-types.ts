/** Chunk type identifiers used by compiled resource tables. */
export const RES_STRING_POOL_TYPE = 0x0001;
export const RES_TABLE_TYPE = 0x0002;
export const RES_TABLE_PACKAGE_TYPE = 0x0200;
export const RES_TABLE_TYPE_TYPE = 0x0201;
export const RES_TABLE_TYPE_SPEC_TYPE = 0x0202;

export const CHUNK_HEADER_SIZE = 8;
export const TABLE_HEADER_SIZE = 12;
export const STRING_POOL_HEADER_SIZE = 28;
/** Package header up to lastPublicKey; newer tables append typeIdOffset. */
export const PACKAGE_HEADER_MIN_SIZE = 284;
export const PACKAGE_HEADER_SIZE = 288;
export const PACKAGE_NAME_SIZE = 256;
export const TYPE_SPEC_HEADER_SIZE = 16;
export const TYPE_HEADER_MIN_SIZE = 20;

/** String pool flag: entries are UTF-8 rather than UTF-16. */
export const UTF8_FLAG = 0x100;
