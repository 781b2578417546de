/**
 * Components of a 32-bit Android resource identifier (0xPPTTEEEE).
 */
export interface ResourceIdParts {
  readonly packageId: number;
  readonly typeId: number;
  readonly entryId: number;
}
