/**
 * Result and error types for resource name resolution.
 */

export type ResolutionErrorKind =
  | 'MalformedIdentifier'
  | 'PackageNotFound'
  | 'TypeNotFound'
  | 'InvalidType'
  | 'KeyIndexOutOfRange'
  | 'StringDecodeError';

export class ResolutionError extends Error {
  constructor(public readonly kind: ResolutionErrorKind, message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'ResolutionError';
  }
}

export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: ResolutionError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(kind: ResolutionErrorKind, message: string, cause?: unknown): Result<T> {
  return { ok: false, error: new ResolutionError(kind, message, cause) };
}

/**
 * Returns the value of a successful result or throws its error.
 */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

/** Fully-qualified name of one resource. */
export interface ResolvedName {
  readonly package: string;
  readonly type: string;
  readonly key: string;
}

/** Half-open slice [first, last) of a package's key-name pool. */
export interface KeyRange {
  readonly first: number;
  readonly last: number;
}

export interface PackageSummary {
  readonly id: number;
  readonly name: string;
}

export interface TypeSummary {
  readonly id: number;
  readonly name: string;
  /** Entry count declared by the primary record; 0 when the type has no group. */
  readonly entryCount: number;
  /** Number of configuration variants (type chunks) in the group. */
  readonly configCount: number;
}

export interface KeySummary {
  readonly resourceId: number;
  readonly key: string;
}

export interface ResolveOptions {
  /** Reject package id 0 and type id 0 as MalformedIdentifier. */
  readonly strict?: boolean;
}
