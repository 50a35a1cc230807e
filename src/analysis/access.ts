import { formatUid } from "../errors.js";

export type SymId = string;
export type ScopeId = string;

/**
 * One concrete unrolled access to a memory, as produced by access-pattern
 * analysis. The matrix is carried for reporting only; identity is the object.
 */
export interface AccessMatrix {
  access: SymId;
  memory: SymId;
  /** Unroll ids of every iterator surrounding the access, outermost first. */
  unroll: readonly number[];
  scope: ScopeId;
  /** Number of words moved per cycle. */
  width: number;
  matrix: readonly (readonly number[])[];
  /** Constant address component; accesses with the same symbol and offset may share a port. */
  offset?: readonly number[];
}

export type AccessDirection = "read" | "write";

export function accessKey(matrix: Pick<AccessMatrix, "access" | "unroll">): string {
  return `${matrix.access}${formatUid(matrix.unroll)}`;
}

export function uidKey(uid: readonly number[]): string {
  return uid.join(",");
}

export function compareUid(a: readonly number[], b: readonly number[]): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i += 1) {
    if (a[i] !== b[i]) {
      return a[i] - b[i];
    }
  }
  return a.length - b.length;
}

export function compareAccess(a: AccessMatrix, b: AccessMatrix): number {
  if (a.access !== b.access) {
    return a.access < b.access ? -1 : 1;
  }
  return compareUid(a.unroll, b.unroll);
}

export function sameOffset(a: AccessMatrix, b: AccessMatrix): boolean {
  if (!a.offset || !b.offset || a.offset.length !== b.offset.length) {
    return false;
  }
  const other = b.offset;
  return a.offset.every((value, i) => value === other[i]);
}
