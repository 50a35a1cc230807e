import type { AccessDirection, SymId } from "../analysis/access.js";
import type { AccessInfo, MetadataStore } from "./store.js";

const EMPTY: ReadonlySet<SymId> = new Set();

export function readers(store: MetadataStore, mem: SymId): ReadonlySet<SymId> {
  return store.get(mem, "readers") ?? EMPTY;
}

export function setReaders(store: MetadataStore, mem: SymId, rds: Iterable<SymId>): void {
  store.put(mem, "readers", new Set(rds));
}

export function writers(store: MetadataStore, mem: SymId): ReadonlySet<SymId> {
  return store.get(mem, "writers") ?? EMPTY;
}

export function setWriters(store: MetadataStore, mem: SymId, wrs: Iterable<SymId>): void {
  store.put(mem, "writers", new Set(wrs));
}

export function resetters(store: MetadataStore, mem: SymId): ReadonlySet<SymId> {
  return store.get(mem, "resetters") ?? EMPTY;
}

export function setResetters(store: MetadataStore, mem: SymId, rst: Iterable<SymId>): void {
  store.put(mem, "resetters", new Set(rst));
}

export function accesses(store: MetadataStore, mem: SymId): Set<SymId> {
  return new Set([...readers(store, mem), ...writers(store, mem)]);
}

export function accessInfo(store: MetadataStore, access: SymId): AccessInfo | undefined {
  return store.get(access, "accessInfo");
}

export interface RegisterAccessOptions {
  width?: number;
  accumulates?: boolean;
}

/** Records `access` as a reader or writer of `mem`. */
export function registerAccess(
  store: MetadataStore,
  mem: SymId,
  access: SymId,
  direction: AccessDirection,
  options: RegisterAccessOptions = {},
): void {
  store.put(access, "accessInfo", {
    memory: mem,
    direction,
    width: options.width ?? 1,
    accumulates: options.accumulates,
  });
  if (direction === "read") {
    setReaders(store, mem, [...readers(store, mem), access]);
  } else {
    setWriters(store, mem, [...writers(store, mem), access]);
  }
}

export function isReader(store: MetadataStore, access: SymId): boolean {
  return accessInfo(store, access)?.direction === "read";
}

export function isWriter(store: MetadataStore, access: SymId): boolean {
  return accessInfo(store, access)?.direction === "write";
}

export function isUnusedMemory(store: MetadataStore, mem: SymId): boolean {
  return store.get(mem, "unusedMemory") ?? false;
}

export function setUnusedMemory(store: MetadataStore, mem: SymId, flag: boolean): void {
  store.put(mem, "unusedMemory", flag);
}
