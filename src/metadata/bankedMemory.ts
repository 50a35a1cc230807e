import type { SymId } from "../analysis/access.js";
import type { Memory } from "../banking/memory.js";
import { InvariantViolationError, MissingMetadataError } from "../errors.js";
import type { MetadataStore } from "./store.js";

/** Buffered writes across pipeline stages were enabled by the user. */
export function isWriteBuffer(store: MetadataStore, mem: SymId): boolean {
  return store.get(mem, "writeBuffer") ?? false;
}

export function setWriteBuffer(store: MetadataStore, mem: SymId, flag: boolean): void {
  store.put(mem, "writeBuffer", flag);
}

/** The memory must never be N-buffered. */
export function isNonBuffer(store: MetadataStore, mem: SymId): boolean {
  return store.get(mem, "nonBuffer") ?? false;
}

export function setNonBuffer(store: MetadataStore, mem: SymId, flag: boolean): void {
  store.put(mem, "nonBuffer", flag);
}

/* Pre-unrolling: one or more physical duplicates per memory */

export function getDuplicates(store: MetadataStore, mem: SymId): readonly Memory[] | undefined {
  return store.get(mem, "duplicates");
}

export function duplicates(store: MetadataStore, mem: SymId): readonly Memory[] {
  const ds = getDuplicates(store, mem);
  if (!ds) {
    throw new MissingMetadataError("duplicates", `No duplicates defined for ${mem}`, { symbol: mem });
  }
  return ds;
}

export function setDuplicates(store: MetadataStore, mem: SymId, ds: readonly Memory[]): void {
  store.put(mem, "duplicates", [...ds]);
}

/* Post banking: padding chosen alongside the banking */

export function getPadding(store: MetadataStore, mem: SymId): readonly number[] | undefined {
  return store.get(mem, "padding");
}

export function padding(store: MetadataStore, mem: SymId): readonly number[] {
  const pad = getPadding(store, mem);
  if (!pad) {
    throw new MissingMetadataError("padding", `No padding defined for ${mem}`, { symbol: mem });
  }
  return pad;
}

export function setPadding(store: MetadataStore, mem: SymId, dims: readonly number[]): void {
  store.put(mem, "padding", [...dims]);
}

/* Post-unrolling: exactly one duplicate per memory */

export function getInstance(store: MetadataStore, mem: SymId): Memory | undefined {
  const ds = getDuplicates(store, mem);
  return ds?.length === 1 ? ds[0] : undefined;
}

export function instance(store: MetadataStore, mem: SymId): Memory {
  const ds = getDuplicates(store, mem);
  if (!ds || ds.length === 0) {
    throw new MissingMetadataError("duplicates", `No instance defined for ${mem}`, { symbol: mem });
  }
  if (ds.length !== 1) {
    throw new InvariantViolationError(`Expected a single instance for ${mem} after unrolling, found ${ds.length}`, {
      symbol: mem,
    });
  }
  return ds[0];
}

export function setInstance(store: MetadataStore, mem: SymId, inst: Memory): void {
  store.put(mem, "duplicates", [inst]);
}

/** Keeps only duplicate `dispatch`, as the unroller does for each copy of the memory it creates. */
export function collapseToInstance(store: MetadataStore, mem: SymId, dispatch: number): Memory {
  const ds = duplicates(store, mem);
  const inst = ds[dispatch];
  if (inst === undefined) {
    throw new MissingMetadataError("duplicates", `No duplicate #${dispatch} defined for ${mem}`, { symbol: mem });
  }
  setInstance(store, mem, inst);
  return inst;
}
