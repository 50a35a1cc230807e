import type { SymId } from "../analysis/access.js";
import { AccumType, ReduceFunction } from "../banking/accumulation.js";
import type { FmaReduceInfo, MetadataStore } from "./store.js";

export function accumType(store: MetadataStore, sym: SymId): AccumType {
  return store.get(sym, "accumType") ?? AccumType.Unknown;
}

export function setAccumType(store: MetadataStore, sym: SymId, tp: AccumType): void {
  store.put(sym, "accumType", tp);
}

export function reduceType(store: MetadataStore, sym: SymId): ReduceFunction | undefined {
  return store.get(sym, "reduceType");
}

export function setReduceType(store: MetadataStore, sym: SymId, fn: ReduceFunction | undefined): void {
  if (fn !== undefined) {
    store.put(sym, "reduceType", fn);
  }
}

export function fmaReduceInfo(store: MetadataStore, sym: SymId): FmaReduceInfo | undefined {
  return store.get(sym, "fmaReduce");
}

export function setFmaReduceInfo(store: MetadataStore, sym: SymId, info: FmaReduceInfo | undefined): void {
  if (info !== undefined) {
    store.put(sym, "fmaReduce", info);
  }
}
