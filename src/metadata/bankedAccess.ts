import { SymId, uidKey } from "../analysis/access.js";
import type { Port } from "../analysis/port.js";
import type { Memory } from "../banking/memory.js";
import {
  InvariantViolationError,
  MissingMetadataError,
  Result,
  err,
  formatUid,
  ok,
  unwrap,
} from "../errors.js";
import { accessInfo } from "./accessOps.js";
import { duplicates } from "./bankedMemory.js";
import type { DispatchEntry, DispatchTable, MetadataStore, PortEntry, PortTable } from "./store.js";

const EMPTY_DISPATCH: DispatchTable = new Map();

/* Dispatch: unrolled instance id -> physical duplicates */

export function getDispatches(store: MetadataStore, access: SymId): DispatchTable | undefined {
  return store.get(access, "dispatch");
}

export function dispatches(store: MetadataStore, access: SymId): DispatchTable {
  return getDispatches(store, access) ?? EMPTY_DISPATCH;
}

export function setDispatches(store: MetadataStore, access: SymId, table: Iterable<[readonly number[], Iterable<number>]>): void {
  const next = new Map<string, DispatchEntry>();
  for (const [uid, ds] of table) {
    next.set(uidKey(uid), { uid: [...uid], dispatch: new Set(ds) });
  }
  store.put(access, "dispatch", next);
}

export function getDispatch(store: MetadataStore, access: SymId, uid: readonly number[]): ReadonlySet<number> | undefined {
  return getDispatches(store, access)?.get(uidKey(uid))?.dispatch;
}

export function dispatch(store: MetadataStore, access: SymId, uid: readonly number[]): ReadonlySet<number> {
  const ds = getDispatch(store, access, uid);
  if (!ds) {
    throw new MissingMetadataError("dispatch", `No dispatch defined for ${access} ${formatUid(uid)}`, {
      symbol: access,
      uid,
    });
  }
  return ds;
}

export function addDispatch(store: MetadataStore, access: SymId, uid: readonly number[], d: number): void {
  const current = dispatches(store, access);
  const key = uidKey(uid);
  const existing = current.get(key)?.dispatch;
  const next = new Map<string, DispatchEntry>(current);
  next.set(key, { uid: [...uid], dispatch: new Set([...(existing ?? []), d]) });
  store.put(access, "dispatch", next);
}

/**
 * Resolves an unrolled access to the duplicates it targets. Readers may use
 * at most one duplicate; writers must reach at least one and may broadcast.
 */
export function tryDispatch(store: MetadataStore, access: SymId, uid: readonly number[]): Result<ReadonlySet<number>> {
  const ds = getDispatch(store, access, uid);
  const context = { symbol: access, uid };
  if (!ds) {
    return err(new MissingMetadataError("dispatch", `No dispatch defined for ${access} ${formatUid(uid)}`, context));
  }
  const direction = accessInfo(store, access)?.direction;
  if (direction === "read" && ds.size > 1) {
    return err(
      new InvariantViolationError(
        `Reader ${access} ${formatUid(uid)} dispatched to multiple duplicates {${[...ds].join(",")}}`,
        context,
      ),
    );
  }
  if (direction === "write" && ds.size === 0) {
    return err(new InvariantViolationError(`Writer ${access} ${formatUid(uid)} is not dispatched to any duplicate`, context));
  }
  return ok(ds);
}

export function resolveDispatch(store: MetadataStore, access: SymId, uid: readonly number[]): ReadonlySet<number> {
  return unwrap(tryDispatch(store, access, uid));
}

/** The single duplicate an unrolled reader uses. */
export function readerDispatch(store: MetadataStore, access: SymId, uid: readonly number[]): number {
  const [d] = resolveDispatch(store, access, uid);
  if (d === undefined) {
    throw new InvariantViolationError(`Reader ${access} ${formatUid(uid)} is not dispatched to any duplicate`, {
      symbol: access,
      uid,
    });
  }
  return d;
}

/** Physical duplicates of the accessed memory targeted by one unrolled access. */
export function dispatchedMemories(store: MetadataStore, access: SymId, uid: readonly number[]): Memory[] {
  const info = accessInfo(store, access);
  if (!info) {
    throw new MissingMetadataError("accessInfo", `No memory recorded for access ${access}`, { symbol: access, uid });
  }
  const ds = duplicates(store, info.memory);
  return [...resolveDispatch(store, access, uid)].sort((a, b) => a - b).map((d) => {
    const memory = ds[d];
    if (memory === undefined) {
      throw new InvariantViolationError(
        `Access ${access} ${formatUid(uid)} dispatched to duplicate #${d} but ${info.memory} has ${ds.length}`,
        { symbol: access, uid },
      );
    }
    return memory;
  });
}

/* Ports: dispatch -> unrolled instance id -> port */

export function getPorts(store: MetadataStore, access: SymId): PortTable | undefined {
  return store.get(access, "ports");
}

export function getPortsOn(store: MetadataStore, access: SymId, d: number): ReadonlyMap<string, PortEntry> | undefined {
  return getPorts(store, access)?.get(d);
}

export function ports(store: MetadataStore, access: SymId, d: number): ReadonlyMap<string, PortEntry> {
  const table = getPortsOn(store, access, d);
  if (!table) {
    throw new MissingMetadataError("ports", `No ports defined for ${access} on dispatch #${d}`, { symbol: access });
  }
  return table;
}

export function addPort(store: MetadataStore, access: SymId, d: number, uid: readonly number[], port: Port): void {
  const current: PortTable = getPorts(store, access) ?? new Map();
  const onDispatch = new Map<string, PortEntry>(current.get(d) ?? []);
  onDispatch.set(uidKey(uid), { uid: [...uid], port });
  const next = new Map<number, ReadonlyMap<string, PortEntry>>(current);
  next.set(d, onDispatch);
  store.put(access, "ports", next);
}

export function getPort(store: MetadataStore, access: SymId, d: number, uid: readonly number[]): Port | undefined {
  return getPortsOn(store, access, d)?.get(uidKey(uid))?.port;
}

export function port(store: MetadataStore, access: SymId, d: number, uid: readonly number[]): Port {
  const found = getPort(store, access, d, uid);
  if (!found) {
    throw new MissingMetadataError("ports", `No ports defined for ${access} ${formatUid(uid)}`, { symbol: access, uid });
  }
  return found;
}
