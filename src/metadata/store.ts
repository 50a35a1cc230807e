import type { ReduceFunction, AccumType } from "../banking/accumulation.js";
import type { Memory } from "../banking/memory.js";
import type { AccessDirection, SymId } from "../analysis/access.js";
import type { Port } from "../analysis/port.js";

export type MemoryKind =
  | "SRAM"
  | "RegFile"
  | "Reg"
  | "FIFO"
  | "LIFO"
  | "LUT"
  | "DRAM"
  | "StreamIn"
  | "StreamOut"
  | "ArgIn"
  | "ArgOut"
  | "HostIO";

/** Static shape of a memory allocation or alias. Undefined dims are not compile-time constants. */
export interface MemoryDecl {
  kind: MemoryKind;
  dims: readonly (number | undefined)[];
  /** Set for aliases: the memory whose storage this one views. */
  aliasOf?: SymId;
  /** Explicit initial contents (register files, LUTs). */
  initialValues?: boolean;
}

export interface AccessInfo {
  memory: SymId;
  direction: AccessDirection;
  width: number;
  /** Writes that fold into a register accumulator. */
  accumulates?: boolean;
}

export interface FmaReduceInfo {
  mul1: SymId;
  mul2: SymId;
  accumulator: SymId;
  fma: SymId;
  latency: number;
}

export interface DispatchEntry {
  uid: readonly number[];
  dispatch: ReadonlySet<number>;
}

/** Keyed by `uidKey(uid)`. */
export type DispatchTable = ReadonlyMap<string, DispatchEntry>;

export interface PortEntry {
  uid: readonly number[];
  port: Port;
}

/** Dispatch index, then `uidKey(uid)`. */
export type PortTable = ReadonlyMap<number, ReadonlyMap<string, PortEntry>>;

export interface MetadataSlots {
  decl: MemoryDecl;
  duplicates: readonly Memory[];
  padding: readonly number[];
  dispatch: DispatchTable;
  ports: PortTable;
  readers: ReadonlySet<SymId>;
  writers: ReadonlySet<SymId>;
  resetters: ReadonlySet<SymId>;
  accessInfo: AccessInfo;
  accumType: AccumType;
  reduceType: ReduceFunction;
  fmaReduce: FmaReduceInfo;
  writeBuffer: boolean;
  nonBuffer: boolean;
  unusedMemory: boolean;
}

export type MetadataKind = keyof MetadataSlots;

type SlotMaps = { [K in MetadataKind]: Map<SymId, MetadataSlots[K]> };

/**
 * Per compilation unit metadata, one slot per (symbol, kind). Writes replace
 * whatever the slot held before.
 */
export class MetadataStore {
  private readonly slots: SlotMaps = {
    decl: new Map(),
    duplicates: new Map(),
    padding: new Map(),
    dispatch: new Map(),
    ports: new Map(),
    readers: new Map(),
    writers: new Map(),
    resetters: new Map(),
    accessInfo: new Map(),
    accumType: new Map(),
    reduceType: new Map(),
    fmaReduce: new Map(),
    writeBuffer: new Map(),
    nonBuffer: new Map(),
    unusedMemory: new Map(),
  };

  get<K extends MetadataKind>(sym: SymId, kind: K): MetadataSlots[K] | undefined {
    return this.slots[kind].get(sym);
  }

  put<K extends MetadataKind>(sym: SymId, kind: K, value: MetadataSlots[K]): void {
    this.slots[kind].set(sym, value);
  }

  has(sym: SymId, kind: MetadataKind): boolean {
    return this.slots[kind].has(sym);
  }

  delete(sym: SymId, kind: MetadataKind): boolean {
    return this.slots[kind].delete(sym);
  }

  /** Symbols holding a value of the given kind, in insertion order. */
  symbols(kind: MetadataKind): SymId[] {
    return [...this.slots[kind].keys()];
  }
}
