import type { SymId } from "../analysis/access.js";
import { MissingMetadataError } from "../errors.js";
import { accessInfo, readers, writers } from "./accessOps.js";
import type { MemoryDecl, MemoryKind, MetadataStore } from "./store.js";

const LOCAL_KINDS: ReadonlySet<MemoryKind> = new Set<MemoryKind>([
  "SRAM",
  "RegFile",
  "Reg",
  "FIFO",
  "LIFO",
  "LUT",
  "ArgIn",
  "ArgOut",
  "HostIO",
]);

const REMOTE_KINDS: ReadonlySet<MemoryKind> = new Set<MemoryKind>([
  "DRAM",
  "StreamIn",
  "StreamOut",
  "ArgIn",
  "ArgOut",
  "HostIO",
]);

const REG_KINDS: ReadonlySet<MemoryKind> = new Set<MemoryKind>(["Reg", "ArgIn", "ArgOut", "HostIO"]);

export function declareMemory(store: MetadataStore, mem: SymId, decl: MemoryDecl): void {
  store.put(mem, "decl", decl);
}

export function getMemoryDecl(store: MetadataStore, mem: SymId): MemoryDecl | undefined {
  return store.get(mem, "decl");
}

export function memoryDecl(store: MetadataStore, mem: SymId): MemoryDecl {
  const decl = getMemoryDecl(store, mem);
  if (!decl) {
    throw new MissingMetadataError("decl", `Could not statically determine the rank of ${mem}`, { symbol: mem });
  }
  return decl;
}

/** Statically defined rank of a memory or alias. */
export function rank(store: MetadataStore, mem: SymId): number {
  return memoryDecl(store, mem).dims.length;
}

/** Rank of the storage underneath an alias; the memory's own rank otherwise. */
export function rawRank(store: MetadataStore, mem: SymId): number {
  const decl = memoryDecl(store, mem);
  return decl.aliasOf === undefined ? decl.dims.length : rawRank(store, decl.aliasOf);
}

export function stagedDims(store: MetadataStore, mem: SymId): readonly (number | undefined)[] {
  const decl = memoryDecl(store, mem);
  if (decl.aliasOf !== undefined) {
    throw new MissingMetadataError("decl", `Could not statically determine the dimensions of ${mem}`, {
      symbol: mem,
    });
  }
  return decl.dims;
}

export function constDims(store: MetadataStore, mem: SymId): number[] {
  const dims: number[] = [];
  for (const dim of stagedDims(store, mem)) {
    if (dim === undefined) {
      throw new MissingMetadataError("decl", `Could not get constant dimensions of ${mem}`, { symbol: mem });
    }
    dims.push(dim);
  }
  return dims;
}

export function stagedSize(store: MetadataStore, mem: SymId): number {
  const dims = stagedDims(store, mem);
  const size = dims[0];
  if (dims.length !== 1 || size === undefined) {
    throw new MissingMetadataError("decl", `Could not get static size of ${mem}`, { symbol: mem });
  }
  return size;
}

function widths(store: MetadataStore, accesses: ReadonlySet<SymId>): Set<number> {
  return new Set([...accesses].map((access) => accessInfo(store, access)?.width ?? 1));
}

export function readWidths(store: MetadataStore, mem: SymId): Set<number> {
  return widths(store, readers(store, mem));
}

export function writeWidths(store: MetadataStore, mem: SymId): Set<number> {
  return widths(store, writers(store, mem));
}

function kindOf(store: MetadataStore, mem: SymId): MemoryKind | undefined {
  return getMemoryDecl(store, mem)?.kind;
}

function isKind(store: MetadataStore, mem: SymId, kinds: ReadonlySet<MemoryKind>): boolean {
  const kind = kindOf(store, mem);
  return kind !== undefined && kinds.has(kind);
}

export function isLocalMem(store: MetadataStore, mem: SymId): boolean {
  return isKind(store, mem, LOCAL_KINDS);
}

export function isRemoteMem(store: MetadataStore, mem: SymId): boolean {
  return isKind(store, mem, REMOTE_KINDS);
}

export function isMem(store: MetadataStore, mem: SymId): boolean {
  return isLocalMem(store, mem) || isRemoteMem(store, mem);
}

export function isReg(store: MetadataStore, mem: SymId): boolean {
  return isKind(store, mem, REG_KINDS);
}

export function isArgIn(store: MetadataStore, mem: SymId): boolean {
  return kindOf(store, mem) === "ArgIn";
}

export function isArgOut(store: MetadataStore, mem: SymId): boolean {
  return kindOf(store, mem) === "ArgOut";
}

export function isHostIO(store: MetadataStore, mem: SymId): boolean {
  return kindOf(store, mem) === "HostIO";
}

export function isSRAM(store: MetadataStore, mem: SymId): boolean {
  return kindOf(store, mem) === "SRAM";
}

export function isRegFile(store: MetadataStore, mem: SymId): boolean {
  return kindOf(store, mem) === "RegFile";
}

export function isFIFO(store: MetadataStore, mem: SymId): boolean {
  return kindOf(store, mem) === "FIFO";
}

export function isLIFO(store: MetadataStore, mem: SymId): boolean {
  return kindOf(store, mem) === "LIFO";
}

export function isLUT(store: MetadataStore, mem: SymId): boolean {
  return kindOf(store, mem) === "LUT";
}

export function isDRAM(store: MetadataStore, mem: SymId): boolean {
  return kindOf(store, mem) === "DRAM";
}

export function isStreamIn(store: MetadataStore, mem: SymId): boolean {
  return kindOf(store, mem) === "StreamIn";
}

export function isStreamOut(store: MetadataStore, mem: SymId): boolean {
  return kindOf(store, mem) === "StreamOut";
}

export function isDenseAlias(store: MetadataStore, mem: SymId): boolean {
  return getMemoryDecl(store, mem)?.aliasOf !== undefined;
}

/** Registers, LUTs and register files declared with contents. */
export function hasInitialValues(store: MetadataStore, mem: SymId): boolean {
  const decl = getMemoryDecl(store, mem);
  if (!decl) {
    return false;
  }
  switch (decl.kind) {
    case "Reg":
    case "LUT":
      return true;
    case "RegFile":
      return decl.initialValues ?? false;
    default:
      return false;
  }
}

/** A register written through an accumulating write. */
export function isOptimizedReg(store: MetadataStore, mem: SymId): boolean {
  return [...writers(store, mem)].some((writer) => accessInfo(store, writer)?.accumulates ?? false);
}
