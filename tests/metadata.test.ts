import { describe, expect, it } from "vitest";
import {
  AccessMatrix,
  AccumType,
  ControlTree,
  Instance,
  InvariantViolationError,
  MemoryKind,
  MetadataStore,
  MissingMetadataError,
  accumType,
  addDispatch,
  buildInstance,
  checkDispatches,
  collapseToInstance,
  commitInstances,
  constDims,
  declareMemory,
  dispatch,
  dispatchedMemories,
  duplicates,
  fmaReduceInfo,
  getDispatch,
  getInstance,
  hasInitialValues,
  instance,
  isArgIn,
  isArgOut,
  isDenseAlias,
  isDRAM,
  isFIFO,
  isHostIO,
  isLIFO,
  isLocalMem,
  isLUT,
  isMem,
  isOptimizedReg,
  isReg,
  isRegFile,
  isRemoteMem,
  isSRAM,
  isStreamIn,
  isStreamOut,
  isUnusedMemory,
  modBanking,
  padding,
  port,
  rank,
  rawRank,
  readerDispatch,
  readers,
  readWidths,
  reduceType,
  registerAccess,
  resetters,
  resolveDispatch,
  setDispatches,
  setFmaReduceInfo,
  setReduceType,
  setResetters,
  setUnusedMemory,
  stagedDims,
  stagedSize,
  tryDispatch,
  unitBanking,
  writers,
  writeWidths,
} from "../src/index.js";

function access(name: string, unroll: number[]): AccessMatrix {
  return { access: name, memory: "m", unroll, scope: "loop", width: 1, matrix: [[1, 0]] };
}

/** Two duplicates of a 6x6 memory: reads split between them, writes broadcast to both. */
function twoDuplicates(): { store: MetadataStore; instances: Instance[] } {
  const store = new MetadataStore();
  const tree = new ControlTree().addScope("loop");
  declareMemory(store, "m", { kind: "SRAM", dims: [6, 6] });
  registerAccess(store, "m", "rd", "read");
  registerAccess(store, "m", "wr", "write");

  const context = { store, tree };
  const first = buildInstance(
    {
      mem: "m",
      reads: [[access("rd", [0])]],
      writes: [[access("wr", [0]), access("wr", [1])]],
      banking: [modBanking(4, 1, [1, 0], [0, 1])],
      cost: 2,
    },
    context,
  );
  const second = buildInstance(
    {
      mem: "m",
      reads: [[access("rd", [1])]],
      writes: [[access("wr", [0]), access("wr", [1])]],
      banking: [unitBanking(2)],
      cost: 1,
    },
    context,
  );
  return { store, instances: [first, second] };
}

describe("MetadataStore", () => {
  it("keeps the last value written to a slot", () => {
    const store = new MetadataStore();
    store.put("x", "writeBuffer", false);
    store.put("x", "writeBuffer", true);
    expect(store.get("x", "writeBuffer")).toBe(true);
    expect(store.has("x", "nonBuffer")).toBe(false);
    expect(store.symbols("writeBuffer")).toEqual(["x"]);
    expect(store.delete("x", "writeBuffer")).toBe(true);
    expect(store.get("x", "writeBuffer")).toBeUndefined();
  });

  it("defaults the accumulator classification to unknown", () => {
    expect(accumType(new MetadataStore(), "m")).toEqual(AccumType.Unknown);
  });
});

describe("commitInstances", () => {
  it("records duplicates, padding, dispatch and ports", () => {
    const { store, instances } = twoDuplicates();
    commitInstances(store, "m", instances);

    expect(duplicates(store, "m")).toHaveLength(2);
    expect(getInstance(store, "m")).toBeUndefined();
    expect(() => instance(store, "m")).toThrow(InvariantViolationError);
    expect(padding(store, "m")).toEqual([2, 0]);

    expect(resolveDispatch(store, "rd", [0])).toEqual(new Set([0]));
    expect(readerDispatch(store, "rd", [1])).toBe(1);
    expect(resolveDispatch(store, "wr", [1])).toEqual(new Set([0, 1]));
    expect(dispatchedMemories(store, "rd", [1]).map((memory) => memory.banking)).toEqual([[unitBanking(2)]]);

    expect(port(store, "wr", 1, [1])).toEqual({ bufferPort: 0, muxPort: 0, muxSize: 2, muxOfs: 1, broadcast: 0 });
    expect(port(store, "rd", 0, [0])).toEqual({ bufferPort: 0, muxPort: 0, muxSize: 1, muxOfs: 0, broadcast: 0 });
    expect(checkDispatches(store, "m")).toEqual([]);
  });

  it("replaces earlier dispatch when committed again", () => {
    const { store, instances } = twoDuplicates();
    commitInstances(store, "m", instances);
    commitInstances(store, "m", instances);
    expect(dispatch(store, "wr", [0])).toEqual(new Set([0, 1]));

    commitInstances(store, "m", [instances[0]]);
    expect(duplicates(store, "m")).toHaveLength(1);
    expect(dispatch(store, "wr", [0])).toEqual(new Set([0]));
    expect(getDispatch(store, "rd", [1])).toBeUndefined();
    expect(readers(store, "m")).toEqual(new Set(["rd"]));
    expect(writers(store, "m")).toEqual(new Set(["wr"]));
  });

  it("flags readers that reach more than one duplicate", () => {
    const { store, instances } = twoDuplicates();
    commitInstances(store, "m", instances);
    addDispatch(store, "rd", [0], 1);

    const failures = checkDispatches(store, "m");
    expect(failures).toHaveLength(1);
    expect(failures[0]).toBeInstanceOf(InvariantViolationError);
    expect(failures[0].message).toBe("Reader rd {0} dispatched to multiple duplicates {0,1}");
    expect(() => resolveDispatch(store, "rd", [0])).toThrow(InvariantViolationError);
  });

  it("flags expected unrolled copies that were never dispatched", () => {
    const { store, instances } = twoDuplicates();
    commitInstances(store, "m", instances);
    const failures = checkDispatches(store, "m", [
      { access: "wr", unroll: [1] },
      { access: "wr", unroll: [2] },
    ]);
    expect(failures).toHaveLength(1);
    expect(failures[0]).toBeInstanceOf(MissingMetadataError);
    expect(failures[0].message).toBe("No dispatch defined for wr {2}");
  });

  it("flags writers that reach no duplicate", () => {
    const store = new MetadataStore();
    registerAccess(store, "m", "wr", "write");
    setDispatches(store, "wr", [[[3], []]]);
    const result = tryDispatch(store, "wr", [3]);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("Writer wr {3} is not dispatched to any duplicate");
    }
  });

  it("collapses to one duplicate after unrolling", () => {
    const { store, instances } = twoDuplicates();
    commitInstances(store, "m", instances);
    const kept = collapseToInstance(store, "m", 1);
    expect(kept.banking).toEqual([unitBanking(2)]);
    expect(instance(store, "m")).toBe(kept);
    expect(getInstance(store, "m")).toBe(kept);
  });

  it("leaves padding unset for memories with dynamic dimensions", () => {
    const store = new MetadataStore();
    declareMemory(store, "m", { kind: "SRAM", dims: [undefined, 4] });
    commitInstances(store, "m", [Instance.unit(2)]);
    expect(duplicates(store, "m")).toHaveLength(1);
    expect(() => padding(store, "m")).toThrow("No padding defined for m");
  });
});

describe("missing metadata", () => {
  it("names the symbol that lacks it", () => {
    const store = new MetadataStore();
    expect(() => duplicates(store, "nope")).toThrow("No duplicates defined for nope");
    expect(() => instance(store, "nope")).toThrow("No instance defined for nope");
    expect(() => dispatch(store, "x", [0, 1])).toThrow("No dispatch defined for x {0,1}");
    expect(() => dispatch(store, "x", [0, 1])).toThrow(MissingMetadataError);
  });
});

describe("memory declarations", () => {
  it("classifies memory kinds", () => {
    const store = new MetadataStore();
    declareMemory(store, "r", { kind: "Reg", dims: [] });
    declareMemory(store, "a", { kind: "ArgIn", dims: [] });
    declareMemory(store, "s", { kind: "SRAM", dims: [16] });
    declareMemory(store, "rf", { kind: "RegFile", dims: [4], initialValues: true });

    expect(isReg(store, "r")).toBe(true);
    expect(hasInitialValues(store, "r")).toBe(true);
    expect(isRemoteMem(store, "r")).toBe(false);
    expect(isArgIn(store, "a")).toBe(true);
    expect(isLocalMem(store, "a") && isRemoteMem(store, "a")).toBe(true);
    expect(isReg(store, "a")).toBe(true);
    expect(isSRAM(store, "s")).toBe(true);
    expect(hasInitialValues(store, "s")).toBe(false);
    expect(hasInitialValues(store, "rf")).toBe(true);
    expect(stagedSize(store, "s")).toBe(16);
  });

  it("resolves ranks through aliases", () => {
    const store = new MetadataStore();
    declareMemory(store, "m", { kind: "SRAM", dims: [8, 8] });
    declareMemory(store, "v", { kind: "SRAM", dims: [8], aliasOf: "m" });
    expect(rank(store, "v")).toBe(1);
    expect(rawRank(store, "v")).toBe(2);
    expect(isDenseAlias(store, "v")).toBe(true);
    expect(() => stagedDims(store, "v")).toThrow(MissingMetadataError);
    expect(constDims(store, "m")).toEqual([8, 8]);
  });

  it("requires constant dimensions where asked", () => {
    const store = new MetadataStore();
    declareMemory(store, "dyn", { kind: "SRAM", dims: [undefined, 4] });
    expect(() => constDims(store, "dyn")).toThrow("Could not get constant dimensions of dyn");
    expect(() => stagedSize(store, "dyn")).toThrow(MissingMetadataError);
  });

  it.each<[MemoryKind, (store: MetadataStore, mem: string) => boolean]>([
    ["RegFile", isRegFile],
    ["FIFO", isFIFO],
    ["LIFO", isLIFO],
    ["LUT", isLUT],
    ["DRAM", isDRAM],
    ["StreamIn", isStreamIn],
    ["StreamOut", isStreamOut],
    ["ArgOut", isArgOut],
    ["HostIO", isHostIO],
  ])("recognizes %s memories", (kind, predicate) => {
    const store = new MetadataStore();
    declareMemory(store, "x", { kind, dims: [4] });
    declareMemory(store, "s", { kind: "SRAM", dims: [4] });
    expect(predicate(store, "x")).toBe(true);
    expect(predicate(store, "s")).toBe(false);
    expect(predicate(store, "undeclared")).toBe(false);
    expect(isMem(store, "x")).toBe(true);
  });

  it("treats undeclared symbols as no memory at all", () => {
    const store = new MetadataStore();
    declareMemory(store, "d", { kind: "DRAM", dims: [1024] });
    expect(isMem(store, "d")).toBe(true);
    expect(isLocalMem(store, "d")).toBe(false);
    expect(isMem(store, "undeclared")).toBe(false);
  });

  it("tracks access widths and accumulating writes", () => {
    const store = new MetadataStore();
    declareMemory(store, "acc", { kind: "Reg", dims: [] });
    registerAccess(store, "acc", "load", "read", { width: 2 });
    registerAccess(store, "acc", "load4", "read", { width: 4 });
    expect(readWidths(store, "acc")).toEqual(new Set([2, 4]));
    expect(isOptimizedReg(store, "acc")).toBe(false);
    registerAccess(store, "acc", "sum", "write", { accumulates: true });
    expect(isOptimizedReg(store, "acc")).toBe(true);
    registerAccess(store, "acc", "wide", "write", { width: 8 });
    expect(writeWidths(store, "acc")).toEqual(new Set([1, 8]));
  });
});

describe("access and accumulator metadata", () => {
  it("defaults resetters and the unused flag", () => {
    const store = new MetadataStore();
    expect(resetters(store, "m")).toEqual(new Set());
    expect(isUnusedMemory(store, "m")).toBe(false);

    setResetters(store, "m", ["clear", "clear", "flush"]);
    setUnusedMemory(store, "m", true);
    expect(resetters(store, "m")).toEqual(new Set(["clear", "flush"]));
    expect(isUnusedMemory(store, "m")).toBe(true);
  });

  it("keeps the reduce function when cleared with nothing", () => {
    const store = new MetadataStore();
    expect(reduceType(store, "acc")).toBeUndefined();
    setReduceType(store, "acc", "max");
    setReduceType(store, "acc", undefined);
    expect(reduceType(store, "acc")).toBe("max");
    setReduceType(store, "acc", "add");
    expect(reduceType(store, "acc")).toBe("add");
  });

  it("stores fused multiply-add reduction info", () => {
    const store = new MetadataStore();
    const info = { mul1: "a", mul2: "b", accumulator: "acc", fma: "fma0", latency: 4 };
    expect(fmaReduceInfo(store, "acc")).toBeUndefined();
    setFmaReduceInfo(store, "acc", info);
    setFmaReduceInfo(store, "acc", undefined);
    expect(fmaReduceInfo(store, "acc")).toEqual(info);
  });
});
