import type { AccessDirection, AccessMatrix, ScopeId, SymId } from "../analysis/access.js";
import { ControlTree } from "../analysis/controlTree.js";
import type { InstanceRequest } from "../analysis/instanceBuilder.js";
import { AccumType, isReduceFunction } from "../banking/accumulation.js";
import { Banking, modBanking } from "../banking/banking.js";
import { DEFAULT_TARGET, TargetConfig } from "../config.js";
import { registerAccess } from "../metadata/accessOps.js";
import { setAccumType } from "../metadata/accumulator.js";
import { setNonBuffer, setWriteBuffer } from "../metadata/bankedMemory.js";
import { declareMemory } from "../metadata/memoryOps.js";
import { MemoryKind, MetadataStore } from "../metadata/store.js";

const MEMORY_KINDS: readonly MemoryKind[] = [
  "SRAM",
  "RegFile",
  "Reg",
  "FIFO",
  "LIFO",
  "LUT",
  "DRAM",
  "StreamIn",
  "StreamOut",
  "ArgIn",
  "ArgOut",
  "HostIO",
];

export interface LoadedAccess {
  direction: AccessDirection;
  copies: AccessMatrix[];
}

export interface LoadedDesign {
  store: MetadataStore;
  tree: ControlTree;
  target: TargetConfig;
  memories: SymId[];
  accesses: Map<SymId, LoadedAccess>;
  requests: Map<SymId, InstanceRequest[]>;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expectObject(value: unknown, path: string): JsonObject {
  if (!isObject(value)) {
    throw new Error(`Expected object at ${path}`);
  }
  return value;
}

function expectArray(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new Error(`Expected array at ${path}`);
  }
  return value;
}

function expectString(value: unknown, path: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new Error(`Expected non-empty string at ${path}`);
  }
  return value;
}

function expectInt(value: unknown, path: string): number {
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new Error(`Expected integer at ${path}`);
  }
  return value;
}

function expectNumber(value: unknown, path: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new Error(`Expected number at ${path}`);
  }
  return value;
}

function expectIntArray(value: unknown, path: string): number[] {
  return expectArray(value, path).map((item, i) => expectInt(item, `${path}[${i}]`));
}

function optionalBoolean(value: unknown, path: string): boolean | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") {
    throw new Error(`Expected boolean at ${path}`);
  }
  return value;
}

function parseMemoryKind(value: unknown, path: string): MemoryKind {
  const name = expectString(value, path);
  const kind = MEMORY_KINDS.find((candidate) => candidate === name);
  if (!kind) {
    throw new Error(`Unknown memory kind ${name} at ${path}`);
  }
  return kind;
}

/** `none`, `fma`, `unknown` or `reduce:<fn>`. */
export function parseAccumType(value: string): AccumType {
  switch (value) {
    case "none":
      return AccumType.None;
    case "fma":
      return AccumType.FMA;
    case "unknown":
      return AccumType.Unknown;
  }
  const match = value.match(/^reduce:(\w+)$/);
  if (match && isReduceFunction(match[1])) {
    return AccumType.reduce(match[1]);
  }
  throw new Error(`Unknown accumulation type ${value}`);
}

function parseDims(value: unknown, path: string): (number | undefined)[] {
  return expectArray(value, path).map((dim, i) => (dim === null ? undefined : expectInt(dim, `${path}[${i}]`)));
}

function parseBanking(value: unknown, path: string): Banking {
  const obj = expectObject(value, path);
  return modBanking(
    expectInt(obj.N, `${path}.N`),
    expectInt(obj.B ?? 1, `${path}.B`),
    expectIntArray(obj.alpha, `${path}.alpha`),
    expectIntArray(obj.dims, `${path}.dims`),
  );
}

function parseDirection(value: unknown, path: string): AccessDirection {
  if (value === "read" || value === "write") {
    return value;
  }
  throw new Error(`Expected "read" or "write" at ${path}`);
}

/**
 * Reads a JSON design: control scopes, memories, their unrolled accesses and
 * the candidate instances chosen for each memory by the banking search.
 */
export function loadDesign(json: unknown, target: TargetConfig = DEFAULT_TARGET): LoadedDesign {
  const root = expectObject(json, "$");
  const store = new MetadataStore();
  const tree = new ControlTree();

  expectArray(root.scopes ?? [], "$.scopes").forEach((raw, i) => {
    const scope = expectObject(raw, `$.scopes[${i}]`);
    tree.addScope(expectString(scope.id, `$.scopes[${i}].id`), {
      parent: scope.parent === undefined ? undefined : expectString(scope.parent, `$.scopes[${i}].parent`),
      pipelined: optionalBoolean(scope.pipelined, `$.scopes[${i}].pipelined`),
    });
  });

  const memories: SymId[] = [];
  expectArray(root.memories, "$.memories").forEach((raw, i) => {
    const path = `$.memories[${i}]`;
    const mem = expectObject(raw, path);
    const id = expectString(mem.id, `${path}.id`);
    declareMemory(store, id, {
      kind: parseMemoryKind(mem.kind ?? "SRAM", `${path}.kind`),
      dims: parseDims(mem.dims, `${path}.dims`),
      initialValues: optionalBoolean(mem.initialValues, `${path}.initialValues`),
    });
    setWriteBuffer(store, id, optionalBoolean(mem.writeBuffer, `${path}.writeBuffer`) ?? false);
    setNonBuffer(store, id, optionalBoolean(mem.nonBuffer, `${path}.nonBuffer`) ?? false);
    if (mem.accum !== undefined) {
      setAccumType(store, id, parseAccumType(expectString(mem.accum, `${path}.accum`)));
    }
    memories.push(id);
  });

  const accesses = new Map<SymId, LoadedAccess>();
  expectArray(root.accesses ?? [], "$.accesses").forEach((raw, i) => {
    const path = `$.accesses[${i}]`;
    const acc = expectObject(raw, path);
    const id = expectString(acc.id, `${path}.id`);
    const memory = expectString(acc.memory, `${path}.memory`);
    const direction = parseDirection(acc.direction, `${path}.direction`);
    const scope: ScopeId = expectString(acc.scope, `${path}.scope`);
    const width = acc.width === undefined ? 1 : expectInt(acc.width, `${path}.width`);
    const offset = acc.offset === undefined ? undefined : expectIntArray(acc.offset, `${path}.offset`);
    const unrolls = expectArray(acc.unrolls ?? [[]], `${path}.unrolls`).map((uid, j) =>
      expectIntArray(uid, `${path}.unrolls[${j}]`),
    );
    if (!tree.has(scope)) {
      throw new Error(`Unknown scope ${scope} at ${path}.scope`);
    }
    if (!memories.includes(memory)) {
      throw new Error(`Unknown memory ${memory} at ${path}.memory`);
    }
    registerAccess(store, memory, id, direction, { width });
    accesses.set(id, {
      direction,
      copies: unrolls.map((unroll) => ({ access: id, memory, unroll, scope, width, matrix: [], offset })),
    });
  });

  const requests = new Map<SymId, InstanceRequest[]>();
  expectArray(root.instances ?? [], "$.instances").forEach((raw, i) => {
    const path = `$.instances[${i}]`;
    const inst = expectObject(raw, path);
    const mem = expectString(inst.memory, `${path}.memory`);
    if (!memories.includes(mem)) {
      throw new Error(`Unknown memory ${mem} at ${path}.memory`);
    }
    const groups = (key: "reads" | "writes", direction: AccessDirection): AccessMatrix[][] =>
      expectArray(inst[key] ?? [], `${path}.${key}`).map((group, g) =>
        expectArray(group, `${path}.${key}[${g}]`).flatMap((name, n) => {
          const access = expectString(name, `${path}.${key}[${g}][${n}]`);
          const entry = accesses.get(access);
          if (!entry || entry.direction !== direction) {
            throw new Error(`Unknown ${direction} access ${access} at ${path}.${key}[${g}][${n}]`);
          }
          return entry.copies;
        }),
      );
    const request: InstanceRequest = {
      mem,
      reads: groups("reads", "read"),
      writes: groups("writes", "write"),
      banking: expectArray(inst.banking, `${path}.banking`).map((b, j) => parseBanking(b, `${path}.banking[${j}]`)),
      cost: inst.cost === undefined ? 0 : expectNumber(inst.cost, `${path}.cost`),
      resource: inst.resource === undefined ? undefined : expectString(inst.resource, `${path}.resource`),
    };
    const list = requests.get(mem) ?? [];
    list.push(request);
    requests.set(mem, list);
  });

  return { store, tree, target, memories, accesses, requests };
}
