import { BankingAnalysisError, Result } from "../errors.js";
import { accessInfo, accesses, registerAccess } from "../metadata/accessOps.js";
import { addDispatch, addPort, dispatches, tryDispatch } from "../metadata/bankedAccess.js";
import { setDuplicates, setPadding } from "../metadata/bankedMemory.js";
import { getMemoryDecl } from "../metadata/memoryOps.js";
import type { MetadataStore } from "../metadata/store.js";
import { AccessDirection, AccessMatrix, SymId, uidKey } from "./access.js";
import type { Instance } from "./instance.js";

function constantDims(store: MetadataStore, mem: SymId): number[] | undefined {
  const decl = getMemoryDecl(store, mem);
  if (!decl || decl.aliasOf !== undefined) {
    return undefined;
  }
  const dims: number[] = [];
  for (const dim of decl.dims) {
    if (dim === undefined) {
      return undefined;
    }
    dims.push(dim);
  }
  return dims;
}

/**
 * Writes the chosen duplicates of `mem` into the store: one Memory per
 * instance, and for every unrolled access its dispatch and port. Dispatch and
 * ports previously recorded for the accesses are replaced.
 */
export function commitInstances(store: MetadataStore, mem: SymId, instances: readonly Instance[]): void {
  const touched = new Set<SymId>(accesses(store, mem));
  for (const inst of instances) {
    for (const access of inst.accesses) {
      touched.add(access);
    }
  }
  for (const access of touched) {
    store.delete(access, "dispatch");
    store.delete(access, "ports");
  }

  setDuplicates(
    store,
    mem,
    instances.map((inst) => inst.toMemory()),
  );

  const dims = constantDims(store, mem);
  if (dims && instances.length > 0) {
    const pads = instances.map((inst) => inst.memory.padding(dims));
    setPadding(
      store,
      mem,
      dims.map((_, t) => Math.max(...pads.map((pad) => pad[t]))),
    );
  }

  instances.forEach((inst, d) => {
    const record = (matrix: AccessMatrix, direction: AccessDirection): void => {
      if (!accessInfo(store, matrix.access)) {
        registerAccess(store, mem, matrix.access, direction, { width: matrix.width });
      }
      addDispatch(store, matrix.access, matrix.unroll, d);
      addPort(store, matrix.access, d, matrix.unroll, inst.port(matrix));
    };
    inst.reads.flat().forEach((matrix) => record(matrix, "read"));
    inst.writes.flat().forEach((matrix) => record(matrix, "write"));
  });
}

/**
 * Every dispatch invariant violated by the accesses of `mem`. `expected`
 * lists the unrolled copies that must resolve even when nothing dispatched
 * them.
 */
export function checkDispatches(
  store: MetadataStore,
  mem: SymId,
  expected: Iterable<Pick<AccessMatrix, "access" | "unroll">> = [],
): BankingAnalysisError[] {
  const pending = new Map<string, { access: SymId; uid: readonly number[] }>();
  for (const access of accesses(store, mem)) {
    for (const { uid } of dispatches(store, access).values()) {
      pending.set(`${access}:${uidKey(uid)}`, { access, uid });
    }
  }
  for (const { access, unroll } of expected) {
    pending.set(`${access}:${uidKey(unroll)}`, { access, uid: unroll });
  }

  const failures: BankingAnalysisError[] = [];
  for (const { access, uid } of pending.values()) {
    const result: Result<ReadonlySet<number>> = tryDispatch(store, access, uid);
    if (!result.ok) {
      failures.push(result.error);
    }
  }
  return failures;
}
