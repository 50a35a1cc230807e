import type { Banking } from "../banking/banking.js";
import { Memory } from "../banking/memory.js";
import { InvariantViolationError, formatUid } from "../errors.js";
import { accumType } from "../metadata/accumulator.js";
import { isNonBuffer, isWriteBuffer } from "../metadata/bankedMemory.js";
import type { MetadataStore } from "../metadata/store.js";
import { AccessMatrix, ScopeId, SymId, accessKey } from "./access.js";
import type { ControlTree } from "./controlTree.js";
import { Instance } from "./instance.js";
import { assignBufferPorts, scheduleMuxPorts } from "./portScheduler.js";

export interface InstanceRequest {
  mem: SymId;
  reads: readonly (readonly AccessMatrix[])[];
  writes: readonly (readonly AccessMatrix[])[];
  banking: readonly Banking[];
  cost: number;
  resource?: string;
}

export interface InstanceContext {
  store: MetadataStore;
  tree: ControlTree;
}

function checkAccesses(mem: SymId, matrices: readonly AccessMatrix[]): void {
  for (const matrix of matrices) {
    if (matrix.memory !== mem) {
      throw new InvariantViolationError(`Access ${accessKey(matrix)} targets ${matrix.memory}, not ${mem}`, {
        symbol: matrix.access,
        uid: matrix.unroll,
      });
    }
    if (!Number.isInteger(matrix.width) || matrix.width < 1) {
      throw new InvariantViolationError(`Access ${accessKey(matrix)} has invalid width ${matrix.width}`, {
        symbol: matrix.access,
        uid: matrix.unroll,
      });
    }
  }
}

/**
 * The pipelined scope that forces N-buffering: the common parent of a write
 * and a read that sit in different stages of it.
 */
export function findMetapipe(
  mem: SymId,
  reads: readonly AccessMatrix[],
  writes: readonly AccessMatrix[],
  tree: ControlTree,
): ScopeId | undefined {
  const candidates = new Set<ScopeId>();
  for (const write of writes) {
    for (const read of reads) {
      const lca = tree.lca(write.scope, read.scope);
      if (lca === undefined || !tree.isPipelined(lca)) {
        continue;
      }
      const writeStage = tree.stageOf(lca, write.scope);
      const readStage = tree.stageOf(lca, read.scope);
      if (writeStage !== undefined && readStage !== undefined && writeStage !== readStage) {
        candidates.add(lca);
      }
    }
  }
  if (candidates.size > 1) {
    throw new InvariantViolationError(
      `Ambiguous pipelines for ${mem}: accesses need buffering across ${[...candidates].join(", ")}`,
      { symbol: mem },
    );
  }
  const [metapipe] = candidates;
  return metapipe;
}

function checkWriteStages(
  mem: SymId,
  writes: readonly AccessMatrix[],
  bufferPorts: ReadonlyMap<AccessMatrix, number | undefined>,
): void {
  const staged = writes.filter((write) => bufferPorts.get(write) !== undefined);
  const stages = new Set(staged.map((write) => bufferPorts.get(write)));
  if (stages.size > 1) {
    const where = staged.map((write) => `${write.access}${formatUid(write.unroll)}@${bufferPorts.get(write)}`);
    throw new InvariantViolationError(
      `Writes to ${mem} span several pipeline stages (${where.join(", ")}) but it is not a write buffer`,
      { symbol: mem },
    );
  }
}

/** Groups the accesses of one physical duplicate and assigns their ports. */
export function buildInstance(request: InstanceRequest, context: InstanceContext): Instance {
  const { mem, reads, writes, banking, cost, resource } = request;
  const { store, tree } = context;
  const readMatrices = reads.flat();
  const writeMatrices = writes.flat();
  const all = [...readMatrices, ...writeMatrices];
  checkAccesses(mem, all);

  const metapipe = isNonBuffer(store, mem) ? undefined : findMetapipe(mem, readMatrices, writeMatrices, tree);
  const { bufferPorts, depth } = assignBufferPorts(all, tree, metapipe);
  if (metapipe !== undefined && !isWriteBuffer(store, mem)) {
    checkWriteStages(mem, writeMatrices, bufferPorts);
  }

  const ports = new Map([
    ...scheduleMuxPorts(writes, bufferPorts),
    ...scheduleMuxPorts(reads, bufferPorts, { shareLanes: true }),
  ]);
  const accType = accumType(store, mem);

  return new Instance({
    reads,
    writes,
    ctrls: new Set(all.map((matrix) => matrix.scope)),
    metapipe,
    memory: new Memory(banking, depth, accType, { resource }),
    depth,
    cost,
    ports,
    accType,
  });
}
