import type { AccessMatrix, ScopeId } from "./access.js";
import { compareAccess, sameOffset } from "./access.js";
import type { ControlTree } from "./controlTree.js";
import { Port, makePort } from "./port.js";

export interface BufferPortAssignment {
  bufferPorts: Map<AccessMatrix, number | undefined>;
  depth: number;
}

/**
 * Buffer port of each access relative to the earliest pipeline stage that
 * touches the memory. Accesses outside the pipeline see the unrotated view.
 */
export function assignBufferPorts(
  matrices: readonly AccessMatrix[],
  tree: ControlTree,
  metapipe: ScopeId | undefined,
): BufferPortAssignment {
  const bufferPorts = new Map<AccessMatrix, number | undefined>();
  if (metapipe === undefined) {
    for (const matrix of matrices) {
      bufferPorts.set(matrix, 0);
    }
    return { bufferPorts, depth: 1 };
  }

  const stages = new Map<AccessMatrix, number | undefined>();
  let minStage = Number.POSITIVE_INFINITY;
  for (const matrix of matrices) {
    const stage = tree.stageOf(metapipe, matrix.scope);
    stages.set(matrix, stage);
    if (stage !== undefined) {
      minStage = Math.min(minStage, stage);
    }
  }

  let depth = 1;
  for (const [matrix, stage] of stages) {
    const bufferPort = stage === undefined ? undefined : stage - minStage;
    bufferPorts.set(matrix, bufferPort);
    if (bufferPort !== undefined) {
      depth = Math.max(depth, bufferPort + 1);
    }
  }
  return { bufferPorts, depth };
}

function compareBufferPort(a: number | undefined, b: number | undefined): number {
  if (a === b) return 0;
  if (a === undefined) return 1;
  if (b === undefined) return -1;
  return a - b;
}

export interface MuxScheduleOptions {
  /** Repeats of an access at the same constant offset ride on the lanes of the first one. Reads only. */
  shareLanes?: boolean;
}

/**
 * Packs each group of concurrent accesses into one time multiplexed vector
 * per buffer port. Groups never overlap in time, so each one takes the next
 * mux port.
 */
export function scheduleMuxPorts(
  groups: readonly (readonly AccessMatrix[])[],
  bufferPorts: ReadonlyMap<AccessMatrix, number | undefined>,
  options: MuxScheduleOptions = {},
): Map<AccessMatrix, Port> {
  const shareLanes = options.shareLanes ?? false;
  const ports = new Map<AccessMatrix, Port>();
  const present = [...new Set(groups.flat().map((matrix) => bufferPorts.get(matrix)))].sort(compareBufferPort);

  for (const bufferPort of present) {
    let muxPort = 0;
    for (const group of groups) {
      const members = group.filter((matrix) => bufferPorts.get(matrix) === bufferPort).sort(compareAccess);
      if (members.length === 0) {
        continue;
      }

      const lanes: Array<{ matrix: AccessMatrix; muxOfs: number; broadcast: number }> = [];
      let width = 0;
      for (const matrix of members) {
        const leader = shareLanes
          ? lanes.find(
              (lane) => lane.broadcast === 0 && lane.matrix.access === matrix.access && sameOffset(lane.matrix, matrix),
            )
          : undefined;
        if (leader) {
          const repeats = lanes.filter((lane) => lane.muxOfs === leader.muxOfs && lane.matrix.access === matrix.access);
          lanes.push({ matrix, muxOfs: leader.muxOfs, broadcast: repeats.length });
        } else {
          lanes.push({ matrix, muxOfs: width, broadcast: 0 });
          width += matrix.width;
        }
      }

      for (const lane of lanes) {
        ports.set(
          lane.matrix,
          makePort({ bufferPort, muxPort, muxSize: width, muxOfs: lane.muxOfs, broadcast: lane.broadcast }),
        );
      }
      muxPort += 1;
    }
  }
  return ports;
}
