import { AccumType, describeAccumType } from "../banking/accumulation.js";
import { describeBanking } from "../banking/banking.js";
import { Memory } from "../banking/memory.js";
import { MissingMetadataError } from "../errors.js";
import { AccessMatrix, ScopeId, SymId, accessKey, compareAccess } from "./access.js";
import type { Port } from "./port.js";

export interface InstanceFields {
  /** Groups of reads; members of a group fire together, distinct groups never overlap in time. */
  reads: readonly (readonly AccessMatrix[])[];
  writes: readonly (readonly AccessMatrix[])[];
  ctrls: ReadonlySet<ScopeId>;
  /** Pipelined scope that forces N-buffering, if any access needs it. */
  metapipe?: ScopeId;
  memory: Memory;
  depth: number;
  /** Heuristic cost; only compared, never interpreted here. */
  cost: number;
  ports: ReadonlyMap<AccessMatrix, Port>;
  accType: AccumType;
}

/** Candidate physical duplicate of a memory, tracked during banking analysis. */
export class Instance {
  readonly reads: readonly (readonly AccessMatrix[])[];
  readonly writes: readonly (readonly AccessMatrix[])[];
  readonly ctrls: ReadonlySet<ScopeId>;
  readonly metapipe?: ScopeId;
  readonly memory: Memory;
  readonly depth: number;
  readonly cost: number;
  readonly ports: ReadonlyMap<AccessMatrix, Port>;
  readonly accType: AccumType;

  constructor(fields: InstanceFields) {
    this.reads = fields.reads;
    this.writes = fields.writes;
    this.ctrls = fields.ctrls;
    this.metapipe = fields.metapipe;
    this.memory = fields.memory;
    this.depth = fields.depth;
    this.cost = fields.cost;
    this.ports = fields.ports;
    this.accType = fields.accType;

    for (const matrix of this.accessMatrices) {
      if (!this.ports.has(matrix)) {
        throw new MissingMetadataError("port", `No port assigned to ${accessKey(matrix)}`, {
          symbol: matrix.access,
          uid: matrix.unroll,
        });
      }
    }
  }

  static unit(rank: number): Instance {
    return new Instance({
      reads: [],
      writes: [],
      ctrls: new Set(),
      memory: Memory.unit(rank),
      depth: 1,
      cost: 0,
      ports: new Map(),
      accType: AccumType.None,
    });
  }

  get accessMatrices(): AccessMatrix[] {
    return [...this.reads.flat(), ...this.writes.flat()];
  }

  get accesses(): Set<SymId> {
    return new Set(this.accessMatrices.map((matrix) => matrix.access));
  }

  port(matrix: AccessMatrix): Port {
    const port = this.ports.get(matrix);
    if (!port) {
      throw new MissingMetadataError("port", `No port assigned to ${accessKey(matrix)}`, {
        symbol: matrix.access,
        uid: matrix.unroll,
      });
    }
    return port;
  }

  toMemory(): Memory {
    return new Memory(this.memory.banking, this.depth, this.accType, { resource: this.memory.resource });
  }

  format(): string {
    const format = this.memory.isFlat ? "Flat" : "Hierarchical";
    const banking = this.memory.banking.map(describeBanking).join(", ");
    const bufferPorts: Array<number | undefined> = Array.from({ length: this.depth }, (_, i) => i);
    if (this.depth > 1) {
      bufferPorts.push(undefined);
    }

    const lines = [
      "<Banked>",
      `Depth:    ${this.depth}`,
      `Accum:    ${describeAccumType(this.accType)}`,
      `Banking:  ${banking} <${format}>`,
      `Pipeline: ${this.metapipe ?? "---"}`,
      "Ports:",
    ];
    for (const bufferPort of bufferPorts) {
      lines.push(...this.formatPort(bufferPort, this.writes, "WR"));
      lines.push(...this.formatPort(bufferPort, this.reads, "RD"));
    }
    return lines.join("\n");
  }

  toString(): string {
    return this.format();
  }

  private formatPort(bufferPort: number | undefined, groups: readonly (readonly AccessMatrix[])[], type: string): string[] {
    const onPort = groups.flat().filter((matrix) => this.port(matrix).bufferPort === bufferPort);
    const width = onPort.reduce((max, matrix) => Math.max(max, this.port(matrix).muxSize), 0);
    const lines = [`${bufferPort ?? "M"} [Type:${type}, Width:${width}]:`];

    const byMux = new Map<number, AccessMatrix[]>();
    for (const matrix of onPort) {
      const muxPort = this.port(matrix).muxPort;
      const bucket = byMux.get(muxPort) ?? [];
      bucket.push(matrix);
      byMux.set(muxPort, bucket);
    }
    for (const muxPort of [...byMux.keys()].sort((a, b) => a - b)) {
      lines.push(` - Mux Port #${muxPort}:`);
      for (const matrix of [...(byMux.get(muxPort) ?? [])].sort(compareAccess)) {
        lines.push(`  [Ofs: ${this.port(matrix).muxOfs}] ${accessKey(matrix)}`);
        lines.push(`      - Scope: ${matrix.scope}`);
      }
    }
    return lines;
  }
}

export function compareByCost(a: Instance, b: Instance): number {
  return a.cost - b.cost;
}
