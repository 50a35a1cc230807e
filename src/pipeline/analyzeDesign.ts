import type { AccessMatrix, SymId } from "../analysis/access.js";
import { checkDispatches, commitInstances } from "../analysis/commit.js";
import type { Instance } from "../analysis/instance.js";
import { InstanceRequest, buildInstance } from "../analysis/instanceBuilder.js";
import { unitBanking } from "../banking/banking.js";
import { DEFAULT_TARGET, TargetConfig, resolveResource } from "../config.js";
import { rank } from "../metadata/memoryOps.js";
import { MetadataSnapshotResult, MetadataSnapshotWriter } from "../report/snapshotWriter.js";
import { LoadedDesign, loadDesign } from "./designLoader.js";

export interface MemoryAnalysis {
  mem: SymId;
  instances: Instance[];
}

export interface AnalyzeOptions {
  target?: TargetConfig;
  snapshot?: boolean;
}

export interface AnalyzeResult {
  design: LoadedDesign;
  memories: MemoryAnalysis[];
  report: string;
  snapshot?: MetadataSnapshotResult;
}

/** One unbanked instance for a memory without candidates; each access is its own group. */
function unitRequest(design: LoadedDesign, mem: SymId): InstanceRequest {
  const reads: AccessMatrix[][] = [];
  const writes: AccessMatrix[][] = [];
  for (const { direction, copies } of design.accesses.values()) {
    const own = copies.filter((matrix) => matrix.memory === mem);
    if (own.length > 0) {
      (direction === "read" ? reads : writes).push(own);
    }
  }
  return { mem, reads, writes, banking: [unitBanking(rank(design.store, mem))], cost: 0 };
}

export function analyzeMemories(design: LoadedDesign): MemoryAnalysis[] {
  const context = { store: design.store, tree: design.tree };
  return design.memories.map((mem) => {
    const requests = design.requests.get(mem) ?? [unitRequest(design, mem)];
    const instances = requests.map((request) => buildInstance(request, context));
    commitInstances(design.store, mem, instances);
    const expected = [...design.accesses.values()].flatMap(({ copies }) =>
      copies.filter((matrix) => matrix.memory === mem),
    );
    const [failure] = checkDispatches(design.store, mem, expected);
    if (failure) {
      throw failure;
    }
    return { mem, instances };
  });
}

export function formatReport(memories: readonly MemoryAnalysis[], target: TargetConfig = DEFAULT_TARGET): string {
  const lines: string[] = [];
  for (const { mem, instances } of memories) {
    lines.push(`Memory ${mem}: ${instances.length} duplicate(s)`);
    instances.forEach((inst, i) => {
      lines.push(`#${i}: cost ${inst.cost}, resource ${resolveResource(inst.toMemory(), target)}`);
      lines.push(inst.format());
    });
    lines.push("");
  }
  return lines.join("\n");
}

export async function analyzeDesign(json: unknown, options: AnalyzeOptions = {}): Promise<AnalyzeResult> {
  const target = options.target ?? DEFAULT_TARGET;
  const design = loadDesign(json, target);
  const memories = analyzeMemories(design);
  const report = formatReport(memories, target);
  const snapshot = options.snapshot
    ? await new MetadataSnapshotWriter(design.store, design.memories).build()
    : undefined;
  return { design, memories, report, snapshot };
}
