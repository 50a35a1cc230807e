import type { Memory } from "./banking/memory.js";

export interface TargetConfig {
  name: string;
  /** Physical memory primitive used when a memory carries no resource tag. */
  defaultResource: string;
}

export const DEFAULT_TARGET: TargetConfig = {
  name: "generic",
  defaultResource: "SRAM",
};

export function resolveResource(memory: Memory, target: TargetConfig = DEFAULT_TARGET): string {
  return memory.resource ?? target.defaultResource;
}
