export * from "./errors.js";
export * from "./config.js";
export * from "./banking/accumulation.js";
export * from "./banking/banking.js";
export * from "./banking/memory.js";
export * from "./analysis/access.js";
export * from "./analysis/controlTree.js";
export * from "./analysis/port.js";
export * from "./analysis/instance.js";
export * from "./analysis/portScheduler.js";
export * from "./analysis/instanceBuilder.js";
export * from "./analysis/commit.js";
export * from "./metadata/store.js";
export * from "./metadata/accessOps.js";
export * from "./metadata/accumulator.js";
export * from "./metadata/bankedMemory.js";
export * from "./metadata/bankedAccess.js";
export * from "./metadata/memoryOps.js";
export * from "./report/snapshotWriter.js";
export * from "./pipeline/designLoader.js";
export * from "./pipeline/analyzeDesign.js";
