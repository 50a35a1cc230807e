#!/usr/bin/env node
import { readFile, writeFile, mkdir } from "node:fs/promises";
import { resolve, dirname } from "node:path";
import { DEFAULT_TARGET, TargetConfig } from "./config.js";
import { analyzeDesign } from "./pipeline/analyzeDesign.js";

function printUsage(): void {
  console.error("Usage: membank [--snapshot <out.bin>] [--target-resource <name>] [--quiet] <design.json>");
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  let snapshotPath: string | undefined;
  let target: TargetConfig = DEFAULT_TARGET;
  let quiet = false;
  const paths: string[] = [];

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (arg === "--snapshot" && i + 1 < args.length) {
      snapshotPath = args[i + 1];
      i += 1;
    } else if (arg === "--target-resource" && i + 1 < args.length) {
      target = { ...target, defaultResource: args[i + 1] };
      i += 1;
    } else if (arg === "--quiet") {
      quiet = true;
    } else {
      paths.push(arg);
    }
  }

  if (paths.length !== 1) {
    printUsage();
    process.exit(1);
  }

  const [inputPathRaw] = paths;
  const inputPath = resolve(process.cwd(), inputPathRaw);
  const design: unknown = JSON.parse(await readFile(inputPath, "utf-8"));

  const { memories, report, snapshot } = await analyzeDesign(design, { target, snapshot: snapshotPath !== undefined });
  if (!quiet) {
    console.log(report);
  }
  console.log(`Banked ${memories.length} memories from ${inputPathRaw}`);

  if (snapshotPath !== undefined && snapshot) {
    const outputPath = resolve(process.cwd(), snapshotPath);
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, snapshot.snapshot);
    console.log(`Wrote metadata snapshot to ${snapshotPath}`);
  }
}

main().catch((error) => {
  console.error(error instanceof Error ? error.stack ?? error.message : error);
  process.exit(1);
});
