import { describe, expect, it } from "vitest";
import { uncompress } from "snappy";
import {
  AccumType,
  Memory,
  MetadataSnapshotWriter,
  MetadataStore,
  SNAPSHOT_FORMAT_VERSION,
  addDispatch,
  addPort,
  declareMemory,
  makePort,
  modBanking,
  registerAccess,
  setDuplicates,
  setPadding,
} from "../src/index.js";

function text(value: string): number[] {
  const bytes = new TextEncoder().encode(value);
  return [bytes.length, 0, ...bytes];
}

async function decode(snapshot: Uint8Array): Promise<Uint8Array> {
  const decoded = await uncompress(Buffer.from(snapshot.subarray(1)), { asBuffer: true });
  if (typeof decoded === "string") {
    throw new Error("Expected snappy to return a Buffer");
  }
  return new Uint8Array(decoded);
}

describe("MetadataSnapshotWriter", () => {
  it("writes an empty snapshot", async () => {
    const { snapshot, uncompressed } = await new MetadataSnapshotWriter(new MetadataStore(), []).build();
    expect(snapshot[0]).toBe(SNAPSHOT_FORMAT_VERSION);
    expect([...uncompressed]).toEqual([0, 0]);
    expect(await decode(snapshot)).toStrictEqual(uncompressed);
  });

  it("serializes duplicates, padding, dispatch and ports", async () => {
    const store = new MetadataStore();
    declareMemory(store, "m", { kind: "SRAM", dims: [4] });
    registerAccess(store, "m", "r", "read");
    setDuplicates(store, "m", [
      new Memory([modBanking(2, 1, [-1], [0])], 2, AccumType.reduce("add"), { resource: "BRAM" }),
    ]);
    setPadding(store, "m", [0]);
    addDispatch(store, "r", [1], 0);
    addPort(store, "r", 0, [1], makePort({ bufferPort: undefined, muxPort: 1, muxSize: 2, muxOfs: 1, broadcast: 0 }));

    const { snapshot, uncompressed } = await new MetadataSnapshotWriter(store, ["m"]).build();

    expect([...uncompressed]).toEqual([
      1, 0,
      ...text("m"),
      1, 0,
      2, 0, 0, 0,
      ...text("Reduce(add)"),
      ...text("BRAM"),
      1, 0,
      0,
      2, 0, 0, 0,
      1, 0, 0, 0,
      1, 0,
      0xff, 0xff, 0xff, 0xff,
      0, 0,
      1, 0,
      0, 0, 0, 0,
      1, 0,
      ...text("r"),
      0,
      1, 0,
      1, 0, 1, 0, 0, 0,
      1, 0,
      0, 0,
      1, 0,
      0, 0,
      1, 0,
      1, 0, 1, 0, 0, 0,
      0,
      0, 0,
      1, 0,
      2, 0,
      1, 0,
      0, 0,
    ]);
    expect(snapshot[0]).toBe(1);
    expect(await decode(snapshot)).toStrictEqual(uncompressed);
  });

  it("rejects values that do not fit their field", async () => {
    const store = new MetadataStore();
    setDuplicates(store, "m", [new Memory([modBanking(2, 1, [1], [0])], 2 ** 32, AccumType.None)]);
    await expect(new MetadataSnapshotWriter(store, ["m"]).build()).rejects.toThrow("Unsigned value exceeds 32 bits");
  });
});
