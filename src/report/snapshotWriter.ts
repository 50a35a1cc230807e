import { compress } from "snappy";
import type { SymId } from "../analysis/access.js";
import type { Port } from "../analysis/port.js";
import { describeAccumType } from "../banking/accumulation.js";
import type { Banking } from "../banking/banking.js";
import type { Memory } from "../banking/memory.js";
import { accessInfo, accesses } from "../metadata/accessOps.js";
import { dispatches, getPorts } from "../metadata/bankedAccess.js";
import { getDuplicates, getPadding } from "../metadata/bankedMemory.js";
import type { MetadataStore, PortTable } from "../metadata/store.js";

export const SNAPSHOT_FORMAT_VERSION = 1;

const BANKING_KIND_MOD = 0;

class BinarySink {
  private readonly bytes: number[] = [];

  toUint8Array(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }

  writeBoolean(value: boolean): void {
    this.writeUnsigned(value ? 1n : 0n, 1);
  }

  writeUnsigned(value: number | bigint, byteCount: number): void {
    let big = typeof value === "bigint" ? value : BigInt(value);
    if (big < 0n) {
      throw new RangeError("Unsigned value cannot be negative");
    }
    for (let i = 0; i < byteCount; i += 1) {
      this.bytes.push(Number(big & 0xffn));
      big >>= 8n;
    }
    if (big !== 0n) {
      throw new RangeError(`Unsigned value exceeds ${byteCount * 8} bits`);
    }
  }

  writeSigned(value: number | bigint, byteCount: number): void {
    let big = typeof value === "bigint" ? value : BigInt(value);
    const limit = 1n << BigInt(byteCount * 8);
    if (big < -(limit >> 1n) || big >= limit >> 1n) {
      throw new RangeError(`Signed value exceeds ${byteCount * 8} bits`);
    }
    if (big < 0n) {
      big = limit + big;
    }
    this.writeUnsigned(big, byteCount);
  }

  writeString(value: string): void {
    const encoded = new TextEncoder().encode(value);
    if (encoded.length > 0xffff) {
      throw new RangeError("String exceeds 65535 bytes");
    }
    this.writeUnsigned(encoded.length, 2);
    for (const byte of encoded) {
      this.bytes.push(byte);
    }
  }

  writeUid(uid: readonly number[]): void {
    this.writeUnsigned(uid.length, 2);
    for (const index of uid) {
      this.writeUnsigned(index, 4);
    }
  }
}

export interface MetadataSnapshotResult {
  snapshot: Uint8Array;
  uncompressed: Uint8Array;
}

/**
 * Serializes the banking metadata of the given memories: their duplicates and
 * padding, then each access's dispatch and port tables. Little endian,
 * snappy compressed, prefixed by one format version byte.
 */
export class MetadataSnapshotWriter {
  constructor(
    private readonly store: MetadataStore,
    private readonly memories: readonly SymId[],
  ) {}

  async build(): Promise<MetadataSnapshotResult> {
    const sink = new BinarySink();
    sink.writeUnsigned(this.memories.length, 2);
    for (const mem of this.memories) {
      this.writeMemory(sink, mem);
    }

    const uncompressed = sink.toUint8Array();
    const compressed = new Uint8Array(await compress(Buffer.from(uncompressed)));

    const snapshot = new Uint8Array(1 + compressed.length);
    snapshot[0] = SNAPSHOT_FORMAT_VERSION;
    snapshot.set(compressed, 1);

    return { snapshot, uncompressed };
  }

  private writeMemory(sink: BinarySink, mem: SymId): void {
    sink.writeString(mem);

    const duplicates = getDuplicates(this.store, mem) ?? [];
    sink.writeUnsigned(duplicates.length, 2);
    for (const duplicate of duplicates) {
      this.writeDuplicate(sink, duplicate);
    }

    const padding = getPadding(this.store, mem) ?? [];
    sink.writeUnsigned(padding.length, 2);
    for (const pad of padding) {
      sink.writeUnsigned(pad, 4);
    }

    const accessSyms = [...accesses(this.store, mem)].sort();
    sink.writeUnsigned(accessSyms.length, 2);
    for (const access of accessSyms) {
      this.writeAccess(sink, access);
    }
  }

  private writeDuplicate(sink: BinarySink, memory: Memory): void {
    sink.writeUnsigned(memory.depth, 4);
    sink.writeString(describeAccumType(memory.accType));
    sink.writeString(memory.resource ?? "");
    sink.writeUnsigned(memory.banking.length, 2);
    for (const banking of memory.banking) {
      this.writeBanking(sink, banking);
    }
  }

  private writeBanking(sink: BinarySink, banking: Banking): void {
    switch (banking.kind) {
      case "mod":
        sink.writeUnsigned(BANKING_KIND_MOD, 1);
        sink.writeUnsigned(banking.nBanks, 4);
        sink.writeUnsigned(banking.stride, 4);
        sink.writeUnsigned(banking.alpha.length, 2);
        for (const alpha of banking.alpha) {
          sink.writeSigned(alpha, 4);
        }
        for (const dim of banking.dims) {
          sink.writeUnsigned(dim, 2);
        }
        break;
    }
  }

  private writeAccess(sink: BinarySink, access: SymId): void {
    sink.writeString(access);
    const direction = accessInfo(this.store, access)?.direction;
    sink.writeUnsigned(direction === "read" ? 0 : direction === "write" ? 1 : 2, 1);

    const table = [...dispatches(this.store, access).values()];
    sink.writeUnsigned(table.length, 2);
    for (const { uid, dispatch } of table) {
      sink.writeUid(uid);
      const ds = [...dispatch].sort((a, b) => a - b);
      sink.writeUnsigned(ds.length, 2);
      for (const d of ds) {
        sink.writeUnsigned(d, 2);
      }
    }

    const portTable: PortTable = getPorts(this.store, access) ?? new Map();
    const ports = [...portTable.entries()].sort(([a], [b]) => a - b);
    sink.writeUnsigned(ports.length, 2);
    for (const [d, entries] of ports) {
      sink.writeUnsigned(d, 2);
      sink.writeUnsigned(entries.size, 2);
      for (const { uid, port } of entries.values()) {
        sink.writeUid(uid);
        this.writePort(sink, port);
      }
    }
  }

  private writePort(sink: BinarySink, port: Port): void {
    sink.writeBoolean(port.bufferPort !== undefined);
    sink.writeUnsigned(port.bufferPort ?? 0, 2);
    sink.writeUnsigned(port.muxPort, 2);
    sink.writeUnsigned(port.muxSize, 2);
    sink.writeUnsigned(port.muxOfs, 2);
    sink.writeUnsigned(port.broadcast, 2);
  }
}
