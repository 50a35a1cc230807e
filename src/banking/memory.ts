import { InvalidAddressError, InvalidBankingError, UnsupportedBankingError } from "../errors.js";
import { AccumType, describeAccumType, sameAccumType } from "./accumulation.js";
import { Banking, bankSelect, describeBanking, sameBanking, unitBanking } from "./banking.js";

function gcd(a: number, b: number): number {
  let x = Math.abs(a);
  let y = Math.abs(b);
  while (y !== 0) {
    [x, y] = [y, x % y];
  }
  return x;
}

function floorMod(a: number, n: number): number {
  return ((a % n) + n) % n;
}

function ceilDiv(size: number, period: number): number {
  return Number.isFinite(period) ? Math.ceil(size / period) : 1;
}

function product(values: readonly number[]): number {
  return values.reduce((acc, value) => acc * value, 1);
}

export interface MemoryOptions {
  resource?: string;
}

/**
 * One physical configuration of a logical memory: its banking, N-buffer depth
 * and accumulator classification. Immutable once built.
 */
export class Memory {
  readonly banking: readonly Banking[];
  readonly resource?: string;

  constructor(
    banking: readonly Banking[],
    readonly depth: number,
    readonly accType: AccumType,
    options: MemoryOptions = {},
  ) {
    if (banking.length === 0) {
      throw new InvalidBankingError("Memory must have at least one banking entry");
    }
    if (!Number.isInteger(depth) || depth < 1) {
      throw new InvalidBankingError(`Memory depth must be a positive integer, got ${depth}`);
    }
    this.banking = [...banking];
    this.resource = options.resource;
  }

  static unit(rank: number): Memory {
    return new Memory([unitBanking(rank)], 1, AccumType.None);
  }

  get nBanks(): number[] {
    return this.banking.map((bank) => bank.nBanks);
  }

  get totalBanks(): number {
    return product(this.nBanks);
  }

  get isFlat(): boolean {
    return this.banking.length === 1;
  }

  withResource(resource: string | undefined): Memory {
    return new Memory(this.banking, this.depth, this.accType, { resource });
  }

  /** Number of words held by a single bank, assuming banks divide the dims evenly. */
  bankDepth(dims: readonly number[]): number {
    return product(
      this.banking.map((bank) => {
        const size = product(bank.dims.map((d) => this.dimAt(dims, d)));
        return Math.ceil(size / bank.nBanks);
      }),
    );
  }

  bankSelects(addr: readonly number[]): number[] {
    return this.banking.map((bank) => bankSelect(bank, bank.dims.map((d) => this.dimAt(addr, d))));
  }

  /**
   * Offset of `addr` within its bank. `dims` are the memory's static
   * dimension sizes.
   *
   * Flat banking divides the address space into offset chunks, each holding
   * every bank exactly once. The chunk size along dimension i is the period
   * P_i = NB / gcd(NB, alpha_i) (unbounded when alpha_i is 0). A dimension
   * whose period is NB spans all banks by itself, so the others collapse to 1.
   *
   *   alpha = 3,4   N = 6   B = 1   =>   P = 2,3
   *          _____
   *   banks: |0 4 2|0 4 2
   *          |3_1_5|3 1 5
   *           0 4 2 0 4 2
   *
   * The chunk index is flattened row-major over ceil(w_k / P_k), scaled by
   * B^D, and the position inside a B-wide block is added on top.
   */
  bankOffset(dims: readonly number[], addr: readonly number[]): number {
    const rank = dims.length;
    if (addr.length !== rank) {
      throw new InvalidAddressError(`Address {${addr.join(",")}} does not match memory rank ${rank}`, { uid: addr });
    }

    if (this.banking.length === 1) {
      return this.flatOffset(this.banking[0], dims, addr);
    }
    if (this.banking.length === rank) {
      return this.hierarchicalOffset(dims, addr);
    }
    throw new UnsupportedBankingError(
      `Unsupported banking shape: bank address calculation for ${this.banking.length} dimension groups over rank ${rank} is not defined`,
    );
  }

  /** Corrected banking periods for flat banking; Infinity marks a dimension that never changes bank. */
  periods(rank: number): number[] {
    if (this.banking.length !== 1) {
      throw new UnsupportedBankingError("Banking periods are only defined for flat banking");
    }
    const bank = this.banking[0];
    switch (bank.kind) {
      case "mod": {
        if (bank.alpha.length !== rank) {
          throw new UnsupportedBankingError(
            `Flat banking over dims {${bank.dims.join(",")}} does not cover all ${rank} dimensions`,
          );
        }
        const nb = bank.nBanks * bank.stride;
        const raw = bank.alpha.map((a) => (a === 0 ? Number.POSITIVE_INFINITY : nb / gcd(nb, a)));
        const full = raw.indexOf(nb);
        if (full >= 0) {
          return raw.map((_, i) => (i === full ? nb : 1));
        }
        return raw;
      }
    }
  }

  /** Per-dimension padding that rounds each dimension up to a whole banking period. */
  padding(dims: readonly number[]): number[] {
    const rank = dims.length;
    const pad = (size: number, period: number): number =>
      Number.isFinite(period) ? floorMod(period - floorMod(size, period), period) : 0;

    if (this.banking.length === 1) {
      const periods = this.periods(rank);
      return dims.map((size, t) => pad(size, periods[t]));
    }
    if (this.banking.length === rank) {
      return dims.map((size, t) => {
        const bank = this.perDimension(t);
        return pad(size, bank.stride * bank.nBanks);
      });
    }
    throw new UnsupportedBankingError(
      `Unsupported banking shape: padding for ${this.banking.length} dimension groups over rank ${rank} is not defined`,
    );
  }

  equals(other: Memory): boolean {
    return (
      this.depth === other.depth &&
      sameAccumType(this.accType, other.accType) &&
      this.resource === other.resource &&
      this.banking.length === other.banking.length &&
      this.banking.every((bank, i) => sameBanking(bank, other.banking[i]))
    );
  }

  toString(): string {
    const format = this.isFlat ? "Flat" : "Hierarchical";
    const banks = this.banking.map(describeBanking).join("; ");
    return `Memory(depth=${this.depth}, accum=${describeAccumType(this.accType)}, banks=${this.totalBanks} <${format}>: ${banks})`;
  }

  private flatOffset(bank: Banking, dims: readonly number[], addr: readonly number[]): number {
    const rank = dims.length;
    const b = bank.stride;
    const periods = this.periods(rank);

    let chunk = 0;
    for (let t = 0; t < rank; t += 1) {
      const p = periods[t];
      const ofsdim = Number.isFinite(p) ? Math.floor(addr[t] / p) : 0;
      let weight = 1;
      for (let k = t + 1; k < rank; k += 1) {
        weight *= ceilDiv(dims[k], periods[k]);
      }
      chunk += ofsdim * weight;
    }

    let intrablock = 0;
    for (let t = 0; t < rank; t += 1) {
      intrablock += floorMod(addr[t], b) * b ** (rank - t - 1);
    }

    return chunk * b ** rank + intrablock;
  }

  private hierarchicalOffset(dims: readonly number[], addr: readonly number[]): number {
    const rank = dims.length;
    let offset = 0;
    for (let t = 0; t < rank; t += 1) {
      const { stride: b, nBanks: n } = this.perDimension(t);
      let weight = 1;
      for (let k = t + 1; k < rank; k += 1) {
        weight *= Math.ceil(dims[k] / this.banking[k].nBanks);
      }
      const local = Math.floor(addr[t] / (b * n)) * b + floorMod(addr[t], b);
      offset += local * weight;
    }
    return offset;
  }

  private perDimension(t: number): Banking {
    const bank = this.banking[t];
    if (bank.dims.length !== 1 || bank.dims[0] !== t) {
      throw new UnsupportedBankingError(
        `Unsupported banking shape: hierarchical entry ${t} governs dims {${bank.dims.join(",")}} instead of {${t}}`,
      );
    }
    return bank;
  }

  private dimAt(values: readonly number[], dim: number): number {
    if (dim >= values.length) {
      throw new InvalidAddressError(`Banking refers to dimension ${dim} but only ${values.length} were given`, {
        uid: values,
      });
    }
    return values[dim];
  }
}
