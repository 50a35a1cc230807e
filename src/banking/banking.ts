import { InvalidBankingError } from "../errors.js";

/** Banking address function (alpha*A / B) mod N. */
export interface ModBanking {
  readonly kind: "mod";
  readonly nBanks: number;
  readonly stride: number;
  readonly alpha: readonly number[];
  readonly dims: readonly number[];
}

/** Closed set of banking strategies. Every switch over `kind` must stay exhaustive. */
export type Banking = ModBanking;

function assertPositiveInt(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidBankingError(`Banking ${name} must be a positive integer, got ${value}`);
  }
}

export function modBanking(nBanks: number, stride: number, alpha: readonly number[], dims: readonly number[]): ModBanking {
  assertPositiveInt(nBanks, "bank count");
  assertPositiveInt(stride, "stride");
  if (alpha.length !== dims.length) {
    throw new InvalidBankingError(
      `Banking alpha <${alpha.join(",")}> does not match dims {${dims.join(",")}}`,
    );
  }
  for (const a of alpha) {
    if (!Number.isInteger(a)) {
      throw new InvalidBankingError(`Banking alpha must be integers, got <${alpha.join(",")}>`);
    }
  }
  for (const d of dims) {
    if (!Number.isInteger(d) || d < 0) {
      throw new InvalidBankingError(`Banking dims must be non-negative integers, got {${dims.join(",")}}`);
    }
  }
  return { kind: "mod", nBanks, stride, alpha: [...alpha], dims: [...dims] };
}

export function unitBanking(rank: number): ModBanking {
  return modBanking(
    1,
    1,
    Array.from({ length: rank }, () => 1),
    Array.from({ length: rank }, (_, i) => i),
  );
}

function floorMod(a: number, n: number): number {
  return ((a % n) + n) % n;
}

/**
 * Bank index of an address restricted to this banking's dimensions
 * (`addr[i]` pairs with `alpha[i]`).
 */
export function bankSelect(banking: Banking, addr: readonly number[]): number {
  switch (banking.kind) {
    case "mod": {
      let sum = 0;
      for (let i = 0; i < banking.alpha.length; i += 1) {
        sum += banking.alpha[i] * (addr[i] ?? 0);
      }
      return floorMod(Math.floor(sum / banking.stride), banking.nBanks);
    }
  }
}

export function isCyclic(banking: Banking): boolean {
  return banking.stride === 1;
}

export function describeBanking(banking: Banking): string {
  switch (banking.kind) {
    case "mod": {
      const name = isCyclic(banking) ? "Cyclic" : "Block Cyclic";
      return `Dims {${banking.dims.join(",")}}: ${name}: N=${banking.nBanks}, B=${banking.stride}, alpha=<${banking.alpha.join(",")}>`;
    }
  }
}

export function sameBanking(a: Banking, b: Banking): boolean {
  return (
    a.kind === b.kind &&
    a.nBanks === b.nBanks &&
    a.stride === b.stride &&
    a.alpha.length === b.alpha.length &&
    a.alpha.every((value, i) => value === b.alpha[i]) &&
    a.dims.length === b.dims.length &&
    a.dims.every((value, i) => value === b.dims[i])
  );
}
