export type ReduceFunction = "add" | "mul" | "min" | "max" | "and" | "or" | "xor" | "custom";

export const REDUCE_FUNCTIONS: readonly ReduceFunction[] = ["add", "mul", "min", "max", "and", "or", "xor", "custom"];

export type AccumType =
  | { kind: "none" }
  | { kind: "reduce"; fn: ReduceFunction }
  | { kind: "fma" }
  | { kind: "unknown" };

const NONE: AccumType = { kind: "none" };
const FMA: AccumType = { kind: "fma" };
const UNKNOWN: AccumType = { kind: "unknown" };

export const AccumType = {
  None: NONE,
  FMA,
  Unknown: UNKNOWN,
  reduce(fn: ReduceFunction): AccumType {
    return { kind: "reduce", fn };
  },
};

export function isReduceFunction(value: string): value is ReduceFunction {
  return REDUCE_FUNCTIONS.some((fn) => fn === value);
}

export function sameAccumType(a: AccumType, b: AccumType): boolean {
  if (a.kind === "reduce" && b.kind === "reduce") {
    return a.fn === b.fn;
  }
  return a.kind === b.kind;
}

export function describeAccumType(accType: AccumType): string {
  switch (accType.kind) {
    case "none":
      return "None";
    case "reduce":
      return `Reduce(${accType.fn})`;
    case "fma":
      return "FMA";
    case "unknown":
      return "Unknown";
  }
}
