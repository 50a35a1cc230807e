export type BankingErrorCode =
  | "missing-metadata"
  | "invariant-violation"
  | "unsupported-banking"
  | "invalid-configuration";

export interface BankingErrorContext {
  symbol?: string;
  uid?: readonly number[];
}

export function formatUid(uid: readonly number[]): string {
  return `{${uid.join(",")}}`;
}

/**
 * Base class for every failure raised by the banking analysis. These are
 * compiler-internal errors: a pass upstream produced malformed metadata.
 */
export class BankingAnalysisError extends Error {
  readonly symbol?: string;
  readonly uid?: readonly number[];

  constructor(readonly code: BankingErrorCode, message: string, context: BankingErrorContext = {}) {
    super(message);
    this.name = new.target.name;
    this.symbol = context.symbol;
    this.uid = context.uid;
  }
}

export class MissingMetadataError extends BankingAnalysisError {
  constructor(readonly kind: string, message: string, context: BankingErrorContext = {}) {
    super("missing-metadata", message, context);
  }
}

export class InvariantViolationError extends BankingAnalysisError {
  constructor(message: string, context: BankingErrorContext = {}) {
    super("invariant-violation", message, context);
  }
}

export class UnsupportedBankingError extends BankingAnalysisError {
  constructor(message: string, context: BankingErrorContext = {}) {
    super("unsupported-banking", message, context);
  }
}

export class InvalidBankingError extends BankingAnalysisError {
  constructor(message: string) {
    super("invalid-configuration", message);
  }
}

export class InvalidPortError extends BankingAnalysisError {
  constructor(message: string) {
    super("invalid-configuration", message);
  }
}

export class InvalidAddressError extends BankingAnalysisError {
  constructor(message: string, context: BankingErrorContext = {}) {
    super("invalid-configuration", message, context);
  }
}

export type Result<T, E = BankingAnalysisError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function unwrap<T>(result: Result<T, Error>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}
