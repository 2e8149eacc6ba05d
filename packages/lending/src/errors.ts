export type LendingErrorKind =
  | "NotAuthorized"
  | "InsufficientBalance"
  | "InsufficientLiquidity"
  | "InsufficientCollateral"
  | "ContractPaused"
  | "ArithmeticOverflow";

const DEFAULT_MESSAGES: Record<LendingErrorKind, string> = {
  NotAuthorized: "Caller is not the ledger admin",
  InsufficientBalance: "Insufficient balance",
  // never raised by the current transitions
  InsufficientLiquidity: "Insufficient protocol liquidity",
  InsufficientCollateral: "Insufficient collateral",
  ContractPaused: "Ledger is paused",
  ArithmeticOverflow: "Amount out of range"
};

export class LendingError extends Error {
  readonly kind: LendingErrorKind;

  constructor(kind: LendingErrorKind, message = DEFAULT_MESSAGES[kind], options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/** Raised by the adapter when a transaction does not decode into a ledger operation. */
export class InvalidTransactionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export function isLendingError(err: unknown, kind?: LendingErrorKind): err is LendingError {
  return err instanceof LendingError && (kind === undefined || err.kind === kind);
}
