export class ChainError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A transaction refused at admission. `kind` comes from the state machine. */
export class TxRejectedError extends ChainError {
  readonly kind: string;
  readonly txId: string;

  constructor(txId: string, kind: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.kind = kind;
    this.txId = txId;
  }
}

export class InvalidRequestError extends ChainError {}

export class NotInitializedError extends ChainError {
  constructor(message = "Node state not initialized", options?: ErrorOptions) {
    super(message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
