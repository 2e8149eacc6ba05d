import { z } from "zod";
import {
  InvalidRequestError,
  type GenesisData,
  type JsonValue,
  type QueryArgs,
  type StateMachine,
  type Transaction,
  type Transition
} from "@lendchain/core";
import { formatAmount } from "./amount";
import {
  AccountIdSchema,
  AmountSchema,
  decodeLedgerState,
  encodeLedgerEvent,
  encodeLedgerState
} from "./codec";
import { InvalidTransactionError, isLendingError } from "./errors";
import {
  accrueInterest,
  addCollateral,
  borrow,
  createLedger,
  deposit,
  getAccountLiquidity,
  getAccountPosition,
  liquidate,
  pause,
  reinitialize,
  removeCollateral,
  repay,
  setInterestRateModel,
  unpause,
  withdraw
} from "./ledger";
import { cloneLedgerState, type AccountId, type LedgerEvent, type LedgerState } from "./state";

export const LENDING_TX_TYPES = [
  "deposit",
  "withdraw",
  "add-collateral",
  "remove-collateral",
  "borrow",
  "repay",
  "liquidate",
  "accrue-interest",
  "set-interest-rate-model",
  "reinitialize",
  "pause",
  "unpause"
] as const;

export type LendingTxType = (typeof LENDING_TX_TYPES)[number];

export const GenesisAppStateSchema = z.object({
  admin: AccountIdSchema,
  interestRateModel: AccountIdSchema,
  underlyingAsset: AccountIdSchema
});

export type GenesisAppState = z.infer<typeof GenesisAppStateSchema>;

const AmountPayloadSchema = z.object({ amount: AmountSchema });
const LiquidatePayloadSchema = z.object({ borrower: AccountIdSchema, amount: AmountSchema });
const ModelPayloadSchema = z.object({ model: AccountIdSchema });
const ReinitializePayloadSchema = z.object({ model: AccountIdSchema, asset: AccountIdSchema });

type Handler = (state: LedgerState, sender: AccountId, tx: Transaction) => LedgerEvent;

function parsePayload<T extends z.ZodTypeAny>(schema: T, tx: Transaction): z.output<T> {
  const result = schema.safeParse(tx.payload);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "payload"}: ${issue.message}`)
      .join("; ");
    throw new InvalidTransactionError(`Invalid ${tx.type} payload: ${detail}`, { cause: result.error });
  }
  return result.data;
}

const handlers: Record<LendingTxType, Handler> = {
  deposit: (state, sender, tx) => deposit(state, sender, parsePayload(AmountPayloadSchema, tx).amount),
  withdraw: (state, sender, tx) => withdraw(state, sender, parsePayload(AmountPayloadSchema, tx).amount),
  "add-collateral": (state, sender, tx) => addCollateral(state, sender, parsePayload(AmountPayloadSchema, tx).amount),
  "remove-collateral": (state, sender, tx) =>
    removeCollateral(state, sender, parsePayload(AmountPayloadSchema, tx).amount),
  borrow: (state, sender, tx) => borrow(state, sender, parsePayload(AmountPayloadSchema, tx).amount),
  repay: (state, sender, tx) => repay(state, sender, parsePayload(AmountPayloadSchema, tx).amount),
  liquidate: (state, sender, tx) => {
    const { borrower, amount } = parsePayload(LiquidatePayloadSchema, tx);
    return liquidate(state, sender, borrower, amount);
  },
  "accrue-interest": (state, sender) => accrueInterest(state, sender),
  "set-interest-rate-model": (state, sender, tx) =>
    setInterestRateModel(state, sender, parsePayload(ModelPayloadSchema, tx).model),
  reinitialize: (state, sender, tx) => {
    const { model, asset } = parsePayload(ReinitializePayloadSchema, tx);
    return reinitialize(state, sender, model, asset);
  },
  pause: (state, sender) => pause(state, sender),
  unpause: (state, sender) => unpause(state, sender)
};

export function isLendingTxType(type: string): type is LendingTxType {
  return LENDING_TX_TYPES.some((known) => known === type);
}

/**
 * Runs the transaction against `state` in place and returns its notification.
 * Throws before the first write when the transition is rejected.
 */
export function executeTx(state: LedgerState, tx: Transaction): LedgerEvent {
  if (!isLendingTxType(tx.type)) {
    throw new InvalidTransactionError(`Unsupported tx type for lending: ${tx.type}`);
  }
  if (typeof tx.sender !== "string" || tx.sender.length === 0) {
    throw new InvalidTransactionError("Lending txs require a sender");
  }
  return handlers[tx.type](state, tx.sender, tx);
}

function requireAccountArg(args: QueryArgs): AccountId {
  const account = args.account;
  if (!account) {
    throw new InvalidRequestError("query requires an account argument");
  }
  return account;
}

export const LendingStateMachine: StateMachine<LedgerState, LedgerEvent> = {
  name: "lending",
  initState(genesis: GenesisData): Transition<LedgerState, LedgerEvent> {
    const parsed = GenesisAppStateSchema.safeParse(genesis.appState);
    if (!parsed.success) {
      throw new Error(`Invalid lending genesis appState: ${parsed.error.message}`, { cause: parsed.error });
    }
    const { admin, interestRateModel, underlyingAsset } = parsed.data;
    const { state, event } = createLedger(interestRateModel, underlyingAsset, admin);
    return { state, events: [event] };
  },
  applyTx(state: LedgerState, tx: Transaction): Transition<LedgerState, LedgerEvent> {
    const next = cloneLedgerState(state);
    const event = executeTx(next, tx);
    return { state: next, events: [event] };
  },
  encodeState: (state) => encodeLedgerState(state),
  decodeState: (raw) => decodeLedgerState(raw),
  encodeEvent: (event) => encodeLedgerEvent(event),
  errorKind(err: unknown): string | undefined {
    if (isLendingError(err)) return err.kind;
    if (err instanceof InvalidTransactionError) return "InvalidTransaction";
    return undefined;
  },
  queries: {
    account(state: LedgerState, args: QueryArgs): JsonValue {
      const position = getAccountPosition(state, requireAccountArg(args));
      return {
        account: position.account,
        balance: formatAmount(position.balance),
        debt: formatAmount(position.debt),
        collateral: formatAmount(position.collateral),
        liquidity: formatAmount(position.liquidity),
        shortfall: formatAmount(position.shortfall),
        maxBorrow: formatAmount(position.maxBorrow)
      };
    },
    liquidity(state: LedgerState, args: QueryArgs): JsonValue {
      const account = requireAccountArg(args);
      return { account, liquidity: formatAmount(getAccountLiquidity(state, account)) };
    },
    totals(state: LedgerState): JsonValue {
      return {
        totalSupply: formatAmount(state.totalSupply),
        totalBorrow: formatAmount(state.totalBorrow),
        paused: state.paused,
        admin: state.admin,
        interestRateModel: state.interestRateModel,
        underlyingAsset: state.underlyingAsset
      };
    }
  }
};

export default LendingStateMachine;
