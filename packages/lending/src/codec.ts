import { z } from "zod";
import { formatAmount, parseAmount } from "./amount";
import { sumAmounts, type AmountMap, type LedgerEvent, type LedgerState } from "./state";

export const AccountIdSchema = z.string().min(1, "account id must be non-empty");

export const AmountSchema = z
  .union([z.string().regex(/^\d+$/, "amount must be a decimal integer string"), z.number().int().nonnegative()])
  .transform((raw, ctx) => {
    try {
      return parseAmount(raw);
    } catch (err) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: err instanceof Error ? err.message : String(err) });
      return z.NEVER;
    }
  });

// walks the own keys of the raw object, "__proto__" included
const AmountMapSchema = z.unknown().transform((raw, ctx): AmountMap => {
  const map: AmountMap = new Map();
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "expected an account to amount mapping" });
    return z.NEVER;
  }
  for (const [account, value] of Object.entries(raw)) {
    const amount = AmountSchema.safeParse(value);
    if (!amount.success || account.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "invalid mapping entry", path: [account] });
      return z.NEVER;
    }
    if (amount.data !== 0n) map.set(account, amount.data);
  }
  return map;
});

export const EncodedLedgerStateSchema = z.object({
  admin: AccountIdSchema,
  interestRateModel: AccountIdSchema,
  underlyingAsset: AccountIdSchema,
  paused: z.boolean(),
  totalSupply: AmountSchema,
  totalBorrow: AmountSchema,
  balances: AmountMapSchema,
  debts: AmountMapSchema,
  collaterals: AmountMapSchema
});

export type EncodedLedgerState = {
  admin: string;
  interestRateModel: string;
  underlyingAsset: string;
  paused: boolean;
  totalSupply: string;
  totalBorrow: string;
  balances: Record<string, string>;
  debts: Record<string, string>;
  collaterals: Record<string, string>;
};

function encodeMap(map: AmountMap): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [account, amount] of map) {
    Object.defineProperty(out, account, {
      value: formatAmount(amount),
      enumerable: true,
      writable: true,
      configurable: true
    });
  }
  return out;
}

export function encodeLedgerState(state: LedgerState): EncodedLedgerState {
  return {
    admin: state.admin,
    interestRateModel: state.interestRateModel,
    underlyingAsset: state.underlyingAsset,
    paused: state.paused,
    totalSupply: formatAmount(state.totalSupply),
    totalBorrow: formatAmount(state.totalBorrow),
    balances: encodeMap(state.balances),
    debts: encodeMap(state.debts),
    collaterals: encodeMap(state.collaterals)
  };
}

/**
 * Restores a persisted snapshot. Totals must match their mappings; a snapshot
 * that breaks that is rejected rather than repaired.
 */
export function decodeLedgerState(raw: unknown): LedgerState {
  const state: LedgerState = EncodedLedgerStateSchema.parse(raw);
  if (sumAmounts(state.balances) !== state.totalSupply) {
    throw new Error("Corrupt ledger snapshot: totalSupply does not match balances");
  }
  if (sumAmounts(state.debts) !== state.totalBorrow) {
    throw new Error("Corrupt ledger snapshot: totalBorrow does not match debts");
  }
  return state;
}

type WireEvent<E> = E extends LedgerEvent ? { [K in keyof E]: E[K] extends bigint ? string : E[K] } : never;

export type EncodedLedgerEvent = WireEvent<LedgerEvent>;

export function encodeLedgerEvent(event: LedgerEvent): EncodedLedgerEvent {
  switch (event.type) {
    case "Deposit":
    case "Withdraw":
    case "Borrow":
    case "Repay":
    case "Liquidate":
    case "InterestAccrued":
    case "CollateralAdded":
    case "CollateralRemoved":
      return { ...event, amount: formatAmount(event.amount) };
    default:
      return event;
  }
}
