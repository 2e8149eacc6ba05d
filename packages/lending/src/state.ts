import type { Amount } from "./amount";

export type AccountId = string;

export type AmountMap = Map<AccountId, Amount>;

export interface LedgerState {
  admin: AccountId;
  interestRateModel: AccountId;
  underlyingAsset: AccountId;
  paused: boolean;
  totalSupply: Amount;
  totalBorrow: Amount;
  balances: AmountMap;
  debts: AmountMap;
  collaterals: AmountMap;
}

export type LedgerEvent =
  | { type: "Initialized"; model: AccountId; asset: AccountId }
  | { type: "Deposit"; from: AccountId; amount: Amount }
  | { type: "Withdraw"; to: AccountId; amount: Amount }
  | { type: "Borrow"; borrower: AccountId; amount: Amount }
  | { type: "Repay"; borrower: AccountId; amount: Amount }
  | { type: "Liquidate"; liquidator: AccountId; borrower: AccountId; amount: Amount }
  | { type: "InterestAccrued"; amount: Amount }
  | { type: "InterestRateModelUpdated"; model: AccountId }
  | { type: "CollateralAdded"; user: AccountId; amount: Amount }
  | { type: "CollateralRemoved"; user: AccountId; amount: Amount }
  | { type: "ContractPaused" }
  | { type: "ContractUnpaused" };

export function readAmount(map: AmountMap, account: AccountId): Amount {
  return map.get(account) ?? 0n;
}

// zero entries are dropped; an absent account reads as 0
export function writeAmount(map: AmountMap, account: AccountId, amount: Amount): void {
  if (amount === 0n) {
    map.delete(account);
  } else {
    map.set(account, amount);
  }
}

export function sumAmounts(map: AmountMap): Amount {
  let total = 0n;
  for (const value of map.values()) {
    total += value;
  }
  return total;
}

export function cloneLedgerState(state: LedgerState): LedgerState {
  return {
    ...state,
    balances: new Map(state.balances),
    debts: new Map(state.debts),
    collaterals: new Map(state.collaterals)
  };
}
