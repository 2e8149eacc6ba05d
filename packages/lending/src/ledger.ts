import { checkedAdd, checkedSub, saturatingSub, type Amount } from "./amount";
import { LendingError } from "./errors";
import { readAmount, writeAmount, type AccountId, type AmountMap, type LedgerEvent, type LedgerState } from "./state";

// Loan-to-value is fixed at 50% and interest at 1% per accrual. The stored
// interestRateModel reference is not consulted.
const LOAN_TO_VALUE_DIVISOR = 2n;
const INTEREST_DIVISOR = 100n;

export function maxBorrow(collateral: Amount): Amount {
  return collateral / LOAN_TO_VALUE_DIVISOR;
}

export function calculateInterest(totalBorrow: Amount): Amount {
  return totalBorrow / INTEREST_DIVISOR;
}

export function createLedger(
  interestRateModel: AccountId,
  underlyingAsset: AccountId,
  caller: AccountId
): { state: LedgerState; event: LedgerEvent } {
  const state: LedgerState = {
    admin: caller,
    interestRateModel,
    underlyingAsset,
    paused: false,
    totalSupply: 0n,
    totalBorrow: 0n,
    balances: new Map(),
    debts: new Map(),
    collaterals: new Map()
  };
  return { state, event: { type: "Initialized", model: interestRateModel, asset: underlyingAsset } };
}

function ensureNotPaused(state: LedgerState): void {
  if (state.paused) {
    throw new LendingError("ContractPaused");
  }
}

function ensureAdmin(state: LedgerState, caller: AccountId): void {
  if (caller !== state.admin) {
    throw new LendingError("NotAuthorized", `${caller} is not the ledger admin`);
  }
}

export function setInterestRateModel(state: LedgerState, caller: AccountId, model: AccountId): LedgerEvent {
  ensureAdmin(state, caller);
  state.interestRateModel = model;
  return { type: "InterestRateModelUpdated", model };
}

export function reinitialize(
  state: LedgerState,
  caller: AccountId,
  model: AccountId,
  asset: AccountId
): LedgerEvent {
  ensureAdmin(state, caller);
  state.interestRateModel = model;
  state.underlyingAsset = asset;
  return { type: "Initialized", model, asset };
}

export function pause(state: LedgerState, caller: AccountId): LedgerEvent {
  ensureAdmin(state, caller);
  state.paused = true;
  return { type: "ContractPaused" };
}

export function unpause(state: LedgerState, caller: AccountId): LedgerEvent {
  ensureAdmin(state, caller);
  state.paused = false;
  return { type: "ContractUnpaused" };
}

export function deposit(state: LedgerState, caller: AccountId, amount: Amount): LedgerEvent {
  ensureNotPaused(state);
  const balance = checkedAdd(readAmount(state.balances, caller), amount);
  const totalSupply = checkedAdd(state.totalSupply, amount);
  writeAmount(state.balances, caller, balance);
  state.totalSupply = totalSupply;
  return { type: "Deposit", from: caller, amount };
}

export function withdraw(state: LedgerState, caller: AccountId, amount: Amount): LedgerEvent {
  ensureNotPaused(state);
  const balance = readAmount(state.balances, caller);
  if (balance < amount) {
    throw new LendingError("InsufficientBalance", `Balance ${balance} is below withdrawal of ${amount}`);
  }
  const totalSupply = checkedSub(state.totalSupply, amount);
  writeAmount(state.balances, caller, balance - amount);
  state.totalSupply = totalSupply;
  return { type: "Withdraw", to: caller, amount };
}

export function addCollateral(state: LedgerState, caller: AccountId, amount: Amount): LedgerEvent {
  ensureNotPaused(state);
  const collateral = checkedAdd(readAmount(state.collaterals, caller), amount);
  writeAmount(state.collaterals, caller, collateral);
  return { type: "CollateralAdded", user: caller, amount };
}

export function removeCollateral(state: LedgerState, caller: AccountId, amount: Amount): LedgerEvent {
  ensureNotPaused(state);
  const collateral = readAmount(state.collaterals, caller);
  if (collateral < amount) {
    throw new LendingError("InsufficientCollateral", `Collateral ${collateral} is below removal of ${amount}`);
  }
  const remaining = checkedSub(collateral, amount);
  writeAmount(state.collaterals, caller, remaining);
  return { type: "CollateralRemoved", user: caller, amount };
}

export function borrow(state: LedgerState, caller: AccountId, amount: Amount): LedgerEvent {
  ensureNotPaused(state);
  const limit = maxBorrow(readAmount(state.collaterals, caller));
  const debt = checkedAdd(readAmount(state.debts, caller), amount);
  if (debt > limit) {
    throw new LendingError("InsufficientCollateral", `Debt of ${debt} would exceed borrow limit ${limit}`);
  }
  const totalBorrow = checkedAdd(state.totalBorrow, amount);
  writeAmount(state.debts, caller, debt);
  state.totalBorrow = totalBorrow;
  return { type: "Borrow", borrower: caller, amount };
}

export function repay(state: LedgerState, caller: AccountId, amount: Amount): LedgerEvent {
  ensureNotPaused(state);
  const debt = readAmount(state.debts, caller);
  if (debt < amount) {
    throw new LendingError("InsufficientBalance", `Debt ${debt} is below repayment of ${amount}`);
  }
  const totalBorrow = checkedSub(state.totalBorrow, amount);
  writeAmount(state.debts, caller, debt - amount);
  state.totalBorrow = totalBorrow;
  return { type: "Repay", borrower: caller, amount };
}

export function liquidate(
  state: LedgerState,
  caller: AccountId,
  borrower: AccountId,
  amount: Amount
): LedgerEvent {
  ensureNotPaused(state);
  const debt = readAmount(state.debts, borrower);
  if (debt < amount) {
    throw new LendingError("InsufficientBalance", `Debt ${debt} is below liquidation of ${amount}`);
  }
  const collateral = readAmount(state.collaterals, borrower);
  if (collateral < amount) {
    throw new LendingError("InsufficientCollateral", `Collateral ${collateral} is below liquidation of ${amount}`);
  }
  const totalBorrow = checkedSub(state.totalBorrow, amount);
  writeAmount(state.debts, borrower, debt - amount);
  writeAmount(state.collaterals, borrower, collateral - amount);
  state.totalBorrow = totalBorrow;
  return { type: "Liquidate", liquidator: caller, borrower, amount };
}

/**
 * Splits `interest` across debtors in proportion to their debt. Integer shares
 * are truncated and the leftover units go to the largest fractional remainders,
 * ties broken by account id, so the shares always sum to `interest`.
 */
export function allocateInterest(debts: AmountMap, totalBorrow: Amount, interest: Amount): Map<AccountId, Amount> {
  const shares = new Map<AccountId, Amount>();
  if (interest === 0n || totalBorrow === 0n) {
    return shares;
  }
  const remainders: { account: AccountId; remainder: Amount }[] = [];
  let allocated = 0n;
  for (const [account, debt] of debts) {
    const scaled = debt * interest;
    const share = scaled / totalBorrow;
    shares.set(account, share);
    allocated += share;
    remainders.push({ account, remainder: scaled % totalBorrow });
  }
  remainders.sort((a, b) => {
    if (a.remainder !== b.remainder) return a.remainder > b.remainder ? -1 : 1;
    return a.account < b.account ? -1 : a.account > b.account ? 1 : 0;
  });
  let leftover = interest - allocated;
  for (const { account } of remainders) {
    if (leftover === 0n) break;
    shares.set(account, (shares.get(account) ?? 0n) + 1n);
    leftover -= 1n;
  }
  return shares;
}

export function accrueInterest(state: LedgerState, _caller: AccountId): LedgerEvent {
  ensureNotPaused(state);
  const interest = calculateInterest(state.totalBorrow);
  const totalBorrow = checkedAdd(state.totalBorrow, interest);
  const updated = new Map<AccountId, Amount>();
  for (const [account, share] of allocateInterest(state.debts, state.totalBorrow, interest)) {
    updated.set(account, checkedAdd(readAmount(state.debts, account), share));
  }
  for (const [account, debt] of updated) {
    writeAmount(state.debts, account, debt);
  }
  state.totalBorrow = totalBorrow;
  return { type: "InterestAccrued", amount: interest };
}

export function balanceOf(state: LedgerState, account: AccountId): Amount {
  return readAmount(state.balances, account);
}

export function debtOf(state: LedgerState, account: AccountId): Amount {
  return readAmount(state.debts, account);
}

export function collateralOf(state: LedgerState, account: AccountId): Amount {
  return readAmount(state.collaterals, account);
}

/** Collateral minus debt, reported as zero when the account is under water. */
export function getAccountLiquidity(state: LedgerState, account: AccountId): Amount {
  return saturatingSub(collateralOf(state, account), debtOf(state, account));
}

export function getTotalSupply(state: LedgerState): Amount {
  return state.totalSupply;
}

export function getTotalBorrow(state: LedgerState): Amount {
  return state.totalBorrow;
}

export interface AccountPosition {
  account: AccountId;
  balance: Amount;
  debt: Amount;
  collateral: Amount;
  liquidity: Amount;
  shortfall: Amount;
  maxBorrow: Amount;
}

export function getAccountPosition(state: LedgerState, account: AccountId): AccountPosition {
  const debt = debtOf(state, account);
  const collateral = collateralOf(state, account);
  return {
    account,
    balance: balanceOf(state, account),
    debt,
    collateral,
    liquidity: saturatingSub(collateral, debt),
    shortfall: saturatingSub(debt, collateral),
    maxBorrow: maxBorrow(collateral)
  };
}
