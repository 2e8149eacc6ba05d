import { beforeEach, describe, expect, it } from "vitest";
import { MAX_AMOUNT } from "../amount";
import { encodeLedgerState } from "../codec";
import { LendingError, type LendingErrorKind } from "../errors";
import {
  accrueInterest,
  addCollateral,
  allocateInterest,
  balanceOf,
  borrow,
  collateralOf,
  createLedger,
  debtOf,
  deposit,
  getAccountLiquidity,
  getAccountPosition,
  getTotalBorrow,
  getTotalSupply,
  liquidate,
  maxBorrow,
  pause,
  reinitialize,
  removeCollateral,
  repay,
  setInterestRateModel,
  unpause,
  withdraw
} from "../ledger";
import { type LedgerState, sumAmounts } from "../state";

const ADMIN = "admin";
const A = "alice";
const B = "bob";
const C = "carol";

function expectLendingError(fn: () => unknown, kind: LendingErrorKind): void {
  let caught: unknown;
  try {
    fn();
  } catch (err) {
    caught = err;
  }
  expect(caught).toBeInstanceOf(LendingError);
  expect(caught instanceof LendingError ? caught.kind : undefined).toBe(kind);
}

function expectUnchanged(state: LedgerState, fn: () => unknown, kind: LendingErrorKind): void {
  const before = encodeLedgerState(state);
  expectLendingError(fn, kind);
  expect(encodeLedgerState(state)).toEqual(before);
}

function expectTotalsMatch(state: LedgerState): void {
  expect(state.totalSupply).toBe(sumAmounts(state.balances));
  expect(state.totalBorrow).toBe(sumAmounts(state.debts));
}

describe("lending ledger", () => {
  let state: LedgerState;

  beforeEach(() => {
    state = createLedger("rate-model", "asset", ADMIN).state;
  });

  describe("createLedger", () => {
    it("starts empty and unpaused with the caller as admin", () => {
      const { state: fresh, event } = createLedger("model-1", "asset-1", "creator");
      expect(fresh.admin).toBe("creator");
      expect(fresh.paused).toBe(false);
      expect(fresh.totalSupply).toBe(0n);
      expect(fresh.totalBorrow).toBe(0n);
      expect(fresh.balances.size).toBe(0);
      expect(event).toEqual({ type: "Initialized", model: "model-1", asset: "asset-1" });
    });
  });

  describe("deposits and withdrawals", () => {
    it("credits the caller and total supply on deposit", () => {
      const event = deposit(state, A, 100n);
      expect(event).toEqual({ type: "Deposit", from: A, amount: 100n });
      expect(getTotalSupply(state)).toBe(100n);
      expect(balanceOf(state, A)).toBe(100n);
    });

    it("debits on withdraw and drops emptied balances", () => {
      deposit(state, A, 100n);
      expect(withdraw(state, A, 40n)).toEqual({ type: "Withdraw", to: A, amount: 40n });
      expect(balanceOf(state, A)).toBe(60n);
      withdraw(state, A, 60n);
      expect(state.balances.has(A)).toBe(false);
      expect(getTotalSupply(state)).toBe(0n);
    });

    it("rejects a withdrawal above the balance", () => {
      deposit(state, A, 10n);
      expectUnchanged(state, () => withdraw(state, A, 11n), "InsufficientBalance");
    });

    it("rejects a deposit that would overflow", () => {
      deposit(state, A, MAX_AMOUNT);
      expectUnchanged(state, () => deposit(state, B, 1n), "ArithmeticOverflow");
      expectUnchanged(state, () => deposit(state, A, 1n), "ArithmeticOverflow");
    });
  });

  describe("collateral", () => {
    it("adds and removes collateral", () => {
      expect(addCollateral(state, A, 200n)).toEqual({ type: "CollateralAdded", user: A, amount: 200n });
      expect(removeCollateral(state, A, 50n)).toEqual({ type: "CollateralRemoved", user: A, amount: 50n });
      expect(collateralOf(state, A)).toBe(150n);
    });

    it("rejects removing more than pledged", () => {
      addCollateral(state, A, 5n);
      expectUnchanged(state, () => removeCollateral(state, A, 6n), "InsufficientCollateral");
    });
  });

  describe("borrow", () => {
    it("allows borrowing up to half the collateral", () => {
      expect(maxBorrow(201n)).toBe(100n);
      addCollateral(state, A, 200n);
      expect(borrow(state, A, 100n)).toEqual({ type: "Borrow", borrower: A, amount: 100n });
      expect(debtOf(state, A)).toBe(100n);
      expect(getTotalBorrow(state)).toBe(100n);
    });

    it("fails one unit past the bound", () => {
      addCollateral(state, A, 200n);
      expectUnchanged(state, () => borrow(state, A, 101n), "InsufficientCollateral");
    });

    it("counts existing debt toward the bound", () => {
      deposit(state, A, 100n);
      addCollateral(state, A, 200n);
      borrow(state, A, 100n);
      expect(getTotalBorrow(state)).toBe(100n);
      expectUnchanged(state, () => borrow(state, A, 1n), "InsufficientCollateral");
    });

    it("rejects borrowing with no collateral", () => {
      expectUnchanged(state, () => borrow(state, A, 1n), "InsufficientCollateral");
      expect(borrow(state, A, 0n)).toEqual({ type: "Borrow", borrower: A, amount: 0n });
    });
  });

  describe("repay", () => {
    it("reduces debt and total borrow", () => {
      addCollateral(state, A, 100n);
      borrow(state, A, 50n);
      expect(repay(state, A, 20n)).toEqual({ type: "Repay", borrower: A, amount: 20n });
      expect(debtOf(state, A)).toBe(30n);
      expect(getTotalBorrow(state)).toBe(30n);
    });

    it("rejects repaying more than owed with InsufficientBalance", () => {
      addCollateral(state, A, 100n);
      borrow(state, A, 10n);
      expectUnchanged(state, () => repay(state, A, 11n), "InsufficientBalance");
    });
  });

  describe("liquidate", () => {
    beforeEach(() => {
      addCollateral(state, B, 100n);
      borrow(state, B, 50n);
      removeCollateral(state, B, 50n);
    });

    it("lets any caller reduce a borrower's debt and collateral", () => {
      expect(liquidate(state, C, B, 50n)).toEqual({ type: "Liquidate", liquidator: C, borrower: B, amount: 50n });
      expect(debtOf(state, B)).toBe(0n);
      expect(collateralOf(state, B)).toBe(0n);
      expect(getTotalBorrow(state)).toBe(0n);
      expectUnchanged(state, () => liquidate(state, C, B, 50n), "InsufficientBalance");
    });

    it("checks debt before collateral", () => {
      removeCollateral(state, B, 45n);
      expectUnchanged(state, () => liquidate(state, C, B, 60n), "InsufficientBalance");
      expectUnchanged(state, () => liquidate(state, C, B, 10n), "InsufficientCollateral");
    });
  });

  describe("accrueInterest", () => {
    it("adds 1% of total borrow, truncated", () => {
      addCollateral(state, A, 2000n);
      borrow(state, A, 1000n);
      expect(accrueInterest(state, C)).toEqual({ type: "InterestAccrued", amount: 10n });
      expect(getTotalBorrow(state)).toBe(1010n);
      expect(debtOf(state, A)).toBe(1010n);
    });

    it("accrues nothing below 100 units of debt", () => {
      addCollateral(state, A, 200n);
      borrow(state, A, 99n);
      expect(accrueInterest(state, A)).toEqual({ type: "InterestAccrued", amount: 0n });
      expect(getTotalBorrow(state)).toBe(99n);
    });

    it("spreads interest over debtors and keeps totals consistent", () => {
      addCollateral(state, A, 1000n);
      addCollateral(state, B, 1000n);
      addCollateral(state, C, 1000n);
      borrow(state, A, 150n);
      borrow(state, B, 150n);
      borrow(state, C, 100n);
      accrueInterest(state, ADMIN);
      expect(getTotalBorrow(state)).toBe(404n);
      expect(debtOf(state, A)).toBe(152n);
      expect(debtOf(state, B)).toBe(151n);
      expect(debtOf(state, C)).toBe(101n);
      expectTotalsMatch(state);
    });

    it("can push debt past the borrow bound", () => {
      addCollateral(state, A, 400n);
      borrow(state, A, 200n);
      accrueInterest(state, A);
      expect(debtOf(state, A)).toBe(202n);
      expect(getAccountPosition(state, A).maxBorrow).toBe(200n);
    });
  });

  describe("allocateInterest", () => {
    it("hands leftover units to the largest remainders", () => {
      const debts = new Map([
        ["x", 1n],
        ["y", 1n],
        ["z", 1n]
      ]);
      const shares = allocateInterest(debts, 3n, 2n);
      expect(shares.get("x")).toBe(1n);
      expect(shares.get("y")).toBe(1n);
      expect(shares.get("z")).toBe(0n);
    });
  });

  describe("negative amounts", () => {
    it("are refused by every amount-taking transition before any write", () => {
      deposit(state, A, 50n);
      addCollateral(state, A, 40n);
      borrow(state, A, 10n);
      expectUnchanged(state, () => deposit(state, A, -5n), "ArithmeticOverflow");
      expectUnchanged(state, () => withdraw(state, A, -5n), "ArithmeticOverflow");
      expectUnchanged(state, () => addCollateral(state, A, -5n), "ArithmeticOverflow");
      expectUnchanged(state, () => removeCollateral(state, A, -5n), "ArithmeticOverflow");
      expectUnchanged(state, () => borrow(state, A, -5n), "ArithmeticOverflow");
      expectUnchanged(state, () => repay(state, A, -5n), "ArithmeticOverflow");
      expectUnchanged(state, () => liquidate(state, B, A, -5n), "ArithmeticOverflow");
      expect(collateralOf(state, A)).toBe(40n);
    });
  });

  describe("pause gate", () => {
    it("rejects every user transition while paused", () => {
      deposit(state, A, 100n);
      addCollateral(state, A, 100n);
      borrow(state, A, 10n);
      expect(pause(state, ADMIN)).toEqual({ type: "ContractPaused" });
      const attempts: (() => unknown)[] = [
        () => deposit(state, A, 1n),
        () => withdraw(state, A, 1n),
        () => borrow(state, A, 1n),
        () => repay(state, A, 1n),
        () => liquidate(state, B, A, 1n),
        () => addCollateral(state, A, 1n),
        () => removeCollateral(state, A, 1n),
        () => accrueInterest(state, A)
      ];
      for (const attempt of attempts) {
        expectUnchanged(state, attempt, "ContractPaused");
      }
    });

    it("checks the pause gate before preconditions", () => {
      pause(state, ADMIN);
      expectUnchanged(state, () => withdraw(state, A, 1_000n), "ContractPaused");
    });

    it("still admits admin transitions and resumes on unpause", () => {
      pause(state, ADMIN);
      expect(pause(state, ADMIN)).toEqual({ type: "ContractPaused" });
      expect(setInterestRateModel(state, ADMIN, "model-2")).toEqual({
        type: "InterestRateModelUpdated",
        model: "model-2"
      });
      expect(unpause(state, ADMIN)).toEqual({ type: "ContractUnpaused" });
      expect(state.paused).toBe(false);
      deposit(state, A, 1n);
      expect(balanceOf(state, A)).toBe(1n);
    });
  });

  describe("authorization", () => {
    it("rejects admin transitions from other callers", () => {
      expectUnchanged(state, () => setInterestRateModel(state, A, "evil"), "NotAuthorized");
      expectUnchanged(state, () => reinitialize(state, A, "evil", "evil"), "NotAuthorized");
      expectUnchanged(state, () => pause(state, A), "NotAuthorized");
      pause(state, ADMIN);
      expectUnchanged(state, () => unpause(state, A), "NotAuthorized");
    });

    it("replaces both collaborators on reinitialize", () => {
      expect(reinitialize(state, ADMIN, "model-3", "asset-3")).toEqual({
        type: "Initialized",
        model: "model-3",
        asset: "asset-3"
      });
      expect(state.interestRateModel).toBe("model-3");
      expect(state.underlyingAsset).toBe("asset-3");
    });
  });

  describe("queries", () => {
    it("reports zero liquidity for under-collateralized accounts", () => {
      addCollateral(state, B, 100n);
      borrow(state, B, 50n);
      removeCollateral(state, B, 80n);
      expect(getAccountLiquidity(state, B)).toBe(0n);
      expect(getAccountPosition(state, B)).toEqual({
        account: B,
        balance: 0n,
        debt: 50n,
        collateral: 20n,
        liquidity: 0n,
        shortfall: 30n,
        maxBorrow: 10n
      });
    });

    it("reports collateral minus debt otherwise", () => {
      addCollateral(state, A, 100n);
      borrow(state, A, 30n);
      expect(getAccountLiquidity(state, A)).toBe(70n);
      expect(getAccountLiquidity(state, "nobody")).toBe(0n);
    });
  });

  it("keeps totals equal to the sum of positions across a mixed sequence", () => {
    deposit(state, A, 500n);
    deposit(state, B, 300n);
    addCollateral(state, A, 800n);
    addCollateral(state, B, 300n);
    borrow(state, A, 350n);
    borrow(state, B, 150n);
    withdraw(state, B, 120n);
    repay(state, A, 49n);
    accrueInterest(state, C);
    liquidate(state, C, B, 100n);
    expectLendingError(() => borrow(state, B, 1_000n), "InsufficientCollateral");
    accrueInterest(state, C);
    expectTotalsMatch(state);
    expect(getTotalSupply(state)).toBe(680n);
  });
});
