import { LendingError } from "./errors";

export type Amount = bigint;

export const MAX_AMOUNT: Amount = (1n << 128n) - 1n;

export function isAmount(value: bigint): boolean {
  return value >= 0n && value <= MAX_AMOUNT;
}

export function assertAmount(value: bigint): Amount {
  if (!isAmount(value)) {
    throw new LendingError("ArithmeticOverflow", `Amount ${value} outside [0, ${MAX_AMOUNT}]`);
  }
  return value;
}

export function checkedAdd(a: Amount, b: Amount): Amount {
  assertAmount(b);
  const sum = a + b;
  if (sum > MAX_AMOUNT) {
    throw new LendingError("ArithmeticOverflow", `Overflow adding ${b} to ${a}`);
  }
  return sum;
}

export function checkedSub(a: Amount, b: Amount): Amount {
  assertAmount(b);
  if (b > a) {
    throw new LendingError("ArithmeticOverflow", `Underflow subtracting ${b} from ${a}`);
  }
  return a - b;
}

export function saturatingSub(a: Amount, b: Amount): Amount {
  return a > b ? a - b : 0n;
}

/**
 * Parses the wire form of an amount: a decimal string or a safe non-negative
 * integer number.
 */
export function parseAmount(raw: string | number): Amount {
  if (typeof raw === "number") {
    if (!Number.isSafeInteger(raw) || raw < 0) {
      throw new LendingError("ArithmeticOverflow", `Amount must be a non-negative safe integer, got ${raw}`);
    }
    return BigInt(raw);
  }
  if (!/^\d+$/.test(raw)) {
    throw new LendingError("ArithmeticOverflow", `Amount must be a decimal integer string, got "${raw}"`);
  }
  return assertAmount(BigInt(raw));
}

export function formatAmount(amount: Amount): string {
  return amount.toString(10);
}
