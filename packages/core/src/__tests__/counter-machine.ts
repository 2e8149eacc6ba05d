import type { StateMachine, Transaction } from "../types";

export interface CounterState {
  value: number;
}

export type CounterEvent = { type: "Changed"; by: number; value: number };

function amountOf(tx: Transaction): number {
  const payload = tx.payload;
  const raw = typeof payload === "object" && payload !== null && !Array.isArray(payload) ? payload.amount : undefined;
  const amount = typeof raw === "number" ? raw : 1;
  if (!Number.isInteger(amount) || amount <= 0) {
    throw new Error("Amount must be positive integer");
  }
  return amount;
}

/** Minimal machine for exercising the host without the lending ledger. */
export const CounterStateMachine: StateMachine<CounterState, CounterEvent> = {
  name: "counter",
  initState(genesis) {
    const app = genesis.appState;
    const initial = typeof app === "object" && app !== null && !Array.isArray(app) && typeof app.value === "number" ? app.value : 0;
    return { state: { value: initial }, events: [] };
  },
  applyTx(state, tx) {
    if (tx.type !== "inc" && tx.type !== "dec") {
      throw new Error("Invalid tx type for counter");
    }
    const by = tx.type === "inc" ? amountOf(tx) : -amountOf(tx);
    if (state.value + by < 0) {
      throw new Error("Counter cannot go below zero");
    }
    const value = state.value + by;
    return { state: { value }, events: [{ type: "Changed", by, value }] };
  },
  encodeState: (state) => ({ value: state.value }),
  decodeState(raw) {
    if (typeof raw !== "object" || raw === null || Array.isArray(raw) || typeof raw.value !== "number") {
      throw new Error("Invalid counter snapshot");
    }
    return { value: raw.value };
  },
  encodeEvent: (event) => ({ ...event }),
  queries: {
    value: (state) => ({ value: state.value })
  }
};
