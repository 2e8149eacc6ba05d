import type { Logger } from "pino";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export interface Transaction {
  id: string;
  type: string;
  payload: JsonValue;
  sender?: string;
  nonce?: string | number;
}

export interface TxReceipt {
  txId: string;
  events: JsonValue[];
}

export interface Block {
  height: number;
  timestamp: number;
  prevHash: string | null;
  txs: Transaction[];
  receipts: TxReceipt[];
  blockHash: string;
}

export interface GenesisData {
  chainId: string;
  appState?: JsonValue;
}

export interface Transition<State, Event> {
  state: State;
  events: Event[];
}

export type QueryArgs = Record<string, string | undefined>;

export interface StateMachine<State, Event> {
  name: string;
  initState(genesis: GenesisData): Transition<State, Event>;
  /** Must not mutate `state`; throws when the transaction is rejected. */
  applyTx(state: State, tx: Transaction): Transition<State, Event>;
  encodeState(state: State): JsonValue;
  decodeState(raw: JsonValue): State;
  encodeEvent(event: Event): JsonValue;
  /** Maps a thrown transition error to the kind reported on receipts and API errors. */
  errorKind?(err: unknown): string | undefined;
  queries?: Record<string, (state: State, args: QueryArgs) => JsonValue>;
}

export interface BlockStore {
  init(): Promise<void>;
  getLatestHeight(): Promise<number>;
  getBlock(height: number): Promise<Block | undefined>;
  putBlock(block: Block, stateSnapshot: JsonValue): Promise<void>;
  getState(height: number): Promise<JsonValue | undefined>;
  getLatestState(): Promise<{ height: number; state: JsonValue } | undefined>;
  close(): Promise<void>;
}

export interface ApiConfig {
  port: number;
  host?: string;
}

export interface NodeConfig<State, Event> {
  chainId: string;
  genesis: GenesisData;
  stateMachine: StateMachine<State, Event>;
  storage: BlockStore;
  blockTimeMs?: number;
  maxTxsPerBlock?: number;
  maxMempoolSize?: number;
  api?: ApiConfig;
  logger?: Logger;
}

export interface NodeStatus {
  chainId: string;
  stateMachine: string;
  height: number;
  latestBlockHash: string | null;
  mempool: number;
}

export interface NewBlockEvent {
  block: Block;
  state: JsonValue;
}

export interface ChainEvent {
  height: number;
  txId: string;
  index: number;
  event: JsonValue;
}

export interface Snapshot {
  chainId: string;
  height: number;
  blockHash: string | null;
  state: JsonValue;
}
