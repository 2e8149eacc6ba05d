import { EventEmitter } from "events";
import type { Logger } from "pino";
import { calculateTxId, sealBlock, verifyBlockHash, type BlockDraft } from "./hash";
import { Mempool } from "./mempool";
import { createLogger } from "./logger";
import { ChainError, InvalidRequestError, NotInitializedError, TxRejectedError, errorMessage } from "./errors";
import { startApiServer, type ApiServer } from "./server";
import type {
  ApiConfig,
  Block,
  BlockStore,
  ChainEvent,
  GenesisData,
  JsonValue,
  NewBlockEvent,
  NodeConfig,
  NodeStatus,
  QueryArgs,
  Snapshot,
  StateMachine,
  Transaction,
  TxReceipt
} from "./types";

const DEFAULT_BLOCK_TIME = 2000;
const DEFAULT_MAX_TXS_PER_BLOCK = 100;

/**
 * Single-producer chain host. Admits transactions into a mempool, applies them
 * in order as blocks and persists a snapshot of the state machine after each
 * block. Block commits are chained so no two ever overlap.
 */
export class ChainNode<State, Event> extends EventEmitter {
  private chainId: string;
  private mempool: Mempool;
  private stateMachine: StateMachine<State, Event>;
  private storage: BlockStore;
  private genesis: GenesisData;
  private blockTimeMs: number;
  private maxTxsPerBlock: number;
  private apiConfig?: ApiConfig;
  private apiServer?: ApiServer;
  private logger: Logger;
  private running = false;
  private initialized = false;
  private produceTimer?: NodeJS.Timeout;
  private latestState?: { height: number; state: State; blockHash: string | null };
  private pendingState?: State;
  private commits: Promise<unknown> = Promise.resolve();

  constructor(config: NodeConfig<State, Event>) {
    super();
    this.chainId = config.chainId;
    this.stateMachine = config.stateMachine;
    this.storage = config.storage;
    this.genesis = config.genesis;
    this.blockTimeMs = config.blockTimeMs ?? DEFAULT_BLOCK_TIME;
    this.maxTxsPerBlock = config.maxTxsPerBlock ?? DEFAULT_MAX_TXS_PER_BLOCK;
    this.apiConfig = config.api;
    this.logger = (config.logger ?? createLogger()).child({ chainId: config.chainId });
    this.mempool = new Mempool(config.maxMempoolSize);
  }

  async init(): Promise<void> {
    if (this.initialized) return;
    await this.storage.init();
    const latest = await this.storage.getLatestState();
    if (!latest) {
      const { state, events } = this.stateMachine.initState(this.genesis);
      const block = sealBlock({
        height: 0,
        timestamp: 0,
        prevHash: null,
        txs: [],
        receipts: [{ txId: "genesis", events: events.map((e) => this.stateMachine.encodeEvent(e)) }]
      });
      await this.storage.putBlock(block, this.stateMachine.encodeState(state));
      this.latestState = { height: 0, state, blockHash: block.blockHash };
      this.logger.info({ stateMachine: this.stateMachine.name }, "genesis committed");
    } else {
      const block = await this.storage.getBlock(latest.height);
      if (block && !verifyBlockHash(block)) {
        throw new ChainError(`Stored block ${latest.height} does not match its hash`);
      }
      this.latestState = {
        height: latest.height,
        state: this.stateMachine.decodeState(latest.state),
        blockHash: block?.blockHash ?? null
      };
      this.logger.info({ height: latest.height }, "state restored from storage");
    }
    this.initialized = true;
    if (this.apiConfig) {
      this.apiServer = await startApiServer(this, this.apiConfig, this.logger);
    }
  }

  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    await this.init();
    this.scheduleProducer();
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.produceTimer) {
      clearInterval(this.produceTimer);
      this.produceTimer = undefined;
    }
    await this.commits;
    if (this.apiServer) {
      await this.apiServer.stop();
      this.apiServer = undefined;
    }
    await this.storage.close();
  }

  private scheduleProducer(): void {
    this.produceTimer = setInterval(() => {
      this.produceBlock().catch((err) => {
        this.logger.error({ err }, "block production failed");
        if (this.listenerCount("error") > 0) {
          this.emit("error", err);
        }
      });
    }, this.blockTimeMs);
  }

  private requireState(): { height: number; state: State; blockHash: string | null } {
    if (!this.latestState) {
      throw new NotInitializedError();
    }
    return this.latestState;
  }

  private rejectionKind(err: unknown): string {
    const kind = this.stateMachine.errorKind?.(err);
    if (kind) return kind;
    return err instanceof Error ? err.name : "Error";
  }

  /**
   * Admits a transaction when it applies cleanly on top of the committed state
   * plus everything already waiting in the mempool.
   */
  async addTransaction(tx: Transaction): Promise<{ accepted: boolean; id: string }> {
    const id = tx.id || calculateTxId(tx);
    const normalized: Transaction = { ...tx, id };
    const { state } = this.requireState();
    if (this.mempool.has(id)) {
      return { accepted: false, id };
    }
    if (this.mempool.size() >= this.mempool.capacity) {
      this.logger.warn({ txId: id, type: tx.type, capacity: this.mempool.capacity }, "mempool full");
      throw new TxRejectedError(id, "MempoolFull", `Mempool is full (${this.mempool.capacity} pending)`);
    }
    let pending: State;
    try {
      pending = this.stateMachine.applyTx(this.pendingState ?? state, normalized).state;
    } catch (err) {
      const kind = this.rejectionKind(err);
      this.logger.warn({ txId: id, type: tx.type, kind }, "tx rejected");
      throw new TxRejectedError(id, kind, errorMessage(err), { cause: err });
    }
    this.mempool.add(normalized);
    this.pendingState = pending;
    this.logger.debug({ txId: id, type: tx.type }, "tx admitted");
    this.emit("tx", normalized);
    return { accepted: true, id };
  }

  getState(): State {
    return this.requireState().state;
  }

  getEncodedState(): JsonValue {
    return this.stateMachine.encodeState(this.requireState().state);
  }

  getHeight(): number {
    return this.latestState?.height ?? 0;
  }

  getStatus(): NodeStatus {
    return {
      chainId: this.chainId,
      stateMachine: this.stateMachine.name,
      height: this.getHeight(),
      latestBlockHash: this.latestState?.blockHash ?? null,
      mempool: this.mempool.size()
    };
  }

  getPendingTransactions(): Transaction[] {
    return this.mempool.all();
  }

  getBlock = async (height: number): Promise<Block | undefined> => {
    return this.storage.getBlock(height);
  };

  getLatestBlock = async (): Promise<Block | undefined> => {
    return this.storage.getBlock(this.getHeight());
  };

  async getBlocks(from: number, to: number): Promise<Block[]> {
    const blocks: Block[] = [];
    const last = Math.min(to, this.getHeight());
    for (let h = from; h <= last; h++) {
      const block = await this.storage.getBlock(h);
      if (block) blocks.push(block);
    }
    return blocks;
  }

  async getStateAtHeight(height?: number): Promise<{ height: number; state: JsonValue } | undefined> {
    if (height === undefined) {
      return { height: this.getHeight(), state: this.getEncodedState() };
    }
    const state = await this.storage.getState(height);
    if (state === undefined) return undefined;
    return { height, state };
  }

  async exportSnapshot(height?: number): Promise<Snapshot | undefined> {
    const target = height ?? this.getHeight();
    const snapshot = await this.getStateAtHeight(target);
    if (!snapshot) return undefined;
    const block = await this.storage.getBlock(target);
    return { chainId: this.chainId, height: target, blockHash: block?.blockHash ?? null, state: snapshot.state };
  }

  /** Flattens the notifications recorded on block receipts in [from, to]. */
  async getEvents(from: number, to: number): Promise<ChainEvent[]> {
    const events: ChainEvent[] = [];
    for (const block of await this.getBlocks(from, to)) {
      for (const receipt of block.receipts) {
        receipt.events.forEach((event, index) => {
          events.push({ height: block.height, txId: receipt.txId, index, event });
        });
      }
    }
    return events;
  }

  hasQuery(name: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.stateMachine.queries ?? {}, name);
  }

  query(name: string, args: QueryArgs): JsonValue {
    const queries = this.stateMachine.queries;
    if (!queries || !this.hasQuery(name)) {
      throw new InvalidRequestError(`Unknown query: ${name}`);
    }
    return queries[name](this.requireState().state, args);
  }

  /**
   * Drains up to `maxTxsPerBlock` mempool transactions into a new block.
   * Resolves to undefined when the mempool is empty.
   */
  produceBlock(): Promise<Block | undefined> {
    const next = this.commits.then(async () => {
      if (this.mempool.size() === 0) return undefined;
      const txs = this.mempool.take(this.maxTxsPerBlock);
      return this.createAndCommitBlock(txs, this.getHeight() + 1);
    });
    this.commits = next.catch(() => undefined);
    return next;
  }

  private async createAndCommitBlock(txs: Transaction[], height: number): Promise<Block> {
    const { state, blockHash: prevHash } = this.requireState();
    let workingState = state;
    const applied: Transaction[] = [];
    const receipts: TxReceipt[] = [];
    for (const tx of txs) {
      try {
        const transition = this.stateMachine.applyTx(workingState, tx);
        workingState = transition.state;
        applied.push(tx);
        receipts.push({ txId: tx.id, events: transition.events.map((e) => this.stateMachine.encodeEvent(e)) });
      } catch (err) {
        this.logger.warn({ txId: tx.id, type: tx.type, kind: this.rejectionKind(err), height }, "tx dropped from block");
      }
    }
    const draft: BlockDraft = {
      height,
      timestamp: Date.now(),
      prevHash,
      txs: applied,
      receipts
    };
    const block = sealBlock(draft);
    await this.commitBlock(block, workingState, txs);
    return block;
  }

  /** Replays what is left in the mempool over the newly committed state. */
  private rebuildPending(): void {
    let working = this.requireState().state;
    this.mempool.retain((tx) => {
      try {
        working = this.stateMachine.applyTx(working, tx).state;
        return true;
      } catch (err) {
        this.logger.warn({ txId: tx.id, type: tx.type, kind: this.rejectionKind(err) }, "tx evicted from mempool");
        return false;
      }
    });
    this.pendingState = this.mempool.size() > 0 ? working : undefined;
  }

  /** A failed write puts `taken` back at the head of the mempool and rethrows. */
  private async commitBlock(block: Block, state: State, taken: Transaction[]): Promise<void> {
    const encoded = this.stateMachine.encodeState(state);
    try {
      await this.storage.putBlock(block, encoded);
    } catch (err) {
      this.mempool.requeue(taken);
      this.rebuildPending();
      this.logger.error({ err, height: block.height, requeued: taken.length }, "block commit failed");
      throw err;
    }
    this.latestState = { height: block.height, state, blockHash: block.blockHash };
    this.rebuildPending();
    this.logger.debug({ height: block.height, txs: block.txs.length }, "block committed");
    const payload: NewBlockEvent = { block, state: encoded };
    this.emit("block", payload);
    for (const receipt of block.receipts) {
      receipt.events.forEach((event, index) => {
        const chainEvent: ChainEvent = { height: block.height, txId: receipt.txId, index, event };
        this.emit("event", chainEvent);
      });
    }
    this.emit("status", this.getStatus());
  }
}
