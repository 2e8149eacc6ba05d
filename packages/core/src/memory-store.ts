import type { Block, BlockStore, JsonValue } from "./types";

function copy<T>(value: T): T {
  return structuredClone(value);
}

/** Keeps blocks and snapshots in process memory. Used by tests and `dev` runs. */
export class MemoryBlockStore implements BlockStore {
  private blocks = new Map<number, Block>();
  private states = new Map<number, JsonValue>();
  private height = 0;

  async init(): Promise<void> {}

  async getLatestHeight(): Promise<number> {
    return this.height;
  }

  async getBlock(height: number): Promise<Block | undefined> {
    const block = this.blocks.get(height);
    return block ? copy(block) : undefined;
  }

  async putBlock(block: Block, stateSnapshot: JsonValue): Promise<void> {
    this.blocks.set(block.height, copy(block));
    this.states.set(block.height, copy(stateSnapshot));
    this.height = block.height;
  }

  async getState(height: number): Promise<JsonValue | undefined> {
    const state = this.states.get(height);
    return state === undefined ? undefined : copy(state);
  }

  async getLatestState(): Promise<{ height: number; state: JsonValue } | undefined> {
    const state = await this.getState(this.height);
    if (state === undefined) return undefined;
    return { height: this.height, state };
  }

  async close(): Promise<void> {}
}
