import { Level } from "level";
import type { Block, BlockStore, JsonValue } from "@lendchain/core";

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "LEVEL_NOT_FOUND";
}

export class LevelBlockStore implements BlockStore {
  private db: Level<string, string>;
  private initialized = false;

  constructor(path: string) {
    this.db = new Level(path, { valueEncoding: "utf8" });
  }

  private async read(key: string): Promise<string | undefined> {
    try {
      return await this.db.get(key);
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw err;
    }
  }

  async init(): Promise<void> {
    if (this.initialized) return;
    await this.db.open();
    if ((await this.read("height")) === undefined) {
      await this.db.put("height", "0");
    }
    this.initialized = true;
  }

  async getLatestHeight(): Promise<number> {
    const h = await this.read("height");
    return h === undefined ? 0 : Number(h);
  }

  async getBlock(height: number): Promise<Block | undefined> {
    const raw = await this.read(`block:${height}`);
    return raw === undefined ? undefined : JSON.parse(raw);
  }

  async putBlock(block: Block, stateSnapshot: JsonValue): Promise<void> {
    await this.db.batch([
      { type: "put", key: `block:${block.height}`, value: JSON.stringify(block) },
      { type: "put", key: `state:${block.height}`, value: JSON.stringify(stateSnapshot) },
      { type: "put", key: "height", value: block.height.toString() }
    ]);
  }

  async getState(height: number): Promise<JsonValue | undefined> {
    const raw = await this.read(`state:${height}`);
    return raw === undefined ? undefined : JSON.parse(raw);
  }

  async getLatestState(): Promise<{ height: number; state: JsonValue } | undefined> {
    const height = await this.getLatestHeight();
    const state = await this.getState(height);
    if (state === undefined) return undefined;
    return { height, state };
  }

  async close(): Promise<void> {
    await this.db.close();
    this.initialized = false;
  }
}
