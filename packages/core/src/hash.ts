import crypto from "crypto";
import stringify from "json-stable-stringify";
import type { Block, Transaction, TxReceipt } from "./types";

export type BlockDraft = Omit<Block, "blockHash">;

export function canonicalJson(value: unknown): string {
  return stringify(value) ?? "";
}

export function sha256Hex(input: string): string {
  return crypto.createHash("sha256").update(input).digest("hex");
}

export function hashObject(value: unknown): string {
  return sha256Hex(canonicalJson(value));
}

/** Content id of a transaction; the `id` field itself never takes part. */
export function calculateTxId(tx: Omit<Transaction, "id"> | Transaction): string {
  return hashObject({
    type: tx.type,
    payload: tx.payload,
    sender: tx.sender ?? null,
    nonce: tx.nonce ?? null
  });
}

export function calculateTxsRoot(txs: Transaction[]): string {
  return hashObject(txs.map((tx) => tx.id));
}

export function calculateReceiptsRoot(receipts: TxReceipt[]): string {
  return hashObject(receipts);
}

// the header commits to tx ids and to every receipt
export function calculateBlockHash(block: BlockDraft): string {
  return hashObject({
    height: block.height,
    timestamp: block.timestamp,
    prevHash: block.prevHash,
    txsRoot: calculateTxsRoot(block.txs),
    receiptsRoot: calculateReceiptsRoot(block.receipts)
  });
}

export function sealBlock(draft: BlockDraft): Block {
  return { ...draft, blockHash: calculateBlockHash(draft) };
}

export function verifyBlockHash(block: Block): boolean {
  const { blockHash, ...draft } = block;
  return calculateBlockHash(draft) === blockHash;
}
