import { z } from "zod";
import type { GenesisData, JsonValue, Transaction } from "./types";

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)])
);

export const TransactionSchema = z.object({
  id: z.string().optional(),
  type: z.string().min(1, "tx requires a type"),
  payload: JsonValueSchema.default({}),
  sender: z.string().min(1).optional(),
  nonce: z.union([z.string(), z.number()]).optional()
});

export const GenesisSchema = z.object({
  chainId: z.string().min(1, "chainId is required"),
  appState: JsonValueSchema.optional()
});

/** Parses an untrusted tx body; a missing id is left empty for the node to fill. */
export function parseTransaction(raw: unknown): Transaction {
  const parsed = TransactionSchema.parse(raw);
  return { ...parsed, id: parsed.id ?? "" };
}

export function parseGenesis(raw: unknown): GenesisData {
  return GenesisSchema.parse(raw);
}
