import path from "path";
import fs from "fs";
import YAML from "yaml";
import { z } from "zod";
import { parseGenesis, type GenesisData } from "@lendchain/core";

export const ConfigFileSchema = z.object({
  chainId: z.string().min(1, "chainId is required"),
  genesis: z.string().min(1, "genesis path is required"),
  storage: z.string().min(1).default("./data"),
  api: z
    .object({
      port: z.number().int().min(0).max(65535),
      host: z.string().optional()
    })
    .optional(),
  blockTimeMs: z.number().int().positive().optional(),
  maxTxsPerBlock: z.number().int().positive().optional(),
  maxMempoolSize: z.number().int().positive().optional(),
  logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional()
});

export type ConfigFile = z.input<typeof ConfigFileSchema>;

export interface ResolvedConfig {
  chainId: string;
  genesis: GenesisData;
  storagePath: string;
  api?: { port: number; host?: string };
  blockTimeMs?: number;
  maxTxsPerBlock?: number;
  maxMempoolSize?: number;
  logLevel?: string;
}

export function readJSONMaybeYAML(file: string): unknown {
  const raw = fs.readFileSync(file, "utf-8");
  if (file.endsWith(".yaml") || file.endsWith(".yml")) {
    return YAML.parse(raw);
  }
  return JSON.parse(raw);
}

/** Reads a node config file; `genesis` and `storage` resolve against its folder. */
export function loadConfig(configPath: string): ResolvedConfig {
  const abs = path.resolve(configPath);
  const baseDir = path.dirname(abs);
  const cfg = ConfigFileSchema.parse(readJSONMaybeYAML(abs));
  const genesis = parseGenesis(readJSONMaybeYAML(path.resolve(baseDir, cfg.genesis)));
  if (genesis.chainId !== cfg.chainId) {
    throw new Error(`Genesis chainId ${genesis.chainId} does not match config chainId ${cfg.chainId}`);
  }
  return {
    chainId: cfg.chainId,
    genesis,
    storagePath: path.resolve(baseDir, cfg.storage),
    api: cfg.api,
    blockTimeMs: cfg.blockTimeMs,
    maxTxsPerBlock: cfg.maxTxsPerBlock,
    maxMempoolSize: cfg.maxMempoolSize,
    logLevel: cfg.logLevel
  };
}
