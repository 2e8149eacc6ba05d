import path from "path";
import fsExtra from "fs-extra";
import { calculateTxId, type GenesisData, type JsonValue, type Transaction } from "@lendchain/core";
import { isLendingTxType, type GenesisAppState } from "@lendchain/lending";
import type { ConfigFile } from "./config";

export const DEFAULT_API_PORT = 26657;

export interface ChainFolderOptions {
  admin: string;
  interestRateModel: string;
  underlyingAsset: string;
  apiPort?: number;
}

export function lendingGenesis(chainId: string, appState: GenesisAppState): GenesisData {
  return { chainId, appState: { ...appState } };
}

export async function createChainFolder(
  dir: string,
  name: string,
  opts: ChainFolderOptions
): Promise<{ configPath: string; genesisPath: string }> {
  await fsExtra.ensureDir(dir);
  const chainId = `lendchain-${name}`;
  const genesis = lendingGenesis(chainId, {
    admin: opts.admin,
    interestRateModel: opts.interestRateModel,
    underlyingAsset: opts.underlyingAsset
  });
  const genesisPath = path.join(dir, "genesis.json");
  await fsExtra.writeJSON(genesisPath, genesis, { spaces: 2 });
  const config: ConfigFile = {
    chainId,
    genesis: "./genesis.json",
    storage: "./data",
    api: { port: opts.apiPort ?? DEFAULT_API_PORT }
  };
  const configPath = path.join(dir, "config.json");
  await fsExtra.writeJSON(configPath, config, { spaces: 2 });
  return { configPath, genesisPath };
}

export function buildTransaction(
  type: string,
  sender: string,
  payload: JsonValue,
  nonce?: string | number
): Transaction {
  if (!isLendingTxType(type)) {
    throw new Error(`Unknown lending tx type: ${type}`);
  }
  const txBase = nonce === undefined ? { type, payload, sender } : { type, payload, sender, nonce };
  return { ...txBase, id: calculateTxId(txBase) };
}
