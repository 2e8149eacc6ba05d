#!/usr/bin/env node
import { Command } from "commander";
import path from "path";
import fsExtra from "fs-extra";
import { ChainNode, createLogger, parseGenesis, type JsonValue } from "@lendchain/core";
import { LevelBlockStore } from "@lendchain/storage-level";
import LendingStateMachine, {
  LENDING_TX_TYPES,
  type LedgerEvent,
  type LedgerState,
  decodeLedgerState,
  formatAmount,
  getAccountPosition
} from "@lendchain/lending";
import { loadConfig, readJSONMaybeYAML } from "./config";
import { buildTransaction, createChainFolder, lendingGenesis } from "./scaffold";

const program = new Command();
program.name("lendchain").description("collateralized lending ledger node");

async function startNodeFromConfig(configPath: string): Promise<ChainNode<LedgerState, LedgerEvent>> {
  const cfg = loadConfig(configPath);
  await fsExtra.ensureDir(cfg.storagePath);
  const node = new ChainNode<LedgerState, LedgerEvent>({
    chainId: cfg.chainId,
    genesis: cfg.genesis,
    stateMachine: LendingStateMachine,
    storage: new LevelBlockStore(cfg.storagePath),
    blockTimeMs: cfg.blockTimeMs,
    maxTxsPerBlock: cfg.maxTxsPerBlock,
    maxMempoolSize: cfg.maxMempoolSize,
    api: cfg.api,
    logger: createLogger(cfg.logLevel ? { level: cfg.logLevel } : undefined)
  });
  await node.start();
  return node;
}

program
  .command("start")
  .description("Start a node from config file")
  .requiredOption("-c, --config <path>", "config file path")
  .action(async (opts: { config: string }) => {
    const node = await startNodeFromConfig(opts.config);
    console.log(`Node running for chain ${node.getStatus().chainId}, height ${node.getHeight()}`);
    process.on("SIGINT", () => {
      node
        .stop()
        .then(() => process.exit(0))
        .catch((err) => {
          console.error(err);
          process.exit(1);
        });
    });
  });

program
  .command("init")
  .description("Initialize a new chain folder")
  .argument("<name>")
  .requiredOption("--admin <account>", "admin account id")
  .option("--model <account>", "interest rate model id", "interest-model")
  .option("--asset <account>", "underlying asset id", "underlying-asset")
  .option("--port <port>", "api port", "26657")
  .action(async (name: string, opts: { admin: string; model: string; asset: string; port: string }) => {
    const dir = path.resolve(process.cwd(), name);
    await createChainFolder(dir, name, {
      admin: opts.admin,
      interestRateModel: opts.model,
      underlyingAsset: opts.asset,
      apiPort: Number(opts.port)
    });
    console.log(`Chain ${name} created at ${dir}`);
  });

const genesisCmd = program.command("genesis").description("Genesis utilities");
genesisCmd
  .command("create")
  .description("Create a genesis file")
  .requiredOption("--chainId <id>", "chain id")
  .requiredOption("--admin <account>", "admin account id")
  .requiredOption("--model <account>", "interest rate model id")
  .requiredOption("--asset <account>", "underlying asset id")
  .requiredOption("--out <file>", "output file")
  .action(async (opts: { chainId: string; admin: string; model: string; asset: string; out: string }) => {
    const genesis = lendingGenesis(opts.chainId, {
      admin: opts.admin,
      interestRateModel: opts.model,
      underlyingAsset: opts.asset
    });
    await fsExtra.writeJSON(path.resolve(opts.out), genesis, { spaces: 2 });
    console.log(`Genesis written to ${opts.out}`);
  });

const txCmd = program.command("tx").description("Tx utilities");
txCmd
  .command("build")
  .description(`Build a tx (${LENDING_TX_TYPES.join("|")})`)
  .requiredOption("--type <type>", "tx type")
  .requiredOption("--sender <account>", "sender account id")
  .option("--payload <json>", "payload json", "{}")
  .option("--nonce <nonce>", "nonce distinguishing otherwise identical txs")
  .option("--out <file>", "write tx to file")
  .action(async (opts: { type: string; sender: string; payload: string; nonce?: string; out?: string }) => {
    const payload: JsonValue = JSON.parse(opts.payload);
    const tx = buildTransaction(opts.type, opts.sender, payload, opts.nonce);
    if (opts.out) {
      await fsExtra.writeJSON(path.resolve(opts.out), tx, { spaces: 2 });
      console.log(`Tx written to ${opts.out}`);
    } else {
      console.log(JSON.stringify(tx, null, 2));
    }
  });

program
  .command("inspect")
  .description("Print persisted ledger totals or an account position")
  .requiredOption("-c, --config <path>", "config file path")
  .option("--account <account>", "account id")
  .action(async (opts: { config: string; account?: string }) => {
    const cfg = loadConfig(opts.config);
    const store = new LevelBlockStore(cfg.storagePath);
    await store.init();
    try {
      const latest = await store.getLatestState();
      if (!latest) {
        console.log("No state persisted yet");
        return;
      }
      const state = decodeLedgerState(latest.state);
      if (opts.account) {
        const position = getAccountPosition(state, opts.account);
        console.log(
          JSON.stringify(
            {
              height: latest.height,
              account: position.account,
              balance: formatAmount(position.balance),
              debt: formatAmount(position.debt),
              collateral: formatAmount(position.collateral),
              liquidity: formatAmount(position.liquidity),
              shortfall: formatAmount(position.shortfall)
            },
            null,
            2
          )
        );
      } else {
        console.log(
          JSON.stringify(
            {
              height: latest.height,
              totalSupply: formatAmount(state.totalSupply),
              totalBorrow: formatAmount(state.totalBorrow),
              paused: state.paused
            },
            null,
            2
          )
        );
      }
    } finally {
      await store.close();
    }
  });

program
  .command("validate-genesis")
  .description("Check a genesis file")
  .argument("<file>")
  .action((file: string) => {
    const genesis = parseGenesis(readJSONMaybeYAML(path.resolve(file)));
    LendingStateMachine.initState(genesis);
    console.log(`Genesis for ${genesis.chainId} is valid`);
  });

program.parseAsync().catch((err) => {
  console.error(err);
  process.exit(1);
});
