import express, { type NextFunction, type Request, type Response } from "express";
import bodyParser from "body-parser";
import http from "http";
import { WebSocketServer, type WebSocket } from "ws";
import type { Logger } from "pino";
import { ZodError } from "zod";
import { InvalidRequestError, NotInitializedError, TxRejectedError, errorMessage } from "./errors";
import { parseTransaction } from "./schemas";
import type {
  ApiConfig,
  Block,
  ChainEvent,
  JsonValue,
  NewBlockEvent,
  NodeStatus,
  QueryArgs,
  Snapshot,
  Transaction
} from "./types";

const MAX_BLOCK_RANGE = 200;

export type NodeHandle = {
  getStatus(): NodeStatus;
  getEncodedState(): JsonValue;
  getStateAtHeight(height?: number): Promise<{ height: number; state: JsonValue } | undefined>;
  addTransaction(tx: Transaction): Promise<{ accepted: boolean; id: string }>;
  getBlock(height: number): Promise<Block | undefined>;
  getLatestBlock(): Promise<Block | undefined>;
  getBlocks(from: number, to: number): Promise<Block[]>;
  getEvents(from: number, to: number): Promise<ChainEvent[]>;
  exportSnapshot(height?: number): Promise<Snapshot | undefined>;
  hasQuery(name: string): boolean;
  query(name: string, args: QueryArgs): JsonValue;
  on(event: "block", handler: (evt: NewBlockEvent) => void): unknown;
  on(event: "tx", handler: (tx: Transaction) => void): unknown;
  on(event: "event", handler: (evt: ChainEvent) => void): unknown;
  on(event: "status", handler: (status: NodeStatus) => void): unknown;
  off(event: string, handler: (...args: never[]) => void): unknown;
};

export interface ApiServer {
  stop(): Promise<void>;
}

function parseHeight(raw: unknown): number | undefined {
  if (typeof raw !== "string" || raw.length === 0) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidRequestError("height must be an integer >= 0");
  }
  return value;
}

function queryArgs(req: Request): QueryArgs {
  const args: QueryArgs = {};
  for (const [key, value] of Object.entries(req.query)) {
    if (typeof value === "string") args[key] = value;
  }
  return args;
}

type AsyncHandler = (req: Request, res: Response) => Promise<unknown>;

function route(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

export function createApiApp(node: NodeHandle, logger: Logger): express.Express {
  const app = express();
  app.use(bodyParser.json());

  app.get("/status", (_req: Request, res: Response) => {
    res.json(node.getStatus());
  });

  app.get("/state", (_req: Request, res: Response) => {
    res.json(node.getEncodedState());
  });

  app.get(
    "/state/:height",
    route(async (req, res) => {
      const height = parseHeight(req.params.height);
      const snapshot = await node.getStateAtHeight(height);
      if (!snapshot) return res.status(404).json({ error: "state not found" });
      res.json(snapshot);
    })
  );

  app.get(
    "/block/latest",
    route(async (_req, res) => {
      const block = await node.getLatestBlock();
      if (!block) return res.status(404).json({ error: "no blocks" });
      res.json(block);
    })
  );

  app.get(
    "/block/:height",
    route(async (req, res) => {
      const height = parseHeight(req.params.height);
      const block = height === undefined ? undefined : await node.getBlock(height);
      if (!block) return res.status(404).json({ error: "not found" });
      res.json(block);
    })
  );

  app.post(
    "/tx",
    route(async (req, res) => {
      const result = await node.addTransaction(parseTransaction(req.body));
      res.json({ ok: true, id: result.id, accepted: result.accepted });
    })
  );

  app.get("/query/:name", (req: Request, res: Response, next: NextFunction) => {
    if (!node.hasQuery(req.params.name)) {
      return res.status(404).json({ error: `unknown query ${req.params.name}` });
    }
    try {
      res.json(node.query(req.params.name, queryArgs(req)));
    } catch (err) {
      next(err);
    }
  });

  app.get(
    "/events",
    route(async (req, res) => {
      const latestHeight = node.getStatus().height;
      const from = parseHeight(req.query.from) ?? 0;
      const to = parseHeight(req.query.to) ?? latestHeight;
      if (from > to) throw new InvalidRequestError("from must be <= to");
      if (to - from > MAX_BLOCK_RANGE) {
        throw new InvalidRequestError(`range too large; max ${MAX_BLOCK_RANGE + 1} blocks`);
      }
      res.json({ from, to: Math.min(to, latestHeight), events: await node.getEvents(from, to) });
    })
  );

  app.get(
    "/export/snapshot",
    route(async (req, res) => {
      const snapshot = await node.exportSnapshot(parseHeight(req.query.height));
      if (!snapshot) return res.status(404).json({ error: "snapshot not found" });
      res.json(snapshot);
    })
  );

  app.get(
    "/export/blocks",
    route(async (req, res) => {
      const latestHeight = node.getStatus().height;
      const from = parseHeight(req.query.from) ?? latestHeight;
      const to = parseHeight(req.query.to) ?? latestHeight;
      if (from > to) throw new InvalidRequestError("from must be <= to");
      if (to - from > MAX_BLOCK_RANGE) {
        throw new InvalidRequestError(`range too large; max ${MAX_BLOCK_RANGE + 1} blocks`);
      }
      const blocks = await node.getBlocks(from, to);
      res.json({ from, to: Math.min(to, latestHeight), blocks });
    })
  );

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof TxRejectedError) {
      return res.status(400).json({ ok: false, id: err.txId, kind: err.kind, error: err.message });
    }
    if (err instanceof ZodError) {
      const detail = err.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; ");
      return res.status(400).json({ ok: false, kind: "InvalidTransaction", error: detail });
    }
    if (err instanceof InvalidRequestError) {
      return res.status(400).json({ error: err.message });
    }
    if (err instanceof NotInitializedError) {
      return res.status(503).json({ error: err.message });
    }
    logger.error({ err }, "api request failed");
    res.status(500).json({ error: errorMessage(err) });
  });

  return app;
}

export async function startApiServer(node: NodeHandle, config: ApiConfig, logger: Logger): Promise<ApiServer> {
  const app = createApiApp(node, logger);
  const server = http.createServer(app);
  const wss = new WebSocketServer({ server, path: "/ws" });

  wss.on("connection", (ws: WebSocket) => {
    ws.send(JSON.stringify({ type: "status", data: node.getStatus() }));
    const blockHandler = (evt: NewBlockEvent) => {
      ws.send(JSON.stringify({ type: "newBlock", data: evt }));
    };
    const txHandler = (tx: Transaction) => {
      ws.send(JSON.stringify({ type: "newTx", data: tx }));
    };
    const eventHandler = (evt: ChainEvent) => {
      ws.send(JSON.stringify({ type: "event", data: evt }));
    };
    const statusHandler = (st: NodeStatus) => {
      ws.send(JSON.stringify({ type: "status", data: st }));
    };
    node.on("block", blockHandler);
    node.on("tx", txHandler);
    node.on("event", eventHandler);
    node.on("status", statusHandler);
    ws.on("close", () => {
      node.off("block", blockHandler);
      node.off("tx", txHandler);
      node.off("event", eventHandler);
      node.off("status", statusHandler);
    });
  });

  await new Promise<void>((resolve) => {
    server.listen(config.port, config.host ?? "0.0.0.0", () => resolve());
  });
  logger.info({ port: config.port, host: config.host ?? "0.0.0.0" }, "api listening");

  return {
    stop: async () => {
      for (const client of wss.clients) {
        client.terminate();
      }
      wss.close();
      await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    }
  };
}
