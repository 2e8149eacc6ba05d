export * from "./types";
export * from "./errors";
export * from "./hash";
export * from "./schemas";
export * from "./mempool";
export * from "./logger";
export * from "./memory-store";
export * from "./node";
export * from "./server";
