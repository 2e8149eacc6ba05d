export * from "./amount";
export * from "./errors";
export * from "./state";
export * from "./codec";
export * from "./ledger";
export * from "./state-machine";
export { default } from "./state-machine";
