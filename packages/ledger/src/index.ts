// @vitalgate/ledger

export * from "./hash";
export * from "./errors";
export * from "./ledger";
export * from "./retry";
export * from "./store/types";
export * from "./store/memory_store";
export * from "./store/sqlite_store";
