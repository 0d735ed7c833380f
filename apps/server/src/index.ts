// @vitalgate/server

export * from "./app";
export * from "./env";
export * from "./routes/sessions";
export * from "./runtime/errors";
export * from "./runtime/proposal_log";
export * from "./runtime/session_registry";
export * from "./runtime/session_runtime";
