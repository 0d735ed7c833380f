// @vitalgate/session-config

export * from "./validator";
export * from "./errors";
export * from "./reload";
export * from "./holder";
export * from "./config_file_loader";
