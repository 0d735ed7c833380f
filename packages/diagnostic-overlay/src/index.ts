// @vitalgate/diagnostic-overlay
// Advisory only: nothing exported here is accepted by the kernel.

export * from "./frame";
export * from "./errors";
export * from "./rules/row";
export * from "./rules/nature";
export * from "./rules/tag_rules";
export * from "./rules/unfair_drain";
export * from "./overlay";
