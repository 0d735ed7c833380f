// @vitalgate/control-kernel
// Entry point exports for the kernel path: hysteresis, risk, decision, state.

export * from "./kernel";
export * from "./errors";
export * from "./taxonomy/capability_tiers";
export * from "./inputs/allowed_input_paths";
export * from "./inputs/projector";
export * from "./policy/predicates";
export * from "./reversal/reversal_conditions";
export * from "./envelope/hysteresis";
export * from "./risk/accountant";
export * from "./state/kernel_state_cell";
