export * from "./schema/common_v1";
export * from "./schema/signal_snapshot_v1";
export * from "./schema/capability_v1";
export * from "./schema/transition_v1";
export * from "./schema/decision_v1";
export * from "./schema/ledger_entry_v1";
export * from "./schema/proposal_log_record_v1";
export * from "./schema/asset_vector_v1";
export * from "./schema/kernel_state_view_v1";
export * from "./schema/diagnostic_annotation_v1";
export * from "./schema/session_config_v1";
