export * from "./errors";
export * from "./dates";
export * from "./kernel";

export * from "./support/support_window";
export * from "./qc/qc_classifier";
export * from "./gating/gating_filter";

export * from "./rules/types";
export * from "./rules/clauses";
export * from "./rules/rule_table";

export * from "./assemble/alert_assembler";
export * from "./merge/event_merger";
export * from "./merge/composite_merger";
export * from "./severity/event_severity";
export * from "./summary/stage_summary";
