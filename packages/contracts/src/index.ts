export * from "./schema/daily_record_v1";
export * from "./schema/alert_v1";
export * from "./schema/event_v1";
export * from "./schema/stage_summary_v1";
export * from "./schema/alert_config_zod";
export * from "./schema/run_result_v1";
