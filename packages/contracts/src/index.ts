export * from "./schema/sensor_reading_v1";
export * from "./schema/dashboard_telemetry_v1";
export * from "./schema/anomaly_trigger_v1";
export * from "./schema/ops_event_v1";
export * from "./schema/diagnosis_v1";
