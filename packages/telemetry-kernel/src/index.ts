export * from "./channels";
export * from "./config/generator_config";
export * from "./state/sensor_state";
export * from "./rng/rng";
export * from "./generator";
