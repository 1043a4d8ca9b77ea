export * from "./types";
export * from "./errors";
export * from "./config";
export { loadEnvFiles } from "./env";
export * from "./exchange";
export * from "./time/time";
export * from "./utils/fingerprint";
export * from "./utils/logger";
export * from "./utils/math";
export { RingBuffer } from "./utils/ringBuffer";
