export * from "./errors";
export * from "./html";
export * from "./logger";
export * from "./rate-limiter";
export * from "./retry";
export * from "./throttle";
export * from "./worker-pool";
