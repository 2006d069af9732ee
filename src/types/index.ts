export * from "./circuitBreaker";
export * from "./retry";
export * from "./rateLimiter";
export * from "./bulkhead";
export * from "./pipeline";
