export * from "./config/Config";
export * from "./services/IdempotencyStore";
export * from "./services/MemoryIdempotencyStore";
export * from "./services/RedisIdempotencyStore";
export * from "./setup/ConflictResolver";
export * from "./setup/IdempotencyKey";
export * from "./setup/ResourceRegistry";
export * from "./setup/RetryPolicy";
export * from "./setup/RollbackCoordinator";
export * from "./setup/SetupErrors";
export * from "./setup/SetupObserver";
export * from "./setup/SetupOrchestrator";
export * from "./setup/SetupRequest";
export * from "./setup/SetupTypes";
export * from "./util/Logger";
export * from "./util/RedisClient";
export * from "./util/Retry";
export * from "./util/Timeout";
