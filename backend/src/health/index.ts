export { createDatabaseCheck, createStuckTaskCheck } from "./checks";
export { createHealthService, type HealthService, type HealthServiceOptions } from "./HealthService";
export type { CheckResult, HealthCheck, HealthResponse, HealthStatus } from "./HealthTypes";
