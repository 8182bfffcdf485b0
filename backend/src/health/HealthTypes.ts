/**
 * - healthy: the dependency answered as expected
 * - disabled: the dependency is not configured
 * - unhealthy: the check failed or timed out
 */
export type HealthStatus = "healthy" | "unhealthy" | "disabled";

export interface CheckResult {
	status: HealthStatus;
	latencyMs?: number;
	message?: string;
}

export interface HealthCheck {
	/** Key of the result in the health response, e.g. "database". */
	name: string;
	/** A failing critical check makes the whole service unhealthy (503). */
	critical: boolean;
	check(): Promise<CheckResult>;
}

/**
 * Body of GET /api/status/health.
 */
export interface HealthResponse {
	status: "healthy" | "unhealthy";
	/** ISO-8601 */
	timestamp: string;
	/** Short commit SHA or "unknown". */
	version: string;
	environment: string;
	checks: Record<string, CheckResult>;
}
