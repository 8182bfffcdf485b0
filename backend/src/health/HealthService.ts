import { getLog } from "../util/Logger";
import { TimeoutError, withTimeout } from "../util/Timeout";
import type { CheckResult, HealthCheck, HealthResponse } from "./HealthTypes";

const log = getLog(import.meta);

const DEFAULT_TIMEOUT_MS = 2000;

export interface HealthService {
	check(): Promise<HealthResponse>;
}

export interface HealthServiceOptions {
	checks: Array<HealthCheck>;
	/** Per check. */
	timeoutMs?: number;
	environment: string;
	/** Full commit SHA, shortened to 7 characters in the response. */
	commitSha?: string;
}

/**
 * Runs every check in parallel, each with its own timeout.
 * The service is unhealthy when a critical check is.
 */
export function createHealthService(options: HealthServiceOptions): HealthService {
	const { checks } = options;
	const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
	const version = options.commitSha?.substring(0, 7) ?? "unknown";

	return { check: runChecks };

	async function runCheck(healthCheck: HealthCheck): Promise<CheckResult> {
		try {
			return await withTimeout(healthCheck.check(), timeoutMs);
		} catch (error) {
			log.warn({ check: healthCheck.name, error }, "Health check failed: %s", healthCheck.name);
			return { status: "unhealthy", message: error instanceof TimeoutError ? "Check timed out" : "Check failed" };
		}
	}

	async function runChecks(): Promise<HealthResponse> {
		const results = await Promise.all(checks.map(runCheck));

		const checksRecord: Record<string, CheckResult> = {};
		let hasCriticalFailure = false;
		checks.forEach((healthCheck, index) => {
			const result = results[index];
			checksRecord[healthCheck.name] = result;
			if (healthCheck.critical && result.status === "unhealthy") {
				hasCriticalFailure = true;
			}
		});

		return {
			status: hasCriticalFailure ? "unhealthy" : "healthy",
			timestamp: new Date().toISOString(),
			version,
			environment: options.environment,
			checks: checksRecord,
		};
	}
}
