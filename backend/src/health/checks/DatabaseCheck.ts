import type { CheckResult, HealthCheck } from "../HealthTypes";
import type { Sequelize } from "sequelize";

/**
 * Connectivity of the task store, through sequelize.authenticate().
 */
export function createDatabaseCheck(sequelize: Pick<Sequelize, "authenticate">): HealthCheck {
	return {
		name: "database",
		critical: true,
		check,
	};

	async function check(): Promise<CheckResult> {
		const start = Date.now();
		try {
			await sequelize.authenticate();
			return { status: "healthy", latencyMs: Date.now() - start };
		} catch {
			return { status: "unhealthy", latencyMs: Date.now() - start, message: "Database connection failed" };
		}
	}
}
