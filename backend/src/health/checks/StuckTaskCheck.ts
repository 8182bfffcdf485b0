import type { OnboardingTaskDao } from "../../dao/OnboardingTaskDao";
import type { CheckResult, HealthCheck } from "../HealthTypes";

/**
 * Reports PROCESSING tasks that outlived the stuck threshold, which means the
 * maintenance reset is not running or workers keep dying.
 */
export function createStuckTaskCheck(
	taskDao: Pick<OnboardingTaskDao, "countStuckTasks">,
	staleBefore: () => Date,
): HealthCheck {
	return {
		name: "stuckTasks",
		critical: false,
		check,
	};

	async function check(): Promise<CheckResult> {
		const start = Date.now();
		const count = await taskDao.countStuckTasks(staleBefore());
		const latencyMs = Date.now() - start;
		if (count === 0) {
			return { status: "healthy", latencyMs };
		}
		return { status: "unhealthy", latencyMs, message: `${count} tasks stuck in PROCESSING` };
	}
}
