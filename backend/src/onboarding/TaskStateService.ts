import type { OnboardingTaskDao, TaskProgress, TaskResult } from "../dao/OnboardingTaskDao";
import type { OnboardingTask } from "../model/OnboardingTask";
import { getLog } from "../util/Logger";
import { TaskNotFoundError, TaskOwnershipLostError, TaskStateConflictError } from "./OnboardingErrors";
import { stepBit } from "./OnboardingSteps";
import type { FailureKind, OnboardingStep } from "onboarding-common";

const log = getLog(import.meta);

export interface TaskStateServiceOptions {
	/** PROCESSING tasks older than this are abandoned and may be reset or cancelled. */
	stuckThresholdMinutes: number;
	/** FAILED tasks with this many failures are not retried automatically. */
	maxRetries: number;
	now?: () => Date;
}

/**
 * Task lifecycle on top of the conditional updates of the task DAO.
 *
 * Transitions report whether this caller's write landed. Writes made while a
 * worker runs a saga throw TaskOwnershipLostError when the task stopped being PROCESSING.
 */
export interface TaskStateService {
	tryClaim(taskId: number): Promise<boolean>;

	markCompleted(taskId: number, result: TaskResult): Promise<boolean>;

	markFailed(taskId: number, error: string, kind: FailureKind): Promise<boolean>;

	/**
	 * Cancels a FAILED or stale PROCESSING task. Cancelling a CANCELLED task returns it unchanged.
	 *
	 * @throws TaskNotFoundError
	 * @throws TaskStateConflictError when the task is PENDING, COMPLETED or owned by a live worker
	 */
	markCancelled(taskId: number, reason: string): Promise<OnboardingTask>;

	verifyOwnership(taskId: number): Promise<boolean>;

	assertOwnership(taskId: number): Promise<void>;

	/**
	 * Writes the outputs of a step and marks it complete in one conditional update.
	 */
	persistStepResult(taskId: number, step: OnboardingStep, fields: TaskProgress): Promise<void>;

	persistStepCompleted(taskId: number, step: OnboardingStep): Promise<void>;

	/**
	 * Records that the single-use authorization code is about to be sent to the provider.
	 */
	recordCodeExchangeIntent(taskId: number): Promise<void>;

	resetStuckTask(taskId: number): Promise<boolean>;

	claimForRetry(taskId: number): Promise<boolean>;

	/**
	 * PROCESSING tasks started before this instant are stale.
	 */
	staleBefore(): Date;
}

export function createTaskStateService(
	taskDao: OnboardingTaskDao,
	options: TaskStateServiceOptions,
): TaskStateService {
	const now = options.now ?? (() => new Date());

	return {
		tryClaim,
		markCompleted,
		markFailed,
		markCancelled,
		verifyOwnership,
		assertOwnership,
		persistStepResult,
		persistStepCompleted,
		recordCodeExchangeIntent,
		resetStuckTask,
		claimForRetry,
		staleBefore,
	};

	function staleBefore(): Date {
		return new Date(now().getTime() - options.stuckThresholdMinutes * 60_000);
	}

	async function tryClaim(taskId: number): Promise<boolean> {
		const claimed = await taskDao.tryClaim(taskId);
		if (claimed) {
			log.info({ taskId }, "Task %d claimed", taskId);
		} else {
			log.debug({ taskId }, "Task %d was not PENDING, claim skipped", taskId);
		}
		return claimed;
	}

	async function markCompleted(taskId: number, result: TaskResult): Promise<boolean> {
		if (await taskDao.markCompleted(taskId, result)) {
			log.info({ taskId, resultReference: result.resultReference }, "Task %d completed", taskId);
			return true;
		}
		const current = await taskDao.getTask(taskId);
		log.warn(
			{ taskId, status: current?.status },
			"Task %d completion rejected, current status %s. The result is discarded",
			taskId,
			current?.status ?? "deleted",
		);
		return false;
	}

	async function markFailed(taskId: number, error: string, kind: FailureKind): Promise<boolean> {
		if (await taskDao.markFailed(taskId, error, kind)) {
			log.info({ taskId, kind }, "Task %d failed: %s", taskId, error);
			return true;
		}
		const current = await taskDao.getTask(taskId);
		log.warn(
			{ taskId, status: current?.status },
			"Task %d failure not recorded, current status %s",
			taskId,
			current?.status ?? "deleted",
		);
		return false;
	}

	async function markCancelled(taskId: number, reason: string): Promise<OnboardingTask> {
		const cancelled = await taskDao.markCancelled(taskId, reason, staleBefore());
		const task = await taskDao.getTask(taskId);
		if (!task) {
			throw new TaskNotFoundError(taskId);
		}
		if (cancelled) {
			log.info({ taskId }, "Task %d cancelled: %s", taskId, reason);
			return task;
		}
		if (task.status === "CANCELLED") {
			log.debug({ taskId }, "Task %d already cancelled", taskId);
			return task;
		}
		if (task.status === "PROCESSING") {
			throw new TaskStateConflictError(
				`Task is actively processing (started ${task.startedAt?.toISOString() ?? "unknown"}). Wait ${options.stuckThresholdMinutes} min.`,
				task.status,
			);
		}
		throw new TaskStateConflictError(`Cannot cancel task in status: ${task.status}`, task.status);
	}

	async function verifyOwnership(taskId: number): Promise<boolean> {
		const task = await taskDao.getTask(taskId);
		return task?.status === "PROCESSING";
	}

	async function assertOwnership(taskId: number): Promise<void> {
		const task = await taskDao.getTask(taskId);
		if (task?.status !== "PROCESSING") {
			throw new TaskOwnershipLostError(taskId, task?.status);
		}
	}

	async function writeWhileOwned(taskId: number, progress: TaskProgress, stepBits: number): Promise<void> {
		if (await taskDao.updateWhileProcessing(taskId, progress, stepBits)) {
			return;
		}
		const current = await taskDao.getTask(taskId);
		log.warn({ taskId, status: current?.status }, "Task %d lost ownership", taskId);
		throw new TaskOwnershipLostError(taskId, current?.status);
	}

	async function persistStepResult(taskId: number, step: OnboardingStep, fields: TaskProgress): Promise<void> {
		await writeWhileOwned(taskId, fields, stepBit(step));
		log.debug({ taskId, step }, "Task %d step %s done", taskId, step);
	}

	function persistStepCompleted(taskId: number, step: OnboardingStep): Promise<void> {
		return persistStepResult(taskId, step, {});
	}

	function recordCodeExchangeIntent(taskId: number): Promise<void> {
		return writeWhileOwned(taskId, { codeExchangeStartedAt: now() }, 0);
	}

	async function resetStuckTask(taskId: number): Promise<boolean> {
		const reset = await taskDao.resetStuckTask(taskId, staleBefore());
		if (reset) {
			log.warn({ taskId }, "Task %d was stuck in PROCESSING, reset to PENDING", taskId);
		}
		return reset;
	}

	async function claimForRetry(taskId: number): Promise<boolean> {
		const claimed = await taskDao.claimForRetry(taskId, options.maxRetries);
		if (claimed) {
			log.info({ taskId }, "Task %d claimed for retry", taskId);
		}
		return claimed;
	}
}
