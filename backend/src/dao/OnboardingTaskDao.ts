import { defineOnboardingTasks, type NewOnboardingTask, type OnboardingTask } from "../model/OnboardingTask";
import type { FailureKind } from "onboarding-common";
import { literal, Op, type Sequelize } from "sequelize";

/**
 * Fields a worker writes while it owns a task.
 */
export type TaskProgress = Partial<
	Pick<
		OnboardingTask,
		| "resolvedAccountId"
		| "resolvedBusinessId"
		| "resolvedPhoneNumberId"
		| "codeExchangeStartedAt"
		| "encryptedAccessToken"
		| "tokenExpiresIn"
		| "webhookConfirmed"
		| "resultReference"
	>
>;

export interface TaskResult {
	resultReference: number;
	summary: string;
}

/**
 * Data Access Object for onboarding tasks.
 *
 * Every state transition is one conditional UPDATE whose WHERE clause carries the
 * expected current status. The boolean results tell whether this call's write landed.
 */
export interface OnboardingTaskDao {
	/**
	 * Inserts a PENDING task. Rejects with a UniqueConstraintError when the idempotency key exists.
	 */
	createTask(task: NewOnboardingTask): Promise<OnboardingTask>;

	getTask(id: number): Promise<OnboardingTask | undefined>;

	findByIdempotencyKey(idempotencyKey: string): Promise<OnboardingTask | undefined>;

	/**
	 * PENDING and PROCESSING tasks of an organization, newest first.
	 */
	findActiveTasksForOrganization(organizationId: number): Promise<Array<OnboardingTask>>;

	/**
	 * PROCESSING tasks that started before `staleBefore`.
	 */
	findStuckTasks(staleBefore: Date): Promise<Array<OnboardingTask>>;

	countStuckTasks(staleBefore: Date): Promise<number>;

	/**
	 * PENDING tasks last written before `staleBefore`. No worker is queued for them.
	 */
	findOrphanedTasks(staleBefore: Date): Promise<Array<OnboardingTask>>;

	/**
	 * FAILED tasks with a RETRYABLE failure and fewer than `maxRetries` failures.
	 */
	findRetryableFailures(maxRetries: number): Promise<Array<OnboardingTask>>;

	/**
	 * PENDING -> PROCESSING, records the start time.
	 */
	tryClaim(id: number): Promise<boolean>;

	/**
	 * PROCESSING | FAILED -> COMPLETED. Clears the failure.
	 */
	markCompleted(id: number, result: TaskResult): Promise<boolean>;

	/**
	 * PROCESSING -> FAILED. Increments the retry count.
	 */
	markFailed(id: number, error: string, kind: FailureKind): Promise<boolean>;

	/**
	 * FAILED | PROCESSING started before `staleBefore` -> CANCELLED.
	 */
	markCancelled(id: number, reason: string, staleBefore: Date): Promise<boolean>;

	/**
	 * Writes progress while the task is PROCESSING, optionally adding step bits.
	 * Returns false, writing nothing, when the task is not PROCESSING.
	 */
	updateWhileProcessing(id: number, progress: TaskProgress, stepBits?: number): Promise<boolean>;

	/**
	 * PROCESSING started before `staleBefore` -> PENDING.
	 */
	resetStuckTask(id: number, staleBefore: Date): Promise<boolean>;

	/**
	 * FAILED with a RETRYABLE failure and fewer than `maxRetries` failures -> PENDING.
	 */
	claimForRetry(id: number, maxRetries: number): Promise<boolean>;
}

export function createOnboardingTaskDao(sequelize: Sequelize): OnboardingTaskDao {
	const Tasks = defineOnboardingTasks(sequelize);

	return {
		createTask,
		getTask,
		findByIdempotencyKey,
		findActiveTasksForOrganization,
		findStuckTasks,
		countStuckTasks,
		findOrphanedTasks,
		findRetryableFailures,
		tryClaim,
		markCompleted,
		markFailed,
		markCancelled,
		updateWhileProcessing,
		resetStuckTask,
		claimForRetry,
	};

	async function createTask(task: NewOnboardingTask): Promise<OnboardingTask> {
		const created = await Tasks.create(task);
		return created.get({ plain: true });
	}

	async function getTask(id: number): Promise<OnboardingTask | undefined> {
		const task = await Tasks.findByPk(id);
		return task ? task.get({ plain: true }) : undefined;
	}

	async function findByIdempotencyKey(idempotencyKey: string): Promise<OnboardingTask | undefined> {
		const task = await Tasks.findOne({ where: { idempotencyKey } });
		return task ? task.get({ plain: true }) : undefined;
	}

	async function findActiveTasksForOrganization(organizationId: number): Promise<Array<OnboardingTask>> {
		const tasks = await Tasks.findAll({
			where: { organizationId, status: { [Op.in]: ["PENDING", "PROCESSING"] } },
			order: [
				["createdAt", "DESC"],
				["id", "DESC"],
			],
		});
		return tasks.map(task => task.get({ plain: true }));
	}

	async function findStuckTasks(staleBefore: Date): Promise<Array<OnboardingTask>> {
		const tasks = await Tasks.findAll({
			where: { status: "PROCESSING", startedAt: { [Op.lt]: staleBefore } },
			order: [["startedAt", "ASC"]],
		});
		return tasks.map(task => task.get({ plain: true }));
	}

	function countStuckTasks(staleBefore: Date): Promise<number> {
		return Tasks.count({ where: { status: "PROCESSING", startedAt: { [Op.lt]: staleBefore } } });
	}

	async function findOrphanedTasks(staleBefore: Date): Promise<Array<OnboardingTask>> {
		const tasks = await Tasks.findAll({
			where: { status: "PENDING", updatedAt: { [Op.lt]: staleBefore } },
			order: [["createdAt", "ASC"]],
		});
		return tasks.map(task => task.get({ plain: true }));
	}

	async function findRetryableFailures(maxRetries: number): Promise<Array<OnboardingTask>> {
		const tasks = await Tasks.findAll({
			where: { status: "FAILED", failureKind: "RETRYABLE", retryCount: { [Op.lt]: maxRetries } },
			order: [["completedAt", "ASC"]],
		});
		return tasks.map(task => task.get({ plain: true }));
	}

	async function tryClaim(id: number): Promise<boolean> {
		const [affected] = await Tasks.update(
			{ status: "PROCESSING", startedAt: new Date() },
			{ where: { id, status: "PENDING" } },
		);
		return affected === 1;
	}

	async function markCompleted(id: number, result: TaskResult): Promise<boolean> {
		const [affected] = await Tasks.update(
			{
				status: "COMPLETED",
				resultReference: result.resultReference,
				summary: result.summary,
				completedAt: new Date(),
				lastError: null,
				failureKind: null,
			},
			{ where: { id, status: { [Op.in]: ["PROCESSING", "FAILED"] } } },
		);
		return affected === 1;
	}

	async function markFailed(id: number, error: string, kind: FailureKind): Promise<boolean> {
		const [affected] = await Tasks.update(
			{
				status: "FAILED",
				lastError: error,
				failureKind: kind,
				completedAt: new Date(),
				retryCount: literal("retry_count + 1"),
			},
			{ where: { id, status: "PROCESSING" } },
		);
		return affected === 1;
	}

	async function markCancelled(id: number, reason: string, staleBefore: Date): Promise<boolean> {
		const [affected] = await Tasks.update(
			{ status: "CANCELLED", lastError: `Cancelled: ${reason}`, completedAt: new Date() },
			{
				where: {
					id,
					[Op.or]: [{ status: "FAILED" }, { status: "PROCESSING", startedAt: { [Op.lt]: staleBefore } }],
				},
			},
		);
		return affected === 1;
	}

	async function updateWhileProcessing(id: number, progress: TaskProgress, stepBits = 0): Promise<boolean> {
		const [affected] = await Tasks.update(
			stepBits === 0 ? progress : { ...progress, completedSteps: literal(`completed_steps | ${stepBits}`) },
			{ where: { id, status: "PROCESSING" } },
		);
		return affected === 1;
	}

	async function resetStuckTask(id: number, staleBefore: Date): Promise<boolean> {
		const [affected] = await Tasks.update(
			{ status: "PENDING", startedAt: null },
			{ where: { id, status: "PROCESSING", startedAt: { [Op.lt]: staleBefore } } },
		);
		return affected === 1;
	}

	async function claimForRetry(id: number, maxRetries: number): Promise<boolean> {
		const [affected] = await Tasks.update(
			{ status: "PENDING", startedAt: null, completedAt: null },
			{ where: { id, status: "FAILED", failureKind: "RETRYABLE", retryCount: { [Op.lt]: maxRetries } } },
		);
		return affected === 1;
	}
}
