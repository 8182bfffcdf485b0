import type { OnboardingTaskDao } from "../dao/OnboardingTaskDao";
import type { OnboardingTask } from "../model/OnboardingTask";
import { getLog } from "../util/Logger";
import type { OnboardingDispatcher } from "./OnboardingDispatcher";
import { listSteps } from "./OnboardingSteps";
import type { SignupInput } from "./SignupSaga";
import type { TaskStateService } from "./TaskStateService";
import { createHash } from "node:crypto";
import type { EnqueueSignupRequest, EnqueueSignupResponse, FailureGuidance, TaskSnapshot } from "onboarding-common";
import { UniqueConstraintError } from "sequelize";

const log = getLog(import.meta);

export interface OnboardingOrchestratorOptions {
	maxRetries: number;
}

/**
 * Front door of the saga engine. Calls return after the first durable write;
 * the sagas themselves run on the dispatcher.
 */
export interface OnboardingOrchestrator {
	/**
	 * Stores a PENDING task and dispatches it. A request with a known idempotency key
	 * returns the existing task, dispatching it again only while it is still PENDING.
	 */
	enqueue(request: EnqueueSignupRequest): Promise<EnqueueSignupResponse>;

	getTask(taskId: number): Promise<TaskSnapshot | undefined>;

	getActiveTasks(organizationId: number): Promise<Array<TaskSnapshot>>;

	/**
	 * @throws TaskNotFoundError
	 * @throws TaskStateConflictError
	 */
	cancel(taskId: number, reason: string): Promise<TaskSnapshot>;

	/**
	 * Returns stale PROCESSING tasks to PENDING and dispatches them again. PENDING tasks
	 * untouched for the stuck threshold lost their queue entry and are dispatched too.
	 * @returns the number of tasks reset or dispatched again
	 */
	resetStuckTasks(): Promise<number>;

	/**
	 * Returns retryable FAILED tasks to PENDING and dispatches them again.
	 * @returns the number of tasks claimed for retry
	 */
	retryFailedTasks(): Promise<number>;
}

/**
 * Hex SHA-256 of `<organizationId>:<authorizationCode>`.
 */
export function deriveIdempotencyKey(organizationId: number, authorizationCode: string): string {
	return createHash("sha256").update(`${organizationId}:${authorizationCode}`).digest("hex");
}

export function getFailureGuidance(task: OnboardingTask, maxRetries: number): FailureGuidance | undefined {
	if (task.status !== "FAILED") {
		return;
	}
	return task.failureKind === "PERMANENT" || task.retryCount >= maxRetries ? "RESTART_SIGNUP" : "AUTOMATIC_RETRY";
}

/**
 * Public view of a task. The authorization code and the token never leave the service.
 */
export function toTaskSnapshot(task: OnboardingTask, maxRetries: number): TaskSnapshot {
	const snapshot: TaskSnapshot = {
		id: task.id,
		organizationId: task.organizationId,
		status: task.status,
		signupType: task.signupType,
		completedSteps: listSteps(task.completedSteps),
		retryCount: task.retryCount,
		createdAt: task.createdAt.toISOString(),
	};
	const guidance = getFailureGuidance(task, maxRetries);
	if (guidance) {
		snapshot.guidance = guidance;
	}
	if (task.lastError) {
		snapshot.lastError = task.lastError;
	}
	if (task.failureKind) {
		snapshot.failureKind = task.failureKind;
	}
	if (task.resultReference !== null) {
		snapshot.resultReference = task.resultReference;
	}
	if (task.summary) {
		snapshot.summary = task.summary;
	}
	const accountId = task.resolvedAccountId ?? task.requestedAccountId;
	if (accountId) {
		snapshot.accountId = accountId;
	}
	const businessId = task.resolvedBusinessId ?? task.requestedBusinessId;
	if (businessId) {
		snapshot.businessId = businessId;
	}
	const phoneNumberId = task.resolvedPhoneNumberId ?? task.requestedPhoneNumberId;
	if (phoneNumberId) {
		snapshot.phoneNumberId = phoneNumberId;
	}
	if (task.startedAt) {
		snapshot.startedAt = task.startedAt.toISOString();
	}
	if (task.completedAt) {
		snapshot.completedAt = task.completedAt.toISOString();
	}
	return snapshot;
}

export function createOnboardingOrchestrator(
	taskDao: OnboardingTaskDao,
	taskState: TaskStateService,
	dispatcher: OnboardingDispatcher,
	options: OnboardingOrchestratorOptions,
): OnboardingOrchestrator {
	return {
		enqueue,
		getTask,
		getActiveTasks,
		cancel,
		resetStuckTasks,
		retryFailedTasks,
	};

	function snapshot(task: OnboardingTask): TaskSnapshot {
		return toTaskSnapshot(task, options.maxRetries);
	}

	async function enqueue(request: EnqueueSignupRequest): Promise<EnqueueSignupResponse> {
		const idempotencyKey =
			request.idempotencyKey ?? deriveIdempotencyKey(request.organizationId, request.authorizationCode);

		const existing = await taskDao.findByIdempotencyKey(idempotencyKey);
		if (existing) {
			log.info({ taskId: existing.id }, "Duplicate signup for organization %d", request.organizationId);
			// the claim keeps a second queue entry from running the saga twice
			if (existing.status === "PENDING") {
				dispatcher.redispatch(existing);
			}
			return { taskId: existing.id, status: existing.status, created: false };
		}

		let task: OnboardingTask;
		try {
			task = await taskDao.createTask({
				organizationId: request.organizationId,
				idempotencyKey,
				authorizationCode: request.authorizationCode,
				signupType: request.signupType ?? "STANDARD",
				requestedAccountId: request.accountId ?? null,
				requestedBusinessId: request.businessId ?? null,
				requestedPhoneNumberId: request.phoneNumberId ?? null,
			});
		} catch (error) {
			if (!(error instanceof UniqueConstraintError)) {
				throw error;
			}
			const winner = await taskDao.findByIdempotencyKey(idempotencyKey);
			if (!winner) {
				throw error;
			}
			log.info({ taskId: winner.id }, "Concurrent duplicate signup for organization %d", request.organizationId);
			return { taskId: winner.id, status: winner.status, created: false };
		}

		log.info({ taskId: task.id }, "Signup task %d created for organization %d", task.id, request.organizationId);
		dispatcher.dispatch(task.id, toSignupInput(request));
		return { taskId: task.id, status: task.status, created: true };
	}

	async function getTask(taskId: number): Promise<TaskSnapshot | undefined> {
		const task = await taskDao.getTask(taskId);
		return task ? snapshot(task) : undefined;
	}

	async function getActiveTasks(organizationId: number): Promise<Array<TaskSnapshot>> {
		const tasks = await taskDao.findActiveTasksForOrganization(organizationId);
		return tasks.map(snapshot);
	}

	async function cancel(taskId: number, reason: string): Promise<TaskSnapshot> {
		return snapshot(await taskState.markCancelled(taskId, reason));
	}

	async function resetStuckTasks(): Promise<number> {
		const staleBefore = taskState.staleBefore();
		const stuck = await taskDao.findStuckTasks(staleBefore);
		let count = 0;
		for (const task of stuck) {
			if (await taskState.resetStuckTask(task.id)) {
				count++;
				dispatcher.redispatch(task);
			}
		}
		if (stuck.length > 0) {
			log.info("Reset %d of %d stuck tasks", count, stuck.length);
		}

		const orphaned = await taskDao.findOrphanedTasks(staleBefore);
		let redispatched = 0;
		for (const task of orphaned) {
			if (dispatcher.redispatch(task)) {
				redispatched++;
			}
		}
		if (orphaned.length > 0) {
			log.info("Dispatched %d of %d PENDING tasks without a worker", redispatched, orphaned.length);
		}
		return count + redispatched;
	}

	async function retryFailedTasks(): Promise<number> {
		const failed = await taskDao.findRetryableFailures(options.maxRetries);
		let count = 0;
		for (const task of failed) {
			if (await taskState.claimForRetry(task.id)) {
				count++;
				dispatcher.redispatch(task);
			}
		}
		if (failed.length > 0) {
			log.info("Retrying %d of %d failed tasks", count, failed.length);
		}
		return count;
	}
}

function toSignupInput(request: EnqueueSignupRequest): SignupInput {
	const input: SignupInput = {
		organizationId: request.organizationId,
		authorizationCode: request.authorizationCode,
		signupType: request.signupType ?? "STANDARD",
	};
	if (request.accountId) {
		input.accountId = request.accountId;
	}
	if (request.businessId) {
		input.businessId = request.businessId;
	}
	if (request.phoneNumberId) {
		input.phoneNumberId = request.phoneNumberId;
	}
	return input;
}
