import type { TaskResult } from "../dao/OnboardingTaskDao";
import type { OnboardingTask } from "../model/OnboardingTask";
import { ProviderPermanentError } from "../provider/ProviderErrors";
import { getLog } from "../util/Logger";
import { createQueue, QueueClosedError } from "../util/Queue";
import { AccountAlreadyClaimedError, TaskOwnershipLostError, UnrecoverableInputError } from "./OnboardingErrors";
import type { SignupInput, SignupSaga } from "./SignupSaga";
import type { TaskStateService } from "./TaskStateService";
import type { FailureKind } from "onboarding-common";

const log = getLog(import.meta);

/**
 * - completed: the saga finished and the completion landed
 * - failed: the saga failed and the failure landed
 * - not-claimed: the task was not PENDING
 * - discarded: the task changed status while running, the result was dropped
 * - ownership-lost: the saga stopped because the task was cancelled or reset
 */
export type DispatchOutcome = "completed" | "failed" | "not-claimed" | "discarded" | "ownership-lost";

/**
 * Runs signup sagas on a bounded pool of workers, detached from the caller.
 */
export interface OnboardingDispatcher {
	/**
	 * Queues a task and returns immediately. Returns false once the dispatcher is stopped.
	 */
	dispatch(taskId: number, input: SignupInput): boolean;

	/**
	 * Claims the task and runs its saga. The only path that runs a saga.
	 */
	execute(taskId: number, input: SignupInput): Promise<DispatchOutcome>;

	/**
	 * Queues a task that was reset or claimed for retry, rebuilding its input from the stored row.
	 */
	redispatch(task: OnboardingTask): boolean;

	/** Queued plus running tasks. */
	pending(): number;

	drain(): Promise<void>;

	/** Stops accepting tasks and waits for the running ones. */
	stop(): Promise<void>;
}

export interface OnboardingDispatcherOptions {
	concurrency: number;
}

interface DispatchItem {
	taskId: number;
	input: SignupInput;
}

/**
 * Failures that will fail again on retry.
 */
export function classifyFailure(error: unknown): FailureKind {
	if (
		error instanceof UnrecoverableInputError ||
		error instanceof ProviderPermanentError ||
		error instanceof AccountAlreadyClaimedError
	) {
		return "PERMANENT";
	}
	return "RETRYABLE";
}

/**
 * Resolved identifiers win over the requested ones.
 */
export function signupInputFromTask(task: OnboardingTask): SignupInput {
	const input: SignupInput = {
		organizationId: task.organizationId,
		authorizationCode: task.authorizationCode,
		signupType: task.signupType,
	};
	const accountId = task.resolvedAccountId ?? task.requestedAccountId;
	const businessId = task.resolvedBusinessId ?? task.requestedBusinessId;
	const phoneNumberId = task.resolvedPhoneNumberId ?? task.requestedPhoneNumberId;
	if (accountId) {
		input.accountId = accountId;
	}
	if (businessId) {
		input.businessId = businessId;
	}
	if (phoneNumberId) {
		input.phoneNumberId = phoneNumberId;
	}
	return input;
}

export function createOnboardingDispatcher(
	taskState: TaskStateService,
	saga: SignupSaga,
	options: OnboardingDispatcherOptions,
): OnboardingDispatcher {
	const queue = createQueue<DispatchItem>(
		options.concurrency,
		async item => {
			const outcome = await execute(item.taskId, item.input);
			log.debug({ taskId: item.taskId }, "Task %d dispatch outcome: %s", item.taskId, outcome);
		},
		(error, item) => log.error(error, "Worker crashed while running task %d", item.taskId),
	);

	return {
		dispatch,
		execute,
		redispatch,
		pending: () => queue.size(),
		drain: () => queue.drain(),
		stop,
	};

	function dispatch(taskId: number, input: SignupInput): boolean {
		try {
			queue.add({ taskId, input });
			log.debug({ taskId }, "Task %d queued", taskId);
			return true;
		} catch (error) {
			if (error instanceof QueueClosedError) {
				log.warn({ taskId }, "Dispatcher is stopped, task %d stays PENDING", taskId);
				return false;
			}
			throw error;
		}
	}

	function redispatch(task: OnboardingTask): boolean {
		return dispatch(task.id, signupInputFromTask(task));
	}

	async function execute(taskId: number, input: SignupInput): Promise<DispatchOutcome> {
		if (!(await taskState.tryClaim(taskId))) {
			return "not-claimed";
		}

		let result: TaskResult;
		try {
			result = await saga.run(taskId, input);
		} catch (error) {
			if (error instanceof TaskOwnershipLostError) {
				log.warn({ taskId, status: error.observedStatus }, "Task %d stopped: %s", taskId, error.message);
				return "ownership-lost";
			}
			const kind = classifyFailure(error);
			const message = error instanceof Error ? error.message : String(error);
			log.error(error, "Task %d failed (%s)", taskId, kind);
			return (await taskState.markFailed(taskId, message, kind)) ? "failed" : "discarded";
		}

		return (await taskState.markCompleted(taskId, result)) ? "completed" : "discarded";
	}

	async function stop(): Promise<void> {
		log.info("Stopping onboarding dispatcher with %d pending tasks", queue.size());
		await queue.close();
	}
}
