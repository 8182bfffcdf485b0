import type { TaskStatus } from "onboarding-common";

/**
 * The task is no longer PROCESSING: another actor cancelled or reset it.
 * Workers stop without recording a failure.
 */
export class TaskOwnershipLostError extends Error {
	constructor(
		readonly taskId: number,
		readonly observedStatus: TaskStatus | undefined,
	) {
		super(`Task ${taskId} is no longer owned by this worker (status: ${observedStatus ?? "deleted"})`);
		this.name = "TaskOwnershipLostError";
	}
}

/**
 * Input that can never succeed again, such as an authorization code that was already used.
 */
export class UnrecoverableInputError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "UnrecoverableInputError";
	}
}

/**
 * The requested transition is not allowed from the task's current status.
 */
export class TaskStateConflictError extends Error {
	constructor(
		message: string,
		readonly currentStatus: TaskStatus,
	) {
		super(message);
		this.name = "TaskStateConflictError";
	}
}

export class TaskNotFoundError extends Error {
	constructor(readonly taskId: number) {
		super(`Task not found: ${taskId}`);
		this.name = "TaskNotFoundError";
	}
}

/**
 * The provider account is already connected to a different organization.
 */
export class AccountAlreadyClaimedError extends Error {
	constructor(readonly externalAccountId: string) {
		super(`Account ${externalAccountId} is already connected to another organization`);
		this.name = "AccountAlreadyClaimedError";
	}
}

/**
 * System-user provisioning cannot proceed for the organization.
 */
export class ProvisioningError extends Error {
	constructor(
		readonly organizationId: number,
		message: string,
	) {
		super(message);
		this.name = "ProvisioningError";
	}
}
