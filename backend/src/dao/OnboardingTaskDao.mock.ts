import type { OnboardingTask } from "../model/OnboardingTask";
import type { OnboardingTaskDao } from "./OnboardingTaskDao";
import { vi } from "vitest";

export function mockOnboardingTask(partial?: Partial<OnboardingTask>): OnboardingTask {
	return {
		id: 1,
		organizationId: 42,
		idempotencyKey: "key-1",
		authorizationCode: "abc",
		signupType: "STANDARD",
		requestedAccountId: null,
		requestedBusinessId: null,
		requestedPhoneNumberId: null,
		resolvedAccountId: null,
		resolvedBusinessId: null,
		resolvedPhoneNumberId: null,
		status: "PENDING",
		completedSteps: 0,
		codeExchangeStartedAt: null,
		encryptedAccessToken: null,
		tokenExpiresIn: null,
		webhookConfirmed: null,
		startedAt: null,
		completedAt: null,
		retryCount: 0,
		lastError: null,
		failureKind: null,
		resultReference: null,
		summary: null,
		createdAt: new Date("2026-01-01T00:00:00.000Z"),
		updatedAt: new Date("2026-01-01T00:00:00.000Z"),
		...partial,
	};
}

export function mockOnboardingTaskDao(partial?: Partial<OnboardingTaskDao>): OnboardingTaskDao {
	return {
		createTask: vi.fn().mockResolvedValue(mockOnboardingTask()),
		getTask: vi.fn().mockResolvedValue(undefined),
		findByIdempotencyKey: vi.fn().mockResolvedValue(undefined),
		findActiveTasksForOrganization: vi.fn().mockResolvedValue([]),
		findStuckTasks: vi.fn().mockResolvedValue([]),
		countStuckTasks: vi.fn().mockResolvedValue(0),
		findOrphanedTasks: vi.fn().mockResolvedValue([]),
		findRetryableFailures: vi.fn().mockResolvedValue([]),
		tryClaim: vi.fn().mockResolvedValue(true),
		markCompleted: vi.fn().mockResolvedValue(true),
		markFailed: vi.fn().mockResolvedValue(true),
		markCancelled: vi.fn().mockResolvedValue(true),
		updateWhileProcessing: vi.fn().mockResolvedValue(true),
		resetStuckTask: vi.fn().mockResolvedValue(true),
		claimForRetry: vi.fn().mockResolvedValue(true),
		...partial,
	};
}
