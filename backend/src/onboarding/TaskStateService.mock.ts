import { mockOnboardingTask } from "../dao/OnboardingTaskDao.mock";
import type { TaskStateService } from "./TaskStateService";
import { vi } from "vitest";

export function mockTaskStateService(partial?: Partial<TaskStateService>): TaskStateService {
	return {
		tryClaim: vi.fn().mockResolvedValue(true),
		markCompleted: vi.fn().mockResolvedValue(true),
		markFailed: vi.fn().mockResolvedValue(true),
		markCancelled: vi.fn().mockResolvedValue(mockOnboardingTask({ status: "CANCELLED" })),
		verifyOwnership: vi.fn().mockResolvedValue(true),
		assertOwnership: vi.fn().mockResolvedValue(undefined),
		persistStepResult: vi.fn().mockResolvedValue(undefined),
		persistStepCompleted: vi.fn().mockResolvedValue(undefined),
		recordCodeExchangeIntent: vi.fn().mockResolvedValue(undefined),
		resetStuckTask: vi.fn().mockResolvedValue(true),
		claimForRetry: vi.fn().mockResolvedValue(true),
		staleBefore: vi.fn().mockReturnValue(new Date("2026-01-01T00:00:00.000Z")),
		...partial,
	};
}
