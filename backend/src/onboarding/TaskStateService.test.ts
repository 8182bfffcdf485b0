import { mockOnboardingTask, mockOnboardingTaskDao } from "../dao/OnboardingTaskDao.mock";
import type { OnboardingTaskDao } from "../dao/OnboardingTaskDao";
import { TaskNotFoundError, TaskOwnershipLostError, TaskStateConflictError } from "./OnboardingErrors";
import { createTaskStateService, type TaskStateService } from "./TaskStateService";
import { beforeEach, describe, expect, it, vi } from "vitest";

const NOW = new Date("2026-02-01T12:00:00.000Z");

describe("TaskStateService", () => {
	let taskDao: OnboardingTaskDao;
	let service: TaskStateService;

	beforeEach(() => {
		taskDao = mockOnboardingTaskDao();
		service = createTaskStateService(taskDao, { stuckThresholdMinutes: 15, maxRetries: 3, now: () => NOW });
	});

	it("should compute the stale boundary from the threshold", () => {
		expect(service.staleBefore()).toEqual(new Date("2026-02-01T11:45:00.000Z"));
	});

	describe("markCompleted", () => {
		it("should report a landed completion", async () => {
			expect(await service.markCompleted(1, { resultReference: 7, summary: "done" })).toBe(true);
			expect(taskDao.getTask).not.toHaveBeenCalled();
		});

		it("should re-read and report a rejected completion", async () => {
			taskDao = mockOnboardingTaskDao({
				markCompleted: vi.fn().mockResolvedValue(false),
				getTask: vi.fn().mockResolvedValue(mockOnboardingTask({ status: "CANCELLED" })),
			});
			service = createTaskStateService(taskDao, { stuckThresholdMinutes: 15, maxRetries: 3 });

			expect(await service.markCompleted(1, { resultReference: 7, summary: "done" })).toBe(false);
			expect(taskDao.getTask).toHaveBeenCalledWith(1);
		});
	});

	it("should report a rejected failure", async () => {
		taskDao = mockOnboardingTaskDao({
			markFailed: vi.fn().mockResolvedValue(false),
			getTask: vi.fn().mockResolvedValue(mockOnboardingTask({ status: "COMPLETED" })),
		});
		service = createTaskStateService(taskDao, { stuckThresholdMinutes: 15, maxRetries: 3 });

		expect(await service.markFailed(1, "timeout", "RETRYABLE")).toBe(false);
	});

	describe("markCancelled", () => {
		it("should pass the stale boundary and return the cancelled task", async () => {
			const cancelled = mockOnboardingTask({ status: "CANCELLED", lastError: "Cancelled: user request" });
			vi.mocked(taskDao.getTask).mockResolvedValue(cancelled);

			expect(await service.markCancelled(1, "user request")).toBe(cancelled);
			expect(taskDao.markCancelled).toHaveBeenCalledWith(1, "user request", new Date("2026-02-01T11:45:00.000Z"));
		});

		it("should be idempotent for a cancelled task", async () => {
			const cancelled = mockOnboardingTask({ status: "CANCELLED" });
			vi.mocked(taskDao.markCancelled).mockResolvedValue(false);
			vi.mocked(taskDao.getTask).mockResolvedValue(cancelled);

			expect(await service.markCancelled(1, "again")).toBe(cancelled);
		});

		it("should refuse a task owned by a live worker", async () => {
			vi.mocked(taskDao.markCancelled).mockResolvedValue(false);
			vi.mocked(taskDao.getTask).mockResolvedValue(
				mockOnboardingTask({ status: "PROCESSING", startedAt: new Date("2026-02-01T11:55:00.000Z") }),
			);

			const error = await service.markCancelled(1, "user request").catch((e: unknown) => e);

			expect(error).toBeInstanceOf(TaskStateConflictError);
			expect(error).toMatchObject({
				message: "Task is actively processing (started 2026-02-01T11:55:00.000Z). Wait 15 min.",
				currentStatus: "PROCESSING",
			});
		});

		it.each(["PENDING", "COMPLETED"] as const)("should refuse a %s task", async status => {
			vi.mocked(taskDao.markCancelled).mockResolvedValue(false);
			vi.mocked(taskDao.getTask).mockResolvedValue(mockOnboardingTask({ status }));

			await expect(service.markCancelled(1, "user request")).rejects.toThrow(
				`Cannot cancel task in status: ${status}`,
			);
		});

		it("should report a missing task", async () => {
			vi.mocked(taskDao.markCancelled).mockResolvedValue(false);

			await expect(service.markCancelled(99, "user request")).rejects.toBeInstanceOf(TaskNotFoundError);
		});
	});

	describe("ownership", () => {
		it("should confirm ownership of a PROCESSING task", async () => {
			vi.mocked(taskDao.getTask).mockResolvedValue(mockOnboardingTask({ status: "PROCESSING" }));

			expect(await service.verifyOwnership(1)).toBe(true);
			await expect(service.assertOwnership(1)).resolves.toBeUndefined();
		});

		it("should raise ownership loss with the observed status", async () => {
			vi.mocked(taskDao.getTask).mockResolvedValue(mockOnboardingTask({ status: "PENDING" }));

			expect(await service.verifyOwnership(1)).toBe(false);
			await expect(service.assertOwnership(1)).rejects.toMatchObject({
				name: "TaskOwnershipLostError",
				taskId: 1,
				observedStatus: "PENDING",
			});
		});
	});

	describe("persistStepResult", () => {
		it("should write the fields and the step bit together", async () => {
			await service.persistStepResult(1, "ACCOUNT_RESOLUTION", { resolvedAccountId: "waba-1" });

			expect(taskDao.updateWhileProcessing).toHaveBeenCalledWith(1, { resolvedAccountId: "waba-1" }, 8);
		});

		it("should mark a step without fields", async () => {
			await service.persistStepCompleted(1, "WEBHOOK_SUBSCRIBE");

			expect(taskDao.updateWhileProcessing).toHaveBeenCalledWith(1, {}, 128);
		});

		it("should raise ownership loss when the write does not land", async () => {
			vi.mocked(taskDao.updateWhileProcessing).mockResolvedValue(false);
			vi.mocked(taskDao.getTask).mockResolvedValue(mockOnboardingTask({ status: "CANCELLED" }));

			const error = await service.persistStepCompleted(1, "PHONE_SYNC").catch((e: unknown) => e);

			expect(error).toBeInstanceOf(TaskOwnershipLostError);
			expect(error).toMatchObject({ observedStatus: "CANCELLED" });
		});
	});

	it("should record the code exchange intent without a step bit", async () => {
		await service.recordCodeExchangeIntent(1);

		expect(taskDao.updateWhileProcessing).toHaveBeenCalledWith(1, { codeExchangeStartedAt: NOW }, 0);
	});

	it("should reset and retry through the configured limits", async () => {
		await service.resetStuckTask(1);
		await service.claimForRetry(2);

		expect(taskDao.resetStuckTask).toHaveBeenCalledWith(1, new Date("2026-02-01T11:45:00.000Z"));
		expect(taskDao.claimForRetry).toHaveBeenCalledWith(2, 3);
	});
});
