import type { NewOnboardingTask } from "../model/OnboardingTask";
import { stepBit } from "../onboarding/OnboardingSteps";
import { createMemorySequelize, type MemorySequelizeInstance } from "../util/Sequelize";
import { createOnboardingTaskDao, type OnboardingTaskDao } from "./OnboardingTaskDao";
import { UniqueConstraintError } from "sequelize";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

function newTask(overrides: Partial<NewOnboardingTask> = {}): NewOnboardingTask {
	return {
		organizationId: 42,
		idempotencyKey: "key-1",
		authorizationCode: "abc",
		signupType: "STANDARD",
		requestedAccountId: null,
		requestedBusinessId: null,
		requestedPhoneNumberId: null,
		...overrides,
	};
}

describe("OnboardingTaskDao", () => {
	let instance: MemorySequelizeInstance;
	let taskDao: OnboardingTaskDao;

	beforeEach(async () => {
		instance = await createMemorySequelize(true);
		taskDao = createOnboardingTaskDao(instance.sequelize);
		await instance.sequelize.sync({ force: true });
	});

	afterEach(async () => {
		await instance.sequelize.close();
		await instance.server.stop();
	});

	async function backdateStart(id: number, minutes: number): Promise<void> {
		await instance.sequelize.query("UPDATE onboarding_tasks SET started_at = :startedAt WHERE id = :id", {
			replacements: { id, startedAt: new Date(Date.now() - minutes * 60_000) },
		});
	}

	function minutesAgo(minutes: number): Date {
		return new Date(Date.now() - minutes * 60_000);
	}

	it("should create a PENDING task with defaults", async () => {
		const task = await taskDao.createTask(newTask());

		expect(task).toMatchObject({
			organizationId: 42,
			status: "PENDING",
			completedSteps: 0,
			retryCount: 0,
			startedAt: null,
			failureKind: null,
		});
		expect(await taskDao.findByIdempotencyKey("key-1")).toMatchObject({ id: task.id });
	});

	it("should reject a duplicate idempotency key", async () => {
		await taskDao.createTask(newTask());

		await expect(taskDao.createTask(newTask({ authorizationCode: "other" }))).rejects.toBeInstanceOf(
			UniqueConstraintError,
		);
	});

	describe("tryClaim", () => {
		it("should let exactly one of many concurrent claims win", async () => {
			const task = await taskDao.createTask(newTask());

			const results = await Promise.all(Array.from({ length: 8 }, () => taskDao.tryClaim(task.id)));

			expect(results.filter(Boolean)).toHaveLength(1);
			expect(await taskDao.getTask(task.id)).toMatchObject({ status: "PROCESSING" });
		});

		it("should record the start time", async () => {
			const task = await taskDao.createTask(newTask());

			await taskDao.tryClaim(task.id);

			expect((await taskDao.getTask(task.id))?.startedAt).toBeInstanceOf(Date);
		});

		it("should not claim a missing task", async () => {
			expect(await taskDao.tryClaim(999)).toBe(false);
		});
	});

	describe("terminal transitions", () => {
		it("should complete from PROCESSING and clear the failure", async () => {
			const task = await taskDao.createTask(newTask());
			await taskDao.tryClaim(task.id);

			expect(await taskDao.markCompleted(task.id, { resultReference: 7, summary: "done" })).toBe(true);
			expect(await taskDao.getTask(task.id)).toMatchObject({
				status: "COMPLETED",
				resultReference: 7,
				summary: "done",
				lastError: null,
			});
		});

		it("should let a late success overwrite a failure", async () => {
			const task = await taskDao.createTask(newTask());
			await taskDao.tryClaim(task.id);
			await taskDao.markFailed(task.id, "timeout", "RETRYABLE");

			expect(await taskDao.markCompleted(task.id, { resultReference: 7, summary: "done" })).toBe(true);
			expect(await taskDao.getTask(task.id)).toMatchObject({
				status: "COMPLETED",
				lastError: null,
				failureKind: null,
				retryCount: 1,
			});
		});

		it("should not complete a cancelled task", async () => {
			const task = await taskDao.createTask(newTask());
			await taskDao.tryClaim(task.id);
			await taskDao.markFailed(task.id, "timeout", "RETRYABLE");
			await taskDao.markCancelled(task.id, "user request", minutesAgo(15));

			expect(await taskDao.markCompleted(task.id, { resultReference: 7, summary: "done" })).toBe(false);
			expect(await taskDao.getTask(task.id)).toMatchObject({ status: "CANCELLED", resultReference: null });
		});

		it("should not complete a PENDING task", async () => {
			const task = await taskDao.createTask(newTask());

			expect(await taskDao.markCompleted(task.id, { resultReference: 7, summary: "done" })).toBe(false);
		});

		it("should fail only from PROCESSING", async () => {
			const task = await taskDao.createTask(newTask());

			expect(await taskDao.markFailed(task.id, "early", "RETRYABLE")).toBe(false);

			await taskDao.tryClaim(task.id);
			expect(await taskDao.markFailed(task.id, "provider down", "PERMANENT")).toBe(true);
			expect(await taskDao.getTask(task.id)).toMatchObject({
				status: "FAILED",
				lastError: "provider down",
				failureKind: "PERMANENT",
				retryCount: 1,
			});
		});

		it("should never fail a COMPLETED or CANCELLED task", async () => {
			const completed = await taskDao.createTask(newTask());
			await taskDao.tryClaim(completed.id);
			await taskDao.markCompleted(completed.id, { resultReference: 1, summary: "done" });

			const cancelled = await taskDao.createTask(newTask({ idempotencyKey: "key-2" }));
			await taskDao.tryClaim(cancelled.id);
			await backdateStart(cancelled.id, 30);
			await taskDao.markCancelled(cancelled.id, "stale", minutesAgo(15));

			expect(await taskDao.markFailed(completed.id, "late", "RETRYABLE")).toBe(false);
			expect(await taskDao.markFailed(cancelled.id, "late", "RETRYABLE")).toBe(false);
			expect((await taskDao.getTask(completed.id))?.status).toBe("COMPLETED");
			expect((await taskDao.getTask(cancelled.id))?.status).toBe("CANCELLED");
		});
	});

	describe("markCancelled", () => {
		it("should cancel a FAILED task with the reason", async () => {
			const task = await taskDao.createTask(newTask());
			await taskDao.tryClaim(task.id);
			await taskDao.markFailed(task.id, "timeout", "RETRYABLE");

			expect(await taskDao.markCancelled(task.id, "user request", minutesAgo(15))).toBe(true);
			expect(await taskDao.getTask(task.id)).toMatchObject({
				status: "CANCELLED",
				lastError: "Cancelled: user request",
			});
		});

		it("should not cancel a fresh PROCESSING task", async () => {
			const task = await taskDao.createTask(newTask());
			await taskDao.tryClaim(task.id);

			expect(await taskDao.markCancelled(task.id, "user request", minutesAgo(15))).toBe(false);
		});

		it("should cancel a stale PROCESSING task", async () => {
			const task = await taskDao.createTask(newTask());
			await taskDao.tryClaim(task.id);
			await backdateStart(task.id, 20);

			expect(await taskDao.markCancelled(task.id, "stuck", minutesAgo(15))).toBe(true);
		});

		it("should not cancel PENDING or COMPLETED tasks", async () => {
			const pending = await taskDao.createTask(newTask());
			const completed = await taskDao.createTask(newTask({ idempotencyKey: "key-2" }));
			await taskDao.tryClaim(completed.id);
			await taskDao.markCompleted(completed.id, { resultReference: 1, summary: "done" });

			expect(await taskDao.markCancelled(pending.id, "x", minutesAgo(15))).toBe(false);
			expect(await taskDao.markCancelled(completed.id, "x", minutesAgo(15))).toBe(false);
		});
	});

	describe("updateWhileProcessing", () => {
		it("should write progress and add step bits", async () => {
			const task = await taskDao.createTask(newTask());
			await taskDao.tryClaim(task.id);

			await taskDao.updateWhileProcessing(task.id, { encryptedAccessToken: "enc:v1:x" }, stepBit("TOKEN_EXCHANGE"));
			await taskDao.updateWhileProcessing(task.id, { resolvedAccountId: "waba-1" }, stepBit("ACCOUNT_RESOLUTION"));

			expect(await taskDao.getTask(task.id)).toMatchObject({
				encryptedAccessToken: "enc:v1:x",
				resolvedAccountId: "waba-1",
				completedSteps: stepBit("TOKEN_EXCHANGE") | stepBit("ACCOUNT_RESOLUTION"),
			});
		});

		it("should write nothing when the task is not PROCESSING", async () => {
			const task = await taskDao.createTask(newTask());

			expect(await taskDao.updateWhileProcessing(task.id, { resolvedAccountId: "waba-1" }, 1)).toBe(false);
			expect(await taskDao.getTask(task.id)).toMatchObject({ resolvedAccountId: null, completedSteps: 0 });
		});
	});

	describe("maintenance transitions", () => {
		it("should never reset a PROCESSING task younger than the threshold", async () => {
			const task = await taskDao.createTask(newTask());
			await taskDao.tryClaim(task.id);

			expect(await taskDao.resetStuckTask(task.id, minutesAgo(15))).toBe(false);
			expect((await taskDao.getTask(task.id))?.status).toBe("PROCESSING");
		});

		it("should reset a stale PROCESSING task to PENDING", async () => {
			const task = await taskDao.createTask(newTask());
			await taskDao.tryClaim(task.id);
			await backdateStart(task.id, 20);

			expect(await taskDao.findStuckTasks(minutesAgo(15))).toHaveLength(1);
			expect(await taskDao.countStuckTasks(minutesAgo(15))).toBe(1);
			expect(await taskDao.resetStuckTask(task.id, minutesAgo(15))).toBe(true);
			expect(await taskDao.getTask(task.id)).toMatchObject({ status: "PENDING", startedAt: null });
			expect(await taskDao.resetStuckTask(task.id, minutesAgo(15))).toBe(false);
		});

		it("should find PENDING tasks nobody touched since the threshold", async () => {
			const orphan = await taskDao.createTask(newTask());
			await taskDao.createTask(newTask({ idempotencyKey: "key-2" }));
			const claimed = await taskDao.createTask(newTask({ idempotencyKey: "key-3" }));
			await taskDao.tryClaim(claimed.id);
			await instance.sequelize.query(
				"UPDATE onboarding_tasks SET created_at = :at, updated_at = :at WHERE id IN (:ids)",
				{ replacements: { ids: [orphan.id, claimed.id], at: minutesAgo(60) } },
			);

			expect((await taskDao.findOrphanedTasks(minutesAgo(15))).map(task => task.id)).toEqual([orphan.id]);
		});

		it("should claim only retryable failures under the retry limit", async () => {
			const retryable = await taskDao.createTask(newTask());
			await taskDao.tryClaim(retryable.id);
			await taskDao.markFailed(retryable.id, "timeout", "RETRYABLE");

			const permanent = await taskDao.createTask(newTask({ idempotencyKey: "key-2" }));
			await taskDao.tryClaim(permanent.id);
			await taskDao.markFailed(permanent.id, "invalid code", "PERMANENT");

			expect((await taskDao.findRetryableFailures(3)).map(task => task.id)).toEqual([retryable.id]);
			expect(await taskDao.claimForRetry(permanent.id, 3)).toBe(false);
			expect(await taskDao.claimForRetry(retryable.id, 1)).toBe(false);
			expect(await taskDao.claimForRetry(retryable.id, 3)).toBe(true);
			expect(await taskDao.claimForRetry(retryable.id, 3)).toBe(false);
			expect(await taskDao.getTask(retryable.id)).toMatchObject({ status: "PENDING", retryCount: 1 });
		});
	});

	it("should list active tasks of an organization", async () => {
		const pending = await taskDao.createTask(newTask());
		const processing = await taskDao.createTask(newTask({ idempotencyKey: "key-2" }));
		await taskDao.tryClaim(processing.id);
		const failed = await taskDao.createTask(newTask({ idempotencyKey: "key-3" }));
		await taskDao.tryClaim(failed.id);
		await taskDao.markFailed(failed.id, "x", "RETRYABLE");
		await taskDao.createTask(newTask({ idempotencyKey: "key-4", organizationId: 7 }));

		const active = await taskDao.findActiveTasksForOrganization(42);

		expect(active.map(task => task.id).sort()).toEqual([pending.id, processing.id].sort());
	});
});
