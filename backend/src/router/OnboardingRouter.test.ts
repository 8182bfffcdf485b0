import { ProvisioningError, TaskNotFoundError, TaskStateConflictError } from "../onboarding/OnboardingErrors";
import { type AccountHealthService, CredentialNotFoundError } from "../onboarding/AccountHealthService";
import type { OnboardingOrchestrator } from "../onboarding/OnboardingOrchestrator";
import type { SystemUserProvisioner } from "../onboarding/SystemUserProvisioner";
import { ProviderPermanentError } from "../provider/ProviderErrors";
import { createOnboardingRouter } from "./OnboardingRouter";
import express, { type Express } from "express";
import type { TaskSnapshot } from "onboarding-common";
import request from "supertest";
import { beforeEach, describe, expect, it, vi } from "vitest";

describe("OnboardingRouter", () => {
	let app: Express;
	let orchestrator: OnboardingOrchestrator;
	let provisioner: SystemUserProvisioner;
	let accountHealth: AccountHealthService;

	const snapshot: TaskSnapshot = {
		id: 5,
		organizationId: 42,
		status: "FAILED",
		signupType: "STANDARD",
		completedSteps: ["TOKEN_EXCHANGE"],
		retryCount: 1,
		lastError: "extendToken failed after 4 attempts: fetch failed",
		failureKind: "RETRYABLE",
		guidance: "AUTOMATIC_RETRY",
		createdAt: "2026-01-01T00:00:00.000Z",
	};

	beforeEach(() => {
		orchestrator = {
			enqueue: vi.fn().mockResolvedValue({ taskId: 5, status: "PENDING", created: true }),
			getTask: vi.fn().mockResolvedValue(snapshot),
			getActiveTasks: vi.fn().mockResolvedValue([snapshot]),
			cancel: vi.fn().mockResolvedValue({ ...snapshot, status: "CANCELLED" }),
			resetStuckTasks: vi.fn().mockResolvedValue(2),
			retryFailedTasks: vi.fn().mockResolvedValue(1),
		};
		provisioner = {
			provisionForOrganization: vi
				.fn()
				.mockResolvedValue({ organizationId: 42, status: "PROVISIONED", systemUserId: "su-1", assignedAccounts: 1 }),
			tryProvisionAfterSignup: vi.fn(),
			getStatus: vi.fn().mockResolvedValue({
				organizationId: 42,
				provisioned: true,
				tokenType: "SYSTEM_USER",
				systemUserId: "su-1",
				message: "Organization has a permanent system-user credential. No action needed.",
			}),
			provisionAll: vi.fn().mockResolvedValue({
				attempted: 1,
				succeeded: 1,
				failed: 0,
				message: "Bulk provisioning done: 1 succeeded, 0 failed out of 1 organizations.",
			}),
		};
		accountHealth = {
			checkHealth: vi.fn().mockResolvedValue({
				organizationId: 42,
				overallStatus: "HEALTHY",
				summary: "All checks passed. 0 phone numbers connected.",
				checkedAt: "2026-01-01T00:00:00.000Z",
				token: { status: "OK", tokenType: "SYSTEM_USER", valid: true, detail: "Credential never expires." },
				accounts: [],
				phones: [],
			}),
		};
		app = express();
		app.use(express.json());
		app.use("/api/onboarding", createOnboardingRouter({ orchestrator, provisioner, accountHealth }));
	});

	describe("POST /tasks", () => {
		it("should accept a signup with 202", async () => {
			const response = await request(app)
				.post("/api/onboarding/tasks")
				.send({ organizationId: 42, authorizationCode: "abc", signupType: "COEXISTENCE", phoneNumberId: "phone-1" });

			expect(response.status).toBe(202);
			expect(response.body).toEqual({ taskId: 5, status: "PENDING", created: true });
			expect(orchestrator.enqueue).toHaveBeenCalledWith({
				organizationId: 42,
				authorizationCode: "abc",
				signupType: "COEXISTENCE",
				phoneNumberId: "phone-1",
			});
		});

		it("should reject a signup without a code", async () => {
			const response = await request(app).post("/api/onboarding/tasks").send({ organizationId: 42 });

			expect(response.status).toBe(400);
			expect(response.body).toEqual({ error: "Invalid request", details: ["authorizationCode: Required"] });
			expect(orchestrator.enqueue).not.toHaveBeenCalled();
		});

		it("should reject an unknown signup type", async () => {
			const response = await request(app)
				.post("/api/onboarding/tasks")
				.send({ organizationId: 42, authorizationCode: "abc", signupType: "OTHER" });

			expect(response.status).toBe(400);
		});

		it("should return 500 when the task cannot be stored", async () => {
			vi.mocked(orchestrator.enqueue).mockRejectedValue(new Error("connection lost"));

			const response = await request(app)
				.post("/api/onboarding/tasks")
				.send({ organizationId: 42, authorizationCode: "abc" });

			expect(response.status).toBe(500);
			expect(response.body).toEqual({ error: "Failed to enqueue signup" });
		});
	});

	describe("GET /tasks/:id", () => {
		it("should return the snapshot", async () => {
			const response = await request(app).get("/api/onboarding/tasks/5");

			expect(response.status).toBe(200);
			expect(response.body).toEqual(snapshot);
			expect(orchestrator.getTask).toHaveBeenCalledWith(5);
		});

		it("should return 404 for an unknown task", async () => {
			vi.mocked(orchestrator.getTask).mockResolvedValue(undefined);

			const response = await request(app).get("/api/onboarding/tasks/99");

			expect(response.status).toBe(404);
			expect(response.body).toEqual({ error: "Task not found" });
		});

		it("should return 400 for an invalid id", async () => {
			const response = await request(app).get("/api/onboarding/tasks/abc");

			expect(response.status).toBe(400);
			expect(orchestrator.getTask).not.toHaveBeenCalled();
		});
	});

	describe("POST /tasks/:id/cancel", () => {
		it("should cancel the task", async () => {
			const response = await request(app).post("/api/onboarding/tasks/5/cancel").send({ reason: "user gave up" });

			expect(response.status).toBe(200);
			expect(response.body.status).toBe("CANCELLED");
			expect(orchestrator.cancel).toHaveBeenCalledWith(5, "user gave up");
		});

		it("should require a reason", async () => {
			const response = await request(app).post("/api/onboarding/tasks/5/cancel").send({ reason: "  " });

			expect(response.status).toBe(400);
			expect(orchestrator.cancel).not.toHaveBeenCalled();
		});

		it("should return 404 for an unknown task", async () => {
			vi.mocked(orchestrator.cancel).mockRejectedValue(new TaskNotFoundError(99));

			const response = await request(app).post("/api/onboarding/tasks/99/cancel").send({ reason: "gone" });

			expect(response.status).toBe(404);
		});

		it("should return 409 when a live worker owns the task", async () => {
			vi.mocked(orchestrator.cancel).mockRejectedValue(
				new TaskStateConflictError("Task 5 is being processed by a live worker", "PROCESSING"),
			);

			const response = await request(app).post("/api/onboarding/tasks/5/cancel").send({ reason: "stop" });

			expect(response.status).toBe(409);
			expect(response.body).toEqual({ error: "Task 5 is being processed by a live worker", status: "PROCESSING" });
		});
	});

	it("should list the active tasks of an organization", async () => {
		const response = await request(app).get("/api/onboarding/organizations/42/tasks");

		expect(response.status).toBe(200);
		expect(response.body).toEqual([snapshot]);
		expect(orchestrator.getActiveTasks).toHaveBeenCalledWith(42);
	});

	describe("POST /maintenance", () => {
		it("should reset stuck tasks", async () => {
			const response = await request(app).post("/api/onboarding/maintenance/reset-stuck");

			expect(response.body).toEqual({ count: 2 });
		});

		it("should retry failed tasks", async () => {
			const response = await request(app).post("/api/onboarding/maintenance/retry-failed");

			expect(response.body).toEqual({ count: 1 });
		});

		it("should return 500 when maintenance fails", async () => {
			vi.mocked(orchestrator.resetStuckTasks).mockRejectedValue(new Error("connection lost"));

			const response = await request(app).post("/api/onboarding/maintenance/reset-stuck");

			expect(response.status).toBe(500);
		});
	});

	describe("POST /organizations/:organizationId/provision-system-user", () => {
		it("should provision without force by default", async () => {
			const response = await request(app).post("/api/onboarding/organizations/42/provision-system-user").send({});

			expect(response.status).toBe(200);
			expect(response.body).toEqual({
				organizationId: 42,
				status: "PROVISIONED",
				systemUserId: "su-1",
				assignedAccounts: 1,
			});
			expect(provisioner.provisionForOrganization).toHaveBeenCalledWith(42, false);
		});

		it("should pass force through", async () => {
			await request(app).post("/api/onboarding/organizations/42/provision-system-user").send({ force: true });

			expect(provisioner.provisionForOrganization).toHaveBeenCalledWith(42, true);
		});

		it("should return 422 when the organization cannot be provisioned", async () => {
			vi.mocked(provisioner.provisionForOrganization).mockRejectedValue(
				new ProvisioningError(42, "No credential found for organization 42. Complete the signup first."),
			);

			const response = await request(app).post("/api/onboarding/organizations/42/provision-system-user").send({});

			expect(response.status).toBe(422);
			expect(response.body).toEqual({ error: "No credential found for organization 42. Complete the signup first." });
		});

		it("should return 502 when the provider rejects the provisioning", async () => {
			vi.mocked(provisioner.provisionForOrganization).mockRejectedValue(
				new ProviderPermanentError("createSystemUser[biz-1]", "Permissions error"),
			);

			const response = await request(app).post("/api/onboarding/organizations/42/provision-system-user").send({});

			expect(response.status).toBe(502);
			expect(response.body).toEqual({ error: "createSystemUser[biz-1] failed permanently: Permissions error" });
		});
	});

	it("should return the provisioning status of an organization", async () => {
		const response = await request(app).get("/api/onboarding/organizations/42/provisioning-status");

		expect(response.status).toBe(200);
		expect(response.body).toMatchObject({ organizationId: 42, provisioned: true, systemUserId: "su-1" });
		expect(provisioner.getStatus).toHaveBeenCalledWith(42);
	});

	it("should provision every organization on a user credential", async () => {
		const response = await request(app).post("/api/onboarding/maintenance/provision-all");

		expect(response.status).toBe(200);
		expect(response.body).toEqual({
			attempted: 1,
			succeeded: 1,
			failed: 0,
			message: "Bulk provisioning done: 1 succeeded, 0 failed out of 1 organizations.",
		});
	});

	describe("GET /organizations/:organizationId/health", () => {
		it("should return the health report", async () => {
			const response = await request(app).get("/api/onboarding/organizations/42/health");

			expect(response.status).toBe(200);
			expect(response.body).toMatchObject({ organizationId: 42, overallStatus: "HEALTHY" });
			expect(accountHealth.checkHealth).toHaveBeenCalledWith(42);
		});

		it("should return 404 before the first signup", async () => {
			vi.mocked(accountHealth.checkHealth).mockRejectedValue(new CredentialNotFoundError(42));

			const response = await request(app).get("/api/onboarding/organizations/42/health");

			expect(response.status).toBe(404);
			expect(response.body).toEqual({
				error: "No credential found for organization 42. Complete the signup first.",
			});
		});

		it("should return 400 for an invalid organization id", async () => {
			const response = await request(app).get("/api/onboarding/organizations/abc/health");

			expect(response.status).toBe(400);
			expect(accountHealth.checkHealth).not.toHaveBeenCalled();
		});
	});
});
