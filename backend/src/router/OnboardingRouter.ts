/**
 * OnboardingRouter - front door of the signup saga engine.
 *
 * Every route answers after the first durable write; sagas run on the dispatcher.
 */

import { type AccountHealthService, CredentialNotFoundError } from "../onboarding/AccountHealthService";
import { ProvisioningError, TaskNotFoundError, TaskStateConflictError } from "../onboarding/OnboardingErrors";
import type { OnboardingOrchestrator } from "../onboarding/OnboardingOrchestrator";
import type { SystemUserProvisioner } from "../onboarding/SystemUserProvisioner";
import { ProviderCallFailedError, ProviderPermanentError } from "../provider/ProviderErrors";
import { getLog } from "../util/Logger";
import { parseId, validationError } from "./RouterUtil";
import express, { type Router } from "express";
import { z } from "zod";

const log = getLog(import.meta);

const EnqueueSignupSchema = z.object({
	organizationId: z.number().int().positive(),
	authorizationCode: z.string().min(1),
	accountId: z.string().min(1).optional(),
	businessId: z.string().min(1).optional(),
	phoneNumberId: z.string().min(1).optional(),
	signupType: z.enum(["STANDARD", "COEXISTENCE"]).optional(),
	idempotencyKey: z.string().min(1).max(128).optional(),
});

const CancelTaskSchema = z.object({
	reason: z.string().trim().min(1).max(500),
});

const ProvisionSchema = z.object({
	force: z.boolean().default(false),
});

export interface OnboardingRouterDependencies {
	orchestrator: OnboardingOrchestrator;
	provisioner: SystemUserProvisioner;
	accountHealth: AccountHealthService;
}

export function createOnboardingRouter(deps: OnboardingRouterDependencies): Router {
	const { orchestrator, provisioner, accountHealth } = deps;
	const router = express.Router();

	/**
	 * POST /tasks
	 *
	 * Stores the signup and returns 202 with the task id. A repeated signup returns the existing task.
	 */
	router.post("/tasks", async (req, res) => {
		const parsed = EnqueueSignupSchema.safeParse(req.body);
		if (!parsed.success) {
			res.status(400).json(validationError(parsed.error));
			return;
		}
		try {
			const response = await orchestrator.enqueue(parsed.data);
			res.status(202).json(response);
		} catch (error) {
			log.error(error, "Error enqueuing signup for organization %d", parsed.data.organizationId);
			res.status(500).json({ error: "Failed to enqueue signup" });
		}
	});

	router.get("/tasks/:id", async (req, res) => {
		const taskId = parseId(req.params.id);
		if (taskId === undefined) {
			res.status(400).json({ error: "Invalid task id" });
			return;
		}
		try {
			const snapshot = await orchestrator.getTask(taskId);
			if (!snapshot) {
				res.status(404).json({ error: "Task not found" });
				return;
			}
			res.json(snapshot);
		} catch (error) {
			log.error(error, "Error getting task %d", taskId);
			res.status(500).json({ error: "Failed to get task" });
		}
	});

	/**
	 * POST /tasks/:id/cancel
	 *
	 * 409 when the task is PENDING, COMPLETED or owned by a live worker.
	 */
	router.post("/tasks/:id/cancel", async (req, res) => {
		const taskId = parseId(req.params.id);
		if (taskId === undefined) {
			res.status(400).json({ error: "Invalid task id" });
			return;
		}
		const parsed = CancelTaskSchema.safeParse(req.body);
		if (!parsed.success) {
			res.status(400).json(validationError(parsed.error));
			return;
		}
		try {
			res.json(await orchestrator.cancel(taskId, parsed.data.reason));
		} catch (error) {
			if (error instanceof TaskNotFoundError) {
				res.status(404).json({ error: "Task not found" });
				return;
			}
			if (error instanceof TaskStateConflictError) {
				res.status(409).json({ error: error.message, status: error.currentStatus });
				return;
			}
			log.error(error, "Error cancelling task %d", taskId);
			res.status(500).json({ error: "Failed to cancel task" });
		}
	});

	router.get("/organizations/:organizationId/tasks", async (req, res) => {
		const organizationId = parseId(req.params.organizationId);
		if (organizationId === undefined) {
			res.status(400).json({ error: "Invalid organization id" });
			return;
		}
		try {
			res.json(await orchestrator.getActiveTasks(organizationId));
		} catch (error) {
			log.error(error, "Error listing active tasks of organization %d", organizationId);
			res.status(500).json({ error: "Failed to list active tasks" });
		}
	});

	router.post("/organizations/:organizationId/provision-system-user", async (req, res) => {
		const organizationId = parseId(req.params.organizationId);
		if (organizationId === undefined) {
			res.status(400).json({ error: "Invalid organization id" });
			return;
		}
		const parsed = ProvisionSchema.safeParse(req.body);
		if (!parsed.success) {
			res.status(400).json(validationError(parsed.error));
			return;
		}
		try {
			res.json(await provisioner.provisionForOrganization(organizationId, parsed.data.force));
		} catch (error) {
			if (error instanceof ProvisioningError) {
				res.status(422).json({ error: error.message });
				return;
			}
			if (error instanceof ProviderPermanentError || error instanceof ProviderCallFailedError) {
				log.warn(error, "Provider rejected system-user provisioning of organization %d", organizationId);
				res.status(502).json({ error: error.message });
				return;
			}
			log.error(error, "Error provisioning system user for organization %d", organizationId);
			res.status(500).json({ error: "Failed to provision system user" });
		}
	});

	router.get("/organizations/:organizationId/provisioning-status", async (req, res) => {
		const organizationId = parseId(req.params.organizationId);
		if (organizationId === undefined) {
			res.status(400).json({ error: "Invalid organization id" });
			return;
		}
		try {
			res.json(await provisioner.getStatus(organizationId));
		} catch (error) {
			log.error(error, "Error reading provisioning status of organization %d", organizationId);
			res.status(500).json({ error: "Failed to get provisioning status" });
		}
	});

	/**
	 * GET /organizations/:organizationId/health
	 *
	 * Checks the credential, accounts and phones against the provider. 404 before the first signup.
	 */
	router.get("/organizations/:organizationId/health", async (req, res) => {
		const organizationId = parseId(req.params.organizationId);
		if (organizationId === undefined) {
			res.status(400).json({ error: "Invalid organization id" });
			return;
		}
		try {
			res.json(await accountHealth.checkHealth(organizationId));
		} catch (error) {
			if (error instanceof CredentialNotFoundError) {
				res.status(404).json({ error: error.message });
				return;
			}
			log.error(error, "Error checking health of organization %d", organizationId);
			res.status(500).json({ error: "Failed to check account health" });
		}
	});

	router.post("/maintenance/provision-all", async (_req, res) => {
		try {
			res.json(await provisioner.provisionAll());
		} catch (error) {
			log.error(error, "Error provisioning organizations");
			res.status(500).json({ error: "Failed to provision organizations" });
		}
	});

	router.post("/maintenance/reset-stuck", async (_req, res) => {
		try {
			res.json({ count: await orchestrator.resetStuckTasks() });
		} catch (error) {
			log.error(error, "Error resetting stuck tasks");
			res.status(500).json({ error: "Failed to reset stuck tasks" });
		}
	});

	router.post("/maintenance/retry-failed", async (_req, res) => {
		try {
			res.json({ count: await orchestrator.retryFailedTasks() });
		} catch (error) {
			log.error(error, "Error retrying failed tasks");
			res.status(500).json({ error: "Failed to retry failed tasks" });
		}
	});

	return router;
}
