/**
 * OnboardingClient - API client for the onboarding task endpoints.
 */

import type { ClientRequests } from "../core/Client";
import type {
	AccountHealthReport,
	BulkProvisioningResult,
	EnqueueSignupRequest,
	EnqueueSignupResponse,
	MaintenanceResponse,
	ProvisioningResult,
	ProvisioningState,
	TaskSnapshot,
} from "./types";

export interface OnboardingClient {
	/**
	 * Submit a signup. Submitting the same organization and code twice returns the same task.
	 */
	enqueue(request: EnqueueSignupRequest): Promise<EnqueueSignupResponse>;

	/**
	 * Get a task snapshot, or undefined when the task does not exist.
	 */
	getTask(taskId: number): Promise<TaskSnapshot | undefined>;

	/**
	 * List PENDING and PROCESSING tasks of an organization.
	 */
	getActiveTasks(organizationId: number): Promise<Array<TaskSnapshot>>;

	/**
	 * Cancel a failed or stale task. Rejects when a live worker owns the task.
	 */
	cancel(taskId: number, reason: string): Promise<TaskSnapshot>;

	resetStuckTasks(): Promise<MaintenanceResponse>;

	retryFailedTasks(): Promise<MaintenanceResponse>;

	/**
	 * Replace the organization's user credential with a permanent system-user credential.
	 */
	provisionSystemUser(organizationId: number, force?: boolean): Promise<ProvisioningResult>;

	getProvisioningState(organizationId: number): Promise<ProvisioningState>;

	/**
	 * Provision every organization still on a user credential.
	 */
	provisionAll(): Promise<BulkProvisioningResult>;

	/**
	 * Check the organization's credential, messaging accounts and phones against the provider.
	 */
	getAccountHealth(organizationId: number): Promise<AccountHealthReport>;
}

export function createOnboardingClient(baseUrl: string, requests: ClientRequests): OnboardingClient {
	const root = `${baseUrl}/api/onboarding`;

	return {
		enqueue,
		getTask,
		getActiveTasks,
		cancel,
		resetStuckTasks,
		retryFailedTasks,
		provisionSystemUser,
		getProvisioningState,
		provisionAll,
		getAccountHealth,
	};

	async function enqueue(request: EnqueueSignupRequest): Promise<EnqueueSignupResponse> {
		const response = await fetch(`${root}/tasks`, requests.createRequest("POST", request));
		await ensureOk(response, "Failed to enqueue signup");
		return (await response.json()) as EnqueueSignupResponse;
	}

	async function getTask(taskId: number): Promise<TaskSnapshot | undefined> {
		const response = await fetch(`${root}/tasks/${taskId}`, requests.createRequest("GET"));
		if (response.status === 404) {
			return;
		}
		await ensureOk(response, "Failed to get task");
		return (await response.json()) as TaskSnapshot;
	}

	async function getActiveTasks(organizationId: number): Promise<Array<TaskSnapshot>> {
		const response = await fetch(`${root}/organizations/${organizationId}/tasks`, requests.createRequest("GET"));
		await ensureOk(response, "Failed to list active tasks");
		return (await response.json()) as Array<TaskSnapshot>;
	}

	async function cancel(taskId: number, reason: string): Promise<TaskSnapshot> {
		const response = await fetch(`${root}/tasks/${taskId}/cancel`, requests.createRequest("POST", { reason }));
		await ensureOk(response, "Failed to cancel task");
		return (await response.json()) as TaskSnapshot;
	}

	async function resetStuckTasks(): Promise<MaintenanceResponse> {
		const response = await fetch(`${root}/maintenance/reset-stuck`, requests.createRequest("POST"));
		await ensureOk(response, "Failed to reset stuck tasks");
		return (await response.json()) as MaintenanceResponse;
	}

	async function retryFailedTasks(): Promise<MaintenanceResponse> {
		const response = await fetch(`${root}/maintenance/retry-failed`, requests.createRequest("POST"));
		await ensureOk(response, "Failed to retry failed tasks");
		return (await response.json()) as MaintenanceResponse;
	}

	async function provisionSystemUser(organizationId: number, force = false): Promise<ProvisioningResult> {
		const response = await fetch(
			`${root}/organizations/${organizationId}/provision-system-user`,
			requests.createRequest("POST", { force }),
		);
		await ensureOk(response, "Failed to provision system user");
		return (await response.json()) as ProvisioningResult;
	}

	async function getProvisioningState(organizationId: number): Promise<ProvisioningState> {
		const response = await fetch(
			`${root}/organizations/${organizationId}/provisioning-status`,
			requests.createRequest("GET"),
		);
		await ensureOk(response, "Failed to get provisioning status");
		return (await response.json()) as ProvisioningState;
	}

	async function provisionAll(): Promise<BulkProvisioningResult> {
		const response = await fetch(`${root}/maintenance/provision-all`, requests.createRequest("POST"));
		await ensureOk(response, "Failed to provision organizations");
		return (await response.json()) as BulkProvisioningResult;
	}

	async function getAccountHealth(organizationId: number): Promise<AccountHealthReport> {
		const response = await fetch(`${root}/organizations/${organizationId}/health`, requests.createRequest("GET"));
		await ensureOk(response, "Failed to check account health");
		return (await response.json()) as AccountHealthReport;
	}

	async function ensureOk(response: Response, message: string): Promise<void> {
		if (!response.ok) {
			throw new Error(`${message}: ${await readError(response)}`);
		}
	}
}

async function readError(response: Response): Promise<string> {
	try {
		const body = (await response.json()) as { error?: string };
		return body.error ?? `HTTP ${response.status}`;
	} catch {
		return `HTTP ${response.status}`;
	}
}
