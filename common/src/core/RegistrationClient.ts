import type { RegisterResourceRequest, RegistrationOutcome } from "../onboarding/types";
import type { ClientRequests } from "./Client";

export interface RegistrationClient {
	/**
	 * Run the two-phase registration for one resource. A resource that is already ACTIVE
	 * comes back without a provider call.
	 */
	register(request: RegisterResourceRequest): Promise<RegistrationOutcome>;
}

export function createRegistrationClient(baseUrl: string, requests: ClientRequests): RegistrationClient {
	return { register };

	async function register(request: RegisterResourceRequest): Promise<RegistrationOutcome> {
		const response = await fetch(`${baseUrl}/api/registrations`, requests.createRequest("POST", request));
		if (!response.ok) {
			const data = (await response.json()) as { error?: string };
			throw new Error(`Failed to register resource: ${data.error ?? response.status}`);
		}
		return response.json() as Promise<RegistrationOutcome>;
	}
}
