import { createOnboardingClient, type OnboardingClient } from "../onboarding/OnboardingClient";
import { memoized } from "../util/ObjectUtils";
import { createRegistrationClient, type RegistrationClient } from "./RegistrationClient";

export interface Client {
	status(): Promise<string>;
	onboarding(): OnboardingClient;
	registrations(): RegistrationClient;
}

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

/**
 * Builds the fetch options shared by every sub-client.
 */
export interface ClientRequests {
	createRequest(method: HttpMethod, body?: unknown, additional?: Partial<RequestInit>): RequestInit;
}

export function createClient(baseUrl = ""): Client {
	const requests: ClientRequests = { createRequest };
	return {
		status,
		onboarding: memoized(() => createOnboardingClient(baseUrl, requests)),
		registrations: memoized(() => createRegistrationClient(baseUrl, requests)),
	};

	async function status(): Promise<string> {
		try {
			const response = await fetch(`${baseUrl}/api/status/check`, createRequest("GET"));
			return response.text();
		} catch {
			return "ERROR";
		}
	}

	function createRequest(method: HttpMethod, body?: unknown, additional?: Partial<RequestInit>): RequestInit {
		const headers: Record<string, string> = {};
		if (body) {
			headers["Content-Type"] = "application/json";
		}

		return {
			method,
			headers,
			body: body ? JSON.stringify(body) : null,
			...additional,
		};
	}
}
