import type { ProviderClient } from "./ProviderClient";
import { vi } from "vitest";

/**
 * A provider on which every call succeeds with plausible data.
 */
export function mockProviderClient(partial?: Partial<ProviderClient>): ProviderClient {
	return {
		exchangeCode: vi.fn().mockResolvedValue({ ok: true, data: { accessToken: "short-token", expiresIn: 3600 } }),
		extendToken: vi.fn().mockResolvedValue({ ok: true, data: { accessToken: "long-token", expiresIn: 5184000 } }),
		debugToken: vi.fn().mockResolvedValue({
			ok: true,
			data: { isValid: true, expiresAt: 0, scopes: [], userId: "user-1" },
		}),
		listGrantedScopes: vi.fn().mockResolvedValue({
			ok: true,
			data: ["whatsapp_business_management", "whatsapp_business_messaging", "business_management"],
		}),
		getAccount: vi.fn().mockResolvedValue({ ok: true, data: { id: "waba-1", name: "Acme", businessId: "biz-1" } }),
		listOwnedAccounts: vi.fn().mockResolvedValue({
			ok: true,
			data: [{ id: "waba-1", name: "Acme", businessId: "biz-1" }],
		}),
		listPhoneNumbers: vi.fn().mockResolvedValue({
			ok: true,
			data: [{ id: "phone-1", displayPhoneNumber: "+1 555 0100", verifiedName: "Acme", status: "PENDING" }],
		}),
		getPhoneNumber: vi.fn().mockResolvedValue({
			ok: true,
			data: {
				id: "phone-1",
				displayPhoneNumber: "+1 555 0100",
				verifiedName: "Acme",
				status: "CONNECTED",
				qualityRating: "GREEN",
			},
		}),
		getBusinessProfile: vi.fn().mockResolvedValue({ ok: true, data: { about: "Hello", vertical: "RETAIL" } }),
		subscribeApp: vi.fn().mockResolvedValue({ ok: true, data: { success: true } }),
		listSubscribedApps: vi.fn().mockResolvedValue({ ok: true, data: ["app-1"] }),
		registerPhone: vi.fn().mockResolvedValue({ ok: true, data: { success: true } }),
		syncBusinessAppData: vi.fn().mockResolvedValue({ ok: true, data: { success: true } }),
		createSystemUser: vi.fn().mockResolvedValue({ ok: true, data: { id: "su-1" } }),
		assignAccountToSystemUser: vi.fn().mockResolvedValue({ ok: true, data: { success: true } }),
		generateSystemUserToken: vi.fn().mockResolvedValue({ ok: true, data: { accessToken: "system-token" } }),
		...partial,
	};
}
