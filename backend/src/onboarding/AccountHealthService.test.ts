import { mockMessagingAccount, mockMessagingAccountDao } from "../dao/MessagingAccountDao.mock";
import { mockOAuthAccount, mockOAuthAccountDao } from "../dao/OAuthAccountDao.mock";
import type { OAuthAccountDao } from "../dao/OAuthAccountDao";
import { mockRegistration, mockRegistrationDao } from "../dao/RegistrationDao.mock";
import type { ProviderClient } from "../provider/ProviderClient";
import { mockProviderClient } from "../provider/ProviderClient.mock";
import {
	type AccountHealthService,
	CredentialNotFoundError,
	createAccountHealthService,
	interpretPhoneStatus,
} from "./AccountHealthService";
import { createTokenCipher } from "onboarding-common/server";
import { beforeEach, describe, expect, it, vi } from "vitest";

const cipher = createTokenCipher(Buffer.alloc(32, 5).toString("base64"));
const now = new Date("2026-06-01T00:00:00.000Z");
const nowSeconds = now.getTime() / 1000;
const DAY = 86_400;

function debugToken(expiresAt: number, scopes = ["business_management"], isValid = true) {
	return vi.fn().mockResolvedValue({ ok: true, data: { isValid, expiresAt, scopes } });
}

describe("AccountHealthService", () => {
	let oauthAccountDao: OAuthAccountDao;
	let providerClient: ProviderClient;

	function createService(): AccountHealthService {
		return createAccountHealthService(
			{
				oauthAccountDao,
				messagingAccountDao: mockMessagingAccountDao({
					listByOrganization: vi.fn().mockResolvedValue([mockMessagingAccount()]),
				}),
				registrationDao: mockRegistrationDao({ listByOwner: vi.fn().mockResolvedValue([mockRegistration()]) }),
				providerClient,
				cipher,
			},
			{ requiredScopes: ["business_management"], expiryWarnDays: 7, now: () => now },
		);
	}

	beforeEach(() => {
		oauthAccountDao = mockOAuthAccountDao({
			findByOrganization: vi.fn().mockResolvedValue(
				mockOAuthAccount({
					encryptedAccessToken: cipher.encrypt("long-token"),
					tokenType: "SYSTEM_USER",
					systemUserId: "su-1",
				}),
			),
		});
		providerClient = mockProviderClient({ debugToken: debugToken(0) });
	});

	it("should report a healthy integration", async () => {
		const report = await createService().checkHealth(42);

		expect(report).toEqual({
			organizationId: 42,
			overallStatus: "HEALTHY",
			summary: "All checks passed. 1 phone number connected.",
			checkedAt: "2026-06-01T00:00:00.000Z",
			token: {
				status: "OK",
				tokenType: "SYSTEM_USER",
				valid: true,
				grantedScopes: ["business_management"],
				detail: "Credential never expires.",
			},
			accounts: [{ accountId: "waba-1", localStatus: "ACTIVE", status: "OK", detail: "Review status not available." }],
			phones: [
				{
					phoneNumberId: "phone-1",
					displayPhoneNumber: "+1 555 0100",
					verifiedName: "Acme",
					providerStatus: "CONNECTED",
					qualityRating: "GREEN",
					profileExists: true,
					status: "OK",
					detail: "Phone is connected. Quality GREEN.",
				},
			],
		});
		expect(providerClient.debugToken).toHaveBeenCalledWith("long-token");
		expect(providerClient.getAccount).toHaveBeenCalledWith("waba-1", "long-token");
		expect(providerClient.getPhoneNumber).toHaveBeenCalledWith("phone-1", "long-token");
		expect(providerClient.getBusinessProfile).toHaveBeenCalledWith("phone-1", "long-token");
	});

	it("should reject an organization without a credential", async () => {
		oauthAccountDao = mockOAuthAccountDao();

		await expect(createService().checkHealth(42)).rejects.toBeInstanceOf(CredentialNotFoundError);
	});

	describe("token", () => {
		it("should count the days left on an expiring credential", async () => {
			providerClient = mockProviderClient({ debugToken: debugToken(nowSeconds + 30 * DAY) });

			const report = await createService().checkHealth(42);

			expect(report.overallStatus).toBe("HEALTHY");
			expect(report.token).toMatchObject({
				status: "OK",
				daysUntilExpiry: 30,
				detail: "Credential valid for 30 more day(s).",
			});
		});

		it("should degrade on a credential expiring within the warning window", async () => {
			providerClient = mockProviderClient({ debugToken: debugToken(nowSeconds + 3 * DAY) });

			const report = await createService().checkHealth(42);

			expect(report.overallStatus).toBe("DEGRADED");
			expect(report.summary).toBe("Integration is running with issues. Review the token, account and phone checks.");
			expect(report.token).toMatchObject({
				status: "EXPIRING_SOON",
				daysUntilExpiry: 3,
				detail: "Credential expires in 3 day(s). Provision a system user for a permanent credential.",
			});
		});

		it("should be unhealthy with an expired credential", async () => {
			providerClient = mockProviderClient({ debugToken: debugToken(nowSeconds - DAY) });

			const report = await createService().checkHealth(42);

			expect(report.overallStatus).toBe("UNHEALTHY");
			expect(report.summary).toBe("Credential is invalid. Messaging is broken until the organization signs up again.");
			expect(report.token).toMatchObject({ status: "EXPIRED", daysUntilExpiry: -1 });
		});

		it("should be unhealthy with a revoked credential", async () => {
			providerClient = mockProviderClient({ debugToken: debugToken(0, [], false) });

			const report = await createService().checkHealth(42);

			expect(report.overallStatus).toBe("UNHEALTHY");
			expect(report.token).toEqual({
				status: "INVALID",
				tokenType: "SYSTEM_USER",
				valid: false,
				grantedScopes: [],
				detail: "Credential is invalid or revoked. The organization must sign up again.",
			});
		});

		it("should degrade on missing scopes", async () => {
			providerClient = mockProviderClient({ debugToken: debugToken(0, ["whatsapp_business_messaging"]) });

			const report = await createService().checkHealth(42);

			expect(report.overallStatus).toBe("DEGRADED");
			expect(report.token).toMatchObject({
				status: "MISSING_SCOPES",
				missingScopes: ["business_management"],
				detail: "Credential is missing scopes: business_management. The organization must authorize again.",
			});
		});

		it("should degrade when the token debugger fails", async () => {
			providerClient = mockProviderClient({
				debugToken: vi.fn().mockResolvedValue({ ok: false, httpStatus: 500, error: { code: 2, message: "Unavailable" } }),
			});

			const report = await createService().checkHealth(42);

			expect(report.overallStatus).toBe("DEGRADED");
			expect(report.token).toEqual({
				status: "CHECK_FAILED",
				tokenType: "SYSTEM_USER",
				detail: "Token debugger error: Unavailable",
			});
			expect(report.phones).toHaveLength(1);
		});

		it("should stop at a credential that cannot be decrypted", async () => {
			oauthAccountDao = mockOAuthAccountDao({
				findByOrganization: vi
					.fn()
					.mockResolvedValue(mockOAuthAccount({ encryptedAccessToken: "enc:v1:not-a-valid-envelope" })),
			});

			const report = await createService().checkHealth(42);

			expect(report).toMatchObject({
				overallStatus: "UNHEALTHY",
				summary: "The stored credential cannot be decrypted. The organization must sign up again.",
				token: { status: "INVALID", tokenType: "USER_TOKEN" },
				accounts: [],
				phones: [],
			});
			expect(providerClient.debugToken).not.toHaveBeenCalled();
		});
	});

	describe("accounts", () => {
		it.each([
			["APPROVED", "OK", "HEALTHY"],
			["pending", "REVIEW_PENDING", "HEALTHY"],
			["REJECTED", "REJECTED", "DEGRADED"],
		])("should map review status %s to %s", async (reviewStatus, status, overallStatus) => {
			providerClient = mockProviderClient({
				debugToken: debugToken(0),
				getAccount: vi.fn().mockResolvedValue({ ok: true, data: { id: "waba-1", reviewStatus } }),
			});

			const report = await createService().checkHealth(42);

			expect(report.accounts[0]).toMatchObject({ reviewStatus: reviewStatus.toUpperCase(), status });
			expect(report.overallStatus).toBe(overallStatus);
		});

		it("should keep checking phones when the account lookup fails", async () => {
			providerClient = mockProviderClient({
				debugToken: debugToken(0),
				getAccount: vi.fn().mockRejectedValue(new Error("socket hang up")),
			});

			const report = await createService().checkHealth(42);

			expect(report.accounts[0]).toMatchObject({ status: "CHECK_FAILED", detail: "Could not reach the provider." });
			expect(report.phones[0]).toMatchObject({ status: "OK" });
			expect(report.overallStatus).toBe("DEGRADED");
		});
	});

	describe("phones", () => {
		it("should warn when the business profile is missing", async () => {
			providerClient = mockProviderClient({
				debugToken: debugToken(0),
				getBusinessProfile: vi
					.fn()
					.mockResolvedValue({ ok: false, httpStatus: 403, error: { code: 200, message: "Permissions error" } }),
			});

			const report = await createService().checkHealth(42);

			expect(report.phones[0]).toMatchObject({
				profileExists: false,
				status: "QUALITY_WARNING",
				detail: "Phone is connected. Quality GREEN. Business profile not found, permissions may be revoked.",
			});
			expect(report.overallStatus).toBe("DEGRADED");
		});

		it("should report a failed phone lookup and still check the profile", async () => {
			providerClient = mockProviderClient({
				debugToken: debugToken(0),
				getPhoneNumber: vi
					.fn()
					.mockResolvedValue({ ok: false, httpStatus: 400, error: { code: 100, message: "Unknown phone" } }),
			});

			const report = await createService().checkHealth(42);

			expect(report.phones[0]).toEqual({
				phoneNumberId: "phone-1",
				displayPhoneNumber: "+1 555 0100",
				verifiedName: "Acme",
				profileExists: true,
				status: "CHECK_FAILED",
				detail: "Provider error: Unknown phone",
			});
		});

		it("should leave the profile unknown when its lookup does not reach the provider", async () => {
			providerClient = mockProviderClient({
				debugToken: debugToken(0),
				getBusinessProfile: vi.fn().mockRejectedValue(new Error("connect ETIMEDOUT")),
			});

			const report = await createService().checkHealth(42);

			expect(report.phones[0].profileExists).toBeUndefined();
			expect(report.phones[0].status).toBe("OK");
		});
	});

	it.each([
		["CONNECTED", "GREEN", "OK"],
		["CONNECTED", "YELLOW", "QUALITY_WARNING"],
		["CONNECTED", "RED", "QUALITY_WARNING"],
		["DISCONNECTED", "GREEN", "DISCONNECTED"],
		["FLAGGED", "GREEN", "QUALITY_WARNING"],
		["RESTRICTED", "GREEN", "RESTRICTED"],
		["PENDING", "UNKNOWN", "OK"],
	])("should interpret phone status %s with quality %s as %s", (providerStatus, qualityRating, status) => {
		expect(interpretPhoneStatus(providerStatus, qualityRating).status).toBe(status);
	});
});
