import type { OAuthAccount } from "../model/OAuthAccount";
import type { OAuthAccountDao } from "./OAuthAccountDao";
import { vi } from "vitest";

export function mockOAuthAccount(partial?: Partial<OAuthAccount>): OAuthAccount {
	return {
		id: 3,
		organizationId: 42,
		encryptedAccessToken: "enc:v1:token",
		expiresAt: null,
		tokenType: "USER_TOKEN",
		systemUserId: null,
		providerUserId: null,
		createdAt: new Date("2026-01-01T00:00:00.000Z"),
		updatedAt: new Date("2026-01-01T00:00:00.000Z"),
		...partial,
	};
}

export function mockOAuthAccountDao(partial?: Partial<OAuthAccountDao>): OAuthAccountDao {
	return {
		findById: vi.fn().mockResolvedValue(undefined),
		findByOrganization: vi.fn().mockResolvedValue(undefined),
		upsertForOrganization: vi.fn().mockResolvedValue(mockOAuthAccount()),
		replaceCredential: vi.fn().mockResolvedValue(true),
		listAll: vi.fn().mockResolvedValue([]),
		listByTokenType: vi.fn().mockResolvedValue([]),
		...partial,
	};
}
