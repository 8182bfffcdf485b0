import type { MessagingAccount } from "../model/MessagingAccount";
import type { MessagingAccountDao } from "./MessagingAccountDao";
import { vi } from "vitest";

export function mockMessagingAccount(partial?: Partial<MessagingAccount>): MessagingAccount {
	return {
		id: 7,
		organizationId: 42,
		oauthAccountId: 3,
		externalAccountId: "waba-1",
		businessId: "biz-1",
		name: null,
		status: "ACTIVE",
		createdAt: new Date("2026-01-01T00:00:00.000Z"),
		updatedAt: new Date("2026-01-01T00:00:00.000Z"),
		...partial,
	};
}

export function mockMessagingAccountDao(partial?: Partial<MessagingAccountDao>): MessagingAccountDao {
	return {
		findById: vi.fn().mockResolvedValue(undefined),
		findByExternalAccountId: vi.fn().mockResolvedValue(undefined),
		create: vi.fn().mockResolvedValue(mockMessagingAccount()),
		listByOrganization: vi.fn().mockResolvedValue([]),
		...partial,
	};
}
