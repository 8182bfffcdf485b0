import type { Registration } from "../model/Registration";
import type { RegistrationDao } from "./RegistrationDao";
import { vi } from "vitest";

export function mockRegistration(partial?: Partial<Registration>): Registration {
	return {
		id: 11,
		externalId: "phone-1",
		ownerId: 7,
		displayPhoneNumber: "+1 555 0100",
		verifiedName: "Acme",
		status: "ACTIVE",
		lastError: null,
		attempts: 1,
		createdAt: new Date("2026-01-01T00:00:00.000Z"),
		updatedAt: new Date("2026-01-01T00:00:00.000Z"),
		...partial,
	};
}

export function mockRegistrationDao(partial?: Partial<RegistrationDao>): RegistrationDao {
	return {
		findByExternalId: vi.fn().mockResolvedValue(undefined),
		createPending: vi.fn().mockResolvedValue(mockRegistration({ status: "PENDING", attempts: 0 })),
		countByOwner: vi.fn().mockResolvedValue(0),
		listByOwner: vi.fn().mockResolvedValue([]),
		resetFailedToPending: vi.fn().mockResolvedValue(true),
		markActive: vi.fn().mockResolvedValue(true),
		markFailed: vi.fn().mockResolvedValue(true),
		syncPhone: vi.fn().mockResolvedValue("skipped"),
		...partial,
	};
}
