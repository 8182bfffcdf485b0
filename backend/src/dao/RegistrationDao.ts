import { defineRegistrations, type NewRegistration, type Registration } from "../model/Registration";
import type { RegistrationStatus } from "onboarding-common";
import { literal, type Sequelize, type Transaction } from "sequelize";

/**
 * Phone metadata reported by the provider during phone sync.
 */
export interface SyncedPhone {
	externalId: string;
	ownerId: number;
	displayPhoneNumber: string | null;
	verifiedName: string | null;
	/**
	 * Status to insert a missing record with. Undefined leaves a missing record
	 * to the registration saga.
	 */
	status: RegistrationStatus | undefined;
}

export type SyncOutcome = "created" | "updated" | "skipped";

/**
 * Data Access Object for phone registrations.
 */
export interface RegistrationDao {
	findByExternalId(externalId: string, transaction?: Transaction): Promise<Registration | undefined>;

	/**
	 * Inserts a PENDING registration. Rejects with a UniqueConstraintError when the external id exists.
	 */
	createPending(
		registration: Omit<NewRegistration, "status">,
		transaction?: Transaction,
	): Promise<Registration>;

	countByOwner(ownerId: number, transaction?: Transaction): Promise<number>;

	listByOwner(ownerId: number): Promise<Array<Registration>>;

	/**
	 * REGISTRATION_FAILED -> PENDING.
	 */
	resetFailedToPending(externalId: string): Promise<boolean>;

	/**
	 * PENDING -> ACTIVE. Clears the last error and counts the attempt.
	 */
	markActive(externalId: string): Promise<boolean>;

	/**
	 * PENDING -> REGISTRATION_FAILED. Counts the attempt.
	 */
	markFailed(externalId: string, error: string): Promise<boolean>;

	/**
	 * Refreshes the metadata of an existing record, or inserts one when the provider
	 * reports a definite status. Never changes the status of an existing record.
	 */
	syncPhone(phone: SyncedPhone): Promise<SyncOutcome>;
}

export function createRegistrationDao(sequelize: Sequelize): RegistrationDao {
	const Registrations = defineRegistrations(sequelize);

	return {
		findByExternalId,
		createPending,
		countByOwner,
		listByOwner,
		resetFailedToPending,
		markActive,
		markFailed,
		syncPhone,
	};

	async function findByExternalId(externalId: string, transaction?: Transaction): Promise<Registration | undefined> {
		const registration = await Registrations.findOne({ where: { externalId }, transaction: transaction ?? null });
		return registration ? registration.get({ plain: true }) : undefined;
	}

	async function createPending(
		registration: Omit<NewRegistration, "status">,
		transaction?: Transaction,
	): Promise<Registration> {
		const created = await Registrations.create(
			{ ...registration, status: "PENDING" },
			{ transaction: transaction ?? null },
		);
		return created.get({ plain: true });
	}

	function countByOwner(ownerId: number, transaction?: Transaction): Promise<number> {
		return Registrations.count({ where: { ownerId }, transaction: transaction ?? null });
	}

	async function listByOwner(ownerId: number): Promise<Array<Registration>> {
		const registrations = await Registrations.findAll({ where: { ownerId }, order: [["id", "ASC"]] });
		return registrations.map(registration => registration.get({ plain: true }));
	}

	async function resetFailedToPending(externalId: string): Promise<boolean> {
		const [affected] = await Registrations.update(
			{ status: "PENDING" },
			{ where: { externalId, status: "REGISTRATION_FAILED" } },
		);
		return affected === 1;
	}

	async function markActive(externalId: string): Promise<boolean> {
		const [affected] = await Registrations.update(
			{ status: "ACTIVE", lastError: null, attempts: literal("attempts + 1") },
			{ where: { externalId, status: "PENDING" } },
		);
		return affected === 1;
	}

	async function markFailed(externalId: string, error: string): Promise<boolean> {
		const [affected] = await Registrations.update(
			{ status: "REGISTRATION_FAILED", lastError: error, attempts: literal("attempts + 1") },
			{ where: { externalId, status: "PENDING" } },
		);
		return affected === 1;
	}

	async function syncPhone(phone: SyncedPhone): Promise<SyncOutcome> {
		const { externalId, ownerId, displayPhoneNumber, verifiedName, status } = phone;
		const [affected] = await Registrations.update({ displayPhoneNumber, verifiedName }, { where: { externalId } });
		if (affected > 0) {
			return "updated";
		}
		if (!status) {
			return "skipped";
		}
		await Registrations.create({ externalId, ownerId, displayPhoneNumber, verifiedName, status });
		return "created";
	}
}
