import type { MessagingAccountDao } from "../dao/MessagingAccountDao";
import type { OAuthAccountDao } from "../dao/OAuthAccountDao";
import type { RegistrationDao } from "../dao/RegistrationDao";
import type { Registration } from "../model/Registration";
import {
	type ProviderClient,
	type ProviderResponse,
	type ProviderSuccess,
	requireSuccess,
} from "../provider/ProviderClient";
import type { RetryExecutor } from "../provider/RetryExecutor";
import { getLog } from "../util/Logger";
import { OwnerNotFoundError, RegistrationRejectedError } from "./RegistrationErrors";
import type { RegisterResourceRequest, RegistrationOutcome } from "onboarding-common";
import type { TokenCipher } from "onboarding-common/server";
import { type Sequelize, UniqueConstraintError } from "sequelize";

const log = getLog(import.meta);

export interface RegistrationSagaDeps {
	sequelize: Sequelize;
	registrationDao: RegistrationDao;
	messagingAccountDao: MessagingAccountDao;
	oauthAccountDao: OAuthAccountDao;
	providerClient: ProviderClient;
	retryExecutor: RetryExecutor;
	cipher: TokenCipher;
	maxPhonesPerAccount: number;
	defaultPin: string;
}

/**
 * Registers phone numbers with the provider in three steps:
 * 1. store a PENDING record in its own transaction,
 * 2. call the provider outside any transaction,
 * 3. settle the record with a conditional update from PENDING.
 *
 * A crash between the steps leaves a PENDING record that the next call resumes.
 * The provider treats a repeated registration as "already registered", which counts as success.
 */
export interface RegistrationSaga {
	/**
	 * @throws RegistrationRejectedError for blocked or disabled phones and failed preconditions
	 * @throws OwnerNotFoundError
	 */
	register(request: RegisterResourceRequest): Promise<RegistrationOutcome>;

	/**
	 * Like register, but logs every error and returns undefined instead of throwing.
	 */
	registerBestEffort(request: RegisterResourceRequest): Promise<RegistrationOutcome | undefined>;
}

export function isAlreadyRegistered(message: string): boolean {
	return message.toLowerCase().includes("already registered");
}

export function createRegistrationSaga(deps: RegistrationSagaDeps): RegistrationSaga {
	const { sequelize, registrationDao, messagingAccountDao, oauthAccountDao, providerClient, retryExecutor, cipher } =
		deps;

	return { register, registerBestEffort };

	async function register(request: RegisterResourceRequest): Promise<RegistrationOutcome> {
		const existing = await registrationDao.findByExternalId(request.externalId);
		if (!existing) {
			const inserted = await insertPending(request);
			if (!inserted) {
				// Lost the insert race, resume whatever the winner stored.
				const winner = await registrationDao.findByExternalId(request.externalId);
				if (!winner) {
					throw new Error(`Registration ${request.externalId} vanished after a concurrent insert`);
				}
				return resume(winner, request);
			}
			return callAndSettle(request);
		}
		return resume(existing, request);
	}

	async function registerBestEffort(request: RegisterResourceRequest): Promise<RegistrationOutcome | undefined> {
		try {
			return await register(request);
		} catch (error) {
			log.warn(error, "Registration of %s skipped", request.externalId);
			return;
		}
	}

	async function resume(existing: Registration, request: RegisterResourceRequest): Promise<RegistrationOutcome> {
		if (existing.ownerId !== request.ownerId) {
			throw new RegistrationRejectedError(request.externalId, "phone belongs to another messaging account");
		}
		switch (existing.status) {
			case "ACTIVE":
				log.debug("Registration %s already ACTIVE", existing.externalId);
				return toOutcome(existing, false);
			case "BLOCKED":
			case "DISABLED":
				throw new RegistrationRejectedError(existing.externalId, `phone is ${existing.status}`);
			case "REGISTRATION_FAILED":
				if (await registrationDao.resetFailedToPending(existing.externalId)) {
					log.info("Registration %s reset to PENDING for another attempt", existing.externalId);
					return callAndSettle(request);
				}
				return resume(await reread(existing.externalId), request);
			case "PENDING":
				log.info("Resuming PENDING registration %s", existing.externalId);
				return callAndSettle(request);
		}
	}

	async function reread(externalId: string): Promise<Registration> {
		const current = await registrationDao.findByExternalId(externalId);
		if (!current) {
			throw new Error(`Registration ${externalId} vanished during a concurrent update`);
		}
		log.debug("Registration %s moved to %s concurrently", externalId, current.status);
		return current;
	}

	/**
	 * Returns false when another caller inserted the same external id first.
	 */
	async function insertPending(request: RegisterResourceRequest): Promise<boolean> {
		try {
			await sequelize.transaction(async transaction => {
				const owner = await messagingAccountDao.findById(request.ownerId, transaction);
				if (!owner) {
					throw new OwnerNotFoundError(request.ownerId);
				}
				if (owner.status !== "ACTIVE") {
					throw new RegistrationRejectedError(request.externalId, `messaging account is ${owner.status}`);
				}
				const count = await registrationDao.countByOwner(request.ownerId, transaction);
				if (count >= deps.maxPhonesPerAccount) {
					throw new RegistrationRejectedError(
						request.externalId,
						`messaging account already has ${count} phone numbers (limit ${deps.maxPhonesPerAccount})`,
					);
				}
				await registrationDao.createPending(
					{ externalId: request.externalId, ownerId: request.ownerId },
					transaction,
				);
			});
			log.info("Registration %s stored as PENDING", request.externalId);
			return true;
		} catch (error) {
			if (error instanceof UniqueConstraintError) {
				return false;
			}
			throw error;
		}
	}

	async function callAndSettle(request: RegisterResourceRequest): Promise<RegistrationOutcome> {
		const failure = await callProvider(request);
		const settled =
			failure === undefined
				? await registrationDao.markActive(request.externalId)
				: await registrationDao.markFailed(request.externalId, failure);

		const current = await registrationDao.findByExternalId(request.externalId);
		if (!current) {
			throw new Error(`Registration ${request.externalId} vanished while registering`);
		}
		if (!settled) {
			log.info("Registration %s was settled by another caller as %s", request.externalId, current.status);
		}
		return toOutcome(current, true);
	}

	/**
	 * Returns the error message of a failed registration, undefined on success.
	 */
	async function callProvider(request: RegisterResourceRequest): Promise<string | undefined> {
		try {
			const accessToken = await loadAccessToken(request.ownerId);
			const pin = request.pin ?? deps.defaultPin;
			await retryExecutor.execute(
				"registerPhone",
				async () => {
					const response = await providerClient.registerPhone(request.externalId, pin, accessToken);
					return treatAlreadyRegisteredAsSuccess(response);
				},
				{ resourceId: request.externalId },
			);
			log.info("Phone %s registered", request.externalId);
			return;
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			log.warn("Phone %s registration failed: %s", request.externalId, message);
			return message;
		}
	}

	async function loadAccessToken(ownerId: number): Promise<string> {
		const owner = await messagingAccountDao.findById(ownerId);
		if (!owner) {
			throw new OwnerNotFoundError(ownerId);
		}
		const credential = await oauthAccountDao.findById(owner.oauthAccountId);
		if (!credential) {
			throw new Error(`No credential stored for messaging account ${ownerId}`);
		}
		return cipher.decrypt(credential.encryptedAccessToken);
	}
}

function treatAlreadyRegisteredAsSuccess(
	response: ProviderResponse<ProviderSuccess>,
): ProviderResponse<ProviderSuccess> {
	if (!response.ok && isAlreadyRegistered(response.error.message)) {
		log.info("Phone already registered with the provider");
		return { ok: true, data: { success: true } };
	}
	return requireSuccess(response);
}

function toOutcome(registration: Registration, externalCallMade: boolean): RegistrationOutcome {
	return {
		externalId: registration.externalId,
		ownerId: registration.ownerId,
		status: registration.status,
		externalCallMade,
		...(registration.lastError ? { lastError: registration.lastError } : {}),
	};
}
