import type { MessagingAccountDao } from "../dao/MessagingAccountDao";
import type { OAuthAccountDao } from "../dao/OAuthAccountDao";
import type { MessagingAccount } from "../model/MessagingAccount";
import { type ProviderClient, requireSuccess } from "../provider/ProviderClient";
import type { RetryExecutor } from "../provider/RetryExecutor";
import { getLog } from "../util/Logger";
import { ProvisioningError } from "./OnboardingErrors";
import { createHmac } from "node:crypto";
import type { BulkProvisioningResult, ProvisioningResult, ProvisioningState } from "onboarding-common";
import type { TokenCipher } from "onboarding-common/server";

const log = getLog(import.meta);

export interface SystemUserProvisionerOptions {
	appSecret: string;
	systemUserName: string;
	systemUserRole: string;
	/** Scopes requested for the permanent token. */
	scopes: Array<string>;
}

export interface SystemUserProvisionerDeps {
	oauthAccountDao: OAuthAccountDao;
	messagingAccountDao: MessagingAccountDao;
	providerClient: ProviderClient;
	retryExecutor: RetryExecutor;
	cipher: TokenCipher;
}

/**
 * Replaces an organization's user token with the permanent token of a system user
 * created in the organization's business.
 */
export interface SystemUserProvisioner {
	/**
	 * @param force provision again even when the organization already has a system-user credential
	 * @throws ProvisioningError
	 */
	provisionForOrganization(organizationId: number, force?: boolean): Promise<ProvisioningResult>;

	/**
	 * Provisions an organization that just signed up. Returns false instead of throwing.
	 */
	tryProvisionAfterSignup(organizationId: number): Promise<boolean>;

	getStatus(organizationId: number): Promise<ProvisioningState>;

	/**
	 * Provisions every organization still on a user credential, one at a time. A failed organization does not stop the rest.
	 */
	provisionAll(): Promise<BulkProvisioningResult>;
}

/**
 * HMAC-SHA256 of the access token keyed by the app secret, hex encoded.
 */
export function computeAppSecretProof(accessToken: string, appSecret: string): string {
	return createHmac("sha256", appSecret).update(accessToken).digest("hex");
}

export function createSystemUserProvisioner(
	deps: SystemUserProvisionerDeps,
	options: SystemUserProvisionerOptions,
): SystemUserProvisioner {
	const { oauthAccountDao, messagingAccountDao, providerClient, retryExecutor, cipher } = deps;

	return { provisionForOrganization, tryProvisionAfterSignup, getStatus, provisionAll };

	async function provisionForOrganization(organizationId: number, force = false): Promise<ProvisioningResult> {
		const credential = await oauthAccountDao.findByOrganization(organizationId);
		if (!credential) {
			throw new ProvisioningError(
				organizationId,
				`No credential found for organization ${organizationId}. Complete the signup first.`,
			);
		}
		if (!force && credential.tokenType === "SYSTEM_USER" && credential.systemUserId) {
			log.info("Organization %d already has a system user, skipping", organizationId);
			return {
				organizationId,
				status: "ALREADY_PROVISIONED",
				systemUserId: credential.systemUserId,
				assignedAccounts: 0,
			};
		}

		const accounts = await messagingAccountDao.listByOrganization(organizationId);
		if (accounts.length === 0) {
			throw new ProvisioningError(organizationId, `No messaging accounts found for organization ${organizationId}`);
		}

		const userToken = cipher.decrypt(credential.encryptedAccessToken);
		const businessId = await resolveBusinessId(organizationId, accounts[0], userToken);

		const systemUser = await retryExecutor.execute(
			"createSystemUser",
			() => providerClient.createSystemUser(businessId, options.systemUserName, options.systemUserRole, userToken),
			{ resourceId: businessId },
		);
		log.info("System user %s ready in business %s", systemUser.id, businessId);

		let assignedAccounts = 0;
		for (const account of accounts) {
			try {
				await retryExecutor.execute(
					"assignAccountToSystemUser",
					async () =>
						requireSuccess(
							await providerClient.assignAccountToSystemUser(account.externalAccountId, systemUser.id, userToken),
						),
					{ resourceId: account.externalAccountId },
				);
				assignedAccounts++;
			} catch (error) {
				log.error(error, "Failed to assign account %s to system user %s", account.externalAccountId, systemUser.id);
			}
		}
		if (assignedAccounts === 0) {
			throw new ProvisioningError(
				organizationId,
				`Failed to assign any messaging account to system user ${systemUser.id}. The signup user needs admin rights in business ${businessId}.`,
			);
		}

		const grant = await retryExecutor.execute(
			"generateSystemUserToken",
			() =>
				providerClient.generateSystemUserToken(
					systemUser.id,
					computeAppSecretProof(userToken, options.appSecret),
					options.scopes.join(","),
					userToken,
				),
			{ resourceId: systemUser.id },
		);

		const replaced = await oauthAccountDao.replaceCredential(credential.id, {
			encryptedAccessToken: cipher.encrypt(grant.accessToken),
			expiresAt: null,
			tokenType: "SYSTEM_USER",
			systemUserId: systemUser.id,
		});
		if (!replaced) {
			throw new ProvisioningError(organizationId, `Credential of organization ${organizationId} disappeared`);
		}
		log.info(
			"Organization %d provisioned with system user %s, %d/%d accounts assigned",
			organizationId,
			systemUser.id,
			assignedAccounts,
			accounts.length,
		);

		return { organizationId, status: "PROVISIONED", systemUserId: systemUser.id, assignedAccounts };
	}

	async function tryProvisionAfterSignup(organizationId: number): Promise<boolean> {
		try {
			await provisionForOrganization(organizationId);
			return true;
		} catch (error) {
			log.warn(
				error,
				"System user provisioning after signup failed for organization %d. Retry through the provisioning endpoint.",
				organizationId,
			);
			return false;
		}
	}

	async function getStatus(organizationId: number): Promise<ProvisioningState> {
		const credential = await oauthAccountDao.findByOrganization(organizationId);
		if (!credential) {
			return {
				organizationId,
				provisioned: false,
				message: `No credential found for organization ${organizationId}. Complete the signup first.`,
			};
		}
		if (credential.tokenType === "SYSTEM_USER" && credential.systemUserId) {
			return {
				organizationId,
				provisioned: true,
				tokenType: credential.tokenType,
				systemUserId: credential.systemUserId,
				message: "Organization has a permanent system-user credential. No action needed.",
			};
		}
		return {
			organizationId,
			provisioned: false,
			tokenType: credential.tokenType,
			message: `Organization ${organizationId} uses a user credential that expires. Provision a system user to replace it.`,
		};
	}

	async function provisionAll(): Promise<BulkProvisioningResult> {
		const pending = await oauthAccountDao.listByTokenType("USER_TOKEN");
		log.info("Provisioning %d organizations on user credentials", pending.length);

		let succeeded = 0;
		let failed = 0;
		for (const credential of pending) {
			try {
				await provisionForOrganization(credential.organizationId);
				succeeded++;
			} catch (error) {
				failed++;
				log.error(error, "Provisioning of organization %d failed", credential.organizationId);
			}
		}

		const message = `Bulk provisioning done: ${succeeded} succeeded, ${failed} failed out of ${pending.length} organizations.`;
		log.info(message);
		return { attempted: pending.length, succeeded, failed, message };
	}

	async function resolveBusinessId(
		organizationId: number,
		account: MessagingAccount,
		userToken: string,
	): Promise<string> {
		if (!account.businessId.startsWith("UNKNOWN-")) {
			return account.businessId;
		}
		try {
			const details = await retryExecutor.execute(
				"getAccount",
				() => providerClient.getAccount(account.externalAccountId, userToken),
				{ resourceId: account.externalAccountId },
			);
			if (details.businessId) {
				return details.businessId;
			}
		} catch (error) {
			log.warn(error, "Could not look up the business of account %s", account.externalAccountId);
		}
		throw new ProvisioningError(
			organizationId,
			`Could not determine the business of account ${account.externalAccountId}`,
		);
	}
}
