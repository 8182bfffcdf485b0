import type { MessagingAccountDao } from "../dao/MessagingAccountDao";
import type { OAuthAccountDao } from "../dao/OAuthAccountDao";
import type { RegistrationDao } from "../dao/RegistrationDao";
import type { MessagingAccount } from "../model/MessagingAccount";
import type { OAuthAccount } from "../model/OAuthAccount";
import type { Registration } from "../model/Registration";
import type { ProviderClient } from "../provider/ProviderClient";
import { getLog } from "../util/Logger";
import type { AccountCheck, AccountHealthReport, OverallHealth, PhoneCheck, TokenCheck } from "onboarding-common";
import type { TokenCipher } from "onboarding-common/server";

const log = getLog(import.meta);

const SECONDS_PER_DAY = 86_400;

export interface AccountHealthServiceDeps {
	oauthAccountDao: OAuthAccountDao;
	messagingAccountDao: MessagingAccountDao;
	registrationDao: RegistrationDao;
	providerClient: ProviderClient;
	cipher: TokenCipher;
}

export interface AccountHealthServiceOptions {
	requiredScopes: Array<string>;
	expiryWarnDays: number;
	now?: () => Date;
}

/**
 * The organization never completed a signup.
 */
export class CredentialNotFoundError extends Error {
	constructor(readonly organizationId: number) {
		super(`No credential found for organization ${organizationId}. Complete the signup first.`);
		this.name = "CredentialNotFoundError";
	}
}

/**
 * Read-only diagnostic of one organization's integration: its credential, messaging accounts, phones and
 * business profiles, each checked against the provider. A failing check never stops the others.
 */
export interface AccountHealthService {
	/**
	 * @throws CredentialNotFoundError
	 */
	checkHealth(organizationId: number): Promise<AccountHealthReport>;
}

export function createAccountHealthService(
	deps: AccountHealthServiceDeps,
	options: AccountHealthServiceOptions,
): AccountHealthService {
	const { oauthAccountDao, messagingAccountDao, registrationDao, providerClient, cipher } = deps;
	const now = options.now ?? (() => new Date());

	return { checkHealth };

	async function checkHealth(organizationId: number): Promise<AccountHealthReport> {
		log.info("Health check of organization %d", organizationId);
		const checkedAt = now().toISOString();
		const credential = await oauthAccountDao.findByOrganization(organizationId);
		if (!credential) {
			throw new CredentialNotFoundError(organizationId);
		}

		let accessToken: string;
		try {
			accessToken = cipher.decrypt(credential.encryptedAccessToken);
		} catch (error) {
			log.error(error, "Health check: credential of organization %d cannot be decrypted", organizationId);
			return {
				organizationId,
				overallStatus: "UNHEALTHY",
				summary: "The stored credential cannot be decrypted. The organization must sign up again.",
				checkedAt,
				token: { status: "INVALID", tokenType: credential.tokenType, detail: "Credential decryption failed." },
				accounts: [],
				phones: [],
			};
		}

		const token = await checkToken(credential, accessToken);
		const accounts = await messagingAccountDao.listByOrganization(organizationId);
		const accountChecks: Array<AccountCheck> = [];
		const phoneChecks: Array<PhoneCheck> = [];
		for (const account of accounts) {
			accountChecks.push(await checkAccount(account, accessToken));
			for (const phone of await registrationDao.listByOwner(account.id)) {
				phoneChecks.push(await checkPhone(phone, accessToken));
			}
		}

		const overallStatus = deriveOverallStatus(token, accountChecks, phoneChecks);
		log.info("Health check of organization %d: %s", organizationId, overallStatus);
		return {
			organizationId,
			overallStatus,
			summary: buildHealthSummary(overallStatus, phoneChecks.length),
			checkedAt,
			token,
			accounts: accountChecks,
			phones: phoneChecks,
		};
	}

	async function checkToken(credential: OAuthAccount, accessToken: string): Promise<TokenCheck> {
		const tokenType = credential.tokenType;
		let response: Awaited<ReturnType<ProviderClient["debugToken"]>>;
		try {
			response = await providerClient.debugToken(accessToken);
		} catch (error) {
			log.warn(error, "Health check: token debugger unreachable");
			return { status: "CHECK_FAILED", tokenType, detail: "Could not reach the token debugger." };
		}
		if (!response.ok) {
			return { status: "CHECK_FAILED", tokenType, detail: `Token debugger error: ${response.error.message}` };
		}

		const info = response.data;
		if (!info.isValid) {
			return {
				status: "INVALID",
				tokenType,
				valid: false,
				grantedScopes: info.scopes,
				detail: "Credential is invalid or revoked. The organization must sign up again.",
			};
		}

		const missingScopes = options.requiredScopes.filter(scope => !info.scopes.includes(scope));
		const check: TokenCheck = {
			status: "OK",
			tokenType,
			valid: true,
			grantedScopes: info.scopes,
			...(missingScopes.length > 0 ? { missingScopes } : {}),
			detail: "Credential never expires.",
		};

		// 0 never expires
		if (info.expiresAt > 0) {
			const secondsLeft = info.expiresAt - Math.floor(now().getTime() / 1000);
			const daysUntilExpiry = Math.floor(secondsLeft / SECONDS_PER_DAY);
			check.daysUntilExpiry = daysUntilExpiry;
			if (secondsLeft <= 0) {
				return { ...check, status: "EXPIRED", detail: "Credential has expired. Messages are failing now." };
			}
			if (daysUntilExpiry <= options.expiryWarnDays) {
				return {
					...check,
					status: "EXPIRING_SOON",
					detail: `Credential expires in ${daysUntilExpiry} day(s). Provision a system user for a permanent credential.`,
				};
			}
			check.detail = `Credential valid for ${daysUntilExpiry} more day(s).`;
		}

		if (missingScopes.length > 0) {
			return {
				...check,
				status: "MISSING_SCOPES",
				detail: `Credential is missing scopes: ${missingScopes.join(", ")}. The organization must authorize again.`,
			};
		}
		return check;
	}

	async function checkAccount(account: MessagingAccount, accessToken: string): Promise<AccountCheck> {
		const base = { accountId: account.externalAccountId, localStatus: account.status };
		try {
			const response = await providerClient.getAccount(account.externalAccountId, accessToken);
			if (!response.ok) {
				return { ...base, status: "CHECK_FAILED", detail: `Provider error: ${response.error.message}` };
			}
			const reviewStatus = response.data.reviewStatus?.toUpperCase();
			switch (reviewStatus) {
				case "APPROVED":
					return { ...base, reviewStatus, status: "OK", detail: "Account is approved." };
				case "PENDING":
					return {
						...base,
						reviewStatus,
						status: "REVIEW_PENDING",
						detail: "Account is under review. Messaging may be limited until it is approved.",
					};
				case "REJECTED":
					return { ...base, reviewStatus, status: "REJECTED", detail: "Account was rejected by the provider." };
				default:
					return { ...base, reviewStatus, status: "OK", detail: "Review status not available." };
			}
		} catch (error) {
			log.warn(error, "Health check of account %s failed", account.externalAccountId);
			return { ...base, status: "CHECK_FAILED", detail: "Could not reach the provider." };
		}
	}

	async function checkPhone(phone: Registration, accessToken: string): Promise<PhoneCheck> {
		const check: PhoneCheck = {
			phoneNumberId: phone.externalId,
			...(phone.displayPhoneNumber ? { displayPhoneNumber: phone.displayPhoneNumber } : {}),
			...(phone.verifiedName ? { verifiedName: phone.verifiedName } : {}),
			status: "OK",
			detail: "Phone number is connected.",
		};

		try {
			const response = await providerClient.getPhoneNumber(phone.externalId, accessToken);
			if (response.ok) {
				const providerStatus = response.data.status?.toUpperCase() ?? "UNKNOWN";
				const qualityRating = response.data.qualityRating?.toUpperCase() ?? "UNKNOWN";
				check.providerStatus = providerStatus;
				check.qualityRating = qualityRating;
				if (response.data.verifiedName) {
					check.verifiedName = response.data.verifiedName;
				}
				Object.assign(check, interpretPhoneStatus(providerStatus, qualityRating));
			} else {
				check.status = "CHECK_FAILED";
				check.detail = `Provider error: ${response.error.message}`;
			}
		} catch (error) {
			log.warn(error, "Health check of phone %s failed", phone.externalId);
			check.status = "CHECK_FAILED";
			check.detail = "Could not reach the provider.";
		}

		try {
			const profile = await providerClient.getBusinessProfile(phone.externalId, accessToken);
			check.profileExists = profile.ok;
			if (!profile.ok && check.status === "OK") {
				check.status = "QUALITY_WARNING";
				check.detail += " Business profile not found, permissions may be revoked.";
			}
		} catch (error) {
			log.debug(error, "Business profile check of phone %s did not reach the provider", phone.externalId);
		}
		return check;
	}
}

export function interpretPhoneStatus(
	providerStatus: string,
	qualityRating: string,
): Pick<PhoneCheck, "status" | "detail"> {
	switch (providerStatus) {
		case "CONNECTED":
			if (qualityRating === "RED") {
				return { status: "QUALITY_WARNING", detail: "Quality RED, high risk of a ban. Pause marketing messages." };
			}
			if (qualityRating === "YELLOW") {
				return { status: "QUALITY_WARNING", detail: "Quality YELLOW, reduce spam to avoid a ban." };
			}
			return { status: "OK", detail: `Phone is connected. Quality ${qualityRating}.` };
		case "DISCONNECTED":
			return { status: "DISCONNECTED", detail: "Phone is disconnected. Register the number again." };
		case "FLAGGED":
			return { status: "QUALITY_WARNING", detail: "Phone is flagged for a high block rate. Reduce message volume." };
		case "RESTRICTED":
			return { status: "RESTRICTED", detail: "Phone is restricted and messaging is limited." };
		default:
			return { status: "OK", detail: `Phone status ${providerStatus}.` };
	}
}

export function deriveOverallStatus(
	token: TokenCheck,
	accounts: ReadonlyArray<AccountCheck>,
	phones: ReadonlyArray<PhoneCheck>,
): OverallHealth {
	if (token.status === "INVALID" || token.status === "EXPIRED") {
		return "UNHEALTHY";
	}
	const degraded =
		token.status !== "OK" ||
		accounts.some(account => account.status === "REJECTED" || account.status === "CHECK_FAILED") ||
		phones.some(phone => phone.status !== "OK");
	return degraded ? "DEGRADED" : "HEALTHY";
}

export function buildHealthSummary(overallStatus: OverallHealth, phoneCount: number): string {
	switch (overallStatus) {
		case "HEALTHY":
			return `All checks passed. ${phoneCount} ${phoneCount === 1 ? "phone number" : "phone numbers"} connected.`;
		case "DEGRADED":
			return "Integration is running with issues. Review the token, account and phone checks.";
		case "UNHEALTHY":
			return "Credential is invalid. Messaging is broken until the organization signs up again.";
	}
}
