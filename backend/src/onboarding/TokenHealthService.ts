import type { OAuthAccountDao } from "../dao/OAuthAccountDao";
import type { OAuthAccount } from "../model/OAuthAccount";
import type { ProviderClient } from "../provider/ProviderClient";
import { getLog } from "../util/Logger";
import type { TokenCipher } from "onboarding-common/server";

const log = getLog(import.meta);

const SECONDS_PER_DAY = 86_400;

export type TokenHealthStatus = "HEALTHY" | "EXPIRING_SOON" | "INVALID" | "CHECK_FAILED";

export interface TokenHealthReport {
	healthy: number;
	expiringSoon: number;
	invalid: number;
	checkFailed: number;
}

export interface TokenHealthServiceOptions {
	/** Valid tokens expiring within this many days are reported as EXPIRING_SOON. */
	expiryWarnDays: number;
	now?: () => Date;
}

/**
 * Inspects every stored organization credential with the provider's token debugger.
 */
export interface TokenHealthService {
	checkAccount(account: OAuthAccount): Promise<TokenHealthStatus>;

	checkAll(): Promise<TokenHealthReport>;
}

export function createTokenHealthService(
	oauthAccountDao: OAuthAccountDao,
	providerClient: ProviderClient,
	cipher: TokenCipher,
	options: TokenHealthServiceOptions,
): TokenHealthService {
	const now = options.now ?? (() => new Date());

	return { checkAccount, checkAll };

	async function checkAccount(account: OAuthAccount): Promise<TokenHealthStatus> {
		let token: string;
		try {
			token = cipher.decrypt(account.encryptedAccessToken);
		} catch (error) {
			log.error(error, "Credential %d of organization %d cannot be decrypted", account.id, account.organizationId);
			return "INVALID";
		}

		let response: Awaited<ReturnType<ProviderClient["debugToken"]>>;
		try {
			response = await providerClient.debugToken(token);
		} catch (error) {
			log.warn(error, "Token check of credential %d did not reach the provider", account.id);
			return "CHECK_FAILED";
		}
		if (!response.ok) {
			log.warn("Token check of credential %d failed: %s", account.id, response.error.message);
			return "CHECK_FAILED";
		}

		const info = response.data;
		if (!info.isValid) {
			log.error(
				{ organizationId: account.organizationId },
				"Credential %d of organization %d is invalid or revoked. The organization must sign up again",
				account.id,
				account.organizationId,
			);
			return "INVALID";
		}

		if (account.tokenType === "USER_TOKEN") {
			log.warn("Credential %d still holds a user token, system-user provisioning is incomplete", account.id);
		}

		// 0 never expires
		if (info.expiresAt > 0) {
			const secondsLeft = info.expiresAt - Math.floor(now().getTime() / 1000);
			if (secondsLeft <= 0) {
				log.error("Credential %d of organization %d has expired", account.id, account.organizationId);
				return "INVALID";
			}
			if (secondsLeft <= options.expiryWarnDays * SECONDS_PER_DAY) {
				log.warn("Credential %d expires in %d days", account.id, Math.floor(secondsLeft / SECONDS_PER_DAY));
				return "EXPIRING_SOON";
			}
		}
		return "HEALTHY";
	}

	async function checkAll(): Promise<TokenHealthReport> {
		const report: TokenHealthReport = { healthy: 0, expiringSoon: 0, invalid: 0, checkFailed: 0 };
		const accounts = await oauthAccountDao.listAll();
		log.info("Checking token health of %d credentials", accounts.length);

		for (const account of accounts) {
			const status = await checkAccount(account);
			switch (status) {
				case "HEALTHY":
					report.healthy++;
					break;
				case "EXPIRING_SOON":
					report.expiringSoon++;
					break;
				case "INVALID":
					report.invalid++;
					break;
				case "CHECK_FAILED":
					report.checkFailed++;
					break;
			}
		}

		log.info(report, "Token health check done");
		if (report.invalid > 0) {
			log.error("%d credentials are invalid and cannot send messages", report.invalid);
		}
		return report;
	}
}
