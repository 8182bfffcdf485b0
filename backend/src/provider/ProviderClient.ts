import type { ProviderError } from "./ProviderErrors";

/**
 * Outcome of one provider call that reached the provider. Transport failures
 * (connection refused, timeout) reject instead.
 */
export type ProviderResponse<T> = { ok: true; data: T } | { ok: false; httpStatus: number; error: ProviderError };

export interface TokenGrant {
	accessToken: string;
	/** Seconds until expiry, absent for tokens that never expire. */
	expiresIn?: number;
}

export interface TokenDebugInfo {
	isValid: boolean;
	/** Unix seconds, 0 for tokens that never expire. */
	expiresAt: number;
	scopes: Array<string>;
	userId?: string;
}

export interface ProviderAccount {
	id: string;
	name?: string;
	businessId?: string;
	/** APPROVED, PENDING or REJECTED. Only read by getAccount, and missing for new accounts. */
	reviewStatus?: string;
}

export interface ProviderPhoneNumber {
	id: string;
	displayPhoneNumber?: string;
	verifiedName?: string;
	/** Provider status such as CONNECTED, BLOCKED or DISABLED. */
	status?: string;
	/** GREEN, YELLOW or RED. */
	qualityRating?: string;
}

export interface BusinessProfile {
	about?: string;
	description?: string;
	vertical?: string;
}

export interface ProviderSuccess {
	success: boolean;
}

export const UNSUCCESSFUL_MESSAGE = "Provider reported the call as unsuccessful";

/**
 * Turns a 2xx response whose body says `success: false` into a failed response.
 */
export function requireSuccess(response: ProviderResponse<ProviderSuccess>): ProviderResponse<ProviderSuccess> {
	if (response.ok && !response.data.success) {
		return { ok: false, httpStatus: 200, error: { code: 0, message: UNSUCCESSFUL_MESSAGE } };
	}
	return response;
}

export type BusinessAppSyncType = "smb_app_state_sync" | "history";

/**
 * Calls of the messaging provider's Graph API used by onboarding.
 */
export interface ProviderClient {
	/** Trades the single-use signup code for a short-lived user token. */
	exchangeCode(code: string): Promise<ProviderResponse<TokenGrant>>;
	/** Trades a short-lived token for a long-lived one. */
	extendToken(accessToken: string): Promise<ProviderResponse<TokenGrant>>;
	/** Inspects a token with the app's own credential. */
	debugToken(accessToken: string): Promise<ProviderResponse<TokenDebugInfo>>;
	listGrantedScopes(accessToken: string): Promise<ProviderResponse<Array<string>>>;
	getAccount(accountId: string, accessToken: string): Promise<ProviderResponse<ProviderAccount>>;
	/** Messaging accounts owned by the businesses the token can see, in listing order. */
	listOwnedAccounts(accessToken: string): Promise<ProviderResponse<Array<ProviderAccount>>>;
	listPhoneNumbers(accountId: string, accessToken: string): Promise<ProviderResponse<Array<ProviderPhoneNumber>>>;
	getPhoneNumber(phoneNumberId: string, accessToken: string): Promise<ProviderResponse<ProviderPhoneNumber>>;
	/** Fails when the token lost access to the phone. */
	getBusinessProfile(phoneNumberId: string, accessToken: string): Promise<ProviderResponse<BusinessProfile>>;
	subscribeApp(accountId: string, accessToken: string): Promise<ProviderResponse<ProviderSuccess>>;
	/** Ids of the apps subscribed to the account's webhooks. */
	listSubscribedApps(accountId: string, accessToken: string): Promise<ProviderResponse<Array<string>>>;
	registerPhone(phoneNumberId: string, pin: string, accessToken: string): Promise<ProviderResponse<ProviderSuccess>>;
	syncBusinessAppData(
		phoneNumberId: string,
		syncType: BusinessAppSyncType,
		accessToken: string,
	): Promise<ProviderResponse<ProviderSuccess>>;
	createSystemUser(
		businessId: string,
		name: string,
		role: string,
		accessToken: string,
	): Promise<ProviderResponse<{ id: string }>>;
	assignAccountToSystemUser(
		accountId: string,
		systemUserId: string,
		accessToken: string,
	): Promise<ProviderResponse<ProviderSuccess>>;
	generateSystemUserToken(
		systemUserId: string,
		appSecretProof: string,
		scope: string,
		accessToken: string,
	): Promise<ProviderResponse<TokenGrant>>;
}
