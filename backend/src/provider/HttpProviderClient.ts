import type { Config } from "../config/Config";
import { getLog } from "../util/Logger";
import type {
	BusinessAppSyncType,
	BusinessProfile,
	ProviderAccount,
	ProviderClient,
	ProviderPhoneNumber,
	ProviderResponse,
	ProviderSuccess,
	TokenDebugInfo,
	TokenGrant,
} from "./ProviderClient";
import { UNSUCCESSFUL_MESSAGE } from "./ProviderClient";
import { z } from "zod";

const log = getLog(import.meta);

export interface HttpProviderClientOptions {
	baseUrl: string;
	apiVersion: string;
	appId: string;
	appSecret: string;
	timeoutMs: number;
}

export function getHttpProviderClientOptions(
	config: Pick<
		Config,
		| "PROVIDER_API_BASE_URL"
		| "PROVIDER_API_VERSION"
		| "PROVIDER_APP_ID"
		| "PROVIDER_APP_SECRET"
		| "PROVIDER_REQUEST_TIMEOUT_MS"
	>,
): HttpProviderClientOptions {
	return {
		baseUrl: config.PROVIDER_API_BASE_URL,
		apiVersion: config.PROVIDER_API_VERSION,
		appId: config.PROVIDER_APP_ID,
		appSecret: config.PROVIDER_APP_SECRET,
		timeoutMs: config.PROVIDER_REQUEST_TIMEOUT_MS,
	};
}

const ErrorBodySchema = z.object({
	error: z.object({
		code: z.coerce.number().default(0),
		type: z.string().optional(),
		error_subcode: z.coerce.number().optional(),
		message: z.string().default("Unknown provider error"),
	}),
});

const TokenGrantSchema = z
	.object({ access_token: z.string(), expires_in: z.coerce.number().optional() })
	.transform((grant): TokenGrant => ({ accessToken: grant.access_token, expiresIn: grant.expires_in }));

const TokenDebugSchema = z
	.object({
		data: z.object({
			is_valid: z.boolean(),
			expires_at: z.number().default(0),
			scopes: z.array(z.string()).default([]),
			user_id: z.string().optional(),
		}),
	})
	.transform(
		({ data }): TokenDebugInfo => ({
			isValid: data.is_valid,
			expiresAt: data.expires_at,
			scopes: data.scopes,
			userId: data.user_id,
		}),
	);

const PermissionsSchema = z
	.object({ data: z.array(z.object({ permission: z.string(), status: z.string() })) })
	.transform(({ data }) => data.filter(entry => entry.status === "granted").map(entry => entry.permission));

const AccountFieldsSchema = z.object({ id: z.string(), name: z.string().optional() });

const AccountSchema = AccountFieldsSchema.extend({
	business_id: z.string().optional(),
	account_review_status: z.string().optional(),
}).transform(
	(account): ProviderAccount => ({
		id: account.id,
		name: account.name,
		businessId: account.business_id,
		reviewStatus: account.account_review_status,
	}),
);

const BusinessesSchema = z
	.object({
		data: z.array(
			z.object({
				id: z.string(),
				owned_whatsapp_business_accounts: z.object({ data: z.array(AccountFieldsSchema) }).optional(),
			}),
		),
	})
	.transform(({ data }): Array<ProviderAccount> =>
		data.flatMap(business =>
			(business.owned_whatsapp_business_accounts?.data ?? []).map(account => ({
				id: account.id,
				name: account.name,
				businessId: business.id,
			})),
		),
	);

const PhoneNumberSchema = z
	.object({
		id: z.string(),
		display_phone_number: z.string().optional(),
		verified_name: z.string().optional(),
		status: z.string().optional(),
		quality_rating: z.string().optional(),
	})
	.transform(
		(phone): ProviderPhoneNumber => ({
			id: phone.id,
			displayPhoneNumber: phone.display_phone_number,
			verifiedName: phone.verified_name,
			status: phone.status,
			qualityRating: phone.quality_rating,
		}),
	);

const PhoneNumbersSchema = z.object({ data: z.array(PhoneNumberSchema) }).transform(({ data }) => data);

const BusinessProfileSchema = z
	.object({
		data: z
			.array(
				z.object({
					about: z.string().optional(),
					description: z.string().optional(),
					vertical: z.string().optional(),
				}),
			)
			.min(1),
	})
	.transform(({ data: [profile] }): BusinessProfile => profile);

const SubscribedAppsSchema = z
	.object({
		data: z.array(
			z.object({
				id: z.string().optional(),
				whatsapp_business_api_data: z.object({ id: z.string() }).optional(),
			}),
		),
	})
	.transform(({ data }) =>
		data.flatMap(app => {
			const id = app.whatsapp_business_api_data?.id ?? app.id;
			return id ? [id] : [];
		}),
	);

const SuccessSchema = z.object({ success: z.boolean().default(true) });

const DeclinedSchema = z.object({ success: z.literal(false) });

const IdSchema = z.object({ id: z.string() });

type Params = Record<string, string>;

/**
 * Provider client over fetch. Every call is bounded by the request timeout; error bodies
 * and non-2xx statuses come back as `{ ok: false }`, transport failures reject.
 */
export function createHttpProviderClient(options: HttpProviderClientOptions): ProviderClient {
	const root = `${options.baseUrl.replace(/\/$/, "")}/${options.apiVersion}`;
	const appAccessToken = `${options.appId}|${options.appSecret}`;

	return {
		exchangeCode,
		extendToken,
		debugToken,
		listGrantedScopes,
		getAccount,
		listOwnedAccounts,
		listPhoneNumbers,
		getPhoneNumber,
		getBusinessProfile,
		subscribeApp,
		listSubscribedApps,
		registerPhone,
		syncBusinessAppData,
		createSystemUser,
		assignAccountToSystemUser,
		generateSystemUserToken,
	};

	function exchangeCode(code: string): Promise<ProviderResponse<TokenGrant>> {
		return get(TokenGrantSchema, "/oauth/access_token", {
			code,
			client_id: options.appId,
			client_secret: options.appSecret,
		});
	}

	function extendToken(accessToken: string): Promise<ProviderResponse<TokenGrant>> {
		return get(TokenGrantSchema, "/oauth/access_token", {
			grant_type: "fb_exchange_token",
			client_id: options.appId,
			client_secret: options.appSecret,
			fb_exchange_token: accessToken,
		});
	}

	function debugToken(accessToken: string): Promise<ProviderResponse<TokenDebugInfo>> {
		return get(TokenDebugSchema, "/debug_token", { input_token: accessToken }, appAccessToken);
	}

	function listGrantedScopes(accessToken: string): Promise<ProviderResponse<Array<string>>> {
		return get(PermissionsSchema, "/me/permissions", {}, accessToken);
	}

	function getAccount(accountId: string, accessToken: string): Promise<ProviderResponse<ProviderAccount>> {
		return get(AccountSchema, `/${accountId}`, { fields: "id,name,business_id,account_review_status" }, accessToken);
	}

	function listOwnedAccounts(accessToken: string): Promise<ProviderResponse<Array<ProviderAccount>>> {
		return get(
			BusinessesSchema,
			"/me/businesses",
			{ fields: "id,name,owned_whatsapp_business_accounts{id,name}" },
			accessToken,
		);
	}

	function listPhoneNumbers(
		accountId: string,
		accessToken: string,
	): Promise<ProviderResponse<Array<ProviderPhoneNumber>>> {
		return get(
			PhoneNumbersSchema,
			`/${accountId}/phone_numbers`,
			{ fields: "id,display_phone_number,verified_name,status" },
			accessToken,
		);
	}

	function getPhoneNumber(phoneNumberId: string, accessToken: string): Promise<ProviderResponse<ProviderPhoneNumber>> {
		return get(
			PhoneNumberSchema,
			`/${phoneNumberId}`,
			{ fields: "id,display_phone_number,verified_name,status,quality_rating" },
			accessToken,
		);
	}

	function getBusinessProfile(phoneNumberId: string, accessToken: string): Promise<ProviderResponse<BusinessProfile>> {
		return get(
			BusinessProfileSchema,
			`/${phoneNumberId}/whatsapp_business_profile`,
			{ fields: "about,description,vertical" },
			accessToken,
		);
	}

	function subscribeApp(accountId: string, accessToken: string): Promise<ProviderResponse<ProviderSuccess>> {
		return post(SuccessSchema, `/${accountId}/subscribed_apps`, {}, accessToken);
	}

	function listSubscribedApps(accountId: string, accessToken: string): Promise<ProviderResponse<Array<string>>> {
		return get(SubscribedAppsSchema, `/${accountId}/subscribed_apps`, {}, accessToken);
	}

	function registerPhone(
		phoneNumberId: string,
		pin: string,
		accessToken: string,
	): Promise<ProviderResponse<ProviderSuccess>> {
		return post(SuccessSchema, `/${phoneNumberId}/register`, { messaging_product: "whatsapp", pin }, accessToken);
	}

	function syncBusinessAppData(
		phoneNumberId: string,
		syncType: BusinessAppSyncType,
		accessToken: string,
	): Promise<ProviderResponse<ProviderSuccess>> {
		return post(
			SuccessSchema,
			`/${phoneNumberId}/smb_app_data`,
			{ messaging_product: "whatsapp", sync_type: syncType },
			accessToken,
		);
	}

	function createSystemUser(
		businessId: string,
		name: string,
		role: string,
		accessToken: string,
	): Promise<ProviderResponse<{ id: string }>> {
		return post(IdSchema, `/${businessId}/system_users`, { name, role }, accessToken);
	}

	function assignAccountToSystemUser(
		accountId: string,
		systemUserId: string,
		accessToken: string,
	): Promise<ProviderResponse<ProviderSuccess>> {
		return post(
			SuccessSchema,
			`/${accountId}/assigned_users`,
			{ user: systemUserId, tasks: '["MANAGE"]' },
			accessToken,
		);
	}

	function generateSystemUserToken(
		systemUserId: string,
		appSecretProof: string,
		scope: string,
		accessToken: string,
	): Promise<ProviderResponse<TokenGrant>> {
		return post(
			TokenGrantSchema,
			`/${systemUserId}/access_tokens`,
			{ business_app: options.appId, appsecret_proof: appSecretProof, scope },
			accessToken,
		);
	}

	function get<S extends z.ZodTypeAny>(
		schema: S,
		path: string,
		params: Params,
		accessToken?: string,
	): Promise<ProviderResponse<z.output<S>>> {
		const query = new URLSearchParams(params).toString();
		return send(schema, path, `${root}${path}${query ? `?${query}` : ""}`, {
			method: "GET",
			headers: authorization(accessToken),
		});
	}

	function post<S extends z.ZodTypeAny>(
		schema: S,
		path: string,
		params: Params,
		accessToken: string,
	): Promise<ProviderResponse<z.output<S>>> {
		return send(schema, path, `${root}${path}`, {
			method: "POST",
			headers: { ...authorization(accessToken), "Content-Type": "application/x-www-form-urlencoded" },
			body: new URLSearchParams(params).toString(),
		});
	}

	async function send<S extends z.ZodTypeAny>(
		schema: S,
		path: string,
		url: string,
		init: RequestInit,
	): Promise<ProviderResponse<z.output<S>>> {
		const response = await fetch(url, { ...init, signal: AbortSignal.timeout(options.timeoutMs) });
		const body = await readBody(response);

		const errorBody = ErrorBodySchema.safeParse(body);
		if (errorBody.success) {
			const { code, type, error_subcode, message } = errorBody.data.error;
			log.debug("Provider error on %s %s: %d %s", init.method, path, code, message);
			return { ok: false, httpStatus: response.status, error: { code, type, subcode: error_subcode, message } };
		}
		if (!response.ok) {
			return { ok: false, httpStatus: response.status, error: { code: 0, message: `HTTP ${response.status}` } };
		}
		if (DeclinedSchema.safeParse(body).success) {
			log.debug("Provider declined %s %s", init.method, path);
			return { ok: false, httpStatus: response.status, error: { code: 0, message: UNSUCCESSFUL_MESSAGE } };
		}

		const parsed = schema.safeParse(body ?? {});
		if (!parsed.success) {
			log.warn("Unexpected provider response on %s %s: %s", init.method, path, parsed.error.message);
			return {
				ok: false,
				httpStatus: response.status,
				error: { code: 0, message: `Unexpected response from ${path}` },
			};
		}
		return { ok: true, data: parsed.data };
	}
}

function authorization(accessToken: string | undefined): Record<string, string> {
	return accessToken ? { Authorization: `Bearer ${accessToken}` } : {};
}

async function readBody(response: Response): Promise<unknown> {
	const text = await response.text();
	if (!text) {
		return;
	}
	try {
		return JSON.parse(text);
	} catch {
		log.debug("Provider returned a non JSON body with status %d", response.status);
		return text;
	}
}
