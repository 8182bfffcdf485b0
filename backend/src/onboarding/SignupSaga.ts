import type { MessagingAccountDao } from "../dao/MessagingAccountDao";
import type { OAuthAccountDao } from "../dao/OAuthAccountDao";
import type { OnboardingTaskDao, TaskResult } from "../dao/OnboardingTaskDao";
import type { RegistrationDao } from "../dao/RegistrationDao";
import type { MessagingAccount } from "../model/MessagingAccount";
import type { OnboardingTask } from "../model/OnboardingTask";
import { type ProviderClient, requireSuccess } from "../provider/ProviderClient";
import { ProviderPermanentError } from "../provider/ProviderErrors";
import type { RetryExecutor } from "../provider/RetryExecutor";
import type { RegistrationSaga } from "../registration/RegistrationSaga";
import { getLog } from "../util/Logger";
import { AccountAlreadyClaimedError, TaskNotFoundError, UnrecoverableInputError } from "./OnboardingErrors";
import { hasStep } from "./OnboardingSteps";
import type { SystemUserProvisioner } from "./SystemUserProvisioner";
import type { TaskStateService } from "./TaskStateService";
import type { OnboardingStep, RegistrationStatus, SignupType } from "onboarding-common";
import type { TokenCipher } from "onboarding-common/server";
import { type Sequelize, UniqueConstraintError } from "sequelize";

const log = getLog(import.meta);

/**
 * What a worker needs to run one signup. Built from the request, or from the task row on redispatch.
 */
export interface SignupInput {
	organizationId: number;
	authorizationCode: string;
	signupType: SignupType;
	accountId?: string;
	businessId?: string;
	phoneNumberId?: string;
}

export interface SignupSagaDeps {
	sequelize: Sequelize;
	taskDao: OnboardingTaskDao;
	taskState: TaskStateService;
	oauthAccountDao: OAuthAccountDao;
	messagingAccountDao: MessagingAccountDao;
	registrationDao: RegistrationDao;
	providerClient: ProviderClient;
	retryExecutor: RetryExecutor;
	registrationSaga: RegistrationSaga;
	provisioner: SystemUserProvisioner;
	cipher: TokenCipher;
}

export interface SignupSagaOptions {
	/** Our app id, looked for in the account's subscribed apps. */
	appId: string;
	requiredScopes: Array<string>;
	/** Extended tokens expiring sooner than this mean the provider app is not live. */
	minLongLivedTokenSeconds: number;
	now?: () => Date;
}

/**
 * Runs the signup steps for a claimed task. Every step whose bit is set in the task's
 * completed steps is skipped and its stored output reused, so a retried or reset task
 * resumes where the previous worker stopped.
 */
export interface SignupSaga {
	/**
	 * @throws TaskOwnershipLostError when the task stops being PROCESSING
	 * @throws UnrecoverableInputError when the authorization code was consumed without a stored token
	 * @throws ProviderPermanentError
	 */
	run(taskId: number, input: SignupInput): Promise<TaskResult>;
}

interface AcquiredToken {
	accessToken: string;
	expiresIn: number;
}

/**
 * Registration status for a phone the provider reports, undefined when the saga decides.
 */
export function mapProviderPhoneStatus(status: string | undefined): RegistrationStatus | undefined {
	switch (status?.toUpperCase()) {
		case "CONNECTED":
			return "ACTIVE";
		case "BLOCKED":
			return "BLOCKED";
		case "DISABLED":
			return "DISABLED";
		default:
			return;
	}
}

export function buildSummary(accountId: string, phoneCount: number, webhookConfirmed: boolean): string {
	const webhookNote = webhookConfirmed ? "" : " Warning: webhook not confirmed.";
	if (phoneCount === 0) {
		return `Messaging account ${accountId} connected. No phone numbers found.${webhookNote}`;
	}
	const noun = phoneCount > 1 ? "phone numbers" : "phone number";
	return `Messaging account connected with ${phoneCount} ${noun}. Ready to send!${webhookNote}`;
}

export function createSignupSaga(deps: SignupSagaDeps, options: SignupSagaOptions): SignupSaga {
	const {
		sequelize,
		taskDao,
		taskState,
		oauthAccountDao,
		messagingAccountDao,
		registrationDao,
		providerClient,
		retryExecutor,
		registrationSaga,
		provisioner,
		cipher,
	} = deps;
	const now = options.now ?? (() => new Date());

	return { run };

	async function run(taskId: number, input: SignupInput): Promise<TaskResult> {
		const task = await taskDao.getTask(taskId);
		if (!task) {
			throw new TaskNotFoundError(taskId);
		}
		const done = (step: OnboardingStep) => hasStep(task.completedSteps, step);
		log.info(
			{ taskId, organizationId: input.organizationId, signupType: input.signupType },
			"Signup saga started for task %d",
			taskId,
		);

		const token = await acquireToken(task, input);
		if (!done("SCOPE_VERIFICATION")) {
			await verifyScopes(token.accessToken);
			await taskState.persistStepCompleted(taskId, "SCOPE_VERIFICATION");
		}

		await taskState.assertOwnership(taskId);
		const accountId = await resolveAccount(task, input, token.accessToken);
		const businessId = await resolveBusiness(task, input, accountId, token.accessToken);
		const phoneNumberId = await resolvePhone(task, input, accountId, token.accessToken);

		await taskState.assertOwnership(taskId);
		const account = await persistCredentials(task, input, token, accountId, businessId);

		await taskState.assertOwnership(taskId);
		let webhookConfirmed = task.webhookConfirmed ?? true;
		if (!done("WEBHOOK_SUBSCRIBE")) {
			webhookConfirmed = await subscribeWebhook(accountId, token.accessToken);
			await taskState.persistStepResult(taskId, "WEBHOOK_SUBSCRIBE", { webhookConfirmed });
		}

		await taskState.assertOwnership(taskId);
		if (!done("PHONE_SYNC")) {
			await syncPhones(account, token.accessToken);
			await taskState.persistStepCompleted(taskId, "PHONE_SYNC");
		}
		if (phoneNumberId && !done("PHONE_REGISTRATION")) {
			const outcome = await registrationSaga.registerBestEffort({ externalId: phoneNumberId, ownerId: account.id });
			log.info({ taskId }, "Phone %s registration: %s", phoneNumberId, outcome?.status ?? "skipped");
			await taskState.persistStepCompleted(taskId, "PHONE_REGISTRATION");
		}
		if (input.signupType === "COEXISTENCE" && phoneNumberId && !done("BUSINESS_APP_SYNC")) {
			await syncBusinessApp(phoneNumberId, token.accessToken);
			await taskState.persistStepCompleted(taskId, "BUSINESS_APP_SYNC");
		}

		await taskState.assertOwnership(taskId);
		if (!done("SYSTEM_USER_PROVISIONING")) {
			await provisioner.tryProvisionAfterSignup(input.organizationId);
			await taskState.persistStepCompleted(taskId, "SYSTEM_USER_PROVISIONING");
		}

		const phones = await registrationDao.listByOwner(account.id);
		log.info({ taskId }, "Signup saga finished for task %d: account %s, %d phones", taskId, accountId, phones.length);
		return {
			resultReference: account.id,
			summary: buildSummary(accountId, phones.length, webhookConfirmed),
		};
	}

	async function acquireToken(task: OnboardingTask, input: SignupInput): Promise<AcquiredToken> {
		if (hasStep(task.completedSteps, "TOKEN_EXTENSION") && task.encryptedAccessToken) {
			log.info({ taskId: task.id }, "Task %d resumes with its stored long-lived token", task.id);
			return { accessToken: cipher.decrypt(task.encryptedAccessToken), expiresIn: task.tokenExpiresIn ?? 0 };
		}

		let shortLivedToken: string;
		if (hasStep(task.completedSteps, "TOKEN_EXCHANGE") && task.encryptedAccessToken) {
			log.info({ taskId: task.id }, "Task %d resumes with its stored short-lived token", task.id);
			shortLivedToken = cipher.decrypt(task.encryptedAccessToken);
		} else if (task.codeExchangeStartedAt) {
			throw new UnrecoverableInputError(
				"Authorization code was consumed but the access token was never persisted. Restart signup to obtain a fresh code.",
			);
		} else {
			await taskState.recordCodeExchangeIntent(task.id);
			const grant = await retryExecutor.execute("exchangeCode", () =>
				providerClient.exchangeCode(input.authorizationCode),
			);
			shortLivedToken = grant.accessToken;
			await taskState.persistStepResult(task.id, "TOKEN_EXCHANGE", {
				encryptedAccessToken: cipher.encrypt(shortLivedToken),
			});
			log.info({ taskId: task.id }, "Task %d exchanged its authorization code", task.id);
		}

		const extended = await retryExecutor.execute("extendToken", () => providerClient.extendToken(shortLivedToken));
		const expiresIn = extended.expiresIn ?? 0;
		if (expiresIn < options.minLongLivedTokenSeconds) {
			throw new ProviderPermanentError(
				"extendToken",
				`Received a short-lived token (${expiresIn} seconds). Ensure the provider app is in Live mode`,
			);
		}
		await taskState.persistStepResult(task.id, "TOKEN_EXTENSION", {
			encryptedAccessToken: cipher.encrypt(extended.accessToken),
			tokenExpiresIn: expiresIn,
		});
		log.info({ taskId: task.id }, "Task %d stored a token valid for %d days", task.id, Math.floor(expiresIn / 86400));
		return { accessToken: extended.accessToken, expiresIn };
	}

	async function verifyScopes(accessToken: string): Promise<void> {
		let granted: Array<string>;
		try {
			granted = await retryExecutor.execute("listGrantedScopes", () =>
				providerClient.listGrantedScopes(accessToken),
			);
		} catch (error) {
			log.warn(error, "Could not verify granted scopes, proceeding");
			return;
		}
		const missing = options.requiredScopes.filter(scope => !granted.includes(scope));
		if (missing.length > 0) {
			throw new ProviderPermanentError(
				"verifyScopes",
				`Missing required permissions: ${missing.join(", ")}. Required: ${options.requiredScopes.join(", ")}`,
			);
		}
	}

	async function resolveAccount(task: OnboardingTask, input: SignupInput, accessToken: string): Promise<string> {
		if (hasStep(task.completedSteps, "ACCOUNT_RESOLUTION") && task.resolvedAccountId) {
			return task.resolvedAccountId;
		}

		let accountId: string;
		if (input.accountId) {
			const requested = input.accountId;
			await retryExecutor.execute("verifyAccount", () => providerClient.getAccount(requested, accessToken), {
				resourceId: requested,
			});
			accountId = requested;
		} else {
			const accounts = await retryExecutor.execute("discoverAccount", () =>
				providerClient.listOwnedAccounts(accessToken),
			);
			if (accounts.length === 0) {
				throw new ProviderPermanentError("discoverAccount", "No messaging account found for this token");
			}
			accountId = accounts[0].id;
			log.info({ taskId: task.id }, "Discovered account %s", accountId);
		}

		await taskState.persistStepResult(task.id, "ACCOUNT_RESOLUTION", { resolvedAccountId: accountId });
		return accountId;
	}

	async function resolveBusiness(
		task: OnboardingTask,
		input: SignupInput,
		accountId: string,
		accessToken: string,
	): Promise<string> {
		if (hasStep(task.completedSteps, "BUSINESS_RESOLUTION") && task.resolvedBusinessId) {
			return task.resolvedBusinessId;
		}

		const businessId = input.businessId ?? (await lookUpBusiness(accountId, accessToken)) ?? `UNKNOWN-${accountId}`;
		await taskState.persistStepResult(task.id, "BUSINESS_RESOLUTION", { resolvedBusinessId: businessId });
		return businessId;
	}

	async function lookUpBusiness(accountId: string, accessToken: string): Promise<string | undefined> {
		try {
			const details = await retryExecutor.execute("getAccount", () => providerClient.getAccount(accountId, accessToken), {
				resourceId: accountId,
			});
			return details.businessId;
		} catch (error) {
			log.warn(error, "Could not resolve the business of account %s", accountId);
			return;
		}
	}

	async function resolvePhone(
		task: OnboardingTask,
		input: SignupInput,
		accountId: string,
		accessToken: string,
	): Promise<string | undefined> {
		if (hasStep(task.completedSteps, "PHONE_RESOLUTION")) {
			return task.resolvedPhoneNumberId ?? undefined;
		}

		const phoneNumberId = input.phoneNumberId ?? (await discoverLatestPhone(accountId, accessToken));
		if (phoneNumberId) {
			await taskState.persistStepResult(task.id, "PHONE_RESOLUTION", { resolvedPhoneNumberId: phoneNumberId });
		} else {
			log.warn({ taskId: task.id }, "No phone numbers found for account %s, registration skipped", accountId);
			await taskState.persistStepCompleted(task.id, "PHONE_RESOLUTION");
		}
		return phoneNumberId;
	}

	async function discoverLatestPhone(accountId: string, accessToken: string): Promise<string | undefined> {
		try {
			const phones = await retryExecutor.execute(
				"listPhoneNumbers",
				() => providerClient.listPhoneNumbers(accountId, accessToken),
				{ resourceId: accountId },
			);
			// The provider lists the most recently added number last
			return phones.length > 0 ? phones[phones.length - 1].id : undefined;
		} catch (error) {
			log.warn(error, "Phone discovery failed for account %s", accountId);
			return;
		}
	}

	async function persistCredentials(
		task: OnboardingTask,
		input: SignupInput,
		token: AcquiredToken,
		accountId: string,
		businessId: string,
	): Promise<MessagingAccount> {
		if (task.resultReference !== null) {
			const existing = await messagingAccountDao.findById(task.resultReference);
			if (!existing) {
				throw new Error(`Messaging account ${task.resultReference} not found on resume`);
			}
			return existing;
		}

		const account = await saveAccount(input.organizationId, token, accountId, businessId);
		await taskState.persistStepResult(task.id, "CREDENTIAL_PERSISTENCE", { resultReference: account.id });
		log.info({ taskId: task.id }, "Task %d stored messaging account %d", task.id, account.id);
		return account;
	}

	async function saveAccount(
		organizationId: number,
		token: AcquiredToken,
		accountId: string,
		businessId: string,
	): Promise<MessagingAccount> {
		try {
			return await sequelize.transaction(async transaction => {
				const credential = await oauthAccountDao.upsertForOrganization(
					{
						organizationId,
						encryptedAccessToken: cipher.encrypt(token.accessToken),
						tokenType: "USER_TOKEN",
						expiresAt: token.expiresIn > 0 ? new Date(now().getTime() + token.expiresIn * 1000) : null,
					},
					transaction,
				);
				const existing = await messagingAccountDao.findByExternalAccountId(accountId, transaction);
				if (existing) {
					if (existing.organizationId !== organizationId) {
						throw new AccountAlreadyClaimedError(accountId);
					}
					return existing;
				}
				return await messagingAccountDao.create(
					{
						organizationId,
						oauthAccountId: credential.id,
						externalAccountId: accountId,
						businessId,
						status: "ACTIVE",
					},
					transaction,
				);
			});
		} catch (error) {
			if (!(error instanceof UniqueConstraintError)) {
				throw error;
			}
			// Another signup connected the same account concurrently
			const winner = await messagingAccountDao.findByExternalAccountId(accountId);
			if (winner?.organizationId === organizationId) {
				return winner;
			}
			throw new AccountAlreadyClaimedError(accountId);
		}
	}

	/**
	 * Returns false when the subscription could not be confirmed.
	 */
	async function subscribeWebhook(accountId: string, accessToken: string): Promise<boolean> {
		try {
			await retryExecutor.execute(
				"subscribeApp",
				async () => requireSuccess(await providerClient.subscribeApp(accountId, accessToken)),
				{ resourceId: accountId },
			);
		} catch (error) {
			log.warn(error, "Webhook subscription failed for account %s", accountId);
			return false;
		}

		try {
			const apps = await retryExecutor.execute(
				"listSubscribedApps",
				() => providerClient.listSubscribedApps(accountId, accessToken),
				{ resourceId: accountId },
			);
			if (apps.includes(options.appId)) {
				log.info("Webhook subscription confirmed for account %s", accountId);
				return true;
			}
			log.warn("Webhook subscribed but app %s not listed for account %s", options.appId, accountId);
			return false;
		} catch (error) {
			log.warn(error, "Webhook subscription check failed for account %s", accountId);
			return false;
		}
	}

	async function syncPhones(account: MessagingAccount, accessToken: string): Promise<void> {
		try {
			const phones = await retryExecutor.execute(
				"listPhoneNumbers",
				() => providerClient.listPhoneNumbers(account.externalAccountId, accessToken),
				{ resourceId: account.externalAccountId },
			);
			for (const phone of phones) {
				const outcome = await registrationDao.syncPhone({
					externalId: phone.id,
					ownerId: account.id,
					displayPhoneNumber: phone.displayPhoneNumber ?? null,
					verifiedName: phone.verifiedName ?? null,
					status: mapProviderPhoneStatus(phone.status),
				});
				log.debug("Phone %s sync: %s", phone.id, outcome);
			}
		} catch (error) {
			log.warn(error, "Phone sync failed for account %s", account.externalAccountId);
		}
	}

	async function syncBusinessApp(phoneNumberId: string, accessToken: string): Promise<void> {
		for (const syncType of ["smb_app_state_sync", "history"] as const) {
			try {
				await retryExecutor.execute(
					"syncBusinessAppData",
					async () => requireSuccess(await providerClient.syncBusinessAppData(phoneNumberId, syncType, accessToken)),
					{ resourceId: phoneNumberId },
				);
				log.info("Business app %s sync started for phone %s", syncType, phoneNumberId);
			} catch (error) {
				log.warn(error, "Business app %s sync failed for phone %s", syncType, phoneNumberId);
			}
		}
	}
}
