import type { Config } from "../config/Config";
import type { Database } from "../core/Database";
import type { ProviderClient } from "../provider/ProviderClient";
import {
	createRetryExecutor,
	getRetryExecutorOptions,
	type RetryExecutor,
	type RetryExecutorOptions,
} from "../provider/RetryExecutor";
import { createRegistrationSaga, type RegistrationSaga } from "../registration/RegistrationSaga";
import { type AccountHealthService, createAccountHealthService } from "./AccountHealthService";
import { createOnboardingDispatcher, type OnboardingDispatcher } from "./OnboardingDispatcher";
import { createOnboardingOrchestrator, type OnboardingOrchestrator } from "./OnboardingOrchestrator";
import { createSignupSaga, type SignupSaga } from "./SignupSaga";
import { createSystemUserProvisioner, type SystemUserProvisioner } from "./SystemUserProvisioner";
import { createTaskStateService, type TaskStateService } from "./TaskStateService";
import { createTokenHealthService, type TokenHealthService } from "./TokenHealthService";
import type { TokenCipher } from "onboarding-common/server";

export interface OnboardingEngineOptions {
	appId: string;
	appSecret: string;
	requiredScopes: Array<string>;
	minLongLivedTokenSeconds: number;
	concurrency: number;
	stuckThresholdMinutes: number;
	maxRetries: number;
	maxPhonesPerAccount: number;
	defaultPin: string;
	systemUserName: string;
	systemUserRole: string;
	tokenExpiryWarnDays: number;
	retry: RetryExecutorOptions;
}

export interface OnboardingEngineDeps {
	database: Database;
	providerClient: ProviderClient;
	cipher: TokenCipher;
}

/**
 * The saga engine wired on one database and one provider client.
 */
export interface OnboardingEngine {
	readonly taskState: TaskStateService;
	readonly retryExecutor: RetryExecutor;
	readonly registrationSaga: RegistrationSaga;
	readonly provisioner: SystemUserProvisioner;
	readonly signupSaga: SignupSaga;
	readonly dispatcher: OnboardingDispatcher;
	readonly orchestrator: OnboardingOrchestrator;
	readonly tokenHealth: TokenHealthService;
	readonly accountHealth: AccountHealthService;
}

export function getOnboardingEngineOptions(config: Config): OnboardingEngineOptions {
	return {
		appId: config.PROVIDER_APP_ID,
		appSecret: config.PROVIDER_APP_SECRET,
		requiredScopes: config.ONBOARDING_REQUIRED_SCOPES,
		minLongLivedTokenSeconds: config.ONBOARDING_MIN_LONG_LIVED_TOKEN_SECONDS,
		concurrency: config.ONBOARDING_WORKER_CONCURRENCY,
		stuckThresholdMinutes: config.ONBOARDING_STUCK_THRESHOLD_MINUTES,
		maxRetries: config.ONBOARDING_MAX_RETRIES,
		maxPhonesPerAccount: config.MAX_PHONE_NUMBERS_PER_ACCOUNT,
		defaultPin: config.PHONE_REGISTRATION_DEFAULT_PIN,
		systemUserName: config.SYSTEM_USER_NAME,
		systemUserRole: config.SYSTEM_USER_ROLE,
		tokenExpiryWarnDays: config.TOKEN_EXPIRY_WARN_DAYS,
		retry: getRetryExecutorOptions(config),
	};
}

export function createOnboardingEngine(deps: OnboardingEngineDeps, options: OnboardingEngineOptions): OnboardingEngine {
	const { database, providerClient, cipher } = deps;
	const { sequelize, onboardingTaskDao, registrationDao, oauthAccountDao, messagingAccountDao } = database;

	const retryExecutor = createRetryExecutor(options.retry);
	const taskState = createTaskStateService(onboardingTaskDao, {
		stuckThresholdMinutes: options.stuckThresholdMinutes,
		maxRetries: options.maxRetries,
	});
	const registrationSaga = createRegistrationSaga({
		sequelize,
		registrationDao,
		messagingAccountDao,
		oauthAccountDao,
		providerClient,
		retryExecutor,
		cipher,
		maxPhonesPerAccount: options.maxPhonesPerAccount,
		defaultPin: options.defaultPin,
	});
	const provisioner = createSystemUserProvisioner(
		{ oauthAccountDao, messagingAccountDao, providerClient, retryExecutor, cipher },
		{
			appSecret: options.appSecret,
			systemUserName: options.systemUserName,
			systemUserRole: options.systemUserRole,
			scopes: options.requiredScopes,
		},
	);
	const signupSaga = createSignupSaga(
		{
			sequelize,
			taskDao: onboardingTaskDao,
			taskState,
			oauthAccountDao,
			messagingAccountDao,
			registrationDao,
			providerClient,
			retryExecutor,
			registrationSaga,
			provisioner,
			cipher,
		},
		{
			appId: options.appId,
			requiredScopes: options.requiredScopes,
			minLongLivedTokenSeconds: options.minLongLivedTokenSeconds,
		},
	);
	const dispatcher = createOnboardingDispatcher(taskState, signupSaga, { concurrency: options.concurrency });
	const orchestrator = createOnboardingOrchestrator(onboardingTaskDao, taskState, dispatcher, {
		maxRetries: options.maxRetries,
	});
	const tokenHealth = createTokenHealthService(oauthAccountDao, providerClient, cipher, {
		expiryWarnDays: options.tokenExpiryWarnDays,
	});
	const accountHealth = createAccountHealthService(
		{ oauthAccountDao, messagingAccountDao, registrationDao, providerClient, cipher },
		{ requiredScopes: options.requiredScopes, expiryWarnDays: options.tokenExpiryWarnDays },
	);

	return {
		taskState,
		retryExecutor,
		registrationSaga,
		provisioner,
		signupSaga,
		dispatcher,
		orchestrator,
		tokenHealth,
		accountHealth,
	};
}
