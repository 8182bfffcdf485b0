import { loadEnvFiles } from "../util/Env";
import { getLog } from "../util/Logger";
import { createEnv } from "@t3-oss/env-core";
import { z } from "zod";

const log = getLog(import.meta);

const BooleanSchema = z
	.string()
	// only allow "true" or "false"
	.refine(s => s === "true" || s === "false")
	// transform to boolean
	.transform(s => s === "true")
	.default("false");

/**
 * Comma separated list of strings, e.g. "a, b,c" -> ["a", "b", "c"].
 */
function commaList(defaultValue: string) {
	return z
		.string()
		.default(defaultValue)
		.transform(s =>
			s
				.split(",")
				.map(part => part.trim())
				.filter(part => part.length > 0),
		);
}

/**
 * Comma separated list of integers. Anything that is not an integer fails validation.
 */
function integerList(defaultValue: string) {
	return commaList(defaultValue).pipe(z.array(z.coerce.number().int()));
}

const configSchema = {
	server: {
		NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
		PORT: z.coerce.number().default(8034),
		HOST: z.string().default("0.0.0.0"),

		// Store: "memory" runs an in-process PGlite database, "postgres" connects to a server
		SEQUELIZE: z.enum(["memory", "postgres"]).default("memory"),
		POSTGRES_SCHEME: z.string().default("postgres"),
		POSTGRES_HOST: z.string().default("localhost"),
		POSTGRES_PORT: z.coerce.number().default(5432),
		POSTGRES_NO_PORT: BooleanSchema,
		POSTGRES_DATABASE: z.string().default("onboarding"),
		POSTGRES_USERNAME: z.string().default("postgres"),
		POSTGRES_PASSWORD: z.string().default("postgres"),
		POSTGRES_QUERY: z.string().default(""),
		POSTGRES_SSL: BooleanSchema,
		POSTGRES_LOGGING: BooleanSchema,
		POSTGRES_POOL_MAX: z.coerce.number().default(10),
		// Database connection retry configuration
		DB_CONNECT_MAX_RETRIES: z.coerce.number().default(5),
		DB_CONNECT_RETRY_BASE_DELAY_MS: z.coerce.number().default(2000),
		DB_CONNECT_RETRY_MAX_DELAY_MS: z.coerce.number().default(30000),

		// Messaging provider Graph API
		PROVIDER_API_BASE_URL: z.string().url().default("https://graph.facebook.com"),
		PROVIDER_API_VERSION: z.string().default("v21.0"),
		PROVIDER_APP_ID: z.string().default(""),
		PROVIDER_APP_SECRET: z.string().default(""),
		PROVIDER_REQUEST_TIMEOUT_MS: z.coerce.number().default(15000),

		// Provider call retries. Error codes and types are provider specific and may drift.
		PROVIDER_RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(4),
		PROVIDER_RETRY_BASE_DELAY_MS: z.coerce.number().default(1000),
		PROVIDER_RATE_LIMIT_BASE_DELAY_MS: z.coerce.number().default(5000),
		PROVIDER_RETRY_MAX_DELAY_MS: z.coerce.number().default(30000),
		PROVIDER_PERMANENT_ERROR_CODES: integerList("190,200,10,100,102"),
		PROVIDER_PERMANENT_ERROR_TYPES: commaList("OAuthException"),
		PROVIDER_RATE_LIMIT_ERROR_CODES: integerList("4,429"),
		// 0 turns the provider circuit breaker off
		PROVIDER_CIRCUIT_FAILURE_THRESHOLD: z.coerce.number().int().min(0).default(5),
		PROVIDER_CIRCUIT_RESET_MS: z.coerce.number().default(30000),

		// Signup saga engine
		ONBOARDING_WORKER_CONCURRENCY: z.coerce.number().int().min(1).default(8),
		// PROCESSING tasks older than this are considered abandoned by their worker
		ONBOARDING_STUCK_THRESHOLD_MINUTES: z.coerce.number().min(1).default(15),
		ONBOARDING_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
		// Long-lived tokens shorter than this mean the provider app is still in development mode
		ONBOARDING_MIN_LONG_LIVED_TOKEN_SECONDS: z.coerce.number().default(604800),
		ONBOARDING_REQUIRED_SCOPES: commaList(
			"whatsapp_business_management,whatsapp_business_messaging,business_management",
		),
		PHONE_REGISTRATION_DEFAULT_PIN: z.string().regex(/^\d{6}$/).default("000000"),
		MAX_PHONE_NUMBERS_PER_ACCOUNT: z.coerce.number().int().min(1).default(20),
		// System user created in the customer's business for a permanent credential
		SYSTEM_USER_NAME: z.string().default("Onboarding-Bot"),
		SYSTEM_USER_ROLE: z.enum(["ADMIN", "EMPLOYEE"]).default("ADMIN"),

		// Base64 encoded 32-byte key for AES-256-GCM credential encryption
		TOKEN_ENCRYPTION_KEY: z.string().optional(),

		// Periodic maintenance through pg-boss
		MAINTENANCE_ENABLED: BooleanSchema.default("true"),
		RESET_STUCK_CRON: z.string().default("*/10 * * * *"),
		RETRY_FAILED_CRON: z.string().default("*/30 * * * *"),
		TOKEN_HEALTH_CRON: z.string().default("0 2 * * *"),
		TOKEN_EXPIRY_WARN_DAYS: z.coerce.number().default(7),
		PGBOSS_SCHEMA: z.string().default("pgboss"),

		// Timeout in milliseconds for each individual health check
		HEALTH_CHECK_TIMEOUT_MS: z.coerce.number().default(2000),
	},
	runtimeEnv: process.env,
	emptyStringAsUndefined: true,
};

function createConfig() {
	return createEnv(configSchema);
}

export type Config = ReturnType<typeof createConfig>;

let currentConfig: Config | undefined;

/**
 * Gets the current configuration object, creating it from the environment on first use.
 */
export function getConfig(): Config {
	if (!currentConfig) {
		currentConfig = createConfig();
	}
	return currentConfig;
}

/**
 * Re-reads the env files and rebuilds the configuration. Keeps the previous
 * configuration when the new values do not validate.
 */
export function reloadConfig(): Config {
	loadEnvFiles();
	log.info("Reloaded .env and .env.local files");
	try {
		currentConfig = createConfig();
	} catch (error) {
		log.error(error, "Failed to reload configuration. Keeping values as they were.");
	}
	return getConfig();
}

/**
 * Resets the configuration cache, forcing it to be recreated on the next call to getConfig().
 * This is primarily useful for testing when environment variables change between tests.
 */
export function resetConfig(): void {
	currentConfig = undefined;
}
