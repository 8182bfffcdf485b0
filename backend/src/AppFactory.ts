import "./util/Env";
import { version } from "../package.json";
import { type Config, getConfig } from "./config/Config";
import { createDatabase, type Database } from "./core/Database";
import { createDatabaseCheck, createHealthService, createStuckTaskCheck, type HealthService } from "./health";
import type { ExitHandler } from "./index";
import { createMaintenanceScheduler, getMaintenanceJobs, type MaintenanceScheduler } from "./jobs/MaintenanceScheduler";
import { createOnboardingEngine, getOnboardingEngineOptions, type OnboardingEngine } from "./onboarding/OnboardingEngine";
import { createHttpProviderClient, getHttpProviderClientOptions } from "./provider/HttpProviderClient";
import { createOnboardingRouter } from "./router/OnboardingRouter";
import { createRegistrationRouter } from "./router/RegistrationRouter";
import { createStatusRouter } from "./router/StatusRouter";
import { getLog } from "./util/Logger";
import { createSequelize, getPostgresConnectionUri } from "./util/Sequelize";
import express, { type Express } from "express";
import { createTokenCipher, generateTokenEncryptionKey, type TokenCipher } from "onboarding-common/server";

const log = getLog(import.meta);

export interface AppServices {
	database: Database;
	engine: OnboardingEngine;
	healthService: HealthService;
	scheduler?: MaintenanceScheduler;
	/** Stopped in order on shutdown. */
	shutdownHandlers: Array<ExitHandler>;
}

/**
 * Production requires TOKEN_ENCRYPTION_KEY. Elsewhere a missing key is replaced by a random one.
 */
function createCipher(config: Config): TokenCipher {
	if (config.TOKEN_ENCRYPTION_KEY) {
		return createTokenCipher(config.TOKEN_ENCRYPTION_KEY);
	}
	if (config.NODE_ENV === "production") {
		throw new Error("TOKEN_ENCRYPTION_KEY is required in production");
	}
	log.warn("TOKEN_ENCRYPTION_KEY is not set, stored credentials will not survive a restart");
	return createTokenCipher(generateTokenEncryptionKey());
}

function createScheduler(config: Config, engine: OnboardingEngine): MaintenanceScheduler | undefined {
	if (!config.MAINTENANCE_ENABLED) {
		log.info("Maintenance scheduler disabled");
		return;
	}
	if (config.SEQUELIZE !== "postgres") {
		log.info("Maintenance scheduler needs PostgreSQL, use the maintenance routes with the in-memory database");
		return;
	}
	return createMaintenanceScheduler({
		connectionString: getPostgresConnectionUri(config),
		ssl: config.POSTGRES_SSL,
		schema: config.PGBOSS_SCHEMA,
		jobs: getMaintenanceJobs(engine.orchestrator, engine.tokenHealth, {
			resetStuck: config.RESET_STUCK_CRON,
			retryFailed: config.RETRY_FAILED_CRON,
			tokenHealth: config.TOKEN_HEALTH_CRON,
		}),
	});
}

/**
 * Connects the database and wires the saga engine from the configuration.
 */
export async function createAppServices(config: Config = getConfig()): Promise<AppServices> {
	const sequelize = await createSequelize();
	const database = await createDatabase(sequelize);
	const engine = createOnboardingEngine(
		{
			database,
			providerClient: createHttpProviderClient(getHttpProviderClientOptions(config)),
			cipher: createCipher(config),
		},
		getOnboardingEngineOptions(config),
	);
	const healthService = createHealthService({
		checks: [
			createDatabaseCheck(sequelize),
			createStuckTaskCheck(database.onboardingTaskDao, () => engine.taskState.staleBefore()),
		],
		timeoutMs: config.HEALTH_CHECK_TIMEOUT_MS,
		environment: config.NODE_ENV,
		commitSha: process.env.GIT_COMMIT_SHA,
	});
	const scheduler = createScheduler(config, engine);

	const shutdownHandlers: Array<ExitHandler> = [];
	if (scheduler) {
		shutdownHandlers.push({ stop: () => scheduler.stop() });
	}
	shutdownHandlers.push({ stop: () => engine.dispatcher.stop() }, { stop: () => sequelize.close() });

	return { database, engine, healthService, scheduler, shutdownHandlers };
}

/**
 * Creates the Express app without starting the server.
 */
export function createExpressApp(services: Pick<AppServices, "engine" | "healthService">): Express {
	const { engine, healthService } = services;
	const app = express();

	app.disable("x-powered-by");
	app.use(express.json({ limit: "100kb" }));

	app.use(
		"/api/onboarding",
		createOnboardingRouter({
			orchestrator: engine.orchestrator,
			provisioner: engine.provisioner,
			accountHealth: engine.accountHealth,
		}),
	);
	app.use("/api/registrations", createRegistrationRouter(engine.registrationSaga));
	app.use("/api/status", createStatusRouter({ healthService }));

	return app;
}

export async function createAndStartServer(): Promise<Express> {
	log.info(`Onboarding service v${version} starting up on Node ${process.version}`);

	const config = getConfig();
	const services = await createAppServices(config);
	const app = createExpressApp(services);

	await services.scheduler?.start();

	let stopping = false;
	async function shutdown(signal: NodeJS.Signals): Promise<void> {
		if (stopping) {
			return;
		}
		stopping = true;
		log.info("Stopping due to signal: %s", signal);
		for (const handler of services.shutdownHandlers) {
			try {
				await handler.stop();
			} catch (error) {
				log.error(error, "Shutdown handler failed");
			}
		}
		log.info("Onboarding service stopped at %s", new Date());
		process.exit(0);
	}
	for (const signal of ["SIGINT", "SIGTERM", "SIGHUP"] as const) {
		process.on(signal, received => {
			shutdown(received).catch(error => log.error(error, "Shutdown failed"));
		});
	}

	// vite-plugin-node serves the app in development
	if (config.NODE_ENV === "production") {
		app.listen(config.PORT, config.HOST, () => log.info("Listening on %s:%d", config.HOST, config.PORT));
	}

	return app;
}
