import { type Config, getConfig } from "../config/Config";
import { getLog } from "./Logger";
import { withRetry } from "./Retry";
import { Sequelize } from "sequelize";

const log = getLog(import.meta);

/**
 * Driver error code (e.g. ECONNREFUSED) of a Sequelize connection error, found on `parent`.
 */
function getDriverErrorCode(error: unknown): string | undefined {
	if (typeof error !== "object" || error === null || !("parent" in error)) {
		return;
	}
	const parent = error.parent;
	if (typeof parent === "object" && parent !== null && "code" in parent && typeof parent.code === "string") {
		return parent.code;
	}
	return;
}

function formatConnectionError(error: unknown, host: string, port: number): Error {
	const originalMessage = error instanceof Error ? error.message : String(error);

	if (getDriverErrorCode(error) === "ECONNREFUSED") {
		const message = [
			`PostgreSQL connection refused at ${host}:${port}`,
			"",
			"To fix:",
			"  - Start PostgreSQL and check POSTGRES_HOST and POSTGRES_PORT",
			"  - Or use the in-process database: set SEQUELIZE=memory",
		].join("\n");
		return new Error(message, { cause: error });
	}

	return new Error(`Failed to connect to PostgreSQL at ${host}:${port}: ${originalMessage}`, { cause: error });
}

export async function createSequelize(): Promise<Sequelize> {
	const config = getConfig();
	switch (config.SEQUELIZE) {
		case "memory":
			return await createMemorySequelize();
		case "postgres":
			return await createPostgresSequelize();
	}
}

type PostgresConfig = Pick<
	Config,
	| "POSTGRES_SCHEME"
	| "POSTGRES_DATABASE"
	| "POSTGRES_USERNAME"
	| "POSTGRES_PASSWORD"
	| "POSTGRES_HOST"
	| "POSTGRES_PORT"
	| "POSTGRES_NO_PORT"
	| "POSTGRES_QUERY"
>;

export function getPostgresConnectionUri(config: PostgresConfig): string {
	const username = encodeURIComponent(config.POSTGRES_USERNAME);
	const password = encodeURIComponent(config.POSTGRES_PASSWORD);
	const portPart = config.POSTGRES_NO_PORT ? "" : `:${config.POSTGRES_PORT}`;
	const queryParamsPart = config.POSTGRES_QUERY ? `?${config.POSTGRES_QUERY}` : "";

	return `${config.POSTGRES_SCHEME}://${username}:${password}@${config.POSTGRES_HOST}${portPart}/${config.POSTGRES_DATABASE}${queryParamsPart}`;
}

export interface MemorySequelizeInstance {
	sequelize: Sequelize;
	server: { stop: () => Promise<void> };
}

/**
 * Starts an in-process PGlite database behind a local Postgres wire-protocol socket
 * (first free port in 5434-5444) and connects Sequelize to it.
 */
export async function createMemorySequelize(): Promise<Sequelize>;
export async function createMemorySequelize(returnServer: true): Promise<MemorySequelizeInstance>;
export async function createMemorySequelize(returnServer?: boolean): Promise<Sequelize | MemorySequelizeInstance> {
	const { PGlite } = await import("@electric-sql/pglite");
	const { PGLiteSocketServer } = await import("@electric-sql/pglite-socket");

	const db = new PGlite("memory://");
	let port = 5434;
	const maxPort = 5444;
	let server: InstanceType<typeof PGLiteSocketServer> | undefined;

	while (port <= maxPort) {
		try {
			server = new PGLiteSocketServer({ db, port });
			await server.start();
			break;
		} catch (error) {
			if (port === maxPort || (error instanceof Error && !error.message.includes("EADDRINUSE"))) {
				throw error;
			}
			port++;
		}
	}

	if (!server) {
		throw new Error("Failed to create PGLiteSocketServer");
	}

	const sequelize = new Sequelize({
		username: "postgres",
		password: "postgres",
		host: "localhost",
		port,
		dialect: "postgres",
		dialectOptions: { ssl: false },
		logging: getConfig().POSTGRES_LOGGING,
		// The socket server accepts a single connection
		pool: { max: 1, min: 0, idle: 0 },
		define: { underscored: true },
	});
	log.info("In-memory database listening on port %d", port);

	if (returnServer) {
		return { sequelize, server };
	}
	return sequelize;
}

/**
 * Determines if a database connection error is transient and worth retrying.
 */
export function isRetryableConnectionError(error: unknown): boolean {
	if (!(error instanceof Error)) {
		return false;
	}

	const errorCode = getDriverErrorCode(error);
	switch (errorCode) {
		case "ECONNREFUSED":
		case "ECONNRESET":
		case "ECONNABORTED":
		case "ENOTFOUND":
		case "EAI_AGAIN":
		case "ETIMEDOUT":
			return true;
	}

	const message = error.message.toLowerCase();
	return message.includes("timeout") || message.includes("could not translate host name");
}

export async function createPostgresSequelize(): Promise<Sequelize> {
	const config = getConfig();
	const sequelize = new Sequelize(getPostgresConnectionUri(config), {
		dialect: "postgres",
		dialectOptions: config.POSTGRES_SSL ? { ssl: { rejectUnauthorized: false } } : {},
		logging: config.POSTGRES_LOGGING,
		pool: { max: config.POSTGRES_POOL_MAX },
		define: { underscored: true },
	});

	try {
		await withRetry(() => sequelize.authenticate(), {
			maxRetries: config.DB_CONNECT_MAX_RETRIES,
			baseDelayMs: config.DB_CONNECT_RETRY_BASE_DELAY_MS,
			maxDelayMs: config.DB_CONNECT_RETRY_MAX_DELAY_MS,
			isRetryable: isRetryableConnectionError,
			label: "DB connect",
		});
		log.info("PostgreSQL connection established successfully");
	} catch (error) {
		throw formatConnectionError(error, config.POSTGRES_HOST, config.POSTGRES_PORT);
	}

	return sequelize;
}
