/**
 * Database - DAO factory and schema initialization.
 *
 * @module Database
 */

import { createMessagingAccountDao, type MessagingAccountDao } from "../dao/MessagingAccountDao";
import { createOAuthAccountDao, type OAuthAccountDao } from "../dao/OAuthAccountDao";
import { createOnboardingTaskDao, type OnboardingTaskDao } from "../dao/OnboardingTaskDao";
import { createRegistrationDao, type RegistrationDao } from "../dao/RegistrationDao";
import { getLog } from "../util/Logger";
import { QueryTypes, type Sequelize } from "sequelize";

const log = getLog(import.meta);

export interface Database {
	// Sequelize instance (for transactions and advanced queries)
	readonly sequelize: Sequelize;

	readonly onboardingTaskDao: OnboardingTaskDao;
	readonly registrationDao: RegistrationDao;
	readonly oauthAccountDao: OAuthAccountDao;
	readonly messagingAccountDao: MessagingAccountDao;
}

export interface CreateDatabaseOptions {
	/**
	 * Leave the schema alone, e.g. when migrations are managed outside the service.
	 */
	skipSync?: boolean;
}

async function logDatabaseState(sequelize: Sequelize): Promise<void> {
	const [schema] = await sequelize.query<{ current_schema: string }>("SELECT current_schema()", {
		type: QueryTypes.SELECT,
	});
	log.debug("Database state - current_schema: %s", schema?.current_schema);
}

/**
 * Creates missing tables first, then alters the existing ones, so a new index or
 * column lands without dropping data.
 */
async function syncDatabaseModels(sequelize: Sequelize): Promise<void> {
	const existing = await sequelize.query<{ table_name: string }>(
		"SELECT table_name FROM information_schema.tables WHERE table_schema = current_schema()",
		{ type: QueryTypes.SELECT },
	);
	const existingTables = new Set(existing.map(row => row.table_name));

	if (existingTables.size === 0) {
		log.info("Empty schema detected, creating tables with sync()");
		await sequelize.sync();
		return;
	}

	const models = Object.values(sequelize.models);
	for (const model of models.filter(model => !existingTables.has(model.tableName))) {
		log.info("Creating missing table: %s", model.tableName);
		await model.sync();
	}
	for (const model of models.filter(model => existingTables.has(model.tableName))) {
		await model.sync({ alter: true });
	}
	log.info("Existing schema with %d tables synced", existingTables.size);
}

export async function createDatabase(sequelize: Sequelize, options?: CreateDatabaseOptions): Promise<Database> {
	const db: Database = {
		sequelize,
		onboardingTaskDao: createOnboardingTaskDao(sequelize),
		registrationDao: createRegistrationDao(sequelize),
		oauthAccountDao: createOAuthAccountDao(sequelize),
		messagingAccountDao: createMessagingAccountDao(sequelize),
	};

	await logDatabaseState(sequelize);

	if (options?.skipSync) {
		log.info("Skipping sequelize.sync()");
	} else {
		await syncDatabaseModels(sequelize);
	}

	return db;
}
