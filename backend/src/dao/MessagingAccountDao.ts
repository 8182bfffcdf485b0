import {
	defineMessagingAccounts,
	type MessagingAccount,
	type NewMessagingAccount,
} from "../model/MessagingAccount";
import type { Sequelize, Transaction } from "sequelize";

/**
 * Data Access Object for connected messaging accounts.
 */
export interface MessagingAccountDao {
	findById(id: number, transaction?: Transaction): Promise<MessagingAccount | undefined>;

	findByExternalAccountId(externalAccountId: string, transaction?: Transaction): Promise<MessagingAccount | undefined>;

	/**
	 * Rejects with a UniqueConstraintError when the external account is already connected.
	 */
	create(account: NewMessagingAccount, transaction?: Transaction): Promise<MessagingAccount>;

	listByOrganization(organizationId: number): Promise<Array<MessagingAccount>>;
}

export function createMessagingAccountDao(sequelize: Sequelize): MessagingAccountDao {
	const MessagingAccounts = defineMessagingAccounts(sequelize);

	return {
		findById,
		findByExternalAccountId,
		create,
		listByOrganization,
	};

	async function findById(id: number, transaction?: Transaction): Promise<MessagingAccount | undefined> {
		const account = await MessagingAccounts.findByPk(id, { transaction: transaction ?? null });
		return account ? account.get({ plain: true }) : undefined;
	}

	async function findByExternalAccountId(
		externalAccountId: string,
		transaction?: Transaction,
	): Promise<MessagingAccount | undefined> {
		const account = await MessagingAccounts.findOne({
			where: { externalAccountId },
			transaction: transaction ?? null,
		});
		return account ? account.get({ plain: true }) : undefined;
	}

	async function create(account: NewMessagingAccount, transaction?: Transaction): Promise<MessagingAccount> {
		const created = await MessagingAccounts.create(account, { transaction: transaction ?? null });
		return created.get({ plain: true });
	}

	async function listByOrganization(organizationId: number): Promise<Array<MessagingAccount>> {
		const accounts = await MessagingAccounts.findAll({ where: { organizationId }, order: [["id", "ASC"]] });
		return accounts.map(account => account.get({ plain: true }));
	}
}
