import { defineOAuthAccounts, type NewOAuthAccount, type OAuthAccount, type TokenType } from "../model/OAuthAccount";
import type { Sequelize, Transaction } from "sequelize";

/**
 * A replacement credential for an organization.
 */
export type OAuthCredential = Pick<OAuthAccount, "encryptedAccessToken" | "expiresAt" | "tokenType"> &
	Partial<Pick<OAuthAccount, "systemUserId" | "providerUserId">>;

/**
 * Data Access Object for organization credentials. Stored tokens are always encrypted.
 */
export interface OAuthAccountDao {
	findById(id: number, transaction?: Transaction): Promise<OAuthAccount | undefined>;

	findByOrganization(organizationId: number, transaction?: Transaction): Promise<OAuthAccount | undefined>;

	/**
	 * Inserts the organization's credential, or replaces the token of the existing one.
	 */
	upsertForOrganization(account: NewOAuthAccount, transaction?: Transaction): Promise<OAuthAccount>;

	/**
	 * Replaces the credential of an existing account. Returns false when the account is gone.
	 */
	replaceCredential(id: number, credential: OAuthCredential): Promise<boolean>;

	listAll(): Promise<Array<OAuthAccount>>;

	listByTokenType(tokenType: TokenType): Promise<Array<OAuthAccount>>;
}

export function createOAuthAccountDao(sequelize: Sequelize): OAuthAccountDao {
	const OAuthAccounts = defineOAuthAccounts(sequelize);

	return {
		findById,
		findByOrganization,
		upsertForOrganization,
		replaceCredential,
		listAll,
		listByTokenType,
	};

	async function findById(id: number, transaction?: Transaction): Promise<OAuthAccount | undefined> {
		const account = await OAuthAccounts.findByPk(id, { transaction: transaction ?? null });
		return account ? account.get({ plain: true }) : undefined;
	}

	async function findByOrganization(
		organizationId: number,
		transaction?: Transaction,
	): Promise<OAuthAccount | undefined> {
		const account = await OAuthAccounts.findOne({ where: { organizationId }, transaction: transaction ?? null });
		return account ? account.get({ plain: true }) : undefined;
	}

	async function upsertForOrganization(account: NewOAuthAccount, transaction?: Transaction): Promise<OAuthAccount> {
		const existing = await OAuthAccounts.findOne({
			where: { organizationId: account.organizationId },
			transaction: transaction ?? null,
		});
		if (!existing) {
			const created = await OAuthAccounts.create(account, { transaction: transaction ?? null });
			return created.get({ plain: true });
		}
		await existing.update(
			{
				encryptedAccessToken: account.encryptedAccessToken,
				expiresAt: account.expiresAt ?? null,
				tokenType: account.tokenType,
				systemUserId: account.systemUserId ?? null,
				providerUserId: account.providerUserId ?? existing.providerUserId,
			},
			{ transaction: transaction ?? null },
		);
		return existing.get({ plain: true });
	}

	async function replaceCredential(id: number, credential: OAuthCredential): Promise<boolean> {
		const [affected] = await OAuthAccounts.update(
			{
				encryptedAccessToken: credential.encryptedAccessToken,
				expiresAt: credential.expiresAt,
				tokenType: credential.tokenType,
				systemUserId: credential.systemUserId ?? null,
				...(credential.providerUserId !== undefined ? { providerUserId: credential.providerUserId } : {}),
			},
			{ where: { id } },
		);
		return affected === 1;
	}

	async function listAll(): Promise<Array<OAuthAccount>> {
		const accounts = await OAuthAccounts.findAll({ order: [["id", "ASC"]] });
		return accounts.map(account => account.get({ plain: true }));
	}

	async function listByTokenType(tokenType: TokenType): Promise<Array<OAuthAccount>> {
		const accounts = await OAuthAccounts.findAll({ where: { tokenType }, order: [["id", "ASC"]] });
		return accounts.map(account => account.get({ plain: true }));
	}
}
