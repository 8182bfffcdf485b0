import type { ModelDef } from "../util/ModelDef";
import { DataTypes, type Sequelize } from "sequelize";

/**
 * USER_TOKEN is the long-lived token of the person who ran the signup,
 * SYSTEM_USER a permanent token of a business system user.
 */
export type TokenType = "USER_TOKEN" | "SYSTEM_USER";

export interface OAuthAccount {
	readonly id: number;
	/** Unique: one credential per organization. */
	readonly organizationId: number;
	readonly encryptedAccessToken: string;
	/** Null for tokens that never expire. */
	readonly expiresAt: Date | null;
	readonly tokenType: TokenType;
	readonly systemUserId: string | null;
	readonly providerUserId: string | null;
	readonly createdAt: Date;
	readonly updatedAt: Date;
}

export type NewOAuthAccount = Pick<OAuthAccount, "organizationId" | "encryptedAccessToken" | "tokenType"> &
	Partial<Pick<OAuthAccount, "expiresAt" | "systemUserId" | "providerUserId">>;

export function defineOAuthAccounts(sequelize: Sequelize): ModelDef<OAuthAccount, NewOAuthAccount> {
	return sequelize.define("oauthAccount", schema, {
		timestamps: true,
		tableName: "oauth_accounts",
		indexes: [
			{
				fields: ["organization_id"],
				name: "oauth_accounts_organization_id_key",
				unique: true,
			},
		],
	});
}

const schema = {
	id: {
		type: DataTypes.INTEGER,
		autoIncrement: true,
		primaryKey: true,
	},
	organizationId: {
		type: DataTypes.INTEGER,
		allowNull: false,
	},
	encryptedAccessToken: {
		type: DataTypes.TEXT,
		allowNull: false,
	},
	expiresAt: {
		type: DataTypes.DATE,
		allowNull: true,
	},
	tokenType: {
		type: DataTypes.STRING(20),
		allowNull: false,
	},
	systemUserId: {
		type: DataTypes.STRING(64),
		allowNull: true,
	},
	providerUserId: {
		type: DataTypes.STRING(64),
		allowNull: true,
	},
};
