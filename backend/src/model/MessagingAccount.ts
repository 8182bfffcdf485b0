import type { ModelDef } from "../util/ModelDef";
import { DataTypes, type Sequelize } from "sequelize";

export type MessagingAccountStatus = "ACTIVE" | "SUSPENDED" | "DISCONNECTED";

/**
 * A provider business messaging account connected to an organization. Produced by the signup.
 */
export interface MessagingAccount {
	readonly id: number;
	readonly organizationId: number;
	readonly oauthAccountId: number;
	/** Provider account id. Globally unique: two organizations cannot connect the same account. */
	readonly externalAccountId: string;
	readonly businessId: string;
	readonly name: string | null;
	readonly status: MessagingAccountStatus;
	readonly createdAt: Date;
	readonly updatedAt: Date;
}

export type NewMessagingAccount = Pick<
	MessagingAccount,
	"organizationId" | "oauthAccountId" | "externalAccountId" | "businessId" | "status"
> &
	Partial<Pick<MessagingAccount, "name">>;

export function defineMessagingAccounts(sequelize: Sequelize): ModelDef<MessagingAccount, NewMessagingAccount> {
	return sequelize.define("messagingAccount", schema, {
		timestamps: true,
		indexes: [
			{
				fields: ["external_account_id"],
				name: "messaging_accounts_external_account_id_key",
				unique: true,
			},
			{
				fields: ["organization_id"],
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
	oauthAccountId: {
		type: DataTypes.INTEGER,
		allowNull: false,
	},
	externalAccountId: {
		type: DataTypes.STRING(64),
		allowNull: false,
	},
	businessId: {
		type: DataTypes.STRING(64),
		allowNull: false,
	},
	name: {
		type: DataTypes.STRING,
		allowNull: true,
	},
	status: {
		type: DataTypes.STRING(20),
		allowNull: false,
		defaultValue: "ACTIVE",
	},
};
