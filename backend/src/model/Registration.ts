import type { ModelDef } from "../util/ModelDef";
import type { RegistrationStatus } from "onboarding-common";
import { DataTypes, type Sequelize } from "sequelize";

/**
 * One phone number registration with the provider, keyed by the provider's phone number id.
 *
 * PENDING means the intent is stored and the provider outcome is unknown or in flight.
 * BLOCKED and DISABLED come from the provider and are never retried.
 */
export interface Registration {
	readonly id: number;
	readonly externalId: string;
	/** Messaging account id. */
	readonly ownerId: number;
	readonly displayPhoneNumber: string | null;
	readonly verifiedName: string | null;
	readonly status: RegistrationStatus;
	readonly lastError: string | null;
	/** Provider outcomes recorded so far. */
	readonly attempts: number;
	readonly createdAt: Date;
	readonly updatedAt: Date;
}

export type NewRegistration = Pick<Registration, "externalId" | "ownerId" | "status"> &
	Partial<Pick<Registration, "displayPhoneNumber" | "verifiedName">>;

export function defineRegistrations(sequelize: Sequelize): ModelDef<Registration, NewRegistration> {
	return sequelize.define("registration", schema, {
		timestamps: true,
		indexes: [
			{
				fields: ["external_id"],
				name: "registrations_external_id_key",
				unique: true,
			},
			{
				fields: ["owner_id"],
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
	externalId: {
		type: DataTypes.STRING(64),
		allowNull: false,
	},
	ownerId: {
		type: DataTypes.INTEGER,
		allowNull: false,
	},
	displayPhoneNumber: {
		type: DataTypes.STRING(32),
		allowNull: true,
	},
	verifiedName: {
		type: DataTypes.STRING,
		allowNull: true,
	},
	status: {
		type: DataTypes.STRING(32),
		allowNull: false,
	},
	lastError: {
		type: DataTypes.TEXT,
		allowNull: true,
	},
	attempts: {
		type: DataTypes.INTEGER,
		allowNull: false,
		defaultValue: 0,
	},
};
