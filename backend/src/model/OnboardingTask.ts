import type { ModelDef } from "../util/ModelDef";
import type { FailureKind, SignupType, TaskStatus } from "onboarding-common";
import { DataTypes, type Sequelize } from "sequelize";

/**
 * One signup attempt for one organization.
 */
export interface OnboardingTask {
	readonly id: number;
	readonly organizationId: number;
	/** Unique. Derived from organization and authorization code unless the caller supplies one. */
	readonly idempotencyKey: string;
	/** Single-use code from the provider's signup popup. Never logged or returned to callers. */
	readonly authorizationCode: string;
	readonly signupType: SignupType;
	readonly requestedAccountId: string | null;
	readonly requestedBusinessId: string | null;
	readonly requestedPhoneNumberId: string | null;
	/** Identifiers discovered while running, reused by retries. */
	readonly resolvedAccountId: string | null;
	readonly resolvedBusinessId: string | null;
	readonly resolvedPhoneNumberId: string | null;
	readonly status: TaskStatus;
	/** Bit set of completed steps, see OnboardingSteps. */
	readonly completedSteps: number;
	/** Set right before the authorization code is sent to the provider. */
	readonly codeExchangeStartedAt: Date | null;
	readonly encryptedAccessToken: string | null;
	readonly tokenExpiresIn: number | null;
	/** Whether the provider listed the app after the webhook subscription. */
	readonly webhookConfirmed: boolean | null;
	readonly startedAt: Date | null;
	readonly completedAt: Date | null;
	readonly retryCount: number;
	readonly lastError: string | null;
	readonly failureKind: FailureKind | null;
	/** Id of the messaging account the signup produced. */
	readonly resultReference: number | null;
	readonly summary: string | null;
	readonly createdAt: Date;
	readonly updatedAt: Date;
}

export type NewOnboardingTask = Pick<
	OnboardingTask,
	| "organizationId"
	| "idempotencyKey"
	| "authorizationCode"
	| "signupType"
	| "requestedAccountId"
	| "requestedBusinessId"
	| "requestedPhoneNumberId"
>;

export function defineOnboardingTasks(sequelize: Sequelize): ModelDef<OnboardingTask, NewOnboardingTask> {
	return sequelize.define("onboardingTask", schema, {
		timestamps: true,
		tableName: "onboarding_tasks",
		indexes: [
			{
				fields: ["idempotency_key"],
				name: "onboarding_tasks_idempotency_key_key",
				unique: true,
			},
			{
				// Stale PROCESSING scans
				fields: ["status", "started_at"],
			},
			{
				// Retryable FAILED scans
				fields: ["status", "retry_count"],
			},
			{
				fields: ["organization_id", "status"],
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
	idempotencyKey: {
		type: DataTypes.STRING(128),
		allowNull: false,
	},
	authorizationCode: {
		type: DataTypes.TEXT,
		allowNull: false,
	},
	signupType: {
		type: DataTypes.STRING(20),
		allowNull: false,
		defaultValue: "STANDARD",
	},
	requestedAccountId: {
		type: DataTypes.STRING(64),
		allowNull: true,
	},
	requestedBusinessId: {
		type: DataTypes.STRING(64),
		allowNull: true,
	},
	requestedPhoneNumberId: {
		type: DataTypes.STRING(64),
		allowNull: true,
	},
	resolvedAccountId: {
		type: DataTypes.STRING(64),
		allowNull: true,
	},
	resolvedBusinessId: {
		type: DataTypes.STRING(64),
		allowNull: true,
	},
	resolvedPhoneNumberId: {
		type: DataTypes.STRING(64),
		allowNull: true,
	},
	status: {
		type: DataTypes.STRING(20),
		allowNull: false,
		defaultValue: "PENDING",
	},
	completedSteps: {
		type: DataTypes.INTEGER,
		allowNull: false,
		defaultValue: 0,
	},
	codeExchangeStartedAt: {
		type: DataTypes.DATE,
		allowNull: true,
	},
	encryptedAccessToken: {
		type: DataTypes.TEXT,
		allowNull: true,
	},
	tokenExpiresIn: {
		type: DataTypes.INTEGER,
		allowNull: true,
	},
	webhookConfirmed: {
		type: DataTypes.BOOLEAN,
		allowNull: true,
	},
	startedAt: {
		type: DataTypes.DATE,
		allowNull: true,
	},
	completedAt: {
		type: DataTypes.DATE,
		allowNull: true,
	},
	retryCount: {
		type: DataTypes.INTEGER,
		allowNull: false,
		defaultValue: 0,
	},
	lastError: {
		type: DataTypes.TEXT,
		allowNull: true,
	},
	failureKind: {
		type: DataTypes.STRING(20),
		allowNull: true,
	},
	resultReference: {
		type: DataTypes.INTEGER,
		allowNull: true,
	},
	summary: {
		type: DataTypes.TEXT,
		allowNull: true,
	},
};
