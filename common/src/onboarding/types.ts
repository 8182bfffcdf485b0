/**
 * Onboarding wire types shared by the backend routers and the client.
 */

/**
 * Lifecycle of an onboarding task.
 *
 * PENDING -> PROCESSING -> COMPLETED | FAILED, FAILED -> PENDING (scheduler retry),
 * stale PROCESSING -> PENDING (scheduler reset), FAILED | stale PROCESSING -> CANCELLED.
 */
export type TaskStatus = "PENDING" | "PROCESSING" | "COMPLETED" | "FAILED" | "CANCELLED";

export const TASK_STATUSES: ReadonlyArray<TaskStatus> = ["PENDING", "PROCESSING", "COMPLETED", "FAILED", "CANCELLED"];

/**
 * RETRYABLE failures are picked up again by the maintenance scheduler, PERMANENT ones never are.
 */
export type FailureKind = "RETRYABLE" | "PERMANENT";

/**
 * What a caller should do about a failed task.
 */
export type FailureGuidance = "AUTOMATIC_RETRY" | "RESTART_SIGNUP";

export type SignupType = "STANDARD" | "COEXISTENCE";

/**
 * Ordered signup steps. The position in this list is the bit used to record the step.
 */
export const ONBOARDING_STEPS = [
	"TOKEN_EXCHANGE",
	"TOKEN_EXTENSION",
	"SCOPE_VERIFICATION",
	"ACCOUNT_RESOLUTION",
	"BUSINESS_RESOLUTION",
	"PHONE_RESOLUTION",
	"CREDENTIAL_PERSISTENCE",
	"WEBHOOK_SUBSCRIBE",
	"PHONE_SYNC",
	"PHONE_REGISTRATION",
	"BUSINESS_APP_SYNC",
	"SYSTEM_USER_PROVISIONING",
] as const;

export type OnboardingStep = (typeof ONBOARDING_STEPS)[number];

export interface EnqueueSignupRequest {
	organizationId: number;
	/** Single-use authorization code returned by the provider's signup popup. */
	authorizationCode: string;
	accountId?: string;
	businessId?: string;
	phoneNumberId?: string;
	signupType?: SignupType;
	/** Overrides the key derived from organization and code. */
	idempotencyKey?: string;
}

export interface EnqueueSignupResponse {
	taskId: number;
	status: TaskStatus;
	/** False when an existing task with the same idempotency key was returned. */
	created: boolean;
}

export interface TaskSnapshot {
	id: number;
	organizationId: number;
	status: TaskStatus;
	signupType: SignupType;
	completedSteps: Array<OnboardingStep>;
	retryCount: number;
	lastError?: string;
	failureKind?: FailureKind;
	guidance?: FailureGuidance;
	resultReference?: number;
	summary?: string;
	accountId?: string;
	businessId?: string;
	phoneNumberId?: string;
	startedAt?: string;
	completedAt?: string;
	createdAt: string;
}

export interface CancelTaskRequest {
	reason: string;
}

export interface MaintenanceResponse {
	count: number;
}

export type RegistrationStatus = "PENDING" | "ACTIVE" | "REGISTRATION_FAILED" | "BLOCKED" | "DISABLED";

export interface RegisterResourceRequest {
	externalId: string;
	ownerId: number;
	pin?: string;
}

export interface RegistrationOutcome {
	externalId: string;
	ownerId: number;
	status: RegistrationStatus;
	/** False when the record was already ACTIVE and no provider call was made. */
	externalCallMade: boolean;
	lastError?: string;
}

export type ProvisioningStatus = "PROVISIONED" | "ALREADY_PROVISIONED";

export interface ProvisioningResult {
	organizationId: number;
	status: ProvisioningStatus;
	systemUserId: string;
	assignedAccounts: number;
}

export type CredentialType = "USER_TOKEN" | "SYSTEM_USER";

export interface ProvisioningState {
	organizationId: number;
	/** True once the organization holds a permanent system-user credential. */
	provisioned: boolean;
	/** Absent when the organization never completed a signup. */
	tokenType?: CredentialType;
	systemUserId?: string;
	message: string;
}

export interface BulkProvisioningResult {
	attempted: number;
	succeeded: number;
	failed: number;
	message: string;
}

/**
 * UNHEALTHY when the credential cannot send, DEGRADED when any other check reports a problem.
 */
export type OverallHealth = "HEALTHY" | "DEGRADED" | "UNHEALTHY";

export type TokenCheckStatus = "OK" | "EXPIRING_SOON" | "MISSING_SCOPES" | "EXPIRED" | "INVALID" | "CHECK_FAILED";

export interface TokenCheck {
	status: TokenCheckStatus;
	tokenType: CredentialType;
	valid?: boolean;
	daysUntilExpiry?: number;
	grantedScopes?: Array<string>;
	missingScopes?: Array<string>;
	detail: string;
}

export type AccountCheckStatus = "OK" | "REVIEW_PENDING" | "REJECTED" | "CHECK_FAILED";

export interface AccountCheck {
	accountId: string;
	localStatus: string;
	reviewStatus?: string;
	status: AccountCheckStatus;
	detail: string;
}

export type PhoneCheckStatus = "OK" | "QUALITY_WARNING" | "DISCONNECTED" | "RESTRICTED" | "CHECK_FAILED";

export interface PhoneCheck {
	phoneNumberId: string;
	displayPhoneNumber?: string;
	providerStatus?: string;
	qualityRating?: string;
	verifiedName?: string;
	/** Absent when the profile lookup did not reach the provider. */
	profileExists?: boolean;
	status: PhoneCheckStatus;
	detail: string;
}

export interface AccountHealthReport {
	organizationId: number;
	overallStatus: OverallHealth;
	summary: string;
	checkedAt: string;
	token: TokenCheck;
	accounts: Array<AccountCheck>;
	phones: Array<PhoneCheck>;
}
