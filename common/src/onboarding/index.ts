/**
 * Onboarding Module - wire types and client for signup tasks and registrations.
 */

export { createOnboardingClient, type OnboardingClient } from "./OnboardingClient";
export { ONBOARDING_STEPS, TASK_STATUSES } from "./types";
export type {
	AccountCheck,
	AccountCheckStatus,
	AccountHealthReport,
	BulkProvisioningResult,
	CancelTaskRequest,
	CredentialType,
	EnqueueSignupRequest,
	EnqueueSignupResponse,
	FailureGuidance,
	FailureKind,
	MaintenanceResponse,
	OnboardingStep,
	OverallHealth,
	PhoneCheck,
	PhoneCheckStatus,
	ProvisioningResult,
	ProvisioningState,
	ProvisioningStatus,
	RegisterResourceRequest,
	RegistrationOutcome,
	RegistrationStatus,
	SignupType,
	TaskSnapshot,
	TaskStatus,
	TokenCheck,
	TokenCheckStatus,
} from "./types";
